import { AxiosError, AxiosResponse, InternalAxiosRequestConfig, RawAxiosResponseHeaders } from "axios";
import fs from "fs-extra";
import os from "os";
import path from "path";
import { Mock, vi } from "vitest";
import { Session, SessionHandle } from "../src/session.js";
import { PatchRecord } from "../src/types.js";

export const LINUX = { code: "226", name: "Linux x86-64" } as const;
export const SOLARIS = { code: "23", name: "Oracle Solaris on SPARC (64-bit)" } as const;

export function makeRecord(overrides: Partial<PatchRecord> = {}): PatchRecord {
  return {
    patch_number: "35643107",
    release: "19.0.0.0.0",
    platform: LINUX,
    description: "DATABASE RELEASE UPDATE 19.21.0.0.0",
    file_name: "p35643107_190000_Linux-x86-64.zip",
    size_bytes: 1024,
    download_ref: "https://catalog.example.com/download/p35643107_190000_Linux-x86-64.zip",
    ...overrides
  };
}

export const session: Session = { cookie: "SESSION=abc", acquiredAt: 0, expiresAt: Number.MAX_SAFE_INTEGER, generation: 1 };

export function fakeSession(): SessionHandle & {
  readonly current: Mock<[], Promise<Session>>;
  readonly refresh: Mock<[Session], Promise<Session>>;
} {
  const refreshed: Session = { ...session, cookie: "SESSION=fresh", generation: 2 };
  return {
    current: vi.fn<[], Promise<Session>>().mockResolvedValue(session),
    refresh: vi.fn<[Session], Promise<Session>>().mockResolvedValue(refreshed)
  };
}

const dummyConfig = {
  url: "https://catalog.example.com",
  headers: {}
} as InternalAxiosRequestConfig;

export function response<T>(data: T, status = 200, headers: RawAxiosResponseHeaders = {}): AxiosResponse<T> {
  return {
    status,
    statusText: status === 200 ? "OK" : "",
    headers,
    config: dummyConfig,
    data
  } satisfies AxiosResponse<T>;
}

export function httpError(status: number, message = `status ${status}`): AxiosError {
  const error = new AxiosError(message);
  error.response = {
    status,
    statusText: "",
    headers: {},
    config: dummyConfig,
    data: null
  } satisfies AxiosResponse;
  return error;
}

export function networkError(code: string): AxiosError {
  return new AxiosError(`network ${code}`, code);
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "patches-test-"));
}
