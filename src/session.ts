// CHANGE: Log in once and share the session cookie between every catalog query and download.
// WHY: Concurrent callers that see a rejected session trigger a single refresh, not one login each.

import { AxiosResponse } from "axios";
import { AuthError, CatalogUnavailableError, describeError } from "./errors.js";
import { debug, info } from "./logger.js";
import { executeWithRetry, httpClient, normaliseHeaders, RetryPolicy } from "./utils/http.js";

/**
 * Authenticated session issued by the catalog service.
 *
 * @property cookie - Value of the `Cookie` header replayed on every request.
 * @property generation - Increments on every login; lets callers detect a refresh done by someone else.
 */
export interface Session {
  readonly cookie: string;
  readonly acquiredAt: number;
  readonly expiresAt: number;
  readonly generation: number;
}

/**
 * Read-only view of the provider handed to the catalog client and workers.
 */
export interface SessionHandle {
  current(): Promise<Session>;
  refresh(stale: Session): Promise<Session>;
}

export interface SessionProviderOptions {
  readonly loginUrl: string;
  readonly username: string;
  readonly password: string;
  readonly ttlMs: number;
  readonly maxRedirects: number;
  readonly retry: RetryPolicy;
  readonly now?: () => number;
}

/**
 * Header set carrying the session cookie.
 */
export function sessionHeaders(session: Session): Record<string, string> {
  return session.cookie ? { Cookie: session.cookie } : {};
}

function collectCookies(jar: Map<string, string>, response: AxiosResponse): void {
  const raw: unknown = response.headers["set-cookie"];
  const lines = Array.isArray(raw) ? raw : typeof raw === "string" ? [raw] : [];
  for (const line of lines) {
    if (typeof line !== "string") {
      continue;
    }
    const pair = line.split(";", 1)[0] ?? "";
    const separator = pair.indexOf("=");
    if (separator <= 0) {
      continue;
    }
    jar.set(pair.slice(0, separator).trim(), pair.slice(separator + 1).trim());
  }
}

/**
 * Owns the one live session; logs in lazily, refreshes on expiry and collapses concurrent refreshes.
 *
 * The login endpoint answers with a chain of redirects that each set cookies, so redirects are
 * followed by hand and every hop's cookies go into the jar.
 */
export class SessionProvider implements SessionHandle {
  private session: Session | undefined;
  private pending: Promise<Session> | undefined;
  private generation = 0;
  private readonly now: () => number;

  constructor(private readonly options: SessionProviderOptions) {
    this.now = options.now ?? Date.now;
  }

  /**
   * Return a live session, logging in when there is none or it has expired.
   */
  async current(): Promise<Session> {
    if (this.session && this.session.expiresAt > this.now()) {
      return this.session;
    }
    return this.login();
  }

  /**
   * Replace `stale` with a fresh session. When another caller already refreshed it, that session is reused.
   */
  async refresh(stale: Session): Promise<Session> {
    if (this.session && this.session.generation !== stale.generation && this.session.expiresAt > this.now()) {
      return this.session;
    }
    return this.login();
  }

  private login(): Promise<Session> {
    if (!this.pending) {
      this.pending = this.performLogin().finally(() => {
        this.pending = undefined;
      });
    }
    return this.pending;
  }

  private async performLogin(): Promise<Session> {
    const jar = new Map<string, string>();
    let url = this.options.loginUrl;

    for (let hop = 0; hop <= this.options.maxRedirects; hop += 1) {
      const response = await this.request(url, jar);
      collectCookies(jar, response);
      const status = response.status;

      if (status === 401 || status === 403) {
        this.session = undefined;
        throw new AuthError(`Catalog rejected credentials for ${this.options.username}`, { status });
      }
      if (status >= 300 && status < 400) {
        const location = normaliseHeaders(response.headers).location;
        if (!location) {
          throw new CatalogUnavailableError(`Login redirect without location from ${url}`, { status });
        }
        url = new URL(location, url).toString();
        debug(`Following login redirect to ${url}`);
        continue;
      }
      if (status >= 200 && status < 300) {
        const acquiredAt = this.now();
        this.generation += 1;
        this.session = {
          cookie: Array.from(jar, ([name, value]) => `${name}=${value}`).join("; "),
          acquiredAt,
          expiresAt: acquiredAt + this.options.ttlMs,
          generation: this.generation
        };
        info(`Logged on to catalog as ${this.options.username}.`);
        return this.session;
      }
      throw new CatalogUnavailableError(`Login failed with status ${status}`, { status });
    }
    throw new CatalogUnavailableError(`Login exceeded ${this.options.maxRedirects} redirects`);
  }

  private async request(url: string, jar: Map<string, string>): Promise<AxiosResponse> {
    const cookie = Array.from(jar, ([name, value]) => `${name}=${value}`).join("; ");
    try {
      return await executeWithRetry(
        () =>
          httpClient.get(url, {
            auth: { username: this.options.username, password: this.options.password },
            maxRedirects: 0,
            validateStatus: () => true,
            headers: cookie ? { Cookie: cookie } : {}
          }),
        this.options.retry,
        url
      );
    } catch (cause) {
      throw new CatalogUnavailableError(`Not able to reach ${url}: ${describeError(cause)}`);
    }
  }
}
