import fetch from 'cross-fetch';

/** Injection token for the fetch implementation used against Space-Track */
export const HTTP_FETCH = Symbol('HTTP_FETCH');

export interface FetchInit {
  method?: string;
  headers?: Record<string, string>;
  body?: string;
}

/** The part of a fetch Response the session reads */
export interface FetchResponse {
  status: number;
  headers: { get(name: string): string | null };
  json(): Promise<unknown>;
}

export type FetchFn = (url: string, init?: FetchInit) => Promise<FetchResponse>;

export const defaultFetch: FetchFn = fetch;

/**
 * Cookies set by a login response, replayed on later requests.
 * Only name=value pairs are kept; path, expiry and domain are ignored.
 */
export class CookieJar {
  private readonly cookies = new Map<string, string>();

  /**
   * Accepts a (possibly comma-joined) Set-Cookie header value.
   * Commas inside Expires dates are not treated as separators.
   */
  store(setCookie: string | null): void {
    if (!setCookie) return;
    for (const cookie of setCookie.split(/,(?=\s*[^;,=\s]+=)/)) {
      const pair = cookie.split(';')[0].trim();
      const eq = pair.indexOf('=');
      if (eq <= 0) continue;
      this.cookies.set(pair.slice(0, eq), pair.slice(eq + 1));
    }
  }

  header(): string | undefined {
    if (this.cookies.size === 0) return undefined;
    return Array.from(this.cookies, ([name, value]) => `${name}=${value}`).join('; ');
  }

  clear(): void {
    this.cookies.clear();
  }
}
