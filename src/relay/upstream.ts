import { RelayError } from "../errors.js";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

const BROWSER_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36";

export interface UpstreamRequest {
  method: "GET" | "POST" | "DELETE";
  path: string;
  cookie: string;
  json?: unknown;
  form?: FormData;
  accept?: string;
  /** Page the browser would be on, relative to the endpoint. */
  refererPath?: string;
  signal?: AbortSignal;
}

/** A bare session key is accepted in config and sent as `sessionKey=...`. */
export function normalizeCookie(cookie: string): string {
  const trimmed = cookie.trim();
  return trimmed.includes("=") ? trimmed : `sessionKey=${trimmed}`;
}

function parseCookiePairs(cookie: string): Map<string, string> {
  const pairs = new Map<string, string>();
  for (const part of cookie.split(";")) {
    const eq = part.indexOf("=");
    if (eq <= 0) continue;
    pairs.set(part.slice(0, eq).trim(), part.slice(eq + 1).trim());
  }
  return pairs;
}

/** Applies `Set-Cookie` values to a `Cookie` header; only the name=value pair of each is kept. */
export function mergeSetCookies(cookie: string, setCookies: string[]): string {
  if (setCookies.length === 0) {
    return cookie;
  }

  const pairs = parseCookiePairs(cookie);
  for (const header of setCookies) {
    const [pair = ""] = header.split(";", 1);
    const eq = pair.indexOf("=");
    if (eq <= 0) continue;
    pairs.set(pair.slice(0, eq).trim(), pair.slice(eq + 1).trim());
  }

  return [...pairs.entries()].map(([name, value]) => `${name}=${value}`).join("; ");
}

export function readSetCookies(headers: Headers): string[] {
  if (typeof headers.getSetCookie === "function") {
    return headers.getSetCookie();
  }
  const joined = headers.get("set-cookie");
  return joined ? joined.split(/,(?=\s*[^;,=\s]+=)/) : [];
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

export class UpstreamClient {
  private readonly endpoint: string;
  private readonly fetchImpl: FetchLike;

  public constructor(endpoint: string, fetchImpl: FetchLike = fetch) {
    this.endpoint = endpoint;
    this.fetchImpl = fetchImpl;
  }

  public get baseUrl(): string {
    return this.endpoint;
  }

  public buildHeaders(request: UpstreamRequest): Headers {
    const headers = new Headers({
      Cookie: request.cookie,
      Origin: this.endpoint,
      Referer: `${this.endpoint}${request.refererPath ?? "/new"}`,
      "User-Agent": BROWSER_USER_AGENT,
    });
    if (request.json !== undefined) {
      headers.set("Content-Type", "application/json");
    }
    if (request.accept) {
      headers.set("Accept", request.accept);
    }
    return headers;
  }

  /**
   * Sends one request. Network failures surface as `transport` errors; HTTP
   * error statuses are returned as-is for the caller to classify after it has
   * picked up rotated cookies.
   */
  public async send(request: UpstreamRequest): Promise<Response> {
    const init: RequestInit = {
      method: request.method,
      headers: this.buildHeaders(request),
      signal: request.signal,
    };
    if (request.json !== undefined) {
      init.body = JSON.stringify(request.json);
    } else if (request.form) {
      init.body = request.form;
    }

    try {
      return await this.fetchImpl(`${this.endpoint}${request.path}`, init);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new RelayError("transport", isAbortError(error) ? "Upstream request aborted" : `Upstream request failed: ${message}`, {
        details: { method: request.method, path: request.path },
      });
    }
  }
}
