import type { UpstreamErrorPattern, UpstreamPatternCode } from "../config.js";
import { exhausted, type Reason, RelayError } from "../errors.js";

const BODY_EXCERPT_CHARS = 200;
const DEFAULT_TOO_MANY_REQUEST_SEC = 60;

export interface UpstreamFailure {
  status: number;
  headers: Headers;
  body: string;
}

function matchPattern(body: string, patterns: UpstreamErrorPattern[]): UpstreamPatternCode | null {
  const haystack = body.toLowerCase();
  for (const pattern of patterns) {
    if (pattern.includes.some((needle) => haystack.includes(needle.toLowerCase()))) {
      return pattern.code;
    }
  }
  return null;
}

function parseJsonObject(text: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(text);
    if (parsed && typeof parsed === "object" && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
    return null;
  } catch {
    return null;
  }
}

/**
 * Claude.ai reports a spent quota as a JSON document serialized inside
 * `error.message`, e.g. `{"type":"exceeded_limit","resetsAt":1700000000}`.
 */
export function parseResetsAt(body: string): number | null {
  const outer = parseJsonObject(body);
  const error = outer?.error;
  const message = error && typeof error === "object" ? Reflect.get(error, "message") : undefined;
  if (typeof message !== "string") {
    return null;
  }

  const inner = parseJsonObject(message);
  if (!inner || inner.type !== "exceeded_limit") {
    return null;
  }

  const resetsAt = inner.resetsAt;
  return typeof resetsAt === "number" && Number.isFinite(resetsAt) ? resetsAt : null;
}

export function parseRetryAfter(headers: Headers, nowMs: number): number | null {
  const value = headers.get("retry-after")?.trim();
  if (!value) {
    return null;
  }

  if (/^\d+$/.test(value)) {
    return Number.parseInt(value, 10);
  }

  const at = Date.parse(value);
  if (Number.isNaN(at)) {
    return null;
  }
  return Math.max(0, Math.ceil((at - nowMs) / 1000));
}

function excerpt(body: string): string {
  const collapsed = body.replace(/\s+/g, " ").trim();
  return collapsed.length > BODY_EXCERPT_CHARS ? `${collapsed.slice(0, BODY_EXCERPT_CHARS)}…` : collapsed;
}

function cookieReason(code: UpstreamPatternCode): Reason {
  switch (code) {
    case "disabled":
      return { kind: "disabled" };
    case "banned":
      return { kind: "banned" };
    default:
      return { kind: "invalid" };
  }
}

/**
 * Maps a non-2xx upstream response to the relay error taxonomy. Returns null
 * for successful statuses.
 */
export function classifyUpstreamFailure(
  failure: UpstreamFailure,
  patterns: UpstreamErrorPattern[],
  nowMs: number = Date.now(),
): RelayError | null {
  const { status, headers, body } = failure;
  if (status >= 200 && status < 300) {
    return null;
  }

  const details = { status, body: excerpt(body) };
  const matched = matchPattern(body, patterns);
  const retryAfter = parseRetryAfter(headers, nowMs);

  const resetsAt = parseResetsAt(body);
  if (resetsAt !== null || matched === "exhausted") {
    const retryAfterSec =
      resetsAt !== null ? Math.max(0, Math.ceil(resetsAt - nowMs / 1000)) : (retryAfter ?? 0);
    return new RelayError("exhausted_cookie", `Cookie exhausted, resets in ${retryAfterSec}s`, {
      status,
      retryAfterSec,
      details,
    });
  }

  if (status === 429) {
    const retryAfterSec = retryAfter ?? DEFAULT_TOO_MANY_REQUEST_SEC;
    return new RelayError("too_many_request", `Too many requests, retry after ${retryAfterSec}s`, {
      status,
      retryAfterSec,
      details,
    });
  }

  if (status === 401 || ((status === 403 || status === 400) && matched !== null)) {
    const reason = cookieReason(matched ?? "invalid");
    return new RelayError("invalid_cookie", `Cookie rejected by upstream (${reason.kind})`, {
      status,
      reason,
      details,
    });
  }

  return new RelayError("upstream", `Upstream responded ${status}: ${details.body}`, {
    status,
    details,
  });
}

/**
 * Reads the body of a failed response and throws the classified error.
 * Successful responses are returned untouched with their body unread.
 */
export async function checkUpstreamResponse(
  response: Response,
  patterns: UpstreamErrorPattern[],
): Promise<Response> {
  if (response.ok) {
    return response;
  }

  let body = "";
  try {
    body = await response.text();
  } catch (error) {
    body = error instanceof Error ? error.message : String(error);
  }

  const classified = classifyUpstreamFailure({ status: response.status, headers: response.headers, body }, patterns);
  if (classified) {
    throw classified;
  }
  return response;
}

/**
 * Classifies an `error` event received after the response headers were 2xx.
 * There is no status to go on, so only the message text counts.
 */
export function classifyStreamError(
  message: string,
  patterns: UpstreamErrorPattern[],
  nowMs: number = Date.now(),
): RelayError {
  const details = { body: excerpt(message) };
  const wrapped = JSON.stringify({ error: { message } });
  const resetsAt = parseResetsAt(wrapped);
  const matched = matchPattern(message, patterns);

  if (resetsAt !== null || matched === "exhausted") {
    const retryAfterSec = resetsAt !== null ? Math.max(0, Math.ceil(resetsAt - nowMs / 1000)) : 0;
    return new RelayError("exhausted_cookie", `Cookie exhausted, resets in ${retryAfterSec}s`, {
      retryAfterSec,
      details,
    });
  }

  if (matched !== null) {
    const reason = cookieReason(matched);
    return new RelayError("invalid_cookie", `Cookie rejected by upstream (${reason.kind})`, { reason, details });
  }

  return new RelayError("upstream", `Upstream stream error: ${details.body}`, { details });
}
