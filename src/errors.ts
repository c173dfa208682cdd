export type RelayErrorCode =
  | "no_valid_key"
  | "wrong_completion_format"
  | "invalid_model"
  | "empty_prompt"
  | "too_many_request"
  | "exhausted_cookie"
  | "invalid_cookie"
  | "upstream"
  | "transport"
  | "unauthorized"
  | "invalid_request"
  | "rate_limited"
  | "unknown";

/**
 * Cookie health signal handed back to the pool together with the cookie.
 */
export type Reason =
  | { kind: "exhausted"; retryAfterSec: number }
  | { kind: "invalid" }
  | { kind: "disabled" }
  | { kind: "banned" };

export interface RelayErrorOptions {
  details?: Record<string, unknown>;
  retryAfterSec?: number;
  status?: number;
  reason?: Reason;
}

export class RelayError extends Error {
  public code: RelayErrorCode;
  public details?: Record<string, unknown>;
  public retryAfterSec?: number;
  /** Upstream HTTP status, when the error came from a Claude.ai response. */
  public status?: number;
  public reason?: Reason;

  public constructor(code: RelayErrorCode, message: string, options: RelayErrorOptions = {}) {
    super(message);
    this.name = "RelayError";
    this.code = code;
    this.details = options.details;
    this.retryAfterSec = options.retryAfterSec;
    this.status = options.status;
    this.reason = options.reason;
  }
}

export function isRelayError(value: unknown): value is RelayError {
  return value instanceof RelayError;
}

export function toRelayError(value: unknown, fallbackMessage = "Unknown relay error"): RelayError {
  if (isRelayError(value)) {
    return value;
  }

  if (value instanceof Error) {
    return new RelayError("unknown", value.message || fallbackMessage);
  }

  return new RelayError("unknown", fallbackMessage, {
    details: { value: typeof value === "string" ? value : JSON.stringify(value) },
  });
}

export function noValidKey(message = "No valid cookie available"): RelayError {
  return new RelayError("no_valid_key", message);
}

export function exhausted(retryAfterSec: number): Reason {
  return { kind: "exhausted", retryAfterSec };
}

/**
 * Maps a request outcome to the health reason returned with the cookie.
 * Only the three cookie-health variants carry one; everything else returns
 * the cookie as healthy.
 */
export function reasonForError(error: RelayError | null): Reason | null {
  if (!error) {
    return null;
  }

  switch (error.code) {
    case "too_many_request":
    case "exhausted_cookie":
      return exhausted(error.retryAfterSec ?? 0);
    case "invalid_cookie":
      return error.reason ?? { kind: "invalid" };
    default:
      return null;
  }
}

export function describeReason(reason: Reason | null): string {
  if (!reason) {
    return "healthy";
  }
  if (reason.kind === "exhausted") {
    return `exhausted(${reason.retryAfterSec}s)`;
  }
  return reason.kind;
}
