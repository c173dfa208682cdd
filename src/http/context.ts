import type { Request, Response } from "express";
import { nanoid } from "nanoid";
import type { Logger } from "pino";
import { isAuthorizedKey, type RelayConfig } from "../config.js";
import type { RelayError } from "../errors.js";
import { type ExchangeLogger, type ExchangeRecord, sanitizeHeaders } from "../exchangeLog.js";
import type { CompletionRequest } from "../prompt/clientRequests.js";
import type { CookiePoolSummary } from "../pool/cookiePool.js";
import type { CompletionOutcome, CompletionTarget } from "../relay/completion.js";
import type { RateLimiter } from "../utils/rateLimit.js";

export interface CompletionRunner {
  run(request: CompletionRequest, target: CompletionTarget): Promise<CompletionOutcome>;
}

export interface PoolStatus {
  summary(): CookiePoolSummary;
}

export interface HttpDependencies {
  config: RelayConfig;
  logger: Logger;
  completions: CompletionRunner;
  pool: PoolStatus;
  rateLimiter: RateLimiter;
  exchangeLogger?: ExchangeLogger;
}

export interface ErrorResponseShape {
  status: number;
  code: string;
  message: string;
  retryAfterSec?: number;
}

type RawHttpEventPayload = {
  event: string;
  rid?: string;
} & Record<string, unknown>;

export function getRequestId(req: Request, res: Response): string {
  const existing: unknown = res.locals.rid;
  if (typeof existing === "string" && existing.length > 0) {
    return existing;
  }

  const headerRequestId = req.header("x-request-id");
  const rid = typeof headerRequestId === "string" && headerRequestId.trim().length > 0 ? headerRequestId.trim() : nanoid();
  res.locals.rid = rid;
  return rid;
}

export function applyBaseHeaders(config: RelayConfig, rid: string, res: Response): void {
  res.setHeader("x-relay-version", config.version);
  res.setHeader("x-relay-request-id", rid);
}

export function snapshotRequest(req: Request): Record<string, unknown> {
  return {
    method: req.method,
    path: req.path,
    headers: sanitizeHeaders({ ...req.headers }),
    query: req.query,
    body: req.body,
  };
}

export function logRawHttpEvent(deps: HttpDependencies, entry: RawHttpEventPayload): void {
  if (!deps.exchangeLogger) {
    return;
  }

  const payload: ExchangeRecord = { channel: "http", ...entry };
  void deps.exchangeLogger.record(payload).catch((error: unknown) => {
    deps.logger.error(
      {
        event: "exchange_log_failed",
        scope: "http",
        message: error instanceof Error ? error.message : String(error),
      },
      "exchange_log_failed",
    );
  });
}

export function mapRelayError(error: RelayError): ErrorResponseShape {
  switch (error.code) {
    case "unauthorized":
      return { status: 401, code: error.code, message: error.message };
    case "wrong_completion_format":
    case "invalid_model":
    case "empty_prompt":
    case "invalid_request":
      return { status: 400, code: error.code, message: error.message };
    case "too_many_request":
    case "exhausted_cookie":
    case "rate_limited":
      return {
        status: 429,
        code: error.code,
        message: error.message,
        retryAfterSec: error.retryAfterSec ?? 60,
      };
    case "no_valid_key":
      return { status: 503, code: error.code, message: error.message };
    case "invalid_cookie":
    case "upstream":
    case "transport":
      return { status: 502, code: error.code, message: error.message };
    case "unknown":
    default:
      return { status: 500, code: error.code, message: error.message };
  }
}

/** Text of the synthetic assistant message a failed non-streaming request answers with. */
export function errorReplyText(error: RelayError): string {
  return error.code === "empty_prompt" ? error.message : `Error: ${error.message}`;
}

/** Marks a 200 reply that carries an error, so clients can still tell. */
export function applyErrorHeaders(res: Response, mapped: ErrorResponseShape): void {
  res.setHeader("x-relay-error-code", mapped.code);
  if (mapped.retryAfterSec !== undefined) {
    res.setHeader("Retry-After", String(mapped.retryAfterSec));
  }
}

export function sendJsonError(
  deps: HttpDependencies,
  req: Request,
  res: Response,
  error: ErrorResponseShape,
): void {
  const rid = getRequestId(req, res);
  applyBaseHeaders(deps.config, rid, res);
  if (error.retryAfterSec !== undefined) {
    res.setHeader("Retry-After", String(error.retryAfterSec));
  }

  const payload = {
    error: {
      message: error.message,
      type: "relay_error",
      code: error.code,
      param: null,
    },
  };
  res.status(error.status).json(payload);
  logRawHttpEvent(deps, {
    rid,
    event: "http_response_error_raw",
    request: snapshotRequest(req),
    status: error.status,
    response: payload,
  });
}

export function readBearerToken(req: Request): string | undefined {
  const match = req.header("authorization")?.match(/^Bearer\s+(.+)$/i);
  return match?.[1]?.trim();
}

/** Resolves and checks the client key; on failure the 401 is already sent. */
export function requireClientKey(
  deps: HttpDependencies,
  req: Request,
  res: Response,
  sources: Array<"x-api-key" | "bearer">,
): string | null {
  for (const source of sources) {
    const candidate = source === "bearer" ? readBearerToken(req) : req.header("x-api-key")?.trim();
    if (candidate && isAuthorizedKey(deps.config, candidate)) {
      return candidate;
    }
  }

  const expected = sources.map((source) => (source === "bearer" ? "Authorization: Bearer" : "x-api-key")).join(" or ");
  sendJsonError(deps, req, res, {
    status: 401,
    code: "unauthorized",
    message: `Missing or invalid ${expected} header`,
  });
  return null;
}

/** Consumes one token for the client; on refusal the 429 is already sent. */
export function enforceRateLimit(deps: HttpDependencies, req: Request, res: Response, clientKey: string): boolean {
  const decision = deps.rateLimiter.consume(clientKey);
  if (decision.allowed) {
    return true;
  }

  deps.logger.warn(
    { rid: getRequestId(req, res), event: "rate_limited", retryAfterSec: decision.retryAfterSec },
    "rate_limited",
  );
  sendJsonError(deps, req, res, {
    status: 429,
    code: "rate_limited",
    message: "Too many requests",
    retryAfterSec: decision.retryAfterSec,
  });
  return false;
}

/** Aborts when the client connection closes before the reply is written. */
export function clientAbortSignal(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on("close", () => {
    if (!res.writableFinished) {
      controller.abort();
    }
  });
  return controller.signal;
}
