import { homedir } from "node:os";
import { resolve } from "node:path";

export type UpstreamPatternCode = "exhausted" | "invalid" | "disabled" | "banned";

export interface UpstreamErrorPattern {
  code: UpstreamPatternCode;
  includes: string[];
}

export interface CookieEntry {
  cookie: string;
  orgUuid?: string;
}

export interface RelayConfig {
  version: string;
  httpHost: string;
  httpPort: number;
  httpBodyLimit: string;

  apiKeys: string[];
  cookies: CookieEntry[];

  endpoint: string;
  rproxy: string;

  renewAlways: boolean;
  retryRegenerate: boolean;

  modelList: string[];
  timezone: string;
  pastePrompt: boolean;
  customPrompt: string;
  defaultMaxTokens: number;
  streamChannelCapacity: number;
  cookieCooldownDefaultSec: number;

  upstreamErrorPatterns: UpstreamErrorPattern[];

  rateLimitRpm: number;
  rateLimitBurst: number;

  logLevel: "debug" | "info" | "warn" | "error";
  logFormat: "json" | "pretty";
  exchangeLogEnabled: boolean;
  exchangeLogPath: string;
  exchangeLogMaxBytes: number;
  exchangeLogMaxFiles: number;
}

export const DEFAULT_ENDPOINT = "https://claude.ai";

export const DEFAULT_MODEL_LIST = [
  "claude-3-7-sonnet-20250219",
  "claude-3-5-sonnet-20241022",
  "claude-3-5-haiku-20241022",
  "claude-3-opus-20240229",
  "claude-3-sonnet-20240229",
  "claude-3-haiku-20240307",
];

const DEFAULT_UPSTREAM_ERROR_PATTERNS: UpstreamErrorPattern[] = [
  { code: "exhausted", includes: ["exceeded_limit", "usage limit", "out of free messages"] },
  { code: "disabled", includes: ["organization has been disabled", "account has been disabled"] },
  { code: "banned", includes: ["account has been suspended", "banned"] },
  {
    code: "invalid",
    includes: ["account_session_invalid", "invalid authorization", "authentication_error", "invalid session"],
  },
];

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  const lowered = value.trim().toLowerCase();
  if (["1", "true", "yes", "y", "on"].includes(lowered)) return true;
  if (["0", "false", "no", "n", "off"].includes(lowered)) return false;
  return fallback;
}

function parseNumber(value: string | undefined, fallback: number, min = 0): number {
  if (value === undefined) return fallback;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || Number.isNaN(parsed)) return fallback;
  return Math.max(parsed, min);
}

function parseList(value: string | undefined): string[] {
  if (!value) {
    return [];
  }

  return value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

function parseLogLevel(value: string | undefined): RelayConfig["logLevel"] {
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  return "info";
}

function parseLogFormat(value: string | undefined): RelayConfig["logFormat"] {
  if (value === "pretty" || value === "json") {
    return value;
  }
  return "json";
}

function expandHomePath(pathValue: string): string {
  if (pathValue === "~") {
    return homedir();
  }
  if (pathValue.startsWith("~/")) {
    return resolve(homedir(), pathValue.slice(2));
  }
  return pathValue;
}

function trimTrailingSlash(value: string): string {
  return value.replace(/\/+$/, "");
}

// `cookie@org-uuid` pins the organization so bootstrap can skip discovery.
export function parseCookieEntries(value: string | undefined): CookieEntry[] {
  return parseList(value).map((entry) => {
    const at = entry.lastIndexOf("@");
    if (at <= 0) {
      return { cookie: entry };
    }
    const orgUuid = entry.slice(at + 1).trim();
    const cookie = entry.slice(0, at).trim();
    return orgUuid ? { cookie, orgUuid } : { cookie };
  });
}

function isPatternCode(value: unknown): value is UpstreamPatternCode {
  return value === "exhausted" || value === "invalid" || value === "disabled" || value === "banned";
}

function parseUpstreamPatterns(value: string | undefined): UpstreamErrorPattern[] {
  if (!value) {
    return DEFAULT_UPSTREAM_ERROR_PATTERNS;
  }

  try {
    const parsed: unknown = JSON.parse(value);
    if (!Array.isArray(parsed)) {
      return DEFAULT_UPSTREAM_ERROR_PATTERNS;
    }

    const normalized: UpstreamErrorPattern[] = [];
    for (const item of parsed) {
      if (!item || typeof item !== "object") continue;
      const code: unknown = Reflect.get(item, "code");
      const includes: unknown = Reflect.get(item, "includes");
      if (!isPatternCode(code) || !Array.isArray(includes)) continue;
      const list = includes.filter((v): v is string => typeof v === "string" && v.length > 0);
      if (list.length === 0) continue;
      normalized.push({ code, includes: list });
    }

    return normalized.length > 0 ? normalized : DEFAULT_UPSTREAM_ERROR_PATTERNS;
  } catch {
    return DEFAULT_UPSTREAM_ERROR_PATTERNS;
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RelayConfig {
  const modelList = parseList(env.MODEL_LIST);

  return {
    version: env.RELAY_VERSION || "0.3.0",
    httpHost: env.HTTP_HOST || "127.0.0.1",
    httpPort: parseNumber(env.HTTP_PORT, 8484, 1),
    httpBodyLimit: env.HTTP_BODY_LIMIT || "8mb",

    apiKeys: parseList(env.API_KEYS),
    cookies: parseCookieEntries(env.COOKIES),

    endpoint: trimTrailingSlash(env.ENDPOINT || DEFAULT_ENDPOINT),
    rproxy: trimTrailingSlash(env.RPROXY?.trim() ?? ""),

    renewAlways: parseBoolean(env.RENEW_ALWAYS, true),
    retryRegenerate: parseBoolean(env.RETRY_REGENERATE, false),

    modelList: modelList.length > 0 ? modelList : DEFAULT_MODEL_LIST,
    timezone: env.TIMEZONE || "America/New_York",
    pastePrompt: parseBoolean(env.PASTE_PROMPT, false),
    customPrompt: env.CUSTOM_PROMPT ?? "",
    defaultMaxTokens: parseNumber(env.DEFAULT_MAX_TOKENS, 4096, 1),
    streamChannelCapacity: parseNumber(env.STREAM_CHANNEL_CAPACITY, 32, 1),
    cookieCooldownDefaultSec: parseNumber(env.COOKIE_COOLDOWN_DEFAULT_SEC, 300, 1),

    upstreamErrorPatterns: parseUpstreamPatterns(env.UPSTREAM_ERROR_PATTERNS_JSON),

    rateLimitRpm: parseNumber(env.RATE_LIMIT_RPM, 60, 1),
    rateLimitBurst: parseNumber(env.RATE_LIMIT_BURST, 10, 1),

    logLevel: parseLogLevel(env.LOG_LEVEL),
    logFormat: parseLogFormat(env.LOG_FORMAT),
    exchangeLogEnabled: parseBoolean(env.EXCHANGE_LOG_ENABLED, false),
    exchangeLogPath: expandHomePath(env.EXCHANGE_LOG_PATH || "~/.claude-web-relay/logs/exchanges.jsonl"),
    exchangeLogMaxBytes: parseNumber(env.EXCHANGE_LOG_MAX_BYTES, 16 * 1024 * 1024, 1),
    exchangeLogMaxFiles: parseNumber(env.EXCHANGE_LOG_MAX_FILES, 5, 1),
  };
}

/** Upstream base URL: the reverse proxy when one is configured. */
export function upstreamEndpoint(config: RelayConfig): string {
  return config.rproxy || config.endpoint;
}

export function isAuthorizedKey(config: RelayConfig, key: string | undefined): boolean {
  const trimmed = key?.trim();
  if (!trimmed) {
    return false;
  }
  return config.apiKeys.includes(trimmed);
}

export function validateServeConfig(config: RelayConfig): void {
  if (config.apiKeys.length === 0) {
    throw new Error("API_KEYS is required to serve requests");
  }
  if (config.cookies.length === 0) {
    throw new Error("COOKIES must list at least one Claude.ai session cookie");
  }
}
