import { promises as fs } from "node:fs";
import { dirname } from "node:path";
import type { Logger } from "pino";

export type ExchangeChannel = "http" | "upstream";

export interface ExchangeRecord {
  channel: ExchangeChannel;
  event: string;
  rid?: string;
  [key: string]: unknown;
}

export interface ExchangeLogger {
  record(entry: ExchangeRecord): Promise<void>;
}

export interface ExchangeLogPolicy {
  maxBytes: number;
  maxFiles: number;
}

export interface FileExchangeLoggerOptions {
  filePath: string;
  logger: Logger;
  policy: ExchangeLogPolicy;
}

const REDACTED = "[REDACTED]";

const SENSITIVE_HEADER_KEYS = new Set([
  "authorization",
  "proxy-authorization",
  "cookie",
  "set-cookie",
  "x-api-key",
]);

const SENSITIVE_FIELD_KEY_RE = /(password|secret|api[_-]?key|cookie|session|(^|[_-])token$)/i;

function errnoCode(error: unknown): string | undefined {
  const code: unknown = error && typeof error === "object" ? Reflect.get(error, "code") : undefined;
  return typeof code === "string" ? code : undefined;
}

export class NoopExchangeLogger implements ExchangeLogger {
  public async record(_entry: ExchangeRecord): Promise<void> {
    return;
  }
}

/** Appends JSONL records; writes are serialized and rotate by size. */
export class FileExchangeLogger implements ExchangeLogger {
  private writeChain: Promise<void> = Promise.resolve();
  private readonly filePath: string;
  private readonly logger: Logger;
  private readonly policy: ExchangeLogPolicy;

  public constructor(options: FileExchangeLoggerOptions) {
    this.filePath = options.filePath;
    this.logger = options.logger;
    this.policy = options.policy;
  }

  public async record(entry: ExchangeRecord): Promise<void> {
    this.writeChain = this.writeChain
      .then(() => this.appendEntry(entry))
      .catch((error: unknown) => {
        this.logger.error(
          {
            event: "exchange_log_write_failed",
            filePath: this.filePath,
            message: error instanceof Error ? error.message : String(error),
          },
          "exchange_log_write_failed",
        );
      });

    await this.writeChain;
  }

  private async appendEntry(entry: ExchangeRecord): Promise<void> {
    await fs.mkdir(dirname(this.filePath), { recursive: true });
    const line = `${JSON.stringify({ ts: new Date().toISOString(), ...sanitizeExchangeEntry(entry) })}\n`;
    await this.rotateIfNeeded(Buffer.byteLength(line, "utf8"));
    await fs.appendFile(this.filePath, line, "utf8");
  }

  private async rotateIfNeeded(nextLineBytes: number): Promise<void> {
    const currentSize = await this.currentFileSize();
    if (currentSize === 0 || currentSize + nextLineBytes <= this.policy.maxBytes) {
      return;
    }

    if (this.policy.maxFiles <= 1) {
      await this.unlinkIfExists(this.filePath);
    } else {
      for (let index = this.policy.maxFiles - 1; index >= 1; index -= 1) {
        const sourcePath = index === 1 ? this.filePath : `${this.filePath}.${index - 1}`;
        const destinationPath = `${this.filePath}.${index}`;
        try {
          await fs.rename(sourcePath, destinationPath);
        } catch (error) {
          if (errnoCode(error) !== "ENOENT") {
            throw error;
          }
        }
      }
    }

    this.logger.info(
      { event: "exchange_log_rotated", path: this.filePath, maxBytes: this.policy.maxBytes, maxFiles: this.policy.maxFiles },
      "exchange_log_rotated",
    );
  }

  private async currentFileSize(): Promise<number> {
    try {
      const stats = await fs.stat(this.filePath);
      return stats.size;
    } catch (error) {
      if (errnoCode(error) === "ENOENT") {
        return 0;
      }
      throw error;
    }
  }

  private async unlinkIfExists(pathValue: string): Promise<void> {
    try {
      await fs.unlink(pathValue);
    } catch (error) {
      if (errnoCode(error) !== "ENOENT") {
        throw error;
      }
    }
  }
}

export function sanitizeHeaders(headers: Record<string, unknown>): Record<string, unknown> {
  const sanitized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(headers)) {
    sanitized[key] = SENSITIVE_HEADER_KEYS.has(key.toLowerCase()) ? REDACTED : value;
  }
  return sanitized;
}

function sanitizeValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => sanitizeValue(item));
  }
  if (!value || typeof value !== "object") {
    return value;
  }

  const output: Record<string, unknown> = {};
  for (const [key, fieldValue] of Object.entries(value)) {
    if (key.toLowerCase() === "headers" && fieldValue && typeof fieldValue === "object" && !Array.isArray(fieldValue)) {
      output[key] = sanitizeHeaders(Object.fromEntries(Object.entries(fieldValue)));
    } else if (SENSITIVE_FIELD_KEY_RE.test(key)) {
      output[key] = REDACTED;
    } else {
      output[key] = sanitizeValue(fieldValue);
    }
  }
  return output;
}

export function sanitizeExchangeEntry(entry: ExchangeRecord): ExchangeRecord {
  const output: ExchangeRecord = { channel: entry.channel, event: entry.event };
  for (const [key, value] of Object.entries(entry)) {
    if (key === "channel" || key === "event") {
      continue;
    }
    output[key] = key === "rid" ? value : sanitizeValue(value);
  }
  return output;
}
