import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FileExchangeLogger, sanitizeExchangeEntry, sanitizeHeaders } from "../src/exchangeLog.js";
import { silentLogger } from "./helpers/logger.js";

describe("sanitizeExchangeEntry", () => {
  it("redacts credentials in headers and nested fields", () => {
    const sanitized = sanitizeExchangeEntry({
      channel: "http",
      event: "http_request_raw",
      rid: "req-1",
      request: {
        headers: { "x-api-key": "test-secret", accept: "*/*" },
        body: { password: "test-password", max_tokens_to_sample: 5, nested: [{ cookie: "sessionKey=test" }] },
      },
    });

    expect(sanitized).toEqual({
      channel: "http",
      event: "http_request_raw",
      rid: "req-1",
      request: {
        headers: { "x-api-key": "[REDACTED]", accept: "*/*" },
        body: { password: "[REDACTED]", max_tokens_to_sample: 5, nested: [{ cookie: "[REDACTED]" }] },
      },
    });
  });

  it("redacts sensitive header names case-insensitively", () => {
    expect(sanitizeHeaders({ Authorization: "Bearer test-secret", "Set-Cookie": "a=1", host: "x" })).toEqual({
      Authorization: "[REDACTED]",
      "Set-Cookie": "[REDACTED]",
      host: "x",
    });
  });
});

describe("FileExchangeLogger", () => {
  let dir = "";

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "relay-exchange-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function eventsIn(path: string): Promise<string[]> {
    const text = await readFile(path, "utf8");
    return text
      .trim()
      .split("\n")
      .map((line) => {
        const parsed: unknown = JSON.parse(line);
        const event: unknown = parsed && typeof parsed === "object" ? Reflect.get(parsed, "event") : undefined;
        return String(event);
      });
  }

  it("appends JSON lines and rotates by size", async () => {
    const filePath = join(dir, "logs", "exchanges.jsonl");
    const logger = new FileExchangeLogger({ filePath, logger: silentLogger, policy: { maxBytes: 10, maxFiles: 3 } });

    await logger.record({ channel: "upstream", event: "first" });
    await logger.record({ channel: "upstream", event: "second" });
    await logger.record({ channel: "upstream", event: "third" });

    expect(await eventsIn(filePath)).toEqual(["third"]);
    expect(await eventsIn(`${filePath}.1`)).toEqual(["second"]);
    expect(await eventsIn(`${filePath}.2`)).toEqual(["first"]);
  });

  it("keeps several records in one file under the size limit", async () => {
    const filePath = join(dir, "exchanges.jsonl");
    const logger = new FileExchangeLogger({ filePath, logger: silentLogger, policy: { maxBytes: 1_000_000, maxFiles: 2 } });

    await Promise.all([
      logger.record({ channel: "http", event: "a" }),
      logger.record({ channel: "http", event: "b" }),
    ]);

    expect(await eventsIn(filePath)).toEqual(["a", "b"]);
  });

  it("swallows write failures after logging them", async () => {
    const blocker = join(dir, "not-a-dir");
    await writeFile(blocker, "x");
    const logger = new FileExchangeLogger({
      filePath: join(blocker, "exchanges.jsonl"),
      logger: silentLogger,
      policy: { maxBytes: 100, maxFiles: 2 },
    });

    await expect(logger.record({ channel: "http", event: "lost" })).resolves.toBeUndefined();
  });
});
