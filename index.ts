#!/usr/bin/env node

import { loadConfig, upstreamEndpoint, validateServeConfig } from "./src/config.js";
import { FileExchangeLogger, NoopExchangeLogger } from "./src/exchangeLog.js";
import { startHttpServer } from "./src/http/server.js";
import { UpstreamImageUploader } from "./src/images/upload.js";
import { createLogger } from "./src/logger.js";
import { MemoryCookiePool } from "./src/pool/cookiePool.js";
import { CompletionService } from "./src/relay/completion.js";
import { MemoryTurnHistoryStore } from "./src/relay/history.js";
import { UpstreamClient } from "./src/relay/upstream.js";
import { TokenBucketRateLimiter } from "./src/utils/rateLimit.js";

const config = loadConfig(process.env);
const logger = createLogger({ level: config.logLevel, format: config.logFormat });
const exchangeLogger = config.exchangeLogEnabled
  ? new FileExchangeLogger({
      filePath: config.exchangeLogPath,
      logger,
      policy: {
        maxBytes: config.exchangeLogMaxBytes,
        maxFiles: config.exchangeLogMaxFiles,
      },
    })
  : new NoopExchangeLogger();

if (config.exchangeLogEnabled) {
  logger.warn(
    {
      event: "exchange_log_enabled",
      path: config.exchangeLogPath,
      maxBytes: config.exchangeLogMaxBytes,
      maxFiles: config.exchangeLogMaxFiles,
    },
    "exchange_log_enabled",
  );
}

if (config.rproxy) {
  logger.info({ event: "config_rproxy", rproxy: config.rproxy }, "config_rproxy");
}

validateServeConfig(config);

const pool = new MemoryCookiePool({
  cookies: config.cookies,
  logger,
  defaultCooldownSec: config.cookieCooldownDefaultSec,
});
const client = new UpstreamClient(upstreamEndpoint(config));
const completions = new CompletionService({
  config,
  pool,
  client,
  logger,
  history: new MemoryTurnHistoryStore(),
  imageUploader: new UpstreamImageUploader(client, config.upstreamErrorPatterns, logger),
  exchangeLogger,
});
const rateLimiter = new TokenBucketRateLimiter({
  rpm: config.rateLimitRpm,
  burst: config.rateLimitBurst,
});

process.on("unhandledRejection", (reason) => {
  logger.error({ event: "unhandled_rejection", reason }, "unhandled_rejection");
});

process.on("uncaughtException", (error) => {
  logger.error({ event: "uncaught_exception", error }, "uncaught_exception");
});

await startHttpServer({
  config,
  logger,
  completions,
  pool,
  rateLimiter,
  exchangeLogger,
});
