import express, { type Express, type NextFunction, type Request, type Response } from "express";
import {
  applyBaseHeaders,
  getRequestId,
  type HttpDependencies,
  logRawHttpEvent,
  sendJsonError,
  snapshotRequest,
} from "./context.js";
import { createMessagesRouter } from "./messagesRoutes.js";
import { createOpenAiRouter } from "./openaiRoutes.js";

function bodyParserErrorType(error: unknown): string | undefined {
  const type: unknown = error && typeof error === "object" ? Reflect.get(error, "type") : undefined;
  return typeof type === "string" ? type : undefined;
}

export function createHttpApp(deps: HttpDependencies): Express {
  const app = express();

  app.disable("x-powered-by");

  app.use((req, res, next) => {
    applyBaseHeaders(deps.config, getRequestId(req, res), res);
    next();
  });

  app.use(express.json({ limit: deps.config.httpBodyLimit }));

  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    const type = bodyParserErrorType(error);
    if (type === "entity.too.large") {
      sendJsonError(deps, req, res, { status: 413, code: "invalid_request", message: "Request body is too large" });
      return;
    }
    if (type === "entity.parse.failed") {
      sendJsonError(deps, req, res, { status: 400, code: "invalid_request", message: "Invalid JSON body" });
      return;
    }
    next(error);
  });

  app.get("/health", (req, res) => {
    const rid = getRequestId(req, res);
    const cookies = deps.pool.summary();
    const payload = {
      ok: true,
      ready: cookies.available > 0,
      version: deps.config.version,
      cookies,
    };
    res.json(payload);
    logRawHttpEvent(deps, {
      rid,
      event: "http_response_raw",
      request: snapshotRequest(req),
      status: 200,
      response: payload,
    });
  });

  app.use(createMessagesRouter(deps));
  app.use(createOpenAiRouter(deps));

  app.use((req, res) => {
    sendJsonError(deps, req, res, { status: 404, code: "not_found", message: "Route not found" });
  });

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    deps.logger.error(
      {
        rid: getRequestId(req, res),
        event: "http_unhandled_error",
        message: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
      },
      "http_unhandled_error",
    );
    if (res.headersSent) {
      res.end();
      return;
    }
    sendJsonError(deps, req, res, { status: 500, code: "unknown", message: "Unhandled HTTP error" });
  });

  return app;
}

export async function startHttpServer(deps: HttpDependencies): Promise<void> {
  const app = createHttpApp(deps);

  await new Promise<void>((resolve) => {
    const server = app.listen(deps.config.httpPort, deps.config.httpHost, () => {
      // Streams can outlive the default request timeout.
      server.requestTimeout = 0;

      deps.logger.info(
        {
          event: "http_server_started",
          host: deps.config.httpHost,
          port: deps.config.httpPort,
          endpoint: deps.config.rproxy || deps.config.endpoint,
          models: deps.config.modelList.length,
        },
        "http_server_started",
      );
      resolve();
    });
  });
}
