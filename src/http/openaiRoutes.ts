import { type Request, type Response, Router } from "express";
import { nanoid } from "nanoid";
import { toRelayError } from "../errors.js";
import {
  chatCompletionRequestSchema,
  fromChatCompletionRequest,
  isExpressionClassifierPrompt,
  isTestMessage,
} from "../prompt/clientRequests.js";
import { createFrameWriter, openAiFinishReason } from "../stream/frames.js";
import {
  applyBaseHeaders,
  applyErrorHeaders,
  clientAbortSignal,
  enforceRateLimit,
  errorReplyText,
  getRequestId,
  type HttpDependencies,
  logRawHttpEvent,
  mapRelayError,
  requireClientKey,
  sendJsonError,
  snapshotRequest,
} from "./context.js";
import { pipeForwarder, setupSseHeaders, writeSseFrames } from "./sse.js";

/** What some frontends ask to tag a character's mood; answered locally. */
export const EXPRESSION_CLASSIFIER_REPLY = "neutral";

interface ChatCompletionReply {
  id: string;
  object: "chat.completion";
  created: number;
  model: string;
  choices: Array<{
    index: number;
    message: { role: "assistant"; content: string };
    finish_reason: string;
  }>;
}

export function identificationText(version: string): string {
  return `claude-web-relay v${version}`;
}

function buildChatCompletionReply(model: string, content: string, stopReason = "end_turn"): ChatCompletionReply {
  return {
    id: `chatcmpl-${nanoid()}`,
    object: "chat.completion",
    created: Math.floor(Date.now() / 1000),
    model,
    choices: [
      {
        index: 0,
        message: { role: "assistant", content },
        finish_reason: openAiFinishReason(stopReason),
      },
    ],
  };
}

export function createOpenAiRouter(deps: HttpDependencies): Router {
  const router = Router();

  router.get("/v1/models", (req: Request, res: Response) => {
    const rid = getRequestId(req, res);
    logRawHttpEvent(deps, { rid, event: "http_request_raw", request: snapshotRequest(req) });

    if (requireClientKey(deps, req, res, ["bearer", "x-api-key"]) === null) {
      return;
    }

    deps.logger.info({ rid, event: "http_request", method: req.method, path: req.path }, "http_request");
    applyBaseHeaders(deps.config, rid, res);
    res.json({
      object: "list",
      data: deps.config.modelList.map((id) => ({ id, object: "model", created: 0, owned_by: "anthropic" })),
    });
  });

  router.post("/v1/chat/completions", async (req: Request, res: Response) => {
    const rid = getRequestId(req, res);
    const requestStartedAt = Date.now();
    logRawHttpEvent(deps, { rid, event: "http_request_raw", request: snapshotRequest(req) });
    deps.logger.info({ rid, event: "http_request", method: req.method, path: req.path }, "http_request");

    const clientKey = requireClientKey(deps, req, res, ["bearer", "x-api-key"]);
    if (clientKey === null || !enforceRateLimit(deps, req, res, clientKey)) {
      return;
    }

    const parsed = chatCompletionRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      sendJsonError(deps, req, res, {
        status: 400,
        code: "invalid_request",
        message: "Invalid request body for /v1/chat/completions",
      });
      return;
    }

    const request = fromChatCompletionRequest(parsed.data);
    applyBaseHeaders(deps.config, rid, res);

    if (isTestMessage(request)) {
      deps.logger.info({ rid, event: "test_message_short_circuit" }, "test_message_short_circuit");
      res.json(buildChatCompletionReply(request.model, identificationText(deps.config.version)));
      return;
    }
    if (isExpressionClassifierPrompt(request)) {
      deps.logger.info({ rid, event: "expression_prompt_short_circuit" }, "expression_prompt_short_circuit");
      res.json(buildChatCompletionReply(request.model, EXPRESSION_CLASSIFIER_REPLY));
      return;
    }

    try {
      const outcome = await deps.completions.run(request, {
        format: "openai",
        clientKey,
        rid,
        signal: clientAbortSignal(res),
      });

      if (outcome.kind === "stream") {
        const streamed = await pipeForwarder(res, outcome.forwarder);
        deps.logger.info(
          {
            rid,
            event: "http_response",
            status: 200,
            stream: true,
            state: streamed.state,
            durationMs: Date.now() - requestStartedAt,
          },
          "http_response",
        );
        return;
      }

      const payload = buildChatCompletionReply(outcome.model, outcome.result.text, outcome.result.stopReason);
      res.json(payload);
      deps.logger.info(
        { rid, event: "http_response", status: 200, stream: false, durationMs: Date.now() - requestStartedAt },
        "http_response",
      );
      logRawHttpEvent(deps, { rid, event: "http_response_raw", status: 200, response: payload });
    } catch (error) {
      const relayError = toRelayError(error);
      const mapped = mapRelayError(relayError);
      deps.logger.warn(
        {
          rid,
          event: "completion_failed",
          errorCode: relayError.code,
          message: relayError.message,
          mappedStatus: mapped.status,
          durationMs: Date.now() - requestStartedAt,
        },
        "completion_failed",
      );

      applyErrorHeaders(res, mapped);
      if (request.stream) {
        setupSseHeaders(res);
        const writer = createFrameWriter("openai", {
          id: `chatcmpl-${nanoid()}`,
          model: request.model,
          created: Math.floor(Date.now() / 1000),
        });
        writeSseFrames(res, writer.error(errorReplyText(relayError), relayError.code));
        res.end();
        return;
      }

      res.json(buildChatCompletionReply(request.model, errorReplyText(relayError)));
    }
  });

  return router;
}
