import { type Request, type Response, Router } from "express";
import { nanoid } from "nanoid";
import { toRelayError } from "../errors.js";
import { fromMessagesRequest, isTestMessage, messagesRequestSchema } from "../prompt/clientRequests.js";
import type { CompletionResult } from "../stream/accumulator.js";
import { createFrameWriter } from "../stream/frames.js";
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

export const TEST_MESSAGE_REPLY = "Test message";

interface MessageReply {
  id: string;
  type: "message";
  role: "assistant";
  model: string;
  content: Array<{ type: "text"; text: string } | { type: "thinking"; thinking: string }>;
  stop_reason: string;
  stop_sequence: string | null;
  usage: { input_tokens: number; output_tokens: number };
}

function buildMessageReply(id: string, model: string, result: Pick<CompletionResult, "text" | "thinking" | "stopReason" | "stopSequence">): MessageReply {
  const content: MessageReply["content"] = [];
  if (result.thinking) {
    content.push({ type: "thinking", thinking: result.thinking });
  }
  content.push({ type: "text", text: result.text });

  return {
    id,
    type: "message",
    role: "assistant",
    model,
    content,
    stop_reason: result.stopReason,
    stop_sequence: result.stopSequence,
    usage: { input_tokens: 0, output_tokens: 0 },
  };
}

function syntheticReply(model: string, text: string): MessageReply {
  return buildMessageReply(`msg_${nanoid()}`, model, {
    text,
    thinking: "",
    stopReason: "end_turn",
    stopSequence: null,
  });
}

export function createMessagesRouter(deps: HttpDependencies): Router {
  const router = Router();

  router.post("/v1/messages", async (req: Request, res: Response) => {
    const rid = getRequestId(req, res);
    const requestStartedAt = Date.now();
    logRawHttpEvent(deps, { rid, event: "http_request_raw", request: snapshotRequest(req) });
    deps.logger.info({ rid, event: "http_request", method: req.method, path: req.path }, "http_request");

    const clientKey = requireClientKey(deps, req, res, ["x-api-key"]);
    if (clientKey === null || !enforceRateLimit(deps, req, res, clientKey)) {
      return;
    }

    const parsed = messagesRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      sendJsonError(deps, req, res, {
        status: 400,
        code: "invalid_request",
        message: "Invalid request body for /v1/messages",
      });
      return;
    }

    const request = fromMessagesRequest(parsed.data);
    applyBaseHeaders(deps.config, rid, res);

    if (isTestMessage(request)) {
      deps.logger.info({ rid, event: "test_message_short_circuit" }, "test_message_short_circuit");
      res.json(syntheticReply(request.model, TEST_MESSAGE_REPLY));
      return;
    }

    try {
      const outcome = await deps.completions.run(request, {
        format: "messages",
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

      const payload = buildMessageReply(outcome.id, outcome.model, outcome.result);
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
        const writer = createFrameWriter("messages", {
          id: `msg_${nanoid()}`,
          model: request.model,
          created: Math.floor(Date.now() / 1000),
        });
        writeSseFrames(res, writer.error(errorReplyText(relayError), relayError.code));
        res.end();
        return;
      }

      res.json(syntheticReply(request.model, errorReplyText(relayError)));
    }
  });

  return router;
}
