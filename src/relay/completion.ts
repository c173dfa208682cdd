import { nanoid } from "nanoid";
import type { Logger } from "pino";
import type { RelayConfig } from "../config.js";
import { RelayError, toRelayError } from "../errors.js";
import type { ExchangeLogger } from "../exchangeLog.js";
import type { ImageUploader } from "../images/upload.js";
import type { CompletionRequest } from "../prompt/clientRequests.js";
import { buildStopSequences, extractControlSignals, stripControlMarkers } from "../prompt/controlSignals.js";
import { findCharacterName, type Message } from "../prompt/messages.js";
import { renderPrompt } from "../prompt/render.js";
import { buildRequestBody, upstreamModelName } from "../prompt/requestBody.js";
import type { CookieSource } from "../pool/cookiePool.js";
import { CompletionAccumulator, type CompletionResult } from "../stream/accumulator.js";
import { collectCompletion, StreamForwarder } from "../stream/forwarder.js";
import { createFrameWriter, type StreamFormat } from "../stream/frames.js";
import type { TurnHistoryStore } from "./history.js";
import { RelaySession } from "./session.js";
import { decideRetryStrategy, isCurrentStrategy } from "./strategy.js";
import type { UpstreamClient } from "./upstream.js";

export type ClientFormat = "messages" | "openai";

/** Messages requests carry the system prompt beside the turns; the decision compares it too. */
function decisionMessages(request: CompletionRequest): Message[] {
  if (request.system.length === 0) {
    return request.messages;
  }
  return [{ role: "system", content: request.system }, ...request.messages];
}

function throwIfClientGone(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new RelayError("transport", "Client disconnected");
  }
}

export interface CompletionServiceDependencies {
  config: RelayConfig;
  pool: CookieSource;
  client: UpstreamClient;
  logger: Logger;
  history: TurnHistoryStore;
  imageUploader?: ImageUploader;
  exchangeLogger?: ExchangeLogger;
}

export interface CompletionTarget {
  format: ClientFormat;
  /** Credential the client authenticated with; keys the previous-turn cache. */
  clientKey: string;
  rid: string;
  /** Fires when the client goes away; aborts upstream and cancels a stream. */
  signal?: AbortSignal;
}

export type CompletionOutcome =
  | { kind: "message"; id: string; model: string; result: CompletionResult }
  | { kind: "stream"; id: string; model: string; format: StreamFormat; forwarder: StreamForwarder };

/**
 * Runs one completion against Claude.ai. Every path that leased a cookie
 * releases the session exactly once: inline on errors, after the reply for
 * collected messages, and when the forwarder stops for streams.
 */
export class CompletionService {
  public constructor(private readonly deps: CompletionServiceDependencies) {}

  public async run(request: CompletionRequest, target: CompletionTarget): Promise<CompletionOutcome> {
    const { config, logger, history } = this.deps;
    const { rid } = target;

    const session = await RelaySession.open({
      config,
      client: this.deps.client,
      pool: this.deps.pool,
      logger,
      rid,
      imageUploader: this.deps.imageUploader,
    });

    try {
      this.validate(request);
      await session.resolveOrganization();

      const memory = history.get(target.clientKey);
      session.prevMessages = memory.prevMessages;
      session.prevImpersonated = memory.prevImpersonated;
      session.character = memory.character;

      const messages = decisionMessages(request);
      const decision = decideRetryStrategy({
        messages,
        prevMessages: session.prevMessages,
        renewAlways: config.renewAlways,
        retryRegenerate: config.retryRegenerate,
        prevImpersonated: session.prevImpersonated,
        hasConversation: session.convUuid !== undefined,
        hasCharacter: session.character !== undefined,
      });
      logger.debug(
        {
          rid,
          event: "retry_strategy_decided",
          strategy: decision.strategy,
          current: isCurrentStrategy(decision.strategy),
          samePrompts: decision.samePrompts,
          sameCharDiffChat: decision.sameCharDiffChat,
        },
        "retry_strategy_decided",
      );

      if (!decision.samePrompts) {
        session.prevMessages = messages;
      }
      session.character = findCharacterName(messages) ?? session.character;
      this.remember(target.clientKey, session, session.prevImpersonated);

      const rendered = renderPrompt(request.messages, request.system);
      const signals = extractControlSignals(rendered, request.model);
      if (signals.messagesLog) {
        logger.info({ rid, event: "prompt_messages_log", prompt: rendered }, "prompt_messages_log");
      }

      const prompt = stripControlMarkers(rendered);
      if (prompt.length === 0) {
        throw new RelayError("empty_prompt", "Empty message?");
      }

      session.model = session.isPro ? upstreamModelName(request.model) : undefined;
      await session.createConversation({ model: request.model, thinking: request.thinking });

      const stopSequences = buildStopSequences(signals.stopSet, request.stop, signals.stopRevoke);
      const turn = buildRequestBody({
        prompt,
        model: session.model,
        maxTokens: request.maxTokens ?? config.defaultMaxTokens,
        messagesApi: signals.messagesApi,
        timezone: config.timezone,
        pastePrompt: config.pastePrompt,
        customPrompt: config.customPrompt,
        images: request.images,
      });
      this.logExchange({
        rid,
        event: "upstream_request",
        convUuid: session.convUuid,
        body: turn.body,
        images: turn.images.length,
        stopSequences,
        signals,
      });

      const streamFormat: StreamFormat =
        target.format === "openai" ? "openai" : signals.messagesApi ? "messages" : "completion";
      const accumulator = new CompletionAccumulator({
        stopSequences,
        fusion: signals.fusion,
        keepThinking: streamFormat === "messages",
      });

      throwIfClientGone(target.signal);
      const upstreamAbort = new AbortController();
      const abortUpstream = (): void => upstreamAbort.abort();
      target.signal?.addEventListener("abort", abortUpstream, { once: true });
      const response = await session.complete(turn, { stream: request.stream, signal: upstreamAbort.signal });
      if (!response.body) {
        throw new RelayError("upstream", "Upstream completion has no body");
      }
      if (target.signal?.aborted) {
        await response.body.cancel().catch((error: unknown) => {
          logger.debug(
            { rid, event: "upstream_body_cancel_failed", message: error instanceof Error ? error.message : String(error) },
            "upstream_body_cancel_failed",
          );
        });
        throwIfClientGone(target.signal);
      }

      const id = target.format === "openai" ? `chatcmpl-${nanoid()}` : `msg_${nanoid()}`;
      const model = request.model;

      if (!request.stream) {
        const result = await collectCompletion(response.body, accumulator, config.upstreamErrorPatterns);
        this.remember(target.clientKey, session, result.impersonated);
        this.logExchange({ rid, event: "upstream_reply", text: result.text, stopReason: result.stopReason });
        this.releaseDetached(session, null);
        return { kind: "message", id, model, result };
      }

      const forwarder = new StreamForwarder({
        body: response.body,
        accumulator,
        writer: createFrameWriter(streamFormat, { id, model, created: Math.floor(Date.now() / 1000) }),
        capacity: config.streamChannelCapacity,
        upstreamAbort,
        patterns: config.upstreamErrorPatterns,
        logger,
        rid,
        onStop: async (outcome) => {
          this.remember(target.clientKey, session, outcome.result.impersonated);
          this.logExchange({
            rid,
            event: "upstream_reply",
            state: outcome.state,
            text: outcome.result.text,
            stopReason: outcome.result.stopReason,
          });
          await session.release(outcome.error);
        },
      });
      target.signal?.removeEventListener("abort", abortUpstream);
      target.signal?.addEventListener("abort", () => forwarder.cancel(), { once: true });
      return { kind: "stream", id, model, format: streamFormat, forwarder };
    } catch (error) {
      const relayError = toRelayError(error);
      await session.release(relayError);
      throw relayError;
    }
  }

  private validate(request: CompletionRequest): void {
    if (request.messages.length === 0) {
      throw new RelayError("wrong_completion_format", "Empty message list");
    }
    if (!this.deps.config.modelList.includes(request.model) && !request.model.includes("claude-")) {
      throw new RelayError("invalid_model", `Invalid model: ${request.model}`, {
        details: { model: request.model },
      });
    }
  }

  private remember(clientKey: string, session: RelaySession, impersonated: boolean): void {
    this.deps.history.set(clientKey, {
      prevMessages: session.prevMessages,
      prevImpersonated: impersonated,
      character: session.character,
    });
  }

  private releaseDetached(session: RelaySession, error: RelayError | null): void {
    void session.release(error).catch((releaseError: unknown) => {
      this.deps.logger.error(
        {
          event: "session_release_failed",
          cookieId: session.cookieId,
          message: releaseError instanceof Error ? releaseError.message : String(releaseError),
        },
        "session_release_failed",
      );
    });
  }

  private logExchange(entry: { rid: string; event: string } & Record<string, unknown>): void {
    if (!this.deps.exchangeLogger) {
      return;
    }
    void this.deps.exchangeLogger.record({ channel: "upstream", ...entry }).catch((error: unknown) => {
      this.deps.logger.error(
        {
          event: "exchange_log_failed",
          scope: "completion",
          message: error instanceof Error ? error.message : String(error),
        },
        "exchange_log_failed",
      );
    });
  }
}
