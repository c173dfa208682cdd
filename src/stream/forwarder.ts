import type { Logger } from "pino";
import type { UpstreamErrorPattern } from "../config.js";
import { RelayError, toRelayError } from "../errors.js";
import { classifyStreamError } from "../relay/classify.js";
import { Channel } from "../utils/channel.js";
import { type CompletionAccumulator, type CompletionResult, parseUpstreamEvent } from "./accumulator.js";
import type { FrameWriter } from "./frames.js";
import { readSseEvents } from "./sseParser.js";

export type ForwarderState = "idle" | "streaming" | "completed" | "cancelled" | "failed";

export interface ForwarderOutcome {
  state: "completed" | "cancelled" | "failed";
  result: CompletionResult;
  error: RelayError | null;
}

export interface StreamForwarderOptions {
  body: ReadableStream<Uint8Array>;
  accumulator: CompletionAccumulator;
  writer: FrameWriter;
  capacity: number;
  /** Aborts the upstream request; fired when the client goes away. */
  upstreamAbort: AbortController;
  patterns: UpstreamErrorPattern[];
  logger: Logger;
  rid: string;
  onStop?: (outcome: ForwarderOutcome) => Promise<void>;
}

/**
 * Pumps one upstream event stream into a bounded channel of client frames.
 *
 * The consumer reads `frames` and calls `cancel()` when its connection
 * closes. A rejected push means the consumer is gone: the pump stops pulling
 * and aborts upstream. `run()` resolves with the outcome; it rejects only
 * when called twice.
 */
export class StreamForwarder {
  public readonly frames: Channel<string>;
  private readonly options: StreamForwarderOptions;
  private currentState: ForwarderState = "idle";
  private cancelRequested = false;

  public constructor(options: StreamForwarderOptions) {
    this.options = options;
    this.frames = new Channel<string>(options.capacity);
  }

  public get state(): ForwarderState {
    return this.currentState;
  }

  public cancel(): void {
    if (this.cancelRequested) {
      return;
    }
    this.cancelRequested = true;
    this.frames.close();
    this.options.upstreamAbort.abort();
  }

  public async run(): Promise<ForwarderOutcome> {
    if (this.currentState !== "idle") {
      throw new RelayError("unknown", "Stream forwarder already ran");
    }
    this.currentState = "streaming";

    const outcome = await this.pump();
    this.currentState = outcome.state;
    this.frames.close();

    this.options.logger.info(
      {
        rid: this.options.rid,
        event: "stream_finished",
        state: outcome.state,
        stopReason: outcome.result.stopReason,
        chars: outcome.result.text.length,
        errorCode: outcome.error?.code,
      },
      "stream_finished",
    );

    if (this.options.onStop) {
      try {
        await this.options.onStop(outcome);
      } catch (error) {
        this.options.logger.error(
          { rid: this.options.rid, event: "stream_cleanup_failed", message: toRelayError(error).message },
          "stream_cleanup_failed",
        );
      }
    }
    return outcome;
  }

  private async pump(): Promise<ForwarderOutcome> {
    const { accumulator, writer } = this.options;
    const finish = (state: ForwarderOutcome["state"], error: RelayError | null = null): ForwarderOutcome => ({
      state,
      result: accumulator.result,
      error,
    });

    try {
      if (!(await this.emit(writer.start()))) {
        return finish("cancelled");
      }

      for await (const event of readSseEvents(this.options.body)) {
        for (const delta of parseUpstreamEvent(event)) {
          if (delta.kind === "error") {
            const error = classifyStreamError(delta.message, this.options.patterns);
            await this.emit(writer.error(error.message, error.code));
            return finish("failed", error);
          }

          for (const piece of accumulator.push(delta)) {
            if (!(await this.emit(writer.piece(piece)))) {
              return finish("cancelled");
            }
          }
        }

        if (accumulator.isDone || this.cancelRequested) {
          break;
        }
      }

      if (this.cancelRequested) {
        return finish("cancelled");
      }

      for (const piece of accumulator.finish()) {
        if (!(await this.emit(writer.piece(piece)))) {
          return finish("cancelled");
        }
      }
      await this.emit(writer.finish(accumulator.result));
      return finish("completed");
    } catch (error) {
      if (this.cancelRequested) {
        return finish("cancelled");
      }

      const relayError = toRelayError(error, "Upstream stream failed");
      await this.emit(writer.error(relayError.message, relayError.code));
      return finish("failed", relayError);
    }
  }

  /** False once the consumer has gone; that also tears the upstream down. */
  private async emit(frames: string[]): Promise<boolean> {
    for (const frame of frames) {
      if (!(await this.frames.send(frame))) {
        this.cancel();
        return false;
      }
    }
    return true;
  }
}

/** Non-streaming counterpart: drains the upstream stream into one result. */
export async function collectCompletion(
  body: ReadableStream<Uint8Array>,
  accumulator: CompletionAccumulator,
  patterns: UpstreamErrorPattern[],
): Promise<CompletionResult> {
  for await (const event of readSseEvents(body)) {
    for (const delta of parseUpstreamEvent(event)) {
      if (delta.kind === "error") {
        throw classifyStreamError(delta.message, patterns);
      }
      accumulator.push(delta);
    }
    if (accumulator.isDone) {
      break;
    }
  }

  accumulator.finish();
  return accumulator.result;
}
