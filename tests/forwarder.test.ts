import { describe, expect, it, vi } from "vitest";
import { loadConfig } from "../src/config.js";
import { CompletionAccumulator } from "../src/stream/accumulator.js";
import { collectCompletion, type ForwarderOutcome, StreamForwarder } from "../src/stream/forwarder.js";
import { createFrameWriter } from "../src/stream/frames.js";
import { endlessResponse, sseText, textDeltaEvents } from "./helpers/fakeClaude.js";
import { silentLogger } from "./helpers/logger.js";

const patterns = loadConfig({}).upstreamErrorPatterns;

function bodyOf(events: Array<{ event: string; data: unknown }>): ReadableStream<Uint8Array> {
  const bytes = new TextEncoder().encode(sseText(events));
  return new ReadableStream<Uint8Array>({
    start(controller) {
      controller.enqueue(bytes);
      controller.close();
    },
  });
}

function newAccumulator(stopSequences: string[] = []): CompletionAccumulator {
  return new CompletionAccumulator({ stopSequences, fusion: false, keepThinking: true });
}

function createForwarder(
  body: ReadableStream<Uint8Array>,
  options: { capacity?: number; upstreamAbort?: AbortController; onStop?: (outcome: ForwarderOutcome) => Promise<void> } = {},
): StreamForwarder {
  return new StreamForwarder({
    body,
    accumulator: newAccumulator(),
    writer: createFrameWriter("messages", { id: "msg_test", model: "claude-3-opus-20240229", created: 0 }),
    capacity: options.capacity ?? 64,
    upstreamAbort: options.upstreamAbort ?? new AbortController(),
    patterns,
    logger: silentLogger,
    rid: "req-test",
    onStop: options.onStop,
  });
}

async function drain(forwarder: StreamForwarder): Promise<string[]> {
  const frames: string[] = [];
  for await (const frame of forwarder.frames) {
    frames.push(frame);
  }
  return frames;
}

function eventNames(frames: string[]): string[] {
  return frames.map((frame) => frame.slice("event: ".length, frame.indexOf("\n")));
}

describe("StreamForwarder", () => {
  it("forwards a complete stream and stops once", async () => {
    const onStop = vi.fn(async (_outcome: ForwarderOutcome) => {});
    const forwarder = createForwarder(bodyOf(textDeltaEvents(["Hello", " there"])), { onStop });

    const outcome = await forwarder.run();
    const frames = await drain(forwarder);

    expect(outcome.state).toBe("completed");
    expect(outcome.result.text).toBe("Hello there");
    expect(outcome.error).toBeNull();
    expect(forwarder.state).toBe("completed");
    expect(eventNames(frames)).toEqual([
      "message_start",
      "content_block_start",
      "content_block_delta",
      "content_block_delta",
      "content_block_stop",
      "message_delta",
      "message_stop",
    ]);
    expect(onStop).toHaveBeenCalledTimes(1);
    expect(onStop).toHaveBeenCalledWith(outcome);
  });

  it("ends with an error frame when upstream reports an error", async () => {
    const onStop = vi.fn(async (_outcome: ForwarderOutcome) => {});
    const forwarder = createForwarder(
      bodyOf([
        ...textDeltaEvents(["Hi"]).slice(0, 3),
        { event: "error", data: { type: "error", error: { type: "overloaded_error", message: "Overloaded" } } },
      ]),
      { onStop },
    );

    const outcome = await forwarder.run();
    const frames = await drain(forwarder);

    expect(outcome.state).toBe("failed");
    expect(outcome.error?.code).toBe("upstream");
    expect(eventNames(frames)).toEqual(["message_start", "content_block_start", "content_block_delta", "error"]);
    expect(frames[3]).toBe(
      `event: error\ndata: ${JSON.stringify({
        type: "error",
        error: { type: "upstream", message: "Upstream stream error: Overloaded" },
      })}\n\n`,
    );
    expect(onStop).toHaveBeenCalledTimes(1);
  });

  it("aborts upstream and stops once when the client cancels", async () => {
    const upstreamAbort = new AbortController();
    const onStop = vi.fn(async (_outcome: ForwarderOutcome) => {});
    const response = endlessResponse(upstreamAbort.signal);
    if (!response.body) throw new Error("missing body");
    const forwarder = createForwarder(response.body, { capacity: 1, upstreamAbort, onStop });

    const running = forwarder.run();
    await expect(forwarder.frames.receive()).resolves.toMatchObject({ done: false });
    forwarder.cancel();
    forwarder.cancel();

    const outcome = await running;
    expect(outcome.state).toBe("cancelled");
    expect(upstreamAbort.signal.aborted).toBe(true);
    expect(onStop).toHaveBeenCalledTimes(1);
    expect(onStop.mock.calls[0]?.[0].state).toBe("cancelled");
  });

  it("stops pulling once the consumer stops reading", async () => {
    const upstreamAbort = new AbortController();
    let pulls = 0;
    const response = endlessResponse(upstreamAbort.signal, () => {
      pulls += 1;
    });
    if (!response.body) throw new Error("missing body");
    const forwarder = createForwarder(response.body, { capacity: 1, upstreamAbort });

    const running = forwarder.run();
    for await (const frame of forwarder.frames) {
      expect(frame.startsWith("event: message_start\n")).toBe(true);
      break;
    }

    const outcome = await running;
    const pullsAtStop = pulls;
    await new Promise((resolve) => setTimeout(resolve, 20));

    expect(outcome.state).toBe("cancelled");
    expect(upstreamAbort.signal.aborted).toBe(true);
    expect(pulls).toBe(pullsAtStop);
  });

  it("refuses to run twice", async () => {
    const forwarder = createForwarder(bodyOf(textDeltaEvents(["x"])));
    const first = forwarder.run();
    await expect(forwarder.run()).rejects.toThrow("Stream forwarder already ran");
    await first;
  });

  it("still resolves when the stop hook throws", async () => {
    const forwarder = createForwarder(bodyOf(textDeltaEvents(["x"])), {
      onStop: async () => {
        throw new Error("cleanup failed");
      },
    });
    await expect(forwarder.run()).resolves.toMatchObject({ state: "completed" });
  });
});

describe("collectCompletion", () => {
  it("drains the stream into one result", async () => {
    const result = await collectCompletion(bodyOf(textDeltaEvents(["Hel", "lo\n\nHuman: next"])), newAccumulator(["\n\nHuman:"]), patterns);
    expect(result.text).toBe("Hello");
    expect(result.stopReason).toBe("stop_sequence");
    expect(result.impersonated).toBe(true);
  });

  it("throws the classified stream error", async () => {
    const body = bodyOf([{ event: "error", data: { type: "error", error: { message: "Your account has been suspended" } } }]);
    await expect(collectCompletion(body, newAccumulator(), patterns)).rejects.toMatchObject({
      code: "invalid_cookie",
      reason: { kind: "banned" },
    });
  });
});
