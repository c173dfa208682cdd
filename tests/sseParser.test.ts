import { describe, expect, it } from "vitest";
import { readSseEvents, type SseEvent, SseParser } from "../src/stream/sseParser.js";

function streamOf(chunks: string[]): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) {
        controller.enqueue(encoder.encode(chunk));
      }
      controller.close();
    },
  });
}

describe("SseParser", () => {
  it("parses named events with multi-line data", () => {
    const parser = new SseParser();
    const events = parser.push("event: completion\ndata: line one\ndata: line two\n\n");
    expect(events).toEqual([{ event: "completion", data: "line one\nline two" }]);
  });

  it("defaults the event name and ignores comments", () => {
    const parser = new SseParser();
    expect(parser.push(": keep-alive\ndata: {}\n\n")).toEqual([{ event: "message", data: "{}" }]);
  });

  it("handles CRLF split across chunks", () => {
    const parser = new SseParser();
    expect(parser.push("event: ping\r")).toEqual([]);
    expect(parser.push("\ndata: 1\r\n\r\n")).toEqual([{ event: "ping", data: "1" }]);
  });

  it("keeps the last id on later events", () => {
    const parser = new SseParser();
    const events = parser.push("id: 7\ndata: a\n\ndata: b\n\n");
    expect(events).toEqual([
      { event: "message", data: "a", id: "7" },
      { event: "message", data: "b", id: "7" },
    ]);
  });

  it("drops an event that carries no data", () => {
    const parser = new SseParser();
    expect(parser.push("event: lonely\n\n")).toEqual([]);
  });

  it("delivers an unterminated event on flush", () => {
    const parser = new SseParser();
    expect(parser.push("event: tail\ndata: end")).toEqual([]);
    expect(parser.flush()).toEqual([{ event: "tail", data: "end" }]);
  });
});

describe("readSseEvents", () => {
  it("reads events split at arbitrary byte boundaries", async () => {
    const body = streamOf(["event: a\nda", "ta: 1\n", "\nevent: b\ndata: 2\n\n"]);
    const events: SseEvent[] = [];
    for await (const event of readSseEvents(body)) {
      events.push(event);
    }
    expect(events).toEqual([
      { event: "a", data: "1" },
      { event: "b", data: "2" },
    ]);
  });

  it("cancels the body when the consumer stops early", async () => {
    let cancelled = false;
    const encoder = new TextEncoder();
    const body = new ReadableStream<Uint8Array>({
      pull(controller) {
        controller.enqueue(encoder.encode("data: x\n\n"));
      },
      cancel() {
        cancelled = true;
      },
    });

    for await (const event of readSseEvents(body)) {
      expect(event.data).toBe("x");
      break;
    }
    expect(cancelled).toBe(true);
  });
});
