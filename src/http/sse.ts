import type { Response } from "express";
import type { ForwarderOutcome, StreamForwarder } from "../stream/forwarder.js";

/** The slice of an express response an event stream is written through. */
export interface SseSink {
  readonly destroyed: boolean;
  readonly writableEnded: boolean;
  readonly writableFinished: boolean;
  setHeader(name: string, value: string): unknown;
  flushHeaders(): void;
  write(chunk: string): boolean;
  end(): unknown;
  on(event: "close" | "drain", listener: () => void): unknown;
  off(event: "close" | "drain", listener: () => void): unknown;
}

export function setupSseHeaders(res: SseSink): void {
  res.setHeader("Content-Type", "text/event-stream");
  res.setHeader("Cache-Control", "no-cache");
  res.setHeader("Connection", "keep-alive");
  res.setHeader("X-Accel-Buffering", "no");
}

export function writeSseFrames(res: Response, frames: string[]): void {
  for (const frame of frames) {
    res.write(frame);
  }
}

function drainOrClose(res: SseSink): Promise<void> {
  return new Promise((resolve) => {
    const done = (): void => {
      res.off("drain", done);
      res.off("close", done);
      resolve();
    };
    res.on("drain", done);
    res.on("close", done);
  });
}

/**
 * Drains the forwarder's frames into the response. A client disconnect
 * cancels the forwarder, which in turn aborts the upstream request. A full
 * socket buffer stops the drain, so the forwarder's channel fills and the
 * upstream is read no further ahead than its capacity.
 */
export async function pipeForwarder(res: SseSink, forwarder: StreamForwarder): Promise<ForwarderOutcome> {
  setupSseHeaders(res);

  let closed = res.destroyed || res.writableEnded;
  const onClose = (): void => {
    closed = true;
    if (!res.writableFinished) {
      forwarder.cancel();
    }
  };

  if (closed) {
    forwarder.cancel();
  } else {
    res.flushHeaders();
    res.on("close", onClose);
  }

  const running = forwarder.run();
  try {
    for await (const frame of forwarder.frames) {
      if (closed) {
        break;
      }
      if (!res.write(frame)) {
        await drainOrClose(res);
      }
    }
  } finally {
    res.off("close", onClose);
  }

  const outcome = await running;
  if (!res.writableEnded && !closed) {
    res.end();
  }
  return outcome;
}
