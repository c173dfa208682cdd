export interface SseEvent {
  event: string;
  data: string;
  id?: string;
}

/**
 * Incremental `text/event-stream` parser. Feed it decoded chunks as they
 * arrive; complete events come out as soon as their blank line is seen.
 */
export class SseParser {
  private buffer = "";
  private eventName = "";
  private dataLines: string[] = [];
  private lastId?: string;

  public push(chunk: string): SseEvent[] {
    this.buffer += chunk;
    const events: SseEvent[] = [];

    for (;;) {
      const match = /\r\n|\n|\r/.exec(this.buffer);
      if (!match) {
        break;
      }
      // A trailing CR may be the first half of a CRLF split across chunks.
      if (match[0] === "\r" && match.index === this.buffer.length - 1) {
        break;
      }

      const line = this.buffer.slice(0, match.index);
      this.buffer = this.buffer.slice(match.index + match[0].length);
      const event = this.processLine(line);
      if (event) {
        events.push(event);
      }
    }

    return events;
  }

  /** Ends the stream; an event without its closing blank line is still delivered. */
  public flush(): SseEvent[] {
    const events: SseEvent[] = [];
    const rest = this.buffer.replace(/\r$/, "");
    this.buffer = "";

    if (rest.length > 0) {
      const event = this.processLine(rest);
      if (event) {
        events.push(event);
      }
    }

    const pending = this.dispatch();
    if (pending) {
      events.push(pending);
    }
    return events;
  }

  private processLine(line: string): SseEvent | null {
    if (line.length === 0) {
      return this.dispatch();
    }
    if (line.startsWith(":")) {
      return null;
    }

    const colon = line.indexOf(":");
    const field = colon === -1 ? line : line.slice(0, colon);
    let value = colon === -1 ? "" : line.slice(colon + 1);
    if (value.startsWith(" ")) {
      value = value.slice(1);
    }

    switch (field) {
      case "event":
        this.eventName = value;
        break;
      case "data":
        this.dataLines.push(value);
        break;
      case "id":
        this.lastId = value;
        break;
      default:
        break;
    }
    return null;
  }

  private dispatch(): SseEvent | null {
    if (this.dataLines.length === 0) {
      this.eventName = "";
      return null;
    }

    const event: SseEvent = {
      event: this.eventName || "message",
      data: this.dataLines.join("\n"),
    };
    if (this.lastId !== undefined) {
      event.id = this.lastId;
    }

    this.eventName = "";
    this.dataLines = [];
    return event;
  }
}

/** Parses a response body into events. Leaving the loop early cancels the body. */
export async function* readSseEvents(body: ReadableStream<Uint8Array>): AsyncGenerator<SseEvent> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  const parser = new SseParser();
  let settled = false;

  try {
    for (;;) {
      const chunk = await reader.read().catch((error: unknown) => {
        // An errored stream rejects cancel() as well.
        settled = true;
        throw error;
      });

      if (chunk.done) {
        settled = true;
        yield* parser.push(decoder.decode());
        yield* parser.flush();
        return;
      }
      yield* parser.push(decoder.decode(chunk.value, { stream: true }));
    }
  } finally {
    if (!settled) {
      await reader.cancel();
    }
  }
}
