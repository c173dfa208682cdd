import type { SseEvent } from "./sseParser.js";

export type UpstreamDelta =
  | { kind: "text"; text: string }
  | { kind: "thinking"; text: string }
  | { kind: "stop"; stopReason: string }
  | { kind: "error"; message: string };

export type OutputPiece = { kind: "text"; text: string } | { kind: "thinking"; text: string };

export interface CompletionResult {
  text: string;
  thinking: string;
  stopReason: string;
  stopSequence: string | null;
  /** The model started speaking for the user (a `Human:` stop matched). */
  impersonated: boolean;
}

export interface AccumulatorOptions {
  stopSequences: string[];
  /** Fold thinking into the visible text. */
  fusion: boolean;
  /** Pass thinking through as its own pieces; dropped otherwise. */
  keepThinking: boolean;
}

function field(value: unknown, key: string): unknown {
  return value && typeof value === "object" ? Reflect.get(value, key) : undefined;
}

function stringField(value: unknown, key: string): string | undefined {
  const found = field(value, key);
  return typeof found === "string" ? found : undefined;
}

function parseData(data: string): unknown {
  try {
    return JSON.parse(data);
  } catch {
    return undefined;
  }
}

/**
 * Reads one upstream event. Claude.ai speaks either the legacy `completion`
 * event or Messages-style content block deltas depending on rendering mode.
 */
export function parseUpstreamEvent(event: SseEvent): UpstreamDelta[] {
  const payload = parseData(event.data);
  if (payload === undefined) {
    return [];
  }

  const type = stringField(payload, "type") ?? event.event;
  switch (type) {
    case "completion": {
      const deltas: UpstreamDelta[] = [];
      const text = stringField(payload, "completion");
      if (text) {
        deltas.push({ kind: "text", text });
      }
      const stopReason = stringField(payload, "stop_reason");
      if (stopReason) {
        deltas.push({ kind: "stop", stopReason });
      }
      return deltas;
    }
    case "content_block_delta": {
      const delta = field(payload, "delta");
      const deltaType = stringField(delta, "type");
      if (deltaType === "text_delta") {
        const text = stringField(delta, "text");
        return text ? [{ kind: "text", text }] : [];
      }
      if (deltaType === "thinking_delta") {
        const text = stringField(delta, "thinking");
        return text ? [{ kind: "thinking", text }] : [];
      }
      return [];
    }
    case "message_delta": {
      const stopReason = stringField(field(payload, "delta"), "stop_reason");
      return stopReason ? [{ kind: "stop", stopReason }] : [];
    }
    case "error": {
      const message =
        stringField(field(payload, "error"), "message") ?? stringField(payload, "message") ?? event.data;
      return [{ kind: "error", message }];
    }
    default:
      return [];
  }
}

function isHumanStop(sequence: string): boolean {
  return sequence.trim().toLowerCase() === "human:";
}

/**
 * Applies client stop sequences to streamed text. Text that could still turn
 * into a stop sequence is held back until the next delta settles it.
 */
export class CompletionAccumulator {
  private readonly options: AccumulatorOptions;
  private pending = "";
  private text = "";
  private thinking = "";
  private stopReason: string | null = null;
  private stopSequence: string | null = null;
  private done = false;

  public constructor(options: AccumulatorOptions) {
    this.options = options;
  }

  public get isDone(): boolean {
    return this.done;
  }

  public get result(): CompletionResult {
    return {
      text: this.text,
      thinking: this.thinking,
      stopReason: this.stopReason ?? "end_turn",
      stopSequence: this.stopSequence,
      impersonated: this.stopSequence !== null && isHumanStop(this.stopSequence),
    };
  }

  public push(delta: UpstreamDelta): OutputPiece[] {
    if (this.done) {
      return [];
    }

    switch (delta.kind) {
      case "text":
        return this.pushText(delta.text);
      case "thinking":
        if (this.options.fusion) {
          return this.pushText(delta.text);
        }
        if (!this.options.keepThinking) {
          return [];
        }
        this.thinking += delta.text;
        return [{ kind: "thinking", text: delta.text }];
      case "stop":
        this.stopReason ??= delta.stopReason;
        return [];
      case "error":
        return [];
    }
  }

  /** Releases held-back text once upstream has nothing more to say. */
  public finish(): OutputPiece[] {
    if (this.done) {
      return [];
    }
    this.done = true;
    return this.emit(this.pending, "");
  }

  private pushText(text: string): OutputPiece[] {
    this.pending += text;

    let cut = -1;
    let matched: string | null = null;
    for (const sequence of this.options.stopSequences) {
      const index = this.pending.indexOf(sequence);
      if (index !== -1 && (cut === -1 || index < cut)) {
        cut = index;
        matched = sequence;
      }
    }

    if (matched !== null) {
      this.done = true;
      this.stopReason = "stop_sequence";
      this.stopSequence = matched;
      return this.emit(this.pending.slice(0, cut), "");
    }

    const hold = this.holdBackLength();
    return this.emit(this.pending.slice(0, this.pending.length - hold), this.pending.slice(this.pending.length - hold));
  }

  /** Longest tail of the pending text that is a proper prefix of some stop sequence. */
  private holdBackLength(): number {
    let longest = 0;
    for (const sequence of this.options.stopSequences) {
      const max = Math.min(sequence.length - 1, this.pending.length);
      for (let length = max; length > longest; length -= 1) {
        if (this.pending.endsWith(sequence.slice(0, length))) {
          longest = length;
          break;
        }
      }
    }
    return longest;
  }

  private emit(released: string, kept: string): OutputPiece[] {
    this.pending = kept;
    if (released.length === 0) {
      return [];
    }
    this.text += released;
    return [{ kind: "text", text: released }];
  }
}
