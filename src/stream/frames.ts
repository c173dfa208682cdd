import type { CompletionResult, OutputPiece } from "./accumulator.js";

export type StreamFormat = "messages" | "completion" | "openai";

export interface FrameContext {
  id: string;
  model: string;
  /** Unix seconds. */
  created: number;
}

/** Turns accumulator output into ready-to-write SSE frames for one client format. */
export interface FrameWriter {
  start(): string[];
  piece(piece: OutputPiece): string[];
  finish(result: CompletionResult): string[];
  error(message: string, code: string): string[];
}

export interface ChatCompletionChunk {
  id: string;
  object: "chat.completion.chunk";
  created: number;
  model: string;
  choices: Array<{
    index: number;
    delta: {
      role?: "assistant";
      content?: string;
    };
    finish_reason: string | null;
  }>;
}

export const SSE_DONE = "data: [DONE]\n\n";

export function sseFrame(payload: unknown, event?: string): string {
  const data = `data: ${JSON.stringify(payload)}\n\n`;
  return event ? `event: ${event}\n${data}` : data;
}

/** OpenAI clients only know `stop` and `length`. */
export function openAiFinishReason(stopReason: string): string {
  return stopReason === "max_tokens" ? "length" : "stop";
}

class MessagesFrameWriter implements FrameWriter {
  private blockIndex = -1;
  private blockType: OutputPiece["kind"] | null = null;

  public constructor(private readonly context: FrameContext) {}

  public start(): string[] {
    return [
      sseFrame(
        {
          type: "message_start",
          message: {
            id: this.context.id,
            type: "message",
            role: "assistant",
            model: this.context.model,
            content: [],
            stop_reason: null,
            stop_sequence: null,
            usage: { input_tokens: 0, output_tokens: 0 },
          },
        },
        "message_start",
      ),
    ];
  }

  public piece(piece: OutputPiece): string[] {
    const frames: string[] = [];
    if (this.blockType !== piece.kind) {
      frames.push(...this.closeBlock());
      this.blockIndex += 1;
      this.blockType = piece.kind;
      frames.push(
        sseFrame(
          {
            type: "content_block_start",
            index: this.blockIndex,
            content_block: piece.kind === "text" ? { type: "text", text: "" } : { type: "thinking", thinking: "" },
          },
          "content_block_start",
        ),
      );
    }

    frames.push(
      sseFrame(
        {
          type: "content_block_delta",
          index: this.blockIndex,
          delta:
            piece.kind === "text"
              ? { type: "text_delta", text: piece.text }
              : { type: "thinking_delta", thinking: piece.text },
        },
        "content_block_delta",
      ),
    );
    return frames;
  }

  public finish(result: CompletionResult): string[] {
    return [
      ...this.closeBlock(),
      sseFrame(
        {
          type: "message_delta",
          delta: { stop_reason: result.stopReason, stop_sequence: result.stopSequence },
          usage: { output_tokens: 0 },
        },
        "message_delta",
      ),
      sseFrame({ type: "message_stop" }, "message_stop"),
    ];
  }

  public error(message: string, code: string): string[] {
    return [sseFrame({ type: "error", error: { type: code, message } }, "error")];
  }

  private closeBlock(): string[] {
    if (this.blockType === null) {
      return [];
    }
    this.blockType = null;
    return [sseFrame({ type: "content_block_stop", index: this.blockIndex }, "content_block_stop")];
  }
}

class CompletionFrameWriter implements FrameWriter {
  public constructor(private readonly context: FrameContext) {}

  public start(): string[] {
    return [];
  }

  public piece(piece: OutputPiece): string[] {
    if (piece.kind !== "text") {
      return [];
    }
    return [this.frame(piece.text, null)];
  }

  public finish(result: CompletionResult): string[] {
    return [this.frame("", result.stopReason)];
  }

  public error(message: string, code: string): string[] {
    return [sseFrame({ type: "error", error: { type: code, message } }, "error")];
  }

  private frame(completion: string, stopReason: string | null): string {
    return sseFrame(
      {
        type: "completion",
        id: this.context.id,
        completion,
        stop_reason: stopReason,
        model: this.context.model,
      },
      "completion",
    );
  }
}

class OpenAiFrameWriter implements FrameWriter {
  public constructor(private readonly context: FrameContext) {}

  public start(): string[] {
    return [sseFrame(this.chunk({ role: "assistant" }, null))];
  }

  public piece(piece: OutputPiece): string[] {
    if (piece.kind !== "text") {
      return [];
    }
    return [sseFrame(this.chunk({ content: piece.text }, null))];
  }

  public finish(result: CompletionResult): string[] {
    return [sseFrame(this.chunk({}, openAiFinishReason(result.stopReason))), SSE_DONE];
  }

  public error(message: string, code: string): string[] {
    return [sseFrame({ error: { message, type: "relay_error", code, param: null } }), SSE_DONE];
  }

  private chunk(delta: ChatCompletionChunk["choices"][number]["delta"], finishReason: string | null): ChatCompletionChunk {
    return {
      id: this.context.id,
      object: "chat.completion.chunk",
      created: this.context.created,
      model: this.context.model,
      choices: [{ index: 0, delta, finish_reason: finishReason }],
    };
  }
}

export function createFrameWriter(format: StreamFormat, context: FrameContext): FrameWriter {
  switch (format) {
    case "messages":
      return new MessagesFrameWriter(context);
    case "completion":
      return new CompletionFrameWriter(context);
    case "openai":
      return new OpenAiFrameWriter(context);
  }
}
