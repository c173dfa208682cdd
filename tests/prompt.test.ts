import { describe, expect, it } from "vitest";
import {
  buildStopSequences,
  extractControlSignals,
  secondMarkerPayload,
  stripControlMarkers,
} from "../src/prompt/controlSignals.js";
import {
  chatCompletionRequestSchema,
  fromChatCompletionRequest,
  fromMessagesRequest,
  isExpressionClassifierPrompt,
  isTestMessage,
  messagesRequestSchema,
} from "../src/prompt/clientRequests.js";
import { renderPrompt } from "../src/prompt/render.js";
import { buildRequestBody, upstreamModelName } from "../src/prompt/requestBody.js";

describe("buildStopSequences", () => {
  it("drops revoked and blank entries case-insensitively and appends the defaults", () => {
    expect(buildStopSequences(["Human:"], ["END", "human:"], ["END"])).toEqual([
      "Human:",
      "human:",
      "\n\nHuman:",
      "\n\nAssistant:",
    ]);
  });

  it("revokes defaults by their trimmed text and keeps duplicates", () => {
    expect(buildStopSequences(["X", "  "], ["X"], ["human:"])).toEqual(["X", "X", "\n\nAssistant:"]);
  });
});

describe("extractControlSignals", () => {
  it("takes the payload of the second stop marker", () => {
    const prompt = 'Defaults <|stopSet ["x"]|>\nOverride <|stopSet ["a","b"]|>';
    expect(extractControlSignals(prompt, "claude-3-opus-20240229").stopSet).toEqual(["a", "b"]);
  });

  it("ignores a lone marker and malformed payloads", () => {
    expect(secondMarkerPayload('<|stopRevoke ["a"]|>', /<\|stopRevoke *(\[.*?\]) *\|>/g)).toEqual([]);
    const prompt = "<|stopSet [1]|> <|stopSet [not json]|>";
    expect(extractControlSignals(prompt, "claude-3-opus-20240229").stopSet).toEqual([]);
  });

  it("uses the messages API unless the model is legacy or completeAPI is asked for", () => {
    expect(extractControlSignals("hi", "claude-3-opus-20240229").messagesApi).toBe(true);
    expect(extractControlSignals("hi", "claude-2.1")).toMatchObject({ legacy: true, messagesApi: false });
    expect(extractControlSignals("<|COMPLETEAPI|> hi", "claude-3-opus-20240229").messagesApi).toBe(false);
    expect(extractControlSignals("<|messagesAPI|> hi", "claude-instant-1.2").messagesApi).toBe(true);
  });

  it("only honours Fusion Mode together with the messages API", () => {
    expect(extractControlSignals("<|Fusion Mode|>", "claude-3-opus-20240229").fusion).toBe(true);
    expect(extractControlSignals("<|Fusion Mode|>", "claude-2.1").fusion).toBe(false);
    expect(extractControlSignals("<|messagesLog|>", "claude-3-opus-20240229").messagesLog).toBe(true);
  });
});

describe("stripControlMarkers", () => {
  it("removes markers and collapses the blank lines they leave", () => {
    const prompt = 'Human: hi\n\n<|stopSet ["a"]|>\n\n<|Fusion Mode|>\n\nAssistant: hello';
    expect(stripControlMarkers(prompt)).toBe("Human: hi\n\nAssistant: hello");
  });
});

describe("renderPrompt", () => {
  it("puts the system text first and tags each turn", () => {
    const prompt = renderPrompt(
      [
        { role: "user", content: "Hi" },
        { role: "assistant", content: "Hello\r\nthere" },
      ],
      "Be nice.",
    );
    expect(prompt).toBe("Be nice.\n\nHuman: Hi\n\nAssistant: Hello\nthere");
  });

  it("honours discard, strip, custom names and example speakers", () => {
    const prompt = renderPrompt([
      { role: "system", content: "Scenario" },
      { role: "system", content: "Example question", name: "example_user" },
      { role: "user", content: "ignored", discard: true },
      { role: "assistant", content: "I am Ava.", name: "Ava", customname: true },
      { role: "user", content: "raw text", strip: true },
      { role: "user", content: "   " },
    ]);
    expect(prompt).toBe("Scenario\n\nHuman: Example question\n\nAva: I am Ava.\n\nraw text");
  });
});

describe("buildRequestBody", () => {
  it("builds a messages-mode body with the model only when given", () => {
    const turn = buildRequestBody({
      prompt: "Human: hi",
      model: "claude-3-opus-20240229--force",
      maxTokens: 512,
      messagesApi: true,
      timezone: "UTC",
      pastePrompt: false,
      customPrompt: "",
      images: [],
    });
    expect(turn.body).toEqual({
      prompt: "Human: hi",
      model: "claude-3-opus-20240229",
      max_tokens_to_sample: 512,
      attachments: [],
      files: [],
      rendering_mode: "messages",
      timezone: "UTC",
    });
  });

  it("moves the prompt into a paste attachment", () => {
    const turn = buildRequestBody({
      prompt: "Human: héllo",
      maxTokens: 16,
      messagesApi: false,
      timezone: "UTC",
      pastePrompt: true,
      customPrompt: "See attachment.",
      images: [],
    });
    expect(turn.body.prompt).toBe("See attachment.");
    expect(turn.body.rendering_mode).toBe("raw");
    expect(turn.body.model).toBeUndefined();
    expect(turn.body.attachments).toEqual([
      { extracted_content: "Human: héllo", file_name: "paste.txt", file_type: "txt", file_size: 13 },
    ]);
  });

  it("strips the force suffix from model names", () => {
    expect(upstreamModelName(" claude-3-haiku-20240307--force ")).toBe("claude-3-haiku-20240307");
  });
});

describe("client requests", () => {
  it("flattens Anthropic content blocks and collects images", () => {
    const request = fromMessagesRequest(
      messagesRequestSchema.parse({
        model: "claude-3-opus-20240229",
        system: [{ type: "text", text: "Sys" }],
        temperature: 3,
        messages: [
          {
            role: "user",
            content: [
              { type: "text", text: "Look" },
              { type: "image", source: { type: "base64", media_type: "image/png", data: "AAAA" } },
              { type: "text", text: "here" },
            ],
          },
        ],
      }),
    );

    expect(request.messages).toEqual([{ role: "user", content: "Look\nhere" }]);
    expect(request.images).toEqual([{ type: "base64", media_type: "image/png", data: "AAAA" }]);
    expect(request.system).toBe("Sys");
    expect(request.temperature).toBe(1);
    expect(request.stop).toEqual([]);
    expect(request.stream).toBe(false);
  });

  it("accepts a single OpenAI stop string", () => {
    const request = fromChatCompletionRequest(
      chatCompletionRequestSchema.parse({ messages: [{ role: "user", content: "Hi" }], stop: "END" }),
    );
    expect(request.model).toBe("");
    expect(request.stop).toEqual(["END"]);
    expect(isTestMessage(request)).toBe(true);
    expect(isTestMessage({ ...request, stream: true })).toBe(false);
  });

  it("recognizes the expression classifier prompt", () => {
    const request = fromChatCompletionRequest(
      chatCompletionRequestSchema.parse({
        messages: [
          {
            role: "user",
            content:
              "From the list below, choose a word that best represents a character's outfit description, action, or emotion in their dialogue: happy, sad",
          },
        ],
      }),
    );
    expect(isExpressionClassifierPrompt(request)).toBe(true);
    expect(isTestMessage(request)).toBe(false);
  });
});
