import { z } from "zod";
import { type ImageSource, type Message, messageSchema, messagesEqual } from "./messages.js";

export interface Thinking {
  budget_tokens: number;
  type: string;
}

/** Endpoint-independent view of an inbound completion request. */
export interface CompletionRequest {
  model: string;
  messages: Message[];
  system: string;
  stream: boolean;
  maxTokens?: number;
  stop: string[];
  temperature?: number;
  topP?: number;
  topK?: number;
  thinking?: Thinking;
  images: ImageSource[];
}

export const TEST_MESSAGE: Readonly<Message> = { role: "user", content: "Hi" };

export const EXPRESSION_CLASSIFIER_PREFIX =
  "From the list below, choose a word that best represents a character's outfit description, action, or emotion in their dialogue";

const clampedTemperature = z
  .number()
  .nullish()
  .transform((value) => (value === null || value === undefined ? undefined : Math.min(1, Math.max(0, value))));

const optionalNumber = z
  .number()
  .nullish()
  .transform((value) => value ?? undefined);

const thinkingSchema = z.object({
  budget_tokens: z.number().int().nonnegative(),
  type: z.string(),
});

const imageSourceSchema = z.object({
  type: z.literal("base64"),
  media_type: z.string(),
  data: z.string(),
});

const contentBlockSchema = z.union([
  z.object({ type: z.literal("text"), text: z.string() }).passthrough(),
  z.object({ type: z.literal("image"), source: imageSourceSchema }).passthrough(),
  z.object({ type: z.string() }).passthrough(),
]);

type ContentBlock = z.infer<typeof contentBlockSchema>;

const anthropicMessageSchema = z.object({
  role: z.enum(["user", "assistant"]),
  content: z.union([z.string(), z.array(contentBlockSchema)]),
});

const systemSchema = z
  .union([z.string(), z.array(z.object({ type: z.string(), text: z.string().optional() }).passthrough()), z.null()])
  .optional();

/** Body of `POST /v1/messages`. */
export const messagesRequestSchema = z
  .object({
    model: z.string().min(1),
    messages: z.array(anthropicMessageSchema),
    max_tokens: z.number().int().positive().optional(),
    stop_sequences: z.array(z.string()).optional().default([]),
    stream: z.boolean().optional().default(false),
    thinking: thinkingSchema.nullish(),
    system: systemSchema,
    temperature: clampedTemperature,
    top_p: optionalNumber,
    top_k: optionalNumber,
  })
  .passthrough();

/** Body of `POST /v1/chat/completions`. */
export const chatCompletionRequestSchema = z
  .object({
    model: z.string().optional().default(""),
    messages: z.array(messageSchema).optional().default([]),
    stream: z.boolean().nullish().transform((value) => value ?? false),
    max_tokens: z.number().int().positive().nullish(),
    stop: z.union([z.string(), z.array(z.string())]).nullish(),
    temperature: clampedTemperature,
    top_p: optionalNumber,
    top_k: optionalNumber,
  })
  .passthrough();

export type MessagesRequestBody = z.infer<typeof messagesRequestSchema>;
export type ChatCompletionRequestBody = z.infer<typeof chatCompletionRequestSchema>;

function textOf(block: ContentBlock): string | null {
  if (block.type !== "text") {
    return null;
  }
  const text: unknown = Reflect.get(block, "text");
  return typeof text === "string" ? text : null;
}

function imageOf(block: ContentBlock): ImageSource | null {
  if (block.type !== "image") {
    return null;
  }
  const parsed = imageSourceSchema.safeParse(Reflect.get(block, "source"));
  return parsed.success ? parsed.data : null;
}

function flattenSystem(system: MessagesRequestBody["system"]): string {
  if (!system) {
    return "";
  }
  if (typeof system === "string") {
    return system;
  }
  return system
    .map((block) => (block.type === "text" && block.text ? block.text : ""))
    .filter((text) => text.length > 0)
    .join("\n");
}

export function fromMessagesRequest(body: MessagesRequestBody): CompletionRequest {
  const images: ImageSource[] = [];
  const messages: Message[] = body.messages.map((message) => {
    if (typeof message.content === "string") {
      return { role: message.role, content: message.content };
    }

    const texts: string[] = [];
    for (const block of message.content) {
      const text = textOf(block);
      if (text !== null) {
        texts.push(text);
        continue;
      }
      const image = imageOf(block);
      if (image) {
        images.push(image);
      }
    }
    return { role: message.role, content: texts.join("\n") };
  });

  return {
    model: body.model,
    messages,
    system: flattenSystem(body.system),
    stream: body.stream,
    maxTokens: body.max_tokens,
    stop: body.stop_sequences,
    temperature: body.temperature,
    topP: body.top_p,
    topK: body.top_k,
    thinking: body.thinking ?? undefined,
    images,
  };
}

export function fromChatCompletionRequest(body: ChatCompletionRequestBody): CompletionRequest {
  const stop = typeof body.stop === "string" ? [body.stop] : (body.stop ?? []);
  return {
    model: body.model,
    messages: body.messages,
    system: "",
    stream: body.stream,
    maxTokens: body.max_tokens ?? undefined,
    stop,
    temperature: body.temperature,
    topP: body.top_p,
    topK: body.top_k,
    images: [],
  };
}

/** The connection probe some clients send before the first real request. */
export function isTestMessage(request: CompletionRequest): boolean {
  const [only] = request.messages;
  return !request.stream && request.messages.length === 1 && only !== undefined && messagesEqual(only, TEST_MESSAGE);
}

export function isExpressionClassifierPrompt(request: CompletionRequest): boolean {
  const [first] = request.messages;
  return !request.stream && first !== undefined && first.content.startsWith(EXPRESSION_CLASSIFIER_PREFIX);
}
