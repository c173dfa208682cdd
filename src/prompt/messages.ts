import { z } from "zod";

export type Role = "user" | "assistant" | "system";

export interface MessageFlags {
  customname?: boolean;
  strip?: boolean;
  jailbreak?: boolean;
  main?: boolean;
  discard?: boolean;
  merged?: boolean;
  personality?: boolean;
  scenario?: boolean;
}

export interface Message extends MessageFlags {
  role: Role;
  content: string;
  name?: string;
}

export interface ImageSource {
  type: "base64";
  media_type: string;
  data: string;
}

export const NEW_CHAT_SENTINEL = "[Start a new chat]";

const FLAG_KEYS = [
  "customname",
  "strip",
  "jailbreak",
  "main",
  "discard",
  "merged",
  "personality",
  "scenario",
] as const satisfies ReadonlyArray<keyof MessageFlags>;

const ROLE_ORDER: Record<Role, number> = { assistant: 0, system: 1, user: 2 };

const optionalFlag = z.boolean().nullish().transform((value) => value ?? undefined);

const contentPartSchema = z.object({ type: z.string(), text: z.string().optional() }).passthrough();

/** OpenAI-style content is either a string or an array of parts; only text parts survive. */
const flatContentSchema = z
  .union([z.string(), z.array(contentPartSchema), z.null()])
  .optional()
  .transform((content) => {
    if (typeof content === "string") return content;
    if (!content) return "";
    return content
      .map((part) => (part.type === "text" && typeof part.text === "string" ? part.text : ""))
      .filter((text) => text.length > 0)
      .join("\n");
  });

export const messageSchema = z
  .object({
    role: z.enum(["user", "assistant", "system"]),
    content: flatContentSchema,
    name: z.string().nullish().transform((value) => value ?? undefined),
    customname: optionalFlag,
    strip: optionalFlag,
    jailbreak: optionalFlag,
    main: optionalFlag,
    discard: optionalFlag,
    merged: optionalFlag,
    personality: optionalFlag,
    scenario: optionalFlag,
  })
  .transform((raw): Message => {
    const message: Message = { role: raw.role, content: raw.content };
    if (raw.name !== undefined) message.name = raw.name;
    for (const key of FLAG_KEYS) {
      const flag = raw[key];
      if (flag !== undefined) message[key] = flag;
    }
    return message;
  });

function compareOptional<T extends string | boolean>(a: T | undefined, b: T | undefined): number {
  if (a === b) return 0;
  if (a === undefined) return -1;
  if (b === undefined) return 1;
  return String(a) < String(b) ? -1 : 1;
}

/**
 * Total order over (role, content, name, flags). Used to compare message
 * lists independent of their order.
 */
export function compareMessages(a: Message, b: Message): number {
  const byRole = ROLE_ORDER[a.role] - ROLE_ORDER[b.role];
  if (byRole !== 0) return byRole;

  if (a.content !== b.content) return a.content < b.content ? -1 : 1;

  const byName = compareOptional(a.name, b.name);
  if (byName !== 0) return byName;

  for (const key of FLAG_KEYS) {
    const byFlag = compareOptional(a[key], b[key]);
    if (byFlag !== 0) return byFlag;
  }

  return 0;
}

export function messagesEqual(a: Message, b: Message): boolean {
  return compareMessages(a, b) === 0;
}

export interface PromptsGroup {
  firstUser?: Message;
  firstSystem?: Message;
  firstAssistant?: Message;
  lastUser?: Message;
  lastSystem?: Message;
  lastAssistant?: Message;
}

function isSystemPrompt(message: Message): boolean {
  return message.role === "system" && message.content !== NEW_CHAT_SENTINEL;
}

function findLast(messages: Message[], predicate: (message: Message) => boolean): Message | undefined {
  for (let index = messages.length - 1; index >= 0; index -= 1) {
    const message = messages[index];
    if (message && predicate(message)) {
      return message;
    }
  }
  return undefined;
}

export function findPromptsGroup(messages: Message[]): PromptsGroup {
  return {
    firstUser: messages.find((m) => m.role === "user"),
    firstSystem: messages.find(isSystemPrompt),
    firstAssistant: messages.find((m) => m.role === "assistant"),
    lastUser: findLast(messages, (m) => m.role === "user"),
    lastSystem: findLast(messages, isSystemPrompt),
    lastAssistant: findLast(messages, (m) => m.role === "assistant"),
  };
}

/** Name of the character the client is playing, when its replies carry one. */
export function findCharacterName(messages: Message[]): string | undefined {
  const named = findLast(messages, (m) => m.role === "assistant" && typeof m.name === "string" && m.name.length > 0);
  return named?.name;
}
