import type { Message } from "./messages.js";

const EXAMPLE_SPEAKERS: Record<string, "Human" | "Assistant"> = {
  example_user: "Human",
  example_assistant: "Assistant",
};

function normalizeNewlines(text: string): string {
  return text.replace(/\r\n/g, "\n");
}

function speakerPrefix(message: Message): string {
  if (message.strip) {
    return "";
  }

  if (message.customname && message.name) {
    return `${message.name}: `;
  }

  switch (message.role) {
    case "user":
      return "Human: ";
    case "assistant":
      return "Assistant: ";
    case "system": {
      // Example dialogue is sent as system messages named after the speaker.
      const speaker = message.name ? EXAMPLE_SPEAKERS[message.name] : undefined;
      return speaker ? `${speaker}: ` : "";
    }
  }
}

/**
 * Assemble the upstream prompt text: the system prompt first, then one
 * role-tagged paragraph per message. Messages flagged `discard` are dropped.
 */
export function renderPrompt(messages: Message[], system = ""): string {
  const parts: string[] = [];

  const systemText = normalizeNewlines(system).trim();
  if (systemText.length > 0) {
    parts.push(systemText);
  }

  for (const message of messages) {
    if (message.discard) {
      continue;
    }

    const content = normalizeNewlines(message.content).trim();
    if (content.length === 0) {
      continue;
    }

    parts.push(`${speakerPrefix(message)}${content}`);
  }

  return parts.join("\n\n");
}
