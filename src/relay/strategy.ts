import { compareMessages, findPromptsGroup, type Message } from "../prompt/messages.js";

export type RetryStrategy = "api" | "renew" | "retryRegen" | "currentRenew" | "currentContinue";

/** Current-conversation strategies reuse the live upstream conversation. */
export function isCurrentStrategy(strategy: RetryStrategy): boolean {
  return strategy === "currentRenew" || strategy === "currentContinue";
}

export interface RetryDecisionInput {
  messages: Message[];
  prevMessages: Message[];
  renewAlways: boolean;
  retryRegenerate: boolean;
  prevImpersonated: boolean;
  hasConversation: boolean;
  hasCharacter: boolean;
}

export interface RetryDecision {
  samePrompts: boolean;
  sameCharDiffChat: boolean;
  shouldRenew: boolean;
  retryRegen: boolean;
  strategy: RetryStrategy;
}

function sortedWithoutSystem(messages: Message[]): Message[] {
  return messages.filter((m) => m.role !== "system").sort(compareMessages);
}

/** Order- and system-insensitive equality of two message lists. */
export function isSamePrompts(current: Message[], previous: Message[]): boolean {
  const a = sortedWithoutSystem(current);
  const b = sortedWithoutSystem(previous);
  if (a.length !== b.length) {
    return false;
  }
  return a.every((message, index) => {
    const other = b[index];
    return other !== undefined && compareMessages(message, other) === 0;
  });
}

export function decideRetryStrategy(input: RetryDecisionInput): RetryDecision {
  const samePrompts = isSamePrompts(input.messages, input.prevMessages);
  const current = findPromptsGroup(input.messages);
  const previous = findPromptsGroup(input.prevMessages);

  const sameCharDiffChat =
    !samePrompts &&
    current.firstSystem?.content === previous.firstSystem?.content &&
    current.firstUser?.content === previous.firstUser?.content;

  const shouldRenew =
    input.renewAlways ||
    !input.hasConversation ||
    input.prevImpersonated ||
    (!input.renewAlways && samePrompts) ||
    sameCharDiffChat;

  const retryRegen = input.retryRegenerate && samePrompts && input.hasCharacter;

  // Regeneration needs a live conversation to regenerate in.
  let strategy: RetryStrategy;
  if (retryRegen && input.hasConversation) {
    strategy = "retryRegen";
  } else if (shouldRenew) {
    strategy = "renew";
  } else {
    strategy = "currentContinue";
  }

  return { samePrompts, sameCharDiffChat, shouldRenew, retryRegen, strategy };
}
