import type { Message } from "../prompt/messages.js";

/** What the previous request of a client looked like, for the retry decision. */
export interface TurnMemory {
  prevMessages: Message[];
  prevImpersonated: boolean;
  character?: string;
}

export interface TurnHistoryStore {
  get(clientKey: string): TurnMemory;
  set(clientKey: string, memory: TurnMemory): void;
}

export function normalizeClientKey(key: string | undefined): string {
  const normalized = key?.trim();
  if (!normalized) {
    return "anonymous";
  }
  return normalized;
}

function emptyMemory(): TurnMemory {
  return { prevMessages: [], prevImpersonated: false };
}

/**
 * Process-lifetime cache keyed by client credential. Nothing is written to
 * disk; a restart starts every client from an empty history.
 */
export class MemoryTurnHistoryStore implements TurnHistoryStore {
  private readonly entries = new Map<string, TurnMemory>();

  public get(clientKey: string): TurnMemory {
    const entry = this.entries.get(normalizeClientKey(clientKey));
    if (!entry) {
      return emptyMemory();
    }
    return {
      prevMessages: [...entry.prevMessages],
      prevImpersonated: entry.prevImpersonated,
      character: entry.character,
    };
  }

  public set(clientKey: string, memory: TurnMemory): void {
    this.entries.set(normalizeClientKey(clientKey), {
      prevMessages: [...memory.prevMessages],
      prevImpersonated: memory.prevImpersonated,
      character: memory.character,
    });
  }
}
