export interface ControlSignals {
  /** claude-1 / claude-2 / claude-instant models use text-completion semantics. */
  legacy: boolean;
  messagesApi: boolean;
  messagesLog: boolean;
  fusion: boolean;
  stopSet: string[];
  stopRevoke: string[];
}

export const DEFAULT_STOP_SEQUENCES = ["\n\nHuman:", "\n\nAssistant:"];

const LEGACY_MODEL_RE = /claude-([12]|instant)/i;
const COMPLETE_API_RE = /<\|completeAPI\|>/i;
const MESSAGES_API_RE = /<\|messagesAPI\|>/;
const MESSAGES_LOG_RE = /<\|messagesLog\|>/;
const FUSION_RE = /<\|Fusion Mode\|>/;
const STOP_SET_RE = /<\|stopSet *(\[.*?\]) *\|>/g;
const STOP_REVOKE_RE = /<\|stopRevoke *(\[.*?\]) *\|>/g;
const CONTROL_MARKER_RE = /<\|[^|<>\n]*?(?:\[.*?\])? *\|>/g;

function parseStringArray(payload: string | undefined): string[] {
  if (payload === undefined) {
    return [];
  }

  try {
    const parsed: unknown = JSON.parse(payload);
    if (!Array.isArray(parsed) || !parsed.every((item): item is string => typeof item === "string")) {
      return [];
    }
    return parsed;
  } catch {
    return [];
  }
}

/**
 * Payload of the second occurrence of a list marker. The first occurrence
 * belongs to the template defaults; only an override block counts.
 */
export function secondMarkerPayload(prompt: string, pattern: RegExp): string[] {
  const matches = [...prompt.matchAll(new RegExp(pattern.source, "g"))];
  return parseStringArray(matches[1]?.[1]);
}

export function extractControlSignals(prompt: string, model: string): ControlSignals {
  const legacy = LEGACY_MODEL_RE.test(model);
  const messagesApi = !(legacy || COMPLETE_API_RE.test(prompt)) || MESSAGES_API_RE.test(prompt);

  return {
    legacy,
    messagesApi,
    messagesLog: MESSAGES_LOG_RE.test(prompt),
    fusion: messagesApi && FUSION_RE.test(prompt),
    stopSet: secondMarkerPayload(prompt, STOP_SET_RE),
    stopRevoke: secondMarkerPayload(prompt, STOP_REVOKE_RE),
  };
}

/**
 * stopSet ++ client stop ++ defaults, minus blank entries and entries revoked
 * case-insensitively. Kept entries are not trimmed and not deduplicated.
 */
export function buildStopSequences(stopSet: string[], clientStop: string[], stopRevoke: string[]): string[] {
  const revoked = stopRevoke.map((entry) => entry.trim().toLowerCase());
  return [...stopSet, ...clientStop, ...DEFAULT_STOP_SEQUENCES].filter((entry) => {
    const trimmed = entry.trim();
    return trimmed.length > 0 && !revoked.includes(trimmed.toLowerCase());
  });
}

/** Removes `<|...|>` control markers from text that is sent upstream. */
export function stripControlMarkers(prompt: string): string {
  return prompt.replace(CONTROL_MARKER_RE, "").replace(/\n{3,}/g, "\n\n").trim();
}
