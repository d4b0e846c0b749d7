import { BulkIntent, BulkOperationState } from "../types/bulk";

// Whole-utterance matches only: "go ahead" continues, "go ahead and delete my account" does not.
export const CONTINUE_PHRASES: ReadonlySet<string> = new Set([
  "continue",
  "yes",
  "y",
  "yep",
  "yeah",
  "yes please",
  "yes continue",
  "yes go ahead",
  "yes proceed",
  "ok",
  "okay",
  "ok continue",
  "ok go ahead",
  "okay go ahead",
  "sure go ahead",
  "sure",
  "proceed",
  "go",
  "go ahead",
  "go on",
  "next",
  "next batch",
  "keep going",
  "resume",
  "do it",
]);

export const CANCEL_PHRASES: ReadonlySet<string> = new Set([
  "cancel",
  "cancel it",
  "stop",
  "stop it",
  "abort",
  "no",
  "n",
  "nope",
  "no thanks",
  "no stop",
  "no cancel",
  "halt",
  "quit",
  "end",
  "never mind",
  "nevermind",
  "don't",
  "do not",
  "forget it",
]);

export function normalizeUtterance(utterance: string): string {
  return utterance
    .toLowerCase()
    .replace(/[’‘]/g, "'")
    .replace(/[.,!?;:]+/g, " ")
    .replace(/\s+/g, " ")
    .trim()
    .replace(/^[\s.,!?;:"'()*_-]+|[\s.,!?;:"'()*_-]+$/g, "");
}

export function classifyBulkIntent(utterance: string): BulkIntent {
  const normalized = normalizeUtterance(utterance);
  if (CONTINUE_PHRASES.has(normalized)) return "continue";
  if (CANCEL_PHRASES.has(normalized)) return "cancel";
  return "unrelated";
}

export type GateDecision =
  | { route: "ordinary" }
  | { route: "bulk"; intent: BulkIntent };

/** Consulted once per turn, before any other intent routing. */
export function routeTurn(
  utterance: string,
  state: BulkOperationState | null
): GateDecision {
  if (!state || state.status !== "active") {
    return { route: "ordinary" };
  }
  return { route: "bulk", intent: classifyBulkIntent(utterance) };
}
