import type { IngestionState } from "./types.js";

/**
 * Valid state transitions for one ingestion request.
 *
 * - CACHE_LOOKUP → DONE on a hit (including a hit on a computation started by a concurrent request)
 * - CACHE_LOOKUP → LOADING_MODEL on a miss
 * - NORMALIZING, CACHE_LOOKUP, LOADING_MODEL, TRANSCRIBING → FAILED
 * - BUILDING and CACHING are pure/in-memory and cannot fail
 * - DONE and FAILED are terminal
 */
export const VALID_TRANSITIONS: Readonly<
  Record<IngestionState, ReadonlyArray<IngestionState>>
> = {
  IDLE: ["NORMALIZING"],
  NORMALIZING: ["CACHE_LOOKUP", "FAILED"],
  CACHE_LOOKUP: ["DONE", "LOADING_MODEL", "FAILED"],
  LOADING_MODEL: ["TRANSCRIBING", "FAILED"],
  TRANSCRIBING: ["BUILDING", "FAILED"],
  BUILDING: ["CACHING"],
  CACHING: ["DONE"],
  DONE: [],
  FAILED: []
};

/**
 * Returns true if transitioning from `from` to `to` is a valid state change.
 */
export function canTransition(from: IngestionState, to: IngestionState): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export function isTerminalState(state: IngestionState): boolean {
  return VALID_TRANSITIONS[state].length === 0;
}
