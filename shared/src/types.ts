/**
 * Kadeu Shared Types
 *
 * Core type definitions shared by the study engine and its collaborators
 * (deck loader, key bindings, terminal adapter).
 */

/**
 * Outcome recorded for a studied card.
 */
export type Score = "hit" | "miss";

/**
 * Aggregated outcome counts for one study session.
 *
 * Derived from the session's progress values, never stored on its own.
 *
 * @property total - Number of scored cards (hit + miss)
 */
export interface SessionSummary {
  hit: number;
  miss: number;
  total: number;
}

/**
 * Error codes surfaced by the engine and its collaborators.
 */
export type ErrorCode =
  | "DECK_NOT_FOUND"
  | "DECK_INVALID"
  | "CONFIG_INVALID"
  | "TERMINAL_IO"
  | "INVALID_TRANSITION"
  | "USAGE"
  | "INTERNAL_ERROR";
