/**
 * Kadeu Shared Types and Protocols
 *
 * This package contains:
 * - Zod schemas for deck documents and session input events
 * - TypeScript types for scores, summaries and error codes
 */

export const VERSION = "0.1.0";

// Core types
export type { Score, SessionSummary, ErrorCode } from "./types.js";

// Protocol schemas
export {
  ScoreSchema,
  ErrorCodeSchema,
  // Deck source
  DeckCardSourceSchema,
  DeckSourceSchema,
  // Session events
  RevealEventSchema,
  ScoreEventSchema,
  AdvanceEventSchema,
  RestartEventSchema,
  QuitEventSchema,
  SessionEventSchema,
  // Validation utilities
  parseDeckSource,
  safeParseDeckSource,
  formatIssues,
} from "./protocol.js";

// Protocol types
export type {
  DeckCardSource,
  DeckSource,
  RevealEvent,
  ScoreEvent,
  AdvanceEvent,
  RestartEvent,
  QuitEvent,
  SessionEvent,
  SessionEventType,
} from "./protocol.js";
