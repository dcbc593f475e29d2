/**
 * Kadeu Protocol
 *
 * Zod schemas for the two documents that cross the engine boundary:
 * deck sources read from disk and the input events fed to a study session.
 * Uses discriminated unions for type-safe event handling.
 */

import { z } from "zod";

// =============================================================================
// Score / Error Code Schemas
// =============================================================================

/**
 * Schema for Score values
 */
export const ScoreSchema = z.enum(["hit", "miss"]);

/**
 * Schema for ErrorCode enum values
 */
export const ErrorCodeSchema = z.enum([
  "DECK_NOT_FOUND",
  "DECK_INVALID",
  "CONFIG_INVALID",
  "TERMINAL_IO",
  "INVALID_TRANSITION",
  "USAGE",
  "INTERNAL_ERROR",
]);

// =============================================================================
// Deck Source Schemas
// =============================================================================

/**
 * Schema for one card entry in a deck document.
 * The back is either a single answer or a list of accepted answers.
 */
export const DeckCardSourceSchema = z.object({
  front: z.string().min(1, "Card front is required"),
  back: z.union(
    [
      z.string().min(1, "Card back is required"),
      z.array(z.string().min(1, "Answer cannot be empty")).min(1, "At least one answer is required"),
    ],
    {
      errorMap: (issue, ctx) => {
        if (issue.code !== "invalid_union") {
          return { message: ctx.defaultError };
        }
        return {
          message:
            ctx.data === undefined
              ? "Card back is required"
              : "Card back must be a string or a list of strings",
        };
      },
    }
  ),
});

/**
 * Schema for a whole deck document
 */
export const DeckSourceSchema = z.object({
  title: z.string().min(1, "Deck title is required"),
  cards: z.array(DeckCardSourceSchema),
});

// =============================================================================
// Session Event Schemas
// =============================================================================

/**
 * Show the back of the current card
 */
export const RevealEventSchema = z.object({
  type: z.literal("reveal"),
});

/**
 * Record an outcome for the current card, optionally advancing in the same step
 */
export const ScoreEventSchema = z.object({
  type: z.literal("score"),
  outcome: ScoreSchema,
  advance: z.boolean().optional(),
});

/**
 * Move past a scored card
 */
export const AdvanceEventSchema = z.object({
  type: z.literal("advance"),
});

/**
 * Start the deck over once the session is finished
 */
export const RestartEventSchema = z.object({
  type: z.literal("restart"),
});

/**
 * End the session immediately
 */
export const QuitEventSchema = z.object({
  type: z.literal("quit"),
});

/**
 * Union of all session input events
 */
export const SessionEventSchema = z.discriminatedUnion("type", [
  RevealEventSchema,
  ScoreEventSchema,
  AdvanceEventSchema,
  RestartEventSchema,
  QuitEventSchema,
]);

// =============================================================================
// Type Exports (inferred from schemas)
// =============================================================================

export type DeckCardSource = z.infer<typeof DeckCardSourceSchema>;
export type DeckSource = z.infer<typeof DeckSourceSchema>;

export type RevealEvent = z.infer<typeof RevealEventSchema>;
export type ScoreEvent = z.infer<typeof ScoreEventSchema>;
export type AdvanceEvent = z.infer<typeof AdvanceEventSchema>;
export type RestartEvent = z.infer<typeof RestartEventSchema>;
export type QuitEvent = z.infer<typeof QuitEventSchema>;
export type SessionEvent = z.infer<typeof SessionEventSchema>;
export type SessionEventType = SessionEvent["type"];

// =============================================================================
// Validation Utilities
// =============================================================================

/**
 * Parse and validate a deck document
 * @throws ZodError if validation fails
 */
export function parseDeckSource(data: unknown): DeckSource {
  return DeckSourceSchema.parse(data);
}

/**
 * Safely parse a deck document, returning success/error result
 */
export function safeParseDeckSource(data: unknown) {
  return DeckSourceSchema.safeParse(data);
}

/**
 * Formats zod issues as a single line, e.g. `cards.0.front: Card front is required`.
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join(".");
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join("; ");
}
