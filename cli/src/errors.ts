/**
 * Error Classes
 *
 * Typed failures raised at the collaborator boundaries: deck loading,
 * configuration and terminal I/O. Invalid session transitions are not thrown;
 * they come back as values from the session (see game/session.ts).
 */

import type { ErrorCode } from "@kadeu/shared";

/**
 * Base error carrying a machine-readable code.
 */
export class KadeuError extends Error {
  readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "KadeuError";
    this.code = code;
  }
}

/**
 * Error thrown when a deck source is missing, unreadable or malformed.
 */
export class DeckLoadError extends KadeuError {
  readonly path: string;

  constructor(
    message: string,
    path: string,
    code: "DECK_NOT_FOUND" | "DECK_INVALID" = "DECK_INVALID",
    options?: { cause?: unknown }
  ) {
    super(message, code, options);
    this.name = "DeckLoadError";
    this.path = path;
  }
}

/**
 * Error thrown when an explicitly requested config file cannot be used.
 */
export class ConfigError extends KadeuError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "CONFIG_INVALID", options);
    this.name = "ConfigError";
  }
}

/**
 * Error thrown when the command line cannot be parsed.
 */
export class UsageError extends KadeuError {
  constructor(message: string) {
    super(message, "USAGE");
    this.name = "UsageError";
  }
}

/**
 * Error thrown when reading from or writing to the terminal fails.
 * Always fatal to the session.
 */
export class TerminalIOError extends KadeuError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "TERMINAL_IO", options);
    this.name = "TerminalIOError";
  }
}

/**
 * Determines if an error is a KadeuError.
 *
 * Checks for a `code` property with a known ErrorCode as well,
 * since instanceof checks can fail across module boundaries.
 */
export function isKadeuError(error: unknown): error is KadeuError {
  if (error instanceof KadeuError) {
    return true;
  }

  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    const knownCodes: readonly string[] = [
      "DECK_NOT_FOUND",
      "DECK_INVALID",
      "CONFIG_INVALID",
      "TERMINAL_IO",
      "INVALID_TRANSITION",
      "USAGE",
      "INTERNAL_ERROR",
    ];
    return knownCodes.includes(error.code);
  }

  return false;
}

/**
 * Maps an error to the process exit code.
 *
 * - TERMINAL_IO: 2
 * - everything else: 1
 */
export function exitCodeFor(error: unknown): number {
  if (isKadeuError(error) && error.code === "TERMINAL_IO") {
    return 2;
  }
  return 1;
}

/**
 * Extracts a printable message from any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
