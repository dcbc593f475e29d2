/**
 * Terminal Adapter
 *
 * Owns the screen: switches the terminal into raw mode and the alternate
 * screen, paints widget trees, and restores everything on the way out.
 * Any failure to talk to the terminal is raised as TerminalIOError.
 */

import type { EventEmitter } from "node:events";
import { TerminalIOError, errorMessage } from "../errors";
import { createBufferedSink, setLogSink, terminalLog as log } from "../logger";
import { Buffer } from "../ui/buffer";
import type { Widget } from "../ui/widget";

// =============================================================================
// Escape Sequences
// =============================================================================

const ESC = "\u001b[";

export const ANSI = {
  enterAltScreen: `${ESC}?1049h`,
  leaveAltScreen: `${ESC}?1049l`,
  hideCursor: `${ESC}?25l`,
  showCursor: `${ESC}?25h`,
  clear: `${ESC}2J`,
  home: `${ESC}H`,
} as const;

/** Used when the output stream does not report its size */
export const FALLBACK_SIZE = { columns: 80, rows: 24 } as const;

// =============================================================================
// Types
// =============================================================================

/**
 * The parts of process.stdin the adapter uses.
 */
export interface TerminalInput {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
  resume(): unknown;
  pause(): unknown;
}

/**
 * The parts of process.stdout the adapter uses.
 */
export interface TerminalOutput extends EventEmitter {
  columns?: number;
  rows?: number;
  write(chunk: string): boolean;
}

export interface ScreenSize {
  columns: number;
  rows: number;
}

/**
 * Something a frame can be painted on.
 */
export interface Screen {
  size(): ScreenSize;
  draw(widget: Widget): void;
  /** Registers a resize listener; returns a function removing it. */
  onResize(listener: () => void): () => void;
  /** Registers an output error listener; returns a function removing it. */
  onError(listener: (error: TerminalIOError) => void): () => void;
}

// =============================================================================
// Terminal
// =============================================================================

export class Terminal implements Screen {
  private active = false;

  constructor(
    private readonly input: TerminalInput,
    private readonly output: TerminalOutput
  ) {}

  get isActive(): boolean {
    return this.active;
  }

  /**
   * Enters raw mode and the alternate screen.
   * @throws TerminalIOError if input is not a terminal or the output cannot be written
   */
  enter(): void {
    if (!this.input.isTTY || this.input.setRawMode === undefined) {
      throw new TerminalIOError("Standard input is not a terminal");
    }
    try {
      this.input.setRawMode(true);
    } catch (error) {
      throw new TerminalIOError(`Could not enable raw mode: ${errorMessage(error)}`, { cause: error });
    }
    this.active = true;
    this.input.resume();
    this.write(ANSI.enterAltScreen + ANSI.hideCursor + ANSI.clear);
    log.debug("Entered raw mode");
  }

  /**
   * Restores the terminal. Safe to call after a failed or partial enter.
   */
  leave(): void {
    if (!this.active) {
      return;
    }
    this.active = false;
    this.input.setRawMode?.(false);
    this.input.pause();
    this.write(ANSI.showCursor + ANSI.leaveAltScreen);
    log.debug("Left raw mode");
  }

  size(): ScreenSize {
    return {
      columns: this.output.columns ?? FALLBACK_SIZE.columns,
      rows: this.output.rows ?? FALLBACK_SIZE.rows,
    };
  }

  /**
   * Renders `widget` into a buffer the size of the screen and paints it.
   */
  draw(widget: Widget): void {
    const { columns, rows } = this.size();
    const buf = new Buffer(columns, rows);
    widget.render(buf.area, buf);
    this.write(ANSI.home + buf.lines().join("\r\n"));
  }

  onResize(listener: () => void): () => void {
    this.output.on("resize", listener);
    return () => {
      this.output.off("resize", listener);
    };
  }

  onError(listener: (error: TerminalIOError) => void): () => void {
    const handler = (error: unknown) => {
      listener(new TerminalIOError(`Terminal write failed: ${errorMessage(error)}`, { cause: error }));
    };
    this.output.on("error", handler);
    return () => {
      this.output.off("error", handler);
    };
  }

  private write(data: string): void {
    try {
      this.output.write(data);
    } catch (error) {
      throw new TerminalIOError(`Terminal write failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}

/**
 * Runs `fn` with the terminal in raw mode, restoring it on every exit path.
 *
 * Log entries produced meanwhile are held back and printed after the
 * terminal is restored. An output error event seen at any point in between,
 * entering and leaving included, fails the call once the terminal is restored.
 */
export async function withTerminal<T>(
  terminal: Terminal,
  fn: (screen: Screen) => Promise<T>
): Promise<T> {
  const buffered = createBufferedSink();
  const previous = setLogSink(buffered.sink);
  const outputFailure: { error?: TerminalIOError } = {};
  const stopGuard = terminal.onError((error) => {
    outputFailure.error ??= error;
  });

  let result: T;
  try {
    terminal.enter();
    result = await fn(terminal);
  } finally {
    try {
      terminal.leave();
    } finally {
      stopGuard();
      setLogSink(previous);
      buffered.flush(previous);
    }
  }

  if (outputFailure.error !== undefined) {
    throw outputFailure.error;
  }
  return result;
}
