/**
 * Key Bindings
 *
 * Maps terminal keypresses to session events. Bindings are stored per action
 * as key ids: a key name ("space", "return", "right", "h"), an upper-case
 * letter for shift+letter ("R"), or a "ctrl+" prefix ("ctrl+c").
 */

import type { SessionEvent } from "@kadeu/shared";

export const KEY_ACTIONS = ["reveal", "hit", "miss", "advance", "restart", "quit"] as const;

export type KeyAction = (typeof KEY_ACTIONS)[number];

export type KeyBindings = Record<KeyAction, readonly string[]>;

/**
 * Keypress shape reported by readline's keypress events.
 */
export interface KeyPress {
  name?: string;
  sequence?: string;
  ctrl?: boolean;
  meta?: boolean;
  shift?: boolean;
}

export const DEFAULT_KEYBINDINGS: KeyBindings = {
  reveal: ["space", "r"],
  hit: ["h", "y"],
  miss: ["m", "n"],
  advance: ["return", "right", "l"],
  restart: ["R"],
  quit: ["q", "escape", "ctrl+c"],
};

/**
 * Help labels, in display order.
 */
const ACTION_LABELS: Record<KeyAction, string> = {
  reveal: "reveal",
  hit: "hit",
  miss: "miss",
  advance: "next",
  restart: "restart",
  quit: "quit",
};

/**
 * Overlays user bindings on the defaults. An action listed in `overrides`
 * loses its default keys.
 */
export function mergeKeyBindings(overrides: Partial<Record<KeyAction, readonly string[]>> = {}): KeyBindings {
  return { ...DEFAULT_KEYBINDINGS, ...overrides };
}

/**
 * Normalizes a keypress to a key id.
 * Returns undefined for keypresses carrying neither a name nor a sequence.
 */
export function keyId(key: KeyPress): string | undefined {
  const name = key.name ?? key.sequence;
  if (!name) {
    return undefined;
  }
  if (key.ctrl) {
    return `ctrl+${name}`;
  }
  if (key.shift && /^[a-z]$/.test(name)) {
    return name.toUpperCase();
  }
  return name;
}

export class Keymap {
  private readonly index = new Map<string, KeyAction>();

  constructor(
    readonly bindings: KeyBindings = DEFAULT_KEYBINDINGS,
    private readonly autoAdvance = true
  ) {
    // Earlier actions win when two actions claim the same key
    for (const action of KEY_ACTIONS) {
      for (const id of bindings[action]) {
        if (!this.index.has(id)) {
          this.index.set(id, action);
        }
      }
    }
  }

  actionFor(key: KeyPress): KeyAction | undefined {
    const id = keyId(key);
    return id === undefined ? undefined : this.index.get(id);
  }

  /**
   * The session event a keypress stands for, if any.
   */
  resolve(key: KeyPress): SessionEvent | undefined {
    const action = this.actionFor(key);
    switch (action) {
      case undefined:
        return undefined;
      case "hit":
      case "miss":
        return { type: "score", outcome: action, advance: this.autoAdvance };
      case "reveal":
      case "advance":
      case "restart":
      case "quit":
        return { type: action };
    }
  }

  /**
   * One line per bound action, e.g. "space: reveal".
   * Advance is left out when scoring already advances.
   */
  helpLines(): string[] {
    return KEY_ACTIONS.filter((action) => !(action === "advance" && this.autoAdvance))
      .filter((action) => this.bindings[action].length > 0)
      .map((action) => `${this.bindings[action][0]}: ${ACTION_LABELS[action]}`);
  }
}
