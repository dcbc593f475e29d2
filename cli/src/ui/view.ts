/**
 * Study View
 *
 * Builds the widget tree for one frame from a session snapshot:
 * the card side (or the end-of-session summary) plus an optional panel
 * with position, counts and key help.
 */

import type { AnyFlashcard } from "../game/flashcard";
import { formatSummary } from "../game/progress";
import type { SessionSnapshot } from "../game/session";
import { CardSide } from "./card-side";
import { Container } from "./container";
import type { Direction } from "./layout";
import { Text } from "./text";
import type { Widget } from "./widget";

export interface ViewOptions {
  direction?: Direction;
  showPanel?: boolean;
  /** Key help lines shown at the bottom of the panel */
  helpLines?: readonly string[];
}

export const PANEL_TITLE = "Session";

/**
 * The main widget: the current card, or a summary once the deck is done.
 */
export function buildMain<C extends AnyFlashcard>(snapshot: SessionSnapshot<C>): Widget {
  if (snapshot.card !== undefined) {
    return new CardSide({
      card: snapshot.card,
      revealed: snapshot.phase === "back_shown",
      title: snapshot.title,
    });
  }

  const message =
    snapshot.status === "quit"
      ? "Session ended"
      : `Finished: ${formatSummary(snapshot.summary)}`;
  return new Text(message, { centered: true, bordered: true, borderTitle: snapshot.title });
}

/**
 * Lines shown in the session panel.
 */
export function panelLines<C>(
  snapshot: SessionSnapshot<C>,
  helpLines: readonly string[] = []
): string[] {
  const lines = [
    snapshot.status === "in_progress"
      ? `Card ${snapshot.position}/${snapshot.total}`
      : `Cards: ${snapshot.total}`,
    `Hits: ${snapshot.summary.hit}`,
    `Misses: ${snapshot.summary.miss}`,
  ];
  if (snapshot.phase === "back_shown") {
    lines.push("Answer shown");
  }
  if (helpLines.length > 0) {
    lines.push("", ...helpLines);
  }
  return lines;
}

export function buildView<C extends AnyFlashcard>(
  snapshot: SessionSnapshot<C>,
  options: ViewOptions = {}
): Container {
  const root = new Container({ direction: options.direction ?? "horizontal" });
  root.push(buildMain(snapshot));

  if (options.showPanel ?? true) {
    root.push(
      new Text(panelLines(snapshot, options.helpLines).join("\n"), {
        bordered: true,
        borderTitle: PANEL_TITLE,
      })
    );
  }

  return root;
}
