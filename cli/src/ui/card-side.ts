/**
 * Card Side
 *
 * Binds the current card, its flip state and the deck title into a widget.
 * Holds no state of its own; a new one is built for every frame.
 */

import type { AnyFlashcard } from "../game/flashcard";
import type { Buffer, Rect } from "./buffer";
import { Text } from "./text";
import type { Widget } from "./widget";

export interface CardSideProps<C extends AnyFlashcard> {
  card: C;
  revealed: boolean;
  title?: string;
}

export class CardSide<C extends AnyFlashcard> implements Widget {
  constructor(private readonly props: CardSideProps<C>) {}

  /**
   * The side currently on display.
   */
  content(): string {
    const { card, revealed } = this.props;
    return revealed ? card.displayBack() : card.displayFront();
  }

  toText(): Text {
    return new Text(this.content(), {
      centered: true,
      bordered: true,
      borderTitle: this.props.title,
    });
  }

  render(area: Rect, buf: Buffer): void {
    this.toText().render(area, buf);
  }
}
