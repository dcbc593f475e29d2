import type { DeckSource } from "@kadeu/shared";
import type { Deck, StudyCard } from "../game/flashcard";
import { toDeck } from "./deck-loader";

/**
 * Deck used when no deck file is given.
 */
export const DEFAULT_DECK_SOURCE: DeckSource = {
  title: "Foobar Deck",
  cards: [
    { front: "Foo", back: "Bar" },
    { front: "Bizz", back: "bazz" },
  ],
};

export function defaultDeck(): Deck<StudyCard> {
  return toDeck(DEFAULT_DECK_SOURCE);
}
