/**
 * Flashcard Capability
 *
 * The engine and the renderer drive cards only through this interface, so any
 * card representation works without either knowing its content types.
 */

/**
 * Typed access to a card's two sides plus their display forms.
 * All four methods are pure and never throw.
 */
export interface Flashcard<Front, Back> {
  front(): Front;
  back(): Back;
  displayFront(): string;
  displayBack(): string;
}

/**
 * Any flashcard, whatever its content types.
 */
export type AnyFlashcard = Flashcard<unknown, unknown>;

/**
 * A named, ordered, immutable collection of cards.
 */
export interface Deck<C extends AnyFlashcard> {
  readonly title: string;
  readonly cards: readonly C[];
}

/**
 * A card with a single text answer.
 */
export class TextCard implements Flashcard<string, string> {
  constructor(
    private readonly frontText: string,
    private readonly backText: string
  ) {}

  front(): string {
    return this.frontText;
  }

  back(): string {
    return this.backText;
  }

  displayFront(): string {
    return this.frontText;
  }

  displayBack(): string {
    return this.backText;
  }

  equals(other: TextCard): boolean {
    return this.frontText === other.frontText && this.backText === other.backText;
  }
}

/**
 * A card whose back lists several accepted answers.
 */
export class MultiAnswerCard implements Flashcard<string, readonly string[]> {
  private readonly answers: readonly string[];

  constructor(
    private readonly frontText: string,
    answers: readonly string[]
  ) {
    this.answers = Object.freeze([...answers]);
  }

  front(): string {
    return this.frontText;
  }

  back(): readonly string[] {
    return this.answers;
  }

  displayFront(): string {
    return this.frontText;
  }

  displayBack(): string {
    return this.answers.join(", ");
  }

  equals(other: MultiAnswerCard): boolean {
    return (
      this.frontText === other.frontText &&
      this.answers.length === other.answers.length &&
      this.answers.every((answer, i) => answer === other.answers[i])
    );
  }
}

/**
 * The card types produced by the deck loader.
 */
export type StudyCard = TextCard | MultiAnswerCard;

/**
 * Builds a frozen deck from a title and cards.
 */
export function createDeck<C extends AnyFlashcard>(title: string, cards: readonly C[]): Deck<C> {
  return Object.freeze({ title, cards: Object.freeze([...cards]) });
}
