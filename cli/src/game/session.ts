/**
 * Study Session
 *
 * State machine tying reveal, scoring and advancement together for one pass
 * over a deck.
 *
 * Per card: front_shown -> back_shown (reveal). Scoring is only accepted in
 * back_shown and only once per card; advancing is only accepted after scoring.
 * When the sequencer runs dry the session finishes and publishes its summary.
 * Rejected transitions return a failure result and leave every piece of state
 * untouched.
 */

import type { Score, SessionEvent, SessionSummary } from "@kadeu/shared";
import type { AnyFlashcard, Deck } from "./flashcard";
import { Progress, formatSummary, summarize } from "./progress";
import { sequencerFactory, type Sequencer, type SequencerFactory } from "./sequencer";
import { sessionLog as log } from "../logger";

// =============================================================================
// Types
// =============================================================================

export type CardPhase = "front_shown" | "back_shown";

export type SessionStatus = "in_progress" | "finished" | "quit";

/**
 * Read-only view of the session used for rendering.
 */
export interface SessionSnapshot<C> {
  title: string;
  status: SessionStatus;
  /** Undefined when no card is current (finished or quit) */
  phase: CardPhase | undefined;
  card: C | undefined;
  /** 1-based position of the current card; count of cards produced so far */
  position: number;
  /** Number of cards in the deck */
  total: number;
  summary: SessionSummary;
}

export type TransitionResult<C> =
  | { success: true; snapshot: SessionSnapshot<C> }
  | { success: false; code: "INVALID_TRANSITION"; error: string };

export interface StudySessionOptions<C> {
  /** Sequencer used for every (re)start (default: linear) */
  createSequencer?: SequencerFactory<C>;
  /** Called with the summary each time the sequence is exhausted */
  onFinish?: (summary: SessionSummary) => void;
}

export interface ScoreOptions {
  /** Advance to the next card in the same transition */
  advance?: boolean;
}

// =============================================================================
// Session
// =============================================================================

export class StudySession<C extends AnyFlashcard> {
  private readonly deck: Deck<C>;
  private readonly createSequencer: SequencerFactory<C>;
  private readonly onFinish: ((summary: SessionSummary) => void) | undefined;

  private sequencer: Sequencer<C>;
  /** Every progress value produced this pass, the current one included */
  private history: Progress<C>[] = [];
  private current: Progress<C> | undefined;
  private revealed = false;
  private state: SessionStatus = "in_progress";

  constructor(deck: Deck<C>, options: StudySessionOptions<C> = {}) {
    this.deck = deck;
    this.createSequencer = options.createSequencer ?? sequencerFactory<C>("linear");
    this.onFinish = options.onFinish;
    this.sequencer = this.createSequencer(deck.cards);
    this.begin();
  }

  get status(): SessionStatus {
    return this.state;
  }

  get phase(): CardPhase | undefined {
    if (this.current === undefined) {
      return undefined;
    }
    return this.revealed ? "back_shown" : "front_shown";
  }

  get currentCard(): C | undefined {
    return this.current?.item;
  }

  /**
   * Progress values produced so far, oldest first.
   */
  get progress(): readonly Progress<C>[] {
    return this.history;
  }

  summary(): SessionSummary {
    return summarize(this.history);
  }

  snapshot(): SessionSnapshot<C> {
    return {
      title: this.deck.title,
      status: this.state,
      phase: this.phase,
      card: this.currentCard,
      position: this.history.length,
      total: this.deck.cards.length,
      summary: this.summary(),
    };
  }

  // ===========================================================================
  // Transitions
  // ===========================================================================

  reveal(): TransitionResult<C> {
    if (this.state !== "in_progress" || this.current === undefined) {
      return this.reject(`Cannot reveal while ${this.state}`);
    }
    this.revealed = true;
    return this.accept();
  }

  score(outcome: Score, options: ScoreOptions = {}): TransitionResult<C> {
    if (this.state !== "in_progress" || this.current === undefined) {
      return this.reject(`Cannot score while ${this.state}`);
    }
    if (!this.revealed) {
      return this.reject("Cannot score before the answer is revealed");
    }
    if (this.current.hasScore()) {
      return this.reject("Card is already scored");
    }

    this.current.record(outcome);
    log.debug(`Scored card ${this.history.length}/${this.deck.cards.length} as ${outcome}`);

    if (options.advance) {
      this.enterNext();
    }
    return this.accept();
  }

  advance(): TransitionResult<C> {
    if (this.state !== "in_progress" || this.current === undefined) {
      return this.reject(`Cannot advance while ${this.state}`);
    }
    if (!this.current.hasScore()) {
      return this.reject("Cannot advance before the card is scored");
    }
    this.enterNext();
    return this.accept();
  }

  restart(): TransitionResult<C> {
    if (this.state !== "finished") {
      return this.reject(`Cannot restart while ${this.state}`);
    }
    log.info(`Restarting "${this.deck.title}"`);
    this.sequencer = this.createSequencer(this.deck.cards);
    this.begin();
    return this.accept();
  }

  /**
   * Ends the session. An unscored in-flight card is discarded.
   */
  quit(): TransitionResult<C> {
    if (this.current !== undefined && !this.current.hasScore()) {
      this.history.pop();
    }
    this.current = undefined;
    this.revealed = false;
    this.state = "quit";
    return this.accept();
  }

  dispatch(event: SessionEvent): TransitionResult<C> {
    switch (event.type) {
      case "reveal":
        return this.reveal();
      case "score":
        return this.score(event.outcome, { advance: event.advance });
      case "advance":
        return this.advance();
      case "restart":
        return this.restart();
      case "quit":
        return this.quit();
    }
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private begin(): void {
    this.history = [];
    this.state = "in_progress";
    log.debug(
      `Starting "${this.deck.title}" with ${this.deck.cards.length} cards (${this.sequencer.strategy})`
    );
    this.enterNext();
  }

  private enterNext(): void {
    this.revealed = false;
    const card = this.sequencer.next();

    if (card === undefined) {
      this.current = undefined;
      this.state = "finished";
      const summary = this.summary();
      log.info(`Finished "${this.deck.title}": ${formatSummary(summary)}`);
      this.onFinish?.(summary);
      return;
    }

    this.current = new Progress(card);
    this.history.push(this.current);
  }

  private accept(): TransitionResult<C> {
    return { success: true, snapshot: this.snapshot() };
  }

  private reject(error: string): TransitionResult<C> {
    log.debug(`Rejected transition: ${error}`);
    return { success: false, code: "INVALID_TRANSITION", error };
  }
}
