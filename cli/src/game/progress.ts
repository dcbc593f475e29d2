/**
 * Progress and Scoring
 *
 * A Progress wraps one studied item with its outcome. It is a passive value:
 * the session is responsible for recording at most one outcome per instance.
 */

import type { Score, SessionSummary } from "@kadeu/shared";

/**
 * Display strings for each outcome. Exhaustive over Score.
 */
const SCORE_LABELS: Record<Score, string> = {
  hit: "hit",
  miss: "miss",
};

export function formatScore(score: Score): string {
  return SCORE_LABELS[score];
}

export class Progress<T> {
  private outcome: Score | undefined;

  constructor(readonly item: T) {}

  hasScore(): boolean {
    return this.outcome !== undefined;
  }

  score(): Score | undefined {
    return this.outcome;
  }

  /**
   * Records the outcome. Callers must only do this once per instance.
   */
  record(score: Score): void {
    this.outcome = score;
  }
}

/**
 * Counts hits and misses across progress values. Unscored values are ignored.
 */
export function summarize<T>(progress: Iterable<Progress<T>>): SessionSummary {
  let hit = 0;
  let miss = 0;

  for (const entry of progress) {
    switch (entry.score()) {
      case "hit":
        hit++;
        break;
      case "miss":
        miss++;
        break;
      case undefined:
        break;
    }
  }

  return { hit, miss, total: hit + miss };
}

/**
 * Renders a summary as a sentence, e.g. "1 hit, 1 miss".
 */
export function formatSummary(summary: SessionSummary): string {
  return `${summary.hit} ${formatScore("hit")}, ${summary.miss} ${formatScore("miss")}`;
}
