/**
 * Deck Loader
 *
 * Reads deck documents from disk (JSON, or YAML by extension), validates them
 * against DeckSourceSchema and turns them into decks of study cards.
 */

import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import { load as loadYaml } from "js-yaml";
import { DeckSourceSchema, formatIssues, type DeckCardSource, type DeckSource } from "@kadeu/shared";
import { DeckLoadError, errorMessage } from "../errors";
import { createDeck, MultiAnswerCard, TextCard, type Deck, type StudyCard } from "../game/flashcard";
import { deckLog as log } from "../logger";

export type DeckFormat = "json" | "yaml";

const YAML_EXTENSIONS = new Set([".yaml", ".yml"]);

/**
 * Picks the document format from the file extension. Anything else is JSON.
 */
export function detectFormat(path: string): DeckFormat {
  return YAML_EXTENSIONS.has(extname(path).toLowerCase()) ? "yaml" : "json";
}

export function toCard(source: DeckCardSource): StudyCard {
  return typeof source.back === "string"
    ? new TextCard(source.front, source.back)
    : new MultiAnswerCard(source.front, source.back);
}

export function toDeck(source: DeckSource): Deck<StudyCard> {
  return createDeck(source.title, source.cards.map(toCard));
}

/**
 * Parses and validates deck text.
 *
 * @param text - Document contents
 * @param format - Document format
 * @param origin - Where the text came from, used in error messages
 * @throws DeckLoadError if the text is not a valid deck
 */
export function parseDeck(text: string, format: DeckFormat, origin: string): Deck<StudyCard> {
  let data: unknown;
  try {
    data = format === "yaml" ? loadYaml(text) : JSON.parse(text);
  } catch (error) {
    throw new DeckLoadError(
      `Could not parse ${format.toUpperCase()} in ${origin}: ${errorMessage(error)}`,
      origin,
      "DECK_INVALID",
      { cause: error }
    );
  }

  const result = DeckSourceSchema.safeParse(data);
  if (!result.success) {
    throw new DeckLoadError(
      `Invalid deck in ${origin}: ${formatIssues(result.error)}`,
      origin,
      "DECK_INVALID",
      { cause: result.error }
    );
  }

  return toDeck(result.data);
}

/**
 * Loads a deck file.
 *
 * @throws DeckLoadError if the file is missing, unreadable or invalid
 */
export async function loadDeck(path: string): Promise<Deck<StudyCard>> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    if (code === "ENOENT") {
      throw new DeckLoadError(`Deck file not found: ${path}`, path, "DECK_NOT_FOUND", {
        cause: error,
      });
    }
    throw new DeckLoadError(`Could not read deck ${path}: ${errorMessage(error)}`, path, "DECK_INVALID", {
      cause: error,
    });
  }

  const deck = parseDeck(text, detectFormat(path), path);
  log.debug(`Loaded "${deck.title}" (${deck.cards.length} cards) from ${path}`);
  return deck;
}
