/**
 * Deck Loader Tests
 *
 * Tests for reading JSON and YAML deck files and the errors raised for
 * missing or malformed ones.
 */

import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { mkdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { DeckLoadError } from "../../errors";
import { MultiAnswerCard, TextCard } from "../../game/flashcard";
import { DEFAULT_DECK_SOURCE, defaultDeck } from "../default-deck";
import { detectFormat, loadDeck, parseDeck, toCard } from "../deck-loader";

describe("deck-loader", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(
      tmpdir(),
      `deck-loader-test-${Date.now()}-${Math.random().toString(36).slice(2)}`
    );
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe("detectFormat", () => {
    test("recognizes YAML extensions", () => {
      expect(detectFormat("decks/spanish.yaml")).toBe("yaml");
      expect(detectFormat("decks/spanish.YML")).toBe("yaml");
    });

    test("treats everything else as JSON", () => {
      expect(detectFormat("decks/spanish.json")).toBe("json");
      expect(detectFormat("decks/spanish")).toBe("json");
    });
  });

  describe("toCard", () => {
    test("builds a text card for a single answer", () => {
      const card = toCard({ front: "Foo", back: "Bar" });
      expect(card).toBeInstanceOf(TextCard);
      expect(card.displayBack()).toBe("Bar");
    });

    test("builds a multi-answer card for a list", () => {
      const card = toCard({ front: "Foo", back: ["Bar", "Baz"] });
      expect(card).toBeInstanceOf(MultiAnswerCard);
      expect(card.displayBack()).toBe("Bar, Baz");
    });
  });

  describe("parseDeck", () => {
    test("parses JSON text", () => {
      const deck = parseDeck(
        '{"title":"Capitals","cards":[{"front":"France","back":"Paris"}]}',
        "json",
        "inline"
      );

      expect(deck.title).toBe("Capitals");
      expect(deck.cards.map((card) => [card.displayFront(), card.displayBack()])).toEqual([
        ["France", "Paris"],
      ]);
    });

    test("parses YAML text", () => {
      const text = [
        "title: Capitals",
        "cards:",
        "  - front: France",
        "    back: Paris",
        "  - front: Bolivia",
        "    back: [Sucre, La Paz]",
      ].join("\n");

      const deck = parseDeck(text, "yaml", "inline");

      expect(deck.cards).toHaveLength(2);
      expect(deck.cards[1].displayBack()).toBe("Sucre, La Paz");
    });

    test("reports syntax errors as DECK_INVALID", () => {
      try {
        parseDeck("{not json", "json", "broken.json");
        expect.unreachable("parseDeck should throw");
      } catch (error) {
        expect(error).toBeInstanceOf(DeckLoadError);
        expect((error as DeckLoadError).code).toBe("DECK_INVALID");
        expect((error as DeckLoadError).path).toBe("broken.json");
        expect((error as DeckLoadError).message).toMatch(/^Could not parse JSON in broken\.json: /);
      }
    });

    test("reports schema errors with their path", () => {
      expect(() =>
        parseDeck('{"title":"T","cards":[{"front":"A"}]}', "json", "deck.json")
      ).toThrow("Invalid deck in deck.json: cards.0.back: Card back is required");
    });

    test("names the accepted shapes of a mistyped back", () => {
      expect(() =>
        parseDeck('{"title":"T","cards":[{"front":"A","back":7}]}', "json", "deck.json")
      ).toThrow("Invalid deck in deck.json: cards.0.back: Card back must be a string or a list of strings");
    });
  });

  describe("loadDeck", () => {
    test("loads a JSON deck file", async () => {
      const path = join(testDir, "deck.json");
      await writeFile(path, JSON.stringify(DEFAULT_DECK_SOURCE), "utf-8");

      const deck = await loadDeck(path);

      expect(deck.title).toBe("Foobar Deck");
      expect(deck.cards.map((card) => card.displayFront())).toEqual(["Foo", "Bizz"]);
    });

    test("loads a YAML deck file", async () => {
      const path = join(testDir, "deck.yml");
      await writeFile(path, "title: Tiny\ncards:\n  - front: a\n    back: b\n", "utf-8");

      const deck = await loadDeck(path);

      expect(deck.title).toBe("Tiny");
      expect(deck.cards[0].displayBack()).toBe("b");
    });

    test("loads a deck without cards", async () => {
      const path = join(testDir, "empty.json");
      await writeFile(path, '{"title":"Empty","cards":[]}', "utf-8");

      const deck = await loadDeck(path);
      expect(deck.cards).toHaveLength(0);
    });

    test("raises DECK_NOT_FOUND for a missing file", async () => {
      const path = join(testDir, "missing.json");

      await expect(loadDeck(path)).rejects.toMatchObject({
        name: "DeckLoadError",
        code: "DECK_NOT_FOUND",
        message: `Deck file not found: ${path}`,
      });
    });

    test("raises DECK_INVALID for a directory", async () => {
      await expect(loadDeck(testDir)).rejects.toMatchObject({ code: "DECK_INVALID" });
    });
  });

  describe("defaultDeck", () => {
    test("is the two-card Foobar deck", () => {
      const deck = defaultDeck();

      expect(deck.title).toBe("Foobar Deck");
      expect(deck.cards.map((card) => [card.front(), card.back()])).toEqual([
        ["Foo", "Bar"],
        ["Bizz", "bazz"],
      ]);
    });
  });
});
