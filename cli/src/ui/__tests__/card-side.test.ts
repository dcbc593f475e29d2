/**
 * Card Side Tests
 */

import { describe, test, expect } from "vitest";
import { MultiAnswerCard, TextCard } from "../../game/flashcard";
import { Buffer } from "../buffer";
import { CardSide } from "../card-side";

describe("CardSide", () => {
  const card = new TextCard("Foo", "Bar");

  test("shows the front until revealed", () => {
    expect(new CardSide({ card, revealed: false }).content()).toBe("Foo");
    expect(new CardSide({ card, revealed: true }).content()).toBe("Bar");
  });

  test("uses the display form of non-text backs", () => {
    const multi = new MultiAnswerCard("Colours", ["red", "blue"]);
    expect(new CardSide({ card: multi, revealed: true }).content()).toBe("red, blue");
  });

  test("builds a bordered, centered, titled text", () => {
    const text = new CardSide({ card, revealed: false, title: "Foobar Deck" }).toText();

    expect(text.content).toBe("Foo");
    expect(text.options).toEqual({ centered: true, bordered: true, borderTitle: "Foobar Deck" });
  });

  test("renders the title on the frame and the content in the middle", () => {
    const buf = new Buffer(11, 3);
    new CardSide({ card, revealed: true, title: "Deck" }).render(buf.area, buf);

    expect(buf.lines()).toEqual(["┌Deck─────┐", "│   Bar   │", "└─────────┘"]);
  });
});
