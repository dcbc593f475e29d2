/**
 * Study View Tests
 */

import { describe, test, expect } from "vitest";
import { TextCard, createDeck } from "../../game/flashcard";
import { StudySession } from "../../game/session";
import { Buffer } from "../buffer";
import { CardSide } from "../card-side";
import { Text } from "../text";
import { buildMain, buildView, panelLines } from "../view";

function session(): StudySession<TextCard> {
  return new StudySession(
    createDeck("Foobar Deck", [new TextCard("Foo", "Bar"), new TextCard("Bizz", "bazz")])
  );
}

describe("buildMain", () => {
  test("shows the current card side", () => {
    const main = buildMain(session().snapshot());

    expect(main).toBeInstanceOf(CardSide);
    if (main instanceof CardSide) {
      expect(main.content()).toBe("Foo");
    }
  });

  test("shows the back once revealed", () => {
    const s = session();
    s.reveal();
    const main = buildMain(s.snapshot());

    expect(main instanceof CardSide && main.content()).toBe("Bar");
  });

  test("shows the summary once finished", () => {
    const s = session();
    s.reveal();
    s.score("hit", { advance: true });
    s.reveal();
    s.score("miss", { advance: true });

    const main = buildMain(s.snapshot());

    expect(main).toBeInstanceOf(Text);
    expect(main instanceof Text && main.content).toBe("Finished: 1 hit, 1 miss");
  });

  test("shows an end message after quitting", () => {
    const s = session();
    s.quit();
    const main = buildMain(s.snapshot());

    expect(main instanceof Text && main.content).toBe("Session ended");
  });
});

describe("panelLines", () => {
  test("lists position and counts", () => {
    expect(panelLines(session().snapshot())).toEqual(["Card 1/2", "Hits: 0", "Misses: 0"]);
  });

  test("notes a revealed answer and appends help", () => {
    const s = session();
    s.reveal();

    expect(panelLines(s.snapshot(), ["q: quit"])).toEqual([
      "Card 1/2",
      "Hits: 0",
      "Misses: 0",
      "Answer shown",
      "",
      "q: quit",
    ]);
  });

  test("shows the deck size once finished", () => {
    const s = session();
    s.reveal();
    s.score("hit", { advance: true });
    s.reveal();
    s.score("hit", { advance: true });

    expect(panelLines(s.snapshot())).toEqual(["Cards: 2", "Hits: 2", "Misses: 0"]);
  });
});

describe("buildView", () => {
  test("holds the card and the panel by default", () => {
    const view = buildView(session().snapshot());

    expect(view.size).toBe(2);
    expect(view.direction).toBe("horizontal");
  });

  test("leaves the panel out when disabled", () => {
    const view = buildView(session().snapshot(), { showPanel: false, direction: "vertical" });

    expect(view.size).toBe(1);
    expect(view.direction).toBe("vertical");
  });

  test("renders a full frame", () => {
    const view = buildView(session().snapshot(), { showPanel: false });
    const buf = new Buffer(15, 3);

    view.render(buf.area, buf);

    expect(buf.lines()).toEqual(["┌Foobar Deck──┐", "│     Foo     │", "└─────────────┘"]);
  });

  test("renders card and panel side by side", () => {
    const view = buildView(session().snapshot());
    const buf = new Buffer(24, 5);

    view.render(buf.area, buf);

    expect(buf.lines()).toEqual([
      "┌Foobar Dec┐┌Session───┐",
      "│          ││Card 1/2  │",
      "│   Foo    ││Hits: 0   │",
      "│          ││Misses: 0 │",
      "└──────────┘└──────────┘",
    ]);
  });
});
