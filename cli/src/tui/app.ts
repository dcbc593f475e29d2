/**
 * Study App
 *
 * Event loop of a study session: every keypress resolves to at most one
 * session event, which causes exactly one transition followed by exactly one
 * render. Resolves with the session summary when the user quits or the input
 * stream ends; a read error on the input rejects with TerminalIOError.
 */

import type { EventEmitter } from "node:events";
import type { SessionSummary } from "@kadeu/shared";
import { TerminalIOError, errorMessage } from "../errors";
import type { AnyFlashcard } from "../game/flashcard";
import type { StudySession } from "../game/session";
import { appLog as log } from "../logger";
import { buildView, type ViewOptions } from "../ui/view";
import type { KeyPress, Keymap } from "./keymap";
import type { Screen } from "./terminal";

export interface StudyAppOptions {
  keymap: Keymap;
  view?: Omit<ViewOptions, "helpLines">;
}

export class StudyApp<C extends AnyFlashcard> {
  private readonly keymap: Keymap;
  private readonly view: ViewOptions;
  private frameCount = 0;

  constructor(
    private readonly session: StudySession<C>,
    private readonly screen: Screen,
    private readonly keys: EventEmitter,
    options: StudyAppOptions
  ) {
    this.keymap = options.keymap;
    this.view = { ...options.view, helpLines: this.keymap.helpLines() };
  }

  /** Frames painted so far */
  get frames(): number {
    return this.frameCount;
  }

  render(): void {
    this.screen.draw(buildView(this.session.snapshot(), this.view));
    this.frameCount++;
  }

  run(): Promise<SessionSummary> {
    return new Promise((resolve, reject) => {
      const stopResize = this.screen.onResize(() => {
        try {
          this.render();
        } catch (error) {
          fail(error);
        }
      });
      const stopError = this.screen.onError((error) => fail(error));

      const cleanup = () => {
        this.keys.off("keypress", onKey);
        this.keys.off("error", onInputError);
        this.keys.off("end", onInputEnd);
        stopResize();
        stopError();
      };

      const fail = (error: unknown) => {
        cleanup();
        reject(error);
      };

      const onKey = (sequence: string | undefined, key: KeyPress | undefined) => {
        try {
          const event = this.keymap.resolve(key ?? { sequence });
          if (event === undefined) {
            return;
          }

          const result = this.session.dispatch(event);
          if (!result.success) {
            log.debug(`Ignored ${event.type}: ${result.error}`);
          }

          if (this.session.status === "quit") {
            cleanup();
            resolve(this.session.summary());
            return;
          }

          this.render();
        } catch (error) {
          fail(error);
        }
      };

      const onInputError = (error: unknown) => {
        fail(new TerminalIOError(`Terminal read failed: ${errorMessage(error)}`, { cause: error }));
      };

      const onInputEnd = () => {
        log.info("Input closed");
        this.session.quit();
        cleanup();
        resolve(this.session.summary());
      };

      this.keys.on("keypress", onKey);
      this.keys.on("error", onInputError);
      this.keys.on("end", onInputEnd);

      try {
        this.render();
      } catch (error) {
        fail(error);
      }
    });
  }
}
