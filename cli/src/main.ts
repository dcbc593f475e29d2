/**
 * Command line entry: argument parsing, wiring and exit codes.
 *
 * Exit codes:
 * - 0: the user quit (or asked for help/version)
 * - 1: bad usage, config or deck load failure
 * - 2: terminal I/O failure
 */

import { emitKeypressEvents } from "node:readline";
import { parseArgs } from "node:util";
import { VERSION } from "@kadeu/shared";
import { loadConfig, type KadeuConfig } from "./config";
import { defaultDeck } from "./deck/default-deck";
import { loadDeck } from "./deck/deck-loader";
import { UsageError, errorMessage, exitCodeFor } from "./errors";
import { formatSummary } from "./game/progress";
import { STRATEGY_NAMES, isStrategyName, sequencerFactory, type StrategyName } from "./game/sequencer";
import { StudySession } from "./game/session";
import { appLog as log } from "./logger";
import { StudyApp } from "./tui/app";
import { Keymap, mergeKeyBindings } from "./tui/keymap";
import { Terminal, withTerminal } from "./tui/terminal";

export const USAGE = `Usage: kadeu [options]

Options:
  -f, --from <path>        Deck file (.json, .yaml or .yml); built-in deck when omitted
  -s, --strategy <name>    Card order: ${STRATEGY_NAMES.join(", ")}
  -c, --config <path>      Config file (default: ~/.config/kadeu/config.json)
  -h, --help               Show this help
  -V, --version            Show the version`;

export interface CliArgs {
  from?: string;
  strategy?: StrategyName;
  config?: string;
  help: boolean;
  version: boolean;
}

const OPTIONS = {
  from: { type: "string", short: "f" },
  strategy: { type: "string", short: "s" },
  config: { type: "string", short: "c" },
  help: { type: "boolean", short: "h", default: false },
  version: { type: "boolean", short: "V", default: false },
} as const;

function readOptions(argv: readonly string[]) {
  try {
    return parseArgs({ args: [...argv], options: OPTIONS, strict: true, allowPositionals: false })
      .values;
  } catch (error) {
    throw new UsageError(errorMessage(error));
  }
}

/**
 * @throws UsageError for unknown options, missing values or an unknown strategy
 */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  const values = readOptions(argv);
  const strategy = values.strategy;

  if (strategy !== undefined && !isStrategyName(strategy)) {
    throw new UsageError(
      `Unknown strategy "${strategy}" (expected one of: ${STRATEGY_NAMES.join(", ")})`
    );
  }

  return {
    from: values.from,
    strategy,
    config: values.config,
    help: values.help ?? false,
    version: values.version ?? false,
  };
}

/**
 * Resolves the strategy: the command line beats the config file.
 */
export function resolveStrategy(args: CliArgs, config: KadeuConfig): StrategyName {
  return args.strategy ?? config.strategy;
}

export async function main(argv: readonly string[]): Promise<number> {
  try {
    const args = parseCliArgs(argv);
    if (args.help) {
      console.log(USAGE);
      return 0;
    }
    if (args.version) {
      console.log(VERSION);
      return 0;
    }

    const config = await loadConfig(args.config);
    const deck = args.from !== undefined ? await loadDeck(args.from) : defaultDeck();
    const strategy = resolveStrategy(args, config);

    const session = new StudySession(deck, { createSequencer: sequencerFactory(strategy) });
    const keymap = new Keymap(mergeKeyBindings(config.keybindings), config.autoAdvance);

    emitKeypressEvents(process.stdin);
    const terminal = new Terminal(process.stdin, process.stdout);

    const summary = await withTerminal(terminal, (screen) =>
      new StudyApp(session, screen, process.stdin, {
        keymap,
        view: { direction: config.layout, showPanel: config.showPanel },
      }).run()
    );

    log.info(`Studied "${deck.title}": ${formatSummary(summary)}`);
    return 0;
  } catch (error) {
    log.error(errorMessage(error));
    return exitCodeFor(error);
  }
}
