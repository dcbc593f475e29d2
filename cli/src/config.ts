/**
 * Configuration
 *
 * Optional user settings read from ~/.config/kadeu/config.json, or from a file
 * named with --config.
 *
 * A missing default file means defaults. A broken default file is reported
 * and ignored; a broken file the user asked for explicitly is an error.
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { homedir } from "node:os";
import { z } from "zod";
import { formatIssues } from "@kadeu/shared";
import { ConfigError, errorMessage } from "./errors";
import { STRATEGY_NAMES } from "./game/sequencer";
import { KEY_ACTIONS } from "./tui/keymap";
import { createLogger } from "./logger";

const log = createLogger("Config");

// =============================================================================
// Constants
// =============================================================================

/**
 * Config directory name within user home.
 */
const CONFIG_DIR = ".config/kadeu";

/**
 * Config file name.
 */
export const CONFIG_FILE_NAME = "config.json";

// =============================================================================
// Schema
// =============================================================================

export const KadeuConfigSchema = z.object({
  /** Card order strategy */
  strategy: z.enum(STRATEGY_NAMES).default("linear"),
  /** Scoring keys also move to the next card */
  autoAdvance: z.boolean().default(true),
  /** How the card and the panel share the screen */
  layout: z.enum(["horizontal", "vertical"]).default("horizontal"),
  /** Show the session panel beside the card */
  showPanel: z.boolean().default(true),
  /** Per-action key overrides */
  keybindings: z.record(z.enum(KEY_ACTIONS), z.array(z.string().min(1)).min(1)).default({}),
});

export type KadeuConfig = z.infer<typeof KadeuConfigSchema>;

export const DEFAULT_CONFIG: KadeuConfig = KadeuConfigSchema.parse({});

// =============================================================================
// Path Resolution
// =============================================================================

/**
 * Get the absolute path to the default config file.
 */
export function getConfigFilePath(): string {
  const home = process.env.HOME ?? homedir();
  return join(home, CONFIG_DIR, CONFIG_FILE_NAME);
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Validates already-parsed config data.
 * @throws ConfigError if the data does not match the schema
 */
export function parseConfig(data: unknown, origin = "config"): KadeuConfig {
  const result = KadeuConfigSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigError(`Invalid config in ${origin}: ${formatIssues(result.error)}`, {
      cause: result.error,
    });
  }
  return result.data;
}

async function readConfigFile(path: string): Promise<KadeuConfig> {
  const content = await readFile(path, "utf-8");

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Invalid JSON in ${path}: ${errorMessage(error)}`, { cause: error });
  }

  return parseConfig(parsed, path);
}

/**
 * Loads the configuration.
 *
 * @param explicitPath - File named on the command line, if any
 * @throws ConfigError if `explicitPath` is missing or invalid
 */
export async function loadConfig(explicitPath?: string): Promise<KadeuConfig> {
  if (explicitPath !== undefined) {
    try {
      return await readConfigFile(explicitPath);
    } catch (error) {
      if (error instanceof ConfigError) {
        throw error;
      }
      throw new ConfigError(`Could not read config ${explicitPath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  const configPath = getConfigFilePath();
  try {
    return await readConfigFile(configPath);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      log.debug("Config file not found, using defaults");
      return DEFAULT_CONFIG;
    }
    log.warn(`Ignoring config at ${configPath}: ${errorMessage(error)}`);
    return DEFAULT_CONFIG;
  }
}
