#!/usr/bin/env tsx
/**
 * Kadeu
 *
 * Terminal flashcard study tool.
 */

import { main } from "./main";

process.exit(await main(process.argv.slice(2)));
