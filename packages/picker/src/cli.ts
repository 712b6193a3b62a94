#!/usr/bin/env node
/**
 * CLI entry point for jpick.
 *
 * Test with: npx tsx src/cli.ts [args...]
 */
process.title = "jpick";

import { main } from "./main.js";

await main(process.argv.slice(2));
