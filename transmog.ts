#!/usr/bin/env node
/**
 * Transmog CLI
 *
 * Builds the equipment catalog from an emulator save state and turns
 * equipment swaps into CWCheat codes that change only what is rendered.
 *
 * Usage:
 *   npx tsx transmog.ts build --state /path/to/state.ppst
 *   npx tsx transmog.ts armor --slot head --source "Leather" --target "Rathalos"
 *
 * Environment variables (or .env file):
 *   TRANSMOG_DATA, SAVESTATE_PATH, CHEAT_FILE, NAMES_BASE_URL
 *   LOG_LEVEL (debug|info|warn|error|silent, default: info)
 */
import { run } from "./src/cli.js";

async function main() {
  process.exitCode = await run(process.argv.slice(2));
}

main().catch((e) => {
  console.error("Fatal error:", e);
  process.exit(1);
});
