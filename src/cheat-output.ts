/**
 * Writes encoded blocks to cheat files.
 */
import { appendFile, writeFile } from "fs/promises";
import logger from "./logger.js";
import { EXTERNAL_BASE } from "./table-layout.js";
import { formatBlock, joinBlocks, type PatchBlock } from "./patch-encoder.js";

export function renderBlocks(blocks: readonly PatchBlock[], base = EXTERNAL_BASE): string {
  return joinBlocks(blocks.map((b) => formatBlock(b, base)));
}

/** Append after a blank line, so existing codes stay intact */
export async function appendBlocks(file: string, blocks: readonly PatchBlock[], base = EXTERNAL_BASE): Promise<void> {
  await appendFile(file, `\n\n${renderBlocks(blocks, base)}\n`, "utf8");
  logger.info(`Appended ${blocks.length} block(s) to ${file}`, { module: "cli" });
}

export async function writeBlocks(file: string, blocks: readonly PatchBlock[], base = EXTERNAL_BASE): Promise<void> {
  await writeFile(file, `${renderBlocks(blocks, base)}\n`, "utf8");
  logger.info(`Wrote ${blocks.length} block(s) to ${file}`, { module: "cli" });
}
