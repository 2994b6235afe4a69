/**
 * Patch encoder — CWCheat-style text for patch instructions.
 *
 *   _C1 <title>
 *   _L 0x<T><offset:7 hex> 0x<value:8 hex>
 *
 * T is the write width (0 byte, 1 half, 2 word); offset is relative to the
 * external base. Pure: the same instruction always gives the same line.
 */
import { EncodingError, hex32 } from "./errors.js";
import { EXTERNAL_BASE } from "./table-layout.js";
import { PATCH_WIDTH_BYTES, type PatchInstruction, type PatchWidth } from "./types.js";

export const WIDTH_TAG: Record<PatchWidth, string> = { Byte: "0", Half: "1", Word: "2" };

const MAX_OFFSET = 0x0fffffff;

export interface PatchBlock {
  title: string;
  instructions: readonly PatchInstruction[];
  enabled?: boolean;
}

export function hex(n: number, width: number): string {
  return (n >>> 0).toString(16).toUpperCase().padStart(width, "0");
}

export function toExternalOffset(address: number, base = EXTERNAL_BASE): number {
  const offset = address - base;
  if (offset < 0 || offset > MAX_OFFSET) {
    throw new EncodingError(`Address ${hex32(address)} is not encodable relative to ${hex32(base)}`);
  }
  return offset;
}

export function toExternalLine(instr: PatchInstruction, base = EXTERNAL_BASE): string {
  const offset = toExternalOffset(instr.targetAddress, base);
  const digits = Math.max(PATCH_WIDTH_BYTES[instr.width] * 2, 8);
  return `_L 0x${WIDTH_TAG[instr.width]}${hex(offset, 7)} 0x${hex(instr.value, digits)}`;
}

export function formatBlock(block: PatchBlock, base = EXTERNAL_BASE): string {
  const header = `${block.enabled === false ? "_C0" : "_C1"} ${block.title}`;
  return [header, ...block.instructions.map((i) => toExternalLine(i, base))].join("\n");
}

/** Several blocks emitted together, separated by one blank line */
export function joinBlocks(blocks: readonly string[]): string {
  return blocks.join("\n\n");
}
