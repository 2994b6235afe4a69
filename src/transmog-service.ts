/**
 * Named patch blocks for each kind of request.
 */
import { generateArmorPatch, generateSlotInvisibility, generateWeaponPatch, type ArmorRequestOptions } from "./code-generator.js";
import { EmptySelectionError } from "./errors.js";
import type { PatchBlock } from "./patch-encoder.js";
import { displayName } from "./selection.js";
import { SLOT_LABELS, type ArmorSet, type ArmorSlot, type Catalog, type PatchInstruction, type WeaponSet } from "./types.js";

export interface ArmorSelection extends ArmorRequestOptions {
  slot: ArmorSlot;
  source: ArmorSet;
  /** null = invisible */
  target: ArmorSet | null;
}

export interface ArmorSlotResult {
  slot: ArmorSlot;
  instructions: PatchInstruction[];
  sourceName: string;
  targetName: string;
  invisible: boolean;
}

export function weaponBlock(catalog: Catalog, source: WeaponSet, target: WeaponSet): PatchBlock {
  return {
    title: `Weapon Transmog: ${displayName(source.names)} -> ${displayName(target.names)}`,
    instructions: generateWeaponPatch(catalog, source, target),
  };
}

export function armorSlotResult(catalog: Catalog, selection: ArmorSelection): ArmorSlotResult {
  const { slot, source, target } = selection;
  return {
    slot,
    instructions: generateArmorPatch(catalog, slot, source, target, selection),
    sourceName: displayName(source.names),
    targetName: target === null ? "Invisible" : displayName(target.names),
    invisible: target === null,
  };
}

/**
 * One block for one or more slots. The title names the single source/target
 * when there is one, otherwise "Mixed" / "Custom"; invisible slots are listed.
 */
export function armorBlock(results: readonly ArmorSlotResult[]): PatchBlock {
  if (!results.length) throw new EmptySelectionError("source");

  const sources = new Set(results.map((r) => r.sourceName));
  const targets = new Set(results.filter((r) => !r.invisible).map((r) => r.targetName));
  const invisibleSlots = results.filter((r) => r.invisible).map((r) => SLOT_LABELS[r.slot].toLowerCase());

  const src = sources.size === 1 ? [...sources][0] : "Mixed";
  const tgt = targets.size === 1 ? [...targets][0] : targets.size === 0 ? "Invisible" : "Custom";
  const suffix = invisibleSlots.length ? ` (invisible ${invisibleSlots.join(", ")})` : "";

  return {
    title: `Armor Transmog: ${src} -> ${tgt}${suffix}`,
    instructions: results.flatMap((r) => r.instructions),
  };
}

export function slotInvisibilityBlock(catalog: Catalog, slot: ArmorSlot): PatchBlock {
  const instructions = generateSlotInvisibility(catalog, slot);
  return {
    title: `Universal Invisible ${SLOT_LABELS[slot]} (${instructions.length} entries)`,
    instructions,
  };
}
