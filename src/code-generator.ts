/**
 * Code generator — turns a source → target equipment choice into patch
 * instructions that overwrite only visual-model fields.
 *
 * Armor: one Word per source equip ID, packed (female << 16 | male).
 * Weapons: one Half per source table index, written at the model field.
 * Stat fields are never addressed.
 */
import { requireSlot } from "./catalog.js";
import { EmptySelectionError, InvalidSelectionError } from "./errors.js";
import logger from "./logger.js";
import { patch, type ArmorSet, type ArmorSlot, type Catalog, type ModelPair, type PatchInstruction, type WeaponSet } from "./types.js";

export const INVISIBLE: ModelPair = Object.freeze({ modelMale: 0, modelFemale: 0 });

// ── Substitution policy ──────────────────────────────────

/** How source variant i picks its target model pair */
export type TargetRule =
  | { kind: "invisible" }
  | { kind: "forced"; variantIndex: number }
  | { kind: "matched" };

/** Which half-word receives which gender's model */
export type GenderOrder = "default" | "swapped";

export interface SubstitutionPolicy {
  target: TargetRule;
  gender: GenderOrder;
}

export interface ArmorRequestOptions {
  forcedVariantIndex?: number;
  swapGender?: boolean;
}

/**
 * Decide the policy for a request. An invisible target wins over a forced
 * variant: every source variant gets (0,0).
 */
export function resolvePolicy(target: ArmorSet | null, options: ArmorRequestOptions = {}): SubstitutionPolicy {
  const gender: GenderOrder = options.swapGender ? "swapped" : "default";
  if (target === null) return { target: { kind: "invisible" }, gender };

  const forced = options.forcedVariantIndex;
  if (forced === undefined) return { target: { kind: "matched" }, gender };
  if (!Number.isInteger(forced) || forced < 0 || forced >= target.variants.length) {
    throw new InvalidSelectionError(`Forced variant ${forced} does not exist (target has ${target.variants.length} variant(s))`);
  }
  return { target: { kind: "forced", variantIndex: forced }, gender };
}

/**
 * Target model pair for source variant `sourceIndex`. Matched mode pairs by
 * index and falls back to target variant 0 when the target has fewer variants.
 */
export function selectTargetModels(rule: TargetRule, target: ArmorSet | null, sourceIndex: number): ModelPair {
  switch (rule.kind) {
    case "invisible":
      return INVISIBLE;
    case "forced":
    case "matched": {
      if (!target || target.variants.length === 0) throw new EmptySelectionError("target");
      const index = rule.kind === "forced"
        ? rule.variantIndex
        : sourceIndex < target.variants.length ? sourceIndex : 0;
      return target.variants[index];
    }
  }
}

/** 32-bit entry head: high half = female, low half = male (swapped exchanges them) */
export function packModelPair(pair: ModelPair, gender: GenderOrder): number {
  const male = pair.modelMale & 0xffff;
  const female = pair.modelFemale & 0xffff;
  const value = gender === "swapped" ? (male << 16) | female : (female << 16) | male;
  return value >>> 0;
}

// ── Armor ────────────────────────────────────────────────

export function armorEntryAddress(tableBase: number, entrySize: number, eid: number): number {
  return tableBase + eid * entrySize;
}

/**
 * Patch every equip ID of every source variant to show the target's models.
 * `target === null` makes the slot invisible for this source set.
 */
export function generateArmorPatch(
  catalog: Catalog,
  slot: ArmorSlot,
  source: ArmorSet | null | undefined,
  target: ArmorSet | null | undefined,
  options: ArmorRequestOptions = {},
): PatchInstruction[] {
  if (!source || source.variants.length === 0) throw new EmptySelectionError("source");
  if (target === undefined) throw new EmptySelectionError("target");
  if (target !== null && target.variants.length === 0) throw new EmptySelectionError("target");

  const { tableBase } = requireSlot(catalog, slot);
  const policy = resolvePolicy(target, options);
  const out: PatchInstruction[] = [];

  source.variants.forEach((variant, vi) => {
    const value = packModelPair(selectTargetModels(policy.target, target, vi), policy.gender);
    for (const eid of variant.eids) {
      out.push(patch(armorEntryAddress(tableBase, catalog.armorEntrySize, eid), "Word", value));
    }
  });

  logger.debug(`${slot}: ${out.length} armor patch(es), policy ${policy.target.kind}/${policy.gender}`, { module: "generator" });
  return out;
}

/**
 * Zero every non-sentinel entry in a slot so whatever is equipped renders
 * as nothing.
 */
export function generateSlotInvisibility(catalog: Catalog, slot: ArmorSlot): PatchInstruction[] {
  const { tableBase, sets } = requireSlot(catalog, slot);
  const out: PatchInstruction[] = [];
  for (const set of sets) {
    for (const variant of set.variants) {
      if (variant.modelMale === 0 && variant.modelFemale === 0) continue;
      for (const eid of variant.eids) {
        out.push(patch(armorEntryAddress(tableBase, catalog.armorEntrySize, eid), "Word", 0));
      }
    }
  }
  return out;
}

// ── Weapons ──────────────────────────────────────────────

export function weaponModelAddress(catalog: Catalog, entryIndex: number): number {
  return catalog.weaponTableBase + entryIndex * catalog.weaponEntrySize + catalog.weaponModelOffset;
}

/** One Half write of the target model per source entry; weapon types need not match */
export function generateWeaponPatch(
  catalog: Catalog,
  source: WeaponSet | null | undefined,
  target: WeaponSet | null | undefined,
): PatchInstruction[] {
  if (!source || source.entries.length === 0) throw new EmptySelectionError("source");
  if (!target) throw new EmptySelectionError("target");
  return source.entries.map((idx) => patch(weaponModelAddress(catalog, idx), "Half", target.modelId));
}
