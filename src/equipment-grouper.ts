/**
 * Equipment grouper — turns raw table entries into selectable equipment sets.
 *
 * Armor: Blademaster/Gunner pairs (and consecutive universal pairs) become one
 * set with two variants; identical sets at different equip IDs are merged.
 * Weapons: every table index sharing a model ID is one set.
 */
import logger from "./logger.js";
import type { ArmorNameTables, ModelNames } from "./name-source.js";
import {
  KNOWN_VARIANT_FLAGS,
  VARIANT_FLAG,
  type ArmorEntry,
  type ArmorSet,
  type ArmorSlot,
  type WeaponEntry,
  type WeaponSet,
} from "./types.js";

export const NOTHING_EQUIPPED = "Nothing Equipped";
export const UNKNOWN_WEAPON_TYPE = "?";

export type GroupingWarningKind = "UnknownVariantFlag" | "UnpairedBlademaster" | "UnpairedGunner" | "MixedWeaponType";

/** AmbiguousGrouping: the entry is kept under a single-variant set */
export interface GroupingWarning {
  kind: GroupingWarningKind;
  table: string;
  id: number;
  flag?: number;
  message: string;
}

export interface GroupingResult<S> {
  sets: S[];
  warnings: GroupingWarning[];
  skipped: number;
}

interface MutableVariant {
  modelMale: number;
  modelFemale: number;
  eids: number[];
}

interface MutableArmorSet {
  names: string[];
  variants: MutableVariant[];
}

const flagHex = (flag: number) => `0x${flag.toString(16).toUpperCase().padStart(2, "0")}`;

// ── Names ────────────────────────────────────────────────

export function lookupArmorNames(modelMale: number, modelFemale: number, names: ArmorNameTables): string[] {
  if (modelMale === 0 && modelFemale === 0) return [NOTHING_EQUIPPED];
  if (modelMale === 0 && modelFemale > 0) {
    return [...(names.female.get(modelFemale) ?? [`Female-only (model f:${modelFemale})`])];
  }
  if (modelFemale === 0 && modelMale > 0) {
    return [...(names.male.get(modelMale) ?? [`Male-only (model m:${modelMale})`])];
  }
  const male = names.male.get(modelMale);
  const found = male?.length ? male : names.female.get(modelFemale);
  return found?.length ? [...found] : [`Unknown (model ${modelMale}/${modelFemale})`];
}

export function isSentinelSet(set: Pick<ArmorSet, "names">): boolean {
  return set.names.length === 1 && set.names[0] === NOTHING_EQUIPPED;
}

// ── Armor ────────────────────────────────────────────────

function isPadding(e: ArmorEntry): boolean {
  return e.modelMale === 0 && e.modelFemale === 0 && !KNOWN_VARIANT_FLAGS.has(e.variantFlag);
}

function pairsWith(a: ArmorEntry, b: ArmorEntry): boolean {
  if (b.equipId !== a.equipId + 1) return false;
  if (a.variantFlag === VARIANT_FLAG.BLADEMASTER && b.variantFlag === VARIANT_FLAG.GUNNER) return true;
  return a.variantFlag === VARIANT_FLAG.UNIVERSAL
    && b.variantFlag === VARIANT_FLAG.UNIVERSAL
    && a.modelMale > 0
    && b.modelMale === a.modelMale + 1;
}

const variantOf = (e: ArmorEntry): MutableVariant => ({ modelMale: e.modelMale, modelFemale: e.modelFemale, eids: [e.equipId] });

const setKey = (s: MutableArmorSet) => s.variants.map((v) => `${v.modelMale},${v.modelFemale}`).join("|");

/**
 * Group one slot's entries. Input order does not affect membership: entries
 * are sorted by equip ID first.
 */
export function groupArmor(slot: ArmorSlot, entries: readonly ArmorEntry[], names: ArmorNameTables): GroupingResult<ArmorSet> {
  const sorted = [...entries].sort((a, b) => a.equipId - b.equipId);
  const sets: MutableArmorSet[] = [];
  const warnings: GroupingWarning[] = [];
  let skipped = 0;

  const warn = (kind: GroupingWarningKind, e: ArmorEntry, message: string) => {
    warnings.push({ kind, table: slot, id: e.equipId, flag: e.variantFlag, message });
    logger.warn(`${slot} eid ${e.equipId}: ${message}`, { module: "grouper" });
  };

  let i = 0;
  while (i < sorted.length) {
    const cur = sorted[i];
    if (isPadding(cur)) {
      skipped++;
      i++;
      continue;
    }

    const next = sorted[i + 1];
    if (next && pairsWith(cur, next)) {
      let setNames = lookupArmorNames(cur.modelMale, cur.modelFemale, names);
      const secondNames = lookupArmorNames(next.modelMale, next.modelFemale, names);
      if (secondNames.length && secondNames.join("\u0000") !== setNames.join("\u0000")) {
        setNames = [...setNames, ...secondNames];
      }
      sets.push({ names: setNames, variants: [variantOf(cur), variantOf(next)] });
      i += 2;
      continue;
    }

    if (!KNOWN_VARIANT_FLAGS.has(cur.variantFlag)) {
      warn("UnknownVariantFlag", cur, `unknown variant flag ${flagHex(cur.variantFlag)}, kept as a single variant`);
    } else if (cur.variantFlag === VARIANT_FLAG.BLADEMASTER) {
      warn("UnpairedBlademaster", cur, "Blademaster entry has no Gunner partner, kept as a single variant");
    } else if (cur.variantFlag === VARIANT_FLAG.GUNNER) {
      warn("UnpairedGunner", cur, "Gunner entry has no Blademaster partner, kept as a single variant");
    }
    sets.push({ names: lookupArmorNames(cur.modelMale, cur.modelFemale, names), variants: [variantOf(cur)] });
    i++;
  }

  // Same visual set at several equip IDs: fold the later ones into the first
  const merged = new Map<string, MutableArmorSet>();
  for (const s of sets) {
    const key = setKey(s);
    const existing = merged.get(key);
    if (!existing) {
      merged.set(key, s);
      continue;
    }
    s.variants.forEach((v, j) => existing.variants[j].eids.push(...v.eids));
  }

  const result = [...merged.values()];
  logger.debug(`${slot}: ${result.length} sets from ${sorted.length} entries (${skipped} padding)`, { module: "grouper" });
  return { sets: result, warnings, skipped };
}

// ── Weapons ──────────────────────────────────────────────

/**
 * One set per model ID, holding every entry index that renders it regardless
 * of upgrade tier. Sets come out ordered by model ID, entries ascending.
 */
export function groupWeapons(entries: readonly WeaponEntry[], names: ModelNames): GroupingResult<WeaponSet> {
  const byModel = new Map<number, WeaponEntry[]>();
  for (const e of entries) {
    const list = byModel.get(e.modelId);
    if (list) list.push(e);
    else byModel.set(e.modelId, [e]);
  }

  const warnings: GroupingWarning[] = [];
  const sets: WeaponSet[] = [];
  for (const modelId of [...byModel.keys()].sort((a, b) => a - b)) {
    const group = byModel.get(modelId) ?? [];
    const types = new Set(group.map((e) => e.weaponType));
    let type = UNKNOWN_WEAPON_TYPE;
    if (types.size === 1) {
      type = String(group[0].weaponType);
    } else {
      const message = `model ${modelId} spans weapon types ${[...types].sort((a, b) => a - b).join(", ")}`;
      warnings.push({ kind: "MixedWeaponType", table: "weapons", id: modelId, message });
      logger.warn(message, { module: "grouper" });
    }
    sets.push({
      names: [...(names.get(modelId) ?? [`Unknown Weapon (model ${modelId})`])],
      modelId,
      entries: group.map((e) => e.entryIndex).sort((a, b) => a - b),
      type,
    });
  }

  const total = entries.length;
  logger.info(`Weapons: ${total} entries, ${sets.length} unique models`, { module: "grouper" });
  return { sets, warnings, skipped: 0 };
}
