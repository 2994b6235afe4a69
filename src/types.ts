/**
 * Equipment data model shared by extraction, grouping, catalog and generation.
 */

export const ARMOR_SLOTS = ["head", "chest", "arms", "waist", "legs"] as const;
export type ArmorSlot = (typeof ARMOR_SLOTS)[number];

export const SLOT_LABELS: Record<ArmorSlot, string> = {
  head: "Head",
  chest: "Chest",
  arms: "Arms",
  waist: "Waist",
  legs: "Legs",
};

export function isArmorSlot(value: string): value is ArmorSlot {
  return ARMOR_SLOTS.some((s) => s === value);
}

// ── Raw table records ────────────────────────────────────

/** Variant flag byte at +4 of an armor entry */
export const VARIANT_FLAG = {
  BLADEMASTER: 0x07,
  GUNNER: 0x0b,
  UNIVERSAL: 0x0f,
} as const;

export const KNOWN_VARIANT_FLAGS: ReadonlySet<number> = new Set<number>(Object.values(VARIANT_FLAG));

export interface ArmorEntry {
  equipId: number;
  modelMale: number;
  modelFemale: number;
  variantFlag: number;
  slot: ArmorSlot;
}

export interface WeaponEntry {
  entryIndex: number;
  modelId: number;
  /** Class byte at +0 of the entry */
  weaponType: number;
}

// ── Grouped sets ─────────────────────────────────────────

export interface ModelPair {
  readonly modelMale: number;
  readonly modelFemale: number;
}

export interface ArmorVariant extends ModelPair {
  readonly eids: readonly number[];
}

export interface ArmorSet {
  readonly names: readonly string[];
  readonly variants: readonly ArmorVariant[];
}

export interface WeaponSet {
  readonly names: readonly string[];
  readonly modelId: number;
  readonly entries: readonly number[];
  readonly type: string;
}

export interface ArmorSlotTable {
  readonly tableBase: number;
  readonly sets: readonly ArmorSet[];
}

/** Immutable equipment catalog; the only input the generators read */
export interface Catalog {
  readonly weaponTableBase: number;
  readonly weaponEntrySize: number;
  readonly weaponModelOffset: number;
  readonly armorEntrySize: number;
  /** Ordered by modelId */
  readonly weapons: readonly WeaponSet[];
  readonly armor: Readonly<Partial<Record<ArmorSlot, ArmorSlotTable>>>;
}

// ── Patch instructions ───────────────────────────────────

export type PatchWidth = "Byte" | "Half" | "Word";

export const PATCH_WIDTH_BYTES: Record<PatchWidth, 1 | 2 | 4> = { Byte: 1, Half: 2, Word: 4 };

export interface PatchInstruction {
  /** Absolute virtual address */
  readonly targetAddress: number;
  readonly width: PatchWidth;
  /** Always masked to `width` */
  readonly value: number;
}

export function maskToWidth(value: number, width: PatchWidth): number {
  switch (width) {
    case "Byte": return value & 0xff;
    case "Half": return value & 0xffff;
    case "Word": return value >>> 0;
  }
}

export function patch(targetAddress: number, width: PatchWidth, value: number): PatchInstruction {
  return { targetAddress: targetAddress >>> 0, width, value: maskToWidth(value, width) };
}
