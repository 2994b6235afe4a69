/**
 * Table layout — where the equipment tables live in RAM and how their entries are laid out.
 *
 * All constants here were located by hand against a single game build; they are
 * configuration data, validated once at load time, never derived at runtime.
 */
import { z } from "zod";
import { CatalogError } from "./errors.js";
import type { FieldWidth } from "./memory-image.js";
import { ARMOR_SLOTS, type ArmorSlot } from "./types.js";

// ── Descriptor types ─────────────────────────────────────

export interface FieldSpec {
  offset: number;
  width: FieldWidth;
  signed: boolean;
}

export interface LiteralBase {
  kind: "literal";
  address: number;
}

/** Base address read from slot `index` of a secondary table of u32 pointers */
export interface PointerTableRef {
  kind: "pointer";
  table: number;
  index: number;
  /** Address the pointer held in the reference build; a mismatch is logged, not fatal */
  expected?: number;
}

export type TableBase = LiteralBase | PointerTableRef;

export interface TableDescriptor<F extends string = string> {
  name: string;
  base: TableBase;
  entrySize: number;
  /** Upper bound on entries read */
  entryCount: number;
  fields: Record<F, FieldSpec>;
}

/**
 * Allow-list for pointer-table indirection. Only indices listed in `slots`
 * are dereferenced; `flagIndices` hold non-address flag words.
 */
export interface PointerTableLayout {
  address: number;
  slots: Readonly<Record<number, string>>;
  flagIndices: readonly number[];
}

export type ArmorField = "modelMale" | "modelFemale" | "variantFlag";
export type WeaponField = "weaponType" | "attack" | "modelId";

export interface TableLayout {
  weapon: TableDescriptor<WeaponField> & { modelField: WeaponField };
  armor: Record<ArmorSlot, TableDescriptor<ArmorField>>;
  pointerTable: PointerTableLayout;
}

// ── Reference build constants ────────────────────────────

/** Address subtracted from every patch address before encoding */
export const EXTERNAL_BASE = 0x08800000;

export const WEAPON_TABLE_BASE = 0x089574e8;
export const WEAPON_ENTRY_SIZE = 24;
export const WEAPON_MODEL_OFFSET = 16;
export const WEAPON_MAX_ENTRIES = 2000;

export const ARMOR_ENTRY_SIZE = 40;

/** Literal table bases, ordered by address */
export const ARMOR_TABLE_BASES: Record<ArmorSlot, number> = {
  head: 0x08960750,
  chest: 0x08964b70,
  arms: 0x08968d10,
  waist: 0x0896cd48,
  legs: 0x08970d30,
};

/** Gap to the next table / 40; legs is bounded by its trailing zero run instead */
export const ARMOR_MAX_ENTRIES: Record<ArmorSlot, number> = {
  head: 436,
  chest: 420,
  arms: 411,
  waist: 409,
  legs: 420,
};

/** Armor pointer table, indexed by equipment type (1 = head … 4 = waist) */
export const ARMOR_POINTER_TABLE: PointerTableLayout = {
  address: 0x08975970,
  slots: { 1: "head", 2: "chest", 3: "arms", 4: "waist" },
  flagIndices: [5, 6],
};

const POINTER_INDEX: Partial<Record<ArmorSlot, number>> = { head: 1, chest: 2, arms: 3, waist: 4 };

export const ARMOR_FIELDS: Record<ArmorField, FieldSpec> = {
  modelMale: { offset: 0, width: 2, signed: true },
  modelFemale: { offset: 2, width: 2, signed: true },
  variantFlag: { offset: 4, width: 1, signed: false },
};

export const WEAPON_FIELDS: Record<WeaponField, FieldSpec> = {
  weaponType: { offset: 0, width: 1, signed: false },
  attack: { offset: 2, width: 2, signed: false },
  modelId: { offset: WEAPON_MODEL_OFFSET, width: 2, signed: false },
};

function armorDescriptor(slot: ArmorSlot): TableDescriptor<ArmorField> {
  const index = POINTER_INDEX[slot];
  const base: TableBase = index === undefined
    ? { kind: "literal", address: ARMOR_TABLE_BASES[slot] }
    : { kind: "pointer", table: ARMOR_POINTER_TABLE.address, index, expected: ARMOR_TABLE_BASES[slot] };
  return {
    name: slot,
    base,
    entrySize: ARMOR_ENTRY_SIZE,
    entryCount: ARMOR_MAX_ENTRIES[slot],
    fields: ARMOR_FIELDS,
  };
}

export const DEFAULT_LAYOUT: TableLayout = {
  weapon: {
    name: "weapons",
    base: { kind: "literal", address: WEAPON_TABLE_BASE },
    entrySize: WEAPON_ENTRY_SIZE,
    entryCount: WEAPON_MAX_ENTRIES,
    fields: WEAPON_FIELDS,
    modelField: "modelId",
  },
  armor: {
    head: armorDescriptor("head"),
    chest: armorDescriptor("chest"),
    arms: armorDescriptor("arms"),
    waist: armorDescriptor("waist"),
    legs: armorDescriptor("legs"),
  },
  pointerTable: ARMOR_POINTER_TABLE,
};

/** Same layout with every armor table at its literal base */
export function literalArmorLayout(layout: TableLayout = DEFAULT_LAYOUT): TableLayout {
  const armor = { ...layout.armor };
  for (const slot of ARMOR_SLOTS) {
    armor[slot] = { ...armor[slot], base: { kind: "literal", address: ARMOR_TABLE_BASES[slot] } };
  }
  return { ...layout, armor };
}

// ── Validation ───────────────────────────────────────────

const u32 = z.number().int().min(0).max(0xffffffff);

const FieldSchema = z.object({
  offset: z.number().int().min(0),
  width: z.union([z.literal(1), z.literal(2), z.literal(4)]),
  signed: z.boolean(),
});

const BaseSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("literal"), address: u32 }),
  z.object({ kind: z.literal("pointer"), table: u32, index: z.number().int().min(0), expected: u32.optional() }),
]);

const DescriptorSchema = z
  .object({
    name: z.string().min(1),
    base: BaseSchema,
    entrySize: z.number().int().positive(),
    entryCount: z.number().int().positive(),
    fields: z.record(FieldSchema),
  })
  .superRefine((d, ctx) => {
    for (const [name, f] of Object.entries(d.fields)) {
      if (f.offset + f.width > d.entrySize) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["fields", name],
          message: `field ${name} (+${f.offset}, ${f.width}B) exceeds entry size ${d.entrySize}`,
        });
      }
    }
  });

const PointerTableSchema = z
  .object({
    address: u32,
    slots: z.record(z.string()),
    flagIndices: z.array(z.number().int().min(0)),
  })
  .superRefine((p, ctx) => {
    for (const idx of p.flagIndices) {
      if (String(idx) in p.slots) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["slots", String(idx)], message: `index ${idx} is both a slot and a flag word` });
      }
    }
  });

function issuesOf(prefix: string, error: z.ZodError): string[] {
  return error.issues.map((i) => `${[prefix, ...i.path].join(".")}: ${i.message}`);
}

/**
 * Check a layout before use. Throws CatalogError listing every problem found.
 */
export function validateLayout(layout: TableLayout): TableLayout {
  const issues: string[] = [];
  const check = (prefix: string, schema: z.ZodTypeAny, value: unknown) => {
    const r = schema.safeParse(value);
    if (!r.success) issues.push(...issuesOf(prefix, r.error));
  };

  check("weapon", DescriptorSchema, layout.weapon);
  if (!(layout.weapon.modelField in layout.weapon.fields)) issues.push(`weapon.modelField: unknown field ${layout.weapon.modelField}`);
  for (const slot of ARMOR_SLOTS) {
    check(`armor.${slot}`, DescriptorSchema, layout.armor[slot]);
    const base = layout.armor[slot].base;
    if (base.kind !== "pointer") continue;
    if (base.table !== layout.pointerTable.address) {
      issues.push(`armor.${slot}.base: pointer table 0x${base.table.toString(16)} is not the declared pointer table`);
    }
    const owner = layout.pointerTable.slots[base.index];
    if (owner !== undefined && owner !== layout.armor[slot].name) {
      issues.push(`armor.${slot}.base: pointer index ${base.index} is listed for "${owner}"`);
    }
  }
  check("pointerTable", PointerTableSchema, layout.pointerTable);

  if (issues.length) throw new CatalogError("Invalid table layout", issues);
  return layout;
}
