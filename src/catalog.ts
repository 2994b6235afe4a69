/**
 * Equipment catalog — the persisted document written by `build` and read by
 * every generator. The on-disk shape is snake_case with hex-string bases;
 * in memory it is an immutable, camel-cased Catalog.
 */
import { readFile, writeFile } from "fs/promises";
import { z } from "zod";
import { CatalogError, errorMessage } from "./errors.js";
import logger from "./logger.js";
import { UNKNOWN_WEAPON_TYPE } from "./equipment-grouper.js";
import { ARMOR_SLOTS, type ArmorSlot, type ArmorSlotTable, type Catalog, type WeaponSet } from "./types.js";

// ── Document schema ──────────────────────────────────────

const HexAddress = z
  .string()
  .regex(/^0x[0-9A-Fa-f]{1,8}$/, "expected a hex address like 0x08960750")
  .transform((s) => parseInt(s, 16));

const Index = z.number().int().min(0);

const VariantDoc = z.object({
  model_m: z.number().int(),
  model_f: z.number().int(),
  eids: z.array(Index).min(1, "variant has no equip IDs"),
});

const ArmorSetDoc = z.object({
  names: z.array(z.string()),
  variants: z.array(VariantDoc).min(1, "set has no variants"),
});

const ArmorSlotDoc = z.object({
  table_base: HexAddress,
  sets: z.array(ArmorSetDoc),
});

const WeaponDoc = z.object({
  names: z.array(z.string()),
  entries: z.array(Index).min(1, "weapon has no table entries"),
  type: z.string().default(UNKNOWN_WEAPON_TYPE),
});

export const CatalogDocumentSchema = z.object({
  weapon_table_base: HexAddress,
  weapon_entry_size: z.number().int().positive(),
  weapon_model_offset: z.number().int().min(0),
  armor_entry_size: z.number().int().positive(),
  weapons: z.record(z.string().regex(/^\d+$/, "weapon key must be a model number"), WeaponDoc),
  armor: z.object({
    head: ArmorSlotDoc.optional(),
    chest: ArmorSlotDoc.optional(),
    arms: ArmorSlotDoc.optional(),
    waist: ArmorSlotDoc.optional(),
    legs: ArmorSlotDoc.optional(),
  }),
});

/** Serialised form, as written to disk */
export interface CatalogDocument {
  weapon_table_base: string;
  weapon_entry_size: number;
  weapon_model_offset: number;
  armor_entry_size: number;
  weapons: Record<string, { names: string[]; entries: number[]; type: string }>;
  armor: Partial<Record<ArmorSlot, {
    table_base: string;
    sets: { names: string[]; variants: { model_m: number; model_f: number; eids: number[] }[] }[];
  }>>;
}

export const formatAddress = (n: number): string => `0x${(n >>> 0).toString(16).toUpperCase().padStart(8, "0")}`;

// ── Conversion ───────────────────────────────────────────

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/** Freeze a catalog in place; generators only ever see frozen catalogs */
export function freezeCatalog(catalog: Catalog): Catalog {
  return deepFreeze(catalog);
}

export function fromCatalogDocument(input: unknown): Catalog {
  const parsed = CatalogDocumentSchema.safeParse(input);
  if (!parsed.success) {
    throw new CatalogError(
      "Invalid equipment catalog",
      parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`),
    );
  }
  const doc = parsed.data;

  const weapons: WeaponSet[] = Object.entries(doc.weapons)
    .map(([model, w]) => ({ names: w.names, modelId: parseInt(model, 10), entries: w.entries, type: w.type }))
    .sort((a, b) => a.modelId - b.modelId);

  const armor: Partial<Record<ArmorSlot, ArmorSlotTable>> = {};
  for (const slot of ARMOR_SLOTS) {
    const s = doc.armor[slot];
    if (!s) continue;
    armor[slot] = {
      tableBase: s.table_base,
      sets: s.sets.map((set) => ({
        names: set.names,
        variants: set.variants.map((v) => ({ modelMale: v.model_m, modelFemale: v.model_f, eids: v.eids })),
      })),
    };
  }

  return freezeCatalog({
    weaponTableBase: doc.weapon_table_base,
    weaponEntrySize: doc.weapon_entry_size,
    weaponModelOffset: doc.weapon_model_offset,
    armorEntrySize: doc.armor_entry_size,
    weapons,
    armor,
  });
}

export function toCatalogDocument(catalog: Catalog): CatalogDocument {
  const weapons: CatalogDocument["weapons"] = {};
  for (const w of catalog.weapons) {
    weapons[String(w.modelId)] = { names: [...w.names], entries: [...w.entries], type: w.type };
  }
  const armor: CatalogDocument["armor"] = {};
  for (const slot of ARMOR_SLOTS) {
    const table = catalog.armor[slot];
    if (!table) continue;
    armor[slot] = {
      table_base: formatAddress(table.tableBase),
      sets: table.sets.map((s) => ({
        names: [...s.names],
        variants: s.variants.map((v) => ({ model_m: v.modelMale, model_f: v.modelFemale, eids: [...v.eids] })),
      })),
    };
  }
  return {
    weapon_table_base: formatAddress(catalog.weaponTableBase),
    weapon_entry_size: catalog.weaponEntrySize,
    weapon_model_offset: catalog.weaponModelOffset,
    armor_entry_size: catalog.armorEntrySize,
    weapons,
    armor,
  };
}

// ── Persistence ──────────────────────────────────────────

export async function loadCatalog(path: string): Promise<Catalog> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (e) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") throw new CatalogError(`${path} not found. Run "transmog build" first.`);
    throw e;
  }
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (e) {
    throw new CatalogError(`${path} is not valid JSON: ${errorMessage(e)}`);
  }
  const catalog = fromCatalogDocument(json);
  const slots = ARMOR_SLOTS.filter((s) => catalog.armor[s]).length;
  logger.debug(`Catalog loaded from ${path}: ${catalog.weapons.length} weapons, ${slots} armor slots`, { module: "catalog" });
  return catalog;
}

export async function saveCatalog(path: string, catalog: Catalog): Promise<number> {
  const text = JSON.stringify(toCatalogDocument(catalog), null, 2);
  await writeFile(path, text, "utf8");
  const bytes = Buffer.byteLength(text);
  logger.info(`Wrote ${path} (${bytes.toLocaleString()} bytes)`, { module: "catalog" });
  return bytes;
}

/** Slot table or a CatalogError naming the missing slot */
export function requireSlot(catalog: Catalog, slot: ArmorSlot): ArmorSlotTable {
  const table = catalog.armor[slot];
  if (!table) throw new CatalogError(`Catalog has no ${slot} table (its extraction failed)`);
  return table;
}
