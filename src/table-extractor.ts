/**
 * Table extractor — reads fixed-size entries out of a MemoryImage.
 *
 * Pure functions over a read-only image. Each table is extracted on its own:
 * a failure aborts that table only and comes back as a value.
 */
import { OutOfBoundsError, TransmogError, UnresolvedPointerError, errorMessage, hex32 } from "./errors.js";
import logger from "./logger.js";
import type { MemoryImage } from "./memory-image.js";
import type { ArmorField, PointerTableLayout, TableBase, TableDescriptor, TableLayout, WeaponField } from "./table-layout.js";
import { ARMOR_SLOTS, type ArmorEntry, type ArmorSlot, type WeaponEntry } from "./types.js";

export interface RawEntry<F extends string> {
  index: number;
  address: number;
  values: ReadonlyMap<F, number>;
}

/** Value of a declared field; every declared field is read, so absence is a programming error */
export function fieldValue<F extends string>(entry: RawEntry<F>, name: F): number {
  const v = entry.values.get(name);
  if (v === undefined) throw new TransmogError("IMAGE", `Field "${name}" was not read for entry ${entry.index}`);
  return v;
}

export type ExtractionResult<R> =
  | { ok: true; table: string; baseAddress: number; records: R[] }
  | { ok: false; table: string; error: TransmogError };

export interface ExtractOptions<F extends string> {
  /** Stop before the first entry matching this predicate; the entry is not emitted */
  stopBefore?: (entry: RawEntry<F>) => boolean;
}

// ── Base address resolution ──────────────────────────────

/**
 * Resolve a table's base address. Pointer references go through the
 * allow-list: flag-word indices, unlisted indices and indices listed for
 * another table are refused, and the pointer read must land inside the image.
 */
export function resolveTableBase(
  image: MemoryImage,
  table: string,
  base: TableBase,
  pointers: PointerTableLayout,
): number {
  if (base.kind === "literal") return base.address;

  if (pointers.flagIndices.includes(base.index)) {
    throw new UnresolvedPointerError(table, base.index, "holds a flag word, not an address");
  }
  const owner = pointers.slots[base.index];
  if (owner === undefined) {
    throw new UnresolvedPointerError(table, base.index, "is not in the pointer allow-list");
  }
  if (owner !== table) {
    throw new UnresolvedPointerError(table, base.index, `belongs to table "${owner}"`);
  }
  const slotAddress = base.table + base.index * 4;
  const target = image.readU32(slotAddress);
  if (!image.contains(target)) {
    throw new UnresolvedPointerError(table, base.index, `points outside the image (${hex32(target)} read at ${hex32(slotAddress)})`);
  }
  if (base.expected !== undefined && base.expected !== target) {
    logger.warn(`Table "${table}" resolved to ${hex32(target)}, reference build has ${hex32(base.expected)}`, { module: "extractor" });
  }
  return target;
}

// ── Generic extraction ───────────────────────────────────

function toFailure<R>(table: string, e: unknown): ExtractionResult<R> {
  const error = e instanceof TransmogError ? e : new TransmogError("IMAGE", errorMessage(e));
  const where = e instanceof OutOfBoundsError ? ` at ${hex32(e.address)}` : "";
  logger.warn(`Extraction of table "${table}" failed${where}: ${error.message}`, { module: "extractor" });
  return { ok: false, table, error };
}

/**
 * Read every declared field of entries [0, entryCount). Nothing is filtered
 * or deduplicated here.
 */
export function extractTable<F extends string>(
  image: MemoryImage,
  descriptor: TableDescriptor<F>,
  pointers: PointerTableLayout,
  options: ExtractOptions<F> = {},
): ExtractionResult<RawEntry<F>> {
  try {
    const baseAddress = resolveTableBase(image, descriptor.name, descriptor.base, pointers);
    const records: RawEntry<F>[] = [];

    for (let index = 0; index < descriptor.entryCount; index++) {
      const address = baseAddress + index * descriptor.entrySize;
      const values = new Map<F, number>();
      for (const name in descriptor.fields) {
        const spec = descriptor.fields[name];
        values.set(name, image.readInt(address + spec.offset, spec.width, spec.signed));
      }
      const entry: RawEntry<F> = { index, address, values };
      if (options.stopBefore?.(entry)) break;
      records.push(entry);
    }

    logger.debug(`Table "${descriptor.name}" at ${hex32(baseAddress)}: ${records.length} entries`, { module: "extractor" });
    return { ok: true, table: descriptor.name, baseAddress, records };
  } catch (e) {
    return toFailure(descriptor.name, e);
  }
}

// ── Armor / weapon tables ────────────────────────────────

/** Max plausible weapon model / attack values; the table ends at the first entry outside them */
const WEAPON_MODEL_LIMIT = 1000;
const WEAPON_ATTACK_LIMIT = 2000;

export function isWeaponTerminator(entry: RawEntry<WeaponField>): boolean {
  const modelId = fieldValue(entry, "modelId");
  const attack = fieldValue(entry, "attack");
  return modelId > WEAPON_MODEL_LIMIT || attack > WEAPON_ATTACK_LIMIT || attack === 0;
}

export function extractArmorTable(
  image: MemoryImage,
  slot: ArmorSlot,
  descriptor: TableDescriptor<ArmorField>,
  pointers: PointerTableLayout,
  trimTrailingEmpty = false,
): ExtractionResult<ArmorEntry> {
  const raw = extractTable(image, descriptor, pointers);
  if (!raw.ok) return raw;

  const records: ArmorEntry[] = raw.records.map((e) => ({
    equipId: e.index,
    modelMale: fieldValue(e, "modelMale"),
    modelFemale: fieldValue(e, "modelFemale"),
    variantFlag: fieldValue(e, "variantFlag"),
    slot,
  }));

  // Last table in memory: its extent is the run before trailing all-zero entries
  if (trimTrailingEmpty) {
    while (records.length) {
      const last = records[records.length - 1];
      if (last.modelMale !== 0 || last.modelFemale !== 0 || last.variantFlag !== 0) break;
      records.pop();
    }
  }

  logger.info(`${slot.toUpperCase()} table: ${records.length} entries`, { module: "extractor" });
  return { ok: true, table: raw.table, baseAddress: raw.baseAddress, records };
}

export function extractWeaponTable(
  image: MemoryImage,
  descriptor: TableDescriptor<WeaponField> & { modelField: WeaponField },
  pointers: PointerTableLayout,
): ExtractionResult<WeaponEntry> {
  const raw = extractTable(image, descriptor, pointers, { stopBefore: isWeaponTerminator });
  if (!raw.ok) return raw;

  const records: WeaponEntry[] = raw.records.map((e) => ({
    entryIndex: e.index,
    modelId: fieldValue(e, descriptor.modelField),
    weaponType: fieldValue(e, "weaponType"),
  }));
  logger.info(`Weapon table: ${records.length} entries`, { module: "extractor" });
  return { ok: true, table: raw.table, baseAddress: raw.baseAddress, records };
}

export interface ExtractionRun {
  weapons: ExtractionResult<WeaponEntry>;
  armor: Record<ArmorSlot, ExtractionResult<ArmorEntry>>;
}

/**
 * Extract every declared table. Tables touch disjoint ranges of a read-only
 * image, so order does not matter and one failure never blocks another.
 */
export function extractAll(image: MemoryImage, layout: TableLayout): ExtractionRun {
  const lastSlot = ARMOR_SLOTS[ARMOR_SLOTS.length - 1];
  const extract = (slot: ArmorSlot) =>
    extractArmorTable(image, slot, layout.armor[slot], layout.pointerTable, slot === lastSlot);
  const armor: Record<ArmorSlot, ExtractionResult<ArmorEntry>> = {
    head: extract("head"),
    chest: extract("chest"),
    arms: extract("arms"),
    waist: extract("waist"),
    legs: extract("legs"),
  };
  return {
    weapons: extractWeaponTable(image, layout.weapon, layout.pointerTable),
    armor,
  };
}
