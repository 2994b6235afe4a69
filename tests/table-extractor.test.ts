/**
 * Tests for table extraction — base resolution, per-table failure values,
 * the weapon terminator and trailing-entry trimming
 */
import { describe, expect, it } from "vitest";
import { OutOfBoundsError, UnresolvedPointerError } from "../src/errors.js";
import { MemoryImage } from "../src/memory-image.js";
import {
  extractAll,
  extractArmorTable,
  extractTable,
  extractWeaponTable,
  fieldValue,
  isWeaponTerminator,
  resolveTableBase,
  type RawEntry,
} from "../src/table-extractor.js";
import { ARMOR_POINTER_TABLE, DEFAULT_LAYOUT, literalArmorLayout, type WeaponField } from "../src/table-layout.js";
import { ImageBuilder } from "./helpers/image-builder.js";

const POINTER_TABLE = ARMOR_POINTER_TABLE.address;

describe("resolveTableBase", () => {
  const image = new ImageBuilder().withDefaultPointers().image();

  it("returns a literal base as is", () => {
    expect(resolveTableBase(image, "legs", { kind: "literal", address: 0x08970d30 }, ARMOR_POINTER_TABLE)).toBe(0x08970d30);
  });

  it("dereferences an allow-listed pointer slot", () => {
    expect(resolveTableBase(image, "chest", { kind: "pointer", table: POINTER_TABLE, index: 2 }, ARMOR_POINTER_TABLE)).toBe(0x08964b70);
  });

  it("still resolves when the pointer differs from the expected address", () => {
    const base = { kind: "pointer", table: POINTER_TABLE, index: 1, expected: 0x08960000 } as const;
    expect(resolveTableBase(image, "head", base, ARMOR_POINTER_TABLE)).toBe(0x08960750);
  });

  it.each([5, 6])("refuses flag-word index %i", (index) => {
    expect(() => resolveTableBase(image, "x", { kind: "pointer", table: POINTER_TABLE, index }, ARMOR_POINTER_TABLE))
      .toThrow(UnresolvedPointerError);
  });

  it("refuses an index missing from the allow-list", () => {
    expect(() => resolveTableBase(image, "x", { kind: "pointer", table: POINTER_TABLE, index: 0 }, ARMOR_POINTER_TABLE))
      .toThrow('Table "x": pointer-table index 0 is not in the pointer allow-list');
  });

  it("refuses an index listed for another table", () => {
    const base = { kind: "pointer", table: POINTER_TABLE, index: 1 } as const;
    expect(() => resolveTableBase(image, "legs", base, ARMOR_POINTER_TABLE))
      .toThrow('Table "legs": pointer-table index 1 belongs to table "head"');
  });

  it("refuses a pointer that leads outside the image", () => {
    const bad = new ImageBuilder().withDefaultPointers().pointer(3, 0x00000010).image();
    expect(() => resolveTableBase(bad, "arms", { kind: "pointer", table: POINTER_TABLE, index: 3 }, ARMOR_POINTER_TABLE))
      .toThrow(UnresolvedPointerError);
  });
});

describe("extractArmorTable", () => {
  it("reads every entry with signed model fields and no filtering", () => {
    const image = new ImageBuilder()
      .withDefaultPointers()
      .armor("head", 0, 0, 0, 0x0f)
      .armor("head", 1, 12, 13, 0x07)
      .armor("head", 2, -1, 300, 0x0b)
      .image();
    const result = extractArmorTable(image, "head", DEFAULT_LAYOUT.armor.head, ARMOR_POINTER_TABLE);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.baseAddress).toBe(0x08960750);
    expect(result.records).toHaveLength(436);
    expect(result.records[1]).toEqual({ equipId: 1, modelMale: 12, modelFemale: 13, variantFlag: 7, slot: "head" });
    expect(result.records[2]).toEqual({ equipId: 2, modelMale: -1, modelFemale: 300, variantFlag: 0x0b, slot: "head" });
    expect(result.records[3]).toEqual({ equipId: 3, modelMale: 0, modelFemale: 0, variantFlag: 0, slot: "head" });
  });

  it("returns a failure value naming the table and address when the image is too short", () => {
    const image = MemoryImage.fromBuffer(new Uint8Array(400), 0x08960750);
    const result = extractArmorTable(image, "head", literalArmorLayout().armor.head, ARMOR_POINTER_TABLE);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.table).toBe("head");
    expect(result.error).toBeInstanceOf(OutOfBoundsError);
    expect(result.error instanceof OutOfBoundsError && result.error.address).toBe(0x089608e0);
  });

  it("trims trailing all-zero entries when asked", () => {
    const image = new ImageBuilder()
      .armor("legs", 0, 0, 0, 0x0f)
      .armor("legs", 1, 5, 5, 0x0f)
      .armor("legs", 2, 6, 6, 0x0f)
      .image();
    const result = extractArmorTable(image, "legs", DEFAULT_LAYOUT.armor.legs, ARMOR_POINTER_TABLE, true);

    expect(result.ok && result.records.map((r) => r.equipId)).toEqual([0, 1, 2]);
  });
});

describe("weapon table", () => {
  const entry = (values: [WeaponField, number][]): RawEntry<WeaponField> => ({ index: 0, address: 0, values: new Map(values) });

  it.each([
    [1001, 100, true],
    [1000, 100, false],
    [10, 2001, true],
    [10, 2000, false],
    [10, 0, true],
  ])("model %i / attack %i terminates: %s", (model, attack, expected) => {
    expect(isWeaponTerminator(entry([["modelId", model], ["attack", attack], ["weaponType", 0]]))).toBe(expected);
  });

  it("fieldValue throws for a field that was not read", () => {
    expect(() => fieldValue(entry([["attack", 1]]), "modelId")).toThrow('Field "modelId" was not read for entry 0');
  });

  it("stops before the first terminator entry", () => {
    const image = new ImageBuilder()
      .weapon(0, { type: 3, attack: 100, model: 10 })
      .weapon(1, { type: 3, attack: 150, model: 10 })
      .weapon(2, { type: 5, attack: 200, model: 242 })
      .weapon(4, { type: 5, attack: 200, model: 243 })
      .image();
    const result = extractWeaponTable(image, DEFAULT_LAYOUT.weapon, ARMOR_POINTER_TABLE);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.baseAddress).toBe(0x089574e8);
    expect(result.records).toEqual([
      { entryIndex: 0, modelId: 10, weaponType: 3 },
      { entryIndex: 1, modelId: 10, weaponType: 3 },
      { entryIndex: 2, modelId: 242, weaponType: 5 },
    ]);
  });

  it("computes entry addresses from the base and entry size", () => {
    const image = new ImageBuilder().weapon(0, { type: 1, attack: 50, model: 7 }).weapon(1, { type: 1, attack: 60, model: 8 }).image();
    const raw = extractTable(image, DEFAULT_LAYOUT.weapon, ARMOR_POINTER_TABLE, { stopBefore: isWeaponTerminator });

    expect(raw.ok && raw.records.map((r) => r.address)).toEqual([0x089574e8, 0x08957500]);
  });
});

describe("extractAll", () => {
  it("isolates a failing table from the others", () => {
    const image = new ImageBuilder().withDefaultPointers().pointer(2, 0).armor("head", 1, 12, 13, 0x0f).image();
    const run = extractAll(image, DEFAULT_LAYOUT);

    expect(run.armor.chest.ok).toBe(false);
    expect(!run.armor.chest.ok && run.armor.chest.error).toBeInstanceOf(UnresolvedPointerError);
    expect(run.armor.head.ok).toBe(true);
    expect(run.armor.arms.ok).toBe(true);
    expect(run.armor.waist.ok).toBe(true);
    expect(run.armor.legs.ok).toBe(true);
    expect(run.weapons.ok).toBe(true);
  });

  it("trims only the legs table", () => {
    const image = new ImageBuilder().withDefaultPointers().armor("legs", 0, 0, 0, 0x0f).image();
    const run = extractAll(image, DEFAULT_LAYOUT);

    expect(run.armor.legs.ok && run.armor.legs.records).toHaveLength(1);
    expect(run.armor.waist.ok && run.armor.waist.records).toHaveLength(409);
  });
});
