/**
 * Small hand-made catalog shared by generator, selection and CLI tests.
 */
import { freezeCatalog } from "../../src/catalog.js";
import type { ArmorSet, Catalog, WeaponSet } from "../../src/types.js";

export const boneBlade: WeaponSet = { names: ["Bone Blade", "Bone Blade+"], modelId: 10, entries: [0, 1], type: "3" };
export const wyvernBlade: WeaponSet = { names: ["Wyvern Blade"], modelId: 242, entries: [34], type: "3" };
export const ironLance: WeaponSet = { names: ["Iron Lance"], modelId: 77, entries: [40], type: "7" };

export const nothingHead: ArmorSet = { names: ["Nothing Equipped"], variants: [{ modelMale: 0, modelFemale: 0, eids: [0] }] };
export const leatherHead: ArmorSet = {
  names: ["Leather S", "Leather G"],
  variants: [
    { modelMale: 10, modelFemale: 11, eids: [1] },
    { modelMale: 12, modelFemale: 13, eids: [2] },
  ],
};
export const hoodHead: ArmorSet = { names: ["Hood"], variants: [{ modelMale: 20, modelFemale: 21, eids: [101] }] };
export const crownHead: ArmorSet = {
  names: ["Crown"],
  variants: [
    { modelMale: 30, modelFemale: 31, eids: [5, 6] },
    { modelMale: 32, modelFemale: 33, eids: [7] },
  ],
};
export const plainHead: ArmorSet = { names: ["Plain Cap"], variants: [{ modelMale: 50, modelFemale: 50, eids: [9] }] };

export const leatherChest: ArmorSet = { names: ["Leather Mail"], variants: [{ modelMale: 40, modelFemale: 41, eids: [3] }] };
export const hoodChest: ArmorSet = { names: ["Hood Vest"], variants: [{ modelMale: 42, modelFemale: 43, eids: [4] }] };

export const HEAD_BASE = 0x08960750;
export const CHEST_BASE = 0x08964b70;

export function sampleCatalog(): Catalog {
  return freezeCatalog({
    weaponTableBase: 0x089574e8,
    weaponEntrySize: 24,
    weaponModelOffset: 16,
    armorEntrySize: 40,
    weapons: [boneBlade, ironLance, wyvernBlade],
    armor: {
      head: { tableBase: HEAD_BASE, sets: [nothingHead, leatherHead, hoodHead, crownHead, plainHead] },
      chest: { tableBase: CHEST_BASE, sets: [leatherChest, hoodChest] },
    },
  });
}
