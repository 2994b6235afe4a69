/**
 * Ordering, search and labels used when choosing equipment.
 */
import { requireSlot } from "./catalog.js";
import { isSentinelSet } from "./equipment-grouper.js";
import type { ArmorSet, ArmorSlot, Catalog, WeaponSet } from "./types.js";

/** Last name = highest upgrade tier */
export function displayName(names: readonly string[]): string {
  return names.length ? names[names.length - 1] : "???";
}

const sortKey = (names: readonly string[]) => (names[0] ?? "").toLowerCase();

function byFirstName<T extends { names: readonly string[] }>(items: readonly T[]): T[] {
  return [...items].sort((a, b) => sortKey(a.names).localeCompare(sortKey(b.names)));
}

/** Selectable armor sets of a slot, without the "Nothing Equipped" sentinel */
export function armorItems(catalog: Catalog, slot: ArmorSlot): ArmorSet[] {
  return byFirstName(requireSlot(catalog, slot).sets.filter((s) => !isSentinelSet(s)));
}

export function weaponItems(catalog: Catalog, typeFilter?: string): WeaponSet[] {
  const items = typeFilter ? catalog.weapons.filter((w) => w.type === typeFilter) : catalog.weapons;
  return byFirstName(items);
}

/** Case-insensitive substring match on any name; an empty term matches all */
export function searchItems<T extends { names: readonly string[] }>(items: readonly T[], term: string): T[] {
  const needle = term.trim().toLowerCase();
  if (!needle) return [...items];
  return items.filter((item) => item.names.some((n) => n.toLowerCase().includes(needle)));
}

export function findWeaponByModel(catalog: Catalog, modelId: number): WeaponSet | undefined {
  return catalog.weapons.find((w) => w.modelId === modelId);
}

/** True when swapping genders would change what is rendered */
export function hasGenderDifference(set: ArmorSet | null): boolean {
  return !!set && set.variants.some((v) => v.modelMale !== v.modelFemale);
}
