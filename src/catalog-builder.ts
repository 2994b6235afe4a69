/**
 * CatalogBuilder — full build pipeline from a RAM image to the equipment catalog.
 *
 * Extraction → grouping → names. A table that fails to extract is left out
 * of the catalog and reported in the stats; the others carry on. A name
 * page that cannot be fetched falls back to model-number labels.
 */
import { freezeCatalog } from "./catalog.js";
import { errorMessage, hex32 } from "./errors.js";
import { groupArmor, groupWeapons, type GroupingWarning } from "./equipment-grouper.js";
import logger from "./logger.js";
import type { MemoryImage } from "./memory-image.js";
import type { ArmorNameTables, ModelNames, NameSource } from "./name-source.js";
import { extractAll } from "./table-extractor.js";
import { DEFAULT_LAYOUT, validateLayout, type TableLayout } from "./table-layout.js";
import { ARMOR_SLOTS, type ArmorSlot, type ArmorSlotTable, type Catalog, type WeaponSet } from "./types.js";

export interface TableStats {
  table: string;
  ok: boolean;
  baseAddress?: number;
  entries: number;
  sets: number;
  error?: string;
}

export interface BuildStats {
  tables: TableStats[];
  warnings: GroupingWarning[];
  errors: string[];
  durationMs?: number;
}

export interface BuildResult {
  catalog: Catalog;
  stats: BuildStats;
}

const EMPTY_ARMOR_NAMES: ArmorNameTables = { male: new Map(), female: new Map() };

export class CatalogBuilder {
  constructor(
    private names: NameSource,
    private layout: TableLayout = DEFAULT_LAYOUT,
  ) {
    validateLayout(layout);
  }

  async build(image: MemoryImage, onProgress?: (msg: string) => void): Promise<BuildResult> {
    const startTime = Date.now();
    const stats: BuildStats = { tables: [], warnings: [], errors: [] };

    // 1. Extract every table
    onProgress?.(`Extracting tables from ${hex32(image.baseAddress)}–${hex32(image.endAddress)}…`);
    const run = extractAll(image, this.layout);

    // 2. Weapons
    let weapons: WeaponSet[] = [];
    if (run.weapons.ok) {
      const grouped = groupWeapons(run.weapons.records, await this.weaponNames(stats, onProgress));
      weapons = grouped.sets;
      stats.warnings.push(...grouped.warnings);
      stats.tables.push({
        table: run.weapons.table,
        ok: true,
        baseAddress: run.weapons.baseAddress,
        entries: run.weapons.records.length,
        sets: grouped.sets.length,
      });
    } else {
      this.recordFailure(stats, run.weapons.table, run.weapons.error.message);
    }

    // 3. Armor slots
    const armor: Partial<Record<ArmorSlot, ArmorSlotTable>> = {};
    for (const slot of ARMOR_SLOTS) {
      const result = run.armor[slot];
      if (!result.ok) {
        this.recordFailure(stats, result.table, result.error.message);
        continue;
      }
      const grouped = groupArmor(slot, result.records, await this.armorNames(slot, stats, onProgress));
      armor[slot] = { tableBase: result.baseAddress, sets: grouped.sets };
      stats.warnings.push(...grouped.warnings);
      stats.tables.push({
        table: result.table,
        ok: true,
        baseAddress: result.baseAddress,
        entries: result.records.length,
        sets: grouped.sets.length,
      });
      onProgress?.(`${slot}: ${grouped.sets.length} sets (${grouped.skipped} padding entries skipped)`);
    }

    const weaponBase = this.layout.weapon.base;
    const catalog = freezeCatalog({
      weaponTableBase: run.weapons.ok ? run.weapons.baseAddress : weaponBase.kind === "literal" ? weaponBase.address : 0,
      weaponEntrySize: this.layout.weapon.entrySize,
      weaponModelOffset: this.layout.weapon.fields[this.layout.weapon.modelField].offset,
      armorEntrySize: this.layout.armor.head.entrySize,
      weapons,
      armor,
    });

    stats.durationMs = Date.now() - startTime;
    logger.info(`Catalog built in ${stats.durationMs}ms: ${stats.tables.filter((t) => t.ok).length}/${stats.tables.length} tables`, { module: "catalog" });
    return { catalog, stats };
  }

  private recordFailure(stats: BuildStats, table: string, message: string): void {
    stats.tables.push({ table, ok: false, entries: 0, sets: 0, error: message });
    stats.errors.push(`${table}: ${message}`);
  }

  private async weaponNames(stats: BuildStats, onProgress?: (msg: string) => void): Promise<ModelNames> {
    try {
      return await this.names.weaponNames();
    } catch (e) {
      onProgress?.(`Weapon names unavailable (fallback labels): ${errorMessage(e)}`);
      stats.errors.push(`Names (weapons): ${errorMessage(e)}`);
      return new Map();
    }
  }

  private async armorNames(slot: ArmorSlot, stats: BuildStats, onProgress?: (msg: string) => void): Promise<ArmorNameTables> {
    try {
      return await this.names.armorNames(slot);
    } catch (e) {
      onProgress?.(`${slot} names unavailable (fallback labels): ${errorMessage(e)}`);
      stats.errors.push(`Names (${slot}): ${errorMessage(e)}`);
      return EMPTY_ARMOR_NAMES;
    }
  }
}
