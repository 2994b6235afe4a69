/**
 * Name lookup — display names for equipment, keyed by model number.
 *
 * Names come from the community file documentation: one HTML page per
 * armor slot (female table first, male second) and one for weapons. Each
 * row's first cell is an asset file name ending in `<model>.pac`, the third
 * cell lists names separated by <br>.
 */
import * as cheerio from "cheerio";
import { SCRAPER_CONFIG } from "./config.js";
import logger from "./logger.js";
import type { ArmorSlot } from "./types.js";

export type ModelNames = ReadonlyMap<number, readonly string[]>;

export interface ArmorNameTables {
  male: ModelNames;
  female: ModelNames;
}

export interface NameSource {
  weaponNames(): Promise<ModelNames>;
  armorNames(slot: ArmorSlot): Promise<ArmorNameTables>;
}

export const ARMOR_PAGES: Record<ArmorSlot, string> = {
  head: "pl_head.html",
  chest: "pl_body.html",
  arms: "pl_arm.html",
  waist: "pl_wst.html",
  legs: "pl_leg.html",
};
export const WEAPON_PAGE = "pl_weapons.html";

const NAME_SEPARATOR = "|";

// ── HTML parsing ─────────────────────────────────────────

/** Model number from an asset file name such as `we021.pac` or `m_hair096.pac` */
export function parseModelNumber(fileName: string): number | null {
  const m = /(\d+)\.pac$/.exec(fileName.trim());
  return m ? parseInt(m[1], 10) : null;
}

/**
 * Body rows of every table that has a <thead>, one string[] per row.
 * <br> inside a cell becomes "|".
 */
export function parseHtmlTables(html: string): string[][][] {
  const $ = cheerio.load(html);
  const tables: string[][][] = [];
  $("table").each((_, table) => {
    if ($(table).children("thead").length === 0) return;
    $(table).children("tbody").each((_, tbody) => {
      const rows: string[][] = [];
      $(tbody).children("tr").each((_, tr) => {
        const cells: string[] = [];
        $(tr).children("td").each((_, td) => {
          $(td).find("br").replaceWith(NAME_SEPARATOR);
          cells.push($(td).text().trim());
        });
        if (cells.length) rows.push(cells);
      });
      tables.push(rows);
    });
  });
  return tables;
}

/** Rows → model → names, dropping names marked UNUSED and rows without names */
export function namesFromRows(rows: readonly string[][]): Map<number, string[]> {
  const result = new Map<number, string[]>();
  for (const row of rows) {
    if (row.length < 3) continue;
    const model = parseModelNumber(row[0]);
    if (model === null) continue;
    const names = row[2]
      .split(NAME_SEPARATOR)
      .map((n) => n.trim())
      .filter((n) => n && !n.toUpperCase().includes("UNUSED"));
    if (names.length) result.set(model, names);
  }
  return result;
}

export function parseWeaponPage(html: string): Map<number, string[]> {
  const tables = parseHtmlTables(html);
  if (!tables.length) throw new Error("No tables found on weapons page");
  return namesFromRows(tables[0]);
}

export function parseArmorPage(html: string, slot: ArmorSlot): ArmorNameTables {
  const tables = parseHtmlTables(html);
  if (tables.length < 2) throw new Error(`Expected 2 tables for ${slot}, found ${tables.length}`);
  return { male: namesFromRows(tables[1]), female: namesFromRows(tables[0]) };
}

// ── Sources ──────────────────────────────────────────────

export class HttpNameSource implements NameSource {
  constructor(
    private baseUrl = SCRAPER_CONFIG.baseUrl,
    private timeoutMs = SCRAPER_CONFIG.timeoutMs,
  ) {}

  private async fetchPage(page: string): Promise<string> {
    const url = `${this.baseUrl.replace(/\/+$/, "")}/${page}`;
    logger.info(`Fetching ${url}`, { module: "names" });
    const response = await fetch(url, {
      headers: { "User-Agent": SCRAPER_CONFIG.userAgent, Accept: "text/html" },
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!response.ok) {
      throw new Error(`Name page ${url} returned HTTP ${response.status}`);
    }
    return response.text();
  }

  async weaponNames(): Promise<ModelNames> {
    const names = parseWeaponPage(await this.fetchPage(WEAPON_PAGE));
    logger.info(`Weapons: ${names.size} named models`, { module: "names" });
    return names;
  }

  async armorNames(slot: ArmorSlot): Promise<ArmorNameTables> {
    const tables = parseArmorPage(await this.fetchPage(ARMOR_PAGES[slot]), slot);
    logger.info(`${slot}: ${tables.male.size} male, ${tables.female.size} female`, { module: "names" });
    return tables;
  }
}

/** In-memory names; an empty source makes every set fall back to its model label */
export class StaticNameSource implements NameSource {
  constructor(
    private weapons: ModelNames = new Map(),
    private armor: Partial<Record<ArmorSlot, ArmorNameTables>> = {},
  ) {}

  async weaponNames(): Promise<ModelNames> {
    return this.weapons;
  }

  async armorNames(slot: ArmorSlot): Promise<ArmorNameTables> {
    return this.armor[slot] ?? { male: new Map(), female: new Map() };
  }
}
