/**
 * Command-line front end: argument parsing, equipment picking and output.
 */
import { existsSync } from "fs";
import { CatalogBuilder } from "./catalog-builder.js";
import { loadCatalog, saveCatalog } from "./catalog.js";
import { appendBlocks, renderBlocks, writeBlocks } from "./cheat-output.js";
import { PATHS_CONFIG } from "./config.js";
import { InvalidSelectionError, TransmogError, UsageError, hex32 } from "./errors.js";
import logger from "./logger.js";
import { HttpNameSource, StaticNameSource } from "./name-source.js";
import type { PatchBlock } from "./patch-encoder.js";
import { loadSaveState } from "./savestate-provider.js";
import { armorItems, displayName, findWeaponByModel, hasGenderDifference, searchItems, weaponItems } from "./selection.js";
import { DEFAULT_LAYOUT, literalArmorLayout } from "./table-layout.js";
import { armorBlock, armorSlotResult, slotInvisibilityBlock, weaponBlock, type ArmorSlotResult } from "./transmog-service.js";
import { ARMOR_SLOTS, SLOT_LABELS, isArmorSlot, type ArmorSet, type ArmorSlot, type Catalog, type WeaponSet } from "./types.js";

export const USAGE = `
Transmog code generator — equipment model swaps as CWCheat codes

Usage:
  npx tsx transmog.ts <command> [options]

Commands:
  build                 Extract the equipment catalog from a save state
      --state <file>        Save state (default: SAVESTATE_PATH)
      --out <file>          Catalog output (default: TRANSMOG_DATA)
      --no-names            Skip name lookup; sets get model-number labels
      --literal-bases       Use the fixed armor table bases instead of the pointer table
  weapon                --source <sel> --target <sel>
  armor                 --slot <slot> --source <sel> (--target <sel> | --invisible)
      --variant <n>         Force target variant n (0-based) for every source variant
      --swap-gender         Show the other gender's model
  set                   --source <sel> --target <sel> (all five armor slots)
      --hide <slots>        Comma-separated slots to make invisible
      --weapon-source <sel> --weapon-target <sel>
  invisible             --slot <slot>   Hide a slot whatever is equipped
  list                  <weapons|head|chest|arms|waist|legs> [--search <term>] [--type <t>]

Selectors (<sel>):
  <text>                First match by name, in list order
  #<n>                  Entry n of the list command's numbering
  model:<n>             Set using model number n

Output:
  --out <file>          Write codes to a file
  --append              Append codes to CHEAT_FILE
  --catalog <file>      Catalog to read (default: TRANSMOG_DATA)
  --help, -h            Show this help

Environment:
  TRANSMOG_DATA         Catalog path (default: ./transmog_data.json)
  SAVESTATE_PATH        Default save state for build
  CHEAT_FILE            Target of --append (default: ./cheats.ini)
  NAMES_BASE_URL        Name documentation site
  LOG_LEVEL             debug | info | warn | error | silent (default: info)
`;

// ── Argument parsing ────────────────────────────────────

const VALUE_OPTIONS = new Set([
  "state", "out", "catalog", "slot", "source", "target", "variant",
  "search", "type", "hide", "weapon-source", "weapon-target",
]);
const BOOLEAN_FLAGS = new Set(["append", "no-names", "literal-bases", "invisible", "swap-gender", "help"]);

export interface ParsedArgs {
  command: string;
  positionals: string[];
  options: Map<string, string>;
  flags: Set<string>;
}

export function parseArgs(argv: readonly string[]): ParsedArgs {
  const parsed: ParsedArgs = { command: "", positionals: [], options: new Map(), flags: new Set() };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "-h") {
      parsed.flags.add("help");
      continue;
    }
    if (!arg.startsWith("--")) {
      if (!parsed.command) parsed.command = arg;
      else parsed.positionals.push(arg);
      continue;
    }

    const name = arg.slice(2);
    if (BOOLEAN_FLAGS.has(name)) {
      parsed.flags.add(name);
    } else if (VALUE_OPTIONS.has(name)) {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith("--")) throw new UsageError(`Option --${name} needs a value`);
      parsed.options.set(name, value);
      i++;
    } else {
      throw new UsageError(`Unknown option: ${arg}`);
    }
  }
  return parsed;
}

function required(args: ParsedArgs, name: string): string {
  const value = args.options.get(name);
  if (!value) throw new UsageError(`Missing --${name}`);
  return value;
}

function slotOption(args: ParsedArgs): ArmorSlot {
  const slot = required(args, "slot").toLowerCase();
  if (!isArmorSlot(slot)) throw new UsageError(`Unknown slot "${slot}" (expected ${ARMOR_SLOTS.join(", ")})`);
  return slot;
}

function intOption(args: ParsedArgs, name: string): number | undefined {
  const raw = args.options.get(name);
  if (raw === undefined) return undefined;
  if (!/^\d+$/.test(raw)) throw new UsageError(`--${name} must be a non-negative integer, got "${raw}"`);
  return parseInt(raw, 10);
}

// ── Selectors ────────────────────────────────────────────

type Selector =
  | { kind: "index"; index: number }
  | { kind: "model"; model: number }
  | { kind: "search"; term: string };

export function parseSelector(text: string): Selector {
  const index = /^#(\d+)$/.exec(text);
  if (index) return { kind: "index", index: parseInt(index[1], 10) };
  const model = /^model:(\d+)$/i.exec(text);
  if (model) return { kind: "model", model: parseInt(model[1], 10) };
  return { kind: "search", term: text };
}

function byIndex<T>(items: readonly T[], index: number): T | undefined {
  return index >= 1 ? items[index - 1] : undefined;
}

export function pickArmor(catalog: Catalog, slot: ArmorSlot, text: string): ArmorSet | undefined {
  const items = armorItems(catalog, slot);
  const sel = parseSelector(text);
  switch (sel.kind) {
    case "index":
      return byIndex(items, sel.index);
    case "model":
      return items.find((s) => s.variants.some((v) => v.modelMale === sel.model || v.modelFemale === sel.model));
    case "search":
      return searchItems(items, sel.term)[0];
  }
}

export function pickWeapon(catalog: Catalog, text: string): WeaponSet | undefined {
  const sel = parseSelector(text);
  switch (sel.kind) {
    case "index":
      return byIndex(weaponItems(catalog), sel.index);
    case "model":
      return findWeaponByModel(catalog, sel.model);
    case "search":
      return searchItems(weaponItems(catalog), sel.term)[0];
  }
}

function mustPickArmor(catalog: Catalog, slot: ArmorSlot, text: string): ArmorSet {
  const set = pickArmor(catalog, slot, text);
  if (!set) throw new InvalidSelectionError(`No ${slot} armor matches "${text}"`);
  return set;
}

function mustPickWeapon(catalog: Catalog, text: string): WeaponSet {
  const set = pickWeapon(catalog, text);
  if (!set) throw new InvalidSelectionError(`No weapon matches "${text}"`);
  return set;
}

// ── Commands ─────────────────────────────────────────────

export function weaponCommand(catalog: Catalog, args: ParsedArgs): PatchBlock[] {
  const source = mustPickWeapon(catalog, required(args, "source"));
  const target = mustPickWeapon(catalog, required(args, "target"));
  return [weaponBlock(catalog, source, target)];
}

export function armorCommand(catalog: Catalog, args: ParsedArgs): PatchBlock[] {
  const slot = slotOption(args);
  const source = mustPickArmor(catalog, slot, required(args, "source"));
  const invisible = args.flags.has("invisible");
  if (invisible && args.options.has("target")) throw new UsageError("Use either --target or --invisible, not both");
  const target = invisible ? null : mustPickArmor(catalog, slot, required(args, "target"));

  const swapGender = args.flags.has("swap-gender");
  if (swapGender && target && !hasGenderDifference(target)) {
    logger.info(`${displayName(target.names)} looks the same on both genders; --swap-gender changes nothing`, { module: "cli" });
  }
  const result = armorSlotResult(catalog, {
    slot,
    source,
    target,
    forcedVariantIndex: intOption(args, "variant"),
    swapGender,
  });
  return [armorBlock([result])];
}

export function setCommand(catalog: Catalog, args: ParsedArgs): PatchBlock[] {
  const sourceText = required(args, "source");
  const targetText = args.options.get("target");
  const hidden = new Set(
    (args.options.get("hide") ?? "").split(",").map((s) => s.trim().toLowerCase()).filter(Boolean),
  );
  for (const slot of hidden) {
    if (!isArmorSlot(slot)) throw new UsageError(`Unknown slot "${slot}" in --hide`);
  }

  const results: ArmorSlotResult[] = [];
  for (const slot of ARMOR_SLOTS) {
    if (!catalog.armor[slot]) {
      logger.info(`Skipping ${SLOT_LABELS[slot]}: not in the catalog`, { module: "cli" });
      continue;
    }
    const source = pickArmor(catalog, slot, sourceText);
    const target = hidden.has(slot) ? null : targetText ? pickArmor(catalog, slot, targetText) : undefined;
    if (!source || target === undefined) {
      logger.info(`Skipping ${SLOT_LABELS[slot]}: no match`, { module: "cli" });
      continue;
    }
    results.push(armorSlotResult(catalog, { slot, source, target }));
  }

  const blocks: PatchBlock[] = [];
  if (results.length) blocks.push(armorBlock(results));

  const weaponSource = args.options.get("weapon-source");
  const weaponTarget = args.options.get("weapon-target");
  if (weaponSource && weaponTarget) {
    blocks.push(weaponBlock(catalog, mustPickWeapon(catalog, weaponSource), mustPickWeapon(catalog, weaponTarget)));
  } else if (weaponSource || weaponTarget) {
    throw new UsageError("--weapon-source and --weapon-target go together");
  }

  if (!blocks.length) throw new InvalidSelectionError("No codes generated: nothing matched in any slot");
  return blocks;
}

export function invisibleCommand(catalog: Catalog, args: ParsedArgs): PatchBlock[] {
  return [slotInvisibilityBlock(catalog, slotOption(args))];
}

export function listCommand(catalog: Catalog, args: ParsedArgs): string[] {
  const kind = (args.positionals[0] ?? "").toLowerCase();
  const term = args.options.get("search") ?? "";

  if (kind === "weapons") {
    // Numbered against the unfiltered list so "#n" selectors stay valid
    const all = weaponItems(catalog);
    const shown = searchItems(weaponItems(catalog, args.options.get("type")), term);
    return shown.map((w) =>
      `${all.indexOf(w) + 1}. ${displayName(w.names)} [model ${w.modelId}, type ${w.type}, ${w.entries.length} entries]`);
  }
  if (isArmorSlot(kind)) {
    const all = armorItems(catalog, kind);
    return searchItems(all, term).map((s) => {
      const models = s.variants.map((v) => `${v.modelMale}/${v.modelFemale}`).join(", ");
      return `${all.indexOf(s) + 1}. ${displayName(s.names)} [${models}]`;
    });
  }
  throw new UsageError(`list needs one of: weapons, ${ARMOR_SLOTS.join(", ")}`);
}

async function buildCommand(args: ParsedArgs): Promise<void> {
  const statePath = args.options.get("state") || PATHS_CONFIG.saveState;
  if (!statePath) throw new UsageError("Save state path required. Use --state <file> or set SAVESTATE_PATH.");
  if (!existsSync(statePath)) throw new UsageError(`Save state not found: ${statePath}`);
  const outPath = args.options.get("out") || PATHS_CONFIG.catalog;

  const image = await loadSaveState(statePath);
  const names = args.flags.has("no-names") ? new StaticNameSource() : new HttpNameSource();
  const layout = args.flags.has("literal-bases") ? literalArmorLayout() : DEFAULT_LAYOUT;
  const builder = new CatalogBuilder(names, layout);
  const { catalog, stats } = await builder.build(image, (msg) => logger.info(msg, { module: "cli" }));
  await saveCatalog(outPath, catalog);

  logger.info("═══════════════════════════════════════════", { module: "cli" });
  logger.info(`Catalog build complete in ${((stats.durationMs ?? 0) / 1000).toFixed(1)}s`, { module: "cli" });
  for (const t of stats.tables) {
    const detail = t.ok ? `${t.entries} entries, ${t.sets} sets @ ${hex32(t.baseAddress ?? 0)}` : `FAILED: ${t.error}`;
    logger.info(`   ${t.table.padEnd(8)} ${detail}`, { module: "cli" });
  }
  if (stats.warnings.length) logger.warn(`   Warnings:    ${stats.warnings.length}`, { module: "cli" });
  if (stats.errors.length) {
    logger.warn(`   Errors:      ${stats.errors.length}`, { module: "cli" });
    for (const e of stats.errors) logger.warn(`     - ${e}`, { module: "cli" });
  }
  logger.info("═══════════════════════════════════════════", { module: "cli" });
}

// ── Entry ────────────────────────────────────────────────

export interface CliIO {
  print(text: string): void;
}

const consoleIO: CliIO = { print: (text) => console.log(text) };

type Generator = (catalog: Catalog, args: ParsedArgs) => PatchBlock[];

const GENERATORS = new Map<string, Generator>([
  ["weapon", weaponCommand],
  ["armor", armorCommand],
  ["set", setCommand],
  ["invisible", invisibleCommand],
]);

async function emit(blocks: PatchBlock[], args: ParsedArgs, io: CliIO): Promise<void> {
  const out = args.options.get("out");
  if (out) await writeBlocks(out, blocks);
  else if (args.flags.has("append")) await appendBlocks(PATHS_CONFIG.cheatFile, blocks);
  else io.print(renderBlocks(blocks));
}

/**
 * Run one command. Returns the process exit code; errors the user can fix
 * are reported here, anything else propagates.
 */
export async function run(argv: readonly string[], io: CliIO = consoleIO): Promise<number> {
  try {
    const args = parseArgs(argv);
    if (args.flags.has("help") || !args.command) {
      io.print(USAGE);
      return args.flags.has("help") ? 0 : 1;
    }

    if (args.command === "build") {
      await buildCommand(args);
      return 0;
    }

    const generate = GENERATORS.get(args.command);
    if (!generate && args.command !== "list") throw new UsageError(`Unknown command: ${args.command}`);

    const catalog = await loadCatalog(args.options.get("catalog") || PATHS_CONFIG.catalog);
    if (generate) {
      await emit(generate(catalog, args), args, io);
    } else {
      io.print(listCommand(catalog, args).join("\n"));
    }
    return 0;
  } catch (e) {
    if (!(e instanceof TransmogError)) throw e;
    logger.error(e.message, { module: "cli" });
    if (e instanceof UsageError) io.print(USAGE);
    return 1;
  }
}
