/**
 * Centralised configuration — paths and network settings come from the
 * environment (.env), memory layout constants live in table-layout.ts.
 */
import "dotenv/config";

function intEnv(key: string, fallback: number): number {
  const raw = process.env[key];
  if (!raw) return fallback;
  const parsed = parseInt(raw, 10);
  if (Number.isNaN(parsed)) throw new Error(`Invalid integer in env var ${key}: "${raw}"`);
  return parsed;
}

export const PATHS_CONFIG = Object.freeze({
  catalog: process.env.TRANSMOG_DATA || "./transmog_data.json",
  saveState: process.env.SAVESTATE_PATH || "",
  cheatFile: process.env.CHEAT_FILE || "./cheats.ini",
});

export const SCRAPER_CONFIG = Object.freeze({
  baseUrl: process.env.NAMES_BASE_URL || "https://fucomplete.github.io/files_doc/player",
  timeoutMs: intEnv("NAMES_TIMEOUT_MS", 30_000),
  userAgent: "Mozilla/5.0",
});

export interface SaveStateConfig {
  /** Uncompressed header in front of the zstd payload */
  headerSize: number;
  /** Offset of emulated RAM inside the decompressed payload */
  ramOffset: number;
  /** Virtual address of the first RAM byte */
  ramBase: number;
  maxOutputSize: number;
}

export const SAVESTATE_CONFIG: Readonly<SaveStateConfig> = Object.freeze({
  headerSize: 0xb0,
  ramOffset: 0x48,
  ramBase: 0x08000000,
  maxOutputSize: 256 * 1024 * 1024, // 256MB
});
