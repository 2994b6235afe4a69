/**
 * Save-state provider — locates emulated RAM inside an emulator save state.
 *
 * Layout: fixed uncompressed header, then one zstd stream; the decompressed
 * payload holds a small prefix followed by RAM starting at the RAM base.
 */
import { decompress } from "fzstd";
import { type FileHandle, open } from "fs/promises";
import { SAVESTATE_CONFIG, type SaveStateConfig } from "./config.js";
import { ImageError, errorMessage } from "./errors.js";
import logger from "./logger.js";
import { MemoryImage } from "./memory-image.js";

const ZSTD_MAGIC = 0xfd2fb528;

/** Decode an in-memory save state into a MemoryImage based at the RAM base */
export function decodeSaveState(raw: Uint8Array, config: SaveStateConfig = SAVESTATE_CONFIG): MemoryImage {
  if (raw.length <= config.headerSize + 4) {
    throw new ImageError(`Save state too short (${raw.length} bytes)`);
  }
  const payload = raw.subarray(config.headerSize);
  const magic = Buffer.from(payload.buffer, payload.byteOffset, 4).readUInt32LE(0);
  if (magic !== ZSTD_MAGIC) {
    throw new ImageError(`No zstd stream after the ${config.headerSize}-byte header (magic 0x${magic.toString(16)})`);
  }

  let data: Uint8Array;
  try {
    data = decompress(payload);
  } catch (e) {
    throw new ImageError(`Save state decompression failed: ${errorMessage(e)}`);
  }
  if (data.length > config.maxOutputSize) {
    throw new ImageError(`Decompressed save state exceeds ${config.maxOutputSize} bytes`);
  }
  if (data.length <= config.ramOffset) {
    throw new ImageError(`Decompressed save state (${data.length} bytes) ends before RAM offset ${config.ramOffset}`);
  }

  const ram = data.subarray(config.ramOffset);
  logger.info(`RAM size: ${ram.length.toLocaleString()} bytes`, { module: "savestate" });
  return MemoryImage.fromBuffer(ram, config.ramBase);
}

export async function loadSaveState(path: string, config: SaveStateConfig = SAVESTATE_CONFIG): Promise<MemoryImage> {
  logger.info(`Loading save state: ${path}`, { module: "savestate" });
  let fh: FileHandle;
  try {
    fh = await open(path, "r");
  } catch (e) {
    throw new ImageError(`Cannot open save state ${path}: ${errorMessage(e)}`);
  }
  try {
    const raw = await fh.readFile();
    return decodeSaveState(raw, config);
  } finally {
    await fh.close();
  }
}
