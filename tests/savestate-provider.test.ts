/**
 * Save-state decoding: header skip, zstd payload, RAM offset
 */
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SAVESTATE_CONFIG } from "../src/config.js";
import { ImageError } from "../src/errors.js";
import { decodeSaveState, loadSaveState } from "../src/savestate-provider.js";

/**
 * Single-segment zstd frame holding one raw (stored) block.
 * Content size goes in a 1-byte field, so at most 255 bytes.
 */
function zstdStored(content: Uint8Array): Buffer {
  const n = content.length;
  const blockHeader = 1 | (n << 3); // last block, raw, size n
  return Buffer.concat([
    Buffer.from([0x28, 0xb5, 0x2f, 0xfd, 0x20, n]),
    Buffer.from([blockHeader & 0xff, (blockHeader >> 8) & 0xff, (blockHeader >> 16) & 0xff]),
    Buffer.from(content),
  ]);
}

const RAM = Buffer.from([0x78, 0x56, 0x34, 0x12, 0xaa, 0xbb, 0xcc, 0xdd, 0, 0, 0, 0, 0, 0, 0, 0x01]);

function saveState(ram: Uint8Array = RAM, prefix = SAVESTATE_CONFIG.ramOffset): Buffer {
  const payload = Buffer.concat([Buffer.alloc(prefix, 0xee), Buffer.from(ram)]);
  return Buffer.concat([Buffer.alloc(SAVESTATE_CONFIG.headerSize, 0x11), zstdStored(payload)]);
}

describe("decodeSaveState", () => {
  it("returns RAM based at 0x08000000", () => {
    const image = decodeSaveState(saveState());
    expect(image.baseAddress).toBe(0x08000000);
    expect(image.length).toBe(16);
    expect(image.readU32(0x08000000)).toBe(0x12345678);
    expect(image.readU8(0x0800000f)).toBe(1);
  });

  it("rejects a file no longer than its header", () => {
    expect(() => decodeSaveState(Buffer.alloc(SAVESTATE_CONFIG.headerSize))).toThrow(ImageError);
  });

  it("rejects a payload that is not zstd", () => {
    const raw = Buffer.concat([Buffer.alloc(SAVESTATE_CONFIG.headerSize), Buffer.from("not zstd at all")]);
    expect(() => decodeSaveState(raw)).toThrow(ImageError);
  });

  it("rejects a payload that ends before the RAM offset", () => {
    expect(() => decodeSaveState(saveState(new Uint8Array(0), 0x40)))
      .toThrow("Decompressed save state (64 bytes) ends before RAM offset 72");
  });

  it("honours a custom layout", () => {
    const raw = Buffer.concat([Buffer.alloc(4), zstdStored(Buffer.from([9, 8, 7, 6]))]);
    const image = decodeSaveState(raw, { headerSize: 4, ramOffset: 2, ramBase: 0x1000, maxOutputSize: 1024 });
    expect(image.baseAddress).toBe(0x1000);
    expect(image.readU16(0x1000)).toBe(0x0607);
  });
});

describe("loadSaveState", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "transmog-state-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads and decodes a save-state file", async () => {
    const file = path.join(dir, "slot1.ppst");
    await writeFile(file, saveState());
    const image = await loadSaveState(file);
    expect(image.readU32(0x08000004)).toBe(0xddccbbaa);
  });

  it("wraps a missing file in an ImageError", async () => {
    await expect(loadSaveState(path.join(dir, "nope.ppst"))).rejects.toBeInstanceOf(ImageError);
  });
});
