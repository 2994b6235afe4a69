/**
 * MemoryImage — read-only view of a captured RAM range at a known virtual address.
 *
 * Every read is bounds-checked against [baseAddress, baseAddress + length);
 * nothing is ever zero-filled. Values are little-endian (PSP/MIPS LE).
 */
import { ImageError, OutOfBoundsError, hex32 } from "./errors.js";

export type FieldWidth = 1 | 2 | 4;

export class MemoryImage {
  private constructor(
    readonly baseAddress: number,
    private readonly bytes: Buffer,
  ) {}

  /**
   * Wrap a byte buffer. The buffer is not copied; callers hand over ownership.
   * Fails when the buffer is empty or the declared range does not fit in 32 bits.
   */
  static fromBuffer(bytes: Uint8Array, baseAddress: number): MemoryImage {
    if (!Number.isInteger(baseAddress) || baseAddress < 0 || baseAddress > 0xffffffff) {
      throw new ImageError(`Invalid image base address: ${baseAddress}`);
    }
    if (bytes.length === 0) {
      throw new ImageError(`Image at ${hex32(baseAddress)} is empty`);
    }
    if (baseAddress + bytes.length > 0x1_0000_0000) {
      throw new ImageError(`Image at ${hex32(baseAddress)} (${bytes.length} bytes) overflows the 32-bit address space`);
    }
    const buf = Buffer.isBuffer(bytes) ? bytes : Buffer.from(bytes.buffer, bytes.byteOffset, bytes.length);
    return new MemoryImage(baseAddress, buf);
  }

  get length(): number { return this.bytes.length; }

  /** First address past the end of the image */
  get endAddress(): number { return this.baseAddress + this.bytes.length; }

  contains(address: number, size = 1): boolean {
    return Number.isInteger(address) && address >= this.baseAddress && address + size <= this.endAddress;
  }

  readInt(address: number, width: FieldWidth, signed: boolean): number {
    if (!this.contains(address, width)) {
      throw new OutOfBoundsError(address, width, this.baseAddress, this.endAddress);
    }
    const off = address - this.baseAddress;
    switch (width) {
      case 1: return signed ? this.bytes.readInt8(off) : this.bytes.readUInt8(off);
      case 2: return signed ? this.bytes.readInt16LE(off) : this.bytes.readUInt16LE(off);
      case 4: return signed ? this.bytes.readInt32LE(off) : this.bytes.readUInt32LE(off);
    }
  }

  readU8(address: number): number { return this.readInt(address, 1, false); }
  readS16(address: number): number { return this.readInt(address, 2, true); }
  readU16(address: number): number { return this.readInt(address, 2, false); }
  readU32(address: number): number { return this.readInt(address, 4, false); }
}
