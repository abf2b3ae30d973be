/**
 * FNV-1a 64-bit hash
 *
 * Incremental hasher used for grid hash codes. Output is a 16-character
 * lowercase hex string, stable across processes and platforms.
 */

const FNV64_OFFSET_BASIS = 14695981039346656037n;
const FNV64_PRIME = 1099511628211n;
const MASK_64 = (1n << 64n) - 1n;

const encoder = new TextEncoder();

export class FNV64Hasher {
  private hash: bigint;

  constructor() {
    this.hash = FNV64_OFFSET_BASIS;
  }

  updateByte(byte: number): this {
    this.hash ^= BigInt(byte & 0xff);
    this.hash = (this.hash * FNV64_PRIME) & MASK_64;
    return this;
  }

  updateBytes(data: Uint8Array): this {
    for (let i = 0; i < data.length; i++) {
      this.hash ^= BigInt(data[i] ?? 0);
      this.hash = (this.hash * FNV64_PRIME) & MASK_64;
    }
    return this;
  }

  /**
   * Add a 32-bit integer (little-endian)
   */
  updateInt32(value: number): this {
    const v = value >>> 0;
    this.updateByte(v & 0xff);
    this.updateByte((v >> 8) & 0xff);
    this.updateByte((v >> 16) & 0xff);
    this.updateByte((v >> 24) & 0xff);
    return this;
  }

  /**
   * Add a string as UTF-8
   */
  updateString(str: string): this {
    return this.updateBytes(encoder.encode(str));
  }

  digest(): string {
    return this.hash.toString(16).padStart(16, "0");
  }

  digestBigInt(): bigint {
    return this.hash;
  }

  reset(): this {
    this.hash = FNV64_OFFSET_BASIS;
    return this;
  }
}

export function createFNV64Hasher(): FNV64Hasher {
  return new FNV64Hasher();
}

export function fnv64HashString(str: string): string {
  return new FNV64Hasher().updateString(str).digest();
}
