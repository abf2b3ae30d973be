import { describe, expect, it } from "vitest";
import {
  createFNV64Hasher,
  FNV64Hasher,
  fnv64HashString,
} from "../src/core/hash/fnv64";

describe("FNV64Hasher", () => {
  it("creates independent hasher instances", () => {
    const hasher1 = createFNV64Hasher();
    const hasher2 = createFNV64Hasher();
    expect(hasher1).toBeInstanceOf(FNV64Hasher);

    hasher1.updateString("test");
    expect(hasher1.digest()).not.toBe(hasher2.digest());
  });

  it("matches the published FNV-1a 64 vectors", () => {
    expect(fnv64HashString("")).toBe("cbf29ce484222325");
    expect(fnv64HashString("a")).toBe("af63dc4c8601ec8c");
    expect(fnv64HashString("foobar")).toBe("85944171f73967e8");
  });

  it("masks bytes to 0-255", () => {
    const hasher1 = createFNV64Hasher().updateByte(256);
    const hasher2 = createFNV64Hasher().updateByte(0);
    expect(hasher1.digest()).toBe(hasher2.digest());
  });

  it("hashes int32 values little-endian", () => {
    const hasher = createFNV64Hasher().updateInt32(0x01020304);
    const bytes = createFNV64Hasher()
      .updateByte(0x04)
      .updateByte(0x03)
      .updateByte(0x02)
      .updateByte(0x01);
    expect(hasher.digest()).toBe(bytes.digest());
  });

  it("matches byte-by-byte hashing", () => {
    const data = new Uint8Array([1, 2, 3]);
    const hasher1 = createFNV64Hasher().updateBytes(data);
    const hasher2 = createFNV64Hasher().updateByte(1).updateByte(2).updateByte(3);
    expect(hasher1.digest()).toBe(hasher2.digest());
  });

  it("hashes strings incrementally", () => {
    const whole = createFNV64Hasher().updateString("Hello, World!");
    const parts = createFNV64Hasher()
      .updateString("Hello")
      .updateString(", ")
      .updateString("World!");
    expect(whole.digest()).toBe(parts.digest());
  });

  it("encodes strings as UTF-8", () => {
    const hasher1 = createFNV64Hasher().updateString("é");
    const hasher2 = createFNV64Hasher().updateByte(0xc3).updateByte(0xa9);
    expect(hasher1.digest()).toBe(hasher2.digest());
  });

  it("returns the digest as a bigint", () => {
    const hasher = createFNV64Hasher().updateString("test");
    expect(hasher.digestBigInt().toString(16).padStart(16, "0")).toBe(
      hasher.digest(),
    );
  });

  it("resets to the initial state", () => {
    const hasher = createFNV64Hasher();
    const initial = hasher.digest();
    hasher.updateString("test").reset();
    expect(hasher.digest()).toBe(initial);
  });
});
