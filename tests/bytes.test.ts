import { describe, it, expect } from "vitest";
import { bytesEqual, toBytes, toBytesU32, toBytesU64, U64_MAX } from "../src/utils/bytes";

describe("fixed-width integer encoding", () => {
  it("writes u32 little-endian", () => {
    expect([...toBytesU32(1)]).toEqual([1, 0, 0, 0]);
    expect([...toBytesU32(0x01020304)]).toEqual([4, 3, 2, 1]);
    expect([...toBytesU32(0xffffffff)]).toEqual([255, 255, 255, 255]);
  });

  it("writes u64 little-endian", () => {
    expect([...toBytesU64(1672531200n)]).toEqual([0x00, 0xcd, 0xb0, 0x63, 0, 0, 0, 0]);
    expect([...toBytesU64(U64_MAX)]).toEqual(Array(8).fill(255));
  });

  it("wraps values outside the width", () => {
    expect([...toBytesU64(U64_MAX + 2n)]).toEqual([1, 0, 0, 0, 0, 0, 0, 0]);
    expect([...toBytesU64(-1n)]).toEqual(Array(8).fill(255));
  });

  it("picks the width from the value type", () => {
    expect(toBytes(7).length).toBe(4);
    expect(toBytes(7n).length).toBe(8);
  });

  it("compares byte arrays", () => {
    expect(bytesEqual(new Uint8Array([1, 2]), new Uint8Array([1, 2]))).toBe(true);
    expect(bytesEqual(new Uint8Array([1, 2]), new Uint8Array([1, 3]))).toBe(false);
    expect(bytesEqual(new Uint8Array([1]), new Uint8Array([1, 0]))).toBe(false);
  });
});
