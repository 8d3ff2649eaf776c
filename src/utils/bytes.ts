/* Fixed-width little-endian integer encoding used as hashing input.
   Values outside the width wrap, so the conversion is total. */

export const U32_MAX = 0xffff_ffff;
export const U64_MAX = 2n ** 64n - 1n;

export const toBytesU32 = (value: number): Uint8Array => {
  const out = new Uint8Array(4);
  new DataView(out.buffer).setUint32(0, value >>> 0, true);
  return out;
};

export const toBytesU64 = (value: bigint): Uint8Array => {
  const out = new Uint8Array(8);
  new DataView(out.buffer).setBigUint64(0, BigInt.asUintN(64, value), true);
  return out;
};

/** `number` encodes as u32, `bigint` as u64. */
export const toBytes = (value: number | bigint): Uint8Array =>
  typeof value === "bigint" ? toBytesU64(value) : toBytesU32(value);

export const bytesEqual = (a: Uint8Array, b: Uint8Array): boolean => {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) if (a[i] !== b[i]) return false;
  return true;
};
