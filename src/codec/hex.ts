import { bytesToHex } from "@noble/hashes/utils";
import { ChainError } from "../errors";

/** Lowercase, two characters per byte, no prefix. */
export const hexEncode = (bytes: Uint8Array): string => bytesToHex(bytes);

const nibble = (c: number): number => {
  if (c >= 0x30 && c <= 0x39) return c - 0x30; // 0-9
  if (c >= 0x61 && c <= 0x66) return c - 0x61 + 10; // a-f
  if (c >= 0x41 && c <= 0x46) return c - 0x41 + 10; // A-F
  return -1;
};

export const hexDecode = (text: string): Uint8Array => {
  if (text.length % 2 !== 0)
    throw new ChainError("InvalidHexLength", `odd length ${text.length}`);
  const out = new Uint8Array(text.length / 2);
  for (let i = 0; i < out.length; i++) {
    const hi = nibble(text.charCodeAt(2 * i));
    const lo = nibble(text.charCodeAt(2 * i + 1));
    if (hi < 0 || lo < 0)
      throw new ChainError("InvalidHexChar", `bad digit near offset ${2 * i}`);
    out[i] = (hi << 4) | lo;
  }
  return out;
};
