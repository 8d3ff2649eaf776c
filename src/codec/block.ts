import { isInteger, parse } from "lossless-json";
import * as v from "valibot";
import { HASH_SIZE } from "../core/hash";
import type { Block, Transaction } from "../core/types";
import { ChainError } from "../errors";
import { U32_MAX, U64_MAX } from "../utils/bytes";
import { hexDecode, hexEncode } from "./hex";

/** `data` of a decoded block that carried none. */
export const PLACEHOLDER_DATA = "P2P Received Block";

/* ── encode ──────────────────────────────────────────────── */
// Written by hand so u64 fields print as exact integer literals.
const encodeTx = (tx: Transaction): string =>
  `{"sender":${JSON.stringify(tx.sender)},"receiver":${JSON.stringify(tx.receiver)},"amount":${tx.amount}}`;

export const encodeBlock = (b: Block): string =>
  "{" +
  `"index":${b.index},` +
  `"timestamp":${b.timestamp},` +
  `"nonce":${b.nonce},` +
  `"data":${JSON.stringify(b.data)},` +
  `"prev_hash":"${hexEncode(b.prevHash)}",` +
  `"hash":"${hexEncode(b.hash)}",` +
  `"transactions":[${b.transactions.map(encodeTx).join(",")}]` +
  "}";

/* ── decode schema ───────────────────────────────────────── */
// integer literals arrive as bigint (see parseJson); anything else is a number
const u64 = v.pipe(v.bigint(), v.minValue(0n), v.maxValue(U64_MAX));
const u32 = v.pipe(
  v.bigint(),
  v.minValue(0n),
  v.maxValue(BigInt(U32_MAX)),
  v.transform((n: bigint) => Number(n)),
);

// hexDecode throws its own ChainError codes straight through the parse
const hash32 = v.pipe(
  v.string(),
  v.transform(hexDecode),
  v.length(HASH_SIZE, `expected ${HASH_SIZE} bytes`),
);

const ZERO_HASH_HEX = "00".repeat(HASH_SIZE);

const txSchema = v.object({
  sender: v.string(),
  receiver: v.string(),
  amount: u64,
});

/* every field is optional; absent ones take the defaults below */
const blockSchema = v.object({
  index: v.optional(u32, 0n),
  timestamp: v.optional(u64, 0n),
  nonce: v.optional(u64, 0n),
  data: v.optional(v.string(), PLACEHOLDER_DATA),
  prev_hash: v.optional(hash32, ZERO_HASH_HEX),
  hash: v.optional(hash32, ZERO_HASH_HEX),
  transactions: v.optional(v.array(txSchema), () => []),
});

/* ── decode ──────────────────────────────────────────────── */
const bad = (detail: string) => new ChainError("InvalidFormat", detail);

const parseNumber = (literal: string): bigint | number =>
  isInteger(literal) ? BigInt(literal) : Number(literal);

const parseJson = (text: string): unknown => {
  try {
    return parse(text, null, parseNumber);
  } catch (err) {
    throw bad(err instanceof Error ? err.message : "unparseable document");
  }
};

/**
 * Parses a block document. Every field is optional; a present field must
 * have the right type. Throws `ChainError`.
 */
export const decodeBlock = (text: string): Block => {
  const root = parseJson(text);
  if (typeof root !== "object" || root === null || Array.isArray(root))
    throw bad("root must be an object");

  const parsed = v.safeParse(blockSchema, root, { abortPipeEarly: true });
  if (!parsed.success) {
    const [issue] = parsed.issues;
    throw bad(`${v.getDotPath(issue) ?? "block"}: ${issue.message}`);
  }
  const { prev_hash, ...rest } = parsed.output;
  return { ...rest, prevHash: prev_hash };
};
