import { sha256 } from "@noble/hashes/sha256";
import { concatBytes, utf8ToBytes } from "@noble/hashes/utils";
import { toBytesU32, toBytesU64 } from "../utils/bytes";
import type { Block, Hash32 } from "./types";

export const HASH_SIZE = 32;
export const MAX_DIFFICULTY = 32;

export const zeroHash = (): Hash32 => new Uint8Array(HASH_SIZE);

/* ── field order is consensus-critical ───────────────────── */
// index, timestamp, nonce, prev_hash, per tx (sender, receiver, amount), data.
// The hash field never feeds itself.
const tailBytes = (b: Block): Uint8Array =>
  concatBytes(
    b.prevHash,
    ...b.transactions.flatMap((tx) => [
      utf8ToBytes(tx.sender),
      utf8ToBytes(tx.receiver),
      toBytesU64(tx.amount),
    ]),
    utf8ToBytes(b.data),
  );

export const computeHash = (b: Block): Hash32 =>
  sha256
    .create()
    .update(toBytesU32(b.index))
    .update(toBytesU64(b.timestamp))
    .update(toBytesU64(b.nonce))
    .update(tailBytes(b))
    .digest();

/**
 * Hashes `b` for arbitrary nonces without re-encoding the fixed fields.
 * Produces the same digest as `computeHash` with `nonce` substituted.
 */
export const nonceHasher = (b: Block): ((nonce: bigint) => Hash32) => {
  const head = sha256.create().update(toBytesU32(b.index)).update(toBytesU64(b.timestamp));
  const tail = tailBytes(b);
  return (nonce) => head.clone().update(toBytesU64(nonce)).update(tail).digest();
};

export const clampDifficulty = (difficulty: number): number =>
  Math.min(Math.max(Math.trunc(difficulty), 0), MAX_DIFFICULTY);

/** True iff the first `difficulty` bytes (at most 32) are zero. */
export const meetsDifficulty = (hash: Hash32, difficulty: number): boolean => {
  const limit = clampDifficulty(difficulty);
  for (let i = 0; i < limit; i++) if (hash[i] !== 0) return false;
  return true;
};
