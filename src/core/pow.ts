import { bytesEqual } from "../utils/bytes";
import { computeHash, meetsDifficulty, nonceHasher } from "./hash";
import type { Block, RejectReason } from "./types";

/**
 * Increments `block.nonce` until its hash meets `difficulty`, then stores the
 * digest in `block.hash`. Blocks the calling thread until solved; expected
 * work is 256^difficulty hashes.
 */
export const mine = (block: Block, difficulty: number): Block => {
  const hashAt = nonceHasher(block);
  for (;;) {
    const digest = hashAt(block.nonce);
    if (meetsDifficulty(digest, difficulty)) {
      block.hash = digest;
      return block;
    }
    block.nonce += 1n;
  }
};

export interface MineOptions {
  signal?: AbortSignal;
  /** hashes tried between two yields to the event loop */
  batchSize?: number;
}

const DEFAULT_BATCH = 4096;

const yieldToLoop = () => new Promise<void>((resolve) => setImmediate(resolve));

/**
 * Same search as `mine`, split into batches so sockets and timers keep
 * running. Rejects with the signal's reason once aborted.
 */
export const mineAsync = async (
  block: Block,
  difficulty: number,
  { signal, batchSize = DEFAULT_BATCH }: MineOptions = {},
): Promise<Block> => {
  const hashAt = nonceHasher(block);
  for (;;) {
    signal?.throwIfAborted();
    for (let i = 0; i < batchSize; i++) {
      const digest = hashAt(block.nonce);
      if (meetsDifficulty(digest, difficulty)) {
        block.hash = digest;
        return block;
      }
      block.nonce += 1n;
    }
    await yieldToLoop();
  }
};

/** Why `block` fails proof-of-work, or null when it passes. */
export const checkWork = (
  block: Block,
  difficulty: number,
): Extract<RejectReason, "bad-hash" | "insufficient-work"> | null => {
  const recomputed = computeHash(block);
  if (!bytesEqual(recomputed, block.hash)) return "bad-hash";
  if (!meetsDifficulty(recomputed, difficulty)) return "insufficient-work";
  return null;
};

export const verify = (block: Block, difficulty: number): boolean =>
  checkWork(block, difficulty) === null;
