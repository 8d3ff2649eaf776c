import { hexEncode } from "../codec/hex";
import { zeroHash } from "./hash";
import type { Block, Transaction } from "./types";

export type Clock = () => bigint;

export const nowSeconds: Clock = () => BigInt(Math.floor(Date.now() / 1000));

/* ── genesis ─────────────────────────────────────────────── */
export const GENESIS_TIMESTAMP = 1672531200n;
export const GENESIS_DATA = "Hello, Chain!";
export const GENESIS_TRANSACTIONS: readonly Transaction[] = [
  { sender: "Alice", receiver: "Bob", amount: 100n },
];

export const createGenesis = (
  over: { data?: string; transactions?: readonly Transaction[]; timestamp?: bigint } = {},
): Block => ({
  index: 0,
  timestamp: over.timestamp ?? GENESIS_TIMESTAMP,
  prevHash: zeroHash(),
  transactions: [...(over.transactions ?? GENESIS_TRANSACTIONS)],
  nonce: 0n,
  data: over.data ?? GENESIS_DATA,
  hash: zeroHash(),
});

/** Unmined successor of `predecessor`; must be mined before it is announced. */
export const createNext = (
  payload: string,
  predecessor: Block,
  now: Clock = nowSeconds,
): Block => ({
  index: predecessor.index + 1,
  timestamp: now(),
  prevHash: predecessor.hash.slice(),
  transactions: [],
  nonce: 0n,
  data: payload,
  hash: zeroHash(),
});

export const cloneBlock = (b: Block): Block => ({
  ...b,
  prevHash: b.prevHash.slice(),
  transactions: b.transactions.map((tx) => ({ ...tx })),
  hash: b.hash.slice(),
});

export const shortHash = (b: Block): string => hexEncode(b.hash).slice(0, 16);

/* ── printable chain state ───────────────────────────────── */
export const describeBlock = (b: Block): string[] => [
  `#${b.index} ts=${b.timestamp} nonce=${b.nonce} hash=${hexEncode(b.hash)} data=${JSON.stringify(b.data)}`,
  ...(b.transactions.length === 0
    ? ["  (no transactions)"]
    : b.transactions.map((tx) => `  ${tx.sender} -> ${tx.receiver} : ${tx.amount}`)),
];
