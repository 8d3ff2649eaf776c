export type Hash32 = Uint8Array; // always 32 bytes

/* ── application-level transaction ───────────────────────── */
export type Transaction = {
  readonly sender: string;
  readonly receiver: string;
  readonly amount: bigint; // u64
};

/* ── block ───────────────────────────────────────────────── */
// `nonce` and `hash` are written by the miner; everything else is fixed
// once the block is created.
export type Block = {
  readonly index: number; // u32, genesis = 0
  readonly timestamp: bigint; // u64, seconds since epoch
  readonly prevHash: Hash32;
  readonly transactions: readonly Transaction[];
  nonce: bigint; // u64
  readonly data: string;
  hash: Hash32;
};

/* ── chain admission ─────────────────────────────────────── */
export type RejectReason =
  | "bad-hash" // stored hash differs from the recomputed one
  | "insufficient-work"
  | "bad-index"
  | "bad-prev-hash"
  | "duplicate";

export type AppendResult = { ok: true } | { ok: false; reason: RejectReason };

/* ── wire messages ───────────────────────────────────────── */
export type Message =
  | { kind: "block"; block: Block }
  | { kind: "getChain" }
  | { kind: "syncComplete" }
  | { kind: "unknown"; raw: string };
