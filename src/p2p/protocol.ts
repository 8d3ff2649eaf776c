import { decodeBlock, encodeBlock } from "../codec/block";
import type { Block, Message } from "../core/types";

/* ── wire format: one message per line ───────────────────── */
export const BLOCK_PREFIX = "BLOCK:";
export const GET_CHAIN = "GET_CHAIN";
export const CHAIN_SYNC_COMPLETE = "CHAIN_SYNC_COMPLETE";

/**
 * Classifies one framed line. A `BLOCK:` payload that does not decode
 * throws `ChainError`; anything unrecognised comes back as `unknown`.
 */
export const parseMessage = (line: string): Message => {
  if (line.startsWith(BLOCK_PREFIX))
    return { kind: "block", block: decodeBlock(line.slice(BLOCK_PREFIX.length)) };
  if (line.startsWith(GET_CHAIN)) return { kind: "getChain" };
  if (line.startsWith(CHAIN_SYNC_COMPLETE)) return { kind: "syncComplete" };
  return { kind: "unknown", raw: line };
};

export type Outgoing = Exclude<Message, { kind: "unknown" }>;

/** Serialises `msg` including its terminating newline. */
export const formatMessage = (msg: Outgoing): string => {
  switch (msg.kind) {
    case "block":
      return `${BLOCK_PREFIX}${encodeBlock(msg.block)}\n`;
    case "getChain":
      return `${GET_CHAIN}\n`;
    case "syncComplete":
      return `${CHAIN_SYNC_COMPLETE}\n`;
  }
};

export const blockLine = (block: Block): string => formatMessage({ kind: "block", block });
