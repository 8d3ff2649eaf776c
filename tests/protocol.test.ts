import { describe, it, expect } from "vitest";
import { encodeBlock } from "../src/codec/block";
import { ChainError } from "../src/errors";
import { blockLine, formatMessage, parseMessage } from "../src/p2p/protocol";
import { minedGenesis } from "./helpers/block";

describe("line protocol", () => {
  it("formats each message with a trailing newline", () => {
    expect(formatMessage({ kind: "getChain" })).toBe("GET_CHAIN\n");
    expect(formatMessage({ kind: "syncComplete" })).toBe("CHAIN_SYNC_COMPLETE\n");
    const g = minedGenesis();
    expect(blockLine(g)).toBe(`BLOCK:${encodeBlock(g)}\n`);
  });

  it("parses a block line", () => {
    const g = minedGenesis();
    const msg = parseMessage(`BLOCK:${encodeBlock(g)}`);
    expect(msg).toEqual({ kind: "block", block: g });
  });

  it("matches commands by prefix", () => {
    expect(parseMessage("GET_CHAIN")).toEqual({ kind: "getChain" });
    expect(parseMessage("GET_CHAIN please")).toEqual({ kind: "getChain" });
    expect(parseMessage("CHAIN_SYNC_COMPLETE")).toEqual({ kind: "syncComplete" });
  });

  it("passes unknown lines through", () => {
    expect(parseMessage("HELLO")).toEqual({ kind: "unknown", raw: "HELLO" });
    expect(parseMessage("")).toEqual({ kind: "unknown", raw: "" });
  });

  it("throws on a block payload that does not decode", () => {
    expect(() => parseMessage("BLOCK:{not json")).toThrow(ChainError);
  });
});
