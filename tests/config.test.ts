import { describe, it, expect } from "vitest";
import { DEFAULT_DIFFICULTY, DEFAULT_PORT, loadConfig, parsePeerSpec } from "../src/config";
import { ConfigError } from "../src/errors";

describe("peer addresses", () => {
  it("splits host and port", () => {
    expect(parsePeerSpec("127.0.0.1:3001")).toEqual({ host: "127.0.0.1", port: 3001 });
    expect(parsePeerSpec("node-b.local:80")).toEqual({ host: "node-b.local", port: 80 });
  });

  it("handles IPv6 hosts", () => {
    expect(parsePeerSpec("[::1]:3001")).toEqual({ host: "::1", port: 3001 });
    expect(parsePeerSpec("::1:3001")).toEqual({ host: "::1", port: 3001 });
  });

  it.each(["localhost", ":3001", "host:", "host:abc", "host:0", "host:70000"])("rejects %s", (spec) => {
    expect(() => parsePeerSpec(spec)).toThrow(ConfigError);
  });
});

describe("loadConfig", () => {
  it("uses defaults with no arguments", () => {
    const cfg = loadConfig([], {});
    expect(cfg).toEqual({
      port: DEFAULT_PORT,
      host: "0.0.0.0",
      peers: [],
      difficulty: DEFAULT_DIFFICULTY,
      logLevel: "info",
      reconnectDelayMs: 5000,
      maxMessageBytes: 4096,
      strictContinuity: true,
    });
  });

  it("reads port and peers from positionals", () => {
    const cfg = loadConfig(["3001", "127.0.0.1:3000", "10.0.0.2:3002"], {});
    expect(cfg.port).toBe(3001);
    expect(cfg.peers).toEqual([
      { host: "127.0.0.1", port: 3000 },
      { host: "10.0.0.2", port: 3002 },
    ]);
  });

  it("accepts flags in both spellings", () => {
    expect(loadConfig(["--difficulty", "3", "3001"], {}).difficulty).toBe(3);
    expect(loadConfig(["--difficulty=1", "--log-level=silent", "--host", "127.0.0.1"], {})).toMatchObject({
      difficulty: 1,
      logLevel: "silent",
      host: "127.0.0.1",
    });
  });

  it("clamps difficulty at 32", () => {
    expect(loadConfig(["--difficulty", "99"], {}).difficulty).toBe(32);
  });

  it("falls back to the environment", () => {
    const cfg = loadConfig([], {
      P2P_PORT: "4000",
      PEERS: "127.0.0.1:4001, 127.0.0.1:4002",
      DIFFICULTY: "1",
      LOG_LEVEL: "warn",
      RECONNECT_DELAY_MS: "250",
      MAX_MESSAGE_BYTES: "8192",
      STRICT_CONTINUITY: "off",
    });
    expect(cfg).toMatchObject({
      port: 4000,
      peers: [
        { host: "127.0.0.1", port: 4001 },
        { host: "127.0.0.1", port: 4002 },
      ],
      difficulty: 1,
      logLevel: "warn",
      reconnectDelayMs: 250,
      maxMessageBytes: 8192,
      strictContinuity: false,
    });
  });

  it("prefers arguments over the environment", () => {
    const cfg = loadConfig(["5000", "--difficulty", "0"], { P2P_PORT: "4000", DIFFICULTY: "3" });
    expect(cfg.port).toBe(5000);
    expect(cfg.difficulty).toBe(0);
  });

  it.each([
    [["notaport"], {}],
    [["--difficulty"], {}],
    [["--difficulty", "-1"], {}],
    [["--log-level", "loud"], {}],
    [[], { MAX_MESSAGE_BYTES: "1" }],
    [[], { STRICT_CONTINUITY: "maybe" }],
    [[], { RECONNECT_DELAY_MS: "soon" }],
  ])("rejects %j %j", (argv, env) => {
    expect(() => loadConfig(argv, env)).toThrow(ConfigError);
  });
});
