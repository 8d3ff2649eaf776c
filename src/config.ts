import { clampDifficulty } from "./core/hash";
import { ConfigError } from "./errors";
import { isLogLevel, type LogLevel } from "./logging";
import { DEFAULT_MAX_MESSAGE_BYTES } from "./p2p/framing";
import { DEFAULT_RECONNECT_DELAY_MS } from "./p2p/node";

export type PeerTarget = { host: string; port: number };

export interface NodeConfig {
  port: number;
  host: string;
  peers: PeerTarget[];
  difficulty: number;
  logLevel: LogLevel;
  reconnectDelayMs: number;
  maxMessageBytes: number;
  strictContinuity: boolean;
}

export const DEFAULT_PORT = 3000;
export const DEFAULT_DIFFICULTY = 2;

type Env = Record<string, string | undefined>;

const parsePort = (raw: string, what: string): number => {
  const n = Number(raw);
  if (!/^\d+$/.test(raw) || n < 1 || n > 65535) throw new ConfigError(`${what}: invalid port "${raw}"`);
  return n;
};

const parseCount = (raw: string, what: string, min: number): number => {
  const n = Number(raw);
  if (!/^\d+$/.test(raw) || n < min) throw new ConfigError(`${what}: expected an integer >= ${min}, got "${raw}"`);
  return n;
};

const parseBool = (raw: string, what: string): boolean => {
  if (/^(1|true|yes|on)$/i.test(raw)) return true;
  if (/^(0|false|no|off)$/i.test(raw)) return false;
  throw new ConfigError(`${what}: expected a boolean, got "${raw}"`);
};

/** `host:port`; the last colon separates the port so bracketless IPv6 hosts still parse. */
export const parsePeerSpec = (spec: string): PeerTarget => {
  const at = spec.lastIndexOf(":");
  if (at <= 0 || at === spec.length - 1) throw new ConfigError(`peer "${spec}" is not host:port`);
  const host = spec.slice(0, at).replace(/^\[(.*)\]$/, "$1");
  return { host, port: parsePort(spec.slice(at + 1), `peer "${spec}"`) };
};

/**
 * Builds the node configuration from CLI arguments, falling back to the
 * environment: `[--difficulty N] [--host H] <port> [host:port ...]`.
 */
export const loadConfig = (argv: readonly string[], env: Env = process.env): NodeConfig => {
  const positional: string[] = [];
  const flags = new Map<string, string>();
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith("--")) {
      positional.push(arg);
      continue;
    }
    const eq = arg.indexOf("=");
    if (eq !== -1) {
      flags.set(arg.slice(2, eq), arg.slice(eq + 1));
      continue;
    }
    const value = argv[i + 1];
    if (value === undefined) throw new ConfigError(`${arg} needs a value`);
    flags.set(arg.slice(2), value);
    i++;
  }

  const [portArg, ...peerArgs] = positional;
  const portRaw = portArg ?? env.P2P_PORT;
  const peerSpecs =
    peerArgs.length > 0 ? peerArgs : (env.PEERS ?? "").split(",").map((s) => s.trim()).filter(Boolean);
  const difficultyRaw = flags.get("difficulty") ?? env.DIFFICULTY;
  const logLevel = flags.get("log-level") ?? env.LOG_LEVEL ?? "info";
  if (!isLogLevel(logLevel)) throw new ConfigError(`unknown log level "${logLevel}"`);
  const reconnectRaw = env.RECONNECT_DELAY_MS;
  const maxBytesRaw = env.MAX_MESSAGE_BYTES;
  const strictRaw = env.STRICT_CONTINUITY;

  return {
    port: portRaw === undefined ? DEFAULT_PORT : parsePort(portRaw, "port"),
    host: flags.get("host") ?? env.P2P_HOST ?? "0.0.0.0",
    peers: peerSpecs.map(parsePeerSpec),
    difficulty:
      difficultyRaw === undefined
        ? DEFAULT_DIFFICULTY
        : clampDifficulty(parseCount(difficultyRaw, "difficulty", 0)),
    logLevel,
    reconnectDelayMs:
      reconnectRaw === undefined ? DEFAULT_RECONNECT_DELAY_MS : parseCount(reconnectRaw, "RECONNECT_DELAY_MS", 0),
    maxMessageBytes:
      maxBytesRaw === undefined ? DEFAULT_MAX_MESSAGE_BYTES : parseCount(maxBytesRaw, "MAX_MESSAGE_BYTES", 2),
    strictContinuity: strictRaw === undefined ? true : parseBool(strictRaw, "STRICT_CONTINUITY"),
  };
};
