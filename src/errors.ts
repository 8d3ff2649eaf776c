/* ── decode-time structural errors ───────────────────────── */
export type ChainErrorCode = "InvalidHexLength" | "InvalidHexChar" | "InvalidFormat";

export class ChainError extends Error {
  readonly code: ChainErrorCode;

  constructor(code: ChainErrorCode, detail?: string) {
    super(detail ? `${code}: ${detail}` : code);
    this.name = "ChainError";
    this.code = code;
  }
}

export const isChainError = (e: unknown): e is ChainError => e instanceof ChainError;

/* ── transport ───────────────────────────────────────────── */
export class FrameOverflowError extends Error {
  constructor(readonly capacity: number) {
    super(`message exceeds ${capacity} bytes without a newline`);
    this.name = "FrameOverflowError";
  }
}

/* ── startup ─────────────────────────────────────────────── */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
