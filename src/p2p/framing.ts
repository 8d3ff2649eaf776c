import { FrameOverflowError } from "../errors";

export const DEFAULT_MAX_MESSAGE_BYTES = 4096;

const NEWLINE = 0x0a;

/**
 * Splits a byte stream into newline-terminated messages using a fixed-size
 * buffer. Partial messages carry over between pushes; a buffer that fills
 * up without a newline raises `FrameOverflowError`.
 */
export class LineFramer {
  private buf: Buffer;
  private used = 0;

  constructor(readonly capacity: number = DEFAULT_MAX_MESSAGE_BYTES) {
    if (!Number.isInteger(capacity) || capacity < 1)
      throw new RangeError(`framer capacity must be a positive integer, got ${capacity}`);
    this.buf = Buffer.alloc(capacity);
  }

  get pending(): number {
    return this.used;
  }

  /** Yields each complete message (without its newline) as soon as it is found. */
  *push(chunk: Uint8Array): Generator<string, void, undefined> {
    let offset = 0;
    while (offset < chunk.length) {
      const n = Math.min(this.capacity - this.used, chunk.length - offset);
      this.buf.set(chunk.subarray(offset, offset + n), this.used);
      this.used += n;
      offset += n;

      let start = 0;
      for (;;) {
        const nl = this.buf.subarray(0, this.used).indexOf(NEWLINE, start);
        if (nl === -1) break;
        yield this.buf.toString("utf8", start, nl);
        start = nl + 1;
      }
      if (start > 0) {
        this.buf.copyWithin(0, start, this.used);
        this.used -= start;
      }
      if (this.used === this.capacity) throw new FrameOverflowError(this.capacity);
    }
  }
}
