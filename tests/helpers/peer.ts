import type { Direction, PeerLink } from "../../src/p2p/peers";

/** In-memory peer link that records every line sent to it. */
export class FakePeer implements PeerLink {
  readonly lines: string[] = [];
  open = true;

  constructor(
    readonly key: string,
    readonly direction: Direction = "inbound",
  ) {}

  send(line: string): boolean {
    if (!this.open) return false;
    this.lines.push(line);
    return true;
  }

  close(): void {
    this.open = false;
  }
}
