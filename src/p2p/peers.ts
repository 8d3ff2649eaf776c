export type Direction = "inbound" | "outbound";

/** One live connection, keyed by its remote `address:port`. */
export interface PeerLink {
  readonly key: string;
  readonly direction: Direction;
  /** false when the stream is already closed; later write errors close the link */
  send(line: string): boolean;
  close(): void;
}

export const peerKey = (address: string | undefined, port: number | undefined): string =>
  `${address ?? "unknown"}:${port ?? 0}`;

export class PeerList {
  private peers = new Map<string, PeerLink>();

  add(peer: PeerLink): void {
    this.peers.set(peer.key, peer);
  }

  /** Removes `peer` only if it is still the registered link for its key. */
  remove(peer: PeerLink): boolean {
    if (this.peers.get(peer.key) !== peer) return false;
    return this.peers.delete(peer.key);
  }

  get size(): number {
    return this.peers.size;
  }

  /** Copy for iteration while peers come and go. */
  snapshot(): PeerLink[] {
    return [...this.peers.values()];
  }
}
