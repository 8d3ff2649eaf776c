import net from "node:net";
import type { ChainStore } from "../core/chain";
import { shortHash } from "../core/block";
import type { Block, Message } from "../core/types";
import { FrameOverflowError, isChainError } from "../errors";
import type { ILogger } from "../logging";
import { DEFAULT_MAX_MESSAGE_BYTES, LineFramer } from "./framing";
import { type Direction, type PeerLink, PeerList, peerKey } from "./peers";
import { blockLine, formatMessage, parseMessage } from "./protocol";

export const DEFAULT_RECONNECT_DELAY_MS = 5_000;

export interface P2PNodeOptions {
  chain: ChainStore;
  logger: ILogger;
  maxMessageBytes?: number;
  reconnectDelayMs?: number;
}

/* ── outbound dial state machine ─────────────────────────── */
// connecting -> connected -> disconnected -> connecting ... until close()
export type DialState = "connecting" | "connected" | "disconnected";

export interface DialHandle {
  readonly target: string;
  readonly state: DialState;
  readonly attempts: number;
}

class Dialer implements DialHandle {
  state: DialState = "disconnected";
  attempts = 0;
  socket: net.Socket | undefined;
  timer: NodeJS.Timeout | undefined;

  constructor(
    readonly host: string,
    readonly port: number,
  ) {}

  get target(): string {
    return `${this.host}:${this.port}`;
  }
}

/* blocks at indices 0, 1, 2 ... up to the first gap */
const densePrefix = (byIndex: ReadonlyMap<number, Block>): Block[] => {
  const out: Block[] = [];
  for (let block = byIndex.get(0); block; block = byIndex.get(out.length)) out.push(block);
  return out;
};

/**
 * Peer protocol engine: accepts and dials TCP peers, frames their streams
 * into lines and applies `BLOCK:` / `GET_CHAIN` messages to the chain.
 */
export class P2PNode {
  readonly peers = new PeerList();
  private readonly chain: ChainStore;
  private readonly log: ILogger;
  private readonly maxMessageBytes: number;
  private readonly reconnectDelayMs: number;
  private server: net.Server | undefined;
  private dialers: Dialer[] = [];
  private pending: Block[] = [];
  private syncing = new Map<string, Map<number, Block>>(); // peer key -> last block seen per index since GET_CHAIN
  private closed = false;

  constructor(opts: P2PNodeOptions) {
    this.chain = opts.chain;
    this.log = opts.logger.child({ component: "p2p" });
    this.maxMessageBytes = opts.maxMessageBytes ?? DEFAULT_MAX_MESSAGE_BYTES;
    this.reconnectDelayMs = opts.reconnectDelayMs ?? DEFAULT_RECONNECT_DELAY_MS;
  }

  get pendingBlocks(): readonly Block[] {
    return this.pending;
  }

  /* ── inbound ───────────────────────────────────────────── */
  /** Starts accepting peers; resolves with the bound port. */
  listen(port: number, host = "0.0.0.0"): Promise<number> {
    const server = net.createServer((socket) => {
      const link = this.attach(socket, "inbound");
      this.log.info({ peer: link.key, peers: this.peers.size }, "peer accepted");
    });
    this.server = server;
    return new Promise((resolve, reject) => {
      server.once("error", reject);
      server.listen(port, host, () => {
        server.off("error", reject);
        server.on("error", (err) => this.log.error({ err: err.message }, "listener error"));
        const addr = server.address();
        const bound = typeof addr === "object" && addr ? addr.port : port;
        this.log.info({ port: bound }, "listening for peers");
        resolve(bound);
      });
    });
  }

  /* ── outbound ──────────────────────────────────────────── */
  /** Dials `host:port` and keeps redialing after failures or disconnects until `close()`. */
  connect(host: string, port: number): DialHandle {
    const d = new Dialer(host, port);
    this.dialers.push(d);
    this.dial(d);
    return d;
  }

  private dial(d: Dialer): void {
    if (this.closed) return;
    d.state = "connecting";
    d.attempts++;
    const socket = net.connect({ host: d.host, port: d.port });
    d.socket = socket;
    let connected = false;

    socket.on("error", (err) => {
      if (!connected)
        this.log.warn(
          { target: d.target, err: err.message, retryMs: this.reconnectDelayMs, attempt: d.attempts },
          "dial failed",
        );
    });
    socket.once("connect", () => {
      connected = true;
      d.state = "connected";
      const link = this.attach(socket, "outbound");
      this.log.info({ peer: link.key, target: d.target }, "connected to peer");
      this.requestChain(link);
    });
    socket.once("close", () => {
      d.socket = undefined;
      d.state = "disconnected";
      if (this.closed) return;
      d.timer = setTimeout(() => this.dial(d), this.reconnectDelayMs);
    });
  }

  /* ── connection plumbing ───────────────────────────────── */
  private attach(socket: net.Socket, direction: Direction): PeerLink {
    const key = peerKey(socket.remoteAddress, socket.remotePort);
    const framer = new LineFramer(this.maxMessageBytes);
    const link: PeerLink = {
      key,
      direction,
      send: (line) => {
        if (socket.destroyed || !socket.writable) return false;
        socket.write(line, (err) => {
          if (!err) return;
          this.log.warn({ peer: key, err: err.message }, "write failed, dropping peer");
          socket.destroy();
        });
        return true;
      },
      close: () => {
        socket.destroy();
      },
    };

    socket.setNoDelay(true);
    socket.on("data", (chunk: Buffer) => {
      try {
        for (const line of framer.push(chunk)) this.receive(link, line);
      } catch (err) {
        if (err instanceof FrameOverflowError)
          this.log.error({ peer: key, capacity: err.capacity }, "message too long, closing peer");
        else
          this.log.error({ peer: key, err: err instanceof Error ? err.message : String(err) }, "peer handler failed, closing peer");
        socket.destroy();
      }
    });
    socket.on("error", (err) => this.log.warn({ peer: key, err: err.message }, "peer socket error"));
    socket.on("close", () => {
      this.peers.remove(link);
      this.syncing.delete(key);
      this.log.info({ peer: key, peers: this.peers.size }, "peer disconnected");
    });

    this.register(link);
    return link;
  }

  /** Adds `link` to the peer list and hands it any blocks queued while no peer was reachable. */
  register(link: PeerLink): void {
    this.peers.add(link);
    if (this.pending.length === 0) return;
    this.log.info({ peer: link.key, blocks: this.pending.length }, "flushing queued blocks");
    for (const block of this.pending) link.send(blockLine(block));
    this.pending = [];
  }

  requestChain(link: PeerLink): void {
    this.syncing.set(link.key, new Map());
    link.send(formatMessage({ kind: "getChain" }));
    this.log.info({ peer: link.key }, "requested chain");
  }

  /* ── dispatch ──────────────────────────────────────────── */
  /** Handles one framed line from `peer`. */
  receive(peer: PeerLink, line: string): void {
    let msg: Message;
    try {
      msg = parseMessage(line);
    } catch (err) {
      if (!isChainError(err)) throw err;
      this.log.error({ peer: peer.key, code: err.code, err: err.message }, "undecodable block message");
      return;
    }

    switch (msg.kind) {
      case "block":
        return this.onBlock(peer, msg.block);
      case "getChain":
        return this.sendFullChain(peer);
      case "syncComplete":
        return this.onSyncComplete(peer);
      case "unknown":
        this.log.info({ peer: peer.key, raw: msg.raw.slice(0, 120) }, "unknown message");
        return;
    }
  }

  private onBlock(peer: PeerLink, block: Block): void {
    this.syncing.get(peer.key)?.set(block.index, block);
    const result = this.chain.append(block);
    if (!result.ok) return;
    this.broadcast(block, peer.key);
  }

  private onSyncComplete(peer: PeerLink): void {
    const seen = this.syncing.get(peer.key);
    this.syncing.delete(peer.key);
    const candidate = seen ? densePrefix(seen) : [];
    this.log.info(
      { peer: peer.key, received: seen?.size ?? 0, candidate: candidate.length, height: this.chain.height() },
      "chain sync complete",
    );
    if (candidate.length > this.chain.height()) this.chain.replaceIfLonger(candidate);
  }

  sendFullChain(peer: PeerLink): void {
    const blocks = this.chain.toArray();
    this.log.info({ peer: peer.key, height: blocks.length }, "sending full chain");
    for (const block of blocks) peer.send(blockLine(block));
    peer.send(formatMessage({ kind: "syncComplete" }));
  }

  /**
   * Sends `block` to every peer except `exclude` (a peer key). A locally
   * produced block that reaches nobody is queued for the next peer.
   */
  broadcast(block: Block, exclude?: string): number {
    const line = blockLine(block);
    let sent = 0;
    for (const peer of this.peers.snapshot()) {
      if (peer.key === exclude) continue;
      if (peer.send(line)) sent++;
    }
    if (sent === 0 && exclude === undefined) {
      this.pending.push(block);
      this.log.warn({ index: block.index, hash: shortHash(block) }, "no reachable peer, block queued");
    } else {
      this.log.debug({ index: block.index, sent, exclude }, "block broadcast");
    }
    return sent;
  }

  /* ── shutdown ──────────────────────────────────────────── */
  async close(): Promise<void> {
    this.closed = true;
    for (const d of this.dialers) {
      clearTimeout(d.timer);
      d.socket?.destroy();
    }
    for (const peer of this.peers.snapshot()) peer.close();
    const server = this.server;
    if (!server) return;
    await new Promise<void>((resolve) =>
      server.close((err) => {
        if (err) this.log.debug({ err: err.message }, "listener already stopped");
        resolve();
      }),
    );
  }
}
