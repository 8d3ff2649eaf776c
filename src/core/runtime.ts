import type { NodeConfig } from "../config";
import { type ILogger, makeLogger } from "../logging";
import { P2PNode } from "../p2p/node";
import { type Clock, createGenesis, createNext, nowSeconds, shortHash } from "./block";
import { ChainStore } from "./chain";
import { mineAsync } from "./pow";
import type { Block } from "./types";

/* ──────────── runtime shell ──────────── */
// Wires chain, miner and peer engine together. Local payloads are mined one
// at a time on the event loop, in batches, so peer traffic keeps flowing.
export class Runtime {
  readonly chain: ChainStore;
  readonly p2p: P2PNode;
  private readonly config: NodeConfig;
  private readonly clock: Clock;
  private readonly log: ILogger;
  private readonly abort = new AbortController();
  private queue: Promise<unknown> = Promise.resolve();

  constructor(opts: { config: NodeConfig; logger?: ILogger; clock?: Clock }) {
    this.config = opts.config;
    this.clock = opts.clock ?? nowSeconds;
    const root = opts.logger ?? makeLogger(opts.config.logLevel);
    this.log = root.child({ component: "miner" });
    this.chain = new ChainStore({
      difficulty: opts.config.difficulty,
      strictContinuity: opts.config.strictContinuity,
      logger: root,
    });
    this.p2p = new P2PNode({
      chain: this.chain,
      logger: root,
      maxMessageBytes: opts.config.maxMessageBytes,
      reconnectDelayMs: opts.config.reconnectDelayMs,
    });
  }

  /** Listens, dials configured peers, resolves with the bound port. */
  async start(): Promise<number> {
    const port = await this.p2p.listen(this.config.port, this.config.host);
    for (const peer of this.config.peers) this.p2p.connect(peer.host, peer.port);
    return port;
  }

  /**
   * Mines `payload` into a block on top of the current tip, appends it and
   * broadcasts it. Calls are serialised; an empty chain is seeded with a
   * mined genesis first.
   */
  submit(payload: string): Promise<Block> {
    const run = this.queue.then(() => this.produce(payload));
    // failures reach the caller through `run`; the queue itself keeps going
    this.queue = run.catch(() => undefined);
    return run;
  }

  /** Mines and announces the default genesis unless the chain already has blocks. */
  async seedGenesis(): Promise<Block> {
    const existing = this.chain.get(0);
    if (existing) return existing;
    const genesis = await mineAsync(createGenesis(), this.chain.difficulty, {
      signal: this.abort.signal,
    });
    const result = this.chain.append(genesis);
    if (result.ok) {
      this.p2p.broadcast(genesis);
      return genesis;
    }
    // a peer's chain arrived while we were mining
    const synced = this.chain.get(0);
    if (!synced) throw new Error(`genesis rejected: ${result.reason}`);
    return synced;
  }

  private async produce(payload: string): Promise<Block> {
    await this.seedGenesis();
    for (;;) {
      const tip = this.chain.tip();
      if (!tip) throw new Error("chain lost its tip");
      const block = await mineAsync(createNext(payload, tip, this.clock), this.chain.difficulty, {
        signal: this.abort.signal,
      });
      const result = this.chain.append(block);
      if (result.ok) {
        this.p2p.broadcast(block);
        return block;
      }
      if (result.reason !== "bad-index" && result.reason !== "bad-prev-hash")
        throw new Error(`mined block rejected: ${result.reason}`);
      this.log.info({ index: block.index, hash: shortHash(block) }, "tip moved while mining, re-mining");
    }
  }

  status(): string[] {
    return this.chain.describe();
  }

  async stop(): Promise<void> {
    this.abort.abort();
    await this.p2p.close();
  }
}
