import type { ILogger } from "../logging";
import { bytesEqual } from "../utils/bytes";
import { cloneBlock, describeBlock, shortHash } from "./block";
import { clampDifficulty, zeroHash } from "./hash";
import { checkWork } from "./pow";
import type { AppendResult, Block } from "./types";

export interface ChainStoreOptions {
  difficulty: number;
  /** require index == height and prev_hash == tip.hash on append */
  strictContinuity?: boolean;
  logger: ILogger;
}

/**
 * In-memory chain owned by a single event loop. Every mutation is a
 * synchronous call, so appends and replacements never interleave.
 */
export class ChainStore {
  readonly difficulty: number;
  readonly strictContinuity: boolean;
  private blocks: Block[] = [];
  private log: ILogger;

  constructor(opts: ChainStoreOptions) {
    this.difficulty = clampDifficulty(opts.difficulty);
    this.strictContinuity = opts.strictContinuity ?? true;
    this.log = opts.logger.child({ component: "chain" });
  }

  height(): number {
    return this.blocks.length;
  }

  /* readers get copies; stored blocks are never handed out */
  get(index: number): Block | undefined {
    const block = this.blocks[index];
    return block && cloneBlock(block);
  }

  tip(): Block | undefined {
    return this.get(this.blocks.length - 1);
  }

  toArray(): Block[] {
    return this.blocks.map(cloneBlock);
  }

  /** Admission check of `block` as the successor of `prev`, without mutating. */
  private admit(
    block: Block,
    prev: Block | undefined,
    at: number,
    continuity: boolean,
  ): AppendResult {
    const work = checkWork(block, this.difficulty);
    if (work) return { ok: false, reason: work };
    if (!continuity) return { ok: true };
    if (block.index !== at) return { ok: false, reason: "bad-index" };
    const expectedPrev = prev ? prev.hash : zeroHash();
    if (!bytesEqual(block.prevHash, expectedPrev)) return { ok: false, reason: "bad-prev-hash" };
    return { ok: true };
  }

  append(block: Block): AppendResult {
    const known = this.blocks[block.index];
    const result: AppendResult =
      known && bytesEqual(known.hash, block.hash) && checkWork(block, this.difficulty) === null
        ? { ok: false, reason: "duplicate" }
        : this.admit(block, this.tip(), this.blocks.length, this.strictContinuity);

    if (!result.ok) {
      this.log.warn(
        { index: block.index, hash: shortHash(block), reason: result.reason },
        "block rejected",
      );
      return result;
    }
    this.blocks.push(cloneBlock(block));
    this.log.info(
      { index: block.index, nonce: block.nonce.toString(), hash: shortHash(block), height: this.blocks.length },
      "block appended",
    );
    return result;
  }

  /**
   * Longest-chain rule: adopt `candidate` when it has more blocks than the
   * current chain and every block in it re-verifies, continuity included.
   */
  replaceIfLonger(candidate: readonly Block[]): boolean {
    if (candidate.length <= this.blocks.length) {
      this.log.info(
        { candidate: candidate.length, current: this.blocks.length },
        "candidate chain not longer, keeping current",
      );
      return false;
    }
    for (let i = 0; i < candidate.length; i++) {
      const verdict = this.admit(candidate[i], i === 0 ? undefined : candidate[i - 1], i, true);
      if (!verdict.ok) {
        this.log.warn({ at: i, reason: verdict.reason }, "candidate chain rejected");
        return false;
      }
    }
    this.blocks = candidate.map(cloneBlock);
    this.log.info({ height: this.blocks.length }, "chain replaced");
    return true;
  }

  describe(): string[] {
    return this.blocks.length === 0
      ? ["(empty chain)"]
      : this.blocks.flatMap(describeBlock);
  }
}
