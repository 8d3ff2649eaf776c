import readline from "node:readline";
import { loadConfig } from "./config";
import { Runtime } from "./core/runtime";
import { makeLogger } from "./logging";

export { Runtime } from "./core/runtime";
export { ChainStore } from "./core/chain";
export { P2PNode } from "./p2p/node";
export { computeHash, meetsDifficulty } from "./core/hash";
export { mine, mineAsync, verify } from "./core/pow";
export { createGenesis, createNext } from "./core/block";
export { decodeBlock, encodeBlock } from "./codec/block";
export { hexDecode, hexEncode } from "./codec/hex";
export { loadConfig } from "./config";
export type { Block, Transaction } from "./core/types";

const main = async () => {
  const config = loadConfig(process.argv.slice(2));
  const log = makeLogger(config.logLevel);
  const runtime = new Runtime({ config, logger: log });
  const port = await runtime.start();
  log.info({ port, difficulty: config.difficulty, peers: config.peers.length }, "node started");

  /* every stdin line becomes a block; "status" prints the chain */
  const rl = readline.createInterface({ input: process.stdin });
  rl.on("line", (line) => {
    if (line.trim() === "status") {
      for (const row of runtime.status()) process.stdout.write(`${row}\n`);
      return;
    }
    runtime.submit(line).then(
      (block) => log.info({ index: block.index, nonce: block.nonce.toString() }, "block mined"),
      (err: unknown) => log.error({ err: err instanceof Error ? err.message : String(err) }, "mining failed"),
    );
  });

  const shutdown = () => {
    rl.close();
    runtime.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error({ err: err instanceof Error ? err.message : String(err) }, "shutdown failed");
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
};

if (process.argv[1] && import.meta.url === new URL(`file://${process.argv[1]}`).href) {
  main().catch((err: unknown) => {
    process.stderr.write(`${err instanceof Error ? err.message : String(err)}\n`);
    process.exit(1);
  });
}
