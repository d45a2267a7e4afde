// apps/cli/src/index.ts
//
// Entry point for the terminal solver: `npm run solve` from the repo root.
// Prompts go to stdout; pino diagnostics go to stderr so they never mix
// with the transcript.

import 'dotenv/config';
import { createInterface } from 'node:readline/promises';
import pino from 'pino';

import { loadSolverContext, type SolverContext } from '@letterwise/solver-core';

import { runCli } from './cli.js';
import { loadCliConfig } from './config.js';

const config = loadCliConfig(process.env);
const log = pino({ level: config.logLevel }, pino.destination(2));

let ctx: SolverContext;
try {
  ctx = loadSolverContext(config.paths, config.solver);
} catch (err) {
  log.fatal({ err, paths: config.paths }, 'failed to load solver data');
  process.exit(1);
}
log.info({ words: ctx.corpus.words.length, guesses: ctx.guessCorpus?.words.length ?? 0 }, 'solver data loaded');

const rl = createInterface({ input: process.stdin, output: process.stdout });
let closed = false;
// Resolves when stdin ends, so a pending question does not hang the run.
const endOfInput = new Promise<null>((resolve) =>
  rl.once('close', () => {
    closed = true;
    resolve(null);
  }),
);

await runCli(
  ctx,
  {
    ask: (prompt) => (closed ? Promise.resolve(null) : Promise.race([rl.question(prompt), endOfInput])),
    print: (line) => console.log(line),
  },
  log,
);
rl.close();
