// apps/server/src/index.ts
//
// Server entry point: read the environment, load the word lists and
// frequency tables once, then serve the API.
//
// A data load failure is fatal: it is logged and the process exits with a
// non-zero status before the port is opened.

import 'dotenv/config';
import { pino } from 'pino';

import { loadSolverContext, type SolverContext } from '@letterwise/solver-core';

import { createApp } from './app.js';
import { loadServerConfig } from './config.js';

const config = loadServerConfig(process.env);
const log = pino({ level: config.logLevel });

let ctx: SolverContext;
try {
  ctx = loadSolverContext(config.paths, config.solver);
} catch (err) {
  log.fatal({ err, paths: config.paths }, 'failed to load solver data');
  process.exit(1);
}

log.info(
  {
    words: ctx.corpus.words.length,
    guesses: ctx.guessCorpus?.words.length ?? 0,
    firstGuess: ctx.config.firstGuess,
  },
  'solver data loaded',
);

/* -------------------------------------------------------------------------- */
/*                                   Boot                                     */
/* -------------------------------------------------------------------------- */
const app = createApp(ctx, log);
app.listen(config.port, () => log.info({ port: config.port }, 'server up'));
