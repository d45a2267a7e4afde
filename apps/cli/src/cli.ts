// apps/cli/src/cli.ts
//
// Terminal driver for the session state machine.
//
// Reads one line per prompt and feeds it to advanceSession(); everything the
// user sees is produced by render.ts. `quit` (any case) at any prompt, or
// end of input, ends the run.

import type { Logger } from 'pino';

import {
  acknowledge,
  advanceSession,
  createSession,
  type SessionState,
  type SolverContext,
} from '@letterwise/solver-core';

import { promptFor, renderAnalysis, renderSolved } from './render.js';

/** Line-oriented terminal access; `ask` resolves null at end of input. */
export interface CliIO {
  ask(prompt: string): Promise<string | null>;
  print(line: string): void;
}

export type CliResult = 'solved' | 'quit';

export async function runCli(ctx: SolverContext, io: CliIO, log: Logger): Promise<CliResult> {
  io.print(`Suggested first guess: ${ctx.config.firstGuess.toUpperCase()}`);
  let state: SessionState = createSession(ctx);

  for (;;) {
    switch (state.phase) {
      case 'solved':
        renderSolved(state.analysis, state.round).forEach((l) => io.print(l));
        log.debug({ round: state.round }, 'session solved');
        return 'solved';
      case 'display':
        renderAnalysis(state.analysis).forEach((l) => io.print(l));
        log.debug(
          { round: state.round, count: state.analysis.result.count, expanded: state.analysis.expanded },
          'round applied',
        );
        state = acknowledge(state);
        continue;
      default: {
        if (state.error) io.print(`Error: ${state.error}`);
        const line = await io.ask(promptFor(state.phase, state.round));
        if (line === null || line.trim().toLowerCase() === 'quit') {
          io.print('Goodbye!');
          return 'quit';
        }
        state = advanceSession(ctx, state, line);
      }
    }
  }
}
