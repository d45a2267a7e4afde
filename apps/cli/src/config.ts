// apps/cli/src/config.ts
//
// Environment for the terminal solver. Reads the same data and first-guess
// variables as the server (WORDS_FILE, GUESSES_FILE, FREQUENCY_DIR,
// FIRST_GUESS) plus LOG_LEVEL for diagnostics on stderr.

import { fileURLToPath } from 'node:url';
import path from 'node:path';
import { z } from 'zod';

import { createConfig, type DataPaths, type SolverConfig } from '@letterwise/solver-core';

const DATA_DIR = fileURLToPath(new URL('../../../data/', import.meta.url));

const envSchema = z.object({
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('warn'),
  WORDS_FILE: z.string().min(1).default(path.join(DATA_DIR, 'words.txt')),
  GUESSES_FILE: z.string().default(path.join(DATA_DIR, 'guesses.txt')),
  FREQUENCY_DIR: z.string().min(1).default(DATA_DIR),
  FIRST_GUESS: z.string().min(1).optional(),
});

export type CliConfig = {
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
  paths: DataPaths;
  solver: SolverConfig;
};

export function loadCliConfig(env: NodeJS.ProcessEnv): CliConfig {
  const e = envSchema.parse(env);
  return {
    logLevel: e.LOG_LEVEL,
    paths: {
      wordsFile: e.WORDS_FILE,
      guessesFile: e.GUESSES_FILE || undefined,
      frequencyDir: e.FREQUENCY_DIR,
    },
    solver: createConfig({ firstGuess: e.FIRST_GUESS }),
  };
}
