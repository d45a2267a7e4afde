// apps/server/src/config.ts
//
// Environment configuration for the HTTP server, validated with Zod.
//
//   PORT           → listen port (default 3001)
//   LOG_LEVEL      → pino level (default info)
//   WORDS_FILE     → solution word list (default data/words.txt)
//   GUESSES_FILE   → extra allowed guesses (default data/guesses.txt, "" disables)
//   FREQUENCY_DIR  → directory holding pos1.txt … pos5.txt (default data/)
//   FIRST_GUESS    → opening word (default saint)

import { fileURLToPath } from 'node:url';
import path from 'node:path';
import { z } from 'zod';

import { createConfig, type DataPaths, type SolverConfig } from '@letterwise/solver-core';

export const DATA_DIR = fileURLToPath(new URL('../../../data/', import.meta.url));

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3001),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  WORDS_FILE: z.string().min(1).optional(),
  GUESSES_FILE: z.string().optional(),
  FREQUENCY_DIR: z.string().min(1).optional(),
  FIRST_GUESS: z.string().min(1).optional(),
});

export type ServerConfig = {
  port: number;
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
  paths: DataPaths;
  solver: SolverConfig;
};

/**
 * Parse process.env (or a test stand-in).
 *
 * @throws ZodError on malformed variables, Error on an unusable FIRST_GUESS.
 */
export function loadServerConfig(env: NodeJS.ProcessEnv): ServerConfig {
  const e = envSchema.parse(env);
  return {
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    paths: {
      wordsFile: e.WORDS_FILE ?? path.join(DATA_DIR, 'words.txt'),
      guessesFile: e.GUESSES_FILE === '' ? undefined : e.GUESSES_FILE ?? path.join(DATA_DIR, 'guesses.txt'),
      frequencyDir: e.FREQUENCY_DIR ?? DATA_DIR,
    },
    solver: createConfig({ firstGuess: e.FIRST_GUESS }),
  };
}
