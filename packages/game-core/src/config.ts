// packages/game-core/src/config.ts
//
// Runtime settings, read from the environment.
//
// Sources, highest priority first:
//   1. the env object passed in (process.env by default)
//   2. an optional .env file, parsed with dotenv
//   3. defaults below
//
// Variables:
//   • LOG_LEVEL     → pino level, default "info"
//   • HANGMAN_TURNS → wrong guesses allowed in a new session, default 6

import fs from 'node:fs';
import { parse } from 'dotenv';
import { z } from 'zod';

import { parseOrThrow } from './errors.js';

export const logLevelSchema = z.enum([
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
]);
export type LogLevel = z.infer<typeof logLevelSchema>;

const envSchema = z.object({
  LOG_LEVEL: logLevelSchema.default('info'),
  HANGMAN_TURNS: z.coerce.number().int().min(1).default(6),
});

export interface HangmanConfig {
  logLevel: LogLevel;
  defaultTurns: number;
}

export type LoadConfigOptions = {
  env?: NodeJS.ProcessEnv;
  envFile?: string;
};

export function loadConfig(options: LoadConfigOptions = {}): HangmanConfig {
  const env = options.env ?? process.env;
  let fromFile: Record<string, string> = {};
  if (options.envFile && fs.existsSync(options.envFile)) {
    fromFile = parse(fs.readFileSync(options.envFile));
  }

  // Empty strings count as unset: `HANGMAN_TURNS=` falls back to the default.
  const pick = (key: string): string | undefined =>
    env[key] || fromFile[key] || undefined;

  const parsed = parseOrThrow(
    envSchema,
    { LOG_LEVEL: pick('LOG_LEVEL'), HANGMAN_TURNS: pick('HANGMAN_TURNS') },
    'configuration',
  );
  return { logLevel: parsed.LOG_LEVEL, defaultTurns: parsed.HANGMAN_TURNS };
}
