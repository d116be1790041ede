// packages/game-core/src/logger.ts

import { pino, type DestinationStream, type Logger } from 'pino';

import type { HangmanConfig } from './config.js';

export type { Logger } from 'pino';

/**
 * createLogger returns the root "hangman" logger.
 *
 * @param destination - where lines go; stdout when omitted
 */
export function createLogger(
  config: Pick<HangmanConfig, 'logLevel'>,
  destination?: DestinationStream,
): Logger {
  const options = { name: 'hangman', level: config.logLevel };
  return destination ? pino(options, destination) : pino(options);
}
