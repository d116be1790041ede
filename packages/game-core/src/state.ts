// packages/game-core/src/state.ts
//
// The hangman game state and how a game starts.
//
// A GameState is a readonly value. Every move produces a new one; nothing
// in game-core mutates a state it was handed.

import { newGameReq, TERMINAL_STATUSES } from '@hangman/protocol';
import type {
  GameStatus,
  NewGameReq,
  TerminalStatus,
} from '@hangman/protocol';

import { parseOrThrow } from './errors.js';
import { secretLettersOf } from './words.js';

export type { GameStatus, NewGameReq } from '@hangman/protocol';

export interface GameState {
  /** Characters of the hidden word; fixed for the life of the game. */
  readonly secretLetters: ReadonlySet<string>;
  /** Every guess made so far; only ever grows. */
  readonly usedGuesses: ReadonlySet<string>;
  /** Wrong guesses still allowed. Never negative. */
  readonly turnsLeft: number;
  readonly status: GameStatus;
}

/**
 * createGame starts a game from a secret and a turn budget.
 *
 * The secret's characters are taken literally: no case folding, so "A" and
 * "a" are different letters. Whitespace in a secret word is not a letter.
 *
 * @throws ValidationError when the secret has no letter or turns is not an
 *         integer ≥ 1
 *
 * Example:
 *   createGame({ secret: 'noon', turns: 3 })
 *   → { secretLetters: {n,o}, usedGuesses: {}, turnsLeft: 3,
 *       status: 'in_progress' }
 */
export function createGame(request: NewGameReq): GameState {
  const { secret, turns } = parseOrThrow(
    newGameReq,
    request,
    'new game request',
  );
  return {
    secretLetters:
      typeof secret === 'string' ? secretLettersOf(secret) : new Set(secret),
    usedGuesses: new Set(),
    turnsLeft: turns,
    status: 'in_progress',
  };
}

export function isTerminal(state: GameState): boolean {
  return isTerminalStatus(state.status);
}

export function isTerminalStatus(status: GameStatus): status is TerminalStatus {
  return TERMINAL_STATUSES.some((s) => s === status);
}

/** A new set holding `used` plus `guess`. */
export function withGuess(
  used: ReadonlySet<string>,
  guess: string,
): ReadonlySet<string> {
  return new Set(used).add(guess);
}
