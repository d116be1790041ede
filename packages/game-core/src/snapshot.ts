// packages/game-core/src/snapshot.ts
//
// Converts game states to and from plain JSON values. Sets become sorted
// arrays so equal states always serialise the same way (and so pino can
// log them; it prints a Set as {}).

import { gameSnapshot, type GameSnapshot } from '@hangman/protocol';

import { parseOrThrow } from './errors.js';
import type { GameState } from './state.js';

export type { GameSnapshot } from '@hangman/protocol';

const sorted = (letters: ReadonlySet<string>): string[] => [...letters].sort();

export function toSnapshot(state: GameState): GameSnapshot {
  return {
    secretLetters: sorted(state.secretLetters),
    usedGuesses: sorted(state.usedGuesses),
    turnsLeft: state.turnsLeft,
    status: state.status,
  };
}

/**
 * fromSnapshot validates untrusted input and rebuilds a GameState.
 *
 * @throws ValidationError when the input is not a well-formed snapshot
 */
export function fromSnapshot(input: unknown): GameState {
  const snap = parseOrThrow(gameSnapshot, input, 'game snapshot');
  return {
    secretLetters: new Set(snap.secretLetters),
    usedGuesses: new Set(snap.usedGuesses),
    turnsLeft: snap.turnsLeft,
    status: snap.status,
  };
}
