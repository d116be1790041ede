// packages/game-core/src/rules/badGuess.ts
//
// A miss that still leaves turns to play. Its predicate is the complement
// of goodGuess, so together they cover every guess that reaches them.

import { withGuess, type GameState } from '../state.js';
import type { MoveRule } from './types.js';

export function isBadGuess(state: GameState, guess: string): boolean {
  return !state.secretLetters.has(guess);
}

export function acceptBadGuess(state: GameState, guess: string): GameState {
  return {
    ...state,
    usedGuesses: withGuess(state.usedGuesses, guess),
    turnsLeft: state.turnsLeft - 1,
    status: 'bad_guess',
  };
}

export const badGuess: MoveRule = {
  kind: 'bad_guess',
  matches: isBadGuess,
  apply: acceptBadGuess,
};
