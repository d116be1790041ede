// packages/game-core/src/rules/losingGuess.ts
//
// A miss with one turn left ends the game. A state already at zero turns
// but not yet over (only reachable by building one by hand) loses the same
// way, so turnsLeft never goes below zero.

import { withGuess, type GameState } from '../state.js';
import type { MoveRule } from './types.js';

export function isLosingGuess(state: GameState, guess: string): boolean {
  return !state.secretLetters.has(guess) && state.turnsLeft <= 1;
}

export function lose(state: GameState, guess: string): GameState {
  return {
    ...state,
    usedGuesses: withGuess(state.usedGuesses, guess),
    turnsLeft: 0,
    status: 'lost',
  };
}

export const losingGuess: MoveRule = {
  kind: 'losing_guess',
  matches: isLosingGuess,
  apply: lose,
};
