// packages/game-core/src/rules/goodGuess.ts

import { withGuess, type GameState } from '../state.js';
import type { MoveRule } from './types.js';

export function isGoodGuess(state: GameState, guess: string): boolean {
  return state.secretLetters.has(guess);
}

export function acceptGoodGuess(state: GameState, guess: string): GameState {
  return {
    ...state,
    usedGuesses: withGuess(state.usedGuesses, guess),
    status: 'good_guess',
  };
}

export const goodGuess: MoveRule = {
  kind: 'good_guess',
  matches: isGoodGuess,
  apply: acceptGoodGuess,
};
