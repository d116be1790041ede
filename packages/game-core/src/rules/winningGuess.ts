// packages/game-core/src/rules/winningGuess.ts
//
// The guess is a secret letter and, once added, every secret letter has
// been guessed.

import { withGuess, type GameState } from '../state.js';
import type { MoveRule } from './types.js';

export function isWinningGuess(state: GameState, guess: string): boolean {
  if (!state.secretLetters.has(guess)) return false;
  for (const letter of state.secretLetters) {
    if (letter !== guess && !state.usedGuesses.has(letter)) return false;
  }
  return true;
}

export function win(state: GameState, guess: string): GameState {
  return {
    ...state,
    usedGuesses: withGuess(state.usedGuesses, guess),
    status: 'won',
  };
}

export const winningGuess: MoveRule = {
  kind: 'winning_guess',
  matches: isWinningGuess,
  apply: win,
};
