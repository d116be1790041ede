// packages/game-core/src/rules/alreadyUsed.ts

import type { GameState } from '../state.js';
import type { MoveRule } from './types.js';

export function isAlreadyUsed(state: GameState, guess: string): boolean {
  return state.usedGuesses.has(guess);
}

/** Only the status changes; a repeated guess costs nothing. */
export function markAlreadyUsed(state: GameState): GameState {
  return { ...state, status: 'already_used' };
}

export const alreadyUsed: MoveRule = {
  kind: 'already_used',
  matches: isAlreadyUsed,
  apply: markAlreadyUsed,
};
