// packages/game-core/src/rules/alreadyFinished.ts
//
// A won or lost game ignores every further guess.

import { isTerminal, type GameState } from '../state.js';
import type { MoveRule } from './types.js';

export function isGameOver(state: GameState): boolean {
  return isTerminal(state);
}

/** Returns the very same state object: no copy, no field change. */
export function keepFinished(state: GameState): GameState {
  return state;
}

export const alreadyFinished: MoveRule = {
  kind: 'already_finished',
  matches: isGameOver,
  apply: keepFinished,
};
