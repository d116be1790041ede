// packages/game-core/src/indexed.ts
//
// The same six cases as the rule table, written as a single if/else chain.
// Branching still happens in one place and each branch calls a named
// predicate and a named action, so it reads as an index of the cases.

import {
  acceptBadGuess,
  acceptGoodGuess,
  isAlreadyUsed,
  isGameOver,
  isGoodGuess,
  isLosingGuess,
  isWinningGuess,
  keepFinished,
  lose,
  markAlreadyUsed,
  win,
} from './rules/index.js';
import type { GameState } from './state.js';

export function evaluateIndexed(state: GameState, guess: string): GameState {
  if (isGameOver(state)) {
    return keepFinished(state);
  } else if (isAlreadyUsed(state, guess)) {
    return markAlreadyUsed(state);
  } else if (isWinningGuess(state, guess)) {
    return win(state, guess);
  } else if (isLosingGuess(state, guess)) {
    return lose(state, guess);
  } else if (isGoodGuess(state, guess)) {
    return acceptGoodGuess(state, guess);
  } else {
    return acceptBadGuess(state, guess);
  }
}
