// packages/game-core/src/nested.ts
//
// The entangled version of the evaluator, kept for comparison.
//
// The case analysis is spread over four functions. Each one decides part of
// the outcome and hands a partly updated state to the next, so maybeWon only
// works because acceptGuess has already recorded the guess. Behaviour
// matches evaluate() exactly; see __tests__/evaluate.test.ts.

import type { GameState } from './state.js';
import { isTerminal, withGuess } from './state.js';

export function evaluateNested(state: GameState, guess: string): GameState {
  if (!isTerminal(state)) {
    return acceptGuess(state, guess);
  } else {
    return state;
  }
}

function acceptGuess(state: GameState, guess: string): GameState {
  if (state.usedGuesses.has(guess)) {
    return { ...state, status: 'already_used' };
  } else {
    const recorded = {
      ...state,
      usedGuesses: withGuess(state.usedGuesses, guess),
    };
    return scoreGuess(recorded, guess);
  }
}

function scoreGuess(state: GameState, guess: string): GameState {
  if (state.secretLetters.has(guess)) {
    return maybeWon(state);
  } else {
    if (state.turnsLeft <= 1) {
      return { ...state, turnsLeft: 0, status: 'lost' };
    } else {
      return { ...state, turnsLeft: state.turnsLeft - 1, status: 'bad_guess' };
    }
  }
}

function maybeWon(state: GameState): GameState {
  for (const letter of state.secretLetters) {
    if (!state.usedGuesses.has(letter)) {
      return { ...state, status: 'good_guess' };
    }
  }
  return { ...state, status: 'won' };
}
