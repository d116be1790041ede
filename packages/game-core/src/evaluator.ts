// packages/game-core/src/evaluator.ts
//
// The move evaluator: one dispatch point over the ordered rule table.
//
// Each call walks MOVE_RULES top to bottom and applies the first rule whose
// predicate matches. No other code decides which case a move falls into.
//
// Exports:
//   • evaluate        — next state for (state, guess), using MOVE_RULES.
//   • classify        — which rule evaluate would apply.
//   • createEvaluator — the same dispatch over a caller-supplied table.

import { UnmatchedMoveError, ValidationError } from './errors.js';
import { MOVE_RULES, type MoveKind, type MoveRule } from './rules/index.js';
import type { GameState } from './state.js';

export type Evaluator = (state: GameState, guess: string) => GameState;

export interface RuleEvaluator {
  readonly rules: readonly MoveRule[];
  evaluate: Evaluator;
  classify(state: GameState, guess: string): MoveKind;
}

/**
 * createEvaluator builds evaluate/classify over an ordered rule table.
 *
 * @throws ValidationError     when `rules` is empty
 * @throws UnmatchedMoveError  (from evaluate/classify) when no rule matches;
 *                             the default table always has a match
 */
export function createEvaluator(rules: readonly MoveRule[]): RuleEvaluator {
  if (rules.length === 0) {
    throw new ValidationError('A rule table needs at least one rule');
  }

  const select = (state: GameState, guess: string): MoveRule => {
    const rule = rules.find((r) => r.matches(state, guess));
    if (!rule) throw new UnmatchedMoveError(guess, state.status);
    return rule;
  };

  return {
    rules,
    evaluate: (state, guess) => select(state, guess).apply(state, guess),
    classify: (state, guess) => select(state, guess).kind,
  };
}

/** evaluate and classify over MOVE_RULES, as one RuleEvaluator. */
export const standardEvaluator: RuleEvaluator = createEvaluator(MOVE_RULES);

/**
 * evaluate applies one guess to a game.
 *
 * Total: every (state, guess) pair maps to a next state and nothing is
 * thrown. A finished game comes back as the same object.
 *
 * Example:
 *   state = { secretLetters: {a,b}, usedGuesses: {a}, turnsLeft: 3,
 *             status: 'good_guess' }
 *   evaluate(state, 'b')
 *   → { ...state, usedGuesses: {a,b}, status: 'won' }
 */
export const evaluate: Evaluator = standardEvaluator.evaluate;

export function classify(state: GameState, guess: string): MoveKind {
  return standardEvaluator.classify(state, guess);
}
