// packages/game-core/src/rules/types.ts
//
// A move rule pairs one predicate ("does this case apply?") with one action
// ("what is the next state?"). Rules know nothing about each other; their
// order lives in the table that lists them (see ./index.ts).

import type { GameState } from '../state.js';

export type MoveKind =
  | 'already_finished'
  | 'already_used'
  | 'winning_guess'
  | 'losing_guess'
  | 'good_guess'
  | 'bad_guess';

export type MovePredicate = (state: GameState, guess: string) => boolean;
export type MoveAction = (state: GameState, guess: string) => GameState;

export interface MoveRule {
  readonly kind: MoveKind;
  readonly matches: MovePredicate;
  readonly apply: MoveAction;
}
