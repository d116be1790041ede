// packages/game-core/src/rules/index.ts
//
// The ordered rule table. Order is the whole point: a winning guess is
// also a good guess and a losing guess is also a bad one, so the specific
// cases come first.
//
//   1. alreadyFinished → game is won or lost, nothing changes
//   2. alreadyUsed     → repeated guess
//   3. winningGuess    → last missing letter
//   4. losingGuess     → miss on the final turn
//   5. goodGuess       → any other hit
//   6. badGuess        → any other miss

import { alreadyFinished } from './alreadyFinished.js';
import { alreadyUsed } from './alreadyUsed.js';
import { badGuess } from './badGuess.js';
import { goodGuess } from './goodGuess.js';
import { losingGuess } from './losingGuess.js';
import type { MoveRule } from './types.js';
import { winningGuess } from './winningGuess.js';

export const MOVE_RULES: readonly MoveRule[] = Object.freeze([
  alreadyFinished,
  alreadyUsed,
  winningGuess,
  losingGuess,
  goodGuess,
  badGuess,
]);

export * from './types.js';
export * from './alreadyFinished.js';
export * from './alreadyUsed.js';
export * from './winningGuess.js';
export * from './losingGuess.js';
export * from './goodGuess.js';
export * from './badGuess.js';
