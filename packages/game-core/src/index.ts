// packages/game-core/src/index.ts
//
// Entry point for the game-core package.
// Re-exports all core game logic so consumers can import from one place.
//
// Includes:
//   • state.ts     → GameState, createGame
//   • rules/       → the six move rules and their ordered MOVE_RULES table
//   • evaluator.ts → evaluate / classify / createEvaluator (rule dispatch)
//   • indexed.ts   → evaluateIndexed (single if/else chain)
//   • nested.ts    → evaluateNested (entangled, for comparison)
//   • words.ts     → secretLettersOf, maskWord, isSolved
//   • snapshot.ts  → toSnapshot / fromSnapshot
//   • session.ts   → GameSession (validation, history, logging)
//   • config.ts, logger.ts, errors.ts → ambient pieces
//
// Example usage:
//   import { createGame, evaluate } from '@hangman/game-core';
//   const next = evaluate(createGame({ secret: 'kiwi', turns: 3 }), 'k');

export * from './state.js';
export * from './rules/index.js';
export * from './evaluator.js';
export * from './indexed.js';
export * from './nested.js';
export * from './words.js';
export * from './snapshot.js';
export * from './session.js';
export * from './config.js';
export * from './logger.js';
export * from './errors.js';
