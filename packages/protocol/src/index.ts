// packages/protocol/src/index.ts
//
// Shared shapes for the hangman workspace.
// Uses Zod schemas for runtime validation + TypeScript types for
// compile-time safety.
//
// Defines:
//   - GameStatus: where a game stands after the latest move.
//   - Guess:      a single character offered by the player.
//   - NewGameReq: what it takes to start a game.
//   - Snapshot:   a JSON-friendly copy of a game state.
//
// Outer surfaces (sessions, loaders) validate against these; the move
// evaluators themselves accept anything and never parse.

import { z } from 'zod';

/**
 * Status schema:
 *  - "in_progress"  → fresh game, no move yet
 *  - "won" / "lost" → terminal, no further move changes anything
 *  - "already_used" → last guess had been tried before
 *  - "good_guess"   → last guess is in the secret word
 *  - "bad_guess"    → last guess missed and cost a turn
 */
export const statusSchema = z.enum([
  'in_progress',
  'won',
  'lost',
  'already_used',
  'good_guess',
  'bad_guess',
]);
export type GameStatus = z.infer<typeof statusSchema>;

export const TERMINAL_STATUSES = [
  'won',
  'lost',
] as const satisfies readonly GameStatus[];
export type TerminalStatus = (typeof TERMINAL_STATUSES)[number];

/** One Unicode code point, so "é" and "😀" count as a single character. */
export const charSchema = z
  .string()
  .refine((s) => [...s].length === 1, {
    message: 'Expected a single character',
  });

/** A character a player can guess: anything but whitespace. */
export const letterSchema = charSchema.refine((s) => !/\s/.test(s), {
  message: 'Whitespace is not a letter',
});

/* -------------------------------------------------------------------------- */
/*                                  New game                                  */
/* -------------------------------------------------------------------------- */

/**
 * Request to start a new game.
 *  - secret: the hidden word (whitespace is shown, never guessed), or its
 *            letters directly; either way at least one letter
 *  - turns:  wrong guesses allowed (≥ 1), defaults to 6
 */
export const newGameReq = z.object({
  secret: z.union([
    z.string().regex(/\S/, 'Secret needs at least one letter'),
    z.array(letterSchema).min(1),
  ]),
  turns: z.number().int().min(1).default(6),
});
export type NewGameReq = z.input<typeof newGameReq>;

/* -------------------------------------------------------------------------- */
/*                                   Guesses                                  */
/* -------------------------------------------------------------------------- */

export const guessReq = charSchema;
export type GuessReq = z.infer<typeof guessReq>;

/* -------------------------------------------------------------------------- */
/*                                  Snapshots                                 */
/* -------------------------------------------------------------------------- */

/**
 * A game state with its sets spelled out as arrays.
 *  - secretLetters: never empty
 *  - turnsLeft:     never negative, and 0 only once the game is over
 */
export const gameSnapshot = z
  .object({
    secretLetters: z.array(letterSchema).min(1),
    usedGuesses: z.array(charSchema),
    turnsLeft: z.number().int().min(0),
    status: statusSchema,
  })
  .refine(
    (snap) =>
      snap.turnsLeft > 0 ||
      TERMINAL_STATUSES.some((terminal) => terminal === snap.status),
    {
      message: 'A game with no turns left must be won or lost',
      path: ['turnsLeft'],
    },
  );
export type GameSnapshot = z.infer<typeof gameSnapshot>;
