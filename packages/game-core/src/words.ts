// packages/game-core/src/words.ts
//
// Helpers for turning a secret word into letters and back into something a
// player can look at.
//
// Characters are split by code point and compared literally. Whitespace is
// never a letter to guess: it is left out of the secret and always shown.

import type { GameState } from './state.js';

const isBlank = (ch: string): boolean => /\s/.test(ch);

/** The distinct non-whitespace characters of a word. */
export function secretLettersOf(word: string): Set<string> {
  return new Set([...word].filter((ch) => !isBlank(ch)));
}

/**
 * maskWord hides every character of `word` not yet guessed.
 *
 * @param placeholder - shown in place of a hidden character
 *
 * Example:
 *   maskWord('hang man', new Set(['a', 'n']))
 *   → "_an_ _an"
 */
export function maskWord(
  word: string,
  used: ReadonlySet<string>,
  placeholder = '_',
): string {
  let out = '';
  for (const ch of word) {
    out += isBlank(ch) || used.has(ch) ? ch : placeholder;
  }
  return out;
}

/** True once every secret letter has been guessed. */
export function isSolved(state: GameState): boolean {
  for (const letter of state.secretLetters) {
    if (!state.usedGuesses.has(letter)) return false;
  }
  return true;
}
