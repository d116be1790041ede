// packages/game-core/src/__tests__/rules.test.ts
//
// Each move rule on its own, then the table and the dispatch built on it.
//
// The predicates are checked without any ordering: goodGuess matches a
// winning letter too, which is why the table lists winningGuess first.

import {
  MOVE_RULES,
  UnmatchedMoveError,
  ValidationError,
  acceptBadGuess,
  acceptGoodGuess,
  alreadyFinished,
  badGuess,
  classify,
  createEvaluator,
  goodGuess,
  isAlreadyUsed,
  isBadGuess,
  isGameOver,
  isGoodGuess,
  isLosingGuess,
  isWinningGuess,
  keepFinished,
  lose,
  markAlreadyUsed,
  win,
  winningGuess,
  type GameState,
} from '../index.js';

const base: GameState = {
  secretLetters: new Set(['c', 'a', 't']),
  usedGuesses: new Set(['c']),
  turnsLeft: 2,
  status: 'good_guess',
};

describe('predicates', () => {
  it('isGameOver only for won and lost', () => {
    expect(isGameOver({ ...base, status: 'won' })).toBe(true);
    expect(isGameOver({ ...base, status: 'lost' })).toBe(true);
    expect(isGameOver({ ...base, status: 'bad_guess' })).toBe(false);
    expect(isGameOver({ ...base, status: 'in_progress' })).toBe(false);
  });

  it('isAlreadyUsed', () => {
    expect(isAlreadyUsed(base, 'c')).toBe(true);
    expect(isAlreadyUsed(base, 'a')).toBe(false);
  });

  it('isWinningGuess needs the guess to complete the secret', () => {
    expect(isWinningGuess(base, 'a')).toBe(false);
    const oneLeft = { ...base, usedGuesses: new Set(['c', 'a']) };
    expect(isWinningGuess(oneLeft, 't')).toBe(true);
    expect(isWinningGuess(oneLeft, 'z')).toBe(false);
  });

  it('isLosingGuess needs a miss on the last turn', () => {
    expect(isLosingGuess({ ...base, turnsLeft: 1 }, 'z')).toBe(true);
    expect(isLosingGuess({ ...base, turnsLeft: 0 }, 'z')).toBe(true);
    expect(isLosingGuess({ ...base, turnsLeft: 1 }, 'a')).toBe(false);
    expect(isLosingGuess(base, 'z')).toBe(false);
  });

  it('isGoodGuess and isBadGuess are complements', () => {
    for (const guess of ['a', 'c', 't', 'z', '?']) {
      expect(isGoodGuess(base, guess)).toBe(!isBadGuess(base, guess));
    }
  });
});

describe('actions', () => {
  it('keepFinished returns the same object', () => {
    expect(keepFinished(base)).toBe(base);
  });

  it('markAlreadyUsed only touches status', () => {
    expect(markAlreadyUsed(base)).toEqual({ ...base, status: 'already_used' });
  });

  it('win records the guess', () => {
    expect(win(base, 'a')).toEqual({
      ...base,
      usedGuesses: new Set(['c', 'a']),
      status: 'won',
    });
  });

  it('lose records the guess and zeroes turns', () => {
    expect(lose(base, 'z')).toEqual({
      ...base,
      usedGuesses: new Set(['c', 'z']),
      turnsLeft: 0,
      status: 'lost',
    });
  });

  it('acceptGoodGuess keeps the turn count', () => {
    expect(acceptGoodGuess(base, 'a')).toEqual({
      ...base,
      usedGuesses: new Set(['c', 'a']),
      status: 'good_guess',
    });
  });

  it('acceptBadGuess costs one turn', () => {
    expect(acceptBadGuess(base, 'z')).toEqual({
      ...base,
      usedGuesses: new Set(['c', 'z']),
      turnsLeft: 1,
      status: 'bad_guess',
    });
  });

  it('actions leave their input alone', () => {
    win(base, 'a');
    lose(base, 'z');
    acceptBadGuess(base, 'z');
    expect(base.usedGuesses).toEqual(new Set(['c']));
    expect(base.turnsLeft).toBe(2);
  });
});

describe('MOVE_RULES', () => {
  it('lists the rules from most to least specific', () => {
    expect(MOVE_RULES.map((r) => r.kind)).toEqual([
      'already_finished',
      'already_used',
      'winning_guess',
      'losing_guess',
      'good_guess',
      'bad_guess',
    ]);
  });

  it('is frozen', () => {
    expect(Object.isFrozen(MOVE_RULES)).toBe(true);
  });
});

describe('classify', () => {
  it.each([
    [{ ...base, status: 'lost' as const }, 'a', 'already_finished'],
    [base, 'c', 'already_used'],
    [{ ...base, usedGuesses: new Set(['c', 'a']) }, 't', 'winning_guess'],
    [{ ...base, turnsLeft: 1 }, 'z', 'losing_guess'],
    [base, 'a', 'good_guess'],
    [base, 'z', 'bad_guess'],
  ])('case %#', (state, guess, kind) => {
    expect(classify(state, guess)).toBe(kind);
  });
});

describe('createEvaluator', () => {
  it('honours the order of a custom table', () => {
    const hitsFirst = createEvaluator([
      alreadyFinished,
      goodGuess,
      winningGuess,
      badGuess,
    ]);
    const oneLeft = { ...base, usedGuesses: new Set(['c', 'a']) };
    expect(hitsFirst.classify(oneLeft, 't')).toBe('good_guess');
    expect(hitsFirst.evaluate(oneLeft, 't').status).toBe('good_guess');
    expect(hitsFirst.rules).toHaveLength(4);
  });

  it('throws UnmatchedMoveError when no rule applies', () => {
    const partial = createEvaluator([alreadyFinished, goodGuess]);
    expect(() => partial.evaluate(base, 'z')).toThrow(UnmatchedMoveError);
    expect(() => partial.classify(base, 'z')).toThrow(
      'No move rule matched guess "z" in status "good_guess"',
    );
  });

  it('rejects an empty table', () => {
    expect(() => createEvaluator([])).toThrow(ValidationError);
  });
});
