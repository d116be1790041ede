// packages/game-core/src/session.ts
//
// GameSession: a game played one guess at a time.
//
// The evaluators are pure and take any string. A session is the outer
// surface: it validates what the player typed, keeps the current state and
// a history of moves, and logs what happened. Rendering and I/O stay with
// the caller.

import { guessReq } from '@hangman/protocol';
import { nanoid } from 'nanoid';

import type { HangmanConfig } from './config.js';
import { parseOrThrow } from './errors.js';
import {
  standardEvaluator,
  type Evaluator,
  type RuleEvaluator,
} from './evaluator.js';
import { createLogger, type Logger } from './logger.js';
import type { MoveKind } from './rules/index.js';
import { toSnapshot } from './snapshot.js';
import {
  createGame,
  isTerminal,
  type GameState,
  type GameStatus,
  type NewGameReq,
} from './state.js';

export type MoveRecord = {
  guess: string;
  /** Which rule applied; absent when the session runs a bare Evaluator. */
  kind?: MoveKind;
  status: GameStatus;
  turnsLeft: number;
};

export type SessionOptions = {
  id?: string;
  /** Sets the default turn budget and, without a logger, the log level. */
  config?: HangmanConfig;
  logger?: Logger;
  /**
   * A RuleEvaluator both evaluates and classifies moves. A bare Evaluator
   * function only evaluates, so its records carry no `kind`.
   * Defaults to standardEvaluator.
   */
  evaluator?: RuleEvaluator | Evaluator;
};

export class GameSession {
  readonly id: string;
  private current: GameState;
  private readonly moves: MoveRecord[] = [];
  private readonly log: Logger;
  private readonly evaluator: RuleEvaluator | Evaluator;

  constructor(initial: GameState, options: SessionOptions = {}) {
    this.id = options.id ?? nanoid();
    this.current = initial;
    this.evaluator = options.evaluator ?? standardEvaluator;

    const root =
      options.logger ?? createLogger(options.config ?? { logLevel: 'silent' });
    this.log = root.child({ gameId: this.id });
  }

  /**
   * start creates the game and wraps it.
   *
   * @throws ValidationError when the request is invalid
   *
   * Example:
   *   GameSession.start({ secret: 'kiwi' }, { config: loadConfig() })
   *   → session with turnsLeft = HANGMAN_TURNS (default 6)
   */
  static start(
    request: NewGameReq,
    options: SessionOptions = {},
  ): GameSession {
    const turns = request.turns ?? options.config?.defaultTurns;
    const game = createGame({ ...request, turns });
    const session = new GameSession(game, options);
    session.log.info(
      { letters: game.secretLetters.size, turnsLeft: game.turnsLeft },
      'game started',
    );
    return session;
  }

  get state(): GameState {
    return this.current;
  }

  get history(): readonly MoveRecord[] {
    return this.moves;
  }

  get isOver(): boolean {
    return isTerminal(this.current);
  }

  /**
   * guess plays one character.
   *
   * @throws ValidationError when `raw` is not exactly one character
   */
  guess(raw: string): MoveRecord {
    const guess = parseOrThrow(guessReq, raw, 'guess');
    const wasOver = this.isOver;
    let kind: MoveKind | undefined;
    if (typeof this.evaluator === 'function') {
      this.current = this.evaluator(this.current, guess);
    } else {
      kind = this.evaluator.classify(this.current, guess);
      this.current = this.evaluator.evaluate(this.current, guess);
    }

    const record: MoveRecord = {
      guess,
      status: this.current.status,
      turnsLeft: this.current.turnsLeft,
    };
    if (kind) record.kind = kind;
    this.moves.push(record);
    this.log.debug(record, 'guess evaluated');

    if (!wasOver && this.isOver) {
      this.log.info(toSnapshot(this.current), 'game over');
    }
    return record;
  }
}
