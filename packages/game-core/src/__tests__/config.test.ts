// packages/game-core/src/__tests__/config.test.ts

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { ValidationError, loadConfig } from '../index.js';

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'hangman-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('falls back to defaults', () => {
    expect(loadConfig({ env: {} })).toEqual({
      logLevel: 'info',
      defaultTurns: 6,
    });
  });

  it('reads LOG_LEVEL and HANGMAN_TURNS', () => {
    const env = { LOG_LEVEL: 'debug', HANGMAN_TURNS: '3' };
    expect(loadConfig({ env })).toEqual({ logLevel: 'debug', defaultTurns: 3 });
  });

  it('treats empty values as unset', () => {
    expect(loadConfig({ env: { LOG_LEVEL: '', HANGMAN_TURNS: '' } })).toEqual({
      logLevel: 'info',
      defaultTurns: 6,
    });
  });

  it('reads a .env file, with the environment taking precedence', () => {
    const envFile = path.join(dir, '.env');
    fs.writeFileSync(envFile, 'HANGMAN_TURNS=9\nLOG_LEVEL=warn\n');
    expect(loadConfig({ env: { LOG_LEVEL: 'error' }, envFile })).toEqual({
      logLevel: 'error',
      defaultTurns: 9,
    });
  });

  it('ignores a missing .env file', () => {
    const envFile = path.join(dir, 'missing.env');
    expect(loadConfig({ env: {}, envFile })).toEqual({
      logLevel: 'info',
      defaultTurns: 6,
    });
  });

  it('rejects bad values', () => {
    const word = { HANGMAN_TURNS: 'zero' };
    const zero = { HANGMAN_TURNS: '0' };
    expect(() => loadConfig({ env: word })).toThrow(ValidationError);
    expect(() => loadConfig({ env: zero })).toThrow(ValidationError);
    expect(() => loadConfig({ env: { LOG_LEVEL: 'loud' } })).toThrow(
      /^Invalid configuration: LOG_LEVEL: /,
    );
  });
});
