import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { dataDir, loadConfig, progressPath, readRandomSeedFromEnv } from '../env';
import { QuizConfigError } from '../errors';

const KEYS = [
  'QUIZ_DATA_DIR',
  'QUIZ_PROGRESS_PATH',
  'QUIZ_PANEL_COLUMNS',
  'QUIZ_DIRECTION',
  'QUIZ_MATCHING_MODE',
  'QUIZ_RANDOM_SEED',
];

let originalEnv: NodeJS.ProcessEnv;

beforeEach(() => {
  originalEnv = process.env;
  const envCopy: NodeJS.ProcessEnv = { ...originalEnv };
  for (const key of KEYS) {
    delete envCopy[key];
  }
  process.env = envCopy;
});

afterEach(() => {
  process.env = originalEnv;
});

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig()).toEqual({
      dataDir: 'data',
      progressPath: 'data/progress.json',
      panelColumns: 3,
      direction: 'AB',
      matchingMode: 'fuzzy',
      randomSeed: null,
    });
  });

  it('reads trimmed values from the environment', () => {
    process.env.QUIZ_DATA_DIR = ' /srv/quiz ';
    process.env.QUIZ_PANEL_COLUMNS = '2';
    process.env.QUIZ_DIRECTION = 'BA';
    process.env.QUIZ_MATCHING_MODE = 'case';
    process.env.QUIZ_RANDOM_SEED = '42';

    expect(loadConfig()).toEqual({
      dataDir: '/srv/quiz',
      progressPath: '/srv/quiz/progress.json',
      panelColumns: 2,
      direction: 'BA',
      matchingMode: 'case',
      randomSeed: 42,
    });
  });

  it('lets the progress path be set on its own', () => {
    process.env.QUIZ_PROGRESS_PATH = '/var/lib/quiz/state.json';
    expect(progressPath()).toBe('/var/lib/quiz/state.json');
    expect(dataDir()).toBe('data');
  });

  it('treats blank values as unset', () => {
    process.env.QUIZ_PANEL_COLUMNS = '   ';
    expect(loadConfig().panelColumns).toBe(3);
  });

  it('rejects values it cannot use', () => {
    process.env.QUIZ_PANEL_COLUMNS = 'seven';
    expect(() => loadConfig()).toThrow(QuizConfigError);

    process.env.QUIZ_PANEL_COLUMNS = '9';
    expect(() => loadConfig()).toThrow(/QUIZ_PANEL_COLUMNS has an invalid value "9"/);

    delete process.env.QUIZ_PANEL_COLUMNS;
    process.env.QUIZ_DIRECTION = 'CD';
    expect(() => loadConfig()).toThrow(QuizConfigError);
  });
});

describe('readRandomSeedFromEnv', () => {
  it('returns null for a missing or non-numeric seed', () => {
    expect(readRandomSeedFromEnv()).toBeNull();
    process.env.QUIZ_RANDOM_SEED = 'abc';
    expect(readRandomSeedFromEnv()).toBeNull();
    process.env.QUIZ_RANDOM_SEED = '1337';
    expect(readRandomSeedFromEnv()).toBe(1337);
  });

  it('agrees with loadConfig on a seed with trailing characters', () => {
    process.env.QUIZ_RANDOM_SEED = '12abc';
    expect(readRandomSeedFromEnv()).toBeNull();
    expect(() => loadConfig()).toThrow(QuizConfigError);
  });
});
