import { join } from 'node:path';
import { z } from 'zod';

import { QuizConfigError } from './errors';
import type { Direction } from './types';
import type { MatchingMode } from './matching';

export const DEFAULT_DATA_DIR = 'data';
export const PROGRESS_FILE_NAME = 'progress.json';
export const DEFAULT_PANEL_COLUMNS = 3;
export const MAX_PANEL_COLUMNS = 6;

export interface QuizConfig {
  dataDir: string;
  progressPath: string;
  panelColumns: number;
  direction: Direction;
  matchingMode: MatchingMode;
  randomSeed: number | null;
}

const panelColumnsSchema = z.coerce.number().int().min(1).max(MAX_PANEL_COLUMNS);
const directionSchema = z.enum(['AB', 'BA']);
const matchingModeSchema = z.enum(['exact', 'case', 'fuzzy']);
const seedSchema = z.coerce.number().int();

function readEnv(name: string): string | null {
  const value = process.env[name];
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed === '' ? null : trimmed;
}

function parseEnv<T>(name: string, schema: z.ZodType<T>, fallback: T): T {
  const raw = readEnv(name);
  if (raw === null) return fallback;
  const result = schema.safeParse(raw);
  if (!result.success) {
    const detail = result.error.issues.map((issue) => issue.message).join('; ');
    throw new QuizConfigError(`${name} has an invalid value "${raw}": ${detail}`);
  }
  return result.data;
}

/** Seed for the shared generator, or null when QUIZ_RANDOM_SEED is unset or not numeric. */
export function readRandomSeedFromEnv(): number | null {
  if (typeof process === 'undefined') return null;
  const raw = readEnv('QUIZ_RANDOM_SEED');
  if (raw === null) return null;
  const parsed = seedSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

export function dataDir(): string {
  return readEnv('QUIZ_DATA_DIR') ?? DEFAULT_DATA_DIR;
}

export function progressPath(): string {
  return readEnv('QUIZ_PROGRESS_PATH') ?? join(dataDir(), PROGRESS_FILE_NAME);
}

export function loadConfig(): QuizConfig {
  return {
    dataDir: dataDir(),
    progressPath: progressPath(),
    panelColumns: parseEnv<number>('QUIZ_PANEL_COLUMNS', panelColumnsSchema, DEFAULT_PANEL_COLUMNS),
    direction: parseEnv<Direction>('QUIZ_DIRECTION', directionSchema, 'AB'),
    matchingMode: parseEnv<MatchingMode>('QUIZ_MATCHING_MODE', matchingModeSchema, 'fuzzy'),
    randomSeed: parseEnv<number | null>('QUIZ_RANDOM_SEED', seedSchema.nullable(), null),
  };
}
