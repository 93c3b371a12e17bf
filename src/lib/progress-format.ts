import { z } from 'zod';

import type { CategoryStats, History, StreakMetadata } from './types';
import { HISTORY_WINDOW } from './weight';

export const META_KEY = '__meta__';

export function emptyMetadata(): StreakMetadata {
  return {
    streak: 0,
    streakTimestamp: '',
    longestStreak: 0,
    longestStreakTimestamp: '',
  };
}

// Booleans and integers count as outcomes; anything else in a history is skipped.
const outcomeSchema = z.union([z.boolean(), z.number().int()]);

const integerLike = z.union([
  z.number().finite().transform((value) => Math.trunc(value)),
  z.boolean().transform((value) => (value ? 1 : 0)),
  z
    .string()
    .trim()
    .regex(/^[+-]?\d+$/)
    .transform((value) => Number.parseInt(value, 10)),
]);

const historyRecordSchema = z.object({ history: z.array(z.unknown()) });
const aggregateRecordSchema = z.object({ attempts: z.unknown().optional(), correct: z.unknown().optional() });
const objectSchema = z.record(z.string(), z.unknown());

function toInteger(value: unknown, fallback: number): number {
  const parsed = integerLike.safeParse(value);
  return parsed.success ? parsed.data : fallback;
}

function outcomesFrom(values: readonly unknown[]): History {
  const history: History = [];
  for (const value of values) {
    const parsed = outcomeSchema.safeParse(value);
    if (parsed.success) history.push(Boolean(parsed.data));
  }
  return history;
}

// Both counts must read as integers; a missing key counts as 0.
function synthesizeHistory(attemptsRaw: unknown, correctRaw: unknown): History {
  const attempts = toInteger(attemptsRaw === undefined ? 0 : attemptsRaw, Number.NaN);
  const correctCount = toInteger(correctRaw === undefined ? 0 : correctRaw, Number.NaN);
  if (Number.isNaN(attempts) || Number.isNaN(correctCount) || attempts <= 0) return [];
  const correct = Math.max(0, Math.min(correctCount, attempts));
  const wrong = attempts - correct;
  const history: History = Array.from({ length: Math.min(correct, HISTORY_WINDOW) }, () => true);
  const wrongSlots = Math.min(wrong, HISTORY_WINDOW - history.length);
  for (let i = 0; i < wrongSlots; i += 1) history.push(false);
  return history;
}

/**
 * Reduces any stored per-word record to a canonical history. Accepts
 * `{ history: [...] }`, the older `{ attempts, correct }` aggregate, and a bare array.
 */
export function migrateHistoryRecord(record: unknown): History {
  let history: History = [];

  if (Array.isArray(record)) {
    history = outcomesFrom(record);
  } else {
    const withHistory = historyRecordSchema.safeParse(record);
    if (withHistory.success) {
      history = outcomesFrom(withHistory.data.history);
    } else {
      const aggregate = aggregateRecordSchema.safeParse(record);
      if (aggregate.success) {
        history = synthesizeHistory(aggregate.data.attempts, aggregate.data.correct);
      }
    }
  }

  return history.slice(-HISTORY_WINDOW);
}

export function migrateCategoryStats(raw: unknown): CategoryStats {
  const stats: CategoryStats = new Map();
  const parsed = objectSchema.safeParse(raw);
  if (!parsed.success) return stats;

  for (const [term, record] of Object.entries(parsed.data)) {
    const history = migrateHistoryRecord(record);
    if (history.length > 0) stats.set(term, history);
  }
  return stats;
}

export function parseMetadata(raw: unknown): StreakMetadata {
  const metadata = emptyMetadata();
  const parsed = objectSchema.safeParse(raw);
  if (!parsed.success) return metadata;

  const meta = parsed.data;
  metadata.streak = Math.max(0, toInteger(meta.streak, metadata.streak));
  metadata.longestStreak = Math.max(0, toInteger(meta.longest_streak, metadata.longestStreak));
  metadata.streakTimestamp = meta.streak_timestamp ? String(meta.streak_timestamp) : metadata.streakTimestamp;
  metadata.longestStreakTimestamp = meta.longest_streak_timestamp
    ? String(meta.longest_streak_timestamp)
    : metadata.longestStreakTimestamp;
  return metadata;
}

export type SerializedMetadata = {
  streak: number;
  streak_timestamp: string;
  longest_streak: number;
  longest_streak_timestamp: string;
};

export type SerializedCategory = Record<string, { history: number[] }>;

export function serializeMetadata(metadata: StreakMetadata): SerializedMetadata {
  return {
    streak: metadata.streak,
    streak_timestamp: metadata.streakTimestamp,
    longest_streak: metadata.longestStreak,
    longest_streak_timestamp: metadata.longestStreakTimestamp,
  };
}

export function serializeCategory(stats: CategoryStats): SerializedCategory {
  const entries: [string, { history: number[] }][] = [];
  for (const [term, history] of stats) {
    const window = history.slice(-HISTORY_WINDOW);
    if (window.length > 0) {
      entries.push([term, { history: window.map((outcome) => (outcome ? 1 : 0)) }]);
    }
  }
  return Object.fromEntries(entries);
}
