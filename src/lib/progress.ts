import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import { isMissingFileError, PersistenceError, ProgressFormatError } from './errors';
import {
  emptyMetadata,
  META_KEY,
  migrateCategoryStats,
  parseMetadata,
  serializeCategory,
  serializeMetadata,
} from './progress-format';
import type { CategoryStats, History, Progress, StreakMetadata } from './types';
import { stripBom } from './vocab';
import { HISTORY_WINDOW } from './weight';

export interface LoadedProgress {
  progress: Progress;
  metadata: StreakMetadata;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local time as `YYYY-MM-DD HH:MM`. */
export function formatTimestamp(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(
    date.getMinutes(),
  )}`;
}

export function emptyProgress(categories: readonly string[]): Progress {
  return new Map(categories.map((category) => [category, new Map<string, History>()]));
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export async function loadProgress(path: string, categories: readonly string[]): Promise<LoadedProgress> {
  const progress = emptyProgress(categories);

  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    if (isMissingFileError(error)) {
      return { progress, metadata: emptyMetadata() };
    }
    throw error;
  }

  let data: unknown;
  try {
    data = JSON.parse(stripBom(text));
  } catch (error) {
    throw new ProgressFormatError(`Progress file ${path} is not valid JSON.`, { cause: error });
  }
  if (!isPlainObject(data)) {
    throw new ProgressFormatError(`Progress file ${path} must contain a JSON object.`);
  }

  const metadata = parseMetadata(data[META_KEY]);
  for (const category of categories) {
    if (category === META_KEY) continue;
    progress.set(category, migrateCategoryStats(data[category]));
  }

  return { progress, metadata };
}

export function statsFor(progress: Progress, category: string): CategoryStats {
  let stats = progress.get(category);
  if (!stats) {
    stats = new Map();
    progress.set(category, stats);
  }
  return stats;
}

export function recordOutcome(progress: Progress, category: string, term: string, isCorrect: boolean): History {
  const stats = statsFor(progress, category);
  let history = stats.get(term);
  if (!history) {
    history = [];
    stats.set(term, history);
  }
  history.push(isCorrect);
  if (history.length > HISTORY_WINDOW) {
    history.splice(0, history.length - HISTORY_WINDOW);
  }
  return history;
}

export function updateStreak(metadata: StreakMetadata, isCorrect: boolean, now: Date = new Date()): StreakMetadata {
  const timestamp = formatTimestamp(now);
  if (!isCorrect) {
    return { ...metadata, streak: 0, streakTimestamp: timestamp };
  }

  const streak = metadata.streak + 1;
  const next: StreakMetadata = { ...metadata, streak, streakTimestamp: timestamp };
  if (streak > metadata.longestStreak) {
    next.longestStreak = streak;
    next.longestStreakTimestamp = timestamp;
  }
  return next;
}

export function serializeProgress(progress: Progress, metadata: StreakMetadata): Record<string, unknown> {
  const entries: [string, unknown][] = [[META_KEY, serializeMetadata(metadata)]];
  for (const [category, stats] of progress) {
    if (category === META_KEY) continue;
    entries.push([category, serializeCategory(stats)]);
  }
  return Object.fromEntries(entries);
}

/**
 * Writes a full snapshot beside the target and renames it into place, so a
 * failed write leaves the previous file intact.
 */
export async function saveProgress(path: string, progress: Progress, metadata: StreakMetadata): Promise<void> {
  const payload = `${JSON.stringify(serializeProgress(progress, metadata), null, 2)}\n`;
  const tempPath = `${path}.${process.pid}.tmp`;
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(tempPath, payload, 'utf-8');
    await rename(tempPath, path);
  } catch (error) {
    await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
      console.warn(`Could not remove temporary progress file ${tempPath}.`, cleanupError);
    });
    throw new PersistenceError(path, error);
  }
}
