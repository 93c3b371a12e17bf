import type { CategoryStats, Progress, StreakMetadata } from './types';

export interface CategoryScore {
  correct: number;
  attempts: number;
  /** Percentage in [0, 100], or null before any attempt. */
  accuracy: number | null;
}

export interface ScoreboardView {
  categories: string[];
  streak: string;
  longest: string;
}

export function categoryScore(stats: CategoryStats | undefined): CategoryScore {
  let attempts = 0;
  let correct = 0;
  for (const history of stats?.values() ?? []) {
    attempts += history.length;
    correct += history.filter(Boolean).length;
  }
  return { correct, attempts, accuracy: attempts ? (correct / attempts) * 100 : null };
}

/** Rounds to the nearest integer, halves to even. */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

export function formatCategoryScore(category: string, score: CategoryScore): string {
  if (score.accuracy === null) return `${category}: 0/0`;
  return `${category}: ${score.correct}/${score.attempts} (${roundHalfEven(score.accuracy)}%)`;
}

function formatStamp(stamp: string): string {
  return stamp ? stamp : 'n/a';
}

export function formatStreakLabels(metadata: StreakMetadata): { streak: string; longest: string } {
  return {
    streak: `Streak: ${metadata.streak} (${formatStamp(metadata.streakTimestamp)})`,
    longest: `Longest: ${metadata.longestStreak} (${formatStamp(metadata.longestStreakTimestamp)})`,
  };
}

export function sectionSummary(active: readonly string[], all: readonly string[]): string {
  if (active.length === all.length) return 'Training: All sections';
  if (active.length === 1) return `Training: ${active[0]}`;
  return `Training: ${active.length} of ${all.length} sections`;
}

export function scoreboard(progress: Progress, categories: readonly string[], metadata: StreakMetadata): ScoreboardView {
  return {
    categories: categories.map((category) => formatCategoryScore(category, categoryScore(progress.get(category)))),
    ...formatStreakLabels(metadata),
  };
}
