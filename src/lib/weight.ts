import type { History, QuizMode } from './types';

export const HISTORY_WINDOW = 10;
export const MIN_WEIGHT = 0.1;

type ModeConstants = {
  /** Weight while the window is still filling: base + fill * perMissing + wrongRatio * wrongBoost. */
  filling: { base: number; perMissing: number; wrongBoost: number };
  mastered: number;
  full: { base: number; multiplier: number };
};

const MODE_CONSTANTS: Record<QuizMode, ModeConstants> = {
  fresh: {
    filling: { base: 18.0, perMissing: 8.0, wrongBoost: 4.0 },
    mastered: 0.25,
    full: { base: 1.5, multiplier: 8.0 },
  },
  review: {
    filling: { base: 10.0, perMissing: 5.0, wrongBoost: 8.0 },
    mastered: 0.1,
    full: { base: 1.0, multiplier: 14.0 },
  },
};

export function wrongRatio(history: readonly boolean[]): number {
  if (history.length === 0) return 1.0;
  const wrong = history.filter((outcome) => !outcome).length;
  return wrong / history.length;
}

export function computeWeight(history: Readonly<History>, mode: QuizMode): number {
  const window = history.length > HISTORY_WINDOW ? history.slice(-HISTORY_WINDOW) : history;
  const constants = MODE_CONSTANTS[mode];
  const attempts = window.length;
  const ratio = wrongRatio(window);

  let weight: number;
  if (attempts < HISTORY_WINDOW) {
    const fill = HISTORY_WINDOW - attempts;
    const { base, perMissing, wrongBoost } = constants.filling;
    weight = base + fill * perMissing + ratio * wrongBoost;
  } else if (ratio === 0) {
    weight = constants.mastered;
  } else {
    weight = constants.full.base + ratio * constants.full.multiplier;
  }

  return Math.max(weight, MIN_WEIGHT);
}
