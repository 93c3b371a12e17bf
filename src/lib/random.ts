import { readRandomSeedFromEnv } from './env';

const SEC = 1000;
const RANDOM_RANGE = 0x7fffffff;
const RANDOM_STATE_SIZE = 31;
const RANDOM_SEPARATION = 3;
const RANDOM_WARMUP = RANDOM_STATE_SIZE * 10;

/** Source of uniform floats in [0, 1). */
export interface Rng {
  nextFloat(): number;
}

function normalizeSeed(rawSeed: number): number {
  const normalized = Math.abs(Math.trunc(rawSeed)) % RANDOM_RANGE;
  return normalized === 0 ? 1 : normalized;
}

function computeDefaultSeed(): number {
  const seconds = Math.floor(Date.now() / SEC);
  const pid = typeof process !== 'undefined' && typeof process.pid === 'number' ? process.pid : 1;
  return normalizeSeed(seconds * pid);
}

/** Additive lagged-Fibonacci generator seeded through Park-Miller. */
export class QuizRandom implements Rng {
  private state: Uint32Array;

  private fptr: number;

  private rptr: number;

  constructor(seed: number) {
    this.state = new Uint32Array(RANDOM_STATE_SIZE);
    this.fptr = RANDOM_SEPARATION;
    this.rptr = 0;
    this.seed(seed);
  }

  private seed(seed: number): void {
    let value = normalizeSeed(seed);
    this.state[0] = value;
    for (let i = 1; i < RANDOM_STATE_SIZE; i += 1) {
      value = this.parkMiller(value);
      this.state[i] = value;
    }
    this.fptr = RANDOM_SEPARATION;
    this.rptr = 0;
    for (let i = 0; i < RANDOM_WARMUP; i += 1) {
      this.nextInt();
    }
  }

  private parkMiller(previous: number): number {
    const hi = Math.floor(previous / 127773);
    const lo = previous % 127773;
    let next = 16807 * lo - 2836 * hi;
    if (next <= 0) {
      next += RANDOM_RANGE;
    }
    return next >>> 0;
  }

  nextInt(): number {
    const sum = (this.state[this.fptr] + this.state[this.rptr]) >>> 0;
    this.state[this.fptr] = sum;
    const value = (sum >>> 1) & RANDOM_RANGE;
    this.fptr = (this.fptr + 1) % RANDOM_STATE_SIZE;
    this.rptr = (this.rptr + 1) % RANDOM_STATE_SIZE;
    return value;
  }

  nextFloat(): number {
    return this.nextInt() / (RANDOM_RANGE + 1);
  }
}

let sharedRandom: QuizRandom | null = null;
let sharedSeed: number | null = null;

export function getRandomGenerator(): QuizRandom {
  const envSeed = readRandomSeedFromEnv();

  if (envSeed !== null) {
    const normalized = normalizeSeed(envSeed);
    if (!sharedRandom || sharedSeed !== normalized) {
      sharedRandom = new QuizRandom(normalized);
      sharedSeed = normalized;
    }
    return sharedRandom;
  }

  if (!sharedRandom) {
    const seed = computeDefaultSeed();
    sharedRandom = new QuizRandom(seed);
    sharedSeed = seed;
  }

  return sharedRandom;
}

export function setQuizRandomSeed(seed: number | null): void {
  if (seed === null) {
    sharedRandom = null;
    sharedSeed = null;
    return;
  }
  const normalized = normalizeSeed(seed);
  sharedRandom = new QuizRandom(normalized);
  sharedSeed = normalized;
}

export function randomIndex(rng: Rng, length: number): number {
  const index = Math.floor(rng.nextFloat() * length);
  return Math.min(Math.max(index, 0), length - 1);
}

/** Index drawn with probability proportional to its weight. */
export function pickWeighted(weights: readonly number[], rng: Rng = getRandomGenerator()): number {
  if (weights.length === 0) {
    throw new RangeError('Cannot draw from an empty pool.');
  }
  const total = weights.reduce((sum, value) => sum + Math.max(0, value), 0);
  if (total <= 0) {
    return randomIndex(rng, weights.length);
  }

  let x = rng.nextFloat() * total;
  let last = 0;
  for (let idx = 0; idx < weights.length; idx += 1) {
    const weight = Math.max(0, weights[idx]);
    if (weight <= 0) continue;
    last = idx;
    if (x < weight) return idx;
    x -= weight;
  }
  // Float rounding can leave x just above the final weight.
  return last;
}

export function shuffle<T>(items: readonly T[], rng: Rng = getRandomGenerator()): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i -= 1) {
    const j = randomIndex(rng, i + 1);
    const tmp = result[i];
    result[i] = result[j];
    result[j] = tmp;
  }
  return result;
}

export function sample<T>(items: readonly T[], count: number, rng: Rng = getRandomGenerator()): T[] {
  const remaining = [...items];
  const picked: T[] = [];
  while (picked.length < count && remaining.length > 0) {
    const [item] = remaining.splice(randomIndex(rng, remaining.length), 1);
    picked.push(item);
  }
  return picked;
}

export function choice<T>(items: readonly T[], rng: Rng = getRandomGenerator()): T {
  if (items.length === 0) {
    throw new RangeError('Cannot choose from an empty list.');
  }
  return items[randomIndex(rng, items.length)];
}
