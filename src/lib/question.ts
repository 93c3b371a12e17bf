import { InsufficientDistractorsError } from './errors';
import { getRandomGenerator, pickWeighted, sample, shuffle, type Rng } from './random';
import type { CategoryStats, Direction, Question, QuizMode, VocabItem, VocabPool } from './types';
import { computeWeight } from './weight';

export const OPTION_COUNT = 4;
const DISTRACTOR_COUNT = OPTION_COUNT - 1;

export interface BuildQuestionOptions {
  mode: QuizMode;
  direction?: Direction;
  rng?: Rng;
}

export function associationSides(direction: Direction, item: VocabItem): { cue: string; response: string } {
  const cue = direction === 'AB' ? item.term : item.translation;
  const response = direction === 'AB' ? item.translation : item.term;
  return { cue, response };
}

export function poolWeights(pool: VocabPool, stats: CategoryStats, mode: QuizMode): number[] {
  return pool.map((item) => computeWeight(stats.get(item.term) ?? [], mode));
}

/**
 * Builds a question for an already chosen item. Distractors are distinct answer
 * values, so two items sharing a translation contribute it once.
 */
export function makeQuestion(
  pool: VocabPool,
  selected: VocabItem,
  direction: Direction = 'AB',
  rng: Rng = getRandomGenerator(),
): Question {
  const { cue, response } = associationSides(direction, selected);

  const alternatives = new Set<string>();
  for (const item of pool) {
    const candidate = associationSides(direction, item).response;
    if (candidate !== response) alternatives.add(candidate);
  }
  if (alternatives.size < DISTRACTOR_COUNT) {
    throw new InsufficientDistractorsError();
  }

  const distractors = sample([...alternatives], DISTRACTOR_COUNT, rng);
  const options = shuffle([...distractors, response], rng);

  return {
    prompt: cue,
    options,
    answer: response,
    term: selected.term,
    direction,
  };
}

export function buildQuestion(pool: VocabPool, stats: CategoryStats, options: BuildQuestionOptions): Question {
  const rng = options.rng ?? getRandomGenerator();
  const weights = poolWeights(pool, stats, options.mode);
  const selected = pool[pickWeighted(weights, rng)];
  return makeQuestion(pool, selected, options.direction ?? 'AB', rng);
}
