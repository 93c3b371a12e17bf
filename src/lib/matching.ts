import type { Question } from './types';

export type MatchingMode = 'exact' | 'case' | 'fuzzy';

export const FUZZY_ACCEPT_THRESHOLD = 0.85;

/** Lower-cased, punctuation dropped, runs of whitespace collapsed. */
export function canonicalAnswer(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .split(/\s+/)
    .filter(Boolean)
    .join(' ');
}

function letterTriples(value: string): string[] {
  const padded = `  ${value} `;
  const triples: string[] = [];
  for (let start = 0; start + 3 <= padded.length; start += 1) {
    triples.push(padded.slice(start, start + 3));
  }
  return triples;
}

/** Dice overlap of the two strings' letter triples, in [0, 1]. */
export function answerOverlap(expected: string, received: string): number {
  if (expected === received) return 1;
  const left = letterTriples(expected);
  const right = letterTriples(received);
  const remaining = new Map<string, number>();
  for (const triple of right) remaining.set(triple, (remaining.get(triple) ?? 0) + 1);
  let shared = 0;
  for (const triple of left) {
    const count = remaining.get(triple) ?? 0;
    if (count > 0) {
      shared += 1;
      remaining.set(triple, count - 1);
    }
  }
  return (2 * shared) / (left.length + right.length);
}

export function computeCorrectness(expected: string, received: string, mode: MatchingMode): number {
  if (mode === 'exact') {
    return expected === received ? 1 : 0;
  }

  if (mode === 'case') {
    return expected.trim().localeCompare(received.trim(), undefined, { sensitivity: 'accent' }) === 0 ? 1 : 0;
  }

  return answerOverlap(canonicalAnswer(expected), canonicalAnswer(received));
}

export function isAcceptedResponse(expected: string, received: string, mode: MatchingMode = defaultMatchingMode()): boolean {
  return computeCorrectness(expected, received, mode) >= FUZZY_ACCEPT_THRESHOLD;
}

/** Grades a typed response against the question's answer. */
export function gradeTypedAnswer(question: Question, received: string, mode: MatchingMode = defaultMatchingMode()): boolean {
  return isAcceptedResponse(question.answer, received, mode);
}

export function defaultMatchingMode(): MatchingMode {
  return 'fuzzy';
}
