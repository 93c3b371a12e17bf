export type Direction = 'AB' | 'BA';
export type QuizMode = 'fresh' | 'review';
export type AnswerMode = 'choice' | 'typed';

export interface VocabItem {
  readonly term: string;
  readonly translation: string;
}

export type VocabPool = readonly VocabItem[];

/** Most recent outcome last; `true` means answered correctly. */
export type History = boolean[];
export type CategoryStats = Map<string, History>;
export type Progress = Map<string, CategoryStats>;

export interface StreakMetadata {
  streak: number;
  streakTimestamp: string;
  longestStreak: number;
  longestStreakTimestamp: string;
}

export interface Question {
  prompt: string;
  options: string[];
  answer: string;
  /** Source term of the asked item, whichever side is shown. */
  term: string;
  direction: Direction;
}
