import { QuizConfigError } from './errors';
import { defaultMatchingMode, gradeTypedAnswer, type MatchingMode } from './matching';
import type { AnswerOutcome, ProgressStore } from './progress-store';
import { buildQuestion } from './question';
import { choice, getRandomGenerator, type Rng } from './random';
import { scoreboard, sectionSummary, type ScoreboardView } from './scoreboard';
import type { AnswerMode, Direction, Question, QuizMode, VocabPool } from './types';

export interface SessionOptions {
  direction?: Direction;
  matchingMode?: MatchingMode;
  rng?: Rng;
}

export interface PanelFeedback {
  correct: boolean;
  answer: string;
  term: string;
  /** Category the answer was recorded under; the panel has moved on by now. */
  category: string;
  saved: boolean;
}

export class QuizSession {
  readonly categories: string[];

  private active: string[];

  private readonly panels: QuizPanel[] = [];

  readonly direction: Direction;

  readonly matchingMode: MatchingMode;

  readonly rng: Rng;

  constructor(
    private readonly vocabulary: ReadonlyMap<string, VocabPool>,
    readonly store: ProgressStore,
    options: SessionOptions = {},
  ) {
    this.categories = [...vocabulary.keys()];
    if (this.categories.length === 0) {
      throw new QuizConfigError('At least one vocabulary category is required.');
    }
    this.active = [...this.categories];
    this.direction = options.direction ?? 'AB';
    this.matchingMode = options.matchingMode ?? defaultMatchingMode();
    this.rng = options.rng ?? getRandomGenerator();
  }

  activeCategories(): string[] {
    return [...this.active];
  }

  generateQuestion(category: string, mode: QuizMode, direction: Direction = this.direction): Question {
    const pool = this.vocabulary.get(category);
    if (!pool) {
      throw new QuizConfigError(`Unknown category "${category}".`);
    }
    return buildQuestion(pool, this.store.statsFor(category), { mode, direction, rng: this.rng });
  }

  handleAnswer(category: string, term: string, isCorrect: boolean, now: Date = new Date()): Promise<AnswerOutcome> {
    return this.store.answer(category, term, isCorrect, now);
  }

  setActiveCategories(selection: readonly string[]): void {
    if (selection.length === 0) {
      throw new QuizConfigError('Please select at least one section to study.');
    }
    const unknown = selection.filter((category) => !this.vocabulary.has(category));
    if (unknown.length > 0) {
      throw new QuizConfigError(`Unknown sections: ${unknown.join(', ')}.`);
    }
    this.active = this.categories.filter((category) => selection.includes(category));
    for (const panel of this.panels) {
      panel.setCategories(this.active);
    }
  }

  /** One row of fresh panels above one row of review panels. */
  createPanels(columns: number, answerMode: AnswerMode = 'choice'): QuizPanel[] {
    const created: QuizPanel[] = [];
    for (const mode of ['fresh', 'review'] as const) {
      for (let col = 0; col < columns; col += 1) {
        const panel = new QuizPanel(this, choice(this.active, this.rng), mode, answerMode);
        panel.setCategories(this.active);
        created.push(panel);
      }
    }
    this.panels.push(...created);
    return created;
  }

  sectionStatus(): string {
    return sectionSummary(this.active, this.categories);
  }

  scoreboard(): ScoreboardView {
    return scoreboard(this.store.snapshot(), this.categories, this.store.metadata);
  }
}

export class QuizPanel {
  private categoryList: string[];

  private current: Question | null = null;

  private isActive = false;

  private lastError: string | null = null;

  constructor(
    private readonly session: QuizSession,
    private currentCategory: string,
    readonly mode: QuizMode,
    readonly answerMode: AnswerMode = 'choice',
  ) {
    this.categoryList = [currentCategory];
  }

  get category(): string {
    return this.currentCategory;
  }

  get question(): Question | null {
    return this.current;
  }

  get active(): boolean {
    return this.isActive;
  }

  get error(): string | null {
    return this.lastError;
  }

  title(): string {
    const modeLabel = this.mode === 'fresh' ? 'New Focus' : 'Tough Review';
    return `${this.currentCategory}: ${modeLabel}`;
  }

  load(): Question | null {
    try {
      this.current = this.session.generateQuestion(this.currentCategory, this.mode);
    } catch (error) {
      this.current = null;
      this.isActive = false;
      this.lastError = error instanceof Error ? error.message : String(error);
      return null;
    }
    this.isActive = true;
    this.lastError = null;
    return this.current;
  }

  setCategories(categories: readonly string[]): void {
    if (categories.length === 0) return;
    this.categoryList = [...categories];
    if (!this.categoryList.includes(this.currentCategory)) {
      this.currentCategory = choice(this.categoryList, this.session.rng);
    }
    this.load();
  }

  submitChoice(index: number, now?: Date): Promise<PanelFeedback | null> {
    const question = this.current;
    if (this.answerMode !== 'choice' || !this.isActive || !question || index < 0 || index >= question.options.length) {
      return Promise.resolve(null);
    }
    return this.complete(question, question.options[index] === question.answer, now);
  }

  submitTyped(response: string, now?: Date): Promise<PanelFeedback | null> {
    const question = this.current;
    if (this.answerMode !== 'typed' || !this.isActive || !question) {
      return Promise.resolve(null);
    }
    return this.complete(question, gradeTypedAnswer(question, response, this.session.matchingMode), now);
  }

  private async complete(question: Question, correct: boolean, now?: Date): Promise<PanelFeedback> {
    const category = this.currentCategory;
    this.isActive = false;
    this.rotateCategory();
    const outcome = await this.session.handleAnswer(category, question.term, correct, now);
    return { correct, answer: question.answer, term: question.term, category, saved: outcome.saved };
  }

  private rotateCategory(): void {
    const choices = this.categoryList.filter((category) => category !== this.currentCategory);
    if (choices.length > 0) {
      this.currentCategory = choice(choices, this.session.rng);
    }
  }
}
