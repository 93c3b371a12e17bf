import { PersistenceError } from './errors';
import { loadProgress, recordOutcome, saveProgress, statsFor, updateStreak } from './progress';
import { emptyMetadata } from './progress-format';
import type { CategoryStats, History, Progress, StreakMetadata } from './types';

export type PersistenceErrorHandler = (error: PersistenceError) => void;

export interface ProgressStoreOptions {
  onPersistenceError?: PersistenceErrorHandler;
  /** Replaces the file write, mainly for tests. */
  writer?: (path: string, progress: Progress, metadata: StreakMetadata) => Promise<void>;
}

export interface AnswerOutcome {
  history: History;
  metadata: StreakMetadata;
  saved: boolean;
}

function warnPersistenceError(error: PersistenceError): void {
  console.warn(error.message);
}

export class ProgressStore {
  private metadataState: StreakMetadata;

  private writeChain: Promise<boolean> = Promise.resolve(true);

  private failureReported = false;

  private readonly onPersistenceError: PersistenceErrorHandler;

  private readonly writer: NonNullable<ProgressStoreOptions['writer']>;

  constructor(
    readonly path: string,
    private readonly progress: Progress = new Map(),
    metadata: StreakMetadata = emptyMetadata(),
    options: ProgressStoreOptions = {},
  ) {
    this.metadataState = { ...metadata };
    this.onPersistenceError = options.onPersistenceError ?? warnPersistenceError;
    this.writer = options.writer ?? saveProgress;
  }

  static async open(path: string, categories: readonly string[], options: ProgressStoreOptions = {}): Promise<ProgressStore> {
    const { progress, metadata } = await loadProgress(path, categories);
    return new ProgressStore(path, progress, metadata, options);
  }

  get metadata(): StreakMetadata {
    return { ...this.metadataState };
  }

  statsFor(category: string): CategoryStats {
    return statsFor(this.progress, category);
  }

  categories(): string[] {
    return [...this.progress.keys()];
  }

  snapshot(): Progress {
    return new Map(
      [...this.progress].map(([category, stats]) => [
        category,
        new Map([...stats].map(([term, history]) => [term, [...history]])),
      ]),
    );
  }

  /** Appends the outcome to the term's history and advances the streak. */
  record(category: string, term: string, isCorrect: boolean, now: Date = new Date()): { history: History; metadata: StreakMetadata } {
    const history = recordOutcome(this.progress, category, term, isCorrect);
    this.metadataState = updateStreak(this.metadataState, isCorrect, now);
    return { history: [...history], metadata: this.metadata };
  }

  /**
   * Queues a full snapshot write. Resolves false on failure; the handler hears
   * about the first failure of each run of failures only.
   */
  persist(): Promise<boolean> {
    this.writeChain = this.writeChain.then(() => this.writeSnapshot());
    return this.writeChain;
  }

  async answer(category: string, term: string, isCorrect: boolean, now: Date = new Date()): Promise<AnswerOutcome> {
    const { history, metadata } = this.record(category, term, isCorrect, now);
    const saved = await this.persist();
    return { history, metadata, saved };
  }

  // A throwing handler must not reject the write chain for later saves.
  private report(failure: PersistenceError): void {
    try {
      this.onPersistenceError(failure);
    } catch (handlerError) {
      console.warn(failure.message, handlerError);
    }
  }

  private async writeSnapshot(): Promise<boolean> {
    try {
      await this.writer(this.path, this.progress, this.metadataState);
    } catch (error) {
      const failure = error instanceof PersistenceError ? error : new PersistenceError(this.path, error);
      if (!this.failureReported) {
        this.failureReported = true;
        this.report(failure);
      }
      return false;
    }
    this.failureReported = false;
    return true;
  }
}
