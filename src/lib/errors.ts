export type VocabErrorReason =
  | 'INVALID_JSON'
  | 'INVALID_ENTRY'
  | 'TOO_FEW_ENTRIES'
  | 'INSUFFICIENT_UNIQUE_TRANSLATIONS'
  | 'INSUFFICIENT_UNIQUE_TERMS';

export class QuizError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class VocabValidationError extends QuizError {
  readonly reason: VocabErrorReason;

  constructor(reason: VocabErrorReason, message: string) {
    super(reason, message);
    this.reason = reason;
  }
}

export class InsufficientDistractorsError extends QuizError {
  constructor(message = 'Vocabulary must include at least four unique answers for this direction.') {
    super('INSUFFICIENT_DISTRACTORS', message);
  }
}

export class ProgressFormatError extends QuizError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PROGRESS_FORMAT', message, options);
  }
}

export class PersistenceError extends QuizError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super('PERSISTENCE_FAILED', `Could not save progress to ${path}: ${detail}`, { cause });
    this.path = path;
  }
}

export class QuizConfigError extends QuizError {
  constructor(message: string) {
    super('INVALID_CONFIG', message);
  }
}

/** `code` of an fs or quiz error, looking through `cause` when the error wraps another. */
export function extractErrorCode(error: unknown): string | undefined {
  if (!(error instanceof Error)) return undefined;
  if ('code' in error && typeof error.code === 'string') return error.code;
  return extractErrorCode(error.cause);
}

export function isMissingFileError(error: unknown): boolean {
  return extractErrorCode(error) === 'ENOENT';
}
