export * from './lib/types';
export * from './lib/errors';
export * from './lib/vocab';
export * from './lib/weight';
export * from './lib/random';
export * from './lib/question';
export * from './lib/progress-format';
export * from './lib/progress';
export * from './lib/progress-store';
export * from './lib/matching';
export * from './lib/scoreboard';
export * from './lib/session';
export * from './lib/env';
