import { describe, expect, it, vi } from 'vitest';

import { PersistenceError } from '../errors';
import { serializeProgress } from '../progress';
import { emptyMetadata } from '../progress-format';
import { ProgressStore } from '../progress-store';
import type { Progress, StreakMetadata } from '../types';

const NOW = new Date(2024, 4, 1, 12, 0);

describe('ProgressStore', () => {
  it('records an answer and saves a full snapshot', async () => {
    const writes: unknown[] = [];
    const writer = vi.fn(async (_path: string, progress: Progress, metadata: StreakMetadata) => {
      writes.push(serializeProgress(progress, metadata));
    });
    const store = new ProgressStore('progress.json', new Map([['Nouns', new Map()]]), emptyMetadata(), { writer });

    const outcome = await store.answer('Nouns', '집', true, NOW);

    expect(outcome).toEqual({
      history: [true],
      metadata: {
        streak: 1,
        streakTimestamp: '2024-05-01 12:00',
        longestStreak: 1,
        longestStreakTimestamp: '2024-05-01 12:00',
      },
      saved: true,
    });
    expect(writer).toHaveBeenCalledTimes(1);
    expect(writer.mock.calls[0][0]).toBe('progress.json');
    expect(writes).toEqual([
      {
        __meta__: {
          streak: 1,
          streak_timestamp: '2024-05-01 12:00',
          longest_streak: 1,
          longest_streak_timestamp: '2024-05-01 12:00',
        },
        Nouns: { 집: { history: [1] } },
      },
    ]);
  });

  it('never runs two writes at once', async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const writer = vi.fn(async () => {
      inFlight += 1;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 5));
      inFlight -= 1;
    });
    const store = new ProgressStore('progress.json', new Map(), emptyMetadata(), { writer });

    const results = await Promise.all([
      store.answer('Nouns', '집', true, NOW),
      store.answer('Verbs', '가다', false, NOW),
      store.answer('Nouns', '물', true, NOW),
    ]);

    expect(results.map((result) => result.saved)).toEqual([true, true, true]);
    expect(writer).toHaveBeenCalledTimes(3);
    expect(maxInFlight).toBe(1);
    expect(store.metadata.streak).toBe(1);
    expect(store.metadata.longestStreak).toBe(1);
  });

  it('reports a failure once per run of failures', async () => {
    const onPersistenceError = vi.fn();
    const writer = vi
      .fn<[string, Progress, StreakMetadata], Promise<void>>()
      .mockRejectedValueOnce(new Error('disk full'))
      .mockRejectedValueOnce(new Error('disk full'))
      .mockResolvedValueOnce(undefined)
      .mockRejectedValueOnce(new Error('read-only file system'));
    const store = new ProgressStore('progress.json', new Map(), emptyMetadata(), { writer, onPersistenceError });

    const saved: boolean[] = [];
    for (let i = 0; i < 4; i += 1) {
      saved.push(await store.persist());
    }

    expect(saved).toEqual([false, false, true, false]);
    expect(onPersistenceError).toHaveBeenCalledTimes(2);
    const first = onPersistenceError.mock.calls[0][0];
    expect(first).toBeInstanceOf(PersistenceError);
    expect(first.message).toBe('Could not save progress to progress.json: disk full');
    expect(onPersistenceError.mock.calls[1][0].message).toBe(
      'Could not save progress to progress.json: read-only file system',
    );
  });

  it('keeps saving after a failure handler throws', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const onPersistenceError = vi.fn(() => {
      throw new Error('handler broke');
    });
    const writer = vi
      .fn<[string, Progress, StreakMetadata], Promise<void>>()
      .mockRejectedValueOnce(new Error('disk full'))
      .mockResolvedValueOnce(undefined);
    const store = new ProgressStore('progress.json', new Map(), emptyMetadata(), { writer, onPersistenceError });

    await expect(store.persist()).resolves.toBe(false);
    await expect(store.persist()).resolves.toBe(true);

    expect(writer).toHaveBeenCalledTimes(2);
    expect(onPersistenceError).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toBe('Could not save progress to progress.json: disk full');
    warn.mockRestore();
  });

  it('keeps progress in memory when saving fails', async () => {
    const writer = vi.fn(async () => {
      throw new Error('disk full');
    });
    const store = new ProgressStore('progress.json', new Map(), emptyMetadata(), {
      writer,
      onPersistenceError: vi.fn(),
    });

    const outcome = await store.answer('Nouns', '집', false, NOW);

    expect(outcome.saved).toBe(false);
    expect(store.snapshot()).toEqual(new Map([['Nouns', new Map([['집', [false]]])]]));
  });

  it('hands out copies rather than live state', () => {
    const store = new ProgressStore('progress.json');
    store.record('Nouns', '집', true, NOW);

    const snapshot = store.snapshot();
    snapshot.get('Nouns')?.get('집')?.push(false);
    const metadata = store.metadata;
    metadata.streak = 99;

    expect(store.statsFor('Nouns').get('집')).toEqual([true]);
    expect(store.metadata.streak).toBe(1);
    expect(store.categories()).toEqual(['Nouns']);
  });
});
