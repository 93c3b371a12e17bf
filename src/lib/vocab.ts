import { readFile } from 'node:fs/promises';
import { z } from 'zod';

import { VocabValidationError } from './errors';
import type { VocabItem, VocabPool } from './types';

export const MIN_POOL_SIZE = 4;

export interface VocabFieldNames {
  term: string;
  translation: string;
}

export const DEFAULT_FIELDS: VocabFieldNames = { term: 'term', translation: 'translation' };

/** Field names used by the JSON vocabulary files. */
export const VOCAB_FILE_FIELDS: VocabFieldNames = { term: 'korean', translation: 'english' };

export interface LoadVocabOptions {
  fields?: VocabFieldNames;
  source?: string;
}

const fieldSchema = z.string().min(1);

const entrySchema = z.record(z.string(), z.unknown());

function parseEntry(raw: unknown, index: number, fields: VocabFieldNames, source: string): VocabItem {
  const entry = entrySchema.safeParse(raw);
  if (!entry.success) {
    throw new VocabValidationError('INVALID_ENTRY', `${source} contains an invalid entry at index ${index} (expected an object).`);
  }

  const term = fieldSchema.safeParse(entry.data[fields.term]);
  const translation = fieldSchema.safeParse(entry.data[fields.translation]);
  if (!term.success || !translation.success) {
    throw new VocabValidationError(
      'INVALID_ENTRY',
      `${source} entries must include non-empty '${fields.term}' and '${fields.translation}' (entry ${index}).`,
    );
  }

  return Object.freeze({ term: term.data, translation: translation.data });
}

export function loadVocab(raw: unknown, options: LoadVocabOptions = {}): VocabPool {
  const fields = options.fields ?? DEFAULT_FIELDS;
  const source = options.source ?? 'Vocabulary';

  if (!Array.isArray(raw)) {
    throw new VocabValidationError('INVALID_ENTRY', `${source} must contain a JSON array of entries.`);
  }

  const items = raw.map((entry, index) => parseEntry(entry, index, fields, source));

  if (items.length < MIN_POOL_SIZE) {
    throw new VocabValidationError('TOO_FEW_ENTRIES', `${source} must contain at least four entries.`);
  }

  const translations = new Set(items.map((item) => item.translation));
  if (translations.size < MIN_POOL_SIZE) {
    throw new VocabValidationError(
      'INSUFFICIENT_UNIQUE_TRANSLATIONS',
      `${source} must contain at least four unique translations.`,
    );
  }

  const terms = new Set(items.map((item) => item.term));
  if (terms.size < MIN_POOL_SIZE) {
    throw new VocabValidationError('INSUFFICIENT_UNIQUE_TERMS', `${source} must contain at least four unique terms.`);
  }

  return Object.freeze(items);
}

export function stripBom(text: string): string {
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

export async function readVocabFile(path: string, fields: VocabFieldNames = VOCAB_FILE_FIELDS): Promise<VocabPool> {
  const text = await readFile(path, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(stripBom(text));
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new VocabValidationError('INVALID_JSON', `${path} is not valid JSON: ${detail}`);
  }
  return loadVocab(raw, { fields, source: path });
}

export async function loadVocabulary(
  files: Record<string, string>,
  fields: VocabFieldNames = VOCAB_FILE_FIELDS,
): Promise<Map<string, VocabPool>> {
  const vocabulary = new Map<string, VocabPool>();
  for (const [category, path] of Object.entries(files)) {
    vocabulary.set(category, await readVocabFile(path, fields));
  }
  return vocabulary;
}
