import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import type { AppConfig, BaseStopwordSet } from '../types.js';
import { ConfigModel } from '../core/configModel.js';
import { logger } from '../logger.js';

export const DEFAULT_STOPWORDS_DIR = fileURLToPath(new URL('../../data/stopwords/', import.meta.url));

const stopwordListSchema = z.array(z.string());

export class LexiconLoadError extends Error {
  code: 'LEXICON_UNREADABLE';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LexiconLoadError';
    this.code = 'LEXICON_UNREADABLE';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads a lexicon file (YAML or JSON). A multi-document YAML stream is merged
 * key by key, later documents overriding earlier ones, so the classic
 * "one setting per document" layout and a single mapping both work.
 * `negative` is accepted as a legacy name for `negation`.
 *
 * Shape checks are left to {@link ConfigModel.fromSource}.
 */
export async function readLexiconFile(filePath: string): Promise<Record<string, unknown>> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new LexiconLoadError(`cannot read lexicon ${filePath}`, { cause: error });
  }

  let documents: unknown[];
  try {
    documents = yaml.loadAll(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new LexiconLoadError(`lexicon ${filePath} is not valid YAML: ${reason}`, { cause: error });
  }

  const merged: Record<string, unknown> = {};
  documents.forEach((doc, index) => {
    if (doc === null || doc === undefined) return;
    if (!isRecord(doc)) {
      throw new LexiconLoadError(`lexicon ${filePath}: document ${index + 1} must be a mapping`);
    }
    Object.assign(merged, doc);
  });

  if (!('negation' in merged) && 'negative' in merged) {
    merged.negation = merged.negative;
  }
  delete merged.negative;
  return merged;
}

export async function loadBaseStopwords(
  set: BaseStopwordSet,
  dir = DEFAULT_STOPWORDS_DIR
): Promise<string[]> {
  if (set === 'none') return [];
  const file = path.join(dir, `${set}.json`);
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(file, 'utf-8'));
  } catch (error) {
    throw new LexiconLoadError(`cannot read base stopwords ${file}`, { cause: error });
  }
  const parsed = stopwordListSchema.safeParse(raw);
  if (!parsed.success) {
    throw new LexiconLoadError(`base stopwords ${file} must be a JSON array of strings`);
  }
  return parsed.data;
}

export async function loadLexicon(
  options: AppConfig['lexicon'],
  stopwordsDir = DEFAULT_STOPWORDS_DIR
): Promise<ConfigModel> {
  const lexiconPath = path.resolve(options.path);
  const [source, baseStopwords] = await Promise.all([
    readLexiconFile(lexiconPath),
    loadBaseStopwords(options.baseStopwords, stopwordsDir),
  ]);
  const model = ConfigModel.fromSource(source, { baseStopwords });

  for (const collision of model.overrideCollisions) {
    logger.warn({ event: 'lemma_override_collision', ...collision });
  }
  logger.info({ event: 'lexicon_loaded', path: lexiconPath, ...model.size });
  return model;
}
