import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { BASE_STOPWORD_SETS, MATCH_MODES, NUMERIC_POLICIES, TOKENIZER_DRIVERS } from './types.js';
import type { AppConfig } from './types.js';

const lexiconSchema = z
  .object({
    path: z.string().min(1).default('./config/lexicon.yml'),
    baseStopwords: z.enum(BASE_STOPWORD_SETS).default('es'),
  })
  .default({});

const normalizationSchema = z
  .object({
    numericPolicy: z.enum(NUMERIC_POLICIES).default('preserve_original'),
    matchMode: z.enum(MATCH_MODES).default('folded_lemma'),
    placeholder: z.string().min(1).max(32).default('<num>'),
  })
  .default({});

const tokenizerSchema = z
  .object({
    driver: z.enum(TOKENIZER_DRIVERS).default('regex'),
    url: z.string().url().optional(),
    lang: z.string().min(2).default('es'),
    timeoutMs: z.number().int().min(1).max(10 * 60 * 1000).default(30_000),
  })
  .default({});

const configSchema = z.object({
  lexicon: lexiconSchema,
  normalization: normalizationSchema,
  tokenizer: tokenizerSchema,
  jobs: z
    .object({
      maxParallel: z.number().int().min(1).max(64).default(4),
    })
    .default({}),
});

let cachedConfig: AppConfig | null = null;

export function defaultConfigPath(): string {
  return path.resolve(process.env.LEXINORM_CONFIG ?? 'config.json');
}

export function parseConfig(raw: unknown): AppConfig {
  return configSchema.parse(raw);
}

export async function loadConfig(configPath = defaultConfigPath()): Promise<AppConfig> {
  if (cachedConfig) {
    return cachedConfig;
  }

  const raw = await readFile(configPath, 'utf-8');
  const typed = parseConfig(JSON.parse(raw));
  cachedConfig = typed;
  return typed;
}

export function reloadConfig(): void {
  cachedConfig = null;
}
