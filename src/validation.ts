import { z } from 'zod';
import { MATCH_MODES, NUMERIC_POLICIES } from './types.js';

export const tokenSchema = z
  .object({
    text: z.string().min(1).max(1_000),
    lemma: z.string().max(1_000).optional(),
    pos: z.string().min(1).max(16).default('X'),
    isAlpha: z.boolean(),
    isPunctOrSpace: z.boolean().default(false),
    likeNum: z.boolean().default(false),
  })
  .strict();

const tokenSequenceSchema = z.array(tokenSchema).max(10_000);

export const normalizeTextsRequestSchema = z
  .object({
    texts: z.array(z.string().max(100_000)).max(1_000),
    parallel: z.number().int().min(1).max(64).optional(),
  })
  .strict();

export const normalizeTokensRequestSchema = z
  .object({
    documents: z.array(tokenSequenceSchema).max(1_000),
  })
  .strict();

export const classifyRequestSchema = z
  .object({
    tokens: tokenSequenceSchema,
    options: z
      .object({
        numericPolicy: z.enum(NUMERIC_POLICIES).optional(),
        matchMode: z.enum(MATCH_MODES).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();
