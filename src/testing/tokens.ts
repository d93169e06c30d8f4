import type { Token } from '../types.js';

const LETTERS = /^[\p{L}\p{M}]+$/u;

/** Alphabetic-looking token with sensible defaults; override what a case needs. */
export function tok(text: string, overrides: Partial<Token> = {}): Token {
  return {
    text,
    lemma: '',
    pos: 'NOUN',
    isAlpha: LETTERS.test(text),
    isPunctOrSpace: false,
    likeNum: false,
    ...overrides,
  };
}

export const punct = (text: string): Token =>
  tok(text, { pos: 'PUNCT', isAlpha: false, isPunctOrSpace: true });
