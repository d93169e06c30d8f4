import type { Token, TokenProducer } from '../types.js';

// letters (with any combining marks), clinical numbers, or any single other character
const TOKEN_PATTERN =
  /[\p{L}\p{M}]+|\d+(?:[.,]\d+)*(?:[eE][+-]?\d+)?(?:\/\d+)?(?:\/%|%|‰|‱)?|\S/gu;
const LETTERS = /^[\p{L}\p{M}]+$/u;
const PLAIN_NUMBER = /^\d+(?:[.,]\d+)*$/;
const PUNCT_OR_SPACE = /^[\p{P}\p{Z}]+$/u;

function toToken(text: string): Token {
  if (LETTERS.test(text)) {
    return { text, lemma: '', pos: 'X', isAlpha: true, isPunctOrSpace: false, likeNum: false };
  }
  if (/^\d/.test(text)) {
    return { text, lemma: '', pos: 'NUM', isAlpha: false, isPunctOrSpace: false, likeNum: PLAIN_NUMBER.test(text) };
  }
  const isPunct = PUNCT_OR_SPACE.test(text);
  return { text, lemma: '', pos: isPunct ? 'PUNCT' : 'SYM', isAlpha: false, isPunctOrSpace: isPunct, likeNum: false };
}

/**
 * Rule-based fallback producer for when no lemmatizer service is reachable.
 * Emits surface tokens only: no lemmas, POS limited to X/NUM/PUNCT/SYM.
 */
export class RegexTokenizer implements TokenProducer {
  id = 'regex' as const;

  tokenizeSync(text: string): Token[] {
    return Array.from(text.normalize('NFC').matchAll(TOKEN_PATTERN), (match) => toToken(match[0]));
  }

  async tokenize(text: string): Promise<Token[]> {
    return this.tokenizeSync(text);
  }
}
