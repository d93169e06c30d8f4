import type { Classification, NormalizationOptions, Token } from '../types.js';
import { foldAccents } from './accentFolder.js';
import type { ConfigModel } from './configModel.js';
import { resolveLemma } from './lemmaResolver.js';
import { DEFAULT_NUMERIC_PLACEHOLDER, isNumericToken, renderNumeric } from './numeric.js';

export const DEFAULT_NORMALIZATION_OPTIONS: Readonly<NormalizationOptions> = Object.freeze({
  numericPolicy: 'preserve_original',
  matchMode: 'folded_lemma',
  placeholder: DEFAULT_NUMERIC_PLACEHOLDER,
});

export class TokenContractError extends Error {
  code: 'TOKEN_CONTRACT_VIOLATION';

  constructor(message: string) {
    super(message);
    this.name = 'TokenContractError';
    this.code = 'TOKEN_CONTRACT_VIOLATION';
  }
}

const SKIPPED: Classification = Object.freeze({ disposition: 'SKIP', output: '' });
const STOPWORD: Classification = Object.freeze({ disposition: 'STOPWORD', output: '' });

const kept = (disposition: 'NEGATION' | 'CONTENT', output: string): Classification =>
  output ? { disposition, output } : SKIPPED;

// Tokens come from an external process; a missing surface is a contract
// violation, never something to coerce.
function assertTokenContract(token: Token): void {
  if (typeof token.text !== 'string' || token.text.length === 0) {
    throw new TokenContractError('token.text must be a non-empty string');
  }
  if (token.lemma != null && typeof token.lemma !== 'string') {
    throw new TokenContractError(`token.lemma must be a string (token "${token.text}")`);
  }
}

/**
 * Assigns one disposition per token, first match wins:
 * SKIP (punctuation/space, or neither alphabetic nor numeric), NUMERIC,
 * NEGATION, STOPWORD, CONTENT.
 *
 * In "folded_lemma" mode the decision key is the accent-folded lowercase
 * lemma, checked against the folded negation and stopword sets. In "surface"
 * mode the key is the lowercase surface: negation is checked after folding
 * it, stopwords are matched verbatim. NEGATION always emits the unfolded
 * lemma so polarity markers stay readable.
 */
export function classifyToken(
  token: Token,
  config: ConfigModel,
  options: NormalizationOptions = DEFAULT_NORMALIZATION_OPTIONS
): Classification {
  assertTokenContract(token);

  const numeric = isNumericToken(token);
  if (token.isPunctOrSpace || (!token.isAlpha && !numeric)) {
    return SKIPPED;
  }
  if (numeric) {
    return { disposition: 'NUMERIC', output: renderNumeric(token, options.numericPolicy, options.placeholder) };
  }

  const resolved = resolveLemma(token, config).toLowerCase();

  if (options.matchMode === 'surface') {
    const surface = token.text.toLowerCase();
    if (config.foldedNegationKeep.has(foldAccents(surface))) {
      return kept('NEGATION', resolved);
    }
    if (config.stopwords.has(surface)) {
      return STOPWORD;
    }
    return kept('CONTENT', resolved);
  }

  const folded = foldAccents(resolved);
  if (!folded) {
    return SKIPPED;
  }
  if (config.foldedNegationKeep.has(folded)) {
    return kept('NEGATION', resolved);
  }
  if (config.foldedStopwords.has(folded)) {
    return STOPWORD;
  }
  return kept('CONTENT', folded);
}
