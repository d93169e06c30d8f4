import type { Token } from '../types.js';
import type { ConfigModel } from './configModel.js';

const VERBAL_POS = new Set(['VERB', 'AUX']);

/**
 * Canonical form for a token, first match wins:
 * 1. lexicon override keyed by the lowercase surface, returned as declared
 * 2. verbs and auxiliaries: tokenizer lemma, else surface
 * 3. everything else: tokenizer lemma, else surface
 *
 * Branches 2 and 3 currently agree. They stay separate so verb handling can
 * diverge without touching the general fallback.
 */
export function resolveLemma(token: Token, config: ConfigModel): string {
  const surface = token.text.toLowerCase();
  const override = config.lemmaOverrides.get(surface);
  if (override !== undefined) {
    return override;
  }

  const lemma = token.lemma ? token.lemma.toLowerCase() : '';
  if (VERBAL_POS.has(token.pos)) {
    return lemma || surface;
  }
  return lemma || surface;
}
