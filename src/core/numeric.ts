import type { NumericPolicy, Token } from '../types.js';

/**
 * Clinical numeric literals, anchored on the whole token:
 * - integer or decimal with "." or "," (12, 12.3, 12,3)
 * - optional exponent (1e-3, 2.5E+4)
 * - optional percent-family suffix (12%, 12/%, 3‰, 1‱)
 * - or a plain fraction of two integers (120/80)
 */
export const NUMERIC_LITERAL = /^(?:\d+(?:[.,]\d+)?(?:[eE][+-]?\d+)?(?:\/%|%|‰|‱)?|\d+\/\d+)$/u;

export const DEFAULT_NUMERIC_PLACEHOLDER = '<num>';

export function isNumericLiteral(text: string): boolean {
  return NUMERIC_LITERAL.test(text);
}

export function isNumericToken(token: Pick<Token, 'text' | 'likeNum'>): boolean {
  return token.likeNum || isNumericLiteral(token.text);
}

export function renderNumeric(
  token: Pick<Token, 'text'>,
  policy: NumericPolicy,
  placeholder = DEFAULT_NUMERIC_PLACEHOLDER
): string {
  switch (policy) {
    case 'mark_as_placeholder':
      return placeholder;
    case 'preserve_original':
      return token.text;
  }
}
