import type { TokenizerConfig, TokenProducer } from '../types.js';
import { HttpTokenizer, resolveTokenizerUrl } from './httpTokenizer.js';
import { RegexTokenizer } from './regexTokenizer.js';

export function createTokenProducer(config: TokenizerConfig): TokenProducer {
  switch (config.driver) {
    case 'http':
      return new HttpTokenizer({
        url: resolveTokenizerUrl(config.url),
        lang: config.lang,
        timeoutMs: config.timeoutMs,
      });
    case 'regex':
      return new RegexTokenizer();
  }
}

export { HttpTokenizer, TokenizerError } from './httpTokenizer.js';
export { RegexTokenizer } from './regexTokenizer.js';
