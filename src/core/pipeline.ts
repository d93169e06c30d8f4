import type { Disposition, NormalizationOptions, Token, TokenClassification } from '../types.js';
import { ConfigModel } from './configModel.js';
import type { ConfigModelOptions } from './configModel.js';
import { classifyToken, DEFAULT_NORMALIZATION_OPTIONS } from './tokenClassifier.js';

const EMITTING: ReadonlySet<Disposition> = new Set<Disposition>(['NUMERIC', 'NEGATION', 'CONTENT']);

/**
 * Turns token sequences into normalized documents. Holds nothing but the
 * frozen ConfigModel and the options fixed at construction, so a single
 * instance can serve concurrent callers.
 */
export class NormalizationPipeline {
  readonly options: Readonly<NormalizationOptions>;

  constructor(
    readonly config: ConfigModel,
    options: Partial<NormalizationOptions> = {}
  ) {
    this.options = Object.freeze({ ...DEFAULT_NORMALIZATION_OPTIONS, ...options });
  }

  /** Builds the ConfigModel first; a bad lexicon throws before any token is seen. */
  static fromSource(
    source: unknown,
    options: Partial<NormalizationOptions> = {},
    modelOptions?: ConfigModelOptions
  ): NormalizationPipeline {
    return new NormalizationPipeline(ConfigModel.fromSource(source, modelOptions), options);
  }

  classify(tokens: readonly Token[]): TokenClassification[] {
    return tokens.map((token) => ({ text: token.text, ...classifyToken(token, this.config, this.options) }));
  }

  normalize(tokens: readonly Token[]): string {
    const out: string[] = [];
    for (const token of tokens) {
      const { disposition, output } = classifyToken(token, this.config, this.options);
      if (EMITTING.has(disposition) && output) {
        out.push(output);
      }
    }
    return out.join(' ').replace(/\s+/g, ' ').trim();
  }

  normalizeBatch(documents: readonly (readonly Token[])[]): string[] {
    return documents.map((tokens) => this.normalize(tokens));
  }
}
