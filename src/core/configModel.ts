import { z } from 'zod';
import type { OverrideCollision } from '../types.js';
import { foldAccents } from './accentFolder.js';

/** The negation-of-existence particle; never part of the stopword set. */
export const NEGATION_PARTICLE = 'no';

const lexiconSourceSchema = z.object({
  stopwords: z.array(z.string()),
  lemmas: z.record(z.array(z.string())),
  negation: z.array(z.string()),
});

export class ConfigurationError extends Error {
  code: 'CONFIGURATION_INVALID';
  issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
    this.code = 'CONFIGURATION_INVALID';
    this.issues = issues;
  }
}

export interface ConfigModelOptions {
  /** Default vocabulary unioned with the lexicon's own stopwords. */
  baseStopwords?: Iterable<string>;
}

const lower = (value: string) => value.trim().toLowerCase();

/**
 * Immutable lookup view over a lexicon. All derived sets are built once here
 * and the instance is frozen, so one model can back any number of pipelines.
 *
 * Override inversion walks `lemmas` in declaration order and the last
 * canonical lemma to claim a surface form wins. Integer-like keys are
 * enumerated first by the runtime, so lexicons should avoid them.
 */
export class ConfigModel {
  /** lowercase stopwords, minus {@link NEGATION_PARTICLE} */
  readonly stopwords: ReadonlySet<string>;
  readonly foldedStopwords: ReadonlySet<string>;
  /** lowercase surface form -> canonical lemma as declared */
  readonly lemmaOverrides: ReadonlyMap<string, string>;
  readonly negationKeep: ReadonlySet<string>;
  readonly foldedNegationKeep: ReadonlySet<string>;
  readonly overrideCollisions: readonly OverrideCollision[];

  private constructor(
    stopwords: Set<string>,
    lemmaOverrides: Map<string, string>,
    negationKeep: Set<string>,
    overrideCollisions: OverrideCollision[]
  ) {
    this.stopwords = stopwords;
    this.foldedStopwords = new Set(Array.from(stopwords, foldAccents));
    this.lemmaOverrides = lemmaOverrides;
    this.negationKeep = negationKeep;
    this.foldedNegationKeep = new Set(Array.from(negationKeep, foldAccents));
    this.overrideCollisions = Object.freeze(overrideCollisions);
    Object.freeze(this);
  }

  /**
   * Validates the raw collections and builds the model, failing fast with a
   * {@link ConfigurationError} that lists every offending path.
   */
  static fromSource(source: unknown, options: ConfigModelOptions = {}): ConfigModel {
    const parsed = lexiconSourceSchema.safeParse(source);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(
        (issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`
      );
      throw new ConfigurationError('invalid lexicon', issues);
    }
    const { stopwords, lemmas, negation } = parsed.data;

    const stopwordSet = new Set<string>();
    for (const word of options.baseStopwords ?? []) {
      stopwordSet.add(lower(word));
    }
    for (const word of stopwords) {
      stopwordSet.add(lower(word));
    }
    stopwordSet.delete(NEGATION_PARTICLE);
    stopwordSet.delete('');

    const overrides = new Map<string, string>();
    const collisions: OverrideCollision[] = [];
    for (const [canonical, variants] of Object.entries(lemmas)) {
      const winner = canonical.trim();
      if (!winner) {
        throw new ConfigurationError('invalid lexicon', ['lemmas: canonical lemma must not be empty']);
      }
      for (const variant of variants) {
        const surface = lower(variant);
        if (!surface) continue;
        const previous = overrides.get(surface);
        if (previous !== undefined && previous !== winner) {
          collisions.push({ surface, previous, winner });
        }
        overrides.set(surface, winner);
      }
    }

    const negationSet = new Set(negation.map(lower).filter(Boolean));

    return new ConfigModel(stopwordSet, overrides, negationSet, collisions);
  }

  get size(): { stopwords: number; lemmaOverrides: number; negation: number } {
    return {
      stopwords: this.stopwords.size,
      lemmaOverrides: this.lemmaOverrides.size,
      negation: this.negationKeep.size,
    };
  }
}
