const DISPOSITIONS = ['NUMERIC', 'SKIP', 'NEGATION', 'STOPWORD', 'CONTENT'] as const;

export type Disposition = (typeof DISPOSITIONS)[number];

export const NUMERIC_POLICIES = ['preserve_original', 'mark_as_placeholder'] as const;

export type NumericPolicy = (typeof NUMERIC_POLICIES)[number];

/**
 * How the stopword/negation decision is keyed.
 * - "folded_lemma": lowercase resolved lemma with accents folded; kept content is folded too.
 * - "surface": lowercase surface text; kept content is the plain lowercase lemma.
 */
export const MATCH_MODES = ['folded_lemma', 'surface'] as const;

export type MatchMode = (typeof MATCH_MODES)[number];

export const TOKENIZER_DRIVERS = ['http', 'regex'] as const;

export type TokenizerDriver = (typeof TOKENIZER_DRIVERS)[number];

export const BASE_STOPWORD_SETS = ['es', 'none'] as const;

export type BaseStopwordSet = (typeof BASE_STOPWORD_SETS)[number];

/**
 * A lexical unit as emitted by the external tokenizer/lemmatizer.
 * Treated as read-only; the normalizer only derives values from it.
 */
export interface Token {
  readonly text: string;
  /** Candidate base form; empty or absent when the tokenizer had none. */
  readonly lemma?: string;
  /** Coarse part-of-speech tag (UPOS style: VERB, AUX, NOUN, ...). */
  readonly pos: string;
  readonly isAlpha: boolean;
  readonly isPunctOrSpace: boolean;
  /** Tokenizer's own "looks like a number" flag. */
  readonly likeNum: boolean;
}

export interface Classification {
  disposition: Disposition;
  /** Empty for SKIP and STOPWORD. */
  output: string;
}

export interface TokenClassification extends Classification {
  text: string;
}

export interface NormalizationOptions {
  numericPolicy: NumericPolicy;
  matchMode: MatchMode;
  /** Marker emitted for numeric tokens under "mark_as_placeholder". */
  placeholder: string;
}

/** The three collections a lexicon file provides. */
export interface LexiconSource {
  stopwords: readonly string[];
  /** canonical lemma -> surface variants that should resolve to it */
  lemmas: Readonly<Record<string, readonly string[]>>;
  negation: readonly string[];
}

export interface OverrideCollision {
  surface: string;
  previous: string;
  winner: string;
}

export interface TokenizeOptions {
  signal?: AbortSignal;
}

export interface TokenProducer {
  id: TokenizerDriver;
  tokenize(text: string, options?: TokenizeOptions): Promise<Token[]>;
}

export interface TokenizerConfig {
  driver: TokenizerDriver;
  /** Falls back to TOKENIZER_URL when unset. */
  url?: string;
  lang: string;
  timeoutMs: number;
}

export interface AppConfig {
  lexicon: {
    path: string;
    baseStopwords: BaseStopwordSet;
  };
  normalization: NormalizationOptions;
  tokenizer: TokenizerConfig;
  jobs: {
    maxParallel: number;
  };
}
