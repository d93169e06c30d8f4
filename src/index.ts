export { foldAccents } from './core/accentFolder.js';
export { isNumericLiteral, isNumericToken, NUMERIC_LITERAL } from './core/numeric.js';
export { ConfigModel, ConfigurationError, NEGATION_PARTICLE } from './core/configModel.js';
export type { ConfigModelOptions } from './core/configModel.js';
export { resolveLemma } from './core/lemmaResolver.js';
export { classifyToken, DEFAULT_NORMALIZATION_OPTIONS, TokenContractError } from './core/tokenClassifier.js';
export { NormalizationPipeline } from './core/pipeline.js';
export { BatchNormalizer } from './jobs/batchNormalizer.js';
export type { BatchRunOptions } from './jobs/batchNormalizer.js';
export { loadLexicon, readLexiconFile, loadBaseStopwords, LexiconLoadError } from './lexicon/loadLexicon.js';
export { createTokenProducer, HttpTokenizer, RegexTokenizer, TokenizerError } from './tokenizers/index.js';
export * from './types.js';
