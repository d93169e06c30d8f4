import { describe, expect, it } from 'vitest';
import { punct, tok } from '../testing/tokens.js';
import { ConfigurationError } from './configModel.js';
import { NormalizationPipeline } from './pipeline.js';

const sentence = [tok('la'), tok('mamá'), tok('no'), tok('toma'), tok('agua')];

describe('NormalizationPipeline', () => {
  it('drops stopwords and keeps the remaining order in surface mode', () => {
    const pipeline = NormalizationPipeline.fromSource(
      { stopwords: ['la'], lemmas: {}, negation: [] },
      { matchMode: 'surface' }
    );
    expect(pipeline.normalize(sentence)).toBe('mamá no toma agua');
  });

  it('folds accents of kept content in folded_lemma mode', () => {
    const pipeline = NormalizationPipeline.fromSource({ stopwords: ['la'], lemmas: {}, negation: [] });
    expect(pipeline.normalize(sentence)).toBe('mama no toma agua');
  });

  it('never drops a negation that is also a stopword', () => {
    const pipeline = NormalizationPipeline.fromSource({ stopwords: ['no', 'y'], lemmas: {}, negation: ['no'] });
    const tokens = [tok('No', { pos: 'ADV', lemma: 'no' }), tok('y', { pos: 'CCONJ', lemma: 'y' })];
    expect(pipeline.classify(tokens)).toEqual([
      { text: 'No', disposition: 'NEGATION', output: 'no' },
      { text: 'y', disposition: 'STOPWORD', output: '' },
    ]);
    expect(pipeline.normalize(tokens)).toBe('no');
  });

  it('applies the numeric policy chosen at construction', () => {
    const source = { stopwords: [], lemmas: {}, negation: [] };
    const tokens = [tok('Saturación', { lemma: 'saturación' }), tok('96.5%', { isAlpha: false, pos: 'NUM' }), punct('.')];

    expect(NormalizationPipeline.fromSource(source).normalize(tokens)).toBe('saturacion 96.5%');
    expect(
      NormalizationPipeline.fromSource(source, { numericPolicy: 'mark_as_placeholder' }).normalize(tokens)
    ).toBe('saturacion <num>');
  });

  it('collapses whitespace inside emitted tokens', () => {
    const pipeline = NormalizationPipeline.fromSource({ stopwords: [], lemmas: {}, negation: [] });
    expect(pipeline.normalize([tok('presión arterial', { isAlpha: true, lemma: 'presión  arterial' })])).toBe(
      'presion arterial'
    );
  });

  it('returns an empty document for an empty sequence and an empty list for an empty batch', () => {
    const pipeline = NormalizationPipeline.fromSource({ stopwords: [], lemmas: {}, negation: [] });
    expect(pipeline.normalize([])).toBe('');
    expect(pipeline.normalizeBatch([])).toEqual([]);
  });

  it('keeps batch output aligned with batch input', () => {
    const pipeline = NormalizationPipeline.fromSource({ stopwords: ['la'], lemmas: {}, negation: [] });
    expect(pipeline.normalizeBatch([[], [tok('la'), tok('Agua')], [punct('?')], [tok('Leche')]])).toEqual([
      '',
      'agua',
      '',
      'leche',
    ]);
  });

  it('fails at construction when the lemma table is null', () => {
    expect(() => NormalizationPipeline.fromSource({ stopwords: [], lemmas: null, negation: [] })).toThrow(
      ConfigurationError
    );
  });

  it('fixes its options at construction', () => {
    const pipeline = NormalizationPipeline.fromSource({ stopwords: [], lemmas: {}, negation: [] }, { placeholder: '#' });
    expect(pipeline.options).toEqual({ numericPolicy: 'preserve_original', matchMode: 'folded_lemma', placeholder: '#' });
    expect(Object.isFrozen(pipeline.options)).toBe(true);
  });
});
