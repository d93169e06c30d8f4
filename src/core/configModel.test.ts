import { describe, expect, it } from 'vitest';
import { ConfigModel, ConfigurationError } from './configModel.js';

const source = {
  stopwords: ['Y', 'No', 'Más'],
  lemmas: { checar: ['Checo', 'checas'] },
  negation: ['no', 'Ningún'],
};

const captureError = (fn: () => unknown): ConfigurationError => {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigurationError) return err;
    throw err;
  }
  throw new Error('expected ConfigurationError');
};

describe('ConfigModel.fromSource', () => {
  it('lowercases stopwords, unions the base vocabulary and never keeps "no"', () => {
    const model = ConfigModel.fromSource(source, { baseStopwords: ['La', 'no'] });
    expect([...model.stopwords].sort()).toEqual(['la', 'más', 'y']);
    expect(model.foldedStopwords.has('mas')).toBe(true);
  });

  it('inverts the lemma table onto lowercase surface forms', () => {
    const model = ConfigModel.fromSource(source);
    expect(model.lemmaOverrides.get('checo')).toBe('checar');
    expect(model.lemmaOverrides.get('checas')).toBe('checar');
    expect(model.lemmaOverrides.has('Checo')).toBe(false);
  });

  it('keeps the canonical lemma as declared, only trimmed', () => {
    const model = ConfigModel.fromSource({ stopwords: [], lemmas: { ' VIH ': ['hiv', 'HIV'] }, negation: [] });
    expect(model.lemmaOverrides.get('hiv')).toBe('VIH');
    expect(model.overrideCollisions).toEqual([]);
  });

  it('lets the last declared canonical lemma win a shared surface form', () => {
    const model = ConfigModel.fromSource({
      stopwords: [],
      lemmas: { poder: ['puedo'], podar: ['puedo', 'podo'] },
      negation: [],
    });
    expect(model.lemmaOverrides.get('puedo')).toBe('podar');
    expect(model.overrideCollisions).toEqual([{ surface: 'puedo', previous: 'poder', winner: 'podar' }]);
  });

  it('keeps negation terms both as written and accent-folded', () => {
    const model = ConfigModel.fromSource(source);
    expect(model.negationKeep.has('ningún')).toBe(true);
    expect(model.foldedNegationKeep.has('ningun')).toBe(true);
  });

  it('reports collection sizes', () => {
    expect(ConfigModel.fromSource(source).size).toEqual({ stopwords: 2, lemmaOverrides: 2, negation: 2 });
  });

  it('is frozen after construction', () => {
    expect(Object.isFrozen(ConfigModel.fromSource(source))).toBe(true);
  });

  it('fails fast on a null lemma table', () => {
    const err = captureError(() => ConfigModel.fromSource({ stopwords: [], lemmas: null, negation: [] }));
    expect(err.code).toBe('CONFIGURATION_INVALID');
    expect(err.issues).toHaveLength(1);
    expect(err.issues[0]).toMatch(/^lemmas: /);
  });

  it('names every missing collection', () => {
    const err = captureError(() => ConfigModel.fromSource({ lemmas: {} }));
    expect(err.issues).toEqual(['stopwords: Required', 'negation: Required']);
  });

  it('rejects a surface-form list that is not a list', () => {
    const raw: unknown = JSON.parse('{"stopwords":[],"lemmas":{"checar":"checo"},"negation":[]}');
    const err = captureError(() => ConfigModel.fromSource(raw));
    expect(err.issues).toEqual(['lemmas.checar: Expected array, received string']);
  });

  it('rejects a non-object source', () => {
    const err = captureError(() => ConfigModel.fromSource(undefined));
    expect(err.issues[0]).toMatch(/^\(root\): /);
  });
});
