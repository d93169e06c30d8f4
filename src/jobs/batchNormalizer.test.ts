import { describe, expect, it, vi } from 'vitest';
import { setTimeout as delay } from 'node:timers/promises';
import type { Token, TokenProducer } from '../types.js';
import { NormalizationPipeline } from '../core/pipeline.js';
import { RegexTokenizer } from '../tokenizers/regexTokenizer.js';
import { BatchNormalizer } from './batchNormalizer.js';

const pipeline = NormalizationPipeline.fromSource({ stopwords: ['la'], lemmas: {}, negation: ['no'] });
const regex = new RegexTokenizer();

/** Wraps the regex tokenizer with per-text latency and bookkeeping. */
function slowProducer(latencyMs: (text: string) => number) {
  const completed: string[] = [];
  let inFlight = 0;
  let maxInFlight = 0;
  const tokenize = vi.fn(async (text: string): Promise<Token[]> => {
    inFlight += 1;
    maxInFlight = Math.max(maxInFlight, inFlight);
    await delay(latencyMs(text));
    inFlight -= 1;
    completed.push(text);
    return regex.tokenizeSync(text);
  });
  const producer: TokenProducer = { id: 'regex', tokenize };
  return { producer, tokenize, completed, maxInFlight: () => maxInFlight };
}

describe('BatchNormalizer', () => {
  it('returns results in input order even when later texts finish first', async () => {
    const texts = ['uno', 'dos', 'tres', 'cuatro', 'cinco'];
    const { producer, completed } = slowProducer((text) => 60 - texts.indexOf(text) * 12);
    const runner = new BatchNormalizer(pipeline, producer, 5);

    const result = await runner.run(texts);

    expect(completed).toEqual(['cinco', 'cuatro', 'tres', 'dos', 'uno']);
    expect(result).toEqual(['uno', 'dos', 'tres', 'cuatro', 'cinco']);
  });

  it('never runs more texts at once than requested', async () => {
    const { producer, maxInFlight } = slowProducer(() => 5);
    const runner = new BatchNormalizer(pipeline, producer, 8);

    const result = await runner.run(['a', 'b', 'c', 'd', 'e', 'f'], { parallel: 2 });

    expect(result).toHaveLength(6);
    expect(maxInFlight()).toBe(2);
  });

  it('clamps the requested parallelism to maxParallel', async () => {
    const { producer, maxInFlight } = slowProducer(() => 5);
    const runner = new BatchNormalizer(pipeline, producer, 3);

    await runner.run(['a', 'b', 'c', 'd', 'e', 'f'], { parallel: 16 });

    expect(maxInFlight()).toBe(3);
  });

  it('normalizes each text through the pipeline', async () => {
    const runner = new BatchNormalizer(pipeline, regex, 2);
    await expect(runner.run(['La mamá no toma agua.', 'Presión 120/80'])).resolves.toEqual([
      'mama no toma agua',
      'presion 120/80',
    ]);
  });

  it('returns an empty list for an empty batch without tokenizing', async () => {
    const { producer, tokenize } = slowProducer(() => 0);
    await expect(new BatchNormalizer(pipeline, producer).run([])).resolves.toEqual([]);
    expect(tokenize).not.toHaveBeenCalled();
  });

  it('maps blank texts to empty documents without calling the tokenizer', async () => {
    const { producer, tokenize } = slowProducer(() => 0);
    const result = await new BatchNormalizer(pipeline, producer).run(['', '   ', 'agua']);
    expect(result).toEqual(['', '', 'agua']);
    expect(tokenize).toHaveBeenCalledTimes(1);
  });

  it('propagates tokenizer failures', async () => {
    const producer: TokenProducer = {
      id: 'http',
      tokenize: vi.fn().mockRejectedValue(new Error('boom')),
    };
    await expect(new BatchNormalizer(pipeline, producer).run(['agua'])).rejects.toThrow('boom');
  });

  it('stops taking new texts after the first failure', async () => {
    const texts = ['boom', ...Array.from({ length: 20 }, (_, index) => `texto${index}`)];
    const tokenize = vi.fn(async (text: string): Promise<Token[]> => {
      if (text === 'boom') {
        await delay(5);
        throw new Error('tokenizer down');
      }
      await delay(20);
      return regex.tokenizeSync(text);
    });
    const runner = new BatchNormalizer(pipeline, { id: 'http', tokenize }, 4);

    await expect(runner.run(texts)).rejects.toThrow('tokenizer down');
    expect(tokenize).toHaveBeenCalledTimes(4);

    await delay(50);
    expect(tokenize).toHaveBeenCalledTimes(4);
  });
});
