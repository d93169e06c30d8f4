import type { TokenProducer } from '../types.js';
import type { NormalizationPipeline } from '../core/pipeline.js';
import { logger } from '../logger.js';

export interface BatchRunOptions {
  /** texts in flight; clamped to maxParallel */
  parallel?: number;
  signal?: AbortSignal;
}

/**
 * Tokenizes and normalizes a list of texts with a bounded worker pool.
 * Workers pull indexes from a shared cursor and write into the slot of the
 * text they took, so the output order never depends on completion order.
 * After the first failure no worker takes another text; the batch rejects
 * once the texts already in flight have settled.
 */
export class BatchNormalizer {
  constructor(
    private readonly pipeline: NormalizationPipeline,
    private readonly producer: TokenProducer,
    private readonly maxParallel = 4
  ) {}

  async run(texts: readonly string[], options: BatchRunOptions = {}): Promise<string[]> {
    if (texts.length === 0) {
      return [];
    }

    const requested = Math.max(1, options.parallel ?? this.maxParallel);
    const workers = Math.min(requested, this.maxParallel, texts.length);
    if (requested > this.maxParallel) {
      logger.warn({ event: 'batch_parallel_clamped', requested, maxParallel: this.maxParallel });
    }

    const results = new Array<string>(texts.length).fill('');
    const startedAt = Date.now();
    let cursor = 0;
    let failed = false;

    const worker = async () => {
      while (!failed && cursor < texts.length) {
        const index = cursor;
        cursor += 1;
        const text = texts[index];
        if (text === undefined || text.trim() === '') continue;

        try {
          options.signal?.throwIfAborted();
          const tokens = await this.producer.tokenize(text, { signal: options.signal });
          results[index] = this.pipeline.normalize(tokens);
        } catch (error) {
          failed = true;
          logger.error({
            event: 'batch_item_failed',
            index,
            tokenizer: this.producer.id,
            message: error instanceof Error ? error.message : String(error),
          });
          throw error;
        }
      }
    };

    // in-flight texts settle before the batch rejects
    const settled = await Promise.allSettled(Array.from({ length: workers }, () => worker()));
    const rejected = settled.find((entry): entry is PromiseRejectedResult => entry.status === 'rejected');
    if (rejected) {
      throw rejected.reason;
    }

    logger.debug({
      event: 'normalize_batch_done',
      documents: texts.length,
      workers,
      elapsedMs: Date.now() - startedAt,
    });
    return results;
  }
}
