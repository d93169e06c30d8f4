import { z } from 'zod';
import type { Token, TokenizeOptions, TokenProducer } from '../types.js';
import { withTimeoutSignal } from '../utils/abort.js';

/** Token record as returned by the lemmatizer service. */
const serviceTokenSchema = z.object({
  text: z.string().min(1),
  lemma: z.string().nullish(),
  pos: z.string().nullish(),
  is_alpha: z.boolean().default(false),
  is_punct: z.boolean().default(false),
  is_space: z.boolean().default(false),
  like_num: z.boolean().default(false),
});

const serviceResponseSchema = z.object({
  tokens: z.array(serviceTokenSchema),
});

type ServiceToken = z.infer<typeof serviceTokenSchema>;

export class TokenizerError extends Error {
  code: 'TOKENIZER_FAILED' | 'TOKENIZER_TIMEOUT';
  statusCode?: number;

  constructor(message: string, code: TokenizerError['code'] = 'TOKENIZER_FAILED', statusCode?: number) {
    super(message);
    this.name = 'TokenizerError';
    this.code = code;
    this.statusCode = statusCode;
  }
}

export interface HttpTokenizerOptions {
  url: string;
  lang: string;
  timeoutMs: number;
}

function toToken(raw: ServiceToken): Token {
  return {
    text: raw.text,
    lemma: raw.lemma ?? '',
    pos: (raw.pos ?? 'X').toUpperCase(),
    isAlpha: raw.is_alpha,
    isPunctOrSpace: raw.is_punct || raw.is_space,
    likeNum: raw.like_num,
  };
}

export function resolveTokenizerUrl(raw: string | undefined): string {
  const value = raw ?? process.env.TOKENIZER_URL;
  if (!value) {
    throw new Error('tokenizer url is required. Set tokenizer.url in config.json or TOKENIZER_URL in .env');
  }
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw new Error('TOKENIZER_URL must be a valid URL');
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new Error(`TOKENIZER_URL must use http or https, got ${url.protocol}`);
  }
  return url.toString();
}

/**
 * Calls an external lemmatizer over HTTP: POST `{ text, lang }` and expect
 * `{ tokens: [...] }`. This is the only slow boundary in the system, so the
 * request timeout lives here.
 */
export class HttpTokenizer implements TokenProducer {
  id = 'http' as const;

  constructor(private readonly options: HttpTokenizerOptions) {}

  async tokenize(text: string, opts?: TokenizeOptions): Promise<Token[]> {
    const { timeoutMs } = this.options;
    const { signal, didTimeout, cleanup } = withTimeoutSignal({ signal: opts?.signal, timeoutMs });

    try {
      const res = await fetch(this.options.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
        body: JSON.stringify({ text, lang: this.options.lang }),
        signal,
      });

      if (!res.ok) {
        const detail = await res.text().catch(() => '');
        throw new TokenizerError(
          `tokenizer error (${res.status}): ${detail.slice(0, 300)}`,
          'TOKENIZER_FAILED',
          res.status
        );
      }

      const parsed = serviceResponseSchema.safeParse(await res.json());
      if (!parsed.success) {
        throw new TokenizerError(`tokenizer response malformed: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
      }
      return parsed.data.tokens.map(toToken);
    } catch (err) {
      if (didTimeout()) {
        throw new TokenizerError(`tokenizer request timed out after ${timeoutMs}ms`, 'TOKENIZER_TIMEOUT');
      }
      if (err instanceof TokenizerError) throw err;
      throw new TokenizerError(err instanceof Error ? err.message : 'tokenizer request failed');
    } finally {
      cleanup();
    }
  }
}
