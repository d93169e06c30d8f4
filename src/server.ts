import { createServer } from 'node:http';
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import type { z } from 'zod';
import { logger } from './logger.js';
import { loadConfig, reloadConfig } from './config.js';
import { loadEnvironment, reloadEnvironment } from './utils/env.js';
import { ConfigurationError } from './core/configModel.js';
import type { ConfigModel } from './core/configModel.js';
import { NormalizationPipeline } from './core/pipeline.js';
import { BatchNormalizer } from './jobs/batchNormalizer.js';
import { loadLexicon, LexiconLoadError } from './lexicon/loadLexicon.js';
import { createTokenProducer, TokenizerError } from './tokenizers/index.js';
import {
  classifyRequestSchema,
  normalizeTextsRequestSchema,
  normalizeTokensRequestSchema,
} from './validation.js';
import type { AppConfig, TokenProducer } from './types.js';

loadEnvironment();

export class HttpError extends Error {
  statusCode: number;
  payload?: Record<string, unknown>;

  constructor(statusCode: number, message: string, payload?: Record<string, unknown>) {
    super(message);
    this.statusCode = statusCode;
    this.payload = payload;
  }
}

/** Everything a request needs; swapped wholesale on config reload. */
export interface ServiceState {
  config: AppConfig;
  model: ConfigModel;
  pipeline: NormalizationPipeline;
  batch: BatchNormalizer;
  producer: TokenProducer;
}

export function createServiceState(config: AppConfig, model: ConfigModel, producer: TokenProducer): ServiceState {
  const pipeline = new NormalizationPipeline(model, config.normalization);
  const batch = new BatchNormalizer(pipeline, producer, config.jobs.maxParallel);
  return { config, model, pipeline, batch, producer };
}

export async function buildServiceState(config: AppConfig): Promise<ServiceState> {
  const producer = createTokenProducer(config.tokenizer);
  const model = await loadLexicon(config.lexicon);
  return createServiceState(config, model, producer);
}

export function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const result = schema.safeParse(body);
  if (!result.success) {
    throw new HttpError(400, 'invalid request body', {
      message: 'invalid request body',
      issues: result.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    });
  }
  return result.data;
}

function parseAllowedOrigins(): string[] {
  const raw = process.env.ALLOWED_ORIGINS;
  const defaults = ['http://localhost:5173'];
  const list = raw
    ? raw
        .split(',')
        .map((v) => v.trim())
        .filter(Boolean)
    : defaults;
  return Array.from(new Set(list));
}

function isOriginAllowed(origin: string | undefined, allowed: string[]): boolean {
  if (!origin) return true; // same-host tools like curl
  return allowed.includes(origin);
}

export interface AppOptions {
  getState: () => ServiceState;
  reload?: () => Promise<ServiceState>;
  allowedOrigins?: string[];
}

export function createApp(options: AppOptions): express.Express {
  const { getState, reload } = options;
  const allowedOrigins = options.allowedOrigins ?? parseAllowedOrigins();
  const app = express();

  app.use(
    cors({
      origin: (origin, callback) => {
        if (isOriginAllowed(origin ?? undefined, allowedOrigins)) {
          callback(null, true);
          return;
        }
        callback(new HttpError(403, 'Not allowed by CORS'));
      },
    })
  );
  app.use(express.json({ limit: '2mb' }));
  app.use(helmet());
  if (process.env.NODE_ENV !== 'test') {
    app.use(morgan('dev'));
  }

  app.get('/healthz', (_req, res) => {
    res.json({ status: 'ok', time: new Date().toISOString() });
  });

  app.get('/api/config', (_req, res) => {
    const { config, model, producer } = getState();
    res.json({
      normalization: config.normalization,
      tokenizer: { driver: producer.id, lang: config.tokenizer.lang },
      lexicon: { path: config.lexicon.path, baseStopwords: config.lexicon.baseStopwords, ...model.size },
    });
  });

  app.post('/api/normalize', async (req, res, next) => {
    try {
      const body = parseBody(normalizeTextsRequestSchema, req.body);
      const documents = await getState().batch.run(body.texts, { parallel: body.parallel });
      res.json({ documents });
    } catch (error) {
      next(error);
    }
  });

  app.post('/api/normalize/tokens', (req, res, next) => {
    try {
      const body = parseBody(normalizeTokensRequestSchema, req.body);
      res.json({ documents: getState().pipeline.normalizeBatch(body.documents) });
    } catch (error) {
      next(error);
    }
  });

  app.post('/api/classify', (req, res, next) => {
    try {
      const body = parseBody(classifyRequestSchema, req.body);
      const { pipeline } = getState();
      const target = body.options
        ? new NormalizationPipeline(pipeline.config, { ...pipeline.options, ...body.options })
        : pipeline;
      res.json({ tokens: target.classify(body.tokens) });
    } catch (error) {
      next(error);
    }
  });

  app.post('/api/admin/reload-config', async (_req, res, next) => {
    if (!reload) {
      res.status(501).json({ message: 'reload is not enabled' });
      return;
    }
    try {
      const state = await reload();
      res.json({ status: 'ok', lexicon: state.model.size, normalization: state.config.normalization });
    } catch (error) {
      next(error);
    }
  });

  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (err instanceof HttpError) {
      res.status(err.statusCode).json(err.payload ?? { message: err.message });
      return;
    }
    if (err instanceof ConfigurationError) {
      logger.warn({ event: 'config_rejected', issues: err.issues });
      res.status(422).json({ message: 'lexicon rejected', issues: err.issues });
      return;
    }
    if (err instanceof TokenizerError) {
      logger.error({ event: 'tokenizer_request_failed', code: err.code, message: err.message });
      res.status(err.code === 'TOKENIZER_TIMEOUT' ? 504 : 502).json({ message: err.message, code: err.code });
      return;
    }
    if (err instanceof LexiconLoadError) {
      logger.error({ event: 'lexicon_load_failed', message: err.message });
      res.status(422).json({ message: err.message, code: err.code });
      return;
    }
    logger.error({ event: 'server_error', message: err.message });
    res.status(500).json({ message: err.message });
  });

  return app;
}

async function bootstrap(): Promise<void> {
  let state = await buildServiceState(await loadConfig());

  const app = createApp({
    getState: () => state,
    reload: async () => {
      reloadEnvironment();
      reloadConfig();
      // built off to the side; a rejected lexicon leaves the running state untouched
      state = await buildServiceState(await loadConfig());
      return state;
    },
  });
  const server = createServer(app);

  const port = Number(process.env.SERVER_PORT ?? process.env.PORT ?? 4200);
  server.listen(port, () => {
    logger.info({
      event: 'server_started',
      port,
      tokenizer: state.producer.id,
      normalization: state.config.normalization,
    });
  });

  const shutdown = () => {
    server.close(() => process.exit(0));
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

if (process.env.NODE_ENV !== 'test') {
  bootstrap().catch((error) => {
    logger.fatal({ event: 'bootstrap_failed', message: error instanceof Error ? error.message : String(error) });
    process.exit(1);
  });
}
