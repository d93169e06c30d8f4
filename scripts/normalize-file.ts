#!/usr/bin/env node

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import process from 'node:process';
import { text as readStream } from 'node:stream/consumers';
import { loadConfig } from '../src/config.js';
import { NormalizationPipeline } from '../src/core/pipeline.js';
import { BatchNormalizer } from '../src/jobs/batchNormalizer.js';
import { loadLexicon } from '../src/lexicon/loadLexicon.js';
import { createTokenProducer } from '../src/tokenizers/index.js';
import { loadEnvironment } from '../src/utils/env.js';
import { MATCH_MODES, NUMERIC_POLICIES } from '../src/types.js';
import type { MatchMode, NormalizationOptions, NumericPolicy } from '../src/types.js';

type ParsedArgs = {
  help: boolean;
  config?: string;
  env?: string;
  numeric?: NumericPolicy;
  mode?: MatchMode;
  parallel?: number;
  showOriginal: boolean;
  files: string[];
};

const USAGE = `
Normalize text, one document per line

Usage:
  npx tsx scripts/normalize-file.ts [options] [file ...]
  (reads stdin when no file is given)

Options:
  --config <path>        config.json to use (default: ./config.json)
  --env <path>           .env file to load (default: $LEXINORM_ENV_FILE or ./.env)
  --numeric <policy>     preserve_original/mark_as_placeholder
  --mode <mode>          folded_lemma/surface
  --parallel <n>         documents tokenized concurrently
  --show-original        print each input line above its normalized form
  --help                 Show this message
`;

function isNumericPolicy(value: string): value is NumericPolicy {
  return NUMERIC_POLICIES.some((policy) => policy === value);
}

function isMatchMode(value: string): value is MatchMode {
  return MATCH_MODES.some((mode) => mode === value);
}

function parseArgs(argv: string[]): ParsedArgs {
  const result: ParsedArgs = { help: false, showOriginal: false, files: [] };

  for (let index = 0; index < argv.length; index += 1) {
    const raw = argv[index] ?? '';
    if (!raw.startsWith('--')) {
      result.files.push(raw);
      continue;
    }
    const [flag = raw, inlineValue] = raw.includes('=') ? raw.split(/=(.*)/s) : [raw, undefined];
    const getValue = (): string => {
      if (inlineValue !== undefined) return inlineValue;
      const next = argv[index + 1];
      if (next === undefined || next.startsWith('--')) {
        throw new Error(`${flag} needs a value`);
      }
      index += 1;
      return next;
    };

    switch (flag) {
      case '--help':
        result.help = true;
        break;
      case '--config':
        result.config = getValue();
        break;
      case '--env':
        result.env = getValue();
        break;
      case '--numeric': {
        const value = getValue();
        if (!isNumericPolicy(value)) {
          throw new Error(`numeric must be ${NUMERIC_POLICIES.join('/')}, got ${value}`);
        }
        result.numeric = value;
        break;
      }
      case '--mode': {
        const value = getValue();
        if (!isMatchMode(value)) {
          throw new Error(`mode must be ${MATCH_MODES.join('/')}, got ${value}`);
        }
        result.mode = value;
        break;
      }
      case '--parallel': {
        const value = Number(getValue());
        if (!Number.isInteger(value) || value < 1) {
          throw new Error('parallel must be a positive integer');
        }
        result.parallel = value;
        break;
      }
      case '--show-original':
        result.showOriginal = true;
        break;
      default:
        console.warn(`Unknown option: ${flag}`);
        break;
    }
  }
  return result;
}

async function readInputs(files: string[]): Promise<string[]> {
  const chunks =
    files.length > 0
      ? await Promise.all(files.map((file) => readFile(resolve(process.cwd(), file), 'utf-8')))
      : [await readStream(process.stdin)];
  return chunks.flatMap((chunk) => chunk.split(/\r?\n/)).filter((line) => line.trim().length > 0);
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    console.log(USAGE);
    return;
  }

  loadEnvironment(args.env);
  const config = await loadConfig(args.config ? resolve(process.cwd(), args.config) : undefined);
  const options: NormalizationOptions = {
    ...config.normalization,
    ...(args.numeric ? { numericPolicy: args.numeric } : {}),
    ...(args.mode ? { matchMode: args.mode } : {}),
  };

  const model = await loadLexicon(config.lexicon);
  const pipeline = new NormalizationPipeline(model, options);
  const runner = new BatchNormalizer(pipeline, createTokenProducer(config.tokenizer), config.jobs.maxParallel);

  const inputs = await readInputs(args.files);
  const outputs = await runner.run(inputs, { parallel: args.parallel });
  outputs.forEach((output, index) => {
    if (args.showOriginal) {
      console.log(`\n${index + 1}:\n  ${inputs[index] ?? ''}\n  ${output}`);
      return;
    }
    console.log(output);
  });
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
