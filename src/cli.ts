#!/usr/bin/env node

import { parseArgs } from 'util';
import { readFile } from 'fs/promises';
import { APP_NAME, APP_VERSION } from './config/constants';
import { getEnvironment, getModelServerUrl, validateEnvironment } from './config/environment';
import { getLogger } from './utils/logger';
import { InitializationService } from './services/initialization';
import {
  runExtraction,
  PipelineOptions,
  PipelineProgressEvent,
} from './core/pipeline/extractionPipeline';
import { formatBatchEntry, parseBatchFile, runBatch } from './core/pipeline/batchRunner';
import { isChunkStrategy } from './core/content/chunker';
import { ConfigurationError, ValidationError } from './core/errors';

const HELP_TEXT = `
${APP_NAME} v${APP_VERSION}

Fetch a web page and extract the information you describe, chunk by chunk,
with a language model.

Usage: page-distill [command] [options]

Commands:
  extract        Extract from one page (default when --url is given)
  batch          Extract from every job listed in a JSON file
  health         Validate configuration and check the model service
  version        Show version information
  help           Show this help message

Extract:
  page-distill extract --url <url> --instruction <text>
      --chunk-size <n>       Maximum characters per chunk (default: CHUNK_MAX_LENGTH)
      --strategy <name>      fixed | boundary (default: CHUNK_STRATEGY)
      --model <name>         Override MODEL_NAME for this run

Batch:
  page-distill batch --file jobs.json
      jobs.json is either [{ "url": ..., "instruction": ... }, ...]
      or { "urls": [...], "instructions": [...] } with equal lengths

Options:
  --help, -h     Show help
  --version      Show version
  --verbose, -v  Report pipeline progress on stderr

Examples:
  page-distill extract --url "https://example.com" --instruction "all email addresses"
  page-distill batch --file samples/batch.json --strategy boundary
  page-distill health
`;

function parseCliArgs() {
  try {
    return parseArgs({
      args: process.argv.slice(2),
      options: {
        help: { type: 'boolean', short: 'h' },
        version: { type: 'boolean' },
        verbose: { type: 'boolean', short: 'v' },
        url: { type: 'string', short: 'u' },
        instruction: { type: 'string', short: 'i' },
        file: { type: 'string', short: 'f' },
        'chunk-size': { type: 'string' },
        strategy: { type: 'string' },
        model: { type: 'string' },
      },
      allowPositionals: true,
    });
  } catch (error) {
    console.error(
      `Error parsing arguments: ${error instanceof Error ? error.message : 'unknown error'}`
    );
    console.error('Use --help for usage information.');
    process.exit(1);
  }
}

type CliValues = ReturnType<typeof parseCliArgs>['values'];

function buildPipelineOptions(values: CliValues): PipelineOptions {
  const env = getEnvironment();

  let maxChunkLength = env.CHUNK_MAX_LENGTH;
  if (values['chunk-size'] !== undefined) {
    maxChunkLength = Number(values['chunk-size']);
    if (!Number.isInteger(maxChunkLength) || maxChunkLength <= 0) {
      throw new ValidationError('--chunk-size must be a positive integer');
    }
  }

  const strategy = values.strategy ?? env.CHUNK_STRATEGY;
  if (!isChunkStrategy(strategy)) {
    throw new ValidationError(`--strategy must be "fixed" or "boundary", got "${strategy}"`);
  }

  const onProgress = values.verbose
    ? (event: PipelineProgressEvent) => {
        const counts =
          event.completed !== undefined ? ` ${event.completed}/${event.total ?? '?'}` : '';
        process.stderr.write(`[${event.stage}]${counts} ${event.url}\n`);
      }
    : undefined;

  return { maxChunkLength, chunkStrategy: strategy, onProgress };
}

async function extractCommand(values: CliValues): Promise<void> {
  if (!values.url || !values.instruction) {
    throw new ValidationError('extract needs both --url and --instruction');
  }

  const options = buildPipelineOptions(values);
  const modelClient = await new InitializationService().initialize({ modelName: values.model });

  try {
    const result = await runExtraction(values.url, values.instruction, { modelClient }, options);
    if (!result.ok) {
      console.error(`❌ ${result.message}`);
      process.exitCode = 1;
      return;
    }
    process.stdout.write(result.text.length > 0 ? `${result.text}\n` : '');
  } finally {
    await modelClient.close();
  }
}

async function batchCommand(values: CliValues): Promise<void> {
  if (!values.file) {
    throw new ValidationError('batch needs --file');
  }

  const jobs = parseBatchFile(await readFile(values.file, 'utf8'));
  const options = buildPipelineOptions(values);
  const modelClient = await new InitializationService().initialize({ modelName: values.model });

  try {
    const entries = await runBatch(
      jobs,
      { modelClient },
      {
        ...options,
        onJobDone: (entry, index) => {
          process.stdout.write(`${formatBatchEntry(entry, index, jobs.length)}\n`);
        },
      }
    );

    const failed = entries.filter(entry => !entry.result.ok).length;
    console.error(`\n${entries.length - failed}/${entries.length} jobs succeeded`);
    if (failed > 0) {
      process.exitCode = 1;
    }
  } finally {
    await modelClient.close();
  }
}

async function healthCommand(values: CliValues): Promise<void> {
  console.log('🔍 Health Check:');
  validateEnvironment();
  console.log('  ✅ Environment variables validated');
  const env = getEnvironment();
  console.log(`  🧠 Provider: ${env.MODEL_PROVIDER} at ${getModelServerUrl(env)}`);

  const modelClient = await new InitializationService().initialize({ modelName: values.model });
  try {
    const models = await modelClient.ping();
    console.log(`  ✅ Model service reachable (${models.length} models available)`);
    const modelName = modelClient.getModelName();
    // Ollama lists tagged names such as "llama3.1:latest"
    const listed = models.some(name => name === modelName || name.startsWith(`${modelName}:`));
    if (!listed) {
      console.log(`  ⚠️  Model "${modelName}" is not listed by the service`);
    }
    console.log('🚀 System ready');
  } finally {
    await modelClient.close();
  }
}

async function main(): Promise<void> {
  const { values, positionals } = parseCliArgs();

  if (values.help) {
    console.log(HELP_TEXT);
    return;
  }

  if (values.version) {
    console.log(`${APP_NAME} v${APP_VERSION}`);
    return;
  }

  const command = positionals[0] ?? (values.url ? 'extract' : 'help');

  switch (command) {
    case 'extract':
      await extractCommand(values);
      break;

    case 'batch':
      await batchCommand(values);
      break;

    case 'health':
      await healthCommand(values);
      break;

    case 'version':
      console.log(`${APP_NAME} v${APP_VERSION}`);
      break;

    case 'help':
      console.log(HELP_TEXT);
      break;

    default:
      console.error(`Unknown command: ${command}`);
      console.error('Use --help for usage information.');
      process.exitCode = 1;
  }
}

main().catch(error => {
  if (!(error instanceof ConfigurationError)) {
    getLogger().error({ error }, 'CLI execution failed');
  }
  console.error(`❌ ${error instanceof Error ? error.message : 'unknown error'}`);
  process.exit(1);
});
