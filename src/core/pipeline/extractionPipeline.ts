import type pino from 'pino';
import { fetchUrl, PageFetcher } from '../content/httpContentFetcher';
import { extractBody } from '../content/bodyExtractor';
import { cleanMarkup } from '../content/textCleaner';
import { chunkText, ChunkStrategy } from '../content/chunker';
import { extractFromChunks } from '../extraction/extractionClient';
import { ModelClient } from '../model/modelClient';
import { FetchError, PageDistillError, ValidationError, toPageDistillError } from '../errors';
import { DEFAULT_CHUNK_MAX_LENGTH } from '../../config/constants';
import { createChildLogger, generateCorrelationId } from '../../utils/logger';
import { describeUrl } from '../../utils/urlValidator';

/**
 * Usually a FetchError, ModelServiceError or ValidationError. A ConfigurationError
 * surfaces when the environment cannot be read, and other throws arrive wrapped
 * with the INTERNAL code.
 */
export type PipelineError = PageDistillError;

export type PipelineResult =
  | { ok: true; text: string; chunkCount: number; durationMs: number }
  | { ok: false; error: PipelineError; message: string };

export type PipelineStage = 'fetch' | 'extract' | 'clean' | 'chunk' | 'model' | 'done';

export interface PipelineProgressEvent {
  stage: PipelineStage;
  url: string;
  /** Chunks answered so far, for the `model` stage. */
  completed?: number;
  total?: number;
  /** Length of the stage's output, in characters, where it has one. */
  length?: number;
}

export interface PipelineDependencies {
  modelClient: ModelClient;
  fetchPage?: PageFetcher;
  logger?: pino.Logger;
}

export interface PipelineOptions {
  maxChunkLength?: number;
  chunkStrategy?: ChunkStrategy;
  onProgress?: (event: PipelineProgressEvent) => void;
}

function failure(error: unknown, context?: string): PipelineResult {
  const normalized = toPageDistillError(error, context);
  return { ok: false, error: normalized, message: normalized.message };
}

/**
 * Fetch `url`, reduce the page to visible text, cut it into chunks and ask the
 * model for `instruction` on each chunk. Answers are joined with newlines in
 * chunk order.
 *
 * Never rejects: every failure comes back as `{ ok: false }`. A failed or empty
 * fetch stops before any parsing; a model failure mid-run discards what the
 * earlier chunks produced.
 */
export async function runExtraction(
  url: string,
  instruction: string,
  deps: PipelineDependencies,
  options: PipelineOptions = {}
): Promise<PipelineResult> {
  const fetchPage = deps.fetchPage ?? fetchUrl;
  const maxChunkLength = options.maxChunkLength ?? DEFAULT_CHUNK_MAX_LENGTH;
  const strategy = options.chunkStrategy ?? 'fixed';
  const report = (event: Omit<PipelineProgressEvent, 'url'>): void =>
    options.onProgress?.({ url, ...event });
  const start = Date.now();

  if (!instruction.trim()) {
    return failure(new ValidationError('instruction must not be empty'));
  }

  let log: pino.Logger;
  try {
    // The default logger reads the environment and throws ConfigurationError when it is invalid
    log = (deps.logger ?? createChildLogger(generateCorrelationId())).child({
      url: describeUrl(url),
    });
  } catch (error) {
    return failure(error);
  }

  report({ stage: 'fetch' });
  let html: string;
  try {
    const fetched = await fetchPage(url, { logger: log });
    html = fetched.bodyText;
    log.debug({ event: 'page_fetched', statusCode: fetched.statusCode, htmlLength: html.length });
  } catch (error) {
    if (error instanceof PageDistillError) {
      return failure(error);
    }
    const message = error instanceof Error ? error.message : 'Unknown error';
    return failure(new FetchError(message, { url, cause: error }));
  }

  if (!html.trim()) {
    return failure(new FetchError('Empty response body', { url }));
  }

  try {
    report({ stage: 'extract', length: html.length });
    const body = extractBody(html);
    log.debug({ event: 'body_extracted', htmlLength: html.length, bodyLength: body.length });

    report({ stage: 'clean', length: body.length });
    const text = cleanMarkup(body, log);

    const chunks = chunkText(text, maxChunkLength, strategy);
    report({ stage: 'chunk', total: chunks.length, length: text.length });
    log.info(
      { event: 'content_chunked', textLength: text.length, chunkCount: chunks.length, strategy },
      'Page reduced to chunks'
    );

    report({ stage: 'model', completed: 0, total: chunks.length });
    const answers = await extractFromChunks(chunks, instruction, deps.modelClient, {
      logger: log,
      onChunk: event => report({ stage: 'model', completed: event.index + 1, total: event.total }),
    });

    const joined = answers.join('\n');
    const durationMs = Date.now() - start;
    report({ stage: 'done', total: chunks.length, length: joined.length });
    log.info(
      { event: 'extraction_complete', chunkCount: chunks.length, durationMs },
      'Extraction finished'
    );

    return { ok: true, text: joined, chunkCount: chunks.length, durationMs };
  } catch (error) {
    log.error({ event: 'extraction_failed', error }, 'Extraction aborted');
    return failure(error, 'Extraction');
  }
}
