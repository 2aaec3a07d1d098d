import { describe, test, expect, beforeEach, afterEach, jest } from '@jest/globals';
import pino from 'pino';
import * as chunker from '../../src/core/content/chunker';
import { runExtraction, PipelineResult } from '../../src/core/pipeline/extractionPipeline';
import { buildExtractionPrompt } from '../../src/core/extraction/extractionClient';
import type { PageFetcher } from '../../src/core/content/httpContentFetcher';
import {
  ConfigurationError,
  FetchError,
  ModelServiceError,
  ValidationError,
} from '../../src/core/errors';
import { clearEnvironmentCache } from '../../src/config/environment';
import { clearLoggerCache } from '../../src/utils/logger';
import { FakeModelClient } from '../helpers/fakeModelClient';

const PAGE_URL = 'https://example.com/page';
const INSTRUCTION = 'List every product name';

function page(body: string): string {
  return `<!DOCTYPE html><html><head><title>Shop</title><style>p{}</style></head>${body}</html>`;
}

function expectSuccess(result: PipelineResult): { text: string; chunkCount: number } {
  if (!result.ok) {
    throw new Error(`expected success, got: ${result.message}`);
  }
  return result;
}

function expectFailure(result: PipelineResult) {
  if (result.ok) {
    throw new Error('expected failure, got success');
  }
  return result;
}

describe('runExtraction', () => {
  let modelClient: FakeModelClient;
  let fetchPage: jest.Mock<PageFetcher>;
  let chunkSpy: jest.SpiedFunction<typeof chunker.chunkText>;

  beforeEach(() => {
    modelClient = new FakeModelClient();
    fetchPage = jest.fn<PageFetcher>();
    chunkSpy = jest.spyOn(chunker, 'chunkText');
  });

  afterEach(() => {
    chunkSpy.mockRestore();
  });

  test('stops after a failed fetch without chunking or calling the model', async () => {
    fetchPage.mockRejectedValue(new FetchError('connect ECONNREFUSED', { url: PAGE_URL }));

    const result = expectFailure(await runExtraction(PAGE_URL, INSTRUCTION, { modelClient, fetchPage }));

    expect(result.error).toBeInstanceOf(FetchError);
    expect(result.message).toBe(`Fetch failed: connect ECONNREFUSED for URL: ${PAGE_URL}`);
    expect(fetchPage).toHaveBeenCalledTimes(1);
    expect(chunkSpy).not.toHaveBeenCalled();
    expect(modelClient.completeMock).not.toHaveBeenCalled();
  });

  test('wraps unexpected fetch errors as FetchError', async () => {
    fetchPage.mockRejectedValue(new Error('socket closed'));

    const result = expectFailure(await runExtraction(PAGE_URL, INSTRUCTION, { modelClient, fetchPage }));

    expect(result.error).toBeInstanceOf(FetchError);
    expect(result.message).toBe(`Fetch failed: socket closed for URL: ${PAGE_URL}`);
    expect(chunkSpy).not.toHaveBeenCalled();
  });

  test('treats an empty response body as a failed fetch', async () => {
    fetchPage.mockResolvedValue({ statusCode: 200, bodyText: '  \n' });

    const result = expectFailure(await runExtraction(PAGE_URL, INSTRUCTION, { modelClient, fetchPage }));

    expect(result.error).toBeInstanceOf(FetchError);
    expect(result.message).toBe(`Fetch failed: Empty response body for URL: ${PAGE_URL}`);
    expect(chunkSpy).not.toHaveBeenCalled();
    expect(modelClient.completeMock).not.toHaveBeenCalled();
  });

  test('sends a 10000 character body as 6000 + 4000 chunks and joins the answers', async () => {
    const text = 'a'.repeat(10000);
    fetchPage.mockResolvedValue({ statusCode: 200, bodyText: page(`<body><p>${text}</p></body>`) });
    modelClient.completeMock.mockResolvedValueOnce('first').mockResolvedValueOnce('second');

    const result = expectSuccess(
      await runExtraction(PAGE_URL, INSTRUCTION, { modelClient, fetchPage }, { maxChunkLength: 6000 })
    );

    expect(result.text).toBe('first\nsecond');
    expect(result.chunkCount).toBe(2);
    expect(modelClient.completeMock.mock.calls.map(([prompt]) => prompt)).toEqual([
      buildExtractionPrompt('a'.repeat(6000), INSTRUCTION),
      buildExtractionPrompt('a'.repeat(4000), INSTRUCTION),
    ]);
  });

  test('uses 6000 characters per chunk by default', async () => {
    fetchPage.mockResolvedValue({
      statusCode: 200,
      bodyText: page(`<body><p>${'b'.repeat(6001)}</p></body>`),
    });
    modelClient.completeMock.mockResolvedValue('x');

    const result = expectSuccess(await runExtraction(PAGE_URL, INSTRUCTION, { modelClient, fetchPage }));

    expect(result.chunkCount).toBe(2);
    expect(chunkSpy).toHaveBeenCalledWith('b'.repeat(6001), 6000, 'fixed');
  });

  test('returns an empty success without model calls when nothing visible remains', async () => {
    fetchPage.mockResolvedValue({
      statusCode: 200,
      bodyText: page('<body><script>var x = 1;</script>\n   \n</body>'),
    });

    const result = await runExtraction(PAGE_URL, INSTRUCTION, { modelClient, fetchPage });

    expect(result).toMatchObject({ ok: true, text: '', chunkCount: 0 });
    expect(modelClient.completeMock).not.toHaveBeenCalled();
  });

  test('returns an empty success for a document without a body', async () => {
    fetchPage.mockResolvedValue({ statusCode: 200, bodyText: '<div>fragment only</div>' });

    const result = await runExtraction(PAGE_URL, INSTRUCTION, { modelClient, fetchPage });

    expect(result).toMatchObject({ ok: true, text: '', chunkCount: 0 });
    expect(modelClient.completeMock).not.toHaveBeenCalled();
  });

  test('sends cleaned text without head, script or style content', async () => {
    fetchPage.mockResolvedValue({
      statusCode: 200,
      bodyText: page('<body><script>track()</script><h1> Lamp </h1><p>Chair</p></body>'),
    });
    modelClient.completeMock.mockResolvedValue('Lamp, Chair');

    const result = expectSuccess(await runExtraction(PAGE_URL, INSTRUCTION, { modelClient, fetchPage }));

    expect(result.text).toBe('Lamp, Chair');
    expect(modelClient.completeMock).toHaveBeenCalledWith(
      buildExtractionPrompt('Lamp\nChair', INSTRUCTION)
    );
  });

  test('discards earlier answers when the model fails mid-run', async () => {
    fetchPage.mockResolvedValue({
      statusCode: 200,
      bodyText: page(`<body><p>${'c'.repeat(25)}</p></body>`),
    });
    modelClient.completeMock
      .mockResolvedValueOnce('partial')
      .mockRejectedValueOnce(new ModelServiceError('HTTP 503', { provider: 'ollama' }));

    const result = expectFailure(
      await runExtraction(PAGE_URL, INSTRUCTION, { modelClient, fetchPage }, { maxChunkLength: 10 })
    );

    expect(result.error).toBeInstanceOf(ModelServiceError);
    expect(result.error).toMatchObject({ chunkIndex: 1 });
    expect(result.message).toBe(
      'Model service error: chunk 2 of 3 failed: HTTP 503 (provider: ollama)'
    );
    expect(result.message).not.toContain('partial');
    expect(modelClient.completeMock).toHaveBeenCalledTimes(2);
  });

  test('rejects an empty instruction before fetching', async () => {
    const result = expectFailure(await runExtraction(PAGE_URL, '   ', { modelClient, fetchPage }));

    expect(result.error).toBeInstanceOf(ValidationError);
    expect(fetchPage).not.toHaveBeenCalled();
  });

  test('reports an invalid chunk length as a validation failure', async () => {
    fetchPage.mockResolvedValue({ statusCode: 200, bodyText: page('<body><p>text</p></body>') });

    const result = expectFailure(
      await runExtraction(PAGE_URL, INSTRUCTION, { modelClient, fetchPage }, { maxChunkLength: 0 })
    );

    expect(result.error).toBeInstanceOf(ValidationError);
    expect(result.message).toBe('Validation error: maxLength must be a positive integer, got 0');
    expect(modelClient.completeMock).not.toHaveBeenCalled();
  });

  test('passes the boundary strategy to the chunker', async () => {
    fetchPage.mockResolvedValue({
      statusCode: 200,
      bodyText: page('<body><p>alpha beta gamma</p></body>'),
    });
    modelClient.completeMock.mockResolvedValue('');

    const result = expectSuccess(
      await runExtraction(
        PAGE_URL,
        INSTRUCTION,
        { modelClient, fetchPage },
        { maxChunkLength: 8, chunkStrategy: 'boundary' }
      )
    );

    expect(result.chunkCount).toBe(3);
    expect(result.text).toBe('\n\n');
    expect(modelClient.completeMock.mock.calls.map(([prompt]) => prompt)).toEqual([
      buildExtractionPrompt('alpha ', INSTRUCTION),
      buildExtractionPrompt('beta ', INSTRUCTION),
      buildExtractionPrompt('gamma', INSTRUCTION),
    ]);
  });

  test('reports progress for every stage and chunk', async () => {
    fetchPage.mockResolvedValue({
      statusCode: 200,
      bodyText: page(`<body><p>${'d'.repeat(20)}</p></body>`),
    });
    modelClient.completeMock.mockResolvedValue('answer');
    const onProgress = jest.fn();

    await runExtraction(
      PAGE_URL,
      INSTRUCTION,
      { modelClient, fetchPage },
      { maxChunkLength: 10, onProgress }
    );

    expect(onProgress.mock.calls.map(([event]) => event)).toEqual([
      { url: PAGE_URL, stage: 'fetch' },
      { url: PAGE_URL, stage: 'extract', length: expect.any(Number) },
      { url: PAGE_URL, stage: 'clean', length: expect.any(Number) },
      { url: PAGE_URL, stage: 'chunk', total: 2, length: 20 },
      { url: PAGE_URL, stage: 'model', completed: 0, total: 2 },
      { url: PAGE_URL, stage: 'model', completed: 1, total: 2 },
      { url: PAGE_URL, stage: 'model', completed: 2, total: 2 },
      { url: PAGE_URL, stage: 'done', total: 2, length: 'answer\nanswer'.length },
    ]);
  });

  test('gives identical output for identical fetch and model responses', async () => {
    fetchPage.mockResolvedValue({
      statusCode: 200,
      bodyText: page(`<body><p>${'e'.repeat(15)}</p><p>tail</p></body>`),
    });
    modelClient.completeMock.mockImplementation(async prompt => `len:${prompt.length}`);

    const first = expectSuccess(
      await runExtraction(PAGE_URL, INSTRUCTION, { modelClient, fetchPage }, { maxChunkLength: 8 })
    );
    const second = expectSuccess(
      await runExtraction(PAGE_URL, INSTRUCTION, { modelClient, fetchPage }, { maxChunkLength: 8 })
    );

    expect(second.text).toBe(first.text);
    expect(second.chunkCount).toBe(first.chunkCount);
    expect(first.chunkCount).toBe(3);
  });

  test('leaves error logging of a failed fetch to the fetcher', async () => {
    const lines: string[] = [];
    const logger = pino({ level: 'debug' }, { write: (line: string) => lines.push(line) });
    fetchPage.mockRejectedValue(new FetchError('HTTP error', { url: PAGE_URL, statusCode: 502 }));

    const result = expectFailure(
      await runExtraction(PAGE_URL, INSTRUCTION, { modelClient, fetchPage, logger })
    );

    expect(result.error).toBeInstanceOf(FetchError);
    expect(lines).toEqual([]);
  });

  describe('with an invalid environment', () => {
    const originalEnv = process.env;

    beforeEach(() => {
      process.env = { ...originalEnv, MODEL_PORT: 'not-a-port' };
      clearEnvironmentCache();
      clearLoggerCache();
    });

    afterEach(() => {
      process.env = originalEnv;
      clearEnvironmentCache();
      clearLoggerCache();
    });

    test('reports the configuration error instead of rejecting', async () => {
      fetchPage.mockResolvedValue({ statusCode: 200, bodyText: page('<body><p>x</p></body>') });

      const result = expectFailure(await runExtraction(PAGE_URL, 'x', { modelClient, fetchPage }));

      expect(result.error).toBeInstanceOf(ConfigurationError);
      expect(result.message).toMatch(
        /^Configuration error: Environment validation failed:\nMODEL_PORT: /
      );
      expect(fetchPage).not.toHaveBeenCalled();
      expect(modelClient.completeMock).not.toHaveBeenCalled();
    });
  });
});
