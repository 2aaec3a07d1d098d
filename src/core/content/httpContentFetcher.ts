import { request } from 'undici';
import { brotliDecompressSync, gunzipSync, inflateSync } from 'zlib';
import type pino from 'pino';
import { getEnvironment } from '../../config/environment';
import { MAX_REDIRECTIONS, USER_AGENT } from '../../config/constants';
import { withTiming, createChildLogger, generateCorrelationId } from '../../utils/logger';
import { isHttpUrl } from '../../utils/urlValidator';
import { FetchError, TimeoutError } from '../errors';

export interface FetchOptions {
  timeoutMs?: number;
  logger?: pino.Logger;
}

export interface FetchResult {
  statusCode: number;
  bodyText: string;
  contentType?: string;
}

/** Signature of the page fetcher, so the pipeline can take a stand-in. */
export type PageFetcher = (url: string, options?: FetchOptions) => Promise<FetchResult>;

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

function decodeBody(buf: Buffer, encoding: string, log: pino.Logger): Buffer {
  if (encoding.includes('br')) {
    log.debug({ compressedSize: buf.length }, 'Decompressing with brotli');
    return brotliDecompressSync(buf);
  }
  if (encoding.includes('gzip')) {
    log.debug({ compressedSize: buf.length }, 'Decompressing with gzip');
    return gunzipSync(buf);
  }
  if (encoding.includes('deflate')) {
    log.debug({ compressedSize: buf.length }, 'Decompressing with deflate');
    return inflateSync(buf);
  }
  return buf;
}

/**
 * One GET request for `url`. The body is returned as text whatever the
 * declared content type. Transport failures and HTTP statuses >= 400 are
 * thrown as FetchError; an expired timer as TimeoutError.
 */
export async function fetchUrl(url: string, options: FetchOptions = {}): Promise<FetchResult> {
  const timeoutMs = options.timeoutMs ?? getEnvironment().REQUEST_TIMEOUT_MS;

  if (!isHttpUrl(url)) {
    throw new FetchError('Only absolute http(s) URLs are allowed', { url });
  }

  const log = options.logger ?? createChildLogger(generateCorrelationId());
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const res = await withTiming(
      log,
      'http.fetch',
      async () =>
        request(url, {
          method: 'GET',
          signal: controller.signal,
          maxRedirections: MAX_REDIRECTIONS,
          headers: {
            'user-agent': USER_AGENT,
            accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
            'accept-encoding': 'gzip, br, deflate',
          },
        }),
      { url }
    );

    const statusCode = res.statusCode;
    const encoding = (headerValue(res.headers['content-encoding']) ?? '').toLowerCase();
    const contentType = headerValue(res.headers['content-type']);

    const raw = Buffer.from(await res.body.arrayBuffer());
    log.debug({ statusCode, encoding, bufferSize: raw.length }, 'Response body read');

    if (statusCode >= 400) {
      throw new FetchError('HTTP error', { url, statusCode });
    }

    const bodyText = decodeBody(raw, encoding, log).toString('utf8');
    log.debug({ textLength: bodyText.length }, 'Response body decoded');

    return { statusCode, bodyText, contentType };
  } catch (err) {
    if (err instanceof FetchError) {
      throw err;
    }
    if (controller.signal.aborted || (err instanceof Error && err.name === 'AbortError')) {
      throw new TimeoutError('Request timed out', timeoutMs, url);
    }
    const message = err instanceof Error ? err.message : 'Unknown network error';
    throw new FetchError(message, { url, cause: err });
  } finally {
    clearTimeout(timeout);
  }
}
