import { request } from 'undici';
import { z } from 'zod';
import { ModelClient, ModelClientConfig } from '../modelClient';
import { ModelServiceError } from '../../errors';

const ErrorBody = z.object({
  error: z.union([z.string(), z.object({ message: z.string() })]),
});

function describeErrorBody(text: string): string | undefined {
  try {
    const parsed = ErrorBody.safeParse(JSON.parse(text));
    if (!parsed.success) return undefined;
    return typeof parsed.data.error === 'string' ? parsed.data.error : parsed.data.error.message;
  } catch {
    return undefined;
  }
}

/**
 * Shared request handling for model services spoken to over HTTP/JSON.
 * Every failure surfaces as a ModelServiceError; nothing is retried.
 */
export abstract class HttpModelClient extends ModelClient {
  protected readonly serverUrl: string;
  protected readonly modelName: string;
  protected readonly apiKey?: string;
  protected readonly timeoutMs: number;

  protected abstract readonly providerName: string;

  constructor(config: ModelClientConfig) {
    super();

    if (!config.serverUrl) {
      throw new ModelServiceError('serverUrl is required', { provider: config.type });
    }
    if (!config.modelName) {
      throw new ModelServiceError('modelName is required', { provider: config.type });
    }

    this.serverUrl = config.serverUrl.replace(/\/$/, ''); // Remove trailing slash
    this.modelName = config.modelName;
    this.apiKey = config.apiKey;
    this.timeoutMs = config.timeoutMs || 120000;
  }

  getModelName(): string {
    return this.modelName;
  }

  protected async requestJson<S extends z.ZodTypeAny>(
    method: 'GET' | 'POST',
    path: string,
    schema: S,
    body?: unknown
  ): Promise<z.infer<S>> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    const headers: Record<string, string> = { accept: 'application/json' };
    if (body !== undefined) headers['content-type'] = 'application/json';
    if (this.apiKey) headers.authorization = `Bearer ${this.apiKey}`;

    try {
      const response = await request(`${this.serverUrl}${path}`, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });

      if (response.statusCode < 200 || response.statusCode >= 300) {
        const errorText = await response.body.text();
        const detail = describeErrorBody(errorText);
        throw new ModelServiceError(
          detail ? `HTTP ${response.statusCode}: ${detail}` : `HTTP ${response.statusCode}`,
          { provider: this.providerName }
        );
      }

      const parsed = schema.safeParse(await response.body.json());
      if (!parsed.success) {
        throw new ModelServiceError(
          `Invalid response format: ${parsed.error.issues[0]?.message ?? 'unexpected shape'}`,
          { provider: this.providerName }
        );
      }
      return parsed.data;
    } catch (error) {
      if (error instanceof ModelServiceError) {
        throw error;
      }
      if (controller.signal.aborted) {
        throw new ModelServiceError(`Request timed out after ${this.timeoutMs}ms`, {
          provider: this.providerName,
          cause: error,
        });
      }
      const errorMessage = error instanceof Error ? error.message : 'Unknown network error';
      throw new ModelServiceError(`Request failed: ${errorMessage}`, {
        provider: this.providerName,
        cause: error,
      });
    } finally {
      clearTimeout(timeout);
    }
  }
}
