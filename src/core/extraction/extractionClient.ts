import type pino from 'pino';
import { EXTRACTION_PROMPT_TEMPLATE, PROMPT_PLACEHOLDERS } from '../../config/constants';
import { ModelClient } from '../model/modelClient';
import { ModelServiceError, toPageDistillError } from '../errors';
import { withTiming } from '../../utils/logger';

export interface ChunkExtractedEvent {
  index: number;
  total: number;
  chunkLength: number;
  responseLength: number;
}

export interface ExtractOptions {
  logger?: pino.Logger;
  /** Called after each chunk's answer arrives, in chunk order. */
  onChunk?: (event: ChunkExtractedEvent) => void;
}

/**
 * Fill the fixed extraction template with one chunk and the caller's
 * instruction. Replacement is literal, so `$` sequences in either value
 * survive unchanged.
 */
export function buildExtractionPrompt(chunk: string, instruction: string): string {
  return EXTRACTION_PROMPT_TEMPLATE.split(PROMPT_PLACEHOLDERS.CONTENT)
    .map(part => part.split(PROMPT_PLACEHOLDERS.INSTRUCTION).join(instruction))
    .join(chunk);
}

/**
 * Ask the model about each chunk in turn. The request for chunk i+1 is only
 * sent once chunk i has been answered; answers come back unmodified and in
 * chunk order. The first failure aborts the remaining chunks.
 */
export async function extractFromChunks(
  chunks: readonly string[],
  instruction: string,
  client: ModelClient,
  options: ExtractOptions = {}
): Promise<string[]> {
  const results: string[] = [];

  for (let index = 0; index < chunks.length; index++) {
    const chunk = chunks[index];
    const prompt = buildExtractionPrompt(chunk, instruction);

    let response: string;
    try {
      response = options.logger
        ? await withTiming(options.logger, 'model.extract', () => client.complete(prompt), {
            chunkIndex: index,
            totalChunks: chunks.length,
            model: client.getModelName(),
          })
        : await client.complete(prompt);
    } catch (error) {
      const detail =
        error instanceof ModelServiceError ? error.detail : toPageDistillError(error).message;
      throw new ModelServiceError(`chunk ${index + 1} of ${chunks.length} failed: ${detail}`, {
        provider: error instanceof ModelServiceError ? error.provider : undefined,
        chunkIndex: index,
        cause: error,
      });
    }

    results.push(response);
    options.onChunk?.({
      index,
      total: chunks.length,
      chunkLength: chunk.length,
      responseLength: response.length,
    });
  }

  return results;
}
