import { z } from 'zod';
import { HttpModelClient } from './httpModelClient';

const GenerateResponse = z.object({
  model: z.string().optional(),
  response: z.string(),
  done: z.boolean().optional(),
});

const TagsResponse = z.object({
  models: z.array(z.object({ name: z.string() })),
});

/**
 * Ollama's native API: one non-streaming `/api/generate` call per prompt
 */
export class OllamaModelClient extends HttpModelClient {
  protected readonly providerName = 'ollama';

  async complete(prompt: string): Promise<string> {
    const result = await this.requestJson('POST', '/api/generate', GenerateResponse, {
      model: this.modelName,
      prompt,
      stream: false,
    });
    return result.response;
  }

  async ping(): Promise<string[]> {
    const result = await this.requestJson('GET', '/api/tags', TagsResponse);
    return result.models.map(model => model.name);
  }
}
