import { z } from 'zod';
import { HttpModelClient } from './httpModelClient';
import { ModelClientConfig } from '../modelClient';
import { ModelServiceError } from '../../errors';

const ChatCompletionResponse = z.object({
  choices: z
    .array(
      z.object({
        index: z.number().optional(),
        message: z.object({ content: z.string().nullable() }),
      })
    )
    .min(1, 'missing choices'),
});

const ModelsResponse = z.object({
  data: z.array(z.object({ id: z.string() })),
});

/**
 * Chat-completions endpoint of any OpenAI-compatible server (vLLM, LM Studio,
 * llama.cpp server, hosted gateways). The prompt goes out as a single user
 * message.
 */
export class OpenAiCompatibleModelClient extends HttpModelClient {
  protected readonly providerName = 'openai';

  constructor(config: ModelClientConfig) {
    super(config);
    if (!config.apiKey) {
      throw new ModelServiceError('apiKey is required', { provider: 'openai' });
    }
  }

  async complete(prompt: string): Promise<string> {
    const result = await this.requestJson('POST', '/v1/chat/completions', ChatCompletionResponse, {
      model: this.modelName,
      messages: [{ role: 'user', content: prompt }],
      stream: false,
    });
    return result.choices[0].message.content ?? '';
  }

  async ping(): Promise<string[]> {
    const result = await this.requestJson('GET', '/v1/models', ModelsResponse);
    return result.data.map(model => model.id);
  }
}
