/**
 * Abstract base class for text-completion backends
 */
export abstract class ModelClient {
  /**
   * Send one prompt and resolve with the model's raw text answer.
   * Failures reject with a ModelServiceError.
   */
  abstract complete(prompt: string): Promise<string>;

  /**
   * Check that the service answers and resolve with the models it reports.
   */
  abstract ping(): Promise<string[]>;

  abstract getModelName(): string;

  /**
   * Optional cleanup for clients that hold resources
   */
  async close(): Promise<void> {
    // Default implementation - no cleanup needed
  }
}

export type ModelProviderType = 'ollama' | 'openai';

/**
 * Configuration for model clients
 */
export interface ModelClientConfig {
  type: ModelProviderType;
  serverUrl: string;
  modelName: string;
  apiKey?: string;
  timeoutMs?: number;
}

/**
 * Factory function to create model clients
 */
export async function createModelClient(config: ModelClientConfig): Promise<ModelClient> {
  switch (config.type) {
    case 'ollama': {
      const { OllamaModelClient } = await import('./providers/ollamaModelClient');
      return new OllamaModelClient(config);
    }

    case 'openai': {
      const { OpenAiCompatibleModelClient } = await import(
        './providers/openAiCompatibleModelClient'
      );
      return new OpenAiCompatibleModelClient(config);
    }

    default: {
      const unknownType: never = config.type;
      throw new Error(`Unknown model provider type: ${String(unknownType)}`);
    }
  }
}
