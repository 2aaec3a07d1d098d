import { getEnvironment, getModelServerUrl } from '../config/environment';
import { createModelClient, ModelClient } from '../core/model/modelClient';
import { getLogger } from '../utils/logger';

/**
 * Validates configuration and builds the one model client a process uses.
 * The client is handed to the pipeline explicitly rather than kept global.
 */
export class InitializationService {
  async initialize(overrides: { modelName?: string } = {}): Promise<ModelClient> {
    // Throws ConfigurationError before a logger can be built from a bad environment
    const env = getEnvironment();
    const logger = getLogger();

    try {
      const serverUrl = getModelServerUrl(env);
      const client = await createModelClient({
        type: env.MODEL_PROVIDER,
        serverUrl,
        modelName: overrides.modelName ?? env.MODEL_NAME,
        apiKey: env.MODEL_API_KEY,
        timeoutMs: env.MODEL_TIMEOUT_MS,
      });

      logger.info(
        { provider: env.MODEL_PROVIDER, serverUrl, model: client.getModelName() },
        'Model client initialized'
      );
      return client;
    } catch (error) {
      logger.error({ error }, 'Failed to initialize application');
      throw error;
    }
  }
}
