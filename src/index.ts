export { runExtraction } from './core/pipeline/extractionPipeline';
export type {
  PipelineDependencies,
  PipelineError,
  PipelineOptions,
  PipelineProgressEvent,
  PipelineResult,
  PipelineStage,
} from './core/pipeline/extractionPipeline';
export { runBatch, parseBatchFile, formatBatchEntry } from './core/pipeline/batchRunner';
export type { BatchEntry, ExtractionJobType } from './core/pipeline/batchRunner';

export { fetchUrl } from './core/content/httpContentFetcher';
export type { FetchOptions, FetchResult, PageFetcher } from './core/content/httpContentFetcher';
export { extractBody } from './core/content/bodyExtractor';
export { cleanMarkup } from './core/content/textCleaner';
export { chunkText } from './core/content/chunker';
export type { ChunkStrategy } from './core/content/chunker';
export { buildExtractionPrompt, extractFromChunks } from './core/extraction/extractionClient';

export { ModelClient, createModelClient } from './core/model/modelClient';
export type { ModelClientConfig, ModelProviderType } from './core/model/modelClient';
export { OllamaModelClient } from './core/model/providers/ollamaModelClient';
export { OpenAiCompatibleModelClient } from './core/model/providers/openAiCompatibleModelClient';
export { InitializationService } from './services/initialization';

export {
  PageDistillError,
  FetchError,
  TimeoutError,
  ModelServiceError,
  ValidationError,
  ConfigurationError,
  ErrorCode,
} from './core/errors';
