// Chunking
export { type Chunk, type ChunkOptions, chunkText, largestChunkSize } from "./core/chunker.js";
// Cyphers
export { CYPHER_NAMES, type Cypher, getCypher } from "./core/encoder.js";
// Errors
export {
  CancelledError,
  ChunkFailedError,
  CompletionError,
  type CompletionErrorKind,
  type ErrorKind,
  InvalidConfigurationError,
  isAbortError,
  isLoomError,
  LoomError,
  MissingTemplateKeyError,
  TemplateNotFoundError,
  TemplateSyntaxError,
} from "./core/errors.js";
// Model catalog
export {
  calculateCost,
  findModelSpec,
  isLegacyCompletionModel,
  type ModelEndpoint,
  type ModelPricing,
  type ModelSpec,
} from "./core/model-catalog.js";
// Request and response types
export {
  buildCompletionRequest,
  type CompletionChoice,
  type CompletionParams,
  type CompletionParamsInput,
  type CompletionRequest,
  type CompletionResponse,
  completionParamsSchema,
  DEFAULT_COMPLETION_PARAMS,
  type FrozenCompletionParams,
  resolveCompletionParams,
  type TokenLogprob,
  type TokenUsage,
} from "./core/options.js";
// Pipeline
export {
  CompletionPipeline,
  InvalidTransitionError,
  joinCompletions,
  type OutputFormatter,
  type PipelineOptions,
  type PipelineResult,
  type PipelineState,
  PipelineStateMachine,
  type PipelineTransition,
  type RunOptions,
} from "./core/pipeline.js";
// Retry
export {
  classifyError,
  createRetryPolicy,
  DEFAULT_RETRY_CONFIG,
  formatCompletionError,
  isRetryableKind,
  type RetryConfig,
  type RetryPolicy,
  type ShouldRetry,
} from "./core/retry.js";
// Templates
export {
  BUILTIN_TEMPLATES_DIR,
  CompositeTemplateStore,
  ConfigTemplateStore,
  createTemplateStore,
  DirectoryTemplateStore,
  getUserTemplatesDir,
  type TemplateLookup,
  type TemplateSource,
} from "./core/template-store.js";
export {
  PreparedTemplate,
  RESERVED_KEYS,
  scanTemplate,
  type TemplateContext,
  type TemplateOverrides,
  TemplateRenderer,
  type TemplateRendererOptions,
} from "./core/templates.js";
// Logging
export { createLogger, defaultLogger, type LoggerOptions, parseLogLevel } from "./logging/logger.js";
// Providers
export { type ClientSettings, createCompletionClient } from "./providers/discovery.js";
export { ECHO_MODEL, EchoCompletionClient } from "./providers/echo.js";
export { parseLogitBias } from "./providers/logit-bias.js";
export {
  createOpenAICompletionClient,
  OpenAICompletionClient,
  type OpenAICompletionClientOptions,
} from "./providers/openai.js";
export type { CompletionCallOptions, CompletionClient, Tokenizer } from "./providers/provider.js";
export { createTiktokenTokenizer } from "./providers/tokenizer.js";
// Configuration
export { type CLIConfig, ConfigError, loadConfig, parseConfig } from "./cli/config.js";
export { runCLI } from "./cli/program.js";
