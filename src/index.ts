/**
 * Public API.
 */

export { WattClient, createClient, replayCapture, buildMessages } from './client.js';
export { executeCompletion, assertSystemPromptSupported } from './completion/executor.js';
export type { ExecuteOptions } from './completion/executor.js';
export { resultFromResponse, ResolvedCompletion } from './completion/response.js';
export { loadConfig, parseConfig, resolveConfigPath } from './config/loader.js';
export type { Config, ModelConfig, ProviderConfig, Settings } from './config/types.js';
export { ModelCatalog } from './models/catalog.js';
export type { ModelEntry } from './models/catalog.js';
export { buildRegistry } from './providers/registry.js';
export type { ProviderAdapter } from './providers/types.js';
export * from './shared/errors.js';
export type * from './shared/types.js';
export { StreamAggregator } from './streaming/aggregator.js';
export {
  BlockingCompletionStream,
  CompletionStream,
  collectCompletion,
} from './streaming/driver.js';
export type { Completion, StreamStatus } from './streaming/driver.js';
export { classifyLine } from './streaming/frame-classifier.js';
export { createLineBuffer } from './streaming/line-buffer.js';
export type { LineBuffer } from './streaming/line-buffer.js';
export { StreamInterpreter } from './streaming/interpreter.js';
export { fileBytes, readableBytes } from './streaming/sources.js';
export { createApp } from './api/app.js';
