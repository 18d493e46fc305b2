/**
 * Tool gateway exports
 */

export { ToolRegistry, defineTool, validateArguments } from './registry.js';
export type { ToolDescriptor, ToolHandler, ToolResponse } from './registry.js';
export { ToolFactory, ToolBuilder } from './tool.js';
export { SdkProvider, attempt, stripMetadata, bodyOrStatus } from './provider.js';
export type { Operation, OperationMap, OperationName, OperationTable, ProviderClient } from './provider.js';
export { drainPages } from './pagination.js';
export type { Page, PageFetcher } from './pagination.js';
export { wrap, JSON_MEDIA_TYPE } from './envelope.js';
export type { ResultEnvelope } from './envelope.js';
export { classifyError, isRecord, normalizeError, normalizeFailure } from './normalizer.js';
export { buildRequest, RequestBuilder, compact, isPresent, keyValuePairs, mapPresent } from './params.js';
export type { KeyValuePair, StringMap } from './params.js';
export {
  success,
  notFound,
  invalid,
  mapOutcome,
  andThen,
  firstOrNotFound,
} from './outcome.js';
export type { Failure, Success, ToolOutcome } from './outcome.js';
export * from './errors.js';
