export type {
  AttributeValue,
  Compression,
  CredentialSource,
  EndpointSource,
  ExporterConfig,
  HttpClientOptions,
  JsonValue,
  LogLevel,
  Logger,
  RawConfig,
  ResolvedConfig,
} from './types';
export type { CredentialCandidate, ResolvedAuthorization } from './auth';
export type { EndpointCandidate } from './endpoint';
export type { EnvSource, LangfuseEnvironment } from './env';
export type { Diagnostics } from './logger';
export type { ExportScope } from './runtime_guard';
export type { AttributeTarget, TraceAttribute } from './context';
export type { TokenUsage } from './observation';
export type { BatchOptions, TracerProviderOptions } from './otel';
export { LangfuseConfigError, type LangfuseConfigErrorCode } from './errors';
export { buildBasicAuth, collectCredentials, composeAuthorization } from './auth';
export { composeEndpoint, selectEndpoint } from './endpoint';
export { parseOtlpHeaders, readEnvironment } from './env';
export { resolveConfig } from './config';
export { RuntimeGuard } from './runtime_guard';
export { LangfuseExporter } from './exporter';
export {
  AttributeKeySessionId,
  AttributeKeyTraceInput,
  AttributeKeyTraceMetadata,
  AttributeKeyTraceOutput,
  AttributeKeyTraceName,
  AttributeKeyTracePublic,
  AttributeKeyTraceTags,
  AttributeKeyUserId,
  TraceAttributeContext,
} from './context';
export {
  AttributeKeyObservationInput,
  AttributeKeyObservationMetadata,
  AttributeKeyObservationModel,
  AttributeKeyObservationModelParameters,
  AttributeKeyObservationOutput,
  AttributeKeyObservationType,
  AttributeKeyObservationUsageInput,
  AttributeKeyObservationUsageOutput,
  AttributeKeyObservationUsageTotal,
  ObservationAttributes,
} from './observation';
export { ContextSpanProcessor, createTracerProvider } from './otel';
export * from './constants';
