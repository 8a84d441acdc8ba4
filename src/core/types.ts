import type { AgentOptions } from 'node:https';

/**
 * Attribute value types accepted by OpenTelemetry span attributes.
 */
export type AttributeValue = string | number | boolean | string[] | number[] | boolean[];

/**
 * Structured value accepted as trace metadata.
 */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/**
 * Logging levels used by the internal logger.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Logger contract used for internal diagnostics.
 */
export interface Logger {
  debug(msg: string, fields?: Record<string, unknown>): void;
  info(msg: string, fields?: Record<string, unknown>): void;
  warn(msg: string, fields?: Record<string, unknown>): void;
  error(msg: string, fields?: Record<string, unknown>): void;
}

/**
 * Payload compression applied by the OTLP transport.
 */
export type Compression = 'none' | 'gzip';

/**
 * HTTP client settings handed to the OTLP transport. These are the options of
 * the Node agent the transport creates for its requests.
 */
export type HttpClientOptions = AgentOptions;

/**
 * Where the resolved endpoint came from, highest precedence first.
 */
export type EndpointSource =
  | 'explicit-endpoint'
  | 'explicit-host'
  | 'backend-env-host'
  | 'generic-env-traces-endpoint'
  | 'generic-env-base-endpoint'
  | 'default';

/**
 * Where the resolved `Authorization` value came from, highest precedence first.
 */
export type CredentialSource =
  | 'explicit-key-pair'
  | 'explicit-header'
  | 'backend-env-key-pair'
  | 'generic-env-traces-header'
  | 'generic-env-header';

/**
 * Explicit configuration recorded by the builder. Every field is optional;
 * anything left unset is resolved from the environment or a default.
 */
export interface RawConfig {
  /**
   * Full traces endpoint, used verbatim.
   */
  endpoint?: string;
  /**
   * Langfuse base URL. The Langfuse traces path is appended unless the URL
   * already ends with it.
   */
  host?: string;
  publicKey?: string;
  secretKey?: string;
  /**
   * Extra headers sent with every export request. An `Authorization` entry
   * here is used verbatim when no explicit key pair is set.
   */
  headers?: Record<string, string>;
  timeoutMs?: number;
  compression?: Compression;
  httpClient?: HttpClientOptions;
  /**
   * Post to the historical `/api/public/otel` path instead of
   * `/api/public/otel/v1/traces`.
   */
  legacyEndpointPath?: boolean;
}

/**
 * Fully-resolved exporter configuration. Frozen once produced.
 */
export interface ResolvedConfig {
  readonly endpoint: string;
  readonly authorization: string;
  /**
   * Every header sent by the transport, `Authorization` included.
   */
  readonly headers: Readonly<Record<string, string>>;
  readonly timeoutMs: number;
  readonly compression: Compression;
  /**
   * Explicit HTTP client settings. The builder fills in a default when this
   * is undefined.
   */
  readonly httpClient: HttpClientOptions | undefined;
}

/**
 * Configuration held by a built exporter.
 */
export type ExporterConfig = ResolvedConfig & { readonly httpClient: HttpClientOptions };
