import type { SpanExporter } from '@opentelemetry/sdk-trace-base';
import {
  LangfuseExporter,
  readEnvironment,
  resolveConfig,
  type Compression,
  type Diagnostics,
  type EnvSource,
  type ExporterConfig,
  type HttpClientOptions,
  type LangfuseEnvironment,
  type Logger,
  type LogLevel,
  type RawConfig,
} from '../core/index';
import { processEnv, withoutHeader } from '../core/env';
import { log } from '../core/logger';
import { createTransport } from './transport';

export interface ExporterBuilderOptions {
  /**
   * Environment read at `build()` time. Defaults to `process.env`.
   */
  env?: EnvSource;
  logger?: Logger;
  logLevel?: LogLevel;
}

const defaultHttpClient: Readonly<HttpClientOptions> = Object.freeze({ keepAlive: true });

/**
 * Fluent configuration for a {@link LangfuseExporter}.
 *
 * Setters only record values; everything is validated by `build()`. Values
 * left unset are taken from the environment (`LANGFUSE_*`, then
 * `OTEL_EXPORTER_OTLP_*`) and then from defaults.
 *
 * ```ts
 * const exporter = new ExporterBuilder()
 *   .withHost('https://cloud.langfuse.com')
 *   .withCredentials('pk-lf-test', 'sk-lf-test')
 *   .build();
 * ```
 */
export class ExporterBuilder {
  private readonly raw: RawConfig = {};
  private readonly env: EnvSource | undefined;
  private environment: LangfuseEnvironment | undefined;
  private transport: SpanExporter | undefined;
  private diagnostics: Diagnostics;

  constructor(options: ExporterBuilderOptions = {}) {
    this.env = options.env;
    this.diagnostics = {
      logger: options.logger ?? console,
      logLevel: options.logLevel ?? 'warn',
    };
  }

  /**
   * Creates a builder seeded from the environment as it is now. Later setters
   * still override the seeded values.
   */
  static fromEnvironment(
    env: EnvSource = processEnv(),
    options: Omit<ExporterBuilderOptions, 'env'> = {},
  ): ExporterBuilder {
    const builder = new ExporterBuilder(options);
    builder.environment = readEnvironment(env);
    return builder;
  }

  /**
   * Langfuse base URL such as `https://cloud.langfuse.com`. The Langfuse
   * traces path is appended; a URL already ending with it, or with the
   * historical `/api/public/otel` root, is completed rather than doubled.
   */
  withHost(host: string): this {
    this.raw.host = host;
    return this;
  }

  /**
   * Full traces endpoint, sent to as given. Takes precedence over
   * `withHost` and every environment variable.
   */
  withEndpoint(endpoint: string): this {
    this.raw.endpoint = endpoint;
    return this;
  }

  withCredentials(publicKey: string, secretKey: string): this {
    this.raw.publicKey = publicKey;
    this.raw.secretKey = secretKey;
    return this;
  }

  withPublicKey(publicKey: string): this {
    this.raw.publicKey = publicKey;
    return this;
  }

  withSecretKey(secretKey: string): this {
    this.raw.secretKey = secretKey;
    return this;
  }

  /**
   * Adds a header to every export request, replacing any header of the same
   * name regardless of case.
   */
  withHeader(name: string, value: string): this {
    this.raw.headers = { ...withoutHeader(this.raw.headers ?? {}, name), [name]: value };
    return this;
  }

  withHeaders(headers: Record<string, string>): this {
    for (const [name, value] of Object.entries(headers)) {
      this.withHeader(name, value);
    }
    return this;
  }

  /**
   * Sets the `Authorization` header verbatim. An explicit key pair still wins.
   */
  withAuthHeader(value: string): this {
    return this.withHeader('Authorization', value);
  }

  withTimeout(timeoutMs: number): this {
    this.raw.timeoutMs = timeoutMs;
    return this;
  }

  withCompression(compression: Compression): this {
    this.raw.compression = compression;
    return this;
  }

  /**
   * Agent options for the transport's HTTP client. Defaults to a keep-alive
   * agent.
   */
  withHttpClient(options: HttpClientOptions): this {
    this.raw.httpClient = options;
    return this;
  }

  /**
   * Targets the historical `/api/public/otel` path for hosts that predate
   * `/api/public/otel/v1/traces`.
   */
  withLegacyEndpointPath(enabled = true): this {
    this.raw.legacyEndpointPath = enabled;
    return this;
  }

  /**
   * Replaces the OTLP/HTTP transport with a custom span exporter.
   */
  withTransport(transport: SpanExporter): this {
    this.transport = transport;
    return this;
  }

  withLogger(logger: Logger, logLevel?: LogLevel): this {
    this.diagnostics = { logger, logLevel: logLevel ?? this.diagnostics.logLevel };
    return this;
  }

  /**
   * Resolves the configuration without creating a transport.
   *
   * @throws {LangfuseConfigError}
   */
  resolve(): ExporterConfig {
    const environment = this.environment ?? readEnvironment(this.env ?? processEnv());
    const resolved = resolveConfig({ ...this.raw }, environment, this.diagnostics);
    return Object.freeze({
      ...resolved,
      httpClient: Object.freeze({ ...(resolved.httpClient ?? defaultHttpClient) }),
    });
  }

  /**
   * @throws {LangfuseConfigError} when the configuration cannot be resolved.
   */
  build(): LangfuseExporter {
    const config = this.resolve();
    const transport = this.transport ?? createTransport(config);
    log(this.diagnostics, 'info', 'langfuse: exporter configured', {
      endpoint: config.endpoint,
      timeoutMs: config.timeoutMs,
      compression: config.compression,
      customTransport: this.transport !== undefined,
      customHeaders: Object.keys(config.headers).filter(
        (name) => name.toLowerCase() !== 'authorization',
      ),
    });
    return new LangfuseExporter(config, transport, { diagnostics: this.diagnostics });
  }
}

/**
 * Exporter for an explicit host and key pair. Unset options still fall back to
 * the environment.
 */
export function exporter(host: string, publicKey: string, secretKey: string): LangfuseExporter {
  return new ExporterBuilder().withHost(host).withCredentials(publicKey, secretKey).build();
}

/**
 * Exporter configured entirely from the environment.
 */
export function exporterFromEnv(env?: EnvSource): LangfuseExporter {
  return ExporterBuilder.fromEnvironment(env).build();
}

