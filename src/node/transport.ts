import { OTLPExporterBase } from '@opentelemetry/otlp-exporter-base';
import { createOtlpHttpExportDelegate } from '@opentelemetry/otlp-exporter-base/node-http';
import { ProtobufTraceSerializer } from '@opentelemetry/otlp-transformer';
import type { ReadableSpan, SpanExporter } from '@opentelemetry/sdk-trace-base';
import { LangfuseConfigError, type ExporterConfig, type ResolvedConfig } from '../core/index';

const PROTOBUF_CONTENT_TYPE = 'application/x-protobuf';
const CONCURRENCY_LIMIT = 30;

/**
 * OTLP/HTTP protobuf span exporter driven only by a resolved configuration.
 *
 * The export delegate is given a complete configuration, so none of the OTLP
 * library's `OTEL_EXPORTER_OTLP_*` lookups take part.
 */
export class OtlpProtoTransport extends OTLPExporterBase<ReadableSpan[]> implements SpanExporter {
  constructor(config: ExporterConfig) {
    const headers = Object.freeze({ ...config.headers, 'Content-Type': PROTOBUF_CONTENT_TYPE });
    super(
      createOtlpHttpExportDelegate(
        {
          url: config.endpoint,
          headers: () => ({ ...headers }),
          agentOptions: { ...config.httpClient },
          timeoutMillis: config.timeoutMs,
          concurrencyLimit: CONCURRENCY_LIMIT,
          compression: config.compression,
        },
        ProtobufTraceSerializer,
      ),
    );
  }
}

/**
 * Creates the OTLP/HTTP protobuf transport for a resolved configuration.
 */
export function createTransport(config: ResolvedConfig): SpanExporter {
  const httpClient = config.httpClient;
  if (!httpClient) {
    throw new LangfuseConfigError(
      'NO_HTTP_CLIENT',
      'an HTTP client is required to create the OTLP transport',
    );
  }

  return new OtlpProtoTransport({ ...config, httpClient });
}
