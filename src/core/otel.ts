import { diag, type Context } from '@opentelemetry/api';
import {
  AlwaysOnSampler,
  BasicTracerProvider,
  BatchSpanProcessor,
  type ReadableSpan,
  SimpleSpanProcessor,
  type Span as SDKSpan,
  type SpanExporter,
  type SpanProcessor,
} from '@opentelemetry/sdk-trace-base';
import { resourceFromAttributes } from '@opentelemetry/resources';
import {
  ATTR_SERVICE_NAME,
  ATTR_SERVICE_VERSION,
  ATTR_TELEMETRY_SDK_LANGUAGE,
  ATTR_TELEMETRY_SDK_NAME,
  ATTR_TELEMETRY_SDK_VERSION,
} from '@opentelemetry/semantic-conventions';
import { SDK_NAME, SDK_VERSION } from './constants';
import type { TraceAttributeContext } from './context';
import { LangfuseExporter } from './exporter';

export interface BatchOptions {
  maxQueueSize: number;
  maxExportBatchSize: number;
  scheduledDelayMillis: number;
  exportTimeoutMillis: number;
}

export interface TracerProviderOptions {
  serviceName: string;
  serviceVersion?: string;
  spanProcessor?: 'simple' | 'batch';
  batch?: Partial<BatchOptions>;
  /**
   * Trace attributes stamped onto every span when it starts.
   */
  context?: TraceAttributeContext;
}

const defaultBatch: BatchOptions = {
  maxQueueSize: 2048,
  maxExportBatchSize: 512,
  scheduledDelayMillis: 5_000,
  exportTimeoutMillis: 30_000,
};

/**
 * Builds a tracer provider that exports through `exporter`. The provider is
 * returned, never registered globally.
 */
export function createTracerProvider(
  exporter: SpanExporter,
  options: TracerProviderOptions,
): BasicTracerProvider {
  if (exporter instanceof LangfuseExporter && exporter.config.endpoint.startsWith('http://')) {
    diag.warn('langfuse: OTLP endpoint uses plaintext HTTP');
  }

  const resource = resourceFromAttributes({
    [ATTR_SERVICE_NAME]: options.serviceName,
    ...(options.serviceVersion ? { [ATTR_SERVICE_VERSION]: options.serviceVersion } : {}),
    [ATTR_TELEMETRY_SDK_LANGUAGE]: 'nodejs',
    [ATTR_TELEMETRY_SDK_NAME]: SDK_NAME,
    [ATTR_TELEMETRY_SDK_VERSION]: SDK_VERSION,
  });

  const spanProcessor = createSpanProcessor(
    options.spanProcessor ?? 'batch',
    exporter,
    options.batch,
  );
  const spanProcessors = options.context
    ? [new ContextSpanProcessor(options.context, spanProcessor)]
    : [spanProcessor];

  return new BasicTracerProvider({
    resource,
    sampler: new AlwaysOnSampler(),
    spanProcessors,
  });
}

/**
 * Stamps trace attributes onto each span at start, then delegates.
 */
export class ContextSpanProcessor implements SpanProcessor {
  private readonly context: TraceAttributeContext;
  private readonly next: SpanProcessor;

  constructor(context: TraceAttributeContext, next: SpanProcessor) {
    this.context = context;
    this.next = next;
  }

  forceFlush(): Promise<void> {
    return this.next.forceFlush();
  }

  onStart(span: SDKSpan, parentContext: Context): void {
    this.context.applyTo(span);
    this.next.onStart(span, parentContext);
  }

  onEnd(span: ReadableSpan): void {
    this.next.onEnd(span);
  }

  shutdown(): Promise<void> {
    return this.next.shutdown();
  }
}

function createSpanProcessor(
  mode: 'simple' | 'batch',
  exporter: SpanExporter,
  batch: Partial<BatchOptions> | undefined,
): SpanProcessor {
  if (mode === 'simple') {
    return new SimpleSpanProcessor(exporter);
  }

  return new BatchSpanProcessor(exporter, { ...defaultBatch, ...batch });
}
