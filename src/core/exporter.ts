import { ExportResultCode, type ExportResult } from '@opentelemetry/core';
import type { ReadableSpan, SpanExporter } from '@opentelemetry/sdk-trace-base';
import { defaultDiagnostics, log, type Diagnostics } from './logger';
import { RuntimeGuard } from './runtime_guard';
import type { ExporterConfig } from './types';

export interface LangfuseExporterOptions {
  guard?: RuntimeGuard;
  diagnostics?: Diagnostics;
}

/**
 * Span exporter handed to a span processor. Every call into the transport
 * runs through a {@link RuntimeGuard}.
 */
export class LangfuseExporter implements SpanExporter {
  readonly config: ExporterConfig;
  private readonly transport: SpanExporter;
  private readonly guard: RuntimeGuard;
  private readonly diagnostics: Diagnostics;

  constructor(config: ExporterConfig, transport: SpanExporter, options: LangfuseExporterOptions = {}) {
    this.config = config;
    this.transport = transport;
    this.guard = options.guard ?? new RuntimeGuard();
    this.diagnostics = options.diagnostics ?? defaultDiagnostics;
  }

  export(spans: ReadableSpan[], resultCallback: (result: ExportResult) => void): void {
    try {
      this.guard.run('export', () => this.transport.export(spans, resultCallback));
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      log(this.diagnostics, 'error', 'langfuse: export failed before dispatch', {
        error: error.message,
        spans: spans.length,
      });
      resultCallback({ code: ExportResultCode.FAILED, error });
    }
  }

  shutdown(): Promise<void> {
    return this.guarded('shutdown', () => this.transport.shutdown());
  }

  forceFlush(): Promise<void> {
    return this.guarded('forceFlush', () =>
      this.transport.forceFlush ? this.transport.forceFlush() : Promise.resolve(),
    );
  }

  private guarded(operation: string, fn: () => Promise<void>): Promise<void> {
    try {
      return this.guard.run(operation, fn);
    } catch (err) {
      return Promise.reject(err);
    }
  }
}
