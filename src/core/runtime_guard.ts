import { AsyncLocalStorage } from 'node:async_hooks';
import { context } from '@opentelemetry/api';
import { suppressTracing } from '@opentelemetry/core';

/**
 * Execution scope established for one exporter operation and every async
 * continuation it creates.
 */
export interface ExportScope {
  readonly operation: string;
  readonly startedAtMs: number;
}

/**
 * Runs transport operations inside an active export scope.
 *
 * When a scope is already active (for example `shutdown` flushing pending
 * exports) it is reused. Otherwise a private scope is opened for the call and
 * closed when the call returns; continuations of the call keep it, nothing
 * else sees it. The scope runs with tracing suppressed so the transport's own
 * HTTP requests do not produce spans.
 */
export class RuntimeGuard {
  private readonly storage = new AsyncLocalStorage<ExportScope>();

  isActive(): boolean {
    return this.storage.getStore() !== undefined;
  }

  current(): ExportScope | undefined {
    return this.storage.getStore();
  }

  run<T>(operation: string, fn: () => T): T {
    if (this.isActive()) {
      return fn();
    }
    const scope: ExportScope = Object.freeze({ operation, startedAtMs: Date.now() });
    return this.storage.run(scope, () => context.with(suppressTracing(context.active()), fn));
  }
}
