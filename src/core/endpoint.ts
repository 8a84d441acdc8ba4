import {
  DEFAULT_LANGFUSE_HOST,
  LANGFUSE_LEGACY_TRACES_PATH,
  LANGFUSE_TRACES_PATH,
  OTLP_TRACES_PATH,
} from './constants';
import { normalizeValue, type LangfuseEnvironment } from './env';
import { LangfuseConfigError } from './errors';
import type { EndpointSource, RawConfig } from './types';

export interface EndpointCandidate {
  source: EndpointSource;
  value: string;
}

export interface ComposeEndpointOptions {
  legacyPath?: boolean;
}

/**
 * Picks the highest-precedence endpoint source that has a value.
 */
export function selectEndpoint(
  explicit: Pick<RawConfig, 'endpoint' | 'host'>,
  env: LangfuseEnvironment,
): EndpointCandidate {
  const endpoint = normalizeValue(explicit.endpoint);
  if (endpoint) {
    return { source: 'explicit-endpoint', value: endpoint };
  }
  const host = normalizeValue(explicit.host);
  if (host) {
    return { source: 'explicit-host', value: host };
  }
  if (env.host) {
    return { source: 'backend-env-host', value: env.host };
  }
  if (env.otlpTracesEndpoint) {
    return { source: 'generic-env-traces-endpoint', value: env.otlpTracesEndpoint };
  }
  if (env.otlpEndpoint) {
    return { source: 'generic-env-base-endpoint', value: env.otlpEndpoint };
  }
  return { source: 'default', value: DEFAULT_LANGFUSE_HOST };
}

/**
 * Turns a base URL into the final traces endpoint using the rule that belongs
 * to its source. Exactly one rule applies per call.
 */
export function composeEndpoint(
  base: string,
  source: EndpointSource,
  options: ComposeEndpointOptions = {},
): string {
  const endpoint = applyRule(base.trim(), source, options);
  assertAbsoluteHttpUrl(endpoint, source);
  return endpoint;
}

function applyRule(base: string, source: EndpointSource, options: ComposeEndpointOptions): string {
  switch (source) {
    case 'explicit-host':
    case 'backend-env-host':
    case 'default':
      return appendLangfusePath(base, options.legacyPath ?? false);
    case 'explicit-endpoint':
    case 'generic-env-traces-endpoint':
      return base;
    case 'generic-env-base-endpoint':
      return appendPath(base, OTLP_TRACES_PATH);
  }
}

/**
 * A host already pointing at either Langfuse OTLP path keeps it; a host at the
 * historical root only gains `/v1/traces`.
 */
function appendLangfusePath(base: string, legacyPath: boolean): string {
  const trimmed = trimTrailingSlashes(base);
  if (trimmed.endsWith(LANGFUSE_TRACES_PATH)) {
    return trimmed;
  }
  if (trimmed.endsWith(LANGFUSE_LEGACY_TRACES_PATH)) {
    return legacyPath ? trimmed : `${trimmed}${OTLP_TRACES_PATH}`;
  }
  return `${trimmed}${legacyPath ? LANGFUSE_LEGACY_TRACES_PATH : LANGFUSE_TRACES_PATH}`;
}

function trimTrailingSlashes(value: string): string {
  return value.replace(/\/+$/, '');
}

function appendPath(base: string, path: string): string {
  const withoutTrailingSlash = trimTrailingSlashes(base);
  if (withoutTrailingSlash.endsWith(path)) {
    return withoutTrailingSlash;
  }
  return `${withoutTrailingSlash}${path}`;
}

function assertAbsoluteHttpUrl(endpoint: string, source: EndpointSource): void {
  let url: URL;
  try {
    url = new URL(endpoint);
  } catch {
    throw new LangfuseConfigError(
      'INVALID_ENDPOINT',
      `endpoint from ${source} is not a valid URL: ${endpoint}`,
    );
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new LangfuseConfigError(
      'INVALID_ENDPOINT',
      `endpoint from ${source} must use http or https: ${endpoint}`,
    );
  }
  if (!url.hostname) {
    throw new LangfuseConfigError('INVALID_ENDPOINT', `endpoint from ${source} has no host`);
  }
}
