import { collectCredentials, composeAuthorization } from './auth';
import {
  DEFAULT_TIMEOUT_MS,
  ENV_OTLP_COMPRESSION,
  ENV_OTLP_HEADERS,
  ENV_OTLP_TIMEOUT,
  ENV_OTLP_TRACES_HEADERS,
} from './constants';
import { composeEndpoint, selectEndpoint } from './endpoint';
import {
  parseOtlpHeaders,
  readEnvironment,
  withoutHeader,
  type LangfuseEnvironment,
} from './env';
import { LangfuseConfigError } from './errors';
import { defaultDiagnostics, log, type Diagnostics } from './logger';
import type { Compression, RawConfig, ResolvedConfig } from './types';

const supportedCompression: readonly Compression[] = ['none', 'gzip'];

/**
 * Merges explicit configuration with the environment into one validated,
 * frozen configuration.
 *
 * Precedence for every field is explicit value, then `LANGFUSE_*` variables,
 * then the generic `OTEL_EXPORTER_OTLP_*` variables, then defaults.
 *
 * @throws {LangfuseConfigError} with code `INVALID_ENDPOINT`,
 * `MISSING_CREDENTIALS`, `INVALID_TIMEOUT` or `UNSUPPORTED_COMPRESSION`.
 */
export function resolveConfig(
  raw: RawConfig,
  environment: LangfuseEnvironment = readEnvironment(),
  diagnostics: Diagnostics = defaultDiagnostics,
): ResolvedConfig {
  const candidate = selectEndpoint(raw, environment);
  const endpoint = composeEndpoint(candidate.value, candidate.source, {
    legacyPath: raw.legacyEndpointPath,
  });

  const genericHeaders = parseHeaderVariable(ENV_OTLP_HEADERS, environment.otlpHeaders, diagnostics);
  const tracesHeaders = parseHeaderVariable(
    ENV_OTLP_TRACES_HEADERS,
    environment.otlpTracesHeaders,
    diagnostics,
  );

  const credentials = collectCredentials(
    raw,
    environment,
    { traces: tracesHeaders, generic: genericHeaders },
    (source) => {
      log(diagnostics, 'warn', 'langfuse: ignoring incomplete key pair', { source });
    },
  );
  const authorization = composeAuthorization(credentials);

  const timeoutMs = resolveTimeout(raw.timeoutMs, environment.otlpTimeout);
  const compression = resolveCompression(raw.compression, environment, diagnostics);

  const headers: Record<string, string> = {
    ...withoutHeader(genericHeaders, 'authorization'),
    ...withoutHeader(tracesHeaders, 'authorization'),
    ...withoutHeader(raw.headers ?? {}, 'authorization'),
    Authorization: authorization.value,
  };

  log(diagnostics, 'debug', 'langfuse: exporter configuration resolved', {
    endpoint,
    endpointSource: candidate.source,
    credentialSource: authorization.source,
    timeoutMs,
    compression,
  });

  return Object.freeze({
    endpoint,
    authorization: authorization.value,
    headers: Object.freeze(headers),
    timeoutMs,
    compression,
    httpClient: raw.httpClient,
  });
}

function parseHeaderVariable(
  name: string,
  value: string | undefined,
  diagnostics: Diagnostics,
): Record<string, string> {
  const parsed = parseOtlpHeaders(value);
  if (parsed.rejected.length > 0) {
    log(diagnostics, 'warn', `langfuse: ignoring malformed entries in ${name}`, {
      entries: parsed.rejected.length,
    });
  }
  return parsed.headers;
}

function resolveTimeout(explicit: number | undefined, fromEnv: string | undefined): number {
  if (explicit !== undefined) {
    if (!Number.isFinite(explicit) || explicit <= 0) {
      throw new LangfuseConfigError(
        'INVALID_TIMEOUT',
        'timeout must be a positive number of milliseconds',
      );
    }
    return explicit;
  }

  if (fromEnv !== undefined) {
    const parsed = Number(fromEnv);
    if (!Number.isFinite(parsed) || parsed <= 0) {
      throw new LangfuseConfigError(
        'INVALID_TIMEOUT',
        `${ENV_OTLP_TIMEOUT} must be a positive number of milliseconds, got "${fromEnv}"`,
      );
    }
    return parsed;
  }

  return DEFAULT_TIMEOUT_MS;
}

function resolveCompression(
  explicit: Compression | undefined,
  environment: LangfuseEnvironment,
  diagnostics: Diagnostics,
): Compression {
  if (environment.otlpCompression) {
    log(diagnostics, 'warn', `langfuse: ${ENV_OTLP_COMPRESSION} is not supported and was ignored`, {
      value: environment.otlpCompression,
      compression: explicit ?? 'none',
    });
  }

  if (explicit === undefined) {
    return 'none';
  }
  if (!supportedCompression.includes(explicit)) {
    throw new LangfuseConfigError(
      'UNSUPPORTED_COMPRESSION',
      `compression must be none or gzip, got "${String(explicit)}"`,
    );
  }
  return explicit;
}
