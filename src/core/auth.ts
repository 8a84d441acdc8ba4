import { encodeBase64, encodeUtf8 } from './encoding';
import { findHeader, normalizeValue, type LangfuseEnvironment } from './env';
import { LangfuseConfigError } from './errors';
import type { CredentialSource, RawConfig } from './types';

export type CredentialCandidate =
  | { source: CredentialSource; kind: 'key-pair'; publicKey: string; secretKey: string }
  | { source: CredentialSource; kind: 'header'; value: string };

export interface ResolvedAuthorization {
  source: CredentialSource;
  value: string;
}

export interface CredentialHeaders {
  /**
   * Parsed `OTEL_EXPORTER_OTLP_TRACES_HEADERS`.
   */
  traces: Record<string, string>;
  /**
   * Parsed `OTEL_EXPORTER_OTLP_HEADERS`.
   */
  generic: Record<string, string>;
}

/**
 * Key pairs that had only one half set. They never yield credentials.
 */
export type PartialKeyPair = 'explicit-key-pair' | 'backend-env-key-pair';

const precedence: Record<CredentialSource, number> = {
  'explicit-key-pair': 0,
  'explicit-header': 1,
  'backend-env-key-pair': 2,
  'generic-env-traces-header': 3,
  'generic-env-header': 4,
};

export function buildBasicAuth(publicKey: string, secretKey: string): string {
  return `Basic ${encodeBase64(encodeUtf8(`${publicKey}:${secretKey}`))}`;
}

/**
 * Gathers every usable credential, ordered from highest to lowest precedence.
 */
export function collectCredentials(
  raw: RawConfig,
  env: LangfuseEnvironment,
  headers: CredentialHeaders,
  onPartialKeyPair?: (source: PartialKeyPair) => void,
): CredentialCandidate[] {
  const candidates: CredentialCandidate[] = [];

  const explicitPair = keyPair(raw.publicKey, raw.secretKey);
  if (explicitPair) {
    candidates.push({ source: 'explicit-key-pair', kind: 'key-pair', ...explicitPair });
  } else if (normalizeValue(raw.publicKey) || normalizeValue(raw.secretKey)) {
    onPartialKeyPair?.('explicit-key-pair');
  }

  const explicitHeader = normalizeValue(findHeader(raw.headers ?? {}, 'authorization'));
  if (explicitHeader) {
    candidates.push({ source: 'explicit-header', kind: 'header', value: explicitHeader });
  }

  const envPair = keyPair(env.publicKey, env.secretKey);
  if (envPair) {
    candidates.push({ source: 'backend-env-key-pair', kind: 'key-pair', ...envPair });
  } else if (env.publicKey || env.secretKey) {
    onPartialKeyPair?.('backend-env-key-pair');
  }

  const tracesHeader = normalizeValue(findHeader(headers.traces, 'authorization'));
  if (tracesHeader) {
    candidates.push({ source: 'generic-env-traces-header', kind: 'header', value: tracesHeader });
  }

  const genericHeader = normalizeValue(findHeader(headers.generic, 'authorization'));
  if (genericHeader) {
    candidates.push({ source: 'generic-env-header', kind: 'header', value: genericHeader });
  }

  return candidates.sort((a, b) => precedence[a.source] - precedence[b.source]);
}

/**
 * Reduces the candidates to the single `Authorization` value that wins.
 */
export function composeAuthorization(candidates: CredentialCandidate[]): ResolvedAuthorization {
  let winner: CredentialCandidate | undefined;
  for (const candidate of candidates) {
    if (!winner || precedence[candidate.source] < precedence[winner.source]) {
      winner = candidate;
    }
  }

  if (!winner) {
    throw new LangfuseConfigError(
      'MISSING_CREDENTIALS',
      'credentials are required (call withCredentials, set an Authorization header, or set LANGFUSE_PUBLIC_KEY and LANGFUSE_SECRET_KEY)',
    );
  }

  if (winner.kind === 'key-pair') {
    return { source: winner.source, value: buildBasicAuth(winner.publicKey, winner.secretKey) };
  }
  return { source: winner.source, value: winner.value };
}

function keyPair(
  publicKey: string | undefined,
  secretKey: string | undefined,
): { publicKey: string; secretKey: string } | undefined {
  const pk = normalizeValue(publicKey);
  const sk = normalizeValue(secretKey);
  if (!pk || !sk) {
    return undefined;
  }
  return { publicKey: pk, secretKey: sk };
}
