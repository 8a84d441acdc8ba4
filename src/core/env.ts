import {
  ENV_LANGFUSE_HOST,
  ENV_LANGFUSE_PUBLIC_KEY,
  ENV_LANGFUSE_SECRET_KEY,
  ENV_OTLP_COMPRESSION,
  ENV_OTLP_ENDPOINT,
  ENV_OTLP_HEADERS,
  ENV_OTLP_TIMEOUT,
  ENV_OTLP_TRACES_ENDPOINT,
  ENV_OTLP_TRACES_HEADERS,
} from './constants';
import { decodePercent } from './encoding';

export type EnvSource = Readonly<Record<string, string | undefined>>;

/**
 * Snapshot of every environment variable the exporter consumes. Values are
 * trimmed; blank values are absent.
 */
export interface LangfuseEnvironment {
  readonly publicKey?: string;
  readonly secretKey?: string;
  readonly host?: string;
  readonly otlpEndpoint?: string;
  readonly otlpTracesEndpoint?: string;
  readonly otlpHeaders?: string;
  readonly otlpTracesHeaders?: string;
  readonly otlpTimeout?: string;
  readonly otlpCompression?: string;
}

export function processEnv(): EnvSource {
  return typeof process !== 'undefined' && process.env ? process.env : {};
}

export function readEnvironment(env: EnvSource = processEnv()): LangfuseEnvironment {
  return Object.freeze({
    publicKey: readVar(env, ENV_LANGFUSE_PUBLIC_KEY),
    secretKey: readVar(env, ENV_LANGFUSE_SECRET_KEY),
    host: readVar(env, ENV_LANGFUSE_HOST),
    otlpEndpoint: readVar(env, ENV_OTLP_ENDPOINT),
    otlpTracesEndpoint: readVar(env, ENV_OTLP_TRACES_ENDPOINT),
    otlpHeaders: readVar(env, ENV_OTLP_HEADERS),
    otlpTracesHeaders: readVar(env, ENV_OTLP_TRACES_HEADERS),
    otlpTimeout: readVar(env, ENV_OTLP_TIMEOUT),
    otlpCompression: readVar(env, ENV_OTLP_COMPRESSION),
  });
}

function readVar(env: EnvSource, name: string): string | undefined {
  return normalizeValue(env[name]);
}

export function normalizeValue(value: string | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
}

export interface ParsedHeaders {
  headers: Record<string, string>;
  /**
   * Entries that were dropped because they had no `=` or an empty key.
   */
  rejected: string[];
}

/**
 * Parses an OTLP headers variable (`key1=value1,key2=value2`). Keys and values
 * are trimmed and values percent-decoded.
 */
export function parseOtlpHeaders(raw: string | undefined): ParsedHeaders {
  const headers: Record<string, string> = {};
  const rejected: string[] = [];
  if (!raw) {
    return { headers, rejected };
  }

  for (const entry of raw.split(',')) {
    if (!entry.trim()) {
      continue;
    }
    const separator = entry.indexOf('=');
    if (separator === -1) {
      rejected.push(entry.trim());
      continue;
    }
    const key = entry.slice(0, separator).trim();
    if (!key) {
      rejected.push(entry.trim());
      continue;
    }
    headers[key] = decodePercent(entry.slice(separator + 1).trim()).trim();
  }

  return { headers, rejected };
}

export function findHeader(headers: Record<string, string>, name: string): string | undefined {
  const target = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === target) {
      return value;
    }
  }
  return undefined;
}

export function withoutHeader(
  headers: Record<string, string>,
  name: string,
): Record<string, string> {
  const target = name.toLowerCase();
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() !== target) {
      result[key] = value;
    }
  }
  return result;
}
