import assert from 'node:assert/strict';
import test from 'node:test';
import { resolveConfig } from './config';
import { readEnvironment } from './env';
import { LangfuseConfigError } from './errors';
import type { Diagnostics } from './logger';
import type { Logger, RawConfig } from './types';

const basicPkSk = `Basic ${Buffer.from('pk:sk').toString('base64')}`;

type LogEntry = { level: string; msg: string; fields?: Record<string, unknown> };

function createRecordingDiagnostics(entries: LogEntry[]): Diagnostics {
  const logger: Logger = {
    debug: (msg, fields) => entries.push({ level: 'debug', msg, fields }),
    info: (msg, fields) => entries.push({ level: 'info', msg, fields }),
    warn: (msg, fields) => entries.push({ level: 'warn', msg, fields }),
    error: (msg, fields) => entries.push({ level: 'error', msg, fields }),
  };
  return { logger, logLevel: 'debug' };
}

function isConfigError(code: LangfuseConfigError['code']) {
  return (err: unknown) => err instanceof LangfuseConfigError && err.code === code;
}

test('resolveConfig composes endpoint and auth from Langfuse variables', () => {
  const cfg = resolveConfig(
    {},
    readEnvironment({
      LANGFUSE_HOST: 'https://example.com',
      LANGFUSE_PUBLIC_KEY: 'pk',
      LANGFUSE_SECRET_KEY: 'sk',
    }),
  );

  assert.equal(cfg.endpoint, 'https://example.com/api/public/otel/v1/traces');
  assert.equal(cfg.authorization, basicPkSk);
  assert.deepEqual(cfg.headers, { Authorization: basicPkSk });
});

test('resolveConfig appends /v1/traces to OTEL_EXPORTER_OTLP_ENDPOINT', () => {
  const cfg = resolveConfig(
    {},
    readEnvironment({
      OTEL_EXPORTER_OTLP_ENDPOINT: 'https://h/api/public/otel',
      OTEL_EXPORTER_OTLP_HEADERS: 'Authorization=Basic%20dGVzdDp0ZXN0',
    }),
  );

  assert.equal(cfg.endpoint, 'https://h/api/public/otel/v1/traces');
  assert.equal(cfg.authorization, 'Basic dGVzdDp0ZXN0');
});

test('resolveConfig prefers LANGFUSE_HOST over OTEL_EXPORTER_OTLP_ENDPOINT', () => {
  const cfg = resolveConfig(
    { publicKey: 'pk', secretKey: 'sk' },
    readEnvironment({
      LANGFUSE_HOST: 'https://langfuse.example.test',
      OTEL_EXPORTER_OTLP_ENDPOINT: 'https://collector.example.test',
    }),
  );

  assert.equal(cfg.endpoint, 'https://langfuse.example.test/api/public/otel/v1/traces');
});

test('resolveConfig prefers an explicit host over the environment', () => {
  const cfg = resolveConfig(
    { host: 'https://explicit.example.test/', publicKey: 'pk', secretKey: 'sk' },
    readEnvironment({ LANGFUSE_HOST: 'https://env.example.test' }),
  );

  assert.equal(cfg.endpoint, 'https://explicit.example.test/api/public/otel/v1/traces');
});

test('resolveConfig defaults to Langfuse Cloud', () => {
  const cfg = resolveConfig({ publicKey: 'pk', secretKey: 'sk' }, readEnvironment({}));

  assert.equal(cfg.endpoint, 'https://cloud.langfuse.com/api/public/otel/v1/traces');
  assert.equal(cfg.timeoutMs, 10_000);
  assert.equal(cfg.compression, 'none');
  assert.equal(cfg.httpClient, undefined);
});

test('resolveConfig derives auth from the key pair when a header is also given', () => {
  const cfg = resolveConfig(
    { publicKey: 'pk', secretKey: 'sk', headers: { Authorization: 'Bearer other' } },
    readEnvironment({}),
  );

  assert.equal(cfg.authorization, basicPkSk);
  assert.deepEqual(cfg.headers, { Authorization: basicPkSk });
});

test('resolveConfig fails with MISSING_CREDENTIALS when nothing supplies auth', () => {
  assert.throws(
    () => resolveConfig({}, readEnvironment({ LANGFUSE_HOST: 'https://example.com' })),
    isConfigError('MISSING_CREDENTIALS'),
  );
});

test('resolveConfig fails with INVALID_ENDPOINT for a malformed host', () => {
  assert.throws(
    () =>
      resolveConfig(
        { publicKey: 'pk', secretKey: 'sk' },
        readEnvironment({ LANGFUSE_HOST: 'example.com' }),
      ),
    isConfigError('INVALID_ENDPOINT'),
  );
});

test('resolveConfig merges headers from every layer', () => {
  const cfg = resolveConfig(
    {
      publicKey: 'pk',
      secretKey: 'sk',
      headers: { 'x-team': 'explicit', 'x-only-explicit': '1' },
    },
    readEnvironment({
      OTEL_EXPORTER_OTLP_HEADERS: 'x-team=generic,x-region=eu,Authorization=Basic generic',
      OTEL_EXPORTER_OTLP_TRACES_HEADERS: 'x-region=us,authorization=Basic traces',
    }),
  );

  assert.deepEqual(cfg.headers, {
    'x-team': 'explicit',
    'x-region': 'us',
    'x-only-explicit': '1',
    Authorization: basicPkSk,
  });
});

test('resolveConfig uses an explicit timeout', () => {
  const cfg = resolveConfig(
    { publicKey: 'pk', secretKey: 'sk', timeoutMs: 2500 },
    readEnvironment({ OTEL_EXPORTER_OTLP_TIMEOUT: '7000' }),
  );

  assert.equal(cfg.timeoutMs, 2500);
});

test('resolveConfig reads OTEL_EXPORTER_OTLP_TIMEOUT in milliseconds', () => {
  const cfg = resolveConfig(
    { publicKey: 'pk', secretKey: 'sk' },
    readEnvironment({ OTEL_EXPORTER_OTLP_TIMEOUT: ' 7000 ' }),
  );

  assert.equal(cfg.timeoutMs, 7000);
});

test('resolveConfig accepts exponent notation in OTEL_EXPORTER_OTLP_TIMEOUT', () => {
  const cfg = resolveConfig(
    { publicKey: 'pk', secretKey: 'sk' },
    readEnvironment({ OTEL_EXPORTER_OTLP_TIMEOUT: '1e4' }),
  );

  assert.equal(cfg.timeoutMs, 10_000);
});

test('resolveConfig rejects non-positive or non-numeric timeouts', () => {
  const pair = { publicKey: 'pk', secretKey: 'sk' };
  assert.throws(
    () => resolveConfig({ ...pair, timeoutMs: 0 }, readEnvironment({})),
    isConfigError('INVALID_TIMEOUT'),
  );
  assert.throws(
    () => resolveConfig({ ...pair, timeoutMs: -5 }, readEnvironment({})),
    isConfigError('INVALID_TIMEOUT'),
  );
  assert.throws(
    () => resolveConfig({ ...pair, timeoutMs: Number.NaN }, readEnvironment({})),
    isConfigError('INVALID_TIMEOUT'),
  );
  assert.throws(
    () => resolveConfig(pair, readEnvironment({ OTEL_EXPORTER_OTLP_TIMEOUT: '10s' })),
    isConfigError('INVALID_TIMEOUT'),
  );
  assert.throws(
    () => resolveConfig(pair, readEnvironment({ OTEL_EXPORTER_OTLP_TIMEOUT: '0' })),
    isConfigError('INVALID_TIMEOUT'),
  );
});

test('resolveConfig ignores OTEL_EXPORTER_OTLP_COMPRESSION and warns', () => {
  const entries: LogEntry[] = [];
  const cfg = resolveConfig(
    { publicKey: 'pk', secretKey: 'sk' },
    readEnvironment({ OTEL_EXPORTER_OTLP_COMPRESSION: 'gzip' }),
    createRecordingDiagnostics(entries),
  );

  assert.equal(cfg.compression, 'none');
  const warning = entries.find((entry) => entry.level === 'warn');
  assert.equal(
    warning?.msg,
    'langfuse: OTEL_EXPORTER_OTLP_COMPRESSION is not supported and was ignored',
  );
  assert.deepEqual(warning?.fields, { value: 'gzip', compression: 'none' });
});

test('resolveConfig passes explicit gzip compression through', () => {
  const cfg = resolveConfig(
    { publicKey: 'pk', secretKey: 'sk', compression: 'gzip' },
    readEnvironment({}),
  );

  assert.equal(cfg.compression, 'gzip');
});

test('resolveConfig rejects unknown compression kinds', () => {
  const raw: RawConfig = JSON.parse('{"publicKey":"pk","secretKey":"sk","compression":"brotli"}');
  assert.throws(
    () => resolveConfig(raw, readEnvironment({})),
    isConfigError('UNSUPPORTED_COMPRESSION'),
  );
});

test('resolveConfig warns about malformed header entries without logging them', () => {
  const entries: LogEntry[] = [];
  resolveConfig(
    { publicKey: 'pk', secretKey: 'sk' },
    readEnvironment({ OTEL_EXPORTER_OTLP_HEADERS: 'secret-without-separator' }),
    createRecordingDiagnostics(entries),
  );

  const warning = entries.find((entry) => entry.level === 'warn');
  assert.equal(warning?.msg, 'langfuse: ignoring malformed entries in OTEL_EXPORTER_OTLP_HEADERS');
  assert.deepEqual(warning?.fields, { entries: 1 });
});

test('resolveConfig logs the resolved sources without secrets', () => {
  const entries: LogEntry[] = [];
  resolveConfig(
    {},
    readEnvironment({
      LANGFUSE_HOST: 'https://example.com',
      LANGFUSE_PUBLIC_KEY: 'pk',
      LANGFUSE_SECRET_KEY: 'sk',
    }),
    createRecordingDiagnostics(entries),
  );

  const debug = entries.find((entry) => entry.level === 'debug');
  assert.deepEqual(debug?.fields, {
    endpoint: 'https://example.com/api/public/otel/v1/traces',
    endpointSource: 'backend-env-host',
    credentialSource: 'backend-env-key-pair',
    timeoutMs: 10_000,
    compression: 'none',
  });
});

test('resolveConfig returns a frozen record', () => {
  const cfg = resolveConfig({ publicKey: 'pk', secretKey: 'sk' }, readEnvironment({}));

  assert.ok(Object.isFrozen(cfg));
  assert.ok(Object.isFrozen(cfg.headers));
});
