export const ENV_LANGFUSE_PUBLIC_KEY = 'LANGFUSE_PUBLIC_KEY';
export const ENV_LANGFUSE_SECRET_KEY = 'LANGFUSE_SECRET_KEY';
export const ENV_LANGFUSE_HOST = 'LANGFUSE_HOST';

export const ENV_OTLP_ENDPOINT = 'OTEL_EXPORTER_OTLP_ENDPOINT';
export const ENV_OTLP_TRACES_ENDPOINT = 'OTEL_EXPORTER_OTLP_TRACES_ENDPOINT';
export const ENV_OTLP_HEADERS = 'OTEL_EXPORTER_OTLP_HEADERS';
export const ENV_OTLP_TRACES_HEADERS = 'OTEL_EXPORTER_OTLP_TRACES_HEADERS';
export const ENV_OTLP_TIMEOUT = 'OTEL_EXPORTER_OTLP_TIMEOUT';
export const ENV_OTLP_COMPRESSION = 'OTEL_EXPORTER_OTLP_COMPRESSION';

export const DEFAULT_LANGFUSE_HOST = 'https://cloud.langfuse.com';

export const LANGFUSE_TRACES_PATH = '/api/public/otel/v1/traces';
export const LANGFUSE_LEGACY_TRACES_PATH = '/api/public/otel';
export const OTLP_TRACES_PATH = '/v1/traces';

export const DEFAULT_TIMEOUT_MS = 10_000;

export const SDK_NAME = 'langfuse-otlp-exporter';
export const SDK_VERSION = '0.1.0';
