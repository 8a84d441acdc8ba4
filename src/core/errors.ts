export type LangfuseConfigErrorCode =
  | 'INVALID_ENDPOINT'
  | 'MISSING_CREDENTIALS'
  | 'INVALID_TIMEOUT'
  | 'NO_HTTP_CLIENT'
  | 'UNSUPPORTED_COMPRESSION';

export class LangfuseConfigError extends Error {
  code: LangfuseConfigErrorCode;

  constructor(code: LangfuseConfigErrorCode, message: string) {
    super(message);
    this.name = 'LangfuseConfigError';
    this.code = code;
  }
}
