export type ErrorKind = 'fatal' | 'partial' | 'transient';

export class DigestError extends Error {
  readonly kind: ErrorKind;

  constructor(message: string, kind: ErrorKind, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

export class ConfigError extends DigestError {
  readonly missing: string[];

  constructor(message: string, missing: string[] = []) {
    super(message, 'fatal');
    this.missing = missing;
  }
}

export class CatalogAuthError extends DigestError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'fatal', options);
  }
}

export class SummaryError extends DigestError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'partial', options);
  }
}

export class DispatchError extends DigestError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'fatal', options);
  }
}

export class MailAuthError extends DispatchError {}

export class MailRejectedError extends DispatchError {}

const NETWORK_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'ESOCKETTIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
  'ENOTFOUND',
  'ECONNABORTED',
]);

function readProperty(value: unknown, key: string): unknown {
  if (typeof value !== 'object' || value === null || !(key in value)) return undefined;
  return Reflect.get(value, key);
}

/**
 * HTTP status carried by an API client error. Gemini errors expose `status`,
 * googleapis errors expose `status` or `response.status` (and a numeric `code`).
 */
export function getHttpStatus(error: unknown): number | undefined {
  const candidates = [
    readProperty(error, 'status'),
    readProperty(readProperty(error, 'response'), 'status'),
    readProperty(error, 'code'),
  ];
  for (const candidate of candidates) {
    if (typeof candidate === 'number' && candidate >= 100 && candidate < 600) {
      return candidate;
    }
  }
  return undefined;
}

export function getErrorCode(error: unknown): string | undefined {
  const code = readProperty(error, 'code');
  return typeof code === 'string' ? code : undefined;
}

/** Reasons listed in a Google API error body (`errors[].reason`). */
export function getErrorReasons(error: unknown): string[] {
  const errors = readProperty(error, 'errors');
  if (!Array.isArray(errors)) return [];
  return errors
    .map((entry: unknown) => readProperty(entry, 'reason'))
    .filter((reason): reason is string => typeof reason === 'string');
}

export function isTransientError(error: unknown): boolean {
  const status = getHttpStatus(error);
  if (status !== undefined) {
    return status === 429 || status >= 500;
  }

  const code = getErrorCode(error);
  if (code && NETWORK_CODES.has(code)) return true;

  if (!(error instanceof Error)) return false;
  const message = error.message.toLowerCase();
  return (
    message.includes('fetch failed') ||
    message.includes('network') ||
    message.includes('timeout') ||
    message.includes('econnreset') ||
    message.includes('econnrefused') ||
    message.includes('socket hang up')
  );
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function getErrorDetail(error: Error): string {
  const parts: string[] = [error.message];

  const cause = error.cause;
  if (cause instanceof Error) {
    parts.push(`[cause: ${cause.message}]`);
    const deepCause = cause.cause;
    if (deepCause instanceof Error) {
      parts.push(`[root: ${deepCause.message}]`);
    }
  } else if (cause) {
    parts.push(`[cause: ${String(cause)}]`);
  }

  const code = getErrorCode(error);
  if (code) {
    parts.push(`[code: ${code}]`);
  }

  return parts.join(' ');
}
