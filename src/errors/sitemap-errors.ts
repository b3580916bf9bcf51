import type { ZodIssue } from 'zod';

export class ValidationError extends Error {
  readonly code = 'VALIDATION_ERROR';

  constructor(
    public readonly value: string,
    message: string
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class GunzipError extends Error {
  readonly code = 'GUNZIP_ERROR';

  constructor(
    public readonly url: string,
    public readonly originalError: Error
  ) {
    super(`Unable to gunzip response from ${url}: ${originalError.message}`);
    this.name = 'GunzipError';
  }
}

export class ConfigError extends Error {
  readonly code = 'CONFIG_ERROR';

  constructor(
    message: string,
    public readonly issues: ZodIssue[] = []
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
