import { createErrorResponse, type WebClientErrorResponse } from './types';

/** Error codes (and names) that mean the request ran out of time. */
const TIMEOUT_MARKERS = new Set([
  'ECONNABORTED',
  'ETIMEDOUT',
  'ESOCKETTIMEDOUT',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
  'TimeoutError',
]);

export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function errorName(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'name' in error && typeof error.name === 'string') {
    return error.name;
  }
  return undefined;
}

function errorCause(error: unknown): unknown {
  if (typeof error === 'object' && error !== null && 'cause' in error) {
    return error.cause;
  }
  return undefined;
}

/** The error and its `cause` chain, outermost first. */
function causeChain(error: unknown): unknown[] {
  const chain: unknown[] = [];
  let current: unknown = error;

  while (current !== undefined && current !== null && chain.length < 10 && !chain.includes(current)) {
    chain.push(current);
    current = errorCause(current);
  }

  return chain;
}

function describe(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message || (errorName(error) ?? '');
  }
  return String(error);
}

export function isTimeoutError(error: unknown): boolean {
  return causeChain(error).some((entry) => {
    const code = errorCode(entry);
    const name = errorName(entry);
    return (code !== undefined && TIMEOUT_MARKERS.has(code)) || (name !== undefined && TIMEOUT_MARKERS.has(name));
  });
}

/**
 * Map a thrown transport error to an error response. Timeouts are retryable;
 * connection, DNS and every other failure are not.
 */
export function classifyTransportError(error: unknown): WebClientErrorResponse {
  const message = causeChain(error)
    .map(describe)
    .filter((part, index, parts) => part !== '' && parts.indexOf(part) === index)
    .join(': ');

  return createErrorResponse(message, isTimeoutError(error));
}
