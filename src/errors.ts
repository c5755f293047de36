import type { PageRequest } from './pageTypes';

export type PagingFailureKind = 'fetch' | 'materialization' | 'misuse';

export abstract class PagingError extends Error {
  abstract readonly kind: PagingFailureKind;
}

// Error codes Node reports for network trouble and timeouts
const TRANSIENT_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
  'ENETUNREACH',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_SOCKET',
]);

export function isTransientError(error: unknown): boolean {
  if (error instanceof FetchFailure) return error.transient;
  if (typeof error !== 'object' || error === null) return false;
  if ('name' in error && error.name === 'TimeoutError') return true;
  return 'code' in error && typeof error.code === 'string' && TRANSIENT_ERROR_CODES.has(error.code);
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * The fetch function supplied to the iterator failed.
 * `transient` separates network trouble and timeouts from requests the store will never accept.
 */
export class FetchFailure extends PagingError {
  readonly kind = 'fetch';
  readonly transient: boolean;
  readonly request: PageRequest | undefined;

  constructor(message: string, options: { transient?: boolean; request?: PageRequest; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'FetchFailure';
    this.transient = options.transient ?? false;
    this.request = options.request;
  }

  /**
   * Returns a FetchFailure as is, wraps anything else with the original error as `cause`.
   */
  static from(error: unknown, request: PageRequest): FetchFailure {
    if (error instanceof FetchFailure) return error;
    return new FetchFailure(`Page fetch failed for index "${request.index}": ${messageOf(error)}`, {
      transient: isTransientError(error),
      request,
      cause: error,
    });
  }
}

/**
 * A raw entry of an otherwise good page could not be turned into a record.
 * The whole raw page travels with the error so nothing is lost from view.
 */
export class MaterializationFailure extends PagingError {
  readonly kind = 'materialization';
  readonly items: readonly unknown[];
  readonly position: number;

  constructor(items: readonly unknown[], position: number, cause: unknown) {
    super(`Failed to materialize entry ${position} of ${items.length}: ${messageOf(cause)}`, { cause });
    this.name = 'MaterializationFailure';
    this.items = items;
    this.position = position;
  }
}

export class MisuseFailure extends PagingError {
  readonly kind = 'misuse';

  constructor(message: string) {
    super(message);
    this.name = 'MisuseFailure';
  }
}
