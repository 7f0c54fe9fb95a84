/** Bad user input; the run stops before any page is fetched. */
export class InvalidInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

export class MalformedItemError extends Error {
  readonly raw: unknown;
  readonly pageNumber?: number;

  constructor(message: string, raw: unknown, pageNumber?: number) {
    super(message);
    this.name = 'MalformedItemError';
    this.raw = raw;
    this.pageNumber = pageNumber;
  }

  /** Copy of this error tagged with the page it came from. */
  onPage(pageNumber: number): MalformedItemError {
    return new MalformedItemError(this.message, this.raw, pageNumber);
  }

  describeItem(): string {
    if (typeof this.raw === 'object' && this.raw !== null && 'id' in this.raw) {
      const id = this.raw.id;
      if (typeof id === 'number' || typeof id === 'string') {
        return `item ${id}`;
      }
    }
    return 'item without id';
  }
}

export class PageFetchError extends Error {
  readonly pageNumber: number;
  readonly attempts: number;

  constructor(pageNumber: number, attempts: number, cause: unknown) {
    super(`Page ${pageNumber} failed after ${attempts} attempt(s): ${getErrorMessage(cause)}`, { cause });
    this.name = 'PageFetchError';
    this.pageNumber = pageNumber;
    this.attempts = attempts;
  }
}

export type PartialResultReason = 'fetch_failed' | 'page_limit' | 'interrupted';

/**
 * Returned, never thrown: the extraction stopped before upstream was
 * exhausted, but the records gathered so far are kept.
 */
export class PartialResultWarning extends Error {
  readonly reason: PartialResultReason;
  readonly lastPage: number;

  constructor(reason: PartialResultReason, lastPage: number, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'PartialResultWarning';
    this.reason = reason;
    this.lastPage = lastPage;
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export class PageDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PageDecodeError';
  }
}
