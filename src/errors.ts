export type ArchivePlotErrorCode = 'decode' | 'fetch' | 'stale-response' | 'invalid-domain';

/**
 * Base class for every error the plot produces on purpose.
 * Programmer errors (bad axis index, bad sizes) stay plain `Error`s.
 */
export class ArchivePlotError extends Error {
  readonly code: ArchivePlotErrorCode;

  constructor(code: ArchivePlotErrorCode, message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = 'ArchivePlotError';
    this.code = code;
    if (options?.cause !== undefined) {
      Object.defineProperty(this, 'cause', { value: options.cause, enumerable: false, configurable: true });
    }
  }
}

/** A raster payload could not be decoded. Recovered by dropping that attribute from the composite. */
export class DecodeError extends ArchivePlotError {
  readonly attribute: string | null;

  constructor(message: string, attribute: string | null = null, options?: { cause?: unknown }) {
    super('decode', message, options);
    this.name = 'DecodeError';
    this.attribute = attribute;
  }
}

/** The image provider failed (network error or non-2xx status). The displayed rasters are kept. */
export class FetchError extends ArchivePlotError {
  /** HTTP status, or null when the request never produced a response. */
  readonly status: number | null;

  constructor(message: string, status: number | null = null, options?: { cause?: unknown }) {
    super('fetch', message, options);
    this.name = 'FetchError';
    this.status = status;
  }
}

/** A response arrived after a newer request was issued. Never shown to the user. */
export class StaleResponseError extends ArchivePlotError {
  readonly sequence: number;
  readonly latestSequence: number;

  constructor(sequence: number, latestSequence: number) {
    super('stale-response', `Response #${sequence} superseded by request #${latestSequence}`);
    this.name = 'StaleResponseError';
    this.sequence = sequence;
    this.latestSequence = latestSequence;
  }
}

/** A log-scale domain touched or crossed zero and was clamped. */
export class InvalidDomainError extends ArchivePlotError {
  readonly requested: readonly [number, number];
  readonly applied: readonly [number, number];

  constructor(axis: number, requested: readonly [number, number], applied: readonly [number, number]) {
    super(
      'invalid-domain',
      `Log scale on axis ${axis} cannot span [${requested[0]}, ${requested[1]}]; clamped to [${applied[0]}, ${applied[1]}]`
    );
    this.name = 'InvalidDomainError';
    this.requested = requested;
    this.applied = applied;
  }
}

export const isArchivePlotError = (err: unknown): err is ArchivePlotError => err instanceof ArchivePlotError;
