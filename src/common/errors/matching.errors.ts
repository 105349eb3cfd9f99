import { TypeORMError } from 'typeorm';

/** Raised when a matching run is requested while another is still in flight. */
export class MatchingInProgressError extends Error {
  constructor() {
    super('A matching run is already in progress');
    this.name = 'MatchingInProgressError';
  }
}

/** Raised when the roster store or the group store cannot be read or written. */
export class StorageUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StorageUnavailableError';
  }
}

/**
 * Wraps TypeORM failures in a StorageUnavailableError; anything else is
 * returned unchanged so programming errors keep their own type.
 */
export function toStorageError(error: unknown, message: string): unknown {
  if (error instanceof StorageUnavailableError) return error;
  if (error instanceof TypeORMError) {
    return new StorageUnavailableError(`${message}: ${error.message}`, {
      cause: error,
    });
  }
  return error;
}
