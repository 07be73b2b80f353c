/**
 * Errors raised while loading reference data. Every one of them aborts the run.
 */

export class ReferenceLoaderError extends Error {
  constructor(
    message: string,
    public readonly code: string
  ) {
    super(message);
    this.name = 'ReferenceLoaderError';
  }
}

/**
 * Non-200 response from the BioMart service
 */
export class TransportError extends ReferenceLoaderError {
  constructor(
    public readonly statusCode: number,
    public readonly url: string
  ) {
    super(
      `Unsuccessful HTTP response (status code ${statusCode}). Debug the following URL:\n${url}`,
      'TRANSPORT_ERROR'
    );
    this.name = 'TransportError';
  }
}

/**
 * A child row names a parent that was never loaded
 */
export class ReferentialIntegrityError extends ReferenceLoaderError {
  constructor(
    public readonly entity: 'gene' | 'transcript',
    public readonly externalId: string,
    public readonly referencedBy: string
  ) {
    super(
      `Referential integrity violation: ${entity} ${externalId || '(empty id)'} referenced by ${referencedBy} is not in the database`,
      'REFERENTIAL_INTEGRITY'
    );
    this.name = 'ReferentialIntegrityError';
  }
}

/**
 * A numeric field that does not hold a number
 */
export class RowFormatError extends ReferenceLoaderError {
  constructor(
    public readonly dataset: string,
    public readonly field: string,
    public readonly value: string
  ) {
    super(`Invalid value "${value}" for field ${field} in ${dataset} data`, 'ROW_FORMAT');
    this.name = 'RowFormatError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
