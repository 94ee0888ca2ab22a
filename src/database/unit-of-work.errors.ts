/**
 * Raised inside a transaction when a versioned update matched no row.
 * The unit of work rolls back and reports CONFLICT.
 */
export class ConcurrencyConflictError extends Error {
  constructor(
    readonly entityName: string,
    readonly entityId: string,
    readonly expectedVersion: number,
  ) {
    super(
      `${entityName} ${entityId} was changed by another operation (expected version ${expectedVersion})`,
    );
    this.name = 'ConcurrencyConflictError';
  }
}

export class OperationCancelledError extends Error {
  constructor() {
    super('Operation was cancelled before commit');
    this.name = 'OperationCancelledError';
  }
}
