/**
 * Store error taxonomy.
 *
 * `get` never throws for a missing program; `updateMetrics` and `getLineage`
 * throw NotFoundError because the caller asserts the id exists.
 */

export class EvolutionStoreError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'EvolutionStoreError';
  }
}

export class NotFoundError extends EvolutionStoreError {
  public readonly id: string;

  constructor(id: string, what: string = 'Program') {
    super(`${what} not found: ${id}`);
    this.name = 'NotFoundError';
    this.id = id;
  }
}

export class InvalidArgumentError extends EvolutionStoreError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

export class StorageError extends EvolutionStoreError {
  public readonly operation: string;

  constructor(operation: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Storage failure during ${operation}: ${detail}`, { cause });
    this.name = 'StorageError';
    this.operation = operation;
  }
}
