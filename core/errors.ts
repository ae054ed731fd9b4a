export type MemoryErrorCode =
  | 'not_found'
  | 'invalid_category'
  | 'invalid_relation_type'
  | 'invalid_input'
  | 'illegal_transition'
  | 'store_unavailable';

export class MemoryError extends Error {
  readonly code: MemoryErrorCode;

  constructor(code: MemoryErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MemoryError';
    this.code = code;
  }
}

export class NotFoundError extends MemoryError {
  readonly memoryId: number;

  constructor(memoryId: number, message = `Memory #${memoryId} not found`) {
    super('not_found', message);
    this.name = 'NotFoundError';
    this.memoryId = memoryId;
  }
}

export class InvalidCategoryError extends MemoryError {
  constructor(category: string, valid: readonly string[]) {
    super('invalid_category', `Invalid category '${category}'. Use one of: ${[...valid].sort().join(', ')}`);
    this.name = 'InvalidCategoryError';
  }
}

export class InvalidRelationTypeError extends MemoryError {
  constructor(relationType: string, valid: readonly string[]) {
    super('invalid_relation_type', `Invalid relation '${relationType}'. Use one of: ${[...valid].sort().join(', ')}`);
    this.name = 'InvalidRelationTypeError';
  }
}

export class InvalidInputError extends MemoryError {
  constructor(message: string) {
    super('invalid_input', message);
    this.name = 'InvalidInputError';
  }
}

export class IllegalTransitionError extends MemoryError {
  constructor(message: string) {
    super('illegal_transition', message);
    this.name = 'IllegalTransitionError';
  }
}

export class StoreUnavailableError extends MemoryError {
  constructor(message: string, cause?: unknown) {
    super('store_unavailable', message, { cause });
    this.name = 'StoreUnavailableError';
  }
}

export type OperationResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: MemoryError };

export function success<T>(value: T): OperationResult<T> {
  return { ok: true, value };
}

export function failure<T>(error: MemoryError): OperationResult<T> {
  return { ok: false, error };
}

/**
 * Runs an operation and converts caller-facing errors (validation, missing
 * records, rejected transitions) into a failed result. Store outages and
 * unexpected errors are rethrown.
 */
export async function toResult<T>(operation: () => Promise<T>): Promise<OperationResult<T>> {
  try {
    return success(await operation());
  } catch (error) {
    if (error instanceof MemoryError && error.code !== 'store_unavailable') {
      return failure(error);
    }
    throw error;
  }
}
