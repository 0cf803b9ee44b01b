/**
 * Estimator error taxonomy
 * Every failure surfaces as one of these; none is retried by the engine itself.
 */

export type EstimatorErrorCode =
  | 'INVALID_QUANTITY'
  | 'INVALID_MARKUP'
  | 'INVALID_PRICE'
  | 'INVALID_LABOR_HOURS'
  | 'INVALID_PROJECT_CODE'
  | 'INVALID_REQUEST'
  | 'INVALID_TRANSITION'
  | 'UNRESOLVED_COMPONENT'
  | 'NOT_FOUND'
  | 'CONCURRENCY_CONFLICT'
  | 'CATALOG_UNAVAILABLE'
  | 'STORE_UNAVAILABLE'
  | 'STORE_TIMEOUT';

export class EstimatorError extends Error {
  readonly code: EstimatorErrorCode;
  readonly status: number;
  /** Safe for the caller to retry the whole operation with backoff */
  readonly retriable: boolean;

  constructor(message: string, code: EstimatorErrorCode, status: number, retriable = false) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
    this.retriable = retriable;
  }
}

export type ValidationCode = Extract<
  EstimatorErrorCode,
  | 'INVALID_QUANTITY'
  | 'INVALID_MARKUP'
  | 'INVALID_PRICE'
  | 'INVALID_LABOR_HOURS'
  | 'INVALID_PROJECT_CODE'
  | 'INVALID_REQUEST'
  | 'INVALID_TRANSITION'
>;

export class ValidationError extends EstimatorError {
  readonly field?: string;

  constructor(message: string, code: ValidationCode = 'INVALID_REQUEST', field?: string) {
    super(message, code, 400);
    this.field = field;
  }
}

export class UnresolvedComponentError extends EstimatorError {
  constructor(detectionId: string, status: string) {
    super(
      `Detection ${detectionId} is '${status}' and has no catalog component; resolve it before accepting`,
      'UNRESOLVED_COMPONENT',
      422
    );
  }
}

export class NotFoundError extends EstimatorError {
  constructor(entity: 'project' | 'component' | 'detection' | 'bom_item', id: string) {
    super(`${entity} not found: ${id}`, 'NOT_FOUND', 404);
  }
}

export class ConcurrencyConflictError extends EstimatorError {
  constructor(projectId: string) {
    super(`Project ${projectId} was modified concurrently; retry the operation`, 'CONCURRENCY_CONFLICT', 409, true);
  }
}

export class CatalogUnavailableError extends EstimatorError {
  constructor(detail: string) {
    super(`Component catalog unavailable: ${detail}`, 'CATALOG_UNAVAILABLE', 503, true);
  }
}

export class StoreUnavailableError extends EstimatorError {
  constructor(detail: string) {
    super(`Store unavailable: ${detail}`, 'STORE_UNAVAILABLE', 503, true);
  }
}

export class StoreTimeoutError extends EstimatorError {
  constructor(operation: string, timeoutMs: number) {
    super(`Store operation '${operation}' timed out after ${timeoutMs}ms`, 'STORE_TIMEOUT', 504, true);
  }
}

export function isEstimatorError(err: unknown): err is EstimatorError {
  return err instanceof EstimatorError;
}
