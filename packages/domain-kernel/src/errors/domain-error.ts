export class DomainError extends Error {
  constructor(
    readonly code: string,
    message: string,
    readonly statusCode: number = 400,
    readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'DomainError';
  }
}

export class NotFoundError extends DomainError {
  constructor(entity: string, id: string | number) {
    super('NOT_FOUND', `${entity} ${id} not found`, 404);
  }
}

export class ValidationError extends DomainError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('VALIDATION_ERROR', message, 400, details);
  }
}

export class InvariantViolation extends DomainError {
  constructor(message: string) {
    super('INVARIANT_VIOLATION', message, 422);
  }
}

export class ConflictError extends DomainError {
  constructor(message: string) {
    super('CONFLICT', message, 409);
  }
}

// ---------------------------------------------------------------------------
// Payment processor failures
// ---------------------------------------------------------------------------

export type ProcessorErrorKind =
  | 'invalid_request'
  | 'card'
  | 'api'
  | 'connection'
  | 'authentication'
  | 'rate_limit';

/**
 * Raised by gateway adapters when the payment processor rejects a request.
 * `processorCode` is the processor's own error code (e.g. `resource_missing`).
 */
export class ProcessorError extends DomainError {
  constructor(
    readonly kind: ProcessorErrorKind,
    message: string,
    readonly processorCode?: string,
    readonly httpStatus?: number,
  ) {
    super('PROCESSOR_ERROR', message, 502, {
      kind,
      processorCode,
      httpStatus,
    });
    this.name = 'ProcessorError';
  }

  get isInvalidRequest(): boolean {
    return this.kind === 'invalid_request';
  }
}

export class CardError extends ProcessorError {
  constructor(message: string, processorCode?: string) {
    super('card', message, processorCode, 402);
    this.name = 'CardError';
  }
}

export function isProcessorError(error: unknown): error is ProcessorError {
  return error instanceof ProcessorError;
}

/** True for an invalid-request processor error whose message contains `fragment`. */
export function isInvalidRequestMatching(
  error: unknown,
  fragment: string,
): error is ProcessorError {
  return (
    error instanceof ProcessorError &&
    error.isInvalidRequest &&
    error.message.includes(fragment)
  );
}
