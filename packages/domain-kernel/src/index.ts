export {
  CardError,
  ConflictError,
  DomainError,
  InvariantViolation,
  NotFoundError,
  ProcessorError,
  ValidationError,
  isInvalidRequestMatching,
  isProcessorError,
} from './errors/domain-error.js';
export type { ProcessorErrorKind } from './errors/domain-error.js';
export { Result, errorMessage } from './result/result.js';
export { noopLogger } from './logger/logger.js';
export type { LogFields, Logger } from './logger/logger.js';
