/**
 * Base service infrastructure exports
 */

export { BaseService } from './BaseService';

export {
  ServiceError,
  NotFoundError,
  ConstraintViolationError,
  StorageUnavailableError,
  MalformedInputError
} from './ServiceError';
