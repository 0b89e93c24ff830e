import { httpStatusOf } from '../utils/googleRetry.js';
import AuthorizationError from './AuthorizationError.js';
import ExternalServiceError from './ExternalServiceError.js';

export const toServiceError = (operation: string, error: unknown): ExternalServiceError => {
  if (error instanceof ExternalServiceError) {
    return error;
  }
  const status = httpStatusOf(error) ?? undefined;
  const message = error instanceof Error ? error.message : 'Unknown error';
  if (status === 401 || status === 403) {
    return new AuthorizationError(operation, message, { status, cause: error });
  }
  return new ExternalServiceError(operation, message, { status, cause: error });
};
