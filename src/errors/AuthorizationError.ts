import ExternalServiceError from './ExternalServiceError.js';

export default class AuthorizationError extends ExternalServiceError {
  constructor(operation: string, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(operation, message, options);
    this.name = 'AuthorizationError';
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AuthorizationError);
    }
  }
}
