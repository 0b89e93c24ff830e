export default class ExternalServiceError extends Error {
  operation: string;
  status?: number;

  constructor(operation: string, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'ExternalServiceError';
    this.operation = operation;
    this.status = options.status;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ExternalServiceError);
    }
  }
}
