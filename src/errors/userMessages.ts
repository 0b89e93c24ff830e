import AuthorizationError from './AuthorizationError.js';
import DuplicateError from './DuplicateError.js';
import ExternalServiceError from './ExternalServiceError.js';
import NotFoundError from './NotFoundError.js';

export const AUTHORIZATION_FAILURE_TEXT =
  '⛔ The storage service rejected our credentials. Ask the coordinator to check storage credentials.';
export const SERVICE_FAILURE_TEXT =
  '⚠️ Could not reach the storage service. Try again later or contact the coordinator.';
export const UNEXPECTED_FAILURE_TEXT = '⚠️ Something went wrong. Try again or contact the coordinator.';
export const BINDING_LOST_TEXT =
  '⚠️ This form lost track of your shift. Send /start and open the shift again from the dashboard.';
export const STALE_SELECTION_TEXT = 'That entry is no longer in the list. Here is the refreshed list.';

export const DUPLICATE_TEXT: Record<DuplicateError['reason'], string> = {
  'telegram-id': 'ℹ️ This Telegram account is already registered.',
  'full-name': '⛔ A user with the same full name is already registered. Contact the coordinator.',
  archived: '⛔ Your account is archived. Contact the coordinator.',
};

export type FailureKind = 'authorization' | 'service' | 'not-found' | 'duplicate' | 'unexpected';

export const classifyFailure = (error: unknown): FailureKind => {
  if (error instanceof AuthorizationError) {
    return 'authorization';
  }
  if (error instanceof ExternalServiceError) {
    return 'service';
  }
  if (error instanceof NotFoundError) {
    return 'not-found';
  }
  if (error instanceof DuplicateError) {
    return 'duplicate';
  }
  return 'unexpected';
};

export const describeFailure = (error: unknown): string => {
  if (error instanceof DuplicateError) {
    return DUPLICATE_TEXT[error.reason];
  }
  switch (classifyFailure(error)) {
    case 'authorization':
      return AUTHORIZATION_FAILURE_TEXT;
    case 'service':
      return SERVICE_FAILURE_TEXT;
    case 'not-found':
      return STALE_SELECTION_TEXT;
    default:
      return UNEXPECTED_FAILURE_TEXT;
  }
};

export const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));
