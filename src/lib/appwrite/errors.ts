import { AppwriteException } from 'node-appwrite';
import type { ResetError, ResetErrorKind } from '@/types';

export const USAGE_EXIT_CODE = 2;

export const EXIT_CODES: Record<ResetErrorKind, number> = {
  UnexpectedError: 1,
  CredentialsNotFound: 3,
  InvalidCredentials: 4,
  AuthenticationFailed: 5,
  UserNotFound: 6,
  PermissionDenied: 7,
  WeakPassword: 8,
  NetworkError: 9,
};

const ERROR_LABELS: Record<ResetErrorKind, string> = {
  CredentialsNotFound: 'Credentials not found',
  InvalidCredentials: 'Invalid credentials',
  AuthenticationFailed: 'Authentication failed',
  UserNotFound: 'User not found',
  PermissionDenied: 'Permission denied',
  WeakPassword: 'Password rejected',
  NetworkError: 'Network error',
  UnexpectedError: 'Unexpected error',
};

// Appwrite error types that mean the key itself was not accepted
const AUTH_FAILURE_TYPES = new Set(['project_not_found', 'api_key_expired', 'user_unauthorized']);
const WEAK_PASSWORD_TYPES = new Set(['password_recently_used', 'password_personal_data']);
const NETWORK_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'EHOSTUNREACH',
]);

export const resetError = (kind: ResetErrorKind, message: string, cause?: unknown): ResetError => ({
  kind,
  message,
  cause,
});

export const formatError = (error: ResetError): string =>
  `❌ ${ERROR_LABELS[error.kind]}: ${error.message}`;

function getErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function isNetworkError(error: unknown): boolean {
  const code = getErrorCode(error) ?? (error instanceof Error ? getErrorCode(error.cause) : undefined);
  if (code && NETWORK_ERROR_CODES.has(code)) {
    return true;
  }
  return error instanceof Error && /fetch failed/i.test(error.message);
}

const messageOf = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Maps a failed Users API call onto the reset error taxonomy.
 * Only `user_not_found` means a missing user; a 404 from a wrong route or a
 * host that is not Appwrite at all points at the key file's endpoint.
 */
export function classifyAppwriteError(error: unknown, userId: string): ResetError {
  if (error instanceof AppwriteException) {
    const { code, type } = error;
    const message = error.message || `Request failed with status ${code}`;

    if (type === 'user_not_found') {
      return resetError('UserNotFound', `no user with ID "${userId}"`, error);
    }
    if (type === 'general_route_not_found') {
      return resetError('InvalidCredentials', `endpoint is not an Appwrite API (${message})`, error);
    }
    if (AUTH_FAILURE_TYPES.has(type) || (code === 401 && type !== 'general_unauthorized_scope')) {
      return resetError('AuthenticationFailed', message, error);
    }
    if (type === 'general_unauthorized_scope' || code === 403) {
      return resetError('PermissionDenied', message, error);
    }
    if (WEAK_PASSWORD_TYPES.has(type) || (code === 400 && /password/i.test(message))) {
      return resetError('WeakPassword', message, error);
    }
    return resetError('UnexpectedError', message, error);
  }
  if (isNetworkError(error)) {
    return resetError('NetworkError', messageOf(error), error);
  }

  return resetError('UnexpectedError', messageOf(error), error);
}
