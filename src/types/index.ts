export type ResetErrorKind =
  | 'CredentialsNotFound'
  | 'InvalidCredentials'
  | 'AuthenticationFailed'
  | 'UserNotFound'
  | 'PermissionDenied'
  | 'WeakPassword'
  | 'NetworkError'
  | 'UnexpectedError';

export interface ResetError {
  kind: ResetErrorKind;
  message: string;
  cause?: unknown;
}

export type Result<T> =
  | { success: true; value: T }
  | { success: false; error: ResetError };

export interface ServiceAccountKey {
  endpoint: string;
  projectId: string;
  apiKey: string;
  selfSigned: boolean;
}

// Snapshot of an Auth user; empty platform strings are mapped to undefined
export interface UserRecord {
  uid: string;
  email?: string;
  displayName?: string;
  createdAt: string;
  lastSignInAt?: string;
  disabled: boolean;
  emailVerified: boolean;
}
