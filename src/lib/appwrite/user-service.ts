import type { Result, UserRecord } from '@/types';
import { classifyAppwriteError } from './errors';

// The fields of an Appwrite Auth user this tool reads
export interface AuthUser {
  $id: string;
  $createdAt: string;
  name: string;
  email: string;
  status: boolean;
  emailVerification: boolean;
  accessedAt?: string;
}

// Subset of the node-appwrite Users service used here
export interface AuthUsersApi {
  get(userId: string): Promise<AuthUser>;
  updatePassword(userId: string, password: string): Promise<unknown>;
}

export function toUserRecord(user: AuthUser): UserRecord {
  return {
    uid: user.$id,
    email: user.email || undefined,
    displayName: user.name || undefined,
    createdAt: user.$createdAt,
    lastSignInAt: user.accessedAt || undefined,
    disabled: !user.status,
    emailVerified: user.emailVerification,
  };
}

/**
 * Fetch a user for review before any change is made
 */
export async function getUserRecord(users: AuthUsersApi, userId: string): Promise<Result<UserRecord>> {
  try {
    const user = await users.get(userId);
    return { success: true, value: toUserRecord(user) };
  } catch (error) {
    return { success: false, error: classifyAppwriteError(error, userId) };
  }
}

/**
 * Overwrite the user's password. One request, no retry; the server's
 * password policy is the only length check.
 */
export async function resetUserPassword(
  users: AuthUsersApi,
  userId: string,
  password: string
): Promise<Result<{ uid: string }>> {
  try {
    await users.updatePassword(userId, password);
    return { success: true, value: { uid: userId } };
  } catch (error) {
    return { success: false, error: classifyAppwriteError(error, userId) };
  }
}
