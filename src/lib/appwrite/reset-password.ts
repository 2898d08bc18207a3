import { Command, CommanderError } from 'commander';
import type { ResetError, UserRecord } from '@/types';
import { DEFAULT_PASSWORD } from './config';
import { EXIT_CODES, USAGE_EXIT_CODE, formatError } from './errors';
import { initializeAdmin } from './server-config';
import { getUserRecord, resetUserPassword } from './user-service';

export type ResetPasswordOptions = {
  userId: string;
  credentials: string;
  password: string;
  showUserInfo: boolean;
};

export interface ResetPasswordDependencies {
  initializeAdmin: (credentialsPath: string) => ReturnType<typeof initializeAdmin>;
  getUserRecord: typeof getUserRecord;
  resetUserPassword: typeof resetUserPassword;
}

const defaultDependencies: ResetPasswordDependencies = {
  initializeAdmin: (credentialsPath) => initializeAdmin(credentialsPath),
  getUserRecord,
  resetUserPassword,
};

export function buildProgram(): Command {
  return new Command()
    .name('reset-password')
    .description('Reset an Appwrite Auth user password to a default value')
    .requiredOption('-u, --user-id <uid>', 'Auth user ID whose password should be reset')
    .requiredOption('-c, --credentials <path>', 'Path to the service-account key JSON file')
    .option('-p, --password <password>', 'New password to set', DEFAULT_PASSWORD)
    .option('--show-user-info', 'Display user information before resetting password', false)
    .addHelpText(
      'after',
      `
Examples:
  reset-password -u user123 -c appwrite-key.json
  reset-password --user-id user123 --credentials ./config/appwrite-key.json --password newpass123`
    )
    .exitOverride();
}

function printUserRecord(user: UserRecord): void {
  console.log(`  Email: ${user.email ?? '(none)'}`);
  console.log(`  Display Name: ${user.displayName ?? '(none)'}`);
  console.log(`  Created: ${user.createdAt}`);
  console.log(`  Last Sign-In: ${user.lastSignInAt ?? '(never)'}`);
  console.log(`  Email Verified: ${user.emailVerified}`);
  console.log(`  Account Disabled: ${user.disabled}`);
}

function fail(error: ResetError): number {
  console.error(formatError(error));
  return EXIT_CODES[error.kind];
}

/**
 * Runs one reset and returns the process exit code.
 * `argv` holds the user arguments only (no node/script path).
 */
export async function run(
  argv: string[],
  deps: ResetPasswordDependencies = defaultDependencies
): Promise<number> {
  const program = buildProgram();
  try {
    program.parse(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      // --help exits with 0, everything else is a usage error
      return error.exitCode === 0 ? 0 : USAGE_EXIT_CODE;
    }
    throw error;
  }

  const options = program.opts<ResetPasswordOptions>();
  if (!options.userId.trim()) {
    console.error('❌ --user-id must not be empty');
    return USAGE_EXIT_CODE;
  }

  console.log('🔐 Password Reset Tool');
  console.log('='.repeat(40));

  const admin = deps.initializeAdmin(options.credentials);
  if (!admin.success) {
    return fail(admin.error);
  }
  console.log(`✅ Admin client initialized for project ${admin.value.projectId}`);

  if (options.showUserInfo) {
    console.log(`\n📋 Getting user information for: ${options.userId}`);
    const user = await deps.getUserRecord(admin.value.users, options.userId);
    if (!user.success) {
      return fail(user.error);
    }
    printUserRecord(user.value);
  }

  console.log(`\n🔄 Resetting password for user: ${options.userId}`);
  const reset = await deps.resetUserPassword(admin.value.users, options.userId, options.password);
  if (!reset.success) {
    return fail(reset.error);
  }

  console.log(`✅ Password successfully reset for user: ${reset.value.uid}`);
  // Echoed on purpose: the operator hands the new password on
  console.log(`   New password: ${options.password}`);
  return 0;
}

export async function main(): Promise<void> {
  process.exitCode = await run(process.argv.slice(2));
}
