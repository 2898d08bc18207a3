import { Client, Users } from 'node-appwrite';
import fs from 'fs';
import { ServiceAccountKeySchema, describeIssue } from '@/lib/validations/credentials';
import type { Result, ServiceAccountKey } from '@/types';
import { getConfig, type CliConfig } from './config';
import { resetError } from './errors';
import type { AuthUsersApi } from './user-service';

// Server-side handle built from a service-account key file
export interface AdminClient {
  projectId: string;
  endpoint: string;
  users: AuthUsersApi;
}

/**
 * Reads and validates a service-account key file. Touches the file system only.
 */
export function loadServiceAccount(
  credentialsPath: string,
  config: CliConfig = getConfig()
): Result<ServiceAccountKey> {
  if (!fs.existsSync(credentialsPath)) {
    return {
      success: false,
      error: resetError('CredentialsNotFound', `no file at ${credentialsPath}`),
    };
  }

  let contents: string;
  try {
    contents = fs.readFileSync(credentialsPath, 'utf8');
  } catch (error) {
    return {
      success: false,
      error: resetError(
        'InvalidCredentials',
        `Unable to read credentials file ${credentialsPath}: ${error instanceof Error ? error.message : String(error)}`,
        error
      ),
    };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    return {
      success: false,
      error: resetError('InvalidCredentials', `Credentials file is not valid JSON: ${credentialsPath}`, error),
    };
  }

  const validation = ServiceAccountKeySchema.safeParse(parsed);
  if (!validation.success) {
    return {
      success: false,
      error: resetError(
        'InvalidCredentials',
        `${credentialsPath} is not a valid service-account key (${describeIssue(validation.error)})`,
        validation.error
      ),
    };
  }

  const key = validation.data;
  return {
    success: true,
    value: {
      endpoint: key.endpoint ?? config.endpoint,
      projectId: key.projectId,
      apiKey: key.apiKey,
      selfSigned: key.selfSigned ?? config.selfSigned,
    },
  };
}

export function createAdminClient(key: ServiceAccountKey): AdminClient {
  const client = new Client()
    .setEndpoint(key.endpoint)
    .setProject(key.projectId)
    .setKey(key.apiKey)
    .setSelfSigned(key.selfSigned);

  return {
    projectId: key.projectId,
    endpoint: key.endpoint,
    users: new Users(client),
  };
}

/**
 * Loads the key file and builds the admin client. The key is not checked
 * against the server here; the first rejected call reports it.
 */
export function initializeAdmin(
  credentialsPath: string,
  config: CliConfig = getConfig()
): Result<AdminClient> {
  const key = loadServiceAccount(credentialsPath, config);
  if (!key.success) {
    return key;
  }
  return { success: true, value: createAdminClient(key.value) };
}
