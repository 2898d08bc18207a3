import dotenv from 'dotenv';
import path from 'path';

// Load environment variables
dotenv.config({ path: path.join(process.cwd(), '.env.local') });

export const DEFAULT_PASSWORD = 'password123';
export const DEFAULT_ENDPOINT = 'https://cloud.appwrite.io/v1';

export interface CliConfig {
  endpoint: string;
  selfSigned: boolean;
}

// Fallbacks for values a key file leaves out
export const getConfig = (env: NodeJS.ProcessEnv = process.env): CliConfig => ({
  endpoint: env.APPWRITE_ENDPOINT || DEFAULT_ENDPOINT,
  selfSigned: env.APPWRITE_SELF_SIGNED === 'true',
});
