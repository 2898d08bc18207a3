/**
 * Service-account key file schema
 */

import { z } from 'zod';

const RawServiceAccountKeySchema = z.object({
  endpoint: z.string().url('Must be a valid URL').optional(),
  projectId: z.string().min(1, 'Must not be empty').optional(),
  project_id: z.string().min(1, 'Must not be empty').optional(),
  apiKey: z.string().min(1, 'Must not be empty').optional(),
  api_key: z.string().min(1, 'Must not be empty').optional(),
  selfSigned: z.boolean().optional(),
});

// projectId/apiKey may also be spelled project_id/api_key
export const ServiceAccountKeySchema = RawServiceAccountKeySchema
  .refine((key) => Boolean(key.projectId ?? key.project_id), {
    message: 'Required',
    path: ['projectId'],
  })
  .refine((key) => Boolean(key.apiKey ?? key.api_key), {
    message: 'Required',
    path: ['apiKey'],
  })
  .transform((key) => ({
    endpoint: key.endpoint,
    projectId: key.projectId ?? key.project_id ?? '',
    apiKey: key.apiKey ?? key.api_key ?? '',
    selfSigned: key.selfSigned,
  }));

export type ServiceAccountKeyInput = z.infer<typeof ServiceAccountKeySchema>;

/**
 * First failing issue as "path: message", or just the message at the root
 */
export function describeIssue(error: z.ZodError): string {
  const firstError = error.errors[0];
  if (!firstError) {
    return 'Invalid value';
  }
  const path = firstError.path.join('.');
  return path ? `${path}: ${firstError.message}` : firstError.message;
}
