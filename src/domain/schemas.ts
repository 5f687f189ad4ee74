import { z } from 'zod';
import type { RunRequest } from './models.js';
import { ConfigurationError } from '../utils/error-handler.js';

export const RunRequestSchema = z.object({
  fileNumber: z.string().trim().regex(/^[A-Za-z0-9-]{1,32}$/, 'must be 1-32 letters, digits or dashes'),
  // Names the artifact and the diagnostics directory
  requestId: z.string().trim().regex(/^[A-Za-z0-9._-]+$/, 'may only contain letters, digits, ".", "_" and "-"')
    .refine(id => id !== '.' && id !== '..', 'must not be a relative path segment'),
  deadlineMs: z.number().int().positive()
});

export function parseRunRequest(input: { fileNumber?: string; requestId?: string; deadlineMs: number }): RunRequest {
  const parsed = RunRequestSchema.safeParse(input);
  if (!parsed.success) {
    const messages = parsed.error.issues
      .map(issue => `${issue.path.join('.') || 'request'}: ${issue.message}`)
      .join('\n');
    throw new ConfigurationError(`Invalid run request:\n${messages}`, { issues: parsed.error.issues });
  }
  return Object.freeze(parsed.data);
}
