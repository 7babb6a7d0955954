/**
 * AI Threat Model — Error message formatting.
 */

import { ZodError } from 'zod';

/** One-line description of a thrown value. Zod issues become `path: message` pairs. */
export function errorMessage(err: unknown): string {
  if (err instanceof ZodError) {
    return err.issues
      .map(issue => issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message)
      .join('; ');
  }
  return err instanceof Error ? err.message : String(err);
}
