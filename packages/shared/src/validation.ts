/**
 * Validation Utilities
 *
 * Common validation helpers and error sanitization.
 */

import { z } from 'zod';
import { ValidationError, errorMessage } from './errors.js';

// ─── Error Sanitization ──────────────────────────────────────────────────────

/**
 * Sanitize error messages to remove sensitive data.
 * Redacts emails, tokens, and file paths.
 */
export function sanitizeError(error: unknown): string {
  const message = errorMessage(error);

  return (
    message
      // Redact email addresses
      .replace(/[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g, '[email]')
      // Redact bearer tokens
      .replace(/Bearer\s+[A-Za-z0-9-._~+/]+=*/g, 'Bearer [token]')
      // Redact access tokens in URLs
      .replace(/access_token=[^&\s]+/g, 'access_token=[redacted]')
      // Redact API keys
      .replace(/api[_-]?key[=:]\s*["']?[A-Za-z0-9-_]+["']?/gi, 'api_key=[redacted]')
      // Redact absolute paths
      .replace(/\/Users\/[^/\s]+/g, '/Users/[user]')
      .replace(/\/home\/[^/\s]+/g, '/home/[user]')
  );
}

// ─── Environment Schemas ─────────────────────────────────────────────────────

/**
 * Treats an empty environment variable the same as an unset one.
 */
export function optionalEnv<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (value === '' ? undefined : value), schema);
}

// ─── Validation Helpers ──────────────────────────────────────────────────────

/**
 * Validate input against a Zod schema.
 * Returns validated data or throws ValidationError.
 */
export function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);

  if (!result.success) {
    const firstError = result.error.errors[0];
    throw new ValidationError(
      firstError?.message || 'Validation failed',
      firstError?.path.join('.'),
      { errors: result.error.errors }
    );
  }

  return result.data;
}
