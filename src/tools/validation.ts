/**
 * Tool argument validation
 * Validates tool arguments using Zod schemas
 */

import { ZodError, type ZodTypeAny, type z } from 'zod';

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; errors: ArgumentError[] };

export interface ArgumentError {
  path: string;
  message: string;
}

/**
 * Validate tool arguments against schema
 */
export function validateToolArgs<S extends ZodTypeAny>(schema: S, args: unknown): ValidationResult<z.output<S>> {
  try {
    const data: z.output<S> = schema.parse(args);
    return { success: true, data };
  } catch (error) {
    if (error instanceof ZodError) {
      return {
        success: false,
        errors: error.errors.map(err => ({
          path: err.path.join('.'),
          message: err.message,
        })),
      };
    }
    throw error;
  }
}

/**
 * Format validation errors for user
 */
export function formatValidationErrors(errors: ArgumentError[]): string {
  if (errors.length === 0) {
    return 'No validation errors';
  }

  const formatted = errors.map(err =>
    err.path ? `${err.path}: ${err.message}` : err.message
  );

  return `Validation errors:\n${formatted.join('\n')}`;
}
