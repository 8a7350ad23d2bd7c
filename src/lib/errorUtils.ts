/**
 * Error handling utilities
 *
 * Consistent error message extraction and logging for the match runners
 * and the CLI.
 */

import { ZodError } from 'zod'

/**
 * Extract a readable message from an unknown error value.
 * Zod validation errors are flattened to `path: message` pairs.
 *
 * @param err - The error to extract a message from
 * @param fallback - Used when nothing usable can be extracted
 *
 * @example
 * try {
 *   parseBenchOptions(argv)
 * } catch (err) {
 *   console.error(getErrorMessage(err))
 * }
 */
export function getErrorMessage(err: unknown, fallback = 'An error occurred'): string {
  if (err instanceof ZodError) {
    return err.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ')
  }

  if (err instanceof Error) {
    return err.message
  }

  if (typeof err === 'string') {
    return err
  }

  if (err && typeof err === 'object' && 'message' in err && typeof err.message === 'string') {
    return err.message
  }

  return fallback
}

/**
 * Log an error with context for debugging.
 *
 * @param context - Where the error happened, e.g. `match` or `bench`
 * @param err - The error to log
 */
export function logError(context: string, err: unknown): void {
  const message = getErrorMessage(err)
  console.error(`[${context}]`, message, err)
}
