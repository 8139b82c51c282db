/**
 * Owner Parameter Utilities
 * Shared helpers for the `owner` parameter every tool accepts
 */

import { z } from 'zod';
import { getConfig } from '../config/index.js';
import type { ToolError } from '../types/index.js';
import { isTrackingError } from './errors.js';
import { logger } from './logger.js';

/**
 * Common owner parameter schema for tools
 */
export const ownerParamSchema = z.object({
  owner: z
    .string()
    .min(1)
    .optional()
    .describe('Owner whose work day is tracked. Defaults to the configured owner.'),
});

export const ownerJsonSchema = {
  type: 'string',
  description: 'Owner whose work day is tracked (defaults to the configured owner)',
} as const;

/**
 * Resolve an owner parameter, falling back to the configured owner
 */
export function resolveOwnerParam(owner?: string): string {
  const trimmed = owner?.trim();
  return trimmed ? trimmed : getConfig().owner;
}

/**
 * Tool error for input that failed schema validation
 */
export function validationFailure(error: z.ZodError): ToolError {
  return {
    success: false,
    error: error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '),
    code: 'VALIDATION_ERROR',
  };
}

/**
 * Tool error for a thrown error: tracking errors keep their own code,
 * anything else is logged and reported under the fallback code
 */
export function failure(error: unknown, fallbackCode: string): ToolError {
  if (isTrackingError(error)) {
    return { success: false, error: error.message, code: error.code };
  }
  logger.error(`Unexpected error (${fallbackCode})`, error);
  return {
    success: false,
    error: error instanceof Error ? error.message : String(error),
    code: fallbackCode,
  };
}
