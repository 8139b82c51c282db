/**
 * Tests for tracking errors and tool failure helpers
 */

import { describe, it, expect, vi } from 'vitest';

vi.mock('../../../src/config/index.js', () => ({
  getConfig: vi.fn(() => ({ owner: 'configured' })),
}));

import {
  conflict,
  httpStatusForCode,
  invalidState,
  isTrackingError,
  notFound,
  validationError,
} from '../../../src/utils/errors.js';
import { failure, resolveOwnerParam, ownerParamSchema, validationFailure } from '../../../src/utils/owner-param.js';

describe('TrackingError', () => {
  it('carries a kind and a stable code', () => {
    expect([conflict('a'), notFound('b'), invalidState('c'), validationError('d')].map((e) => e.code)).toEqual([
      'CONFLICT',
      'NOT_FOUND',
      'INVALID_STATE',
      'VALIDATION_ERROR',
    ]);
    expect(notFound('gone').kind).toBe('not_found');
    expect(notFound('gone').message).toBe('gone');
  });

  it('is recognized by the type guard', () => {
    expect(isTrackingError(conflict('x'))).toBe(true);
    expect(isTrackingError(new Error('x'))).toBe(false);
    expect(isTrackingError('x')).toBe(false);
  });

  it('maps codes to HTTP statuses', () => {
    expect(httpStatusForCode('CONFLICT')).toBe(409);
    expect(httpStatusForCode('NOT_FOUND')).toBe(404);
    expect(httpStatusForCode('INVALID_STATE')).toBe(409);
    expect(httpStatusForCode('VALIDATION_ERROR')).toBe(400);
    expect(httpStatusForCode('REPORT_ERROR')).toBe(500);
    expect(httpStatusForCode(undefined)).toBe(500);
  });
});

describe('owner parameter helpers', () => {
  it('falls back to the configured owner', () => {
    expect(resolveOwnerParam(undefined)).toBe('configured');
    expect(resolveOwnerParam('   ')).toBe('configured');
    expect(resolveOwnerParam(' alice ')).toBe('alice');
  });

  it('joins schema issues into one message', () => {
    const parsed = ownerParamSchema.safeParse({ owner: 42 });
    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      expect(validationFailure(parsed.error)).toEqual({
        success: false,
        error: 'owner: Expected string, received number',
        code: 'VALIDATION_ERROR',
      });
    }
  });

  it('keeps tracking error codes and falls back for anything else', () => {
    expect(failure(conflict('busy'), 'X_ERROR')).toEqual({ success: false, error: 'busy', code: 'CONFLICT' });
    expect(failure(new Error('disk full'), 'X_ERROR')).toEqual({
      success: false,
      error: 'disk full',
      code: 'X_ERROR',
    });
  });
});
