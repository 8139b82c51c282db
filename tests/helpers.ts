/**
 * Shared test helpers
 */

import { expect } from 'vitest';
import { TrackingError, type TrackingErrorKind } from '../src/utils/errors.js';
import type { ToolResult } from '../src/types/index.js';

/**
 * Assert that a synchronous call throws a TrackingError of the given kind
 */
export function expectTrackingError(fn: () => unknown, kind: TrackingErrorKind): void {
  let caught: unknown;
  try {
    fn();
  } catch (error) {
    caught = error;
  }
  expect(caught).toBeInstanceOf(TrackingError);
  if (caught instanceof TrackingError) {
    expect(caught.kind).toBe(kind);
  }
}

/**
 * Assert that a promise rejects with a TrackingError of the given kind
 */
export async function expectRejectsWith(promise: Promise<unknown>, kind: TrackingErrorKind): Promise<void> {
  let caught: unknown;
  try {
    await promise;
  } catch (error) {
    caught = error;
  }
  expect(caught).toBeInstanceOf(TrackingError);
  if (caught instanceof TrackingError) {
    expect(caught.kind).toBe(kind);
  }
}

/**
 * Deterministic id generator: prefix-1, prefix-2, ...
 */
export function sequentialIds(prefix = 'id'): () => string {
  let next = 0;
  return () => {
    next += 1;
    return `${prefix}-${next}`;
  };
}

/**
 * Data of a successful tool result; fails the test otherwise
 */
export function unwrap<T>(result: ToolResult<T>): T {
  if (!result.success) {
    throw new Error(`Expected success, got ${result.code ?? 'error'}: ${result.error}`);
  }
  return result.data;
}

/**
 * Error code of a failed tool result, undefined on success
 */
export function errorCode(result: ToolResult): string | undefined {
  return result.success ? undefined : result.code;
}
