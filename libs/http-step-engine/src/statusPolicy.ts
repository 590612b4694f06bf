import type { StatusCodes } from './types';

export const DEFAULT_ACCEPTED_RANGE = { min: 200, max: 300 } as const;

/**
 * Acceptance policy for one response. A non-empty list is an exact allow-list.
 * An empty list and a missing list both fall back to `200 <= status < 300`.
 */
export function isAcceptedStatus(status: number, statusCodes?: StatusCodes): boolean {
  if (statusCodes && statusCodes.length > 0) {
    return statusCodes.includes(status);
  }
  return status >= DEFAULT_ACCEPTED_RANGE.min && status < DEFAULT_ACCEPTED_RANGE.max;
}
