/**
 * Page window resolution for listing and search
 *
 * Fills defaults and validates types only. No upper clamp: the backend
 * enforces its own limits. No cursor state is carried between calls.
 */

import { InvalidPaginationError } from "./errors.js";
import type { PageWindow } from "./types.js";

export const DEFAULT_LIMIT = 25;
export const DEFAULT_SKIP = 0;

function nonNegativeInt(name: string, value: unknown, fallback: number): number {
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    throw new InvalidPaginationError(
      `${name} must be a non-negative integer, got ${JSON.stringify(value)}`
    );
  }
  return value;
}

/**
 * Resolve a page window from raw tool arguments
 * @throws InvalidPaginationError
 */
export function resolvePage(args: { limit?: unknown; skip?: unknown }): PageWindow {
  return {
    limit: nonNegativeInt("limit", args.limit, DEFAULT_LIMIT),
    skip: nonNegativeInt("skip", args.skip, DEFAULT_SKIP),
  };
}
