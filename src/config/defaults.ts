/**
 * Default limits and constants.
 * Line and value caps are overridable per load via `LoadOptions`.
 */

export const LIMITS = {
  MAX_LINE_LENGTH: 512,
  MAX_VALUE_LENGTH: 256,
} as const;

export const INT32 = {
  MIN: -2_147_483_648,
  MAX: 2_147_483_647,
} as const;

export const INT64 = {
  MIN: -(2 ** 63),
  // Exclusive: 2^63 itself is not representable as a signed 64-bit value.
  MAX_EXCLUSIVE: 2 ** 63,
} as const;

export const EXIT_CODES = {
  OK: 0,
  KEY_MISSING: 1,
  ERROR: 4,
} as const;
