import { INT32, INT64 } from '../config/defaults.js';
import { isBlank, isSpace } from '../utils/text.js';

// ── Public types ─────────────────────────────────────────────

export interface NumberScan {
  value: number;
  /** Index one past the last consumed code unit. */
  end: number;
}

export type NumericValue =
  | { kind: 'int'; value: number }
  | { kind: 'long'; value: bigint }
  | { kind: 'double'; value: number };

// ── Grammar ──────────────────────────────────────────────────

const INFINITY_RE = /^inf(inity)?/i;
const NAN_RE = /^nan(\([0-9A-Za-z_]*\))?/i;
const HEX_RE = /^0[xX]([0-9a-fA-F]+\.?[0-9a-fA-F]*|\.[0-9a-fA-F]+)([pP][+-]?\d+)?/;
const DECIMAL_RE = /^(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?/;

// ── Scanner ──────────────────────────────────────────────────

/**
 * Reads the longest numeric prefix of `text` starting at `start`, the way
 * C `strtod` does: leading whitespace, optional sign, then an infinity,
 * NaN, hexadecimal or decimal literal. Returns null if no digits were read.
 */
export function scanNumber(text: string, start = 0): NumberScan | null {
  let i = start;
  while (i < text.length && isSpace(text[i])) i++;

  let sign = 1;
  if (text[i] === '+' || text[i] === '-') {
    if (text[i] === '-') sign = -1;
    i++;
  }

  const rest = text.slice(i);

  const inf = INFINITY_RE.exec(rest);
  if (inf) {
    return { value: sign * Infinity, end: i + inf[0].length };
  }

  const nan = NAN_RE.exec(rest);
  if (nan) {
    return { value: NaN, end: i + nan[0].length };
  }

  const hex = HEX_RE.exec(rest);
  if (hex) {
    return {
      value: sign * parseHexFloat(hex[1] ?? '', hex[2]),
      end: i + hex[0].length,
    };
  }

  const decimal = DECIMAL_RE.exec(rest);
  if (decimal) {
    return { value: sign * Number(decimal[0]), end: i + decimal[0].length };
  }

  return null;
}

// IEEE-754 double: 53 significant bits, smallest subnormal 2^-1074
const DOUBLE_PRECISION = 53;
const MIN_SUBNORMAL_EXPONENT = -1074;

/**
 * Exact hex literal value rounded once, half to even, to the precision a
 * double has at that magnitude (fewer bits once the result is subnormal).
 */
function parseHexFloat(mantissa: string, exponent: string | undefined): number {
  let digits = 0n;
  let binaryExponent = exponent !== undefined ? Number(exponent.slice(1)) : 0;
  let seenPoint = false;

  for (const ch of mantissa) {
    if (ch === '.') {
      seenPoint = true;
      continue;
    }
    digits = digits * 16n + BigInt(parseInt(ch, 16));
    if (seenPoint) binaryExponent -= 4;
  }

  if (digits === 0n) return 0;

  const bits = digits.toString(2).length;
  const precision = Math.min(
    DOUBLE_PRECISION,
    bits + binaryExponent - MIN_SUBNORMAL_EXPONENT,
  );

  const shift = bits - precision;
  // Below half the smallest subnormal
  if (shift > bits) return 0;
  if (shift > 0) {
    digits = roundShiftRight(digits, shift);
    binaryExponent += shift;
  }

  return scaleByPowerOfTwo(Number(digits), binaryExponent);
}

function roundShiftRight(value: bigint, shift: number): bigint {
  const s = BigInt(shift);
  const quotient = value >> s;
  const remainder = value - (quotient << s);
  const half = 1n << (s - 1n);

  if (remainder > half || (remainder === half && (quotient & 1n) === 1n)) {
    return quotient + 1n;
  }
  return quotient;
}

// Two steps so neither power of two leaves the double range on its own
function scaleByPowerOfTwo(value: number, exponent: number): number {
  const first = Math.trunc(exponent / 2);
  return value * 2 ** first * 2 ** (exponent - first);
}

// ── Classification ───────────────────────────────────────────

/**
 * Infers a numeric kind for a raw value. The whole value must be numeric,
 * optionally followed by whitespace; otherwise returns null.
 */
export function inferNumber(raw: string): NumericValue | null {
  const scan = scanNumber(raw);
  if (scan === null) return null;
  if (!isBlank(raw.slice(scan.end))) return null;

  return classifyNumber(scan.value);
}

export function classifyNumber(value: number): NumericValue {
  const integral =
    Number.isInteger(value) && value >= INT64.MIN && value < INT64.MAX_EXCLUSIVE;

  if (!integral) {
    return { kind: 'double', value };
  }

  if (value >= INT32.MIN && value <= INT32.MAX) {
    // `| 0` folds -0 into 0
    return { kind: 'int', value: value | 0 };
  }

  return { kind: 'long', value: BigInt(value) };
}
