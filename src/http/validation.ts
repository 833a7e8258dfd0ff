import { z } from 'zod';

const INT4_MIN = -2_147_483_648;
const INT4_MAX = 2_147_483_647;

/** Empty strings, `0`, `false` and `null` count as "not supplied". */
function blankToUndefined(value: unknown): unknown {
  if (value === '' || value === 0 || value === false || value === null) {
    return undefined;
  }

  return value;
}

const DECIMAL_INTEGER = /^\s*[+-]?\d+\s*$/;

/**
 * Integer coercion: decimal digit strings are parsed, finite numbers are
 * truncated toward zero and `true` is 1. Hex, exponent and fractional
 * strings stay strings so the number schema rejects them.
 */
function blankToNumber(value: unknown): unknown {
  const supplied = blankToUndefined(value);

  if (typeof supplied === 'string' && DECIMAL_INTEGER.test(supplied)) {
    return Number.parseInt(supplied.trim(), 10);
  }

  if (typeof supplied === 'number' && Number.isFinite(supplied)) {
    return Math.trunc(supplied);
  }

  if (supplied === true) {
    return 1;
  }

  return supplied;
}

export function requiredText(field: string) {
  return z.preprocess(
    blankToUndefined,
    z.string({
      required_error: `${field} is required`,
      invalid_type_error: `${field} must be a string`
    })
  );
}

export function optionalText(field: string) {
  return z.preprocess(
    blankToUndefined,
    z.string({ invalid_type_error: `${field} must be a string` }).optional()
  );
}

export function textWithDefault(field: string, defaultValue: string) {
  return z.preprocess(
    blankToUndefined,
    z.string({ invalid_type_error: `${field} must be a string` }).default(defaultValue)
  );
}

export function integerWithDefault(field: string, defaultValue: number) {
  const message = `${field} must be an integer`;

  return z.preprocess(
    blankToNumber,
    z
      .number({ invalid_type_error: message })
      .int(message)
      .min(INT4_MIN, message)
      .max(INT4_MAX, message)
      .default(defaultValue)
  );
}

export function requiredRecordId(field: string) {
  const message = `${field} must be a positive integer`;

  return z.preprocess(
    blankToNumber,
    z
      .number({ required_error: `${field} is required`, invalid_type_error: message })
      .int(message)
      .positive(message)
      .max(INT4_MAX, message)
  );
}

const recordIdParamSchema = z
  .string()
  .regex(/^\d{1,10}$/)
  .transform((value) => Number.parseInt(value, 10))
  .pipe(z.number().int().positive().max(INT4_MAX));

/** Parses a path id; returns null when the segment is not a storable integer id. */
export function parseRecordIdParam(value: unknown): number | null {
  const parsed = recordIdParamSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

function firstSearchTerm(value: unknown): string | undefined {
  const term: unknown = Array.isArray(value) ? value[0] : value;
  return typeof term === 'string' ? term : undefined;
}

/** Anything other than a plain `q` string (nested or missing) searches for nothing. */
export const searchQuerySchema = z.object({
  q: z.preprocess(firstSearchTerm, z.string().default(''))
});
