/**
 * Request parameter schemas
 * Query and path values arrive as strings; these schemas coerce and constrain them
 */

import { z, type ZodTypeAny } from 'zod';
import { RequestValidationError, type ErrorLocation } from '../errors.js';
import { categorySchema, itemSchema } from '../types/index.js';

// ============================================
// Coercion helpers
// ============================================

/** Repeated query keys keep the last value */
function lastValue(value: unknown): unknown {
  return Array.isArray(value) ? value[value.length - 1] : value;
}

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Decimal strings matching the pattern become numbers. Anything else (hex,
 * padding, blanks) is passed through unchanged and fails the number check.
 */
function toNumber(pattern: RegExp) {
  return (value: unknown): unknown => {
    const single = lastValue(value);
    if (typeof single === 'string' && pattern.test(single)) {
      return Number(single);
    }
    return single;
  };
}

const queryString = <T extends ZodTypeAny>(schema: T) => z.preprocess(lastValue, schema);

const queryInteger = <T extends ZodTypeAny>(schema: T) => z.preprocess(toNumber(INTEGER_PATTERN), schema);

const queryFloat = <T extends ZodTypeAny>(schema: T) => z.preprocess(toNumber(DECIMAL_PATTERN), schema);

const finiteNumber = () => z.number({ invalid_type_error: 'Expected a number' }).finite();

const integer = () => z.number({ invalid_type_error: 'Expected an integer' }).int('Expected an integer');

// ============================================
// Schemas
// ============================================

export const itemBodySchema = itemSchema;

export const itemQuerySchema = z.object({
  name: queryString(z.string()).optional(),
  price: queryFloat(finiteNumber()).optional(),
  count: queryInteger(integer()).optional(),
  category: queryString(categorySchema).optional(),
});

export const updateQuerySchema = z.object({
  name: queryString(
    z.string()
      .min(1, 'Must be at least 1 character')
      .max(8, 'Must be at most 8 characters'),
  ).optional(),
  price: queryFloat(finiteNumber().gt(0, 'Must be greater than 0')).optional(),
  count: queryInteger(integer().min(0, 'Must be greater than or equal to 0')).optional(),
  category: queryString(categorySchema).optional(),
});

export const updateParamsSchema = z.object({
  item_id: queryInteger(integer().min(0, 'Must be greater than or equal to 0')),
});

export const deleteParamsSchema = z.object({
  item_id: queryInteger(integer()),
});

// ============================================
// Parsing
// ============================================

/**
 * Parse a request part, raising a 422 RequestValidationError on failure
 */
export function parseRequest<T extends ZodTypeAny>(
  schema: T,
  input: unknown,
  location: ErrorLocation,
): z.infer<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw RequestValidationError.fromZod(result.error, location);
  }
  return result.data;
}
