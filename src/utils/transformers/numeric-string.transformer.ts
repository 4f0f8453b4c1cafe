import { TransformFnParams } from 'class-transformer';

/**
 * Turns numeric strings such as `"12.50"` into numbers. Blank strings,
 * booleans and anything else pass through unchanged for the validators.
 */
export const numericStringTransformer = (
  params: TransformFnParams,
): unknown => {
  const value: unknown = params.value;
  if (typeof value !== 'string' || value.trim() === '') {
    return value;
  }

  const parsed = Number(value);
  return Number.isNaN(parsed) ? value : parsed;
};
