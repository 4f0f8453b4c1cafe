import { TransformFnParams } from 'class-transformer';

export const lowerCaseTransformer = (
  params: TransformFnParams,
): string | undefined =>
  typeof params.value === 'string'
    ? params.value.toLowerCase().trim()
    : params.value;
