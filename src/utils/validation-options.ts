import {
  HttpStatus,
  UnprocessableEntityException,
  ValidationError,
  ValidationPipeOptions,
} from '@nestjs/common';

export type FieldErrors = Record<string, string>;

export function generateErrors(errors: ValidationError[]): FieldErrors {
  return errors.reduce<FieldErrors>((accumulator, currentValue) => {
    if (currentValue.children && currentValue.children.length > 0) {
      const nested = generateErrors(currentValue.children);
      for (const [field, message] of Object.entries(nested)) {
        accumulator[`${currentValue.property}.${field}`] = message;
      }
      return accumulator;
    }

    accumulator[currentValue.property] = Object.values(
      currentValue.constraints ?? {},
    ).join(', ');
    return accumulator;
  }, {});
}

const validationOptions: ValidationPipeOptions = {
  transform: true,
  whitelist: true,
  errorHttpStatusCode: HttpStatus.UNPROCESSABLE_ENTITY,
  exceptionFactory: (errors: ValidationError[]) => {
    return new UnprocessableEntityException({
      status: HttpStatus.UNPROCESSABLE_ENTITY,
      errors: generateErrors(errors),
    });
  },
};

export default validationOptions;
