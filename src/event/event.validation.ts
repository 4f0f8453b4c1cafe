import { HttpStatus, UnprocessableEntityException } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { CreateEventDto } from './dto/create-event.dto';

export type EventField = keyof CreateEventDto;

export type EventAttributes = {
  [K in EventField]?: CreateEventDto[K] | string | boolean | null;
};

export interface EventValidationError {
  field: EventField;
  violation: string;
}

function isEventField(property: string): property is EventField {
  return [
    'name',
    'description',
    'location',
    'price',
    'capacity',
    'startsAt',
    'imageFileName',
  ].includes(property);
}

/**
 * Checks event attributes against the event rules and returns one entry per
 * broken rule. An empty list means the attributes are valid.
 */
export function validateEvent(
  attributes: EventAttributes,
): EventValidationError[] {
  const candidate = plainToInstance(CreateEventDto, { ...attributes });
  const errors = validateSync(candidate);

  return errors.flatMap((error) => {
    const field = error.property;
    if (!isEventField(field)) {
      return [];
    }
    return Object.values(error.constraints ?? {}).map((violation) => ({
      field,
      violation,
    }));
  });
}

export function errorsOn(
  errors: EventValidationError[],
  field: EventField,
): string[] {
  return errors
    .filter((error) => error.field === field)
    .map((error) => error.violation);
}

export function assertValidEvent(attributes: EventAttributes): void {
  const errors = validateEvent(attributes);
  if (errors.length === 0) {
    return;
  }

  const fieldErrors: Partial<Record<EventField, string>> = {};
  for (const { field, violation } of errors) {
    fieldErrors[field] = fieldErrors[field]
      ? `${fieldErrors[field]}, ${violation}`
      : violation;
  }

  throw new UnprocessableEntityException({
    status: HttpStatus.UNPROCESSABLE_ENTITY,
    errors: fieldErrors,
  });
}
