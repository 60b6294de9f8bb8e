import {
  BadRequestException,
  ValidationError,
  ValidationPipe,
} from '@nestjs/common';
import { ValidateIf } from 'class-validator';

export type FieldErrors = Record<string, string[]>;

/**
 * 400 with per-field detail. Every rule violation in the API is reported in
 * this shape, whether it comes from class-validator or from a service check.
 */
export function validationFailed(
  errors: FieldErrors,
  message = 'Validation failed',
): BadRequestException {
  return new BadRequestException({
    statusCode: 400,
    error: 'Bad Request',
    message,
    errors,
  });
}

export function fieldError(field: string, message: string) {
  return validationFailed({ [field]: [message] }, message);
}

/**
 * Field may be left out of a partial update, but an explicit `null` is
 * still validated. `@IsOptional()` skips both.
 */
export function IsOmittable(): PropertyDecorator {
  return ValidateIf((_object: object, value: unknown) => value !== undefined);
}

export function flattenValidationErrors(
  errors: ValidationError[],
  parent = '',
  into: FieldErrors = {},
): FieldErrors {
  for (const err of errors) {
    const path = parent ? `${parent}.${err.property}` : err.property;
    if (err.constraints) {
      into[path] = [...(into[path] ?? []), ...Object.values(err.constraints)];
    }
    if (err.children?.length) {
      flattenValidationErrors(err.children, path, into);
    }
  }
  return into;
}

export function createValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    whitelist: true,
    transform: true,
    exceptionFactory: (errors) =>
      validationFailed(flattenValidationErrors(errors)),
  });
}
