import { ValidationError, validate } from 'class-validator';
import { ClassConstructor, plainToInstance } from 'class-transformer';

export type ValidationOutcome<T> =
  | { valid: true; value: T }
  | { valid: false; problems: string[] };

/**
 * Transforms a plain object into `metatype` and validates it, rejecting
 * properties that carry no validation decorator.
 */
export async function validateInput<T extends object>(
  metatype: ClassConstructor<T>,
  value: unknown,
): Promise<ValidationOutcome<T>> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return { valid: false, problems: ['input must be an object'] };
  }

  const object = plainToInstance(metatype, value);
  const errors = await validate(object, {
    whitelist: true,
    forbidNonWhitelisted: true,
  });

  if (errors.length > 0) {
    return { valid: false, problems: flattenErrors(errors) };
  }

  return { valid: true, value: object };
}

function flattenErrors(errors: ValidationError[], parentPath = ''): string[] {
  return errors.flatMap((error) => {
    const path = parentPath ? `${parentPath}.${error.property}` : error.property;
    const own = error.constraints
      ? Object.values(error.constraints).map(message => `${path}: ${message}`)
      : [];
    return [...own, ...flattenErrors(error.children ?? [], path)];
  });
}
