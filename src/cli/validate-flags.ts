import { ClassConstructor, plainToInstance } from 'class-transformer';
import { ValidationError, validate } from 'class-validator';
import { UsageError } from './cli-args';

function messagesOf(errors: ValidationError[]): string[] {
  return errors.flatMap((e) => Object.values(e.constraints ?? {}));
}

/**
 * Turns raw flags into a validated DTO instance.
 * Unknown flags are usage errors.
 */
export async function validateFlags<T extends object>(
  dto: ClassConstructor<T>,
  flags: Record<string, string>,
): Promise<T> {
  const instance = plainToInstance(dto, flags);
  const errors = await validate(instance, { whitelist: true, forbidNonWhitelisted: true });
  if (errors.length > 0) {
    throw new UsageError(messagesOf(errors).join('; '));
  }
  return instance;
}
