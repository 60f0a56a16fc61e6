import { BadRequestException } from '@nestjs/common';
import { ClassConstructor, plainToInstance } from 'class-transformer';
import { validateSync, ValidationError } from 'class-validator';

function collectMessages(errors: ValidationError[]): string[] {
  return errors.flatMap((error) => [
    ...Object.values(error.constraints ?? {}),
    ...collectMessages(error.children ?? []),
  ]);
}

/**
 * Transforms and validates plain input against a DTO class.
 * Mirrors a global ValidationPipe with `whitelist`, `forbidNonWhitelisted` and `transform`.
 * @throws {BadRequestException} With one message per failed constraint
 */
export function validateDto<T extends object>(dtoClass: ClassConstructor<T>, input: object): T {
  const dto = plainToInstance(dtoClass, input);
  const errors = validateSync(dto, {
    whitelist: true,
    forbidNonWhitelisted: true,
  });

  if (errors.length > 0) {
    throw new BadRequestException(collectMessages(errors));
  }

  return dto;
}
