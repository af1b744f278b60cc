import { BadRequestException } from '@nestjs/common';
import { plainToInstance, ClassConstructor } from 'class-transformer';
import { validate } from 'class-validator';

/**
 * Same rules the HTTP ValidationPipe applies (whitelist, reject unknown
 * properties), run at the service boundary since this layer has no transport.
 */
export async function validateInput<T extends object>(
  dtoClass: ClassConstructor<T>,
  input: object,
): Promise<T> {
  const instance = plainToInstance(dtoClass, input);
  const errors = await validate(instance, {
    whitelist: true,
    forbidNonWhitelisted: true,
  });

  if (errors.length > 0) {
    const messages = errors.flatMap((error) => Object.values(error.constraints ?? {}));
    throw new BadRequestException(messages);
  }

  return instance;
}
