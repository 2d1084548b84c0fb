import { ClassConstructor, plainToClass } from 'class-transformer';
import { validate } from 'class-validator';
import { InvalidInputException } from '../exceptions/students.exceptions';

/**
 * Builds the DTO from operator input and rejects it with every failed
 * constraint message, in property order.
 */
export async function validateInput<T extends object>(
  dtoClass: ClassConstructor<T>,
  input: object,
): Promise<T> {
  const dto = plainToClass(dtoClass, input);
  const errors = await validate(dto);
  if (errors.length > 0) {
    const messages = errors.flatMap((error) => Object.values(error.constraints ?? {}));
    throw new InvalidInputException(messages.join(' '));
  }
  return dto;
}
