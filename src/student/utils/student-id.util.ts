import { InvalidInputException } from '../../common/exceptions/students.exceptions';

const INTEGER_PATTERN = /^[+-]?\d+$/;

export const INVALID_STUDENT_ID_MESSAGE = 'Invalid student ID. Please enter a number.';

/** Parses operator input such as "42" into a student id; anything else is rejected. */
export function parseStudentId(raw: string): number {
  const value = raw.trim();
  if (!INTEGER_PATTERN.test(value)) {
    throw new InvalidInputException(INVALID_STUDENT_ID_MESSAGE);
  }

  const id = Number(value);
  if (!Number.isSafeInteger(id)) {
    throw new InvalidInputException(INVALID_STUDENT_ID_MESSAGE);
  }
  // Number('-0') is -0
  return id === 0 ? 0 : id;
}
