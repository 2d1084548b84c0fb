import { InvalidInputException } from '../../common/exceptions/students.exceptions';
import { INVALID_STUDENT_ID_MESSAGE, parseStudentId } from './student-id.util';

describe('parseStudentId', () => {
  it('parses whole numbers', () => {
    expect(parseStudentId('42')).toBe(42);
    expect(parseStudentId(' 7 ')).toBe(7);
    expect(parseStudentId('-3')).toBe(-3);
    expect(parseStudentId('-0')).toBe(0);
  });

  it.each(['abc', '3.5', '', '   ', '1e3', '0x10', '12abc', '99999999999999999999'])(
    'rejects %p',
    (raw) => {
      expect(() => parseStudentId(raw)).toThrow(InvalidInputException);
      expect(() => parseStudentId(raw)).toThrow(INVALID_STUDENT_ID_MESSAGE);
    },
  );
});
