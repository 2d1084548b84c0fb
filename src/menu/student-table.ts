import { Student } from '../student/entities/student.entity';

export const TABLE_HEADER = 'ID | First Name | Last Name | Email | Enrollment Date';
export const TABLE_RULE = '-'.repeat(70);

export function formatStudentRow(student: Student): string {
  return [
    student.studentId,
    student.firstName,
    student.lastName,
    student.email,
    student.enrollmentDate,
  ].join(' | ');
}

export function formatStudentTable(students: Student[]): string[] {
  return ['All Students:', TABLE_HEADER, TABLE_RULE, ...students.map(formatStudentRow)];
}
