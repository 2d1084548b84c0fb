import { IsNotEmpty } from 'class-validator';
import { IsCalendarDate } from '../validators/is-calendar-date.validator';

export const INVALID_DATE_MESSAGE = 'Invalid date format. Use YYYY-MM-DD (e.g., 2023-09-01).';

export class CreateStudentDto {
  @IsNotEmpty({ message: 'First name is required.' })
  firstName!: string;

  @IsNotEmpty({ message: 'Last name is required.' })
  lastName!: string;

  @IsNotEmpty({ message: 'Email is required.' })
  email!: string;

  @IsCalendarDate({ message: INVALID_DATE_MESSAGE })
  enrollmentDate!: string;
}
