import { IsNotEmpty } from 'class-validator';

export class UpdateStudentEmailDto {
  @IsNotEmpty({ message: 'Email is required.' })
  email!: string;
}
