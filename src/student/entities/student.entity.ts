import { Column, Entity, PrimaryGeneratedColumn, Unique } from 'typeorm';

@Entity('students')
@Unique('UQ_students_email', ['email'])
export class Student {
  @PrimaryGeneratedColumn({ name: 'student_id' })
  studentId!: number;

  @Column({ name: 'first_name', type: 'text' })
  firstName!: string;

  @Column({ name: 'last_name', type: 'text' })
  lastName!: string;

  @Column({ type: 'text' })
  email!: string;

  // the pg driver hands dates back as 'YYYY-MM-DD' strings
  @Column({ name: 'enrollment_date', type: 'date' })
  enrollmentDate!: string;
}
