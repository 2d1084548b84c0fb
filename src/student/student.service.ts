import { Injectable, Logger } from '@nestjs/common';
import { DatabaseService } from '../database/database.service';
import { Student } from './entities/student.entity';
import { CreateStudentDto } from './dto/create-student.dto';
import { UpdateStudentEmailDto } from './dto/update-student-email.dto';
import { parseStudentId } from './utils/student-id.util';
import { validateInput } from '../common/validation/validate-input';
import { StudentNotFoundException } from '../common/exceptions/students.exceptions';
import { translateStoreError } from '../common/exceptions/exception.utils';

@Injectable()
export class StudentsService {
  private readonly logger = new Logger(StudentsService.name);

  constructor(private readonly databaseService: DatabaseService) {}

  async findAll(): Promise<Student[]> {
    try {
      return await this.databaseService.withConnection((queryRunner) =>
        queryRunner.manager.find(Student, { order: { studentId: 'ASC' } }),
      );
    } catch (error) {
      throw this.fail(error, 'Failed to fetch students');
    }
  }

  async create(createStudentDto: CreateStudentDto): Promise<number> {
    const dto = await validateInput(CreateStudentDto, createStudentDto);
    this.logger.debug(`Creating student with email: ${dto.email}`);

    try {
      const saved = await this.databaseService.withTransaction((manager) =>
        manager.save(
          manager.create(Student, {
            firstName: dto.firstName,
            lastName: dto.lastName,
            email: dto.email,
            enrollmentDate: dto.enrollmentDate,
          }),
        ),
      );
      this.logger.debug(`Created student with ID: ${saved.studentId}`);
      return saved.studentId;
    } catch (error) {
      throw this.fail(error, 'Failed to add student');
    }
  }

  async updateEmail(rawStudentId: string, newEmail: string): Promise<void> {
    const studentId = parseStudentId(rawStudentId);
    const dto = await validateInput(UpdateStudentEmailDto, { email: newEmail });

    try {
      await this.databaseService.withTransaction(async (manager) => {
        const result = await manager.update(Student, { studentId }, { email: dto.email });
        if (!result.affected) {
          throw new StudentNotFoundException();
        }
      });
      this.logger.debug(`Updated email of student ${studentId}`);
    } catch (error) {
      throw this.fail(error, 'Failed to update email');
    }
  }

  async remove(rawStudentId: string): Promise<void> {
    const studentId = parseStudentId(rawStudentId);

    try {
      await this.databaseService.withTransaction(async (manager) => {
        const result = await manager.delete(Student, { studentId });
        if (!result.affected) {
          throw new StudentNotFoundException();
        }
      });
      this.logger.debug(`Deleted student ${studentId}`);
    } catch (error) {
      throw this.fail(error, 'Failed to delete student');
    }
  }

  private fail(error: unknown, action: string) {
    const exception = translateStoreError(error, action);
    this.logger.debug(`${action}: ${exception.message}`);
    return exception;
  }
}
