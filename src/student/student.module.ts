import { Module } from '@nestjs/common';
import { DatabaseModule } from '../database/database.module';
import { StudentsService } from './student.service';

@Module({
  imports: [DatabaseModule],
  providers: [StudentsService],
  exports: [StudentsService],
})
export class StudentsModule {}
