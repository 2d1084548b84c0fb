import { Inject, Injectable, Logger } from '@nestjs/common';
import { StudentsService } from '../student/student.service';
import { StudentNotFoundException } from '../common/exceptions/students.exceptions';
import { describeException } from '../common/exceptions/exception.utils';
import { formatStudentTable } from './student-table';
import { Terminal, TERMINAL } from './terminal';

export enum MenuState {
  AwaitingChoice = 'AwaitingChoice',
  Exited = 'Exited',
}

export const MENU_LINES = [
  '--- Students CRUD Menu ---',
  '1. View all students',
  '2. Add a student',
  '3. Update student email',
  '4. Delete a student',
  '0. Exit',
];

@Injectable()
export class MenuService {
  private readonly logger = new Logger(MenuService.name);

  constructor(
    private readonly studentsService: StudentsService,
    @Inject(TERMINAL)
    private readonly terminal: Terminal,
  ) {}

  async run(): Promise<void> {
    let state = MenuState.AwaitingChoice;
    while (state === MenuState.AwaitingChoice) {
      MENU_LINES.forEach((line) => this.terminal.print(line));
      const choice = await this.terminal.ask('Choose an option');
      state = choice === null ? this.exit() : await this.handleChoice(choice.trim());
    }
  }

  async handleChoice(choice: string): Promise<MenuState> {
    switch (choice) {
      case '1':
        await this.attempt(() => this.listStudents());
        return MenuState.AwaitingChoice;
      case '2': {
        const fields = await this.collect([
          'First name',
          'Last name',
          'Email',
          'Enrollment date (YYYY-MM-DD)',
        ]);
        if (!fields) {
          return this.exit();
        }
        const [firstName, lastName, email, enrollmentDate] = fields;
        await this.attempt(async () => {
          const studentId = await this.studentsService.create({
            firstName,
            lastName,
            email,
            enrollmentDate,
          });
          this.printBlock(`Student added with ID ${studentId}.`);
        });
        return MenuState.AwaitingChoice;
      }
      case '3': {
        const fields = await this.collect(['Student ID', 'New email']);
        if (!fields) {
          return this.exit();
        }
        const [studentId, newEmail] = fields;
        await this.attempt(async () => {
          await this.studentsService.updateEmail(studentId, newEmail);
          this.printBlock('Email updated successfully.');
        });
        return MenuState.AwaitingChoice;
      }
      case '4': {
        const fields = await this.collect(['Student ID to delete']);
        if (!fields) {
          return this.exit();
        }
        const [studentId] = fields;
        await this.attempt(async () => {
          await this.studentsService.remove(studentId);
          this.printBlock('Student deleted successfully.');
        });
        return MenuState.AwaitingChoice;
      }
      case '0':
        return this.exit();
      default:
        this.printBlock('Invalid option. Please try again.');
        return MenuState.AwaitingChoice;
    }
  }

  private async listStudents(): Promise<void> {
    const students = await this.studentsService.findAll();
    if (students.length === 0) {
      this.printBlock('No students found.');
      return;
    }
    this.printBlock(...formatStudentTable(students));
  }

  /** Asks each question in turn; null when the input closed part way. */
  private async collect(questions: string[]): Promise<string[] | null> {
    const answers: string[] = [];
    for (const question of questions) {
      const answer = await this.terminal.ask(question);
      if (answer === null) {
        return null;
      }
      answers.push(answer.trim());
    }
    return answers;
  }

  private async attempt(operation: () => Promise<void>): Promise<void> {
    try {
      await operation();
    } catch (error) {
      this.logger.debug(`Operation failed: ${describeException(error)}`);
      if (error instanceof StudentNotFoundException) {
        this.printBlock(error.message);
      } else {
        this.printBlock(`[ERROR] ${describeException(error)}`);
      }
    }
  }

  private exit(): MenuState {
    this.terminal.print('');
    this.terminal.print('Goodbye.');
    return MenuState.Exited;
  }

  private printBlock(...lines: string[]): void {
    this.terminal.print('');
    lines.forEach((line) => this.terminal.print(line));
    this.terminal.print('');
  }
}
