import { MigrationInterface, QueryRunner, Table, TableUnique } from 'typeorm';

export class CreateStudentsTable1760000000000 implements MigrationInterface {
    name = 'CreateStudentsTable1760000000000';

    public async up(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.createTable(new Table({
            name: 'students',
            columns: [
                {
                    name: 'student_id',
                    type: 'integer',
                    isPrimary: true,
                    isGenerated: true,
                    generationStrategy: 'increment',
                },
                { name: 'first_name', type: 'text' },
                { name: 'last_name', type: 'text' },
                { name: 'email', type: 'text' },
                { name: 'enrollment_date', type: 'date' },
            ],
            uniques: [
                new TableUnique({ name: 'UQ_students_email', columnNames: ['email'] }),
            ],
        }), true);
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.dropTable('students', true);
    }
}
