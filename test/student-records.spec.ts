import { StudentsService } from '../src/student/student.service';
import { StudentNotFoundException } from '../src/common/exceptions/students.exceptions';
import { createDatabaseService, InMemoryDataSource } from './support/in-memory-data-source';

describe('Student records lifecycle', () => {
  let source: InMemoryDataSource;
  let service: StudentsService;

  beforeEach(() => {
    source = new InMemoryDataSource();
    service = new StudentsService(createDatabaseService(source));
  });

  it('creates, lists, updates and deletes a record', async () => {
    const id = await service.create({
      firstName: 'Ada',
      lastName: 'Lovelace',
      email: 'ada@x.com',
      enrollmentDate: '1843-12-10',
    });

    expect(await service.findAll()).toEqual([
      {
        studentId: id,
        firstName: 'Ada',
        lastName: 'Lovelace',
        email: 'ada@x.com',
        enrollmentDate: '1843-12-10',
      },
    ]);

    await service.updateEmail(String(id), 'ada2@x.com');
    expect((await service.findAll()).map((student) => student.email)).toEqual(['ada2@x.com']);

    await service.remove(String(id));
    expect(await service.findAll()).toEqual([]);
  });

  it('gives each new record an id no other record had', async () => {
    const ids: number[] = [];
    for (const name of ['Ada', 'Alan', 'Grace']) {
      ids.push(
        await service.create({
          firstName: name,
          lastName: 'Tester',
          email: `${name.toLowerCase()}@example.com`,
          enrollmentDate: '2023-09-01',
        }),
      );
      await service.remove(String(ids[ids.length - 1]));
    }

    expect(new Set(ids).size).toBe(3);
  });

  it('leaves every record untouched when updating a missing id', async () => {
    await service.create({
      firstName: 'Ada',
      lastName: 'Lovelace',
      email: 'ada@x.com',
      enrollmentDate: '1843-12-10',
    });
    const before = await service.findAll();

    await expect(service.updateEmail('404', 'ghost@x.com')).rejects.toBeInstanceOf(
      StudentNotFoundException,
    );
    expect(await service.findAll()).toEqual(before);
  });

  it('opens and releases one connection per operation', async () => {
    await service.findAll();
    await service.create({
      firstName: 'Ada',
      lastName: 'Lovelace',
      email: 'ada@x.com',
      enrollmentDate: '1843-12-10',
    });
    await service.remove('1');

    expect(source.stats.connections).toBe(3);
    expect(source.stats.releases).toBe(3);
  });
});
