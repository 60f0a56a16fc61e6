/**
 * INTEGRATION TEST - OperationLogRepository
 *
 * Uses a real SQLite in-memory database through TypeORM.
 */

import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken, TypeOrmModule } from '@nestjs/typeorm';
import { DataSource, Repository } from 'typeorm';
import { OperationType } from '@/domain/models';
import { OperationLogEntity } from '@/infrastructure/database/entities';
import { TypeOrmOperationLogRepository } from './operation-log.repository';

describe('OperationLogRepository (Integration)', () => {
  let repository: TypeOrmOperationLogRepository;
  let dataSource: DataSource;
  let module: TestingModule;
  let ormRepository: Repository<OperationLogEntity>;

  beforeAll(async () => {
    module = await Test.createTestingModule({
      imports: [
        TypeOrmModule.forRoot({
          type: 'better-sqlite3',
          database: ':memory:',
          entities: [OperationLogEntity],
          synchronize: true,
          logging: false,
          retryAttempts: 0,
        }),
        TypeOrmModule.forFeature([OperationLogEntity]),
      ],
      providers: [TypeOrmOperationLogRepository],
    }).compile();

    repository = module.get<TypeOrmOperationLogRepository>(TypeOrmOperationLogRepository);
    dataSource = module.get<DataSource>(DataSource);
    ormRepository = module.get<Repository<OperationLogEntity>>(getRepositoryToken(OperationLogEntity));
  }, 30000);

  beforeEach(async () => {
    await ormRepository.clear();
  });

  afterAll(async () => {
    if (dataSource?.isInitialized) {
      await dataSource.destroy();
    }
    await module?.close();
  }, 10000);

  describe('record', () => {
    it('should persist an entry and assign an id', async () => {
      const log = await repository.record({
        operation: OperationType.INSERT,
        employeeId: 'E001',
        description: 'Create Employee John Smith',
        result: 'Created Employee: E001',
      });

      expect(log.id).toEqual(expect.any(Number));
      expect(log.operation).toBe(OperationType.INSERT);
      expect(log.employeeId).toBe('E001');
      expect(log.description).toBe('Create Employee John Smith');
      expect(log.result).toBe('Created Employee: E001');
    });

    it('should store a missing employee id as null', async () => {
      await repository.record({
        operation: OperationType.SELECT,
        description: 'List all employees',
        result: 'Retrieved 0 employees',
      });

      const [stored] = await ormRepository.find();
      expect(stored.employeeId).toBeNull();
    });
  });

  describe('findRecent', () => {
    it('should return the latest entries first', async () => {
      await repository.record({ operation: OperationType.INSERT, employeeId: 'E001', description: 'first', result: 'ok' });
      await repository.record({ operation: OperationType.UPDATE, employeeId: 'E001', description: 'second', result: 'ok' });
      await repository.record({ operation: OperationType.DELETE, employeeId: 'E001', description: 'third', result: 'ok' });

      const logs = await repository.findRecent(2);

      expect(logs.map((log) => log.description)).toEqual(['third', 'second']);
    });

    it('should return an empty list when nothing was logged', async () => {
      expect(await repository.findRecent()).toEqual([]);
    });
  });

  describe('count', () => {
    it('should count stored entries', async () => {
      await repository.record({ operation: OperationType.BACKUP, description: 'Backup employee data', result: 'ok' });
      await repository.record({ operation: OperationType.SELECT, description: 'Department summary', result: 'ok' });

      expect(await repository.count()).toBe(2);
    });
  });
});
