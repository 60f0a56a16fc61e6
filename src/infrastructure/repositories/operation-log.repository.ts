import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { OperationLog } from '@/domain/models';
import {
  OperationLogRepository,
  RecordOperationData,
} from '@/domain/repositories/operation-log.repository.interface';
import { OperationLogEntity } from '@/infrastructure/database/entities';
import { OperationLogMapper } from '@/infrastructure/database/mappers';

/** TypeORM implementation of OperationLogRepository. */
@Injectable()
export class TypeOrmOperationLogRepository implements OperationLogRepository {
  constructor(
    @InjectRepository(OperationLogEntity)
    private readonly repository: Repository<OperationLogEntity>,
  ) {}

  /** Appends a new entry. */
  async record(data: RecordOperationData): Promise<OperationLog> {
    const entity = this.repository.create({
      operation: data.operation,
      employeeId: data.employeeId ?? null,
      description: data.description,
      result: data.result,
    });

    const savedEntity = await this.repository.save(entity);
    return OperationLogMapper.toDomain(savedEntity);
  }

  /** Latest entries first; ties on the timestamp fall back to insertion order. */
  async findRecent(limit = 20): Promise<OperationLog[]> {
    const entities = await this.repository.find({
      order: { createdAt: 'DESC', id: 'DESC' },
      take: limit,
    });
    return entities.map((entity) => OperationLogMapper.toDomain(entity));
  }

  async count(): Promise<number> {
    return this.repository.count();
  }
}
