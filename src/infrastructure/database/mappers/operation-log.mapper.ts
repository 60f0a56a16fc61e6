import { OperationLog } from '@/domain/models';
import { OperationLogEntity } from '@/infrastructure/database/entities';

/** Data Mapper: converts between ORM Entity and Domain Model. */
export class OperationLogMapper {
  /**
   * Converts ORM entity to domain model.
   * @param entity - TypeORM entity from database
   */
  static toDomain(entity: OperationLogEntity): OperationLog {
    return new OperationLog({
      id: entity.id,
      operation: entity.operation,
      employeeId: entity.employeeId,
      description: entity.description,
      result: entity.result,
      createdAt: entity.createdAt,
    });
  }
}
