import { OperationLog, OperationType } from '@/domain/models';

export interface RecordOperationData {
  operation: OperationType;
  employeeId?: string | null;
  description: string;
  result: string;
}

export const OPERATION_LOG_REPOSITORY = Symbol('OPERATION_LOG_REPOSITORY');

export interface OperationLogRepository {
  record(data: RecordOperationData): Promise<OperationLog>;
  /** Returns the latest entries, newest first. */
  findRecent(limit?: number): Promise<OperationLog[]>;
  count(): Promise<number>;
}
