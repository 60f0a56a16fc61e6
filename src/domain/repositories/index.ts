export { EMPLOYEE_REPOSITORY } from './employee.repository.interface';
export type { EmployeeRepository } from './employee.repository.interface';

export { OPERATION_LOG_REPOSITORY } from './operation-log.repository.interface';
export type { OperationLogRepository, RecordOperationData } from './operation-log.repository.interface';
