export { EMPLOYEE_RECORD_FIELDS, EmployeeMapper } from './employee.mapper';
export { OperationLogMapper } from './operation-log.mapper';
