export { Employee, EmployeeType } from './employee.model';
export type { EmployeeProps, EmployeeRecord } from './employee.model';
export { Manager, isManager } from './manager.model';
export type { ManagerProps } from './manager.model';
export { SalaryChange, SalaryOperation } from './salary-change.model';
export type { SalaryChangeProps } from './salary-change.model';
export { OperationLog, OperationType } from './operation-log.model';
export type { OperationLogProps } from './operation-log.model';
export { formatCurrency, formatDateTime } from './format';
export {
  formatPhoneNumber,
  normalizeDepartment,
  normalizeName,
  sanitizePhoneNumber,
  toTitleCase,
  validateId,
  validateSalary,
  validateTeamSize,
} from './employee.validation';
