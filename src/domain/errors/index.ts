export { EmployeeValidationError } from './employee-validation.error';
