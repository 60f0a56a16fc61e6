export { CreateEmployeeDto } from './create-employee.dto';
export { SearchEmployeesDto } from './search-employees.dto';
export type { EmployeeTypeFilter } from './search-employees.dto';
export { UpdateEmployeeDto } from './update-employee.dto';
