import { formatCurrency } from './format';
import {
  formatPhoneNumber,
  normalizeDepartment,
  normalizeName,
  sanitizePhoneNumber,
  validateId,
  validateSalary,
} from './employee.validation';

/** Type tag carried in the serialized form. */
export enum EmployeeType {
  EMPLOYEE = 'Employee',
  MANAGER = 'Manager',
}

/** Properties accepted when constructing an Employee. */
export interface EmployeeProps {
  id: string;
  firstName: string;
  lastName: string;
  department: string;
  phoneNumber: string;
  salary?: number;
}

/** Flat, string-keyed form of an employee as stored in the CSV file. */
export interface EmployeeRecord {
  id: string;
  firstName: string;
  lastName: string;
  department: string;
  phoneNumber: string;
  salary: string;
  employeeType: string;
  teamSize: string;
  officeNumber: string;
}

type EmployeeState = Required<EmployeeProps>;

/**
 * Domain model for a personnel record.
 * Every field is validated on construction and again by each setter;
 * `id` is the only field that cannot change.
 * @throws {EmployeeValidationError} From the constructor or any setter on invalid input
 */
export class Employee {
  private readonly state: EmployeeState;

  constructor(props: EmployeeProps) {
    this.state = {
      id: validateId(props.id),
      firstName: normalizeName(props.firstName, 'firstName', 'First name'),
      lastName: normalizeName(props.lastName, 'lastName', 'Last name'),
      department: normalizeDepartment(props.department),
      phoneNumber: sanitizePhoneNumber(props.phoneNumber),
      salary: validateSalary(props.salary ?? 0),
    };
  }

  get id(): string {
    return this.state.id;
  }

  get employeeType(): EmployeeType {
    return EmployeeType.EMPLOYEE;
  }

  get firstName(): string {
    return this.state.firstName;
  }

  set firstName(value: string) {
    this.state.firstName = normalizeName(value, 'firstName', 'First name');
  }

  get lastName(): string {
    return this.state.lastName;
  }

  set lastName(value: string) {
    this.state.lastName = normalizeName(value, 'lastName', 'Last name');
  }

  get fullName(): string {
    return `${this.state.firstName} ${this.state.lastName}`;
  }

  get department(): string {
    return this.state.department;
  }

  set department(value: string) {
    this.state.department = normalizeDepartment(value);
  }

  /** The 10 stored digits, without punctuation. */
  get phoneNumber(): string {
    return this.state.phoneNumber;
  }

  set phoneNumber(value: string) {
    this.state.phoneNumber = sanitizePhoneNumber(value);
  }

  get salary(): number {
    return this.state.salary;
  }

  set salary(value: number) {
    this.state.salary = validateSalary(value);
  }

  formattedPhone(): string {
    return formatPhoneNumber(this.state.phoneNumber);
  }

  /** Independent copy; used to stage edits without touching the original. */
  clone(): Employee {
    return new Employee(this.toPlainObject());
  }

  toPlainObject(): EmployeeProps {
    return { ...this.state };
  }

  serialize(): EmployeeRecord {
    return {
      id: this.state.id,
      firstName: this.state.firstName,
      lastName: this.state.lastName,
      department: this.state.department,
      phoneNumber: this.state.phoneNumber,
      salary: String(this.state.salary),
      employeeType: this.employeeType,
      teamSize: '',
      officeNumber: '',
    };
  }

  toString(): string {
    return (
      `Employee ID: ${this.state.id}, Name: ${this.fullName}, ` +
      `Department: ${this.state.department}, Phone: ${this.formattedPhone()}, ` +
      `Salary: ${formatCurrency(this.state.salary)}`
    );
  }
}
