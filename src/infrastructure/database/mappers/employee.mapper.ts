import { EmployeeValidationError } from '@/domain/errors';
import { Employee, EmployeeRecord, EmployeeType, Manager } from '@/domain/models';

/** Column order of the employee store. */
export const EMPLOYEE_RECORD_FIELDS: readonly (keyof EmployeeRecord)[] = [
  'id',
  'firstName',
  'lastName',
  'department',
  'phoneNumber',
  'salary',
  'employeeType',
  'teamSize',
  'officeNumber',
];

/** Data Mapper: converts between flat string records and Employee/Manager models. */
export class EmployeeMapper {
  /**
   * Builds the subtype named by the record's `employeeType` tag.
   * An empty tag is read as a regular employee.
   * @throws {EmployeeValidationError} On an unknown tag or any invalid field
   */
  static deserialize(record: Partial<Record<keyof EmployeeRecord, string>>): Employee {
    const base = {
      id: record.id ?? '',
      firstName: record.firstName ?? '',
      lastName: record.lastName ?? '',
      department: record.department ?? '',
      phoneNumber: record.phoneNumber ?? '',
      salary: EmployeeMapper.parseNumber(record.salary),
    };

    const type = (record.employeeType ?? '').trim();

    switch (type) {
      case '':
      case EmployeeType.EMPLOYEE:
        return new Employee(base);
      case EmployeeType.MANAGER:
        return new Manager({
          ...base,
          teamSize: EmployeeMapper.parseNumber(record.teamSize),
          officeNumber: record.officeNumber ?? '',
        });
      default:
        throw new EmployeeValidationError('employeeType', `Unknown employee type '${type}'`);
    }
  }

  /**
   * Converts a model to its ordered row of cells.
   * @returns Cells in EMPLOYEE_RECORD_FIELDS order
   */
  static toRow(employee: Employee): string[] {
    const record = employee.serialize();
    return EMPLOYEE_RECORD_FIELDS.map((field) => record[field]);
  }

  /** Blank cells count as 0; anything non-numeric becomes NaN and fails model validation. */
  private static parseNumber(value: string | undefined): number {
    if (value === undefined || value.trim() === '') {
      return 0;
    }
    return Number(value);
  }
}
