import type { Employee } from './employee.model';

/** Operation that caused a salary change. */
export enum SalaryOperation {
  CREATE = 'CREATE',
  UPDATE = 'UPDATE',
  DELETE = 'DELETE',
}

/** Properties for SalaryChange domain model. */
export interface SalaryChangeProps {
  timestamp: Date;
  employeeId: string;
  employeeName: string;
  department: string;
  oldSalary: number;
  newSalary: number;
  operation: SalaryOperation;
}

/** Transient record of one salary-affecting operation (never persisted). */
export class SalaryChange {
  /** @param props - SalaryChange properties (immutable after construction) */
  constructor(private readonly props: SalaryChangeProps) {}

  /**
   * Captures a change for the given employee, as it looks after the operation.
   */
  static of(
    employee: Employee,
    oldSalary: number,
    newSalary: number,
    operation: SalaryOperation,
    timestamp: Date = new Date(),
  ): SalaryChange {
    return new SalaryChange({
      timestamp,
      employeeId: employee.id,
      employeeName: employee.fullName,
      department: employee.department,
      oldSalary,
      newSalary,
      operation,
    });
  }

  get timestamp(): Date {
    return this.props.timestamp;
  }

  get employeeId(): string {
    return this.props.employeeId;
  }

  get employeeName(): string {
    return this.props.employeeName;
  }

  get department(): string {
    return this.props.department;
  }

  get oldSalary(): number {
    return this.props.oldSalary;
  }

  get newSalary(): number {
    return this.props.newSalary;
  }

  get changeAmount(): number {
    return this.props.newSalary - this.props.oldSalary;
  }

  /** Relative change in percent; 0 when there was no previous salary to compare with. */
  get changePercentage(): number {
    if (this.props.oldSalary <= 0) {
      return 0;
    }
    return (this.changeAmount / this.props.oldSalary) * 100;
  }

  get operation(): SalaryOperation {
    return this.props.operation;
  }
}
