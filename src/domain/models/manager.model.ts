import { Employee, EmployeeProps, EmployeeRecord, EmployeeType } from './employee.model';
import { validateTeamSize } from './employee.validation';

export interface ManagerProps extends EmployeeProps {
  teamSize?: number;
  officeNumber?: string;
}

/** Employee who leads a team; rendering and serialization extend the base form. */
export class Manager extends Employee {
  private teamSizeValue: number;
  private officeNumberValue: string;

  constructor(props: ManagerProps) {
    super(props);
    this.teamSizeValue = validateTeamSize(props.teamSize ?? 0);
    this.officeNumberValue = props.officeNumber ?? '';
  }

  override get employeeType(): EmployeeType {
    return EmployeeType.MANAGER;
  }

  get teamSize(): number {
    return this.teamSizeValue;
  }

  set teamSize(value: number) {
    this.teamSizeValue = validateTeamSize(value);
  }

  get officeNumber(): string {
    return this.officeNumberValue;
  }

  set officeNumber(value: string) {
    this.officeNumberValue = value;
  }

  override clone(): Manager {
    return new Manager(this.toPlainObject());
  }

  override toPlainObject(): ManagerProps {
    return {
      ...super.toPlainObject(),
      teamSize: this.teamSizeValue,
      officeNumber: this.officeNumberValue,
    };
  }

  override serialize(): EmployeeRecord {
    return {
      ...super.serialize(),
      teamSize: String(this.teamSizeValue),
      officeNumber: this.officeNumberValue,
    };
  }

  override toString(): string {
    return `Manager - ${super.toString()}, Team Size: ${this.teamSizeValue}, Office: ${this.officeNumberValue}`;
  }
}

/** Narrows a collection member to Manager; the subtype is the only source of truth for type. */
export function isManager(employee: Employee): employee is Manager {
  return employee instanceof Manager;
}
