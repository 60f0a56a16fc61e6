/** Kind of command recorded in the operation log. */
export enum OperationType {
  INSERT = 'INSERT',
  UPDATE = 'UPDATE',
  DELETE = 'DELETE',
  SELECT = 'SELECT',
  BACKUP = 'BACKUP',
}

/** Properties for OperationLog domain model. */
export interface OperationLogProps {
  id?: number;
  operation: OperationType;
  employeeId: string | null;
  description: string;
  result: string;
  createdAt: Date;
}

/** Audit entry for one command executed against the employee store. */
export class OperationLog {
  /** @param props - OperationLog properties (immutable after construction) */
  constructor(private readonly props: OperationLogProps) {}

  get id(): number | undefined {
    return this.props.id;
  }

  get operation(): OperationType {
    return this.props.operation;
  }

  get employeeId(): string | null {
    return this.props.employeeId;
  }

  get description(): string {
    return this.props.description;
  }

  get result(): string {
    return this.props.result;
  }

  get createdAt(): Date {
    return this.props.createdAt;
  }
}
