import { Employee } from '@/domain/models';

export const EMPLOYEE_REPOSITORY = Symbol('EMPLOYEE_REPOSITORY');

/**
 * Whole-collection store for employees.
 * Mutations never throw: a `false`/`null` result means nothing was written.
 */
export interface EmployeeRepository {
  /** Creates the backing store with just its header when it does not exist yet. */
  ensureStore(): Promise<void>;
  /** Reads every record; malformed records are skipped with a warning. */
  loadAll(): Promise<Employee[]>;
  /** Rewrites the whole store. Returns false when the write failed. */
  saveAll(employees: Employee[]): Promise<boolean>;
  /** Appends a new employee. Returns false when the id is already taken. */
  add(employee: Employee): Promise<boolean>;
  /** Replaces the record with `id`, keeping its position. Returns false when absent. */
  update(id: string, employee: Employee): Promise<boolean>;
  delete(id: string): Promise<boolean>;
  findById(id: string): Promise<Employee | null>;
  findByDepartment(department: string): Promise<Employee[]>;
  count(): Promise<number>;
  /** Writes a timestamped snapshot. Returns its path, or null when the backup failed. */
  backup(): Promise<string | null>;
}
