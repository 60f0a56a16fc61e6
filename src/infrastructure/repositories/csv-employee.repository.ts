import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { access, mkdir, readFile, rename, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import { Employee } from '@/domain/models';
import { EmployeeRepository } from '@/domain/repositories/employee.repository.interface';
import type { ILogger } from '@/domain/services';
import { LOGGER_SERVICE } from '@/domain/services';
import { parseCsvRecords, stringifyCsvRow } from '@/infrastructure/csv/csv.codec';
import { EMPLOYEE_RECORD_FIELDS, EmployeeMapper } from '@/infrastructure/database/mappers';

const DEFAULT_DATA_PATH = './data/employee_data.csv';
const DEFAULT_BACKUP_DIR = './data/backups';

/** `20240615_143000`, local time. */
function backupTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * CSV-file implementation of EmployeeRepository.
 * Every mutation reads the whole file, changes the list in memory and rewrites the file.
 */
@Injectable()
export class CsvEmployeeRepository implements EmployeeRepository {
  private readonly dataPath: string;
  private readonly backupDir: string;

  constructor(
    private readonly configService: ConfigService,
    @Inject(LOGGER_SERVICE)
    private readonly logger: ILogger,
  ) {
    this.dataPath = this.configService.get<string>('EMPLOYEE_DATA_PATH', DEFAULT_DATA_PATH);
    this.backupDir = this.configService.get<string>('EMPLOYEE_BACKUP_DIR', DEFAULT_BACKUP_DIR);
  }

  /** Writes a header-only file when none exists. */
  async ensureStore(): Promise<void> {
    try {
      await access(this.dataPath);
    } catch (error) {
      if (!isMissingFile(error)) {
        throw error;
      }
      if (!(await this.saveAll([]))) {
        throw new Error(`Unable to create employee store at ${this.dataPath}`);
      }
      this.logger.log('Created employee store', { path: this.dataPath });
    }
  }

  /** Loads every valid row; malformed rows are logged and skipped. */
  async loadAll(): Promise<Employee[]> {
    let text: string;
    try {
      text = await readFile(this.dataPath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        this.logger.warn('Employee store not found', { path: this.dataPath });
        return [];
      }
      throw error;
    }

    const { records } = parseCsvRecords(text);
    const employees: Employee[] = [];

    records.forEach((record, index) => {
      try {
        employees.push(EmployeeMapper.deserialize(record));
      } catch (error) {
        this.logger.warn('Skipping malformed employee record', {
          row: index + 1,
          id: record.id,
          reason: error instanceof Error ? error.message : String(error),
        });
      }
    });

    this.logger.debug('Loaded employees', { count: employees.length });
    return employees;
  }

  /** Rewrites the file through a temp file and rename. */
  async saveAll(employees: Employee[]): Promise<boolean> {
    try {
      await this.writeSnapshot(this.dataPath, employees);
      this.logger.debug('Saved employees', { count: employees.length });
      return true;
    } catch (error) {
      this.logger.error('Failed to save employees', {
        path: this.dataPath,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  async add(employee: Employee): Promise<boolean> {
    const employees = await this.loadForMutation();
    if (!employees) {
      return false;
    }

    if (employees.some((existing) => existing.id === employee.id)) {
      this.logger.warn('Employee ID already exists', { id: employee.id });
      return false;
    }

    employees.push(employee);
    return this.saveAll(employees);
  }

  async update(id: string, employee: Employee): Promise<boolean> {
    const employees = await this.loadForMutation();
    if (!employees) {
      return false;
    }
    const index = employees.findIndex((existing) => existing.id === id);

    if (index === -1) {
      this.logger.warn('Employee not found for update', { id });
      return false;
    }

    employees[index] = employee;
    return this.saveAll(employees);
  }

  async delete(id: string): Promise<boolean> {
    const employees = await this.loadForMutation();
    if (!employees) {
      return false;
    }
    const remaining = employees.filter((existing) => existing.id !== id);

    if (remaining.length === employees.length) {
      this.logger.warn('Employee not found for deletion', { id });
      return false;
    }

    return this.saveAll(remaining);
  }

  async findById(id: string): Promise<Employee | null> {
    const employees = await this.loadAll();
    return employees.find((employee) => employee.id === id) ?? null;
  }

  /** Case-insensitive department filter. */
  async findByDepartment(department: string): Promise<Employee[]> {
    const wanted = department.trim().toUpperCase();
    const employees = await this.loadAll();
    return employees.filter((employee) => employee.department === wanted);
  }

  async count(): Promise<number> {
    const employees = await this.loadAll();
    return employees.length;
  }

  /** Snapshots the current collection into the backup directory. */
  /** Backups taken within the same second get a `_1`, `_2`, ... suffix. */
  async backup(): Promise<string | null> {
    let path = join(this.backupDir, `employee_data_backup_${backupTimestamp(new Date())}.csv`);

    try {
      path = await this.unusedPath(path);
      const employees = await this.loadAll();
      await this.writeSnapshot(path, employees);
      this.logger.log('Created backup', { path, count: employees.length });
      return path;
    } catch (error) {
      this.logger.error('Failed to create backup', {
        path,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  /** @internal An unreadable store must not be overwritten, so mutations stop here. */
  private async loadForMutation(): Promise<Employee[] | null> {
    try {
      return await this.loadAll();
    } catch (error) {
      this.logger.error('Failed to read employee store', {
        path: this.dataPath,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  /** @internal First of `name.csv`, `name_1.csv`, ... that does not exist yet. */
  private async unusedPath(path: string): Promise<string> {
    const base = path.replace(/\.csv$/, '');
    let candidate = path;

    for (let suffix = 1; await this.exists(candidate); suffix++) {
      candidate = `${base}_${suffix}.csv`;
    }
    return candidate;
  }

  private async exists(path: string): Promise<boolean> {
    try {
      await access(path);
      return true;
    } catch (error) {
      if (isMissingFile(error)) {
        return false;
      }
      throw error;
    }
  }

  /** @internal Serializes the collection and swaps it into place. */
  private async writeSnapshot(path: string, employees: Employee[]): Promise<void> {
    const lines = [
      stringifyCsvRow(EMPLOYEE_RECORD_FIELDS),
      ...employees.map((employee) => stringifyCsvRow(EmployeeMapper.toRow(employee))),
    ];
    const tempPath = `${path}.tmp`;

    await mkdir(dirname(path), { recursive: true });
    await writeFile(tempPath, `${lines.join('\n')}\n`, 'utf-8');
    await rename(tempPath, path);
  }
}
