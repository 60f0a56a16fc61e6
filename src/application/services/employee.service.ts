import {
  BadRequestException,
  ConflictException,
  Inject,
  Injectable,
  InternalServerErrorException,
  NotFoundException,
} from '@nestjs/common';
import { CreateEmployeeDto, SearchEmployeesDto, UpdateEmployeeDto } from '@/application/dtos';
import { validateDto } from '@/application/validation';
import {
  Employee,
  EmployeeType,
  isManager,
  Manager,
  OperationLog,
  OperationType,
  SalaryOperation,
} from '@/domain/models';
import type { EmployeeRepository, OperationLogRepository } from '@/domain/repositories';
import { EMPLOYEE_REPOSITORY, OPERATION_LOG_REPOSITORY } from '@/domain/repositories';
import type { ILogger } from '@/domain/services';
import { LOGGER_SERVICE } from '@/domain/services';
import { AnalyticsService, DepartmentSummary } from './analytics.service';

/**
 * Use cases behind the menu: create, edit, delete, list, search, summaries and backup.
 * Each mutation goes through the repository, the salary change log and the operation log.
 */
@Injectable()
export class EmployeeService {
  constructor(
    @Inject(EMPLOYEE_REPOSITORY)
    private readonly employeeRepository: EmployeeRepository,
    @Inject(OPERATION_LOG_REPOSITORY)
    private readonly operationLogRepository: OperationLogRepository,
    private readonly analyticsService: AnalyticsService,
    @Inject(LOGGER_SERVICE)
    private readonly logger: ILogger,
  ) {}

  /**
   * Creates an employee or manager.
   * @throws {BadRequestException} When the input shape is invalid
   * @throws {EmployeeValidationError} When a field breaks a domain rule
   * @throws {ConflictException} When the id is already in use
   * @throws {InternalServerErrorException} When the store could not be written
   */
  async create(input: CreateEmployeeDto): Promise<Employee> {
    const dto = validateDto(CreateEmployeeDto, input);
    this.logger.log('Creating employee', { id: dto.id, employeeType: dto.employeeType ?? EmployeeType.EMPLOYEE });

    const employee =
      dto.employeeType === EmployeeType.MANAGER
        ? new Manager(dto)
        : new Employee(this.rejectManagerFields(dto));

    if (await this.employeeRepository.findById(employee.id)) {
      throw new ConflictException(`Employee ID '${employee.id}' is already in use`);
    }

    if (!(await this.employeeRepository.add(employee))) {
      throw new InternalServerErrorException(`Failed to create employee '${employee.id}'`);
    }

    this.analyticsService.recordSalaryChange(employee, 0, employee.salary, SalaryOperation.CREATE);
    await this.operationLogRepository.record({
      operation: OperationType.INSERT,
      employeeId: employee.id,
      description: `Create ${employee.employeeType} ${employee.fullName}`,
      result: `Created ${employee.employeeType}: ${employee.id}`,
    });

    this.logger.log('Employee created successfully', { id: employee.id });
    return employee;
  }

  /**
   * Applies the provided fields to an existing record, keeping its position in the store.
   * Changes are staged on a copy, so a rejected field leaves the stored record untouched.
   * @throws {NotFoundException} When no employee has this id
   * @throws {BadRequestException} When manager-only fields are sent for a regular employee
   * @throws {EmployeeValidationError} When a field breaks a domain rule
   * @throws {InternalServerErrorException} When the store could not be written
   */
  async update(id: string, input: UpdateEmployeeDto): Promise<Employee> {
    const dto = validateDto(UpdateEmployeeDto, input);
    this.logger.log('Updating employee', { id });

    const existing = await this.employeeRepository.findById(id);
    if (!existing) {
      throw new NotFoundException(`Employee '${id}' not found`);
    }

    const updated = existing.clone();
    if (dto.firstName !== undefined) updated.firstName = dto.firstName;
    if (dto.lastName !== undefined) updated.lastName = dto.lastName;
    if (dto.department !== undefined) updated.department = dto.department;
    if (dto.phoneNumber !== undefined) updated.phoneNumber = dto.phoneNumber;
    if (dto.salary !== undefined) updated.salary = dto.salary;

    if (isManager(updated)) {
      if (dto.teamSize !== undefined) updated.teamSize = dto.teamSize;
      if (dto.officeNumber !== undefined) updated.officeNumber = dto.officeNumber;
    } else {
      this.rejectManagerFields(dto);
    }

    if (!(await this.employeeRepository.update(id, updated))) {
      throw new InternalServerErrorException(`Failed to update employee '${id}'`);
    }

    if (updated.salary !== existing.salary) {
      this.analyticsService.recordSalaryChange(updated, existing.salary, updated.salary, SalaryOperation.UPDATE);
    }
    await this.operationLogRepository.record({
      operation: OperationType.UPDATE,
      employeeId: id,
      description: `Update ${updated.fullName} (${updated.department})`,
      result: `Updated employee: ${id}`,
    });

    this.logger.log('Employee updated successfully', { id });
    return updated;
  }

  /**
   * Deletes an employee.
   * @throws {NotFoundException} When no employee has this id
   * @throws {InternalServerErrorException} When the store could not be written
   */
  async remove(id: string): Promise<void> {
    this.logger.log('Deleting employee', { id });

    const existing = await this.employeeRepository.findById(id);
    if (!existing) {
      throw new NotFoundException(`Employee '${id}' not found`);
    }

    if (!(await this.employeeRepository.delete(id))) {
      throw new InternalServerErrorException(`Failed to delete employee '${id}'`);
    }

    this.analyticsService.recordSalaryChange(existing, existing.salary, 0, SalaryOperation.DELETE);
    await this.operationLogRepository.record({
      operation: OperationType.DELETE,
      employeeId: id,
      description: `Delete ${existing.fullName}`,
      result: `Deleted employee: ${id}`,
    });

    this.logger.log('Employee deleted successfully', { id });
  }

  async findAll(): Promise<Employee[]> {
    const employees = await this.employeeRepository.loadAll();

    await this.operationLogRepository.record({
      operation: OperationType.SELECT,
      description: 'List all employees',
      result: `Retrieved ${employees.length} employees`,
    });

    return employees;
  }

  /**
   * Loads the collection for one analytics screen and logs that screen, not a listing.
   * @param command Name of the analytics screen, stored as the log description
   */
  async loadForAnalytics(command: string): Promise<Employee[]> {
    const employees = await this.employeeRepository.loadAll();
    await this.recordQuery(command, `Analyzed ${employees.length} employees`);
    return employees;
  }

  /** Logs a read-only command that does not go through the store. */
  async recordQuery(description: string, result: string): Promise<void> {
    await this.operationLogRepository.record({ operation: OperationType.SELECT, description, result });
  }

  /**
   * @throws {NotFoundException} When no employee has this id
   */
  async findById(id: string): Promise<Employee> {
    const employee = await this.employeeRepository.findById(id);

    if (!employee) {
      throw new NotFoundException(`Employee '${id}' not found`);
    }

    return employee;
  }

  /**
   * Filters the collection; every provided criterion must match.
   * @throws {BadRequestException} When the criteria are invalid
   */
  async search(input: SearchEmployeesDto): Promise<Employee[]> {
    const criteria = validateDto(SearchEmployeesDto, input);
    this.logger.log('Searching employees', { ...criteria });

    const idFilter = criteria.id?.trim().toLowerCase();
    const nameFilter = criteria.name?.trim().toLowerCase();

    const employees = await this.employeeRepository.loadAll();
    const matches = employees.filter((employee) => {
      if (idFilter && !employee.id.toLowerCase().includes(idFilter)) {
        return false;
      }
      if (
        nameFilter &&
        !employee.firstName.toLowerCase().includes(nameFilter) &&
        !employee.lastName.toLowerCase().includes(nameFilter)
      ) {
        return false;
      }
      if (criteria.department && employee.department !== criteria.department) {
        return false;
      }
      if (criteria.type === 'manager' && !isManager(employee)) {
        return false;
      }
      if (criteria.type === 'employee' && isManager(employee)) {
        return false;
      }
      return true;
    });

    const fields = Object.entries(criteria)
      .filter(([, value]) => value !== undefined && value !== '')
      .map(([field]) => field);

    await this.operationLogRepository.record({
      operation: OperationType.SELECT,
      description: `Search employees by ${fields.join(', ') || 'nothing'}`,
      result: `Found ${matches.length} employees`,
    });

    return matches;
  }

  async departmentSummary(): Promise<Map<string, DepartmentSummary>> {
    const employees = await this.employeeRepository.loadAll();
    const summary = this.analyticsService.departmentSummary(employees);

    await this.operationLogRepository.record({
      operation: OperationType.SELECT,
      description: 'Department summary',
      result: `Department summary for ${summary.size} departments`,
    });

    return summary;
  }

  /**
   * Writes a timestamped snapshot of the store.
   * @returns Path of the backup file
   * @throws {InternalServerErrorException} When the snapshot could not be written
   */
  async backup(): Promise<string> {
    const path = await this.employeeRepository.backup();

    if (!path) {
      throw new InternalServerErrorException('Failed to create backup');
    }

    await this.operationLogRepository.record({
      operation: OperationType.BACKUP,
      description: 'Backup employee data',
      result: `Backup written to ${path}`,
    });

    return path;
  }

  async recentOperations(limit = 20): Promise<OperationLog[]> {
    return this.operationLogRepository.findRecent(limit);
  }

  /** @internal Manager-only fields make no sense on a regular employee. */
  private rejectManagerFields<T extends { teamSize?: number; officeNumber?: string }>(dto: T): T {
    if (dto.teamSize !== undefined || dto.officeNumber !== undefined) {
      throw new BadRequestException('teamSize and officeNumber apply to managers only');
    }
    return dto;
  }
}
