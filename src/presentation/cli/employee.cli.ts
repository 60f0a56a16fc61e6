import { Inject, Injectable } from '@nestjs/common';
import { CreateEmployeeDto, SearchEmployeesDto, UpdateEmployeeDto } from '@/application/dtos';
import { EmployeeService } from '@/application/services/employee.service';
import { EmployeeType, isManager } from '@/domain/models';
import type { ILogger } from '@/domain/services';
import { LOGGER_SERVICE } from '@/domain/services';
import { CliExceptionHandler } from '@/presentation/filters';
import { AnalyticsMenu } from './analytics.menu';
import { CliSession, createSession, runCommand } from './cli-session';
import { CliIO } from './console.io';
import { MAIN_MENU } from './employee.view';
import { InputClosedError } from './prompter';

const CHOICES = ['0', '1', '2', '3', '4', '5', '6', '7', '8', '9'] as const;
type MainChoice = (typeof CHOICES)[number];

/**
 * Interactive main menu.
 * Commands that fail print one error line and return to the menu; closed input ends the session.
 */
@Injectable()
export class EmployeeCli {
  private readonly exceptionHandler: CliExceptionHandler;

  constructor(
    private readonly employeeService: EmployeeService,
    private readonly analyticsMenu: AnalyticsMenu,
    @Inject(LOGGER_SERVICE)
    private readonly logger: ILogger,
  ) {
    this.exceptionHandler = new CliExceptionHandler(logger);
  }

  async run(io: CliIO): Promise<void> {
    const session = createSession(io);
    session.view.header();

    try {
      for (;;) {
        session.view.menu('MAIN MENU', MAIN_MENU);
        const choice = await session.prompt.choice('Enter your choice (0-9): ', CHOICES);
        if (choice === '0') {
          break;
        }
        await runCommand(session, this.exceptionHandler, () => this.execute(choice, session));
      }
    } catch (error) {
      if (!(error instanceof InputClosedError)) {
        throw error;
      }
      this.logger.debug('Input closed, leaving the menu');
      session.view.message('');
    }

    session.view.message('Thank you for using the Employee Management System!');
  }

  private async execute(choice: Exclude<MainChoice, '0'>, session: CliSession): Promise<void> {
    switch (choice) {
      case '1':
        return this.createEmployee(session);
      case '2':
        return this.editEmployee(session);
      case '3':
        return this.deleteEmployee(session);
      case '4':
        session.view.employees(await this.employeeService.findAll(), 'ALL EMPLOYEES');
        return;
      case '5':
        return this.searchEmployees(session);
      case '6':
        session.view.departmentSummary(await this.employeeService.departmentSummary());
        return;
      case '7':
        return this.analyticsMenu.run(session);
      case '8': {
        const path = await this.employeeService.backup();
        session.view.success(`Data backup created: ${path}`);
        return;
      }
      case '9':
        session.view.operations(await this.employeeService.recentOperations());
        return;
    }
  }

  private async createEmployee({ view, prompt }: CliSession): Promise<void> {
    view.title('CREATE NEW EMPLOYEE');
    view.message('1. Regular Employee');
    view.message('2. Manager');
    const kind = await prompt.choice('Select employee type (1-2): ', ['1', '2'] as const);

    const dto: CreateEmployeeDto = {
      id: (await prompt.required('Employee ID: ', 'Employee ID')).toUpperCase(),
      employeeType: kind === '2' ? EmployeeType.MANAGER : EmployeeType.EMPLOYEE,
      firstName: await prompt.required('First Name: ', 'First name'),
      lastName: await prompt.required('Last Name: ', 'Last name'),
      department: (await prompt.required('Department (2-3 letters): ', 'Department')).toUpperCase(),
      phoneNumber: await prompt.required('Phone Number (10 digits): ', 'Phone number'),
      salary: await prompt.number('Salary [0]: ', 'Salary', { defaultValue: 0 }),
    };

    if (kind === '2') {
      dto.teamSize = await prompt.number('Team Size [0]: ', 'Team size', { integer: true, defaultValue: 0 });
      dto.officeNumber = await prompt.text('Office Number: ');
    }

    const employee = await this.employeeService.create(dto);
    view.success(`${employee.employeeType} ${employee.id} created successfully!`);
  }

  private async editEmployee({ view, prompt }: CliSession): Promise<void> {
    view.title('EDIT EMPLOYEE');
    const id = (await prompt.required('Employee ID to edit: ', 'Employee ID')).toUpperCase();
    const employee = await this.employeeService.findById(id);

    view.employeeDetails(employee);
    if (!(await prompt.confirm('Do you want to edit this employee?'))) {
      view.message('Edit cancelled.');
      return;
    }

    view.message('Enter new information (press Enter to keep the current value):');
    const dto: UpdateEmployeeDto = {};

    const firstName = await prompt.text(`First Name [${employee.firstName}]: `);
    if (firstName) dto.firstName = firstName;
    const lastName = await prompt.text(`Last Name [${employee.lastName}]: `);
    if (lastName) dto.lastName = lastName;
    const department = await prompt.text(`Department [${employee.department}]: `);
    if (department) dto.department = department.toUpperCase();
    const phoneNumber = await prompt.text(`Phone Number [${employee.phoneNumber}]: `);
    if (phoneNumber) dto.phoneNumber = phoneNumber;

    const salary = await prompt.number(`Salary [${employee.salary}]: `, 'Salary', { defaultValue: employee.salary });
    if (salary !== employee.salary) dto.salary = salary;

    if (isManager(employee)) {
      const teamSize = await prompt.number(`Team Size [${employee.teamSize}]: `, 'Team size', {
        integer: true,
        defaultValue: employee.teamSize,
      });
      if (teamSize !== employee.teamSize) dto.teamSize = teamSize;
      const officeNumber = await prompt.text(`Office Number [${employee.officeNumber}]: `);
      if (officeNumber) dto.officeNumber = officeNumber;
    }

    await this.employeeService.update(id, dto);
    view.success(`Employee ${id} updated successfully!`);
  }

  private async deleteEmployee({ view, prompt }: CliSession): Promise<void> {
    view.title('DELETE EMPLOYEE');
    const id = (await prompt.required('Employee ID to delete: ', 'Employee ID')).toUpperCase();
    const employee = await this.employeeService.findById(id);

    view.employeeDetails(employee);
    if (!(await prompt.confirm('Are you sure you want to delete this employee?'))) {
      view.message('Deletion cancelled.');
      return;
    }

    await this.employeeService.remove(id);
    view.success(`Employee ${id} deleted successfully!`);
  }

  private async searchEmployees({ view, prompt }: CliSession): Promise<void> {
    view.title('SEARCH EMPLOYEES');
    view.message('1. Search by ID');
    view.message('2. Search by Name');
    view.message('3. Search by Department');
    view.message('4. Search by Employee Type');
    const by = await prompt.choice('Select search option (1-4): ', ['1', '2', '3', '4'] as const);

    const criteria: SearchEmployeesDto = {};
    switch (by) {
      case '1':
        criteria.id = await prompt.required('Enter Employee ID (or part of it): ', 'Employee ID');
        break;
      case '2':
        criteria.name = await prompt.required('Enter name (or part of it): ', 'Name');
        break;
      case '3':
        criteria.department = await prompt.required('Enter Department: ', 'Department');
        break;
      case '4': {
        const type = await prompt.choice('Enter Employee Type (1. Employee, 2. Manager): ', ['1', '2'] as const);
        criteria.type = type === '2' ? 'manager' : 'employee';
        break;
      }
    }

    view.employees(await this.employeeService.search(criteria), 'SEARCH RESULTS');
  }
}
