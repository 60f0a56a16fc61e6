import { NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { AnalyticsService } from '@/application/services/analytics.service';
import { EmployeeService } from '@/application/services/employee.service';
import { Employee, EmployeeType, Manager, OperationLog, OperationType } from '@/domain/models';
import type { ILogger } from '@/domain/services';
import { LOGGER_SERVICE } from '@/domain/services';
import { AnalyticsMenu } from './analytics.menu';
import { CliIO } from './console.io';
import { EmployeeCli } from './employee.cli';

class ScriptedIO implements CliIO {
  readonly lines: string[] = [];

  constructor(private readonly answers: string[]) {}

  async ask(): Promise<string | null> {
    return this.answers.shift() ?? null;
  }

  print(text = ''): void {
    this.lines.push(text);
  }

  close(): void {}
}

type EmployeeServiceMock = jest.Mocked<
  Pick<
    EmployeeService,
    | 'create'
    | 'update'
    | 'remove'
    | 'findAll'
    | 'loadForAnalytics'
    | 'recordQuery'
    | 'findById'
    | 'search'
    | 'departmentSummary'
    | 'backup'
    | 'recentOperations'
  >
>;

describe('EmployeeCli', () => {
  let cli: EmployeeCli;
  let employeeService: EmployeeServiceMock;
  let mockLogger: jest.Mocked<ILogger>;

  const john = () =>
    new Employee({
      id: 'E001',
      firstName: 'John',
      lastName: 'Smith',
      department: 'IT',
      phoneNumber: '5551234567',
      salary: 55000,
    });

  const jane = () =>
    new Manager({
      id: 'M001',
      firstName: 'Jane',
      lastName: 'Doe',
      department: 'HR',
      phoneNumber: '5559876543',
      salary: 85000,
      teamSize: 8,
      officeNumber: 'B-201',
    });

  const run = async (answers: string[]) => {
    const io = new ScriptedIO(answers);
    await cli.run(io);
    return io.lines;
  };

  beforeEach(async () => {
    employeeService = {
      create: jest.fn(),
      update: jest.fn(),
      remove: jest.fn(),
      findAll: jest.fn(),
      loadForAnalytics: jest.fn(),
      recordQuery: jest.fn(),
      findById: jest.fn(),
      search: jest.fn(),
      departmentSummary: jest.fn(),
      backup: jest.fn(),
      recentOperations: jest.fn(),
    };

    mockLogger = {
      log: jest.fn(),
      warn: jest.fn(),
      error: jest.fn(),
      debug: jest.fn(),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        EmployeeCli,
        AnalyticsMenu,
        AnalyticsService,
        {
          provide: ConfigService,
          useValue: { get: jest.fn((_key: string, defaultValue?: number) => defaultValue) },
        },
        { provide: EmployeeService, useValue: employeeService },
        { provide: LOGGER_SERVICE, useValue: mockLogger },
      ],
    }).compile();

    cli = module.get<EmployeeCli>(EmployeeCli);
  });

  describe('main menu', () => {
    it('should show the menu and quit on 0', async () => {
      const lines = await run(['0']);

      expect(lines).toContain('MAIN MENU:');
      expect(lines).toContain('9. View Operations Log');
      expect(lines[lines.length - 1]).toBe('Thank you for using the Employee Management System!');
    });

    it('should end the session when input closes', async () => {
      const lines = await run([]);

      expect(lines[lines.length - 1]).toBe('Thank you for using the Employee Management System!');
    });

    it('should end the session when input closes in the middle of a command', async () => {
      const lines = await run(['1', '1', 'E001']);

      expect(employeeService.create).not.toHaveBeenCalled();
      expect(lines[lines.length - 1]).toBe('Thank you for using the Employee Management System!');
    });

    it('should re-prompt on an invalid choice', async () => {
      const lines = await run(['x', '0']);

      expect(lines).toContain('ERROR: Invalid choice. Please enter 0, 1, 2, 3, 4, 5, 6, 7, 8, 9.');
    });

    it('should print the error and return to the menu when a command fails', async () => {
      employeeService.findById.mockRejectedValue(new NotFoundException("Employee 'E999' not found"));

      const lines = await run(['2', 'e999', '0']);

      expect(employeeService.findById).toHaveBeenCalledWith('E999');
      expect(lines).toContain("ERROR: Employee 'E999' not found");
      expect(lines.filter((line) => line === 'MAIN MENU:')).toHaveLength(2);
      expect(mockLogger.debug).toHaveBeenCalledWith('Command rejected', expect.anything());
      expect(mockLogger.warn).not.toHaveBeenCalled();
    });
  });

  describe('create', () => {
    it('should collect a regular employee', async () => {
      employeeService.create.mockResolvedValue(john());

      const lines = await run(['1', '1', 'e001', 'John', 'Smith', 'it', '5551234567', '55000', '0']);

      expect(employeeService.create).toHaveBeenCalledWith({
        id: 'E001',
        employeeType: EmployeeType.EMPLOYEE,
        firstName: 'John',
        lastName: 'Smith',
        department: 'IT',
        phoneNumber: '5551234567',
        salary: 55000,
      });
      expect(lines).toContain('SUCCESS: Employee E001 created successfully!');
    });

    it('should collect manager fields', async () => {
      employeeService.create.mockResolvedValue(jane());

      const lines = await run(['1', '2', 'm001', 'Jane', 'Doe', 'hr', '5559876543', '85000', '8', 'B-201', '0']);

      expect(employeeService.create).toHaveBeenCalledWith({
        id: 'M001',
        employeeType: EmployeeType.MANAGER,
        firstName: 'Jane',
        lastName: 'Doe',
        department: 'HR',
        phoneNumber: '5559876543',
        salary: 85000,
        teamSize: 8,
        officeNumber: 'B-201',
      });
      expect(lines).toContain('SUCCESS: Manager M001 created successfully!');
    });
  });

  describe('edit', () => {
    it('should send only the changed fields', async () => {
      employeeService.findById.mockResolvedValue(john());
      employeeService.update.mockResolvedValue(john());

      const lines = await run(['2', 'e001', 'y', '', 'Smithers', '', '', '60000', '0']);

      expect(employeeService.update).toHaveBeenCalledWith('E001', { lastName: 'Smithers', salary: 60000 });
      expect(lines).toContain('SUCCESS: Employee E001 updated successfully!');
    });

    it('should stop when the user declines', async () => {
      employeeService.findById.mockResolvedValue(john());

      const lines = await run(['2', 'e001', 'n', '0']);

      expect(employeeService.update).not.toHaveBeenCalled();
      expect(lines).toContain('Edit cancelled.');
    });
  });

  describe('delete', () => {
    it('should delete after confirmation', async () => {
      employeeService.findById.mockResolvedValue(john());
      employeeService.remove.mockResolvedValue(undefined);

      const lines = await run(['3', 'e001', 'y', '0']);

      expect(employeeService.remove).toHaveBeenCalledWith('E001');
      expect(lines).toContain('SUCCESS: Employee E001 deleted successfully!');
    });

    it('should keep the employee when the user declines', async () => {
      employeeService.findById.mockResolvedValue(john());

      const lines = await run(['3', 'e001', 'n', '0']);

      expect(employeeService.remove).not.toHaveBeenCalled();
      expect(lines).toContain('Deletion cancelled.');
    });
  });

  describe('listing and search', () => {
    it('should list every employee', async () => {
      employeeService.findAll.mockResolvedValue([john(), jane()]);

      const lines = await run(['4', '0']);

      expect(lines).toContain('ALL EMPLOYEES:');
      expect(lines).toContain('Total: 2 employees');
    });

    it('should say so when the store is empty', async () => {
      employeeService.findAll.mockResolvedValue([]);

      const lines = await run(['4', '0']);

      expect(lines).toContain('No employees found.');
    });

    it('should search by employee type', async () => {
      employeeService.search.mockResolvedValue([jane()]);

      const lines = await run(['5', '4', '2', '0']);

      expect(employeeService.search).toHaveBeenCalledWith({ type: 'manager' });
      expect(lines).toContain('SEARCH RESULTS:');
    });

    it('should search by part of the name', async () => {
      employeeService.search.mockResolvedValue([]);

      await run(['5', '2', 'smi', '0']);

      expect(employeeService.search).toHaveBeenCalledWith({ name: 'smi' });
    });
  });

  describe('department summary', () => {
    it('should print each department', async () => {
      employeeService.departmentSummary.mockResolvedValue(
        new Map([['HR', { count: 2, managers: 1, regular: 1, totalTeamSize: 8, averageTeamSize: 8 }]]),
      );

      const lines = await run(['6', '0']);

      expect(lines).toEqual(
        expect.arrayContaining(['HR:', '  Employees: 2', '  Managers: 1', '  Regular: 1', '  Average Team Size: 8.0']),
      );
    });
  });

  describe('backup', () => {
    it('should print the backup path', async () => {
      employeeService.backup.mockResolvedValue('data/backups/employee_data_backup_20240615_143000.csv');

      const lines = await run(['8', '0']);

      expect(lines).toContain('SUCCESS: Data backup created: data/backups/employee_data_backup_20240615_143000.csv');
    });
  });

  describe('operations log', () => {
    it('should print recent operations', async () => {
      employeeService.recentOperations.mockResolvedValue([
        new OperationLog({
          id: 1,
          operation: OperationType.INSERT,
          employeeId: 'E001',
          description: 'Create Employee John Smith',
          result: 'Created Employee: E001',
          createdAt: new Date(2024, 5, 15, 14, 30, 0),
        }),
      ]);

      const lines = await run(['9', '0']);

      expect(lines).toEqual(
        expect.arrayContaining([
          '1. 2024-06-15 14:30:00 - INSERT',
          '   Create Employee John Smith',
          '   Result: Created Employee: E001',
        ]),
      );
    });
  });

  describe('analytics', () => {
    it('should show overall statistics', async () => {
      employeeService.loadForAnalytics.mockResolvedValue([john(), jane()]);

      const lines = await run(['7', '1', '0', '0']);

      expect(lines).toContain('SALARY ANALYTICS:');
      expect(employeeService.loadForAnalytics).toHaveBeenCalledWith('Overall salary statistics');
      expect(employeeService.findAll).not.toHaveBeenCalled();
      expect(lines).toEqual(
        expect.arrayContaining([
          'OVERALL SALARY STATISTICS:',
          '  Count: 2',
          '  Average: $70,000.00',
          '  Median: $85,000.00',
          '  Total: $140,000.00',
        ]),
      );
    });

    it('should explain when the gap cannot be computed', async () => {
      employeeService.loadForAnalytics.mockResolvedValue([john()]);

      const lines = await run(['7', '6', '0', '0']);

      expect(lines).toContain('Insufficient data: Need both regular employees and managers for gap analysis.');
    });

    it('should rank top earners with the requested count', async () => {
      employeeService.loadForAnalytics.mockResolvedValue([john(), jane()]);

      const lines = await run(['7', '4', '1', '0', '0']);

      expect(employeeService.loadForAnalytics).toHaveBeenCalledWith('Top 1 earners');
      expect(lines).toContain('TOP 1 EARNERS:');
      expect(lines).toContain('  1. Jane Doe (HR) - $85,000.00');
      expect(lines).not.toContain('  2. John Smith (IT) - $55,000.00');
    });

    it('should record the report screen under its own name', async () => {
      employeeService.loadForAnalytics.mockResolvedValue([john(), jane()]);

      await run(['7', '7', '0', '0']);

      expect(employeeService.loadForAnalytics).toHaveBeenCalledWith('Full salary report');
    });

    it('should record a view of the recent salary changes', async () => {
      const lines = await run(['7', '8', '0', '0']);

      expect(employeeService.recordQuery).toHaveBeenCalledWith('Recent salary changes', 'Listed 0 salary changes');
      expect(employeeService.loadForAnalytics).not.toHaveBeenCalled();
      expect(lines).toContain('SALARY ANALYTICS:');
    });

    it('should keep the sub-menu open after a failure', async () => {
      employeeService.loadForAnalytics.mockRejectedValue(new Error('disk full'));

      const lines = await run(['7', '1', '0', '0']);

      expect(lines).toContain('ERROR: disk full');
      expect(lines.filter((line) => line === 'SALARY ANALYTICS:')).toHaveLength(2);
      expect(mockLogger.error).toHaveBeenCalledWith('Command failed', expect.anything());
    });
  });
});
