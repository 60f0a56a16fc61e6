import { DepartmentSummary, SalaryGapAnalysis, SalaryStatistics } from '@/application/services/analytics.service';
import { Employee, formatCurrency, formatDateTime, isManager, OperationLog, SalaryChange } from '@/domain/models';
import { CliIO } from './console.io';

const WIDE_RULE = '-'.repeat(80);
const RULE = '-'.repeat(40);

export const MAIN_MENU = [
  '1. Create New Employee',
  '2. Edit Existing Employee',
  '3. Delete Existing Employee',
  '4. Display All Employees',
  '5. Search Employees',
  '6. Display Department Summary',
  '7. Salary Analytics',
  '8. Backup Data',
  '9. View Operations Log',
  '0. Quit',
];

export const ANALYTICS_MENU = [
  '1. Overall Salary Statistics',
  '2. Salary by Department',
  '3. Salary by Employee Type',
  '4. Top Earners',
  '5. Lowest Earners',
  '6. Salary Gap Analysis',
  '7. Full Salary Report',
  '8. Recent Salary Changes',
  '0. Back to Main Menu',
];

/** Text rendering for every screen of the CLI. */
export class EmployeeView {
  constructor(private readonly io: CliIO) {}

  header(): void {
    this.io.print('='.repeat(60));
    this.io.print('           EMPLOYEE MANAGEMENT SYSTEM');
    this.io.print('='.repeat(60));
  }

  menu(title: string, entries: readonly string[]): void {
    this.io.print();
    this.io.print(`${title}:`);
    entries.forEach((entry) => this.io.print(entry));
    this.io.print(RULE);
  }

  title(text: string): void {
    this.io.print();
    this.io.print(text);
    this.io.print('-'.repeat(text.length));
  }

  message(text: string): void {
    this.io.print(text);
  }

  success(text: string): void {
    this.io.print(`SUCCESS: ${text}`);
  }

  error(text: string): void {
    this.io.print(`ERROR: ${text}`);
  }

  employees(employees: readonly Employee[], title: string): void {
    if (employees.length === 0) {
      this.io.print('No employees found.');
      return;
    }

    this.io.print();
    this.io.print(`${title}:`);
    this.io.print(WIDE_RULE);
    this.io.print(
      `${'ID'.padEnd(10)} ${'Name'.padEnd(25)} ${'Department'.padEnd(12)} ${'Phone'.padEnd(15)} ${'Salary'.padEnd(14)} Type`,
    );
    this.io.print(WIDE_RULE);

    for (const employee of employees) {
      this.io.print(
        `${employee.id.padEnd(10)} ${employee.fullName.padEnd(25)} ${employee.department.padEnd(12)} ` +
          `${employee.formattedPhone().padEnd(15)} ${formatCurrency(employee.salary).padEnd(14)} ${employee.employeeType}`,
      );
      if (isManager(employee)) {
        this.io.print(`${''.padEnd(10)} Team Size: ${employee.teamSize}, Office: ${employee.officeNumber}`);
      }
    }

    this.io.print(WIDE_RULE);
    this.io.print(`Total: ${employees.length} employees`);
  }

  employeeDetails(employee: Employee): void {
    this.io.print();
    this.io.print('EMPLOYEE DETAILS:');
    this.io.print(RULE);
    this.io.print(`ID: ${employee.id}`);
    this.io.print(`Name: ${employee.fullName}`);
    this.io.print(`Department: ${employee.department}`);
    this.io.print(`Phone: ${employee.formattedPhone()}`);
    this.io.print(`Salary: ${formatCurrency(employee.salary)}`);
    this.io.print(`Type: ${employee.employeeType}`);
    if (isManager(employee)) {
      this.io.print(`Team Size: ${employee.teamSize}`);
      this.io.print(`Office: ${employee.officeNumber}`);
    }
    this.io.print(RULE);
  }

  departmentSummary(summary: ReadonlyMap<string, DepartmentSummary>): void {
    if (summary.size === 0) {
      this.io.print('No employees found.');
      return;
    }

    this.io.print();
    this.io.print('DEPARTMENT SUMMARY:');
    this.io.print('-'.repeat(50));
    for (const [department, info] of summary) {
      this.io.print(`${department}:`);
      this.io.print(`  Employees: ${info.count}`);
      this.io.print(`  Managers: ${info.managers}`);
      this.io.print(`  Regular: ${info.regular}`);
      this.io.print(`  Average Team Size: ${info.averageTeamSize.toFixed(1)}`);
    }
  }

  statistics(title: string, stats: SalaryStatistics): void {
    this.io.print();
    this.io.print(`${title}:`);
    this.io.print(`  Count: ${stats.count}`);
    this.io.print(`  Average: ${formatCurrency(stats.average)}`);
    this.io.print(`  Minimum: ${formatCurrency(stats.min)}`);
    this.io.print(`  Maximum: ${formatCurrency(stats.max)}`);
    this.io.print(`  Median: ${formatCurrency(stats.median)}`);
    this.io.print(`  Total: ${formatCurrency(stats.total)}`);
  }

  groupedStatistics(title: string, groups: ReadonlyMap<string, SalaryStatistics>): void {
    if (groups.size === 0) {
      this.io.print('No employees found.');
      return;
    }
    this.io.print();
    this.io.print(`${title}:`);
    for (const [group, stats] of groups) {
      this.io.print(
        `  ${group}: ${stats.count} employees, average ${formatCurrency(stats.average)}, ` +
          `range ${formatCurrency(stats.min)} - ${formatCurrency(stats.max)}`,
      );
    }
  }

  earners(title: string, employees: readonly Employee[]): void {
    if (employees.length === 0) {
      this.io.print('No employees found.');
      return;
    }
    this.io.print();
    this.io.print(`${title}:`);
    employees.forEach((employee, index) => {
      this.io.print(`  ${index + 1}. ${employee.fullName} (${employee.department}) - ${formatCurrency(employee.salary)}`);
    });
  }

  gapAnalysis(gap: SalaryGapAnalysis): void {
    if (!gap.sufficient) {
      this.io.print(`Insufficient data: ${gap.reason}.`);
      return;
    }
    this.io.print();
    this.io.print('SALARY GAP ANALYSIS:');
    this.io.print(`  Regular Employee Average: ${formatCurrency(gap.regularAverage)} (${gap.regularCount})`);
    this.io.print(`  Manager Average: ${formatCurrency(gap.managerAverage)} (${gap.managerCount})`);
    this.io.print(`  Absolute Gap: ${formatCurrency(gap.absoluteGap)}`);
    this.io.print(`  Percentage Gap: ${gap.percentageGap.toFixed(1)}%`);
  }

  salaryChanges(changes: readonly SalaryChange[]): void {
    if (changes.length === 0) {
      this.io.print('No salary changes recorded.');
      return;
    }
    this.io.print();
    this.io.print('RECENT SALARY CHANGES:');
    for (const change of changes) {
      this.io.print(
        `  ${formatDateTime(change.timestamp)} ${change.employeeName} (${change.employeeId}): ` +
          `${formatCurrency(change.oldSalary)} → ${formatCurrency(change.newSalary)} ` +
          `[${change.changePercentage.toFixed(1)}%] (${change.operation})`,
      );
    }
  }

  operations(logs: readonly OperationLog[]): void {
    if (logs.length === 0) {
      this.io.print('No operations logged.');
      return;
    }
    this.io.print();
    this.io.print('OPERATIONS LOG:');
    this.io.print('-'.repeat(60));
    logs.forEach((log, index) => {
      this.io.print(`${index + 1}. ${formatDateTime(log.createdAt)} - ${log.operation}`);
      this.io.print(`   ${log.description}`);
      this.io.print(`   Result: ${log.result}`);
    });
  }

  report(text: string): void {
    this.io.print();
    this.io.print(text);
  }
}
