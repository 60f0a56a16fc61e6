import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  Employee,
  formatCurrency,
  formatDateTime,
  isManager,
  SalaryChange,
  SalaryOperation,
} from '@/domain/models';
import type { ILogger } from '@/domain/services';
import { LOGGER_SERVICE } from '@/domain/services';

export interface SalaryStatistics {
  count: number;
  average: number;
  min: number;
  max: number;
  total: number;
  median: number;
}

export type EmployeeGroup = 'Regular Employees' | 'Managers';

export type SalaryGapAnalysis =
  | {
      sufficient: true;
      regularAverage: number;
      managerAverage: number;
      absoluteGap: number;
      percentageGap: number;
      regularCount: number;
      managerCount: number;
    }
  | {
      sufficient: false;
      reason: string;
    };

export interface DepartmentSummary {
  count: number;
  managers: number;
  regular: number;
  totalTeamSize: number;
  averageTeamSize: number;
}

export interface ReportOptions {
  generatedAt?: Date;
  topEarners?: number;
  recentChanges?: number;
}

const EMPTY_STATISTICS: SalaryStatistics = { count: 0, average: 0, min: 0, max: 0, total: 0, median: 0 };
const REPORT_RULE = '='.repeat(60);

function sumSalaries(employees: readonly Employee[]): number {
  return employees.reduce((total, employee) => total + employee.salary, 0);
}

/** Groups by department, keeping the order in which departments first appear. */
function groupByDepartment(employees: readonly Employee[]): Map<string, Employee[]> {
  const groups = new Map<string, Employee[]>();
  for (const employee of employees) {
    const group = groups.get(employee.department);
    if (group) {
      group.push(employee);
    } else {
      groups.set(employee.department, [employee]);
    }
  }
  return groups;
}

/**
 * Salary statistics, rankings and reporting over a supplied employee list.
 * The only state is the append-only salary change log, which lives for the process lifetime.
 */
@Injectable()
export class AnalyticsService {
  private readonly salaryChanges: SalaryChange[] = [];

  constructor(
    private readonly configService: ConfigService,
    @Inject(LOGGER_SERVICE)
    private readonly logger: ILogger,
  ) {}

  /** Mean salary; 0 for an empty list. */
  averageSalary(employees: readonly Employee[]): number {
    if (employees.length === 0) {
      return 0;
    }
    const average = sumSalaries(employees) / employees.length;
    this.logger.debug('Calculated average salary', { average, count: employees.length });
    return average;
  }

  /** Mean salary of one department (case-insensitive); 0 when nobody matches. */
  averageSalaryForDepartment(employees: readonly Employee[], department: string): number {
    const wanted = department.trim().toUpperCase();
    return this.averageSalary(employees.filter((employee) => employee.department === wanted));
  }

  /**
   * Count, mean, extremes, total and median of the salaries.
   * The median is the sorted salary at index floor(n/2), which is the upper middle value for even counts.
   */
  salaryStatistics(employees: readonly Employee[]): SalaryStatistics {
    if (employees.length === 0) {
      return { ...EMPTY_STATISTICS };
    }

    const salaries = employees.map((employee) => employee.salary).sort((a, b) => a - b);
    const total = salaries.reduce((sum, salary) => sum + salary, 0);

    return {
      count: salaries.length,
      average: total / salaries.length,
      min: salaries[0],
      max: salaries[salaries.length - 1],
      total,
      median: salaries[Math.floor(salaries.length / 2)],
    };
  }

  /** Statistics per employee type; a type with no members is left out. */
  salaryByType(employees: readonly Employee[]): Map<EmployeeGroup, SalaryStatistics> {
    const regular = employees.filter((employee) => !isManager(employee));
    const managers = employees.filter(isManager);
    const result = new Map<EmployeeGroup, SalaryStatistics>();

    if (regular.length > 0) {
      result.set('Regular Employees', this.salaryStatistics(regular));
    }
    if (managers.length > 0) {
      result.set('Managers', this.salaryStatistics(managers));
    }

    return result;
  }

  /** Statistics per department, in first-seen department order. */
  salaryByDepartment(employees: readonly Employee[]): Map<string, SalaryStatistics> {
    const result = new Map<string, SalaryStatistics>();
    for (const [department, members] of groupByDepartment(employees)) {
      result.set(department, this.salaryStatistics(members));
    }
    return result;
  }

  /** Highest salaries first; equal salaries keep their input order. */
  topEarners(employees: readonly Employee[], limit = 5): Employee[] {
    return [...employees].sort((a, b) => b.salary - a.salary).slice(0, limit);
  }

  /** Lowest salaries first; equal salaries keep their input order. */
  lowestEarners(employees: readonly Employee[], limit = 5): Employee[] {
    return [...employees].sort((a, b) => a.salary - b.salary).slice(0, limit);
  }

  /** Compares manager and regular averages; needs at least one of each. */
  salaryGapAnalysis(employees: readonly Employee[]): SalaryGapAnalysis {
    const regular = employees.filter((employee) => !isManager(employee));
    const managers = employees.filter(isManager);

    if (regular.length === 0 || managers.length === 0) {
      return {
        sufficient: false,
        reason: 'Need both regular employees and managers for gap analysis',
      };
    }

    const regularAverage = sumSalaries(regular) / regular.length;
    const managerAverage = sumSalaries(managers) / managers.length;
    const absoluteGap = managerAverage - regularAverage;

    const analysis: SalaryGapAnalysis = {
      sufficient: true,
      regularAverage,
      managerAverage,
      absoluteGap,
      percentageGap: regularAverage > 0 ? (absoluteGap / regularAverage) * 100 : 0,
      regularCount: regular.length,
      managerCount: managers.length,
    };

    this.logger.debug('Calculated salary gap analysis', { ...analysis });
    return analysis;
  }

  /** Head count, manager split and team sizes per department, in first-seen order. */
  departmentSummary(employees: readonly Employee[]): Map<string, DepartmentSummary> {
    const result = new Map<string, DepartmentSummary>();

    for (const [department, members] of groupByDepartment(employees)) {
      const managers = members.filter(isManager);
      const totalTeamSize = managers.reduce((total, manager) => total + manager.teamSize, 0);

      result.set(department, {
        count: members.length,
        managers: managers.length,
        regular: members.length - managers.length,
        totalTeamSize,
        averageTeamSize: managers.length > 0 ? totalTeamSize / managers.length : 0,
      });
    }

    return result;
  }

  /** Appends an entry to the salary change log. */
  recordSalaryChange(
    employee: Employee,
    oldSalary: number,
    newSalary: number,
    operation: SalaryOperation,
  ): SalaryChange {
    const change = SalaryChange.of(employee, oldSalary, newSalary, operation);
    this.salaryChanges.push(change);

    this.logger.log('Tracked salary change', {
      employeeId: change.employeeId,
      oldSalary,
      newSalary,
      operation,
    });
    return change;
  }

  salaryHistory(): SalaryChange[] {
    return [...this.salaryChanges];
  }

  /** The last `limit` changes, oldest first. */
  recentSalaryChanges(limit = 10): SalaryChange[] {
    if (limit <= 0) {
      return [];
    }
    return this.salaryChanges.slice(-limit);
  }

  /**
   * Plain-text report: overall, per-department and per-type statistics,
   * gap analysis (when both groups exist), top earners and recent changes (when any).
   */
  generateReport(employees: readonly Employee[], options: ReportOptions = {}): string {
    const generatedAt = options.generatedAt ?? new Date();
    const topCount = options.topEarners ?? this.configService.get<number>('REPORT_TOP_EARNERS', 5);
    const changesCount = options.recentChanges ?? this.configService.get<number>('RECENT_CHANGES_LIMIT', 5);

    const lines: string[] = [
      REPORT_RULE,
      'EMPLOYEE SALARY ANALYTICS REPORT',
      REPORT_RULE,
      `Generated: ${formatDateTime(generatedAt)}`,
      '',
    ];

    const overall = this.salaryStatistics(employees);
    lines.push(
      'OVERALL SALARY STATISTICS:',
      `  Total Employees: ${overall.count}`,
      `  Average Salary: ${formatCurrency(overall.average)}`,
      `  Minimum Salary: ${formatCurrency(overall.min)}`,
      `  Maximum Salary: ${formatCurrency(overall.max)}`,
      `  Median Salary: ${formatCurrency(overall.median)}`,
      `  Total Payroll: ${formatCurrency(overall.total)}`,
      '',
    );

    lines.push('SALARY BY DEPARTMENT:');
    for (const [department, stats] of this.salaryByDepartment(employees)) {
      lines.push(...this.groupLines(department, stats));
    }
    lines.push('');

    lines.push('SALARY BY EMPLOYEE TYPE:');
    for (const [group, stats] of this.salaryByType(employees)) {
      lines.push(...this.groupLines(group, stats));
    }
    lines.push('');

    const gap = this.salaryGapAnalysis(employees);
    if (gap.sufficient) {
      lines.push(
        'SALARY GAP ANALYSIS:',
        `  Regular Employee Average: ${formatCurrency(gap.regularAverage)}`,
        `  Manager Average: ${formatCurrency(gap.managerAverage)}`,
        `  Absolute Gap: ${formatCurrency(gap.absoluteGap)}`,
        `  Percentage Gap: ${gap.percentageGap.toFixed(1)}%`,
        '',
      );
    }

    lines.push(`TOP ${topCount} EARNERS:`);
    this.topEarners(employees, topCount).forEach((employee, index) => {
      lines.push(`  ${index + 1}. ${employee.fullName} (${employee.department}) - ${formatCurrency(employee.salary)}`);
    });
    lines.push('');

    const recent = this.recentSalaryChanges(changesCount);
    if (recent.length > 0) {
      lines.push('RECENT SALARY CHANGES:');
      for (const change of recent) {
        lines.push(
          `  ${change.employeeName}: ${formatCurrency(change.oldSalary)} → ${formatCurrency(change.newSalary)} (${change.operation})`,
        );
      }
    }

    lines.push(REPORT_RULE);

    this.logger.log('Generated salary report', { employees: employees.length });
    return lines.join('\n');
  }

  private groupLines(label: string, stats: SalaryStatistics): string[] {
    return [
      `  ${label}:`,
      `    Count: ${stats.count}`,
      `    Average: ${formatCurrency(stats.average)}`,
      `    Range: ${formatCurrency(stats.min)} - ${formatCurrency(stats.max)}`,
    ];
  }
}
