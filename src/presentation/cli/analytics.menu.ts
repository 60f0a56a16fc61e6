import { Inject, Injectable } from '@nestjs/common';
import { AnalyticsService } from '@/application/services/analytics.service';
import { EmployeeService } from '@/application/services/employee.service';
import type { ILogger } from '@/domain/services';
import { LOGGER_SERVICE } from '@/domain/services';
import { CliExceptionHandler } from '@/presentation/filters';
import { CliSession, runCommand } from './cli-session';
import { ANALYTICS_MENU } from './employee.view';

const CHOICES = ['0', '1', '2', '3', '4', '5', '6', '7', '8'] as const;
type AnalyticsChoice = (typeof CHOICES)[number];

/** Salary analytics sub-menu. Every screen works on a fresh read of the store. */
@Injectable()
export class AnalyticsMenu {
  private readonly exceptionHandler: CliExceptionHandler;

  constructor(
    private readonly employeeService: EmployeeService,
    private readonly analyticsService: AnalyticsService,
    @Inject(LOGGER_SERVICE)
    private readonly logger: ILogger,
  ) {
    this.exceptionHandler = new CliExceptionHandler(logger);
  }

  /** Loops until the user picks "Back"; closed input propagates to the caller. */
  async run(session: CliSession): Promise<void> {
    for (;;) {
      session.view.menu('SALARY ANALYTICS', ANALYTICS_MENU);
      const choice = await session.prompt.choice('Enter your choice (0-8): ', CHOICES);
      if (choice === '0') {
        return;
      }
      await runCommand(session, this.exceptionHandler, () => this.execute(choice, session));
    }
  }

  private async execute(choice: Exclude<AnalyticsChoice, '0'>, { view, prompt }: CliSession): Promise<void> {
    this.logger.debug('Analytics command selected', { choice });

    switch (choice) {
      case '1': {
        const employees = await this.employeeService.loadForAnalytics('Overall salary statistics');
        view.statistics('OVERALL SALARY STATISTICS', this.analyticsService.salaryStatistics(employees));
        return;
      }
      case '2': {
        const employees = await this.employeeService.loadForAnalytics('Salary by department');
        view.groupedStatistics('SALARY BY DEPARTMENT', this.analyticsService.salaryByDepartment(employees));
        return;
      }
      case '3': {
        const employees = await this.employeeService.loadForAnalytics('Salary by employee type');
        view.groupedStatistics('SALARY BY EMPLOYEE TYPE', this.analyticsService.salaryByType(employees));
        return;
      }
      case '4': {
        const limit = await prompt.number('How many top earners to show? [5]: ', 'Count', {
          integer: true,
          defaultValue: 5,
        });
        const employees = await this.employeeService.loadForAnalytics(`Top ${limit} earners`);
        view.earners(`TOP ${limit} EARNERS`, this.analyticsService.topEarners(employees, limit));
        return;
      }
      case '5': {
        const limit = await prompt.number('How many lowest earners to show? [5]: ', 'Count', {
          integer: true,
          defaultValue: 5,
        });
        const employees = await this.employeeService.loadForAnalytics(`Lowest ${limit} earners`);
        view.earners(`LOWEST ${limit} EARNERS`, this.analyticsService.lowestEarners(employees, limit));
        return;
      }
      case '6': {
        const employees = await this.employeeService.loadForAnalytics('Salary gap analysis');
        view.gapAnalysis(this.analyticsService.salaryGapAnalysis(employees));
        return;
      }
      case '7': {
        const employees = await this.employeeService.loadForAnalytics('Full salary report');
        view.report(this.analyticsService.generateReport(employees));
        return;
      }
      case '8': {
        const changes = this.analyticsService.recentSalaryChanges(10);
        await this.employeeService.recordQuery('Recent salary changes', `Listed ${changes.length} salary changes`);
        view.salaryChanges(changes);
        return;
      }
    }
  }
}
