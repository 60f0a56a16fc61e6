import { LogLevel } from '@nestjs/common';
import { Logger as OrmLogger } from 'typeorm';
import { LoggerService } from '@/infrastructure/logger';

/** Routes TypeORM output for the operation-log database through the application logger. */
export class TypeOrmLogger implements OrmLogger {
  private readonly logger: LoggerService;

  constructor(logLevels?: LogLevel[]) {
    this.logger = new LoggerService('TypeORM', logLevels);
  }

  logQuery(query: string, parameters?: unknown[]) {
    this.logger.debug(query, {
      parameters: parameters?.length ? parameters : undefined,
    });
  }

  logQueryError(error: string | Error, query: string, parameters?: unknown[]) {
    this.logger.error(typeof error === 'string' ? error : error.message, {
      query,
      parameters: parameters?.length ? parameters : undefined,
    });
  }

  logQuerySlow(time: number, query: string) {
    this.logger.warn(`Slow query (${time}ms)`, { query });
  }

  logSchemaBuild(message: string) {
    this.logger.debug(message);
  }

  logMigration(message: string) {
    this.logger.log(message);
  }

  log(level: 'log' | 'info' | 'warn', message: unknown) {
    if (level === 'warn') {
      this.logger.warn(String(message));
    } else {
      this.logger.log(String(message));
    }
  }
}
