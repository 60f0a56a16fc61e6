import { ConfigService } from '@nestjs/config';
import { TypeOrmModuleOptions } from '@nestjs/typeorm';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import { EnvironmentVariables } from '@/infrastructure/config';
import { parseLogLevels } from '@/infrastructure/logger';
import { OperationLogEntity } from './entities';
import { TypeOrmLogger } from './typeorm-logger';

const IN_MEMORY = ':memory:';

/** Options for the SQLite database that holds the operation log. */
export function createTypeOrmOptions(configService: ConfigService<EnvironmentVariables>): TypeOrmModuleOptions {
  const database = configService.get('OPERATION_LOG_DATABASE', './data/operations.sqlite', { infer: true });
  const loggingEnabled = configService.get('TYPEORM_LOGGING', false, { infer: true });

  // better-sqlite3 does not create missing parent directories
  if (database !== IN_MEMORY) {
    mkdirSync(dirname(database), { recursive: true });
  }

  return {
    type: 'better-sqlite3',
    database,
    entities: [OperationLogEntity],
    // The log has a single append-only table and no migrations.
    synchronize: true,
    logging: loggingEnabled,
    logger: loggingEnabled ? new TypeOrmLogger(parseLogLevels(configService.get('LOG_LEVELS', { infer: true }))) : undefined,
  };
}
