import { plainToInstance, Transform } from 'class-transformer';
import { IsBoolean, IsEnum, IsInt, IsOptional, IsString, Matches, Min, validateSync } from 'class-validator';

export enum Environment {
  Development = 'development',
  Production = 'production',
  Test = 'test',
}

export class EnvironmentVariables {
  // Application
  @IsEnum(Environment)
  @IsOptional()
  NODE_ENV: Environment = Environment.Development;

  @Matches(/^\s*(log|error|warn|debug|verbose|fatal)(\s*,\s*(log|error|warn|debug|verbose|fatal))*\s*$/, {
    message: 'LOG_LEVELS must be a comma-separated list of log, error, warn, debug, verbose, fatal',
  })
  @IsOptional()
  LOG_LEVELS: string = 'warn,error';

  // Employee store
  @IsString()
  @IsOptional()
  EMPLOYEE_DATA_PATH: string = './data/employee_data.csv';

  @IsString()
  @IsOptional()
  EMPLOYEE_BACKUP_DIR: string = './data/backups';

  // Operation log database
  @IsString()
  @IsOptional()
  OPERATION_LOG_DATABASE: string = './data/operations.sqlite';

  @IsBoolean()
  @IsOptional()
  @Transform(({ value }) => {
    if (typeof value === 'boolean') return value;
    if (typeof value === 'string') return value.toLowerCase() === 'true';
    return false;
  })
  TYPEORM_LOGGING: boolean = false;

  // Report
  @IsInt()
  @Min(1)
  @IsOptional()
  @Transform(({ value }) => (typeof value === 'string' ? parseInt(value, 10) : value))
  REPORT_TOP_EARNERS: number = 5;

  @IsInt()
  @Min(1)
  @IsOptional()
  @Transform(({ value }) => (typeof value === 'string' ? parseInt(value, 10) : value))
  RECENT_CHANGES_LIMIT: number = 5;
}

export function validate(config: Record<string, unknown>) {
  const validatedConfig = plainToInstance(EnvironmentVariables, config);

  const errors = validateSync(validatedConfig, {
    skipMissingProperties: false,
  });

  if (errors.length > 0) {
    const errorMessages = errors
      .map((error) => {
        const constraints = error.constraints ? Object.values(error.constraints).join(', ') : 'unknown error';
        return `${error.property}: ${constraints}`;
      })
      .join('\n');

    throw new Error(`Environment validation failed:\n${errorMessages}`);
  }

  return validatedConfig;
}
