import { Environment, validate } from './env.validation';

describe('validate (environment)', () => {
  it('should apply defaults for missing variables', () => {
    const config = validate({});

    expect(config.NODE_ENV).toBe(Environment.Development);
    expect(config.EMPLOYEE_DATA_PATH).toBe('./data/employee_data.csv');
    expect(config.EMPLOYEE_BACKUP_DIR).toBe('./data/backups');
    expect(config.OPERATION_LOG_DATABASE).toBe('./data/operations.sqlite');
    expect(config.LOG_LEVELS).toBe('warn,error');
    expect(config.TYPEORM_LOGGING).toBe(false);
    expect(config.REPORT_TOP_EARNERS).toBe(5);
    expect(config.RECENT_CHANGES_LIMIT).toBe(5);
  });

  it('should convert string values from the environment', () => {
    const config = validate({
      TYPEORM_LOGGING: 'TRUE',
      REPORT_TOP_EARNERS: '10',
      LOG_LEVELS: 'log, warn,error',
    });

    expect(config.TYPEORM_LOGGING).toBe(true);
    expect(config.REPORT_TOP_EARNERS).toBe(10);
    expect(config.LOG_LEVELS).toBe('log, warn,error');
  });

  it('should reject unknown log levels', () => {
    expect(() => validate({ LOG_LEVELS: 'info' })).toThrow(
      'LOG_LEVELS must be a comma-separated list of log, error, warn, debug, verbose, fatal',
    );
  });

  it('should reject an unknown environment', () => {
    expect(() => validate({ NODE_ENV: 'staging' })).toThrow('Environment validation failed');
  });

  it('should reject non-positive report limits', () => {
    expect(() => validate({ RECENT_CHANGES_LIMIT: '0' })).toThrow('RECENT_CHANGES_LIMIT');
  });
});
