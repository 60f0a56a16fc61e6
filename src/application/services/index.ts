export * from './analytics.service';
export * from './employee.service';
