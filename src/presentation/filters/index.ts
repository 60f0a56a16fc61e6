export { CliExceptionHandler } from './cli-exception.handler';
export type { CliErrorResponse } from './cli-exception.handler';
