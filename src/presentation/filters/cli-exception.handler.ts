import { HttpException, HttpStatus } from '@nestjs/common';
import { EmployeeValidationError } from '@/domain/errors';
import type { ILogger } from '@/domain/services';

export interface CliErrorResponse {
  status: number;
  message: string;
  error: string;
}

function readMessage(response: string | object, fallback: string): string {
  if (typeof response === 'string') {
    return response;
  }
  if ('message' in response) {
    const { message } = response;
    if (Array.isArray(message)) {
      return message.map(String).join('; ');
    }
    if (typeof message === 'string') {
      return message;
    }
  }
  return fallback;
}

/**
 * Turns any error thrown by a menu command into the line shown to the user.
 * Client-side failures (status < 500, validation) are logged at debug level;
 * they are already shown to the user. Everything else is an error with the stack.
 */
export class CliExceptionHandler {
  constructor(private readonly logger: ILogger) {}

  handle(exception: unknown): CliErrorResponse {
    let status: number = HttpStatus.INTERNAL_SERVER_ERROR;
    let message = 'Unexpected error';
    let error = 'Internal Server Error';

    if (exception instanceof EmployeeValidationError) {
      status = HttpStatus.BAD_REQUEST;
      message = `Validation error: ${exception.message}`;
      error = exception.name;
    } else if (exception instanceof HttpException) {
      status = exception.getStatus();
      message = readMessage(exception.getResponse(), exception.message);
      error = exception.name;
    } else if (exception instanceof Error) {
      message = exception.message;
      error = exception.name;
    }

    const response: CliErrorResponse = { status, message, error };

    if (status >= 500) {
      this.logger.error('Command failed', {
        error: response,
        stack: exception instanceof Error ? exception.stack : undefined,
      });
    } else {
      this.logger.debug('Command rejected', { error: response });
    }

    return response;
  }
}
