/**
 * Unit Tests - CliExceptionHandler
 *
 * Maps command failures to the line shown to the user and logs them
 * (error for 5xx, debug for the rest).
 */

import { BadRequestException, InternalServerErrorException, NotFoundException } from '@nestjs/common';
import { EmployeeValidationError } from '@/domain/errors';
import type { ILogger } from '@/domain/services';
import { CliExceptionHandler } from './cli-exception.handler';

describe('CliExceptionHandler', () => {
  let handler: CliExceptionHandler;
  let mockLogger: jest.Mocked<ILogger>;

  beforeEach(() => {
    mockLogger = {
      log: jest.fn(),
      warn: jest.fn(),
      error: jest.fn(),
      debug: jest.fn(),
    };
    handler = new CliExceptionHandler(mockLogger);
  });

  it('should report domain validation errors as bad requests', () => {
    const response = handler.handle(
      new EmployeeValidationError('department', 'Department must be 2-3 uppercase letters'),
    );

    expect(response).toEqual({
      status: 400,
      message: 'Validation error: Department must be 2-3 uppercase letters',
      error: 'EmployeeValidationError',
    });
    expect(mockLogger.debug).toHaveBeenCalledWith('Command rejected', { error: response });
    expect(mockLogger.warn).not.toHaveBeenCalled();
    expect(mockLogger.error).not.toHaveBeenCalled();
  });

  it('should use the message of HTTP exceptions', () => {
    const response = handler.handle(new NotFoundException("Employee 'E999' not found"));

    expect(response).toEqual({
      status: 404,
      message: "Employee 'E999' not found",
      error: 'NotFoundException',
    });
  });

  it('should join validation message lists', () => {
    const response = handler.handle(new BadRequestException(['id is required', 'salary cannot be negative']));

    expect(response.status).toBe(400);
    expect(response.message).toBe('id is required; salary cannot be negative');
  });

  it('should log server errors with the stack', () => {
    const response = handler.handle(new InternalServerErrorException('Failed to create backup'));

    expect(response).toEqual({
      status: 500,
      message: 'Failed to create backup',
      error: 'InternalServerErrorException',
    });
    expect(mockLogger.error).toHaveBeenCalledWith('Command failed', {
      error: response,
      stack: expect.any(String),
    });
  });

  it('should treat plain errors as internal failures', () => {
    const response = handler.handle(new Error('disk full'));

    expect(response).toEqual({ status: 500, message: 'disk full', error: 'Error' });
  });

  it('should handle values that are not errors', () => {
    const response = handler.handle('boom');

    expect(response).toEqual({ status: 500, message: 'Unexpected error', error: 'Internal Server Error' });
    expect(mockLogger.error).toHaveBeenCalledWith('Command failed', { error: response, stack: undefined });
  });
});
