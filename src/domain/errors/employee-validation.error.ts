/**
 * Raised when an employee field is rejected by the domain model.
 * `field` names the offending property so callers can re-prompt for it.
 */
export class EmployeeValidationError extends Error {
  constructor(
    readonly field: string,
    message: string,
  ) {
    super(message);
    this.name = 'EmployeeValidationError';
  }
}
