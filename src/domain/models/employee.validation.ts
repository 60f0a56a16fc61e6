import { EmployeeValidationError } from '@/domain/errors';

const DEPARTMENT_PATTERN = /^[A-Z]{2,3}$/;
const PHONE_DIGITS = 10;

/** Capitalizes the first letter of every word and lower-cases the rest (`o'BRIEN` → `O'Brien`). */
export function toTitleCase(value: string): string {
  return value.toLowerCase().replace(/(^|[^\p{L}])(\p{L})/gu, (_match, prefix: string, letter: string) => {
    return prefix + letter.toUpperCase();
  });
}

export function validateId(value: unknown): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new EmployeeValidationError('id', 'Employee ID cannot be empty');
  }
  return value.trim();
}

/**
 * Validates a first or last name and returns it trimmed and title-cased.
 * @param field - Property name reported in the error
 * @param label - Human-readable label used in the message
 */
export function normalizeName(value: unknown, field: string, label: string): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new EmployeeValidationError(field, `${label} cannot be empty`);
  }
  if (/\d/.test(value)) {
    throw new EmployeeValidationError(field, `${label} cannot contain digits`);
  }
  return toTitleCase(value.trim());
}

export function normalizeDepartment(value: unknown): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new EmployeeValidationError('department', 'Department cannot be empty');
  }
  const department = value.trim().toUpperCase();
  if (!DEPARTMENT_PATTERN.test(department)) {
    throw new EmployeeValidationError('department', 'Department must be 2-3 uppercase letters');
  }
  return department;
}

/** Strips every non-digit; the remainder must be exactly 10 digits. */
export function sanitizePhoneNumber(value: unknown): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new EmployeeValidationError('phoneNumber', 'Phone number cannot be empty');
  }
  const digits = value.replace(/\D/g, '');
  if (digits.length !== PHONE_DIGITS) {
    throw new EmployeeValidationError('phoneNumber', 'Phone number must be exactly 10 digits');
  }
  return digits;
}

/** Renders 10 stored digits as `(555)-123-4567`. */
export function formatPhoneNumber(digits: string): string {
  return `(${digits.slice(0, 3)})-${digits.slice(3, 6)}-${digits.slice(6)}`;
}

export function validateSalary(value: unknown): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new EmployeeValidationError('salary', 'Salary must be a number');
  }
  if (value < 0) {
    throw new EmployeeValidationError('salary', 'Salary cannot be negative');
  }
  return value;
}

export function validateTeamSize(value: unknown): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new EmployeeValidationError('teamSize', 'Team size must be a non-negative integer');
  }
  return value;
}
