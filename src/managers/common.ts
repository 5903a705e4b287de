import { ValidationError } from '../errors.js';

export function timestamp(): string {
  return new Date().toISOString();
}

/**
 * Reject a required text field that is missing or only whitespace.
 * The value itself is returned as submitted.
 */
export function requireText(value: string | undefined, message: string): string {
  if (value === undefined || !value.trim()) {
    throw new ValidationError(message);
  }
  return value;
}

export function toFlag(value: boolean): number {
  return value ? 1 : 0;
}
