import { InvalidIssueIdTypeError } from './errors';

/**
 * Normalise an issueId to an integer.
 * Integers pass through, other finite numbers truncate toward zero.
 * @throws InvalidIssueIdTypeError for anything that is not a finite number
 */
export function toIssueId(value: unknown): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new InvalidIssueIdTypeError(value);
  }

  return Number.isInteger(value) ? value : Math.trunc(value);
}
