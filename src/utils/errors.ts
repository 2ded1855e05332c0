/**
 * Thrown when an unsolved record has an issueId that is not a finite number.
 */
export class InvalidIssueIdTypeError extends Error {
  readonly code = 'INVALID_ISSUE_ID_TYPE';
  readonly value: unknown;

  constructor(value: unknown) {
    super(`Invalid issueId type: ${describeValue(value)}`);
    this.name = 'InvalidIssueIdTypeError';
    this.value = value;
  }
}

/**
 * Thrown when the transactions file cannot be read, parsed or validated.
 */
export class TransactionLoadError extends Error {
  readonly code = 'TRANSACTION_LOAD_FAILED';
  readonly filePath: string;
  readonly issues: string[];

  constructor(filePath: string, message: string, issues: string[] = [], options?: { cause?: unknown }) {
    super(`Failed to load transactions from ${filePath}: ${message}`, options);
    this.name = 'TransactionLoadError';
    this.filePath = filePath;
    this.issues = issues;
  }
}

function describeValue(value: unknown): string {
  if (value === undefined) return 'undefined';
  if (value === null) return 'null';
  if (typeof value === 'number') return `number (${value})`;
  return typeof value;
}
