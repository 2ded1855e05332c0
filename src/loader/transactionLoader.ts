import { readFile } from 'fs/promises';
import { ZodIssue } from 'zod';
import { TransactionRecord } from '../models/transaction';
import { TransactionLoadError } from '../utils/errors';
import { logger } from '../utils/logger';
import { transactionFileSchema } from './validation';

/**
 * Validate already-parsed JSON content into transaction records.
 */
export function parseTransactions(content: unknown, source: string = '<memory>'): TransactionRecord[] {
  const parsed = transactionFileSchema.safeParse(content);

  if (!parsed.success) {
    const issues = parsed.error.errors.map(formatIssue);
    throw new TransactionLoadError(source, 'invalid transaction data', issues);
  }

  return parsed.data;
}

/**
 * Read a JSON file of transactions and validate every record
 */
export async function loadTransactions(filePath: string): Promise<TransactionRecord[]> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf8');
  } catch (error) {
    throw new TransactionLoadError(filePath, errorMessage(error), [], { cause: error });
  }

  let content: unknown;
  try {
    content = JSON.parse(raw);
  } catch (error) {
    throw new TransactionLoadError(filePath, `malformed JSON (${errorMessage(error)})`, [], { cause: error });
  }

  const transactions = parseTransactions(content, filePath);
  logger.info({ filePath, count: transactions.length }, 'Loaded transactions');

  return transactions;
}

function formatIssue(issue: ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join('.') : '<root>';
  return `${path}: ${issue.message}`;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
