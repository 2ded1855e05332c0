#!/usr/bin/env node
import { config } from './config';
import { loadTransactions } from './loader/transactionLoader';
import { buildReport, formatReport } from './services/reportService';
import { TransactionQueryEngine } from './services/transactionQueryEngine';
import { logger } from './utils/logger';

export async function main(): Promise<void> {
  const transactions = await loadTransactions(config.input.file);
  const engine = new TransactionQueryEngine(transactions);

  const report = buildReport(engine, {
    senderName: config.report.senderName,
    clientName: config.report.clientName,
  });

  console.log(formatReport(report));
}

if (require.main === module) {
  main().catch((error: unknown) => {
    logger.error({ err: error }, 'Transaction report failed');
    process.exitCode = 1;
  });
}
