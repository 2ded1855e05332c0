import { TransactionQueryEngine } from './transactionQueryEngine';

export interface ReportOptions {
  senderName: string;
  clientName: string;
}

export interface ReportLine {
  label: string;
  value: string;
}

const NO_TOP_SENDER = 'No top sender found.';

/**
 * Run every query once, in report order.
 * Query errors propagate; there is no partial report.
 */
export function buildReport(engine: TransactionQueryEngine, options: ReportOptions): ReportLine[] {
  return [
    { label: 'Total Transaction Amount', value: String(engine.totalAmount()) },
    {
      label: `Total Transaction Amount Sent by ${options.senderName}`,
      value: String(engine.totalAmountSentBy(options.senderName)),
    },
    { label: 'Max Transaction Amount', value: String(engine.maxAmount()) },
    { label: 'Count Unique Clients', value: String(engine.countUniqueClients()) },
    {
      label: `Has Open Compliance Issues for ${options.clientName}`,
      value: String(engine.hasOpenComplianceIssue(options.clientName)),
    },
    {
      label: 'Transactions by Beneficiary Name',
      value: JSON.stringify(Object.fromEntries(engine.transactionsByBeneficiary())),
    },
    { label: 'Unsolved Issue IDs', value: JSON.stringify([...engine.unsolvedIssueIds()]) },
    { label: 'All Solved Issue Messages', value: JSON.stringify(engine.allSolvedIssueMessages()) },
    { label: 'Top 3 Transactions by Amount', value: JSON.stringify(engine.top3ByAmount()) },
    { label: 'Top Sender', value: engine.topSender() ?? NO_TOP_SENDER },
  ];
}

export function formatReport(lines: ReportLine[]): string {
  return lines.map((line) => `${line.label}: ${line.value}`).join('\n');
}
