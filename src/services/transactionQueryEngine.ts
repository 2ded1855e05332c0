import { SenderTotal, TransactionRecord } from '../models/transaction';
import { toIssueId } from '../utils/issueId';

const TOP_TRANSACTIONS_LIMIT = 3;

/**
 * Read-only queries over a fixed collection of transactions.
 * The collection is held by reference and never modified.
 */
export class TransactionQueryEngine {
  private readonly transactions: ReadonlyArray<TransactionRecord>;

  constructor(transactions: ReadonlyArray<TransactionRecord>) {
    this.transactions = transactions;
  }

  get size(): number {
    return this.transactions.length;
  }

  /**
   * Sum of the amounts of all transactions
   */
  totalAmount(): number {
    return this.transactions.reduce((sum, transaction) => sum + transaction.amount, 0);
  }

  /**
   * Sum of the amounts of all transactions sent by the given client
   */
  totalAmountSentBy(senderName: string): number {
    return this.transactions
      .filter((transaction) => transaction.senderFullName === senderName)
      .reduce((sum, transaction) => sum + transaction.amount, 0);
  }

  /**
   * Highest transaction amount, 0 when there are no transactions
   */
  maxAmount(): number {
    if (this.transactions.length === 0) {
      return 0;
    }

    return this.transactions.reduce(
      (max, transaction) => Math.max(max, transaction.amount),
      Number.NEGATIVE_INFINITY
    );
  }

  /**
   * Number of distinct clients that sent or received a transaction
   */
  countUniqueClients(): number {
    const senders = collectNames(this.transactions, (transaction) => transaction.senderFullName);
    const beneficiaries = collectNames(this.transactions, (transaction) => transaction.beneficiaryFullName);

    const clients = new Set(senders);
    for (const name of beneficiaries) {
      clients.add(name);
    }

    return clients.size;
  }

  /**
   * Whether the client (as sender or beneficiary) has at least one
   * transaction whose compliance issue is not solved
   */
  hasOpenComplianceIssue(clientName: string): boolean {
    return this.transactions
      .filter(
        (transaction) =>
          transaction.senderFullName === clientName || transaction.beneficiaryFullName === clientName
      )
      .some((transaction) => transaction.issueSolved !== true);
  }

  /**
   * All transactions indexed by beneficiary name
   */
  transactionsByBeneficiary(): Map<string, TransactionRecord[]> {
    const groups = new Map<string, TransactionRecord[]>();

    for (const transaction of this.transactions) {
      const beneficiary = transaction.beneficiaryFullName;
      if (beneficiary === undefined) continue;

      const group = groups.get(beneficiary);
      if (group) {
        group.push(transaction);
      } else {
        groups.set(beneficiary, [transaction]);
      }
    }

    return groups;
  }

  /**
   * Identifiers of all open compliance issues.
   * @throws InvalidIssueIdTypeError if an unsolved transaction has no usable issueId
   */
  unsolvedIssueIds(): Set<number> {
    const ids = new Set<number>();

    for (const transaction of this.transactions) {
      if (transaction.issueSolved === true) continue;
      ids.add(toIssueId(transaction.issueId));
    }

    return ids;
  }

  /**
   * Messages of all solved issues, one entry per solved transaction in
   * input order (undefined where the transaction carries no message)
   */
  allSolvedIssueMessages(): Array<string | undefined> {
    return this.transactions
      .filter((transaction) => transaction.issueSolved === true)
      .map((transaction) => transaction.issueMessage);
  }

  /**
   * The 3 transactions with the highest amount, sorted by amount descending.
   * Equal amounts keep their input order.
   */
  top3ByAmount(): TransactionRecord[] {
    return [...this.transactions]
      .sort((a, b) => b.amount - a.amount)
      .slice(0, TOP_TRANSACTIONS_LIMIT);
  }

  /**
   * Sender with the most total sent amount
   */
  topSender(): string | undefined {
    return this.topSenderTotal()?.name;
  }

  /**
   * Sender with the most total sent amount, together with that total
   */
  topSenderTotal(): SenderTotal | undefined {
    const totals = new Map<string, number>();

    for (const transaction of this.transactions) {
      const sender = transaction.senderFullName;
      if (sender === undefined) continue;
      totals.set(sender, (totals.get(sender) ?? 0) + transaction.amount);
    }

    let top: SenderTotal | undefined;
    // strict comparison: on a tie the sender seen first wins
    for (const [name, total] of totals) {
      if (!top || total > top.total) {
        top = { name, total };
      }
    }

    return top;
  }
}

function collectNames(
  transactions: ReadonlyArray<TransactionRecord>,
  pick: (transaction: TransactionRecord) => string | undefined
): Set<string> {
  const names = new Set<string>();

  for (const transaction of transactions) {
    const name = pick(transaction);
    if (name !== undefined) names.add(name);
  }

  return names;
}
