export interface TransactionRecord {
  readonly mtn?: number;
  readonly amount: number;
  readonly senderFullName?: string;
  readonly senderAge?: number;
  readonly beneficiaryFullName?: string;
  readonly beneficiaryAge?: number;
  readonly issueId?: number;
  readonly issueSolved?: boolean;
  readonly issueMessage?: string;
}

export interface SenderTotal {
  name: string;
  total: number;
}
