import { z } from 'zod';
import { InvalidIssueIdTypeError } from '../utils/errors';
import { toIssueId } from '../utils/issueId';

const optionalString = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);

const optionalNumber = z
  .number()
  .nullish()
  .transform((value) => value ?? undefined);

// issueId only has to be usable on unsolved records
const checkIssueId = (record: { issueId?: unknown; issueSolved?: boolean }, ctx: z.RefinementCtx) => {
  if (record.issueSolved === true) return;

  try {
    toIssueId(record.issueId);
  } catch (error) {
    if (!(error instanceof InvalidIssueIdTypeError)) throw error;
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['issueId'],
      message: error.message,
      params: { code: error.code },
    });
  }
};

const loadedIssueId = (value: unknown): number | undefined =>
  typeof value === 'number' && Number.isFinite(value) ? toIssueId(value) : undefined;

export const transactionRecordSchema = z
  .object({
    mtn: optionalNumber,
    amount: z.number().finite(),
    senderFullName: optionalString,
    senderAge: optionalNumber,
    beneficiaryFullName: optionalString,
    beneficiaryAge: optionalNumber,
    issueId: z.unknown(),
    issueSolved: z
      .boolean()
      .nullish()
      .transform((value) => value ?? undefined),
    issueMessage: optionalString,
  })
  .superRefine(checkIssueId)
  .transform((record) => ({ ...record, issueId: loadedIssueId(record.issueId) }));

export const transactionFileSchema = z.array(transactionRecordSchema);
