import { z } from 'zod';
import { ValidationError } from '../domain/errors.js';
import { toDecimal } from '../domain/entities/wire.js';
import type { BeneficiaryPaymentItem } from '../domain/entities/Payment.js';
import type { TransferItem } from '../domain/entities/Transfer.js';
import { parseJsonArgument } from './parseJsonArgument.js';

export const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, { message: 'Expected a date in YYYY-MM-DD format' });

const amount = z.union([z.string(), z.number()]).transform((value, ctx) => {
  const parsed = toDecimal(value);
  if (!parsed || parsed.lte(0)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'amount must be a positive decimal',
    });
    return z.NEVER;
  }
  return parsed;
});

const transferArgument = z.object({
  beneficiary_account_id: z.string().min(1),
  amount,
  my_reference: z.string(),
  their_reference: z.string(),
});

const paymentArgument = z.object({
  beneficiary_id: z.string().min(1),
  amount,
  my_reference: z.string(),
  their_reference: z.string(),
  authoriser_a_id: z.string().optional(),
  authoriser_b_id: z.string().optional(),
  auth_period_id: z.string().optional(),
  faster_payment: z.boolean().optional(),
});

function parseList<T extends z.ZodTypeAny>(text: string, schema: T, label: string): z.output<T>[] {
  let raw: unknown;
  try {
    raw = parseJsonArgument(text);
  } catch {
    throw new ValidationError(`${label} must be a JSON list`);
  }

  const result = z.array(schema).min(1).safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new ValidationError(`Invalid ${label}: ${issues.join('; ')}`, { issues });
  }
  return result.data;
}

/**
 * `[{"beneficiary_account_id": "...", "amount": "10.00", "my_reference": "...", "their_reference": "..."}]`
 */
export function parseTransferArguments(text: string): TransferItem[] {
  return parseList(text, transferArgument, 'transfers').map((item) => ({
    beneficiaryAccountId: item.beneficiary_account_id,
    amount: item.amount,
    myReference: item.my_reference,
    theirReference: item.their_reference,
  }));
}

/**
 * `[{"beneficiary_id": "...", "amount": "10.00", "my_reference": "...", "their_reference": "..."}]`
 */
export function parsePaymentArguments(text: string): BeneficiaryPaymentItem[] {
  return parseList(text, paymentArgument, 'payments').map((item) => ({
    beneficiaryId: item.beneficiary_id,
    amount: item.amount,
    myReference: item.my_reference,
    theirReference: item.their_reference,
    ...(item.authoriser_a_id ? { authoriserAId: item.authoriser_a_id } : {}),
    ...(item.authoriser_b_id ? { authoriserBId: item.authoriser_b_id } : {}),
    ...(item.auth_period_id ? { authPeriodId: item.auth_period_id } : {}),
    ...(item.faster_payment !== undefined ? { fasterPayment: item.faster_payment } : {}),
  }));
}
