import type Decimal from 'decimal.js';
import {
  asWireRecord,
  readDecimal,
  readOptionalDate,
  readOptionalDecimal,
  readOptionalInteger,
  readOptionalString,
  readString,
  type WireRecord,
} from './wire.js';

export type TransactionType = 'CREDIT' | 'DEBIT';
export type TransactionStatus = 'POSTED' | 'PENDING';

const TRANSACTION_TYPES: readonly TransactionType[] = ['CREDIT', 'DEBIT'];
const TRANSACTION_STATUSES: readonly TransactionStatus[] = ['POSTED', 'PENDING'];

/**
 * Transaction entity - a posted or pending movement on an account
 * `type` and `status` are null when the API sent a value outside the enumeration
 */
export interface Transaction {
  readonly accountId: string;
  readonly type: TransactionType | null;
  readonly transactionType: string | null;
  readonly status: TransactionStatus | null;
  readonly description: string;
  readonly cardNumber: string | null;
  readonly postedOrder: number | null;
  readonly postingDate: Date | null;
  readonly valueDate: Date | null;
  readonly actionDate: Date | null;
  readonly transactionDate: Date | null;
  readonly amount: Decimal;
  readonly runningBalance: Decimal | null;
  readonly uuid: string | null;
}

export interface PendingTransaction {
  readonly accountId: string;
  readonly type: TransactionType | null;
  readonly status: 'PENDING';
  readonly description: string;
  readonly transactionDate: Date | null;
  readonly amount: Decimal;
}

/**
 * Absent field -> fallback; any present value outside the members (null included) -> null
 */
function readEnum<T extends string>(
  data: WireRecord,
  key: string,
  members: readonly T[],
  fallback: T
): T | null {
  if (!(key in data) || data[key] === undefined) {
    return fallback;
  }
  const raw = data[key];
  if (typeof raw !== 'string') return null;
  const normalized = raw.trim().toUpperCase();
  return members.find((member) => member === normalized) ?? null;
}

export function parseTransactionType(data: WireRecord): TransactionType | null {
  return readEnum(data, 'type', TRANSACTION_TYPES, 'DEBIT');
}

export function parseTransaction(value: unknown): Transaction {
  const data = asWireRecord(value);
  return {
    accountId: readString(data, 'accountId'),
    type: parseTransactionType(data),
    transactionType: readOptionalString(data, 'transactionType'),
    status: readEnum(data, 'status', TRANSACTION_STATUSES, 'POSTED'),
    description: readString(data, 'description'),
    cardNumber: readOptionalString(data, 'cardNumber'),
    postedOrder: readOptionalInteger(data, 'postedOrder'),
    postingDate: readOptionalDate(data, 'postingDate'),
    valueDate: readOptionalDate(data, 'valueDate'),
    actionDate: readOptionalDate(data, 'actionDate'),
    transactionDate: readOptionalDate(data, 'transactionDate'),
    amount: readDecimal(data, 'amount'),
    runningBalance: readOptionalDecimal(data, 'runningBalance'),
    uuid: readOptionalString(data, 'uuid'),
  };
}

export function parsePendingTransaction(value: unknown): PendingTransaction {
  const data = asWireRecord(value);
  return {
    accountId: readString(data, 'accountId'),
    type: parseTransactionType(data),
    status: 'PENDING',
    description: readString(data, 'description'),
    transactionDate: readOptionalDate(data, 'transactionDate'),
    amount: readDecimal(data, 'amount'),
  };
}
