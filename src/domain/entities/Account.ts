import type Decimal from 'decimal.js';
import { asWireRecord, readBoolean, readDecimal, readString } from './wire.js';

/**
 * Account entity - an Investec private bank account
 */
export interface Account {
  readonly accountId: string;
  readonly accountNumber: string;
  readonly accountName: string;
  readonly referenceName: string;
  readonly productName: string;
  readonly kycCompliant: boolean;
  readonly profileId: string;
  readonly profileName: string;
}

/**
 * AccountBalance entity - the five balances are reported independently
 */
export interface AccountBalance {
  readonly accountId: string;
  readonly currentBalance: Decimal;
  readonly availableBalance: Decimal;
  readonly budgetBalance: Decimal;
  readonly straightBalance: Decimal;
  readonly cashBalance: Decimal;
  readonly currency: string;
}

export const DEFAULT_CURRENCY = 'ZAR';

export function parseAccount(value: unknown): Account {
  const data = asWireRecord(value);
  return {
    accountId: readString(data, 'accountId'),
    accountNumber: readString(data, 'accountNumber'),
    accountName: readString(data, 'accountName'),
    referenceName: readString(data, 'referenceName'),
    productName: readString(data, 'productName'),
    kycCompliant: readBoolean(data, 'kycCompliant'),
    profileId: readString(data, 'profileId'),
    profileName: readString(data, 'profileName'),
  };
}

export function parseAccountBalance(value: unknown): AccountBalance {
  const data = asWireRecord(value);
  return {
    accountId: readString(data, 'accountId'),
    currentBalance: readDecimal(data, 'currentBalance'),
    availableBalance: readDecimal(data, 'availableBalance'),
    budgetBalance: readDecimal(data, 'budgetBalance'),
    straightBalance: readDecimal(data, 'straightBalance'),
    cashBalance: readDecimal(data, 'cashBalance'),
    currency: readString(data, 'currency', DEFAULT_CURRENCY),
  };
}
