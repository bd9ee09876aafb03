import type Decimal from 'decimal.js';
import type { Account, AccountBalance } from '../domain/entities/Account.js';
import type { Beneficiary, BeneficiaryCategory } from '../domain/entities/Beneficiary.js';
import type { Document } from '../domain/entities/Document.js';
import type { AuthorisationSetup, Authoriser, Profile } from '../domain/entities/Profile.js';
import type { PendingTransaction, Transaction } from '../domain/entities/Transaction.js';
import type { TransferResponseItem } from '../domain/entities/Transfer.js';

/**
 * Plain-text renderings of domain records for tool consumers
 */

export const ENTRY_SEPARATOR = '\n---\n';
const UNKNOWN = 'Unknown';

export function formatDate(value: Date | null): string {
  return value ? value.toISOString().slice(0, 10) : UNKNOWN;
}

export function formatMoney(amount: Decimal, currency?: string): string {
  const fixed = amount.toFixed(2);
  return currency ? `${fixed} ${currency}` : fixed;
}

function orUnknown(value: string | null | undefined): string {
  return value ? value : UNKNOWN;
}

function lines(entries: Array<[string, string] | null>): string {
  return entries
    .filter((entry): entry is [string, string] => entry !== null)
    .map(([label, value]) => `${label}: ${value}`)
    .join('\n');
}

export function joinEntries(entries: string[]): string {
  return entries.join(ENTRY_SEPARATOR);
}

export function formatAccount(account: Account): string {
  return lines([
    ['Account ID', orUnknown(account.accountId)],
    ['Account Name', orUnknown(account.accountName)],
    ['Account Number', orUnknown(account.accountNumber)],
    ['Account Type', orUnknown(account.productName)],
    ['Reference Name', orUnknown(account.referenceName)],
    ['Profile', account.profileName ? `${account.profileName} (${account.profileId})` : UNKNOWN],
  ]);
}

export function formatBalance(balance: AccountBalance): string {
  return lines([
    ['Account ID', orUnknown(balance.accountId)],
    ['Current Balance', formatMoney(balance.currentBalance, balance.currency)],
    ['Available Balance', formatMoney(balance.availableBalance, balance.currency)],
    ['Budget Balance', formatMoney(balance.budgetBalance, balance.currency)],
    ['Straight Balance', formatMoney(balance.straightBalance, balance.currency)],
    ['Cash Balance', formatMoney(balance.cashBalance, balance.currency)],
  ]);
}

function isPosted(transaction: Transaction | PendingTransaction): transaction is Transaction {
  return 'postingDate' in transaction;
}

export function formatTransaction(transaction: Transaction | PendingTransaction): string {
  const posted = isPosted(transaction) ? transaction : null;
  return lines([
    ['Date', formatDate(transaction.transactionDate ?? posted?.postingDate ?? null)],
    ['Description', orUnknown(transaction.description)],
    ['Amount', formatMoney(transaction.amount)],
    ['Type', orUnknown(transaction.type)],
    ['Status', orUnknown(transaction.status)],
    posted?.transactionType ? ['Category', posted.transactionType] : null,
    posted?.runningBalance ? ['Running Balance', formatMoney(posted.runningBalance)] : null,
  ]);
}

export function formatBeneficiary(beneficiary: Beneficiary): string {
  return lines([
    ['Beneficiary ID', orUnknown(beneficiary.beneficiaryId)],
    ['Name', orUnknown(beneficiary.name ?? beneficiary.beneficiaryName)],
    ['Account Number', orUnknown(beneficiary.accountNumber)],
    ['Bank', orUnknown(beneficiary.bank)],
    ['Type', orUnknown(beneficiary.beneficiaryType)],
    ['Reference', orUnknown(beneficiary.referenceName)],
    [
      'Last Payment Amount',
      beneficiary.lastPaymentAmount ? formatMoney(beneficiary.lastPaymentAmount) : UNKNOWN,
    ],
    ['Last Payment Date', orUnknown(beneficiary.lastPaymentDate)],
    ['Faster Payment Allowed', String(beneficiary.fasterPaymentAllowed)],
  ]);
}

export function formatBeneficiaryCategory(category: BeneficiaryCategory): string {
  return lines([
    ['ID', orUnknown(category.id)],
    ['Name', orUnknown(category.name)],
    ['Is Default', String(category.isDefault)],
  ]);
}

export function formatTransferResult(item: TransferResponseItem): string {
  return lines([
    ['Payment Reference', orUnknown(item.paymentReferenceNumber)],
    ['Payment Date', orUnknown(item.paymentDate)],
    ['Status', orUnknown(item.status)],
    ['Beneficiary Name', orUnknown(item.beneficiaryName)],
    ['Beneficiary Account ID', orUnknown(item.beneficiaryAccountId)],
    ['Authorisation Required', String(item.authorisationRequired)],
  ]);
}

export function formatProfile(profile: Profile): string {
  return lines([
    ['Profile ID', orUnknown(profile.profileId)],
    ['Profile Name', orUnknown(profile.profileName)],
    ['Default Profile', String(profile.defaultProfile)],
  ]);
}

function formatAuthorisers(authorisers: readonly Authoriser[]): string {
  if (authorisers.length === 0) return 'None';
  return authorisers.map((a) => `${a.name} (${a.authoriserId})`).join(', ');
}

export function formatAuthorisationSetup(setup: AuthorisationSetup): string {
  return lines([
    ['Authorisations Required', orUnknown(setup.numberOfAuthorisationRequired)],
    [
      'Periods',
      setup.period.length ? setup.period.map((p) => `${p.description} (${p.id})`).join(', ') : 'None',
    ],
    ['Authorisers (List A)', formatAuthorisers(setup.authorisersListA)],
    ['Authorisers (List B)', formatAuthorisers(setup.authorisersListB)],
  ]);
}

export function formatDocument(document: Document): string {
  const date = formatDate(document.documentDate);
  return lines([
    ['Document Type', orUnknown(document.documentType)],
    ['Document Date', document.documentDateIsFallback ? `${date} (date not supplied)` : date],
  ]);
}
