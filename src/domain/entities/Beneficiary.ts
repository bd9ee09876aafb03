import type Decimal from 'decimal.js';
import {
  asWireRecord,
  readBoolean,
  readOptionalDecimal,
  readOptionalString,
  readString,
} from './wire.js';

/**
 * Beneficiary entity - a registered third-party payee
 * Only beneficiaryId is guaranteed by the API
 */
export interface Beneficiary {
  readonly beneficiaryId: string;
  readonly accountNumber: string | null;
  readonly code: string | null;
  readonly bank: string | null;
  readonly beneficiaryName: string | null;
  readonly lastPaymentAmount: Decimal | null;
  readonly lastPaymentDate: string | null; // as sent by the API, not always ISO
  readonly cellNo: string | null;
  readonly emailAddress: string | null;
  readonly name: string | null;
  readonly referenceAccountNumber: string | null;
  readonly referenceName: string | null;
  readonly categoryId: string | null;
  readonly profileId: string | null;
  readonly fasterPaymentAllowed: boolean;
  readonly beneficiaryType: string | null;
  readonly approvedBeneficiaryCategory: string | null;
}

export interface BeneficiaryCategory {
  readonly id: string;
  readonly isDefault: boolean;
  readonly name: string;
}

export function parseBeneficiary(value: unknown): Beneficiary {
  const data = asWireRecord(value);
  return {
    beneficiaryId: readString(data, 'beneficiaryId'),
    accountNumber: readOptionalString(data, 'accountNumber'),
    code: readOptionalString(data, 'code'),
    bank: readOptionalString(data, 'bank'),
    beneficiaryName: readOptionalString(data, 'beneficiaryName'),
    lastPaymentAmount: readOptionalDecimal(data, 'lastPaymentAmount'),
    lastPaymentDate: readOptionalString(data, 'lastPaymentDate'),
    cellNo: readOptionalString(data, 'cellNo'),
    emailAddress: readOptionalString(data, 'emailAddress'),
    name: readOptionalString(data, 'name'),
    referenceAccountNumber: readOptionalString(data, 'referenceAccountNumber'),
    referenceName: readOptionalString(data, 'referenceName'),
    categoryId: readOptionalString(data, 'categoryId'),
    profileId: readOptionalString(data, 'profileId'),
    fasterPaymentAllowed: readBoolean(data, 'fasterPaymentAllowed'),
    beneficiaryType: readOptionalString(data, 'beneficiaryType'),
    approvedBeneficiaryCategory: readOptionalString(data, 'approvedBeneficiaryCategory'),
  };
}

export function parseBeneficiaryCategory(value: unknown): BeneficiaryCategory {
  const data = asWireRecord(value);
  return {
    id: readString(data, 'id'),
    // arrives as "true"/"false" or as a boolean depending on the endpoint version
    isDefault: readBoolean(data, 'isDefault'),
    name: readString(data, 'name'),
  };
}
