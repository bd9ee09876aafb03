import type Decimal from 'decimal.js';
import {
  asWireRecord,
  readDecimal,
  readOptionalBoolean,
  readOptionalString,
  readString,
  toWireAmount,
} from './wire.js';
import { parseTransferEnvelope, type TransferResponseItem } from './Transfer.js';

/**
 * One payment to a registered beneficiary
 * Authoriser fields apply to profiles that require multi-party sign-off
 */
export interface BeneficiaryPaymentItem {
  readonly beneficiaryId: string;
  readonly amount: Decimal;
  readonly myReference: string;
  readonly theirReference: string;
  readonly authoriserAId?: string;
  readonly authoriserBId?: string;
  readonly authPeriodId?: string;
  readonly fasterPayment?: boolean;
}

export interface BeneficiaryPaymentRequest {
  readonly paymentList: readonly BeneficiaryPaymentItem[];
}

export interface BeneficiaryPaymentItemWire {
  beneficiaryId: string;
  amount: string;
  myReference: string;
  theirReference: string;
  authoriserAId?: string;
  authoriserBId?: string;
  authPeriodId?: string;
  fasterPayment?: boolean;
}

export interface BeneficiaryPaymentRequestWire {
  paymentList: BeneficiaryPaymentItemWire[];
}

export type PaymentResponseItem = TransferResponseItem;

export interface PaymentResponse {
  readonly paymentResponses: readonly PaymentResponseItem[];
  readonly errorMessage: string | null;
}

export function serializeBeneficiaryPaymentItem(
  item: BeneficiaryPaymentItem
): BeneficiaryPaymentItemWire {
  const wire: BeneficiaryPaymentItemWire = {
    beneficiaryId: item.beneficiaryId,
    amount: toWireAmount(item.amount),
    myReference: item.myReference,
    theirReference: item.theirReference,
  };
  if (item.authoriserAId) wire.authoriserAId = item.authoriserAId;
  if (item.authoriserBId) wire.authoriserBId = item.authoriserBId;
  if (item.authPeriodId) wire.authPeriodId = item.authPeriodId;
  if (item.fasterPayment !== undefined) wire.fasterPayment = item.fasterPayment;
  return wire;
}

export function parseBeneficiaryPaymentItem(value: unknown): BeneficiaryPaymentItem {
  const data = asWireRecord(value);
  const authoriserAId = readOptionalString(data, 'authoriserAId');
  const authoriserBId = readOptionalString(data, 'authoriserBId');
  const authPeriodId = readOptionalString(data, 'authPeriodId');
  const fasterPayment = readOptionalBoolean(data, 'fasterPayment');

  return {
    beneficiaryId: readString(data, 'beneficiaryId'),
    amount: readDecimal(data, 'amount'),
    myReference: readString(data, 'myReference'),
    theirReference: readString(data, 'theirReference'),
    ...(authoriserAId !== null ? { authoriserAId } : {}),
    ...(authoriserBId !== null ? { authoriserBId } : {}),
    ...(authPeriodId !== null ? { authPeriodId } : {}),
    ...(fasterPayment !== null ? { fasterPayment } : {}),
  };
}

export function serializeBeneficiaryPaymentRequest(
  request: BeneficiaryPaymentRequest
): BeneficiaryPaymentRequestWire {
  return {
    paymentList: request.paymentList.map(serializeBeneficiaryPaymentItem),
  };
}

export function parsePaymentResponse(value: unknown): PaymentResponse {
  const parsed = parseTransferEnvelope(value);
  return {
    paymentResponses: parsed.transferResponses,
    errorMessage: parsed.errorMessage,
  };
}
