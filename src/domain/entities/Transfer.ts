import type Decimal from 'decimal.js';
import {
  asWireRecord,
  isWireRecord,
  readBoolean,
  readDecimal,
  readOptionalString,
  readRecordList,
  readString,
  toWireAmount,
  type WireRecord,
} from './wire.js';

/**
 * One leg of an inter-account transfer
 */
export interface TransferItem {
  readonly beneficiaryAccountId: string;
  readonly amount: Decimal;
  readonly myReference: string;
  readonly theirReference: string;
}

export interface TransferRequest {
  readonly transferList: readonly TransferItem[];
  readonly profileId?: string;
}

export interface TransferItemWire {
  beneficiaryAccountId: string;
  amount: string;
  myReference: string;
  theirReference: string;
}

export interface TransferRequestWire {
  transferList: TransferItemWire[];
  profileId?: string;
}

export interface TransferResponseItem {
  readonly paymentReferenceNumber: string | null;
  readonly paymentDate: string | null;
  readonly status: string | null;
  readonly beneficiaryName: string | null;
  readonly beneficiaryAccountId: string | null;
  readonly authorisationRequired: boolean;
}

export interface TransferResponse {
  readonly transferResponses: readonly TransferResponseItem[];
  readonly errorMessage: string | null;
}

export function serializeTransferItem(item: TransferItem): TransferItemWire {
  return {
    beneficiaryAccountId: item.beneficiaryAccountId,
    amount: toWireAmount(item.amount),
    myReference: item.myReference,
    theirReference: item.theirReference,
  };
}

export function parseTransferItem(value: unknown): TransferItem {
  const data = asWireRecord(value);
  return {
    beneficiaryAccountId: readString(data, 'beneficiaryAccountId'),
    amount: readDecimal(data, 'amount'),
    myReference: readString(data, 'myReference'),
    theirReference: readString(data, 'theirReference'),
  };
}

export function serializeTransferRequest(request: TransferRequest): TransferRequestWire {
  const wire: TransferRequestWire = {
    transferList: request.transferList.map(serializeTransferItem),
  };
  if (request.profileId) {
    wire.profileId = request.profileId;
  }
  return wire;
}

export function parseTransferResponseItem(data: WireRecord): TransferResponseItem {
  return {
    paymentReferenceNumber: readOptionalString(data, 'PaymentReferenceNumber'),
    paymentDate: readOptionalString(data, 'PaymentDate'),
    status: readOptionalString(data, 'Status'),
    beneficiaryName: readOptionalString(data, 'BeneficiaryName'),
    beneficiaryAccountId: readOptionalString(data, 'BeneficiaryAccountId'),
    authorisationRequired: readBoolean(data, 'AuthorisationRequired'),
  };
}

/**
 * Transfer and payment results arrive in two shapes:
 *   { transferResponse: { TransferResponses, ErrorMessage } }   (v1)
 *   { TransferResponses, ErrorMessage }
 * optionally inside a `data` envelope. The nested key is checked first.
 */
export function parseTransferEnvelope(value: unknown): TransferResponse {
  const outer = asWireRecord(value);
  const body = isWireRecord(outer.data) ? outer.data : outer;
  const nested = isWireRecord(body.transferResponse) ? body.transferResponse : null;

  const responses =
    nested && 'TransferResponses' in nested
      ? readRecordList(nested, 'TransferResponses')
      : readRecordList(body, 'TransferResponses');
  const errorMessage =
    nested && 'ErrorMessage' in nested
      ? readOptionalString(nested, 'ErrorMessage')
      : readOptionalString(body, 'ErrorMessage');

  return {
    transferResponses: responses.map(parseTransferResponseItem),
    errorMessage,
  };
}

export function parseTransferResponse(value: unknown): TransferResponse {
  return parseTransferEnvelope(value);
}
