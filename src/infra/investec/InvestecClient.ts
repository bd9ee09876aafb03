import { ApiError } from '../../domain/errors.js';
import { parseAccount, parseAccountBalance } from '../../domain/entities/Account.js';
import type { Account, AccountBalance } from '../../domain/entities/Account.js';
import { parseBeneficiary, parseBeneficiaryCategory } from '../../domain/entities/Beneficiary.js';
import type { Beneficiary, BeneficiaryCategory } from '../../domain/entities/Beneficiary.js';
import { parseDocument } from '../../domain/entities/Document.js';
import type { Document } from '../../domain/entities/Document.js';
import {
  parsePaymentResponse,
  serializeBeneficiaryPaymentRequest,
} from '../../domain/entities/Payment.js';
import type { BeneficiaryPaymentItem, PaymentResponse } from '../../domain/entities/Payment.js';
import { parseAuthorisationSetup, parseProfile } from '../../domain/entities/Profile.js';
import type { AuthorisationSetup, Profile } from '../../domain/entities/Profile.js';
import { parsePendingTransaction, parseTransaction } from '../../domain/entities/Transaction.js';
import type { PendingTransaction, Transaction } from '../../domain/entities/Transaction.js';
import { parseTransferResponse, serializeTransferRequest } from '../../domain/entities/Transfer.js';
import type { TransferItem, TransferResponse } from '../../domain/entities/Transfer.js';
import { asWireRecord, isWireRecord } from '../../domain/entities/wire.js';
import { logger } from '../logger.js';
import { resolveBaseUrl, TOKEN_PATH, type InvestecConfig } from './config.js';
import {
  buildUrl,
  describeCause,
  formatApiDate,
  parseJsonBody,
  sendRequest,
  toRequestError,
  type FetchLike,
  type QueryParams,
} from './http.js';
import { TokenManager, type TokenState } from './TokenManager.js';

export const API_PREFIX = '/za/pb/v1';

export type ApiDate = string | Date;

export interface TransactionQuery {
  fromDate?: ApiDate;
  toDate?: ApiDate;
  transactionType?: string;
  includePending?: boolean;
}

export interface InvestecClientOptions {
  /** HTTP transport; defaults to the global fetch */
  fetch?: FetchLike;
  /** Clock in epoch milliseconds; defaults to Date.now */
  now?: () => number;
}

interface RequestOptions {
  query?: QueryParams;
  json?: unknown;
}

type HttpMethod = 'GET' | 'POST';

const segment = encodeURIComponent;

/**
 * Reads data[key] as a list of records; anything else is an empty list
 */
function unwrapList(response: unknown, key?: string): unknown[] {
  const data = asWireRecord(response).data;
  const list = key === undefined ? data : isWireRecord(data) ? data[key] : undefined;
  return Array.isArray(list) ? list : [];
}

function unwrapData(response: unknown): unknown {
  const body = asWireRecord(response);
  return 'data' in body ? body.data : body;
}

/**
 * Investec Open Banking API client
 * One method per API operation; each returns typed records or throws an ApiError subtype
 */
export class InvestecClient {
  readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly now: () => number;
  private readonly tokens: TokenManager;

  constructor(config: InvestecConfig, options: InvestecClientOptions = {}) {
    this.baseUrl = resolveBaseUrl(config);
    this.apiKey = config.apiKey;
    this.timeoutMs = config.timeoutSeconds * 1000;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.now = options.now ?? Date.now;
    this.tokens = new TokenManager({
      tokenUrl: buildUrl(this.baseUrl, TOKEN_PATH).toString(),
      clientId: config.clientId,
      clientSecret: config.clientSecret,
      apiKey: config.apiKey,
      timeoutMs: this.timeoutMs,
      fetch: this.fetchImpl,
      now: this.now,
    });
  }

  get tokenState(): TokenState {
    return this.tokens.state;
  }

  get tokenExpiresAt(): number | null {
    return this.tokens.expiresAt;
  }

  /** Forces the next call to re-authenticate */
  invalidateToken(): void {
    this.tokens.invalidate();
  }

  // Accounts

  async getAccounts(): Promise<Account[]> {
    const response = await this.request('GET', `${API_PREFIX}/accounts`);
    return unwrapList(response, 'accounts').map(parseAccount);
  }

  async getAccountBalance(accountId: string): Promise<AccountBalance> {
    const response = await this.request('GET', `${API_PREFIX}/accounts/${segment(accountId)}/balance`);
    return parseAccountBalance(unwrapData(response));
  }

  async getAccountTransactions(
    accountId: string,
    query: TransactionQuery = {}
  ): Promise<Transaction[]> {
    const params: QueryParams = {};
    if (query.fromDate) params.fromDate = formatApiDate(query.fromDate);
    if (query.toDate) params.toDate = formatApiDate(query.toDate);
    if (query.transactionType) params.transactionType = query.transactionType;
    if (query.includePending) params.includePending = 'true';

    const response = await this.request(
      'GET',
      `${API_PREFIX}/accounts/${segment(accountId)}/transactions`,
      { query: params }
    );
    return unwrapList(response, 'transactions').map(parseTransaction);
  }

  async getAccountPendingTransactions(accountId: string): Promise<PendingTransaction[]> {
    const response = await this.request(
      'GET',
      `${API_PREFIX}/accounts/${segment(accountId)}/pending-transactions`
    );
    return unwrapList(response, 'PendingTransaction').map(parsePendingTransaction);
  }

  // Transfers and payments

  async transferMultiple(
    accountId: string,
    transfers: readonly TransferItem[],
    profileId?: string
  ): Promise<TransferResponse> {
    const response = await this.request(
      'POST',
      `${API_PREFIX}/accounts/${segment(accountId)}/transfermultiple`,
      { json: serializeTransferRequest({ transferList: transfers, profileId }) }
    );
    return parseTransferResponse(response);
  }

  async payBeneficiaries(
    accountId: string,
    payments: readonly BeneficiaryPaymentItem[]
  ): Promise<PaymentResponse> {
    const response = await this.request(
      'POST',
      `${API_PREFIX}/accounts/${segment(accountId)}/paymultiple`,
      { json: serializeBeneficiaryPaymentRequest({ paymentList: payments }) }
    );
    return parsePaymentResponse(response);
  }

  // Beneficiaries

  async getBeneficiaries(): Promise<Beneficiary[]> {
    const response = await this.request('GET', `${API_PREFIX}/accounts/beneficiaries`);
    return unwrapList(response).map(parseBeneficiary);
  }

  async getBeneficiaryCategories(): Promise<BeneficiaryCategory> {
    const response = await this.request('GET', `${API_PREFIX}/accounts/beneficiarycategories`);
    return parseBeneficiaryCategory(unwrapData(response));
  }

  // Profiles

  async getProfiles(): Promise<Profile[]> {
    const response = await this.request('GET', `${API_PREFIX}/profiles`);
    return unwrapList(response).map(parseProfile);
  }

  async getProfileAccounts(profileId: string): Promise<Account[]> {
    const response = await this.request('GET', `${API_PREFIX}/profiles/${segment(profileId)}/accounts`);
    return unwrapList(response).map(parseAccount);
  }

  async getAuthorisationSetup(profileId: string, accountId: string): Promise<AuthorisationSetup> {
    const response = await this.request(
      'GET',
      `${API_PREFIX}/profiles/${segment(profileId)}/accounts/${segment(accountId)}/authorisationsetupdetails`
    );
    return parseAuthorisationSetup(unwrapData(response));
  }

  async getProfileBeneficiaries(profileId: string, accountId: string): Promise<Beneficiary[]> {
    const response = await this.request(
      'GET',
      `${API_PREFIX}/profiles/${segment(profileId)}/accounts/${segment(accountId)}/beneficiaries`
    );
    return unwrapList(response).map(parseBeneficiary);
  }

  // Documents

  async getDocuments(accountId: string, fromDate: ApiDate, toDate: ApiDate): Promise<Document[]> {
    const response = await this.request(
      'GET',
      `${API_PREFIX}/accounts/${segment(accountId)}/documents`,
      { query: { fromDate: formatApiDate(fromDate), toDate: formatApiDate(toDate) } }
    );
    const today = new Date(this.now());
    return unwrapList(response).map((item) => parseDocument(item, today));
  }

  /**
   * Raw document content (usually a PDF)
   */
  async getDocument(accountId: string, documentType: string, documentDate: ApiDate): Promise<Buffer> {
    const path =
      `${API_PREFIX}/accounts/${segment(accountId)}/document/` +
      `${segment(documentType)}/${segment(formatApiDate(documentDate))}`;
    const response = await this.send('GET', path);
    try {
      return Buffer.from(await response.arrayBuffer());
    } catch (error) {
      throw new ApiError(`Request failed: ${describeCause(error)}`, { cause: error });
    }
  }

  // Transport

  private async send(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<Response> {
    const accessToken = await this.tokens.getAccessToken();
    const url = buildUrl(this.baseUrl, path, options.query);

    const headers: Record<string, string> = {
      Authorization: `Bearer ${accessToken}`,
      'x-api-key': this.apiKey,
      Accept: 'application/json',
    };

    let body: string | undefined;
    if (options.json !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(options.json);
    }

    logger.debug('Investec API request', { method, path });
    const response = await sendRequest(this.fetchImpl, url, { method, headers, body }, this.timeoutMs);

    if (!response.ok) {
      logger.warn('Investec API request rejected', { method, path, statusCode: response.status });
      throw await toRequestError(response, `${method} ${path}`);
    }
    return response;
  }

  private async request(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<unknown> {
    const response = await this.send(method, path, options);

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      throw new ApiError(`Request failed: ${describeCause(error)}`, { cause: error });
    }

    // Some endpoints answer with an empty body
    if (!text.trim()) {
      return {};
    }

    try {
      return parseJsonBody(text);
    } catch (error) {
      throw new ApiError(`Invalid JSON in response: ${describeCause(error)}`, { cause: error });
    }
  }
}
