import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { isAppError } from '../domain/errors.js';
import type { InvestecClient } from '../infra/investec/InvestecClient.js';
import { logger } from '../infra/logger.js';
import {
  formatAccount,
  formatAuthorisationSetup,
  formatBalance,
  formatBeneficiary,
  formatBeneficiaryCategory,
  formatDocument,
  formatProfile,
  formatTransaction,
  formatTransferResult,
  joinEntries,
} from './formatters.js';
import { isoDate, parsePaymentArguments, parseTransferArguments } from './toolArguments.js';

export const SERVER_NAME = 'investec';
export const SERVER_VERSION = '0.1.0';
export const TRANSACTION_DISPLAY_LIMIT = 10;

const accountId = z.string().min(1).describe('The ID of the account');
const profileId = z.string().min(1).describe('The ID of the profile');

function textResult(text: string): CallToolResult {
  return { content: [{ type: 'text', text }] };
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Runs one tool body; any failure becomes an error result the agent can read
 */
async function runTool(action: string, work: () => Promise<CallToolResult | string>): Promise<CallToolResult> {
  try {
    const result = await work();
    return typeof result === 'string' ? textResult(result) : result;
  } catch (error) {
    logger.error('Tool call failed', {
      action,
      code: isAppError(error) ? error.code : undefined,
      message: describeError(error),
    });
    return {
      content: [{ type: 'text', text: `Error ${action}: ${describeError(error)}` }],
      isError: true,
    };
  }
}

/**
 * MCP server exposing the Investec client as agent tools
 */
export function createMcpServer(client: InvestecClient): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });

  server.tool('get_accounts', 'Get all accounts for the authenticated user.', async () =>
    runTool('retrieving accounts', async () => {
      const accounts = await client.getAccounts();
      return accounts.length ? joinEntries(accounts.map(formatAccount)) : 'No accounts found.';
    })
  );

  server.tool(
    'get_account_balance',
    'Get the balance for a specific account.',
    { account_id: accountId },
    async ({ account_id }) =>
      runTool('retrieving account balance', async () =>
        formatBalance(await client.getAccountBalance(account_id))
      )
  );

  server.tool(
    'get_account_transactions',
    'Get transactions for a specific account.',
    {
      account_id: accountId,
      from_date: isoDate.optional().describe('Start date for transactions (YYYY-MM-DD)'),
      to_date: isoDate.optional().describe('End date for transactions (YYYY-MM-DD)'),
      transaction_type: z.string().optional().describe('Filter transactions by type'),
      include_pending: z.boolean().optional().describe('Include pending transactions'),
    },
    async ({ account_id, from_date, to_date, transaction_type, include_pending }) =>
      runTool('retrieving account transactions', async () => {
        const transactions = await client.getAccountTransactions(account_id, {
          fromDate: from_date,
          toDate: to_date,
          transactionType: transaction_type,
          includePending: include_pending,
        });
        if (!transactions.length) {
          return 'No transactions found for the specified criteria.';
        }

        const shown = transactions.slice(0, TRANSACTION_DISPLAY_LIMIT);
        let text = joinEntries(shown.map(formatTransaction));
        if (transactions.length > TRANSACTION_DISPLAY_LIMIT) {
          text += `\n\nShowing ${TRANSACTION_DISPLAY_LIMIT} of ${transactions.length} transactions.`;
        }
        return text;
      })
  );

  server.tool(
    'get_pending_transactions',
    'Get pending transactions for a specific account.',
    { account_id: accountId },
    async ({ account_id }) =>
      runTool('retrieving pending transactions', async () => {
        const pending = await client.getAccountPendingTransactions(account_id);
        return pending.length
          ? joinEntries(pending.map(formatTransaction))
          : 'No pending transactions found.';
      })
  );

  server.tool('get_beneficiaries', 'Get all beneficiaries for the authenticated user.', async () =>
    runTool('retrieving beneficiaries', async () => {
      const beneficiaries = await client.getBeneficiaries();
      return beneficiaries.length
        ? joinEntries(beneficiaries.map(formatBeneficiary))
        : 'No beneficiaries found.';
    })
  );

  server.tool(
    'get_beneficiary_categories',
    'Get beneficiary categories available to the authenticated user.',
    async () =>
      runTool('retrieving beneficiary categories', async () => {
        const category = await client.getBeneficiaryCategories();
        return category.id || category.name
          ? formatBeneficiaryCategory(category)
          : 'No beneficiary categories found.';
      })
  );

  server.tool(
    'transfer_multiple',
    'Transfer funds to one or multiple of your own accounts.',
    {
      account_id: accountId.describe('The source account ID'),
      transfers: z
        .string()
        .describe(
          'JSON list of transfers: [{"beneficiary_account_id": "ACCOUNT_ID", "amount": "10.00", ' +
            '"my_reference": "My Ref", "their_reference": "Their Ref"}]'
        ),
      profile_id: z.string().optional().describe('Optional profile ID'),
    },
    async ({ account_id, transfers, profile_id }) =>
      runTool('executing transfers', async () => {
        const items = parseTransferArguments(transfers);
        const response = await client.transferMultiple(account_id, items, profile_id);
        return renderTransferOutcome(response.transferResponses, response.errorMessage, 'transfer');
      })
  );

  server.tool(
    'pay_beneficiaries',
    'Pay one or multiple registered beneficiaries.',
    {
      account_id: accountId.describe('The source account ID'),
      payments: z
        .string()
        .describe(
          'JSON list of payments: [{"beneficiary_id": "BENEFICIARY_ID", "amount": "10.00", ' +
            '"my_reference": "My Ref", "their_reference": "Their Ref"}]. Optional per item: ' +
            'authoriser_a_id, authoriser_b_id, auth_period_id, faster_payment'
        ),
    },
    async ({ account_id, payments }) =>
      runTool('making beneficiary payments', async () => {
        const items = parsePaymentArguments(payments);
        const response = await client.payBeneficiaries(account_id, items);
        return renderTransferOutcome(response.paymentResponses, response.errorMessage, 'payment');
      })
  );

  server.tool('get_profiles', 'Get all profiles for the authenticated user.', async () =>
    runTool('retrieving profiles', async () => {
      const profiles = await client.getProfiles();
      return profiles.length ? joinEntries(profiles.map(formatProfile)) : 'No profiles found.';
    })
  );

  server.tool(
    'get_profile_accounts',
    'Get all accounts for a specific profile.',
    { profile_id: profileId },
    async ({ profile_id }) =>
      runTool('retrieving profile accounts', async () => {
        const accounts = await client.getProfileAccounts(profile_id);
        return accounts.length
          ? joinEntries(accounts.map(formatAccount))
          : 'No accounts found for this profile.';
      })
  );

  server.tool(
    'get_authorisation_setup',
    'Get the payment authorisation rules for an account within a profile.',
    { profile_id: profileId, account_id: accountId },
    async ({ profile_id, account_id }) =>
      runTool('retrieving authorisation setup', async () =>
        formatAuthorisationSetup(await client.getAuthorisationSetup(profile_id, account_id))
      )
  );

  server.tool(
    'get_profile_beneficiaries',
    'Get beneficiaries for an account within a profile.',
    { profile_id: profileId, account_id: accountId },
    async ({ profile_id, account_id }) =>
      runTool('retrieving profile beneficiaries', async () => {
        const beneficiaries = await client.getProfileBeneficiaries(profile_id, account_id);
        return beneficiaries.length
          ? joinEntries(beneficiaries.map(formatBeneficiary))
          : 'No beneficiaries found for this profile account.';
      })
  );

  server.tool(
    'get_documents',
    'List statements and other documents for an account within a date range.',
    {
      account_id: accountId,
      from_date: isoDate.describe('Start date (YYYY-MM-DD)'),
      to_date: isoDate.describe('End date (YYYY-MM-DD)'),
    },
    async ({ account_id, from_date, to_date }) =>
      runTool('retrieving documents', async () => {
        const documents = await client.getDocuments(account_id, from_date, to_date);
        return documents.length
          ? joinEntries(documents.map(formatDocument))
          : 'No documents found for the specified dates.';
      })
  );

  server.tool(
    'get_document',
    'Download a specific document for an account.',
    {
      account_id: accountId,
      document_type: z.string().min(1).describe('The document type, as listed by get_documents'),
      document_date: isoDate.describe('The document date (YYYY-MM-DD)'),
    },
    async ({ account_id, document_type, document_date }) =>
      runTool('retrieving document', async () => {
        const content = await client.getDocument(account_id, document_type, document_date);
        return {
          content: [
            {
              type: 'text',
              text: `Document ${document_type} dated ${document_date} (${content.length} bytes).`,
            },
            {
              type: 'resource',
              resource: {
                uri: `investec://accounts/${encodeURIComponent(account_id)}/documents/${encodeURIComponent(document_type)}/${document_date}`,
                mimeType: 'application/pdf',
                blob: content.toString('base64'),
              },
            },
          ],
        };
      })
  );

  return server;
}

function renderTransferOutcome(
  items: readonly Parameters<typeof formatTransferResult>[0][],
  errorMessage: string | null,
  kind: 'transfer' | 'payment'
): string {
  const sections: string[] = [];
  if (items.length) {
    sections.push(joinEntries(items.map(formatTransferResult)));
  } else {
    sections.push(`No ${kind} responses received.`);
  }
  if (errorMessage) {
    sections.push(`Error Message: ${errorMessage}`);
  }
  return sections.join('\n\n');
}
