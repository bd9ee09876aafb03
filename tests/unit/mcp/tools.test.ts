import { afterEach, describe, it, expect, vi } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { CallToolResultSchema, type CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { InvestecConfig } from '../../../src/infra/investec/config.js';
import { InvestecClient } from '../../../src/infra/investec/InvestecClient.js';
import { createMcpServer } from '../../../src/mcp/tools.js';

const loggerMock = vi.hoisted(() => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
}));

vi.mock('../../../src/infra/logger.js', () => loggerMock);

const config: InvestecConfig = {
  clientId: 'test-client',
  clientSecret: 'test-secret',
  apiKey: 'test-api-key',
  useSandbox: true,
  timeoutSeconds: 30,
  productionUrl: 'https://production.example.test',
  sandboxUrl: 'https://sandbox.example.test',
};

type Handler = (url: URL, init?: RequestInit) => Response;

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status });
}

function fakeFetch(handler: Handler) {
  return vi.fn(async (input: string | URL, init?: RequestInit): Promise<Response> => {
    const url = new URL(String(input));
    if (url.pathname === '/identity/v2/oauth2/token') {
      return jsonResponse({ access_token: 'tok', expires_in: 1799 });
    }
    return handler(url, init);
  });
}

const openClients: Client[] = [];

async function connect(fetchMock: ReturnType<typeof fakeFetch>): Promise<Client> {
  const investec = new InvestecClient(config, { fetch: fetchMock, now: () => Date.parse('2024-03-10T12:00:00Z') });
  const server = createMcpServer(investec);
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  const client = new Client({ name: 'tools-test', version: '1.0.0' });

  await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);
  openClients.push(client);
  return client;
}

async function callTool(client: Client, name: string, args: Record<string, unknown> = {}): Promise<CallToolResult> {
  return CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
}

function textOf(result: CallToolResult): string {
  return result.content.map((item) => (item.type === 'text' ? item.text : '')).join('\n');
}

afterEach(async () => {
  await Promise.all(openClients.splice(0).map((client) => client.close()));
});

describe('MCP tools', () => {
  it('registers every tool', async () => {
    const client = await connect(fakeFetch(() => jsonResponse({})));

    const { tools } = await client.listTools();

    expect(tools.map((tool) => tool.name).sort()).toEqual([
      'get_account_balance',
      'get_account_transactions',
      'get_accounts',
      'get_authorisation_setup',
      'get_beneficiaries',
      'get_beneficiary_categories',
      'get_document',
      'get_documents',
      'get_pending_transactions',
      'get_profile_accounts',
      'get_profile_beneficiaries',
      'get_profiles',
      'pay_beneficiaries',
      'transfer_multiple',
    ]);
  });

  it('renders accounts', async () => {
    const client = await connect(
      fakeFetch(() =>
        jsonResponse({
          data: {
            accounts: [
              { accountId: 'A1', accountName: 'Mr J Doe', productName: 'Private Bank Account' },
              { accountId: 'A2', accountName: 'Mr J Doe', productName: 'Savings' },
            ],
          },
        })
      )
    );

    const result = await callTool(client, 'get_accounts');

    expect(result.isError).toBeFalsy();
    const text = textOf(result);
    expect(text.split('\n---\n')).toHaveLength(2);
    expect(text.startsWith('Account ID: A1\nAccount Name: Mr J Doe\n')).toBe(true);
  });

  it('says when there are no accounts', async () => {
    const client = await connect(fakeFetch(() => jsonResponse({ data: { accounts: [] } })));

    expect(textOf(await callTool(client, 'get_accounts'))).toBe('No accounts found.');
  });

  it('shows at most ten transactions', async () => {
    const transactions = Array.from({ length: 12 }, (_, i) => ({
      accountId: 'A1',
      description: `TX ${i + 1}`,
      transactionDate: '2024-01-15',
      amount: i + 1,
    }));
    const fetchMock = fakeFetch(() => jsonResponse({ data: { transactions } }));
    const client = await connect(fetchMock);

    const text = textOf(
      await callTool(client, 'get_account_transactions', {
        account_id: 'A1',
        from_date: '2024-01-01',
        to_date: '2024-01-31',
      })
    );

    expect(text.match(/^Description: /gm)).toHaveLength(10);
    expect(text).toContain('Description: TX 10');
    expect(text).not.toContain('Description: TX 11');
    expect(text.endsWith('\n\nShowing 10 of 12 transactions.')).toBe(true);
    expect(String(fetchMock.mock.calls[1]?.[0])).toBe(
      'https://sandbox.example.test/za/pb/v1/accounts/A1/transactions?fromDate=2024-01-01&toDate=2024-01-31'
    );
  });

  it('reports API failures as tool errors', async () => {
    const client = await connect(
      fakeFetch(() => new Response('Not found', { status: 404, statusText: 'Not Found' }))
    );

    const result = await callTool(client, 'get_account_balance', { account_id: 'A1' });

    expect(result.isError).toBe(true);
    expect(textOf(result)).toBe(
      'Error retrieving account balance: HTTP error occurred: 404 Not Found for GET /za/pb/v1/accounts/A1/balance'
    );
  });

  it('rejects malformed transfer lists before calling the API', async () => {
    const fetchMock = fakeFetch(() => jsonResponse({}));
    const client = await connect(fetchMock);

    const result = await callTool(client, 'transfer_multiple', {
      account_id: 'A1',
      transfers: 'move everything',
    });

    expect(result.isError).toBe(true);
    expect(textOf(result)).toBe('Error executing transfers: transfers must be a JSON list');
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('executes transfers and renders the results', async () => {
    const fetchMock = fakeFetch(() =>
      jsonResponse({
        data: {
          TransferResponses: [
            {
              PaymentReferenceNumber: 'REF1',
              PaymentDate: '2024-01-20',
              Status: 'Complete',
              BeneficiaryName: 'Savings',
              BeneficiaryAccountId: 'A2',
              AuthorisationRequired: false,
            },
          ],
          ErrorMessage: null,
        },
      })
    );
    const client = await connect(fetchMock);

    const result = await callTool(client, 'transfer_multiple', {
      account_id: 'A1',
      transfers:
        '[{"beneficiary_account_id": "A2", "amount": "10", "my_reference": "Savings", "their_reference": "Top-up"}]',
    });

    expect(textOf(result)).toBe(
      [
        'Payment Reference: REF1',
        'Payment Date: 2024-01-20',
        'Status: Complete',
        'Beneficiary Name: Savings',
        'Beneficiary Account ID: A2',
        'Authorisation Required: false',
      ].join('\n')
    );
    expect(JSON.parse(String(fetchMock.mock.calls[1]?.[1]?.body))).toEqual({
      transferList: [
        { beneficiaryAccountId: 'A2', amount: '10.00', myReference: 'Savings', theirReference: 'Top-up' },
      ],
    });
  });

  it('appends the API error message to payment results', async () => {
    const client = await connect(
      fakeFetch(() => jsonResponse({ data: { TransferResponses: [], ErrorMessage: 'Insufficient funds' } }))
    );

    const result = await callTool(client, 'pay_beneficiaries', {
      account_id: 'A1',
      payments: '[{"beneficiary_id": "B1", "amount": "500", "my_reference": "m", "their_reference": "t"}]',
    });

    expect(textOf(result)).toBe('No payment responses received.\n\nError Message: Insufficient funds');
  });

  it('returns documents as embedded resources', async () => {
    const client = await connect(fakeFetch(() => new Response('%PDF')));

    const result = await callTool(client, 'get_document', {
      account_id: 'A1',
      document_type: 'Statement',
      document_date: '2024-02-29',
    });

    expect(result.content[0]).toEqual({
      type: 'text',
      text: 'Document Statement dated 2024-02-29 (4 bytes).',
    });
    expect(result.content[1]).toEqual({
      type: 'resource',
      resource: {
        uri: 'investec://accounts/A1/documents/Statement/2024-02-29',
        mimeType: 'application/pdf',
        blob: 'JVBERg==',
      },
    });
  });
});
