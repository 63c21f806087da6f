/**
 * Horizon Ledger Client Unit Tests
 *
 * The Horizon server is replaced by a stub gateway. Transactions are still
 * built and signed by the real SDK.
 */

import http from 'http';
import { AxiosError, AxiosHeaders } from 'axios';
import {
  BadResponseError,
  Keypair,
  Networks,
  NotFoundError,
  Transaction,
} from '@stellar/stellar-sdk';

import {
  HorizonGateway,
  HorizonLedgerClient,
  createHorizonClient,
  extractResultCodes,
  toAccountSnapshot,
} from '../../../src/services/ledger/horizon.client';
import {
  LedgerNotFoundError,
  LedgerTimeoutError,
  LedgerUnavailableError,
} from '../../../src/services/ledger/ledger.errors';
import { AssetDescriptor } from '../../../src/types/stellar';

const distributor = Keypair.random();
const issuer = Keypair.random();
const asset: AssetDescriptor = { type: 'credit', code: 'MYTOKEN', issuerPublicKey: issuer.publicKey() };

const horizonAccount = (publicKey: string, sequence: string) => ({
  accountId: () => publicKey,
  sequenceNumber: () => sequence,
  balances: [
    { asset_type: 'credit_alphanum12', asset_code: 'MYTOKEN', asset_issuer: issuer.publicKey(), balance: '25.0000000' },
    { asset_type: 'liquidity_pool_shares', liquidity_pool_id: 'pool-1', balance: '3.0000000' },
    { asset_type: 'native', balance: '9999.9999900' },
  ],
});

const createStub = () => ({
  loadAccount: jest.fn(),
  fetchBaseFee: jest.fn(),
  submitTransaction: jest.fn(),
});

const createClient = (stub: ReturnType<typeof createStub>, timeoutMs = 1000) =>
  new HorizonLedgerClient(stub as unknown as HorizonGateway, Networks.TESTNET, {
    timeoutMs,
    txTimeoutSeconds: 30,
  });

describe('HorizonLedgerClient', () => {
  describe('extractResultCodes', () => {
    it('should flatten transaction and operation codes', () => {
      expect(
        extractResultCodes({
          extras: { result_codes: { transaction: 'tx_failed', operations: ['op_no_trust'] } },
        })
      ).toEqual(['tx_failed', 'op_no_trust']);
    });

    it('should read codes from a wrapped response', () => {
      expect(
        extractResultCodes({ data: { extras: { result_codes: { transaction: 'tx_bad_seq' } } } })
      ).toEqual(['tx_bad_seq']);
    });

    it('should return no codes for an unrelated payload', () => {
      expect(extractResultCodes('Service Unavailable')).toEqual([]);
      expect(extractResultCodes({ extras: {} })).toEqual([]);
    });
  });

  describe('toAccountSnapshot', () => {
    it('should keep native and credit lines and skip pool shares', () => {
      const account = horizonAccount(distributor.publicKey(), '4242');

      expect(toAccountSnapshot(account as unknown as Parameters<typeof toAccountSnapshot>[0])).toEqual({
        publicKey: distributor.publicKey(),
        sequenceNumber: '4242',
        balances: [
          { assetType: 'credit', assetCode: 'MYTOKEN', assetIssuer: issuer.publicKey(), amount: '25.0000000' },
          { assetType: 'native', amount: '9999.9999900' },
        ],
      });
    });
  });

  describe('loadAccount', () => {
    it('should return a snapshot', async () => {
      const stub = createStub();
      stub.loadAccount.mockResolvedValue(horizonAccount(distributor.publicKey(), '7'));

      const snapshot = await createClient(stub).loadAccount(distributor.publicKey());

      expect(snapshot.sequenceNumber).toBe('7');
      expect(stub.loadAccount).toHaveBeenCalledWith(distributor.publicKey());
    });

    it('should map a 404 to LedgerNotFoundError', async () => {
      const stub = createStub();
      stub.loadAccount.mockRejectedValue(new NotFoundError('Not Found', {}));

      await expect(createClient(stub).loadAccount(distributor.publicKey())).rejects.toThrow(
        LedgerNotFoundError
      );
    });

    it('should time out a call that never settles', async () => {
      const stub = createStub();
      stub.loadAccount.mockReturnValue(new Promise(() => undefined));

      await expect(createClient(stub, 20).loadAccount(distributor.publicKey())).rejects.toThrow(
        LedgerTimeoutError
      );
    });
  });

  describe('fetchBaseFee', () => {
    it('should wrap transport failures', async () => {
      const stub = createStub();
      stub.fetchBaseFee.mockRejectedValue(new Error('connect ECONNREFUSED'));

      const attempt = createClient(stub).fetchBaseFee();

      await expect(attempt).rejects.toThrow(LedgerUnavailableError);
      await expect(attempt).rejects.toThrow('Ledger fetch_base_fee failed: connect ECONNREFUSED');
    });
  });

  describe('submitTransaction', () => {
    const request = {
      source: { publicKey: distributor.publicKey(), sequenceNumber: '100', balances: [] },
      operations: [{ type: 'changeTrust' as const, asset }],
      signers: [{ publicKey: distributor.publicKey(), secretKey: distributor.secret() }],
      fee: 100,
    };

    it('should build from the snapshot sequence and sign with the given signer', async () => {
      const stub = createStub();
      stub.submitTransaction.mockResolvedValue({ hash: 'hash-1' });

      const outcome = await createClient(stub).submitTransaction(request);

      expect(outcome).toEqual({ success: true, transactionHash: 'hash-1' });

      const submitted: unknown = stub.submitTransaction.mock.calls[0][0];
      expect(submitted).toBeInstanceOf(Transaction);
      if (submitted instanceof Transaction) {
        expect(submitted.source).toBe(distributor.publicKey());
        expect(submitted.sequence).toBe('101');
        expect(submitted.fee).toBe('100');
        expect(submitted.operations).toHaveLength(1);
        expect(submitted.operations[0].type).toBe('changeTrust');
        expect(submitted.signatures).toHaveLength(1);
      }
    });

    it('should return a rejection with result codes instead of throwing', async () => {
      const stub = createStub();
      stub.submitTransaction.mockRejectedValue(
        new BadResponseError('Transaction submission failed', {
          extras: { result_codes: { transaction: 'tx_failed', operations: ['op_no_trust'] } },
        })
      );

      const outcome = await createClient(stub).submitTransaction(request);

      expect(outcome).toEqual({
        success: false,
        failureReason: 'Transaction rejected by the ledger: tx_failed, op_no_trust',
        resultCodes: ['tx_failed', 'op_no_trust'],
        transactionHash: expect.stringMatching(/^[0-9a-f]{64}$/),
      });
    });

    it('should return a rejection for a 400 answered through axios', async () => {
      const stub = createStub();
      stub.submitTransaction.mockRejectedValue(
        new AxiosError('Request failed with status code 400', 'ERR_BAD_REQUEST', undefined, undefined, {
          status: 400,
          statusText: 'Bad Request',
          headers: {},
          config: { headers: new AxiosHeaders() },
          data: {
            title: 'Transaction Failed',
            extras: { result_codes: { transaction: 'tx_bad_seq' } },
          },
        })
      );

      const outcome = await createClient(stub).submitTransaction(request);

      expect(outcome).toEqual({
        success: false,
        failureReason: 'Transaction rejected by the ledger: tx_bad_seq',
        resultCodes: ['tx_bad_seq'],
        transactionHash: expect.stringMatching(/^[0-9a-f]{64}$/),
      });
    });

    it('should treat a 5xx answered through axios as a transport failure', async () => {
      const stub = createStub();
      stub.submitTransaction.mockRejectedValue(
        new AxiosError('Request failed with status code 503', 'ERR_BAD_RESPONSE', undefined, undefined, {
          status: 503,
          statusText: 'Service Unavailable',
          headers: {},
          config: { headers: new AxiosHeaders() },
          data: 'Service Unavailable',
        })
      );

      await expect(createClient(stub).submitTransaction(request)).rejects.toThrow(
        LedgerUnavailableError
      );
    });

    it('should throw LedgerUnavailableError for transport failures', async () => {
      const stub = createStub();
      stub.submitTransaction.mockRejectedValue(new Error('socket hang up'));

      await expect(createClient(stub).submitTransaction(request)).rejects.toThrow(
        'Ledger submit_transaction failed: socket hang up'
      );
    });
  });

  describe('against an HTTP server answering like Horizon', () => {
    let server: http.Server;
    let horizonUrl: string;
    const submittedPaths: string[] = [];

    beforeAll(async () => {
      server = http.createServer((req, res) => {
        submittedPaths.push(`${req.method} ${req.url}`);
        req.resume();
        req.on('end', () => {
          res.writeHead(400, { 'Content-Type': 'application/problem+json' });
          res.end(
            JSON.stringify({
              type: 'https://stellar.org/horizon-errors/transaction_failed',
              title: 'Transaction Failed',
              status: 400,
              extras: { result_codes: { transaction: 'tx_failed', operations: ['op_no_trust'] } },
            })
          );
        });
      });
      await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', () => resolve()));
      const address = server.address();
      if (address === null || typeof address === 'string') {
        throw new Error('Test server has no TCP address');
      }
      horizonUrl = `http://127.0.0.1:${address.port}`;
    });

    afterAll(async () => {
      await new Promise<void>((resolve) => server.close(() => resolve()));
    });

    it('should return the ledger result codes of a rejected submission', async () => {
      const client = createHorizonClient(horizonUrl, Networks.TESTNET, {
        timeoutMs: 5000,
        txTimeoutSeconds: 30,
      });

      const outcome = await client.submitTransaction({
        source: { publicKey: distributor.publicKey(), sequenceNumber: '100', balances: [] },
        operations: [{ type: 'changeTrust', asset }],
        signers: [{ publicKey: distributor.publicKey(), secretKey: distributor.secret() }],
        fee: 100,
      });

      expect(submittedPaths).toEqual(['POST /transactions']);
      expect(outcome).toEqual({
        success: false,
        failureReason: 'Transaction rejected by the ledger: tx_failed, op_no_trust',
        resultCodes: ['tx_failed', 'op_no_trust'],
        transactionHash: expect.stringMatching(/^[0-9a-f]{64}$/),
      });
    });
  });
});
