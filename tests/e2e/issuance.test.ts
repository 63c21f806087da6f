/**
 * Issuance E2E Tests
 *
 * POST /issue-asset against the in-memory ledger.
 */

import request from 'supertest';
import { Application } from 'express';
import { Keypair } from '@stellar/stellar-sdk';

import { ErrorCode, ErrorKind } from '../../src/types/errors';
import { InMemoryLedger, createTestContext } from '../helpers';

describe('Issuance E2E Tests', () => {
  let app: Application;
  let ledger: InMemoryLedger;
  let distributorPublicKey: string;

  beforeEach(async () => {
    const context = createTestContext();
    app = context.app;
    ledger = context.ledger;

    const setup = await request(app).get('/setup-accounts');
    distributorPublicKey = setup.body.data.distributor_public_key;
  });

  describe('POST /issue-asset', () => {
    it('should issue and return both transaction hashes', async () => {
      const response = await request(app).post('/issue-asset').send({ amount: '1000' });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        status: 'success',
        data: {
          message: `Asset MYTOKEN issued and 1000 sent to ${distributorPublicKey}.`,
          trustline_tx: expect.stringMatching(/^[0-9a-f]{64}$/),
          payment_tx: expect.stringMatching(/^[0-9a-f]{64}$/),
        },
      });
      expect(response.body.data.trustline_tx).not.toBe(response.body.data.payment_tx);
    });

    it('should accept a JSON number amount', async () => {
      const response = await request(app).post('/issue-asset').send({ amount: 25 });

      expect(response.status).toBe(200);
      expect(response.body.data.message).toBe(
        `Asset MYTOKEN issued and 25 sent to ${distributorPublicKey}.`
      );
    });

    it('should return 400 for a JSON number that prints in exponent form', async () => {
      const response = await request(app).post('/issue-asset').send({ amount: 0.0000001 });

      expect(response.status).toBe(400);
      expect(response.body.error.details).toEqual({
        amount: ['Amount this small or large must be sent as a decimal string, e.g. "0.0000001"'],
      });
      expect(ledger.submissions).toHaveLength(0);
    });

    it('should return 400 when amount is missing', async () => {
      const response = await request(app).post('/issue-asset').send({});

      expect(response.status).toBe(400);
      expect(response.body.error).toMatchObject({
        code: ErrorCode.VALIDATION_ERROR,
        kind: ErrorKind.VALIDATION,
        message: 'Validation failed',
        details: { amount: ["Missing 'amount' in request body"] },
      });
      expect(ledger.submissions).toHaveLength(0);
    });

    it('should return 400 for an amount with too many decimals', async () => {
      const response = await request(app).post('/issue-asset').send({ amount: '0.12345678' });

      expect(response.status).toBe(400);
      expect(response.body.error.details).toEqual({
        amount: ['amount can have at most 7 decimal places'],
      });
    });

    it('should return 500 with the stage when the trustline is rejected', async () => {
      ledger.rejectNextSubmission(['tx_failed', 'op_low_reserve']);

      const response = await request(app).post('/issue-asset').send({ amount: '1000' });

      expect(response.status).toBe(500);
      expect(response.body.error).toMatchObject({
        code: ErrorCode.TRUSTLINE_SUBMISSION_FAILED,
        kind: ErrorKind.SUBMISSION,
        stage: 'TRUSTLINE',
        result_codes: ['tx_failed', 'op_low_reserve'],
      });
      expect(response.body.error.trustline_tx).toBeUndefined();
      expect(ledger.submissions).toHaveLength(1);
    });

    it('should return the trustline hash when the payment is rejected', async () => {
      ledger.rejectSubmission(2, ['tx_failed', 'op_line_full']);

      const response = await request(app).post('/issue-asset').send({ amount: '1000' });

      expect(response.status).toBe(500);
      expect(response.body.error).toMatchObject({
        code: ErrorCode.PAYMENT_SUBMISSION_FAILED,
        kind: ErrorKind.SUBMISSION,
        stage: 'PAYMENT',
        message: 'Error issuing asset: Transaction rejected by the ledger: tx_failed, op_line_full',
        trustline_tx: expect.stringMatching(/^[0-9a-f]{64}$/),
        result_codes: ['tx_failed', 'op_line_full'],
      });
    });

    it('should return 504 when the ledger times out', async () => {
      ledger.timeoutNext('loadAccount');

      const response = await request(app).post('/issue-asset').send({ amount: '1000' });

      expect(response.status).toBe(504);
      expect(response.body.error).toMatchObject({
        code: ErrorCode.LEDGER_TIMEOUT,
        kind: ErrorKind.TIMEOUT,
        stage: 'TRUSTLINE',
      });
    });
  });

  describe('before setup', () => {
    it('should return 400 when accounts are not initialized', async () => {
      const fresh = createTestContext();

      const response = await request(fresh.app).post('/issue-asset').send({ amount: '1000' });

      expect(response.status).toBe(400);
      expect(response.body.error).toMatchObject({
        code: ErrorCode.ACCOUNTS_NOT_INITIALIZED,
        message: 'Accounts not initialized. Call /setup-accounts first.',
      });
    });
  });

  describe('secrets', () => {
    it('should never return a configured secret', async () => {
      const issuer = Keypair.random();
      const distributor = Keypair.random();
      const context = createTestContext({
        issuerSecret: issuer.secret(),
        distributorSecret: distributor.secret(),
      });
      context.ledger.createAccount(issuer.publicKey());
      context.ledger.createAccount(distributor.publicKey());

      const responses = [
        await request(context.app).get('/'),
        await request(context.app).get('/setup-accounts'),
        await request(context.app).post('/issue-asset').send({ amount: '10' }),
        await request(context.app).get(`/check-balance/${distributor.publicKey()}`),
        await request(context.app).get('/health'),
      ];

      responses.forEach((response) => {
        expect(response.text).not.toContain(issuer.secret());
        expect(response.text).not.toContain(distributor.secret());
      });
      expect(responses[2].status).toBe(200);
    });
  });
});
