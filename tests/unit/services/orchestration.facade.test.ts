/**
 * Orchestration Facade Unit Tests
 *
 * Account setup and issuance end to end against the in-memory ledger
 * and faucet.
 */

import { Keypair } from '@stellar/stellar-sdk';

import { createOrchestrationFacade } from '../../../src/services/orchestration/orchestration.facade';
import { ErrorCode, ErrorKind } from '../../../src/types/errors';
import { FundingStatus } from '../../../src/types/stellar';
import { createTestContext, testSettings } from '../../helpers';

describe('OrchestrationFacade', () => {
  describe('fresh testnet issuance', () => {
    it('should fund both accounts, issue, and show the balance', async () => {
      const { facade, funding } = createTestContext();

      const setup = await facade.setupAccounts();
      expect(setup.status).toBe('success');
      if (setup.status !== 'success') return;

      expect(setup.data.issuerFunding).toBe(FundingStatus.FUNDED);
      expect(setup.data.distributorFunding).toBe(FundingStatus.FUNDED);
      expect(funding.calls).toEqual([setup.data.issuerPublicKey, setup.data.distributorPublicKey]);

      const issuance = await facade.issueAsset('1000');
      expect(issuance.status).toBe('success');
      if (issuance.status !== 'success') return;

      expect(issuance.data.trustlineTxHash).not.toBe(issuance.data.paymentTxHash);
      expect(issuance.data.assetCode).toBe('MYTOKEN');

      const balance = await facade.checkBalance(setup.data.distributorPublicKey);
      expect(balance).toEqual({
        status: 'success',
        data: {
          accountId: setup.data.distributorPublicKey,
          assetType: 'credit',
          assetCode: 'MYTOKEN',
          assetIssuer: setup.data.issuerPublicKey,
          balance: '1000.0000000',
          found: true,
        },
      });
    });
  });

  describe('setupAccounts', () => {
    it('should stop on a distributor funding failure before any issuance', async () => {
      const { facade, funding, ledger } = createTestContext();
      funding.failCall(2);

      const setup = await facade.setupAccounts();

      expect(setup).toEqual({
        status: 'error',
        error: {
          kind: ErrorKind.ACCOUNT_STATE,
          code: ErrorCode.FUNDING_FAILED,
          message: 'Failed to fund distributor: Friendbot request failed with status 400',
        },
      });
      expect(ledger.submissions).toHaveLength(0);

      const issuance = await facade.issueAsset('1000');
      expect(issuance).toMatchObject({
        status: 'error',
        error: { code: ErrorCode.ACCOUNTS_NOT_INITIALIZED },
      });
      expect(ledger.submissions).toHaveLength(0);
    });

    it('should keep a funded issuer and only provision the missing distributor on retry', async () => {
      const { facade, funding } = createTestContext();
      funding.failCall(2);

      await facade.setupAccounts();
      const issuerAfterFailure = facade.accounts().issuer;
      expect(issuerAfterFailure).toBeDefined();
      expect(facade.accounts().distributor).toBeUndefined();

      const retry = await facade.setupAccounts();

      expect(retry).toMatchObject({
        status: 'success',
        data: {
          issuerPublicKey: issuerAfterFailure,
          issuerFunding: FundingStatus.PRE_CONFIGURED,
          distributorFunding: FundingStatus.FUNDED,
        },
      });
      expect(funding.calls).toHaveLength(3);
    });

    it('should not create duplicate accounts when two setups race', async () => {
      const { facade, funding } = createTestContext();

      const [first, second] = await Promise.all([facade.setupAccounts(), facade.setupAccounts()]);

      expect(funding.calls).toHaveLength(2);
      expect(first.status).toBe('success');
      expect(second).toMatchObject({
        status: 'success',
        data: {
          issuerFunding: FundingStatus.PRE_CONFIGURED,
          distributorFunding: FundingStatus.PRE_CONFIGURED,
        },
      });
      if (first.status === 'success' && second.status === 'success') {
        expect(second.data.issuerPublicKey).toBe(first.data.issuerPublicKey);
        expect(second.data.distributorPublicKey).toBe(first.data.distributorPublicKey);
      }
    });

    it('should use configured secrets without calling the faucet', async () => {
      const issuer = Keypair.random();
      const distributor = Keypair.random();
      const { facade, funding } = createTestContext({
        issuerSecret: issuer.secret(),
        distributorSecret: distributor.secret(),
      });

      const setup = await facade.setupAccounts();

      expect(setup).toEqual({
        status: 'success',
        data: {
          issuerPublicKey: issuer.publicKey(),
          distributorPublicKey: distributor.publicKey(),
          issuerFunding: FundingStatus.PRE_CONFIGURED,
          distributorFunding: FundingStatus.PRE_CONFIGURED,
        },
      });
      expect(funding.calls).toEqual([]);
      expect(JSON.stringify(setup)).not.toContain(issuer.secret());
      expect(JSON.stringify(setup)).not.toContain(distributor.secret());
    });

    it('should require manual funding on the public network', async () => {
      const { facade, funding } = createTestContext({ network: 'PUBLIC' });

      const setup = await facade.setupAccounts();

      expect(setup).toMatchObject({
        status: 'success',
        data: {
          issuerFunding: FundingStatus.MANUAL_FUNDING_REQUIRED,
          distributorFunding: FundingStatus.MANUAL_FUNDING_REQUIRED,
        },
      });
      expect(funding.calls).toEqual([]);
    });
  });

  describe('issueAsset', () => {
    it('should refuse to issue before setup', async () => {
      const { facade } = createTestContext();

      expect(await facade.issueAsset('1000')).toEqual({
        status: 'error',
        error: {
          kind: ErrorKind.VALIDATION,
          code: ErrorCode.ACCOUNTS_NOT_INITIALIZED,
          message: 'Accounts not initialized. Call /setup-accounts first.',
        },
      });
    });

    it('should carry the stage and trustline hash of a payment failure', async () => {
      const { facade, ledger } = createTestContext();
      await facade.setupAccounts();
      ledger.rejectSubmission(2, ['tx_failed', 'op_line_full']);

      const issuance = await facade.issueAsset('1000');

      expect(issuance).toMatchObject({
        status: 'error',
        error: {
          kind: ErrorKind.SUBMISSION,
          code: ErrorCode.PAYMENT_SUBMISSION_FAILED,
          stage: 'PAYMENT',
          trustlineTxHash: expect.stringMatching(/^[0-9a-f]{64}$/),
          resultCodes: ['tx_failed', 'op_line_full'],
        },
      });
    });
  });

  describe('ensureAccountsThenIssue', () => {
    it('should set up and issue in one call', async () => {
      const { facade, ledger } = createTestContext();

      const result = await facade.ensureAccountsThenIssue('42');

      expect(result.status).toBe('success');
      expect(ledger.submissions).toHaveLength(2);
      if (result.status === 'success') {
        expect(result.data.setup.issuerFunding).toBe(FundingStatus.FUNDED);
        expect(result.data.issuance.amount).toBe('42');
      }
    });

    it('should return the setup failure without issuing', async () => {
      const { facade, funding, ledger } = createTestContext();
      funding.failCall(1, 'Friendbot request timed out after 30000ms');

      const result = await facade.ensureAccountsThenIssue('42');

      expect(result).toEqual({
        status: 'error',
        error: {
          kind: ErrorKind.ACCOUNT_STATE,
          code: ErrorCode.FUNDING_FAILED,
          message: 'Failed to fund issuer: Friendbot request timed out after 30000ms',
        },
      });
      expect(ledger.submissions).toHaveLength(0);
    });
  });

  describe('balances', () => {
    it('should need a known issuer for the custom asset balance', async () => {
      const { facade } = createTestContext();

      expect(await facade.checkBalance(Keypair.random().publicKey())).toMatchObject({
        status: 'error',
        error: { kind: ErrorKind.VALIDATION, code: ErrorCode.ACCOUNTS_NOT_INITIALIZED },
      });
    });

    it('should reject a malformed account id', async () => {
      const { facade } = createTestContext();

      expect(await facade.checkNativeBalance('not-an-account')).toEqual({
        status: 'error',
        error: {
          kind: ErrorKind.VALIDATION,
          code: ErrorCode.INVALID_ACCOUNT_ID,
          message: 'Invalid account id "not-an-account"',
        },
      });
    });

    it('should read the native balance of a funded account', async () => {
      const { facade, ledger } = createTestContext();
      const account = Keypair.random().publicKey();
      ledger.createAccount(account, '75.5');

      expect(await facade.checkNativeBalance(account)).toMatchObject({
        status: 'success',
        data: { assetCode: 'XLM', balance: '75.5000000', found: true },
      });
    });
  });

  describe('probeLedger', () => {
    it('should report the base fee when the ledger answers', async () => {
      const { facade } = createTestContext();

      await expect(facade.probeLedger()).resolves.toEqual({ reachable: true, baseFee: 100 });
    });

    it('should report an unreachable ledger', async () => {
      const { facade, ledger } = createTestContext();
      ledger.timeoutNext('fetchBaseFee');

      await expect(facade.probeLedger()).resolves.toEqual({
        reachable: false,
        error: 'fetch_base_fee timed out after 1000ms',
      });
    });
  });

  describe('createOrchestrationFacade', () => {
    it('should reject an unsupported network', () => {
      expect(() => createOrchestrationFacade(testSettings({ network: 'MAINNET' }))).toThrow(
        'Unsupported STELLAR_NETWORK "MAINNET" (expected TESTNET or PUBLIC)'
      );
    });

    it('should reject a malformed configured secret', () => {
      expect(() => createOrchestrationFacade(testSettings({ issuerSecret: 'test-secret' }))).toThrow(
        'The configured ISSUER secret key is not a valid secret seed'
      );
    });

    it('should reject an invalid asset code', () => {
      expect(() => createOrchestrationFacade(testSettings({ assetCode: 'NOT VALID' }))).toThrow(
        'Invalid ASSET_CODE "NOT VALID" (expected 1-12 alphanumeric characters)'
      );
    });
  });
});
