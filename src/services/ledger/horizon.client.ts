/**
 * Horizon Ledger Client
 *
 * LedgerClient backed by a Stellar Horizon server. Transaction encoding and
 * signing are delegated to @stellar/stellar-sdk.
 */

import {
  Account,
  Asset,
  BadResponseError,
  Horizon,
  Keypair,
  NotFoundError,
  Operation,
  TransactionBuilder,
  xdr,
} from '@stellar/stellar-sdk';
import axios from 'axios';

import { createServiceLogger, ledgerRequestDuration, ledgerRequestsTotal } from '../../observability';
import { AccountSnapshot, AssetDescriptor, BalanceEntry, TransactionOutcome } from '../../types/stellar';
import { LedgerClient, LedgerOperation, SubmissionRequest } from './ledger.client';
import { LedgerNotFoundError, LedgerTimeoutError, LedgerUnavailableError } from './ledger.errors';
import { withTimeout } from '../../utils/timeout';

const log = createServiceLogger('horizon-client');

/**
 * The part of Horizon.Server this client calls
 */
export type HorizonGateway = Pick<Horizon.Server, 'loadAccount' | 'fetchBaseFee' | 'submitTransaction'>;

type HorizonAccount = Awaited<ReturnType<Horizon.Server['loadAccount']>>;
type HorizonBalanceLine = HorizonAccount['balances'][number];

export interface HorizonClientOptions {
  /** Upper bound for every Horizon call */
  timeoutMs: number;
  /** Validity window written into each transaction */
  txTimeoutSeconds: number;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

/**
 * Pull `extras.result_codes` out of a Horizon problem response
 */
export const extractResultCodes = (payload: unknown): string[] => {
  const body = isRecord(payload) && isRecord(payload.data) ? payload.data : payload;
  if (!isRecord(body)) return [];

  const extras = body.extras;
  if (!isRecord(extras)) return [];

  const resultCodes = extras.result_codes;
  if (!isRecord(resultCodes)) return [];

  const codes: string[] = [];
  if (typeof resultCodes.transaction === 'string') {
    codes.push(resultCodes.transaction);
  }
  if (Array.isArray(resultCodes.operations)) {
    resultCodes.operations.forEach((code: unknown) => {
      if (typeof code === 'string') codes.push(code);
    });
  }
  return codes;
};

const toBalanceEntry = (line: HorizonBalanceLine): BalanceEntry | null => {
  if ('liquidity_pool_id' in line) {
    // Pool shares are neither the native asset nor a credit asset
    return null;
  }
  if ('asset_code' in line) {
    return {
      assetType: 'credit',
      assetCode: line.asset_code,
      assetIssuer: line.asset_issuer,
      amount: line.balance,
    };
  }
  return { assetType: 'native', amount: line.balance };
};

export const toAccountSnapshot = (account: HorizonAccount): AccountSnapshot => ({
  publicKey: account.accountId(),
  sequenceNumber: account.sequenceNumber(),
  balances: account.balances
    .map(toBalanceEntry)
    .filter((entry): entry is BalanceEntry => entry !== null),
});

const toStellarAsset = (asset: AssetDescriptor): Asset => new Asset(asset.code, asset.issuerPublicKey);

const toStellarOperation = (operation: LedgerOperation): xdr.Operation => {
  switch (operation.type) {
    case 'changeTrust':
      // No limit means the maximum the ledger allows
      return Operation.changeTrust({
        asset: toStellarAsset(operation.asset),
        ...(operation.limit !== undefined && { limit: operation.limit }),
      });
    case 'payment':
      return Operation.payment({
        destination: operation.destination,
        asset: toStellarAsset(operation.asset),
        amount: operation.amount,
      });
  }
};

export class HorizonLedgerClient implements LedgerClient {
  constructor(
    private readonly server: HorizonGateway,
    readonly networkPassphrase: string,
    private readonly options: HorizonClientOptions
  ) {}

  async loadAccount(publicKey: string): Promise<AccountSnapshot> {
    return this.measure('load_account', async () => {
      try {
        const account = await withTimeout(
          this.server.loadAccount(publicKey),
          this.options.timeoutMs,
          'load_account'
        );
        return toAccountSnapshot(account);
      } catch (error) {
        if (error instanceof NotFoundError) {
          throw new LedgerNotFoundError(publicKey);
        }
        throw this.toTransportError('load_account', error);
      }
    });
  }

  async fetchBaseFee(): Promise<number> {
    return this.measure('fetch_base_fee', async () => {
      try {
        return await withTimeout(this.server.fetchBaseFee(), this.options.timeoutMs, 'fetch_base_fee');
      } catch (error) {
        throw this.toTransportError('fetch_base_fee', error);
      }
    });
  }

  async submitTransaction(request: SubmissionRequest): Promise<TransactionOutcome> {
    const { source, operations, signers, fee } = request;

    // A fresh Account per build: TransactionBuilder bumps its sequence in place
    const builder = new TransactionBuilder(new Account(source.publicKey, source.sequenceNumber), {
      fee: String(fee),
      networkPassphrase: this.networkPassphrase,
    });
    operations.forEach((operation) => builder.addOperation(toStellarOperation(operation)));
    const transaction = builder.setTimeout(this.options.txTimeoutSeconds).build();

    signers.forEach((signer) => transaction.sign(Keypair.fromSecret(signer.secretKey)));

    const localHash = transaction.hash().toString('hex');

    return this.measure('submit_transaction', async () => {
      try {
        const response = await withTimeout(
          this.server.submitTransaction(transaction),
          this.options.timeoutMs,
          'submit_transaction'
        );
        return { success: true, transactionHash: response.hash };
      } catch (error) {
        if (error instanceof BadResponseError) {
          return this.rejection(source.publicKey, localHash, error.getResponse(), error.message);
        }
        // Horizon answers a failed transaction with a 400 problem body; the SDK rethrows the AxiosError as is
        if (axios.isAxiosError(error) && error.response?.status === 400) {
          return this.rejection(source.publicKey, localHash, error.response.data, error.message);
        }
        throw this.toTransportError('submit_transaction', error);
      }
    });
  }

  private rejection(
    sourcePublicKey: string,
    transactionHash: string,
    problem: unknown,
    fallbackMessage: string
  ): TransactionOutcome {
    const resultCodes = extractResultCodes(problem);
    log.warn({ source: sourcePublicKey, transactionHash, resultCodes }, 'Transaction rejected by the ledger');
    return {
      success: false,
      failureReason: `Transaction rejected by the ledger: ${
        resultCodes.length ? resultCodes.join(', ') : fallbackMessage
      }`,
      resultCodes,
      transactionHash,
    };
  }

  /**
   * Record duration and outcome of one Horizon call
   */
  private async measure<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    const end = ledgerRequestDuration.startTimer({ operation });
    try {
      const result = await fn();
      const rejected = isRecord(result) && result.success === false;
      ledgerRequestsTotal.inc({ operation, outcome: rejected ? 'rejected' : 'success' });
      return result;
    } catch (error) {
      const outcome =
        error instanceof LedgerNotFoundError
          ? 'not_found'
          : error instanceof LedgerTimeoutError
            ? 'timeout'
            : 'error';
      ledgerRequestsTotal.inc({ operation, outcome });
      throw error;
    } finally {
      end();
    }
  }

  private toTransportError(operation: string, error: unknown): Error {
    if (error instanceof LedgerTimeoutError || error instanceof LedgerNotFoundError) {
      return error;
    }
    const message = error instanceof Error ? error.message : 'Unknown error';
    log.error({ operation, error: message }, 'Ledger call failed');
    return new LedgerUnavailableError(operation, message);
  }
}

/**
 * Build a client for a Horizon URL
 */
export const createHorizonClient = (
  horizonUrl: string,
  networkPassphrase: string,
  options: HorizonClientOptions
): HorizonLedgerClient =>
  new HorizonLedgerClient(
    new Horizon.Server(horizonUrl, { allowHttp: horizonUrl.startsWith('http://') }),
    networkPassphrase,
    options
  );
