/**
 * Balance Inspector
 *
 * Reads one asset's balance from an account snapshot. A missing trustline is
 * a zero balance, not an error; a missing account is.
 */

import { balanceLookupsTotal, createServiceLogger } from '../../observability';
import { ErrorCode, ErrorKind } from '../../types/errors';
import { OperationResult, fail, succeed } from '../../types/results';
import { AccountSnapshot, BalanceAsset, NATIVE_ASSET_CODE } from '../../types/stellar';
import { LedgerClient, ZERO_BALANCE, LedgerNotFoundError, LedgerTimeoutError } from '../ledger';

const log = createServiceLogger('balance-inspector');

export interface BalanceResult {
  accountId: string;
  assetType: 'native' | 'credit';
  assetCode: string;
  assetIssuer?: string;
  balance: string;
  found: boolean;
  message?: string;
}

/**
 * First matching balance line in ledger order wins
 */
export function balanceOf(snapshot: AccountSnapshot, asset: BalanceAsset): BalanceResult {
  if (asset.type === 'native') {
    const line = snapshot.balances.find((entry) => entry.assetType === 'native');
    if (line) {
      return {
        accountId: snapshot.publicKey,
        assetType: 'native',
        assetCode: NATIVE_ASSET_CODE,
        balance: line.amount,
        found: true,
      };
    }
    return {
      accountId: snapshot.publicKey,
      assetType: 'native',
      assetCode: NATIVE_ASSET_CODE,
      balance: ZERO_BALANCE,
      found: false,
      message: `Asset ${NATIVE_ASSET_CODE} not found or balance is zero for account ${snapshot.publicKey}.`,
    };
  }

  const line = snapshot.balances.find(
    (entry) =>
      entry.assetType === 'credit' &&
      entry.assetCode === asset.code &&
      entry.assetIssuer === asset.issuerPublicKey
  );

  if (line) {
    return {
      accountId: snapshot.publicKey,
      assetType: 'credit',
      assetCode: asset.code,
      assetIssuer: asset.issuerPublicKey,
      balance: line.amount,
      found: true,
    };
  }

  return {
    accountId: snapshot.publicKey,
    assetType: 'credit',
    assetCode: asset.code,
    assetIssuer: asset.issuerPublicKey,
    balance: ZERO_BALANCE,
    found: false,
    message: `Asset ${asset.code} not found or balance is zero for account ${snapshot.publicKey}.`,
  };
}

export class BalanceInspector {
  constructor(private readonly ledger: LedgerClient) {}

  async lookup(publicKey: string, asset: BalanceAsset): Promise<OperationResult<BalanceResult>> {
    try {
      const snapshot = await this.ledger.loadAccount(publicKey);
      const result = balanceOf(snapshot, asset);
      balanceLookupsTotal.inc({ asset_type: asset.type, outcome: result.found ? 'found' : 'zero' });
      return succeed(result);
    } catch (error) {
      balanceLookupsTotal.inc({ asset_type: asset.type, outcome: 'error' });

      if (error instanceof LedgerTimeoutError) {
        log.warn({ accountId: publicKey, error: error.message }, 'Balance lookup timed out');
        return fail({ kind: ErrorKind.TIMEOUT, code: ErrorCode.LEDGER_TIMEOUT, message: error.message });
      }

      const message = `Error checking balance: ${error instanceof Error ? error.message : 'Unknown error'}`;
      log.warn(
        { accountId: publicKey, missing: error instanceof LedgerNotFoundError, error: message },
        'Balance lookup failed'
      );
      return fail({ kind: ErrorKind.LOOKUP, code: ErrorCode.BALANCE_LOOKUP_FAILED, message });
    }
  }
}
