/**
 * Ledger domain types shared by the key, issuance and balance services.
 */

export enum Role {
  ISSUER = 'ISSUER',
  DISTRIBUTOR = 'DISTRIBUTOR',
}

/**
 * A ledger keypair held in process memory.
 * The secret never leaves the process: not in logs, not in responses.
 */
export interface StellarKeypair {
  publicKey: string;
  secretKey: string;
}

/**
 * A custom asset: a code issued by one account
 */
export interface AssetDescriptor {
  type: 'credit';
  code: string;
  issuerPublicKey: string;
}

export interface NativeAssetDescriptor {
  type: 'native';
}

/**
 * Sentinel for the ledger's native currency (XLM)
 */
export const NATIVE_ASSET: NativeAssetDescriptor = { type: 'native' };

export const NATIVE_ASSET_CODE = 'XLM';

export type BalanceAsset = AssetDescriptor | NativeAssetDescriptor;

export interface BalanceEntry {
  assetType: 'native' | 'credit';
  assetCode?: string;
  assetIssuer?: string;
  amount: string;
}

/**
 * Account state as read from the ledger. Never reused across submissions:
 * the sequence number moves on after every accepted transaction.
 */
export interface AccountSnapshot {
  publicKey: string;
  sequenceNumber: string;
  balances: BalanceEntry[];
}

export type TransactionOutcome =
  | { success: true; transactionHash: string }
  | { success: false; failureReason: string; resultCodes: string[]; transactionHash?: string };

export enum FundingStatus {
  FUNDED = 'FUNDED',
  FUNDING_FAILED = 'FUNDING_FAILED',
  PRE_CONFIGURED = 'PRE_CONFIGURED',
  MANUAL_FUNDING_REQUIRED = 'MANUAL_FUNDING_REQUIRED',
}

export type FundingOutcome =
  | { status: FundingStatus.FUNDED }
  | { status: FundingStatus.FUNDING_FAILED; reason: string }
  | { status: FundingStatus.PRE_CONFIGURED }
  | { status: FundingStatus.MANUAL_FUNDING_REQUIRED };

export interface NetworkSettings {
  name: 'TESTNET' | 'PUBLIC';
  passphrase: string;
  isTestnet: boolean;
}
