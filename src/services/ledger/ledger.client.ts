import {
  AccountSnapshot,
  AssetDescriptor,
  StellarKeypair,
  TransactionOutcome,
} from '../../types/stellar';

export type LedgerOperation =
  | { type: 'changeTrust'; asset: AssetDescriptor; limit?: string }
  | { type: 'payment'; destination: string; asset: AssetDescriptor; amount: string };

export interface SubmissionRequest {
  /** Freshly loaded snapshot of the source account */
  source: AccountSnapshot;
  operations: LedgerOperation[];
  signers: StellarKeypair[];
  /** Base fee per operation, in stroops */
  fee: number;
}

/**
 * What the orchestration layer needs from the ledger.
 *
 * Every call is bounded in time and throws LedgerTimeoutError when the bound
 * is hit. A rejected transaction is not an exception: it comes back as an
 * unsuccessful TransactionOutcome carrying the ledger's result codes.
 */
export interface LedgerClient {
  readonly networkPassphrase: string;

  /** Throws LedgerNotFoundError when the account does not exist */
  loadAccount(publicKey: string): Promise<AccountSnapshot>;

  fetchBaseFee(): Promise<number>;

  /** Build, sign and submit one transaction */
  submitTransaction(request: SubmissionRequest): Promise<TransactionOutcome>;
}
