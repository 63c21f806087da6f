/**
 * Ledger Module
 *
 * The ledger capability consumed by the issuance workflow and the balance
 * inspector, its Horizon implementation, and amount helpers.
 */

export type { LedgerClient, LedgerOperation, SubmissionRequest } from './ledger.client';
export {
  HorizonLedgerClient,
  createHorizonClient,
  extractResultCodes,
  toAccountSnapshot,
} from './horizon.client';
export type { HorizonGateway, HorizonClientOptions } from './horizon.client';
export { LedgerNotFoundError, LedgerTimeoutError, LedgerUnavailableError } from './ledger.errors';
export {
  AMOUNT_DECIMALS,
  MAX_STROOPS,
  STROOPS_PER_UNIT,
  ZERO_BALANCE,
  formatStroops,
  parseAmount,
} from './ledger.amount';
export type { ParsedAmount } from './ledger.amount';
export { resolveNetwork, isValidAssetCode, assertValidAssetCode } from './network';
