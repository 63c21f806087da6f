/**
 * Ledger adapter errors
 *
 * Thrown by LedgerClient implementations and converted into tagged
 * results by the workflow, the provisioner and the balance inspector.
 */

export { TimeoutError as LedgerTimeoutError } from '../../utils/timeout';

export class LedgerNotFoundError extends Error {
  constructor(public readonly accountId: string) {
    super(`Account ${accountId} does not exist on the ledger`);
    this.name = 'LedgerNotFoundError';
  }
}

/**
 * Transport failure talking to the ledger (connection refused, 5xx, ...)
 */
export class LedgerUnavailableError extends Error {
  constructor(
    public readonly operation: string,
    message: string
  ) {
    super(`Ledger ${operation} failed: ${message}`);
    this.name = 'LedgerUnavailableError';
  }
}
