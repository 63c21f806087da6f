import { ErrorCode, ErrorKind } from './errors';

/**
 * Failure half of every orchestration result.
 * `stage` and `trustlineTxHash` are only set by issuance.
 */
export interface OperationFailure {
  kind: ErrorKind;
  code: ErrorCode;
  message: string;
  stage?: string;
  trustlineTxHash?: string;
  resultCodes?: string[];
}

/**
 * Tagged result returned by the orchestration facade.
 * Callers switch on `status` instead of probing for keys.
 */
export type OperationResult<T> =
  | { status: 'success'; data: T }
  | { status: 'error'; error: OperationFailure };

export const succeed = <T>(data: T): OperationResult<T> => ({ status: 'success', data });

export const fail = <T>(error: OperationFailure): OperationResult<T> => ({
  status: 'error',
  error,
});
