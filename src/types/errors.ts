/**
 * Error Codes for the Asset Issuance API
 *
 * Categorized by error type:
 * - 2xxx: Validation errors
 * - 3xxx: Ledger and account state errors
 * - 4xxx: Rate limiting errors
 * - 5xxx: System errors
 */

export enum ErrorCode {
  // Validation errors (2xxx)
  VALIDATION_ERROR = 2001,
  INVALID_AMOUNT = 2002,
  INVALID_INPUT = 2003,
  MISSING_REQUIRED_FIELD = 2004,
  INVALID_ACCOUNT_ID = 2005,

  // Ledger / account state errors (3xxx)
  ACCOUNTS_NOT_INITIALIZED = 3001,
  ACCOUNT_NOT_FOUND = 3002,
  FUNDING_FAILED = 3003,
  TRUSTLINE_SUBMISSION_FAILED = 3004,
  PAYMENT_SUBMISSION_FAILED = 3005,
  BALANCE_LOOKUP_FAILED = 3006,
  RESOURCE_NOT_FOUND = 3007,

  // Rate limiting errors (4xxx)
  RATE_LIMIT_EXCEEDED = 4001,
  TOO_MANY_SETUP_REQUESTS = 4002,
  TOO_MANY_ISSUANCES = 4003,

  // System errors (5xxx)
  INTERNAL_ERROR = 5001,
  CONFIGURATION_ERROR = 5002,
  LEDGER_TIMEOUT = 5003,
}

/**
 * Error taxonomy shared by every orchestration result
 *
 * A kind says what went wrong at the domain level; the ErrorCode refines it
 * (e.g. SUBMISSION splits into trustline and payment codes).
 */
export enum ErrorKind {
  VALIDATION = 'VALIDATION',
  ACCOUNT_STATE = 'ACCOUNT_STATE',
  SUBMISSION = 'SUBMISSION',
  LOOKUP = 'LOOKUP',
  CONFIGURATION = 'CONFIGURATION',
  TIMEOUT = 'TIMEOUT',
}

/**
 * Error code to HTTP status code mapping
 */
export const errorCodeToStatus: Record<ErrorCode, number> = {
  // Validation errors -> 400
  [ErrorCode.VALIDATION_ERROR]: 400,
  [ErrorCode.INVALID_AMOUNT]: 400,
  [ErrorCode.INVALID_INPUT]: 400,
  [ErrorCode.MISSING_REQUIRED_FIELD]: 400,
  [ErrorCode.INVALID_ACCOUNT_ID]: 400,

  // Ledger / account state errors -> 400/404/500
  [ErrorCode.ACCOUNTS_NOT_INITIALIZED]: 400,
  [ErrorCode.ACCOUNT_NOT_FOUND]: 500,
  [ErrorCode.FUNDING_FAILED]: 500,
  [ErrorCode.TRUSTLINE_SUBMISSION_FAILED]: 500,
  [ErrorCode.PAYMENT_SUBMISSION_FAILED]: 500,
  [ErrorCode.BALANCE_LOOKUP_FAILED]: 500,
  [ErrorCode.RESOURCE_NOT_FOUND]: 404,

  // Rate limiting errors -> 429
  [ErrorCode.RATE_LIMIT_EXCEEDED]: 429,
  [ErrorCode.TOO_MANY_SETUP_REQUESTS]: 429,
  [ErrorCode.TOO_MANY_ISSUANCES]: 429,

  // System errors -> 500/504
  [ErrorCode.INTERNAL_ERROR]: 500,
  [ErrorCode.CONFIGURATION_ERROR]: 500,
  [ErrorCode.LEDGER_TIMEOUT]: 504,
};

/**
 * Standard error response format
 */
export interface ErrorResponse {
  status: 'error';
  error: {
    code: ErrorCode;
    message: string;
    kind?: ErrorKind;
    stage?: string;
    details?: Record<string, string[]>;
    trustline_tx?: string;
    result_codes?: string[];
    timestamp: string;
    correlationId?: string;
  };
}

/**
 * Standard success response format
 */
export interface SuccessResponse<T = unknown> {
  status: 'success';
  data: T;
}

/**
 * API Response type
 */
export type ApiResponse<T = unknown> = SuccessResponse<T> | ErrorResponse;
