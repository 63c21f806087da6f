/**
 * Issuance Validation
 *
 * Request validation for POST /issue-asset and POST /bootstrap, plus the
 * precondition check the workflow runs before touching the ledger.
 */

import { body } from 'express-validator';
import { Keypair, StrKey } from '@stellar/stellar-sdk';

import { ErrorCode } from '../../types/errors';
import { AssetDescriptor, StellarKeypair } from '../../types/stellar';
import { parseAmount, isValidAssetCode } from '../ledger';

/**
 * Validation rules for the issuance body
 * Accepts the amount as a JSON string or number
 */
export const issueAssetValidation = [
  body('amount')
    .exists({ values: 'null' })
    .withMessage('Missing \'amount\' in request body')
    .bail()
    .custom((value: unknown) => {
      if (typeof value !== 'string' && typeof value !== 'number') {
        throw new Error('Amount must be a decimal string');
      }
      // 0.0000001 and 1e21 print in exponent form
      if (typeof value === 'number' && /e/i.test(String(value))) {
        throw new Error('Amount this small or large must be sent as a decimal string, e.g. "0.0000001"');
      }
      const parsed = parseAmount(String(value));
      if (!parsed.valid) {
        throw new Error(parsed.reason);
      }
      return true;
    }),
];

/**
 * Amount from a request body that passed issueAssetValidation
 */
export const readAmount = (requestBody: unknown): string => {
  if (typeof requestBody === 'object' && requestBody !== null && 'amount' in requestBody) {
    const { amount } = requestBody;
    if (typeof amount === 'string' || typeof amount === 'number') {
      return String(amount);
    }
  }
  return '';
};

export type IssuanceInputCheck =
  | { valid: true; normalizedAmount: string }
  | { valid: false; code: ErrorCode; reason: string };

const secretMatches = (keypair: StellarKeypair): boolean =>
  StrKey.isValidEd25519SecretSeed(keypair.secretKey) &&
  Keypair.fromSecret(keypair.secretKey).publicKey() === keypair.publicKey;

/**
 * Workflow preconditions. No network access.
 */
export function checkIssuanceInput(
  asset: AssetDescriptor,
  distributor: StellarKeypair,
  issuer: StellarKeypair,
  amount: string
): IssuanceInputCheck {
  const keyFields = [
    distributor.publicKey,
    distributor.secretKey,
    issuer.publicKey,
    issuer.secretKey,
  ];
  if (keyFields.some((field) => !field)) {
    return {
      valid: false,
      code: ErrorCode.MISSING_REQUIRED_FIELD,
      reason: 'missing/invalid account or amount: account keys are not set',
    };
  }

  if (
    !StrKey.isValidEd25519PublicKey(distributor.publicKey) ||
    !StrKey.isValidEd25519PublicKey(issuer.publicKey)
  ) {
    return {
      valid: false,
      code: ErrorCode.INVALID_ACCOUNT_ID,
      reason: 'missing/invalid account or amount: malformed account public key',
    };
  }

  if (!secretMatches(distributor) || !secretMatches(issuer)) {
    return {
      valid: false,
      code: ErrorCode.INVALID_INPUT,
      reason: 'missing/invalid account or amount: secret key does not belong to its account',
    };
  }

  if (issuer.publicKey === distributor.publicKey) {
    return {
      valid: false,
      code: ErrorCode.INVALID_INPUT,
      reason: 'issuer and distributor must be different accounts',
    };
  }

  if (!isValidAssetCode(asset.code)) {
    return {
      valid: false,
      code: ErrorCode.INVALID_INPUT,
      reason: `invalid asset code "${asset.code}"`,
    };
  }

  if (asset.issuerPublicKey !== issuer.publicKey) {
    return {
      valid: false,
      code: ErrorCode.INVALID_INPUT,
      reason: 'asset issuer does not match the issuing account',
    };
  }

  if (!amount) {
    return {
      valid: false,
      code: ErrorCode.MISSING_REQUIRED_FIELD,
      reason: 'missing/invalid account or amount: amount is required',
    };
  }

  const parsed = parseAmount(amount);
  if (!parsed.valid) {
    return {
      valid: false,
      code: ErrorCode.INVALID_AMOUNT,
      reason: `missing/invalid account or amount: ${parsed.reason}`,
    };
  }

  return { valid: true, normalizedAmount: parsed.normalized };
}
