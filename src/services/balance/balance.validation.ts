import { param } from 'express-validator';
import { StrKey } from '@stellar/stellar-sdk';

/**
 * Validation rules for GET /check-balance/:accountId and /check-xlm-balance/:accountId
 */
export const accountIdValidation = [
  param('accountId')
    .trim()
    .notEmpty()
    .withMessage('Account id is required')
    .bail()
    .custom((value: string) => StrKey.isValidEd25519PublicKey(value))
    .withMessage('Account id must be a valid public key (G...)'),
];
