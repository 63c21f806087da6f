import { Networks } from '@stellar/stellar-sdk';

import { ApiError } from '../../middlewares/errorHandler';
import { NetworkSettings } from '../../types/stellar';

const ASSET_CODE_PATTERN = /^[a-zA-Z0-9]{1,12}$/;

/**
 * Resolve a configured network name (case-insensitive)
 * Throws a CONFIGURATION error for anything but TESTNET or PUBLIC
 */
export function resolveNetwork(name: string): NetworkSettings {
  switch (name.toUpperCase()) {
    case 'TESTNET':
      return { name: 'TESTNET', passphrase: Networks.TESTNET, isTestnet: true };
    case 'PUBLIC':
      return { name: 'PUBLIC', passphrase: Networks.PUBLIC, isTestnet: false };
    default:
      throw ApiError.configuration(
        `Unsupported STELLAR_NETWORK "${name}" (expected TESTNET or PUBLIC)`
      );
  }
}

/**
 * Asset codes are 1-12 alphanumeric characters
 */
export function isValidAssetCode(code: string): boolean {
  return ASSET_CODE_PATTERN.test(code);
}

export function assertValidAssetCode(code: string): void {
  if (!isValidAssetCode(code)) {
    throw ApiError.configuration(
      `Invalid ASSET_CODE "${code}" (expected 1-12 alphanumeric characters)`
    );
  }
}
