/**
 * Key Services Module
 *
 * Keypair generation, test network funding and the in-memory key store.
 */

export { KeyProvisioner, keypairFromSecret } from './key.provisioner';
export type { ProvisionedRole } from './key.provisioner';
export { KeyStore } from './key.store';
export type { StoredPublicKeys } from './key.store';
export { FriendbotClient } from './friendbot.client';
export type { FundingClient, FundingResult } from './friendbot.client';
