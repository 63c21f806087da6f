/**
 * Key Provisioner
 *
 * Produces the keypair for one role, either from a supplied secret or by
 * generating a new one, and funds generated accounts on the test network.
 *
 * Not idempotent: every call without a secret creates a new keypair, and on
 * TESTNET a new funded ledger account. Funding is never retried here.
 */

import { Keypair, StrKey } from '@stellar/stellar-sdk';

import { ApiError } from '../../middlewares/errorHandler';
import { accountsProvisionedTotal, createServiceLogger } from '../../observability';
import {
  FundingOutcome,
  FundingStatus,
  NetworkSettings,
  Role,
  StellarKeypair,
} from '../../types/stellar';
import { FundingClient } from './friendbot.client';

const log = createServiceLogger('key-provisioner');

export interface ProvisionedRole {
  role: Role;
  keypair: StellarKeypair;
  funding: FundingOutcome;
}

/**
 * Rebuild a keypair from a secret seed
 * Throws a CONFIGURATION error for a malformed seed
 */
export function keypairFromSecret(secret: string, role: Role): StellarKeypair {
  if (!StrKey.isValidEd25519SecretSeed(secret)) {
    throw ApiError.configuration(`The configured ${role} secret key is not a valid secret seed`);
  }
  const keypair = Keypair.fromSecret(secret);
  return { publicKey: keypair.publicKey(), secretKey: keypair.secret() };
}

export class KeyProvisioner {
  constructor(private readonly funding: FundingClient) {}

  async provisionRole(
    role: Role,
    existingSecret: string | undefined,
    network: Pick<NetworkSettings, 'isTestnet'>
  ): Promise<ProvisionedRole> {
    if (existingSecret) {
      const keypair = keypairFromSecret(existingSecret, role);
      log.info({ role, publicKey: keypair.publicKey }, 'Using pre-configured account');
      return this.record({ role, keypair, funding: { status: FundingStatus.PRE_CONFIGURED } });
    }

    const generated = Keypair.random();
    const keypair: StellarKeypair = {
      publicKey: generated.publicKey(),
      secretKey: generated.secret(),
    };
    log.info({ role, publicKey: keypair.publicKey }, 'Generated new account keypair');

    if (!network.isTestnet) {
      // Public network accounts only exist after an out-of-band XLM payment
      return this.record({
        role,
        keypair,
        funding: { status: FundingStatus.MANUAL_FUNDING_REQUIRED },
      });
    }

    const result = await this.funding.fund(keypair.publicKey);
    const funding: FundingOutcome = result.funded
      ? { status: FundingStatus.FUNDED }
      : { status: FundingStatus.FUNDING_FAILED, reason: result.reason };

    return this.record({ role, keypair, funding });
  }

  private record(provisioned: ProvisionedRole): ProvisionedRole {
    accountsProvisionedTotal.inc({ role: provisioned.role, funding: provisioned.funding.status });
    return provisioned;
  }
}
