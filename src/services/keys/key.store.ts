/**
 * Key Store
 *
 * Holds the issuer and distributor keypairs for the lifetime of the process.
 * One instance is owned by the orchestration facade; nothing here is a
 * module-level global.
 *
 * Writers go through runExclusive(), which runs callers one at a time in
 * arrival order. Two setups racing on an empty store therefore never create
 * two accounts for the same role: the second one runs after the first and
 * finds its keys already stored.
 */

import { Role, StellarKeypair } from '../../types/stellar';

export interface StoredPublicKeys {
  issuer?: string;
  distributor?: string;
}

export class KeyStore {
  private readonly keys = new Map<Role, StellarKeypair>();
  private tail: Promise<void> = Promise.resolve();

  get(role: Role): StellarKeypair | undefined {
    return this.keys.get(role);
  }

  set(role: Role, keypair: StellarKeypair): void {
    this.keys.set(role, keypair);
  }

  has(role: Role): boolean {
    return this.keys.has(role);
  }

  isComplete(): boolean {
    return this.has(Role.ISSUER) && this.has(Role.DISTRIBUTOR);
  }

  publicKeys(): StoredPublicKeys {
    return {
      issuer: this.keys.get(Role.ISSUER)?.publicKey,
      distributor: this.keys.get(Role.DISTRIBUTOR)?.publicKey,
    };
  }

  /**
   * Run `fn` once every earlier exclusive call has settled
   */
  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
