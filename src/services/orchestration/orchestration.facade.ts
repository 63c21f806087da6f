/**
 * Orchestration Facade
 *
 * The single entry point the HTTP layer talks to. Owns the key store and
 * wires the provisioner, the issuance workflow and the balance inspector
 * against one ledger client.
 *
 * Every operation returns an OperationResult. Nothing returned from here
 * carries a secret key.
 */

import { StrKey } from '@stellar/stellar-sdk';

import { StellarSettings } from '../../config/environments';
import { createServiceLogger } from '../../observability';
import { ErrorCode, ErrorKind } from '../../types/errors';
import { OperationResult, fail, succeed } from '../../types/results';
import {
  AssetDescriptor,
  FundingStatus,
  NATIVE_ASSET,
  NetworkSettings,
  Role,
} from '../../types/stellar';
import { BalanceInspector, BalanceResult } from '../balance/balance.inspector';
import { AssetIssuanceWorkflow } from '../issuance/issuance.workflow';
import {
  FriendbotClient,
  FundingClient,
  KeyProvisioner,
  keypairFromSecret,
  KeyStore,
} from '../keys';
import { createHorizonClient, LedgerClient, assertValidAssetCode, resolveNetwork } from '../ledger';

const log = createServiceLogger('orchestration');

export interface SetupSummary {
  issuerPublicKey: string;
  distributorPublicKey: string;
  issuerFunding: FundingStatus;
  distributorFunding: FundingStatus;
}

export interface IssuanceSummary {
  runId: string;
  assetCode: string;
  amount: string;
  message: string;
  trustlineTxHash: string;
  paymentTxHash: string;
}

export interface BootstrapSummary {
  setup: SetupSummary;
  issuance: IssuanceSummary;
}

export interface LedgerProbe {
  reachable: boolean;
  baseFee?: number;
  error?: string;
}

export interface OrchestrationDependencies {
  network: NetworkSettings;
  assetCode: string;
  ledger: LedgerClient;
  funding: FundingClient;
  keyStore?: KeyStore;
}

export class OrchestrationFacade {
  readonly network: NetworkSettings;
  readonly assetCode: string;

  private readonly ledger: LedgerClient;
  private readonly keyStore: KeyStore;
  private readonly provisioner: KeyProvisioner;
  private readonly workflow: AssetIssuanceWorkflow;
  private readonly inspector: BalanceInspector;

  constructor(deps: OrchestrationDependencies) {
    assertValidAssetCode(deps.assetCode);
    this.network = deps.network;
    this.assetCode = deps.assetCode;
    this.ledger = deps.ledger;
    this.keyStore = deps.keyStore ?? new KeyStore();
    this.provisioner = new KeyProvisioner(deps.funding);
    this.workflow = new AssetIssuanceWorkflow(deps.ledger);
    this.inspector = new BalanceInspector(deps.ledger);
  }

  /**
   * Provision the issuer, then the distributor.
   *
   * Roles already in the key store are reused as pre-configured. A funding
   * failure stops setup before the next role; roles set up before it stay
   * stored, so running setup again only provisions what is missing.
   */
  async setupAccounts(): Promise<OperationResult<SetupSummary>> {
    return this.keyStore.runExclusive(async () => {
      const funding = new Map<Role, FundingStatus>();

      for (const role of [Role.ISSUER, Role.DISTRIBUTOR]) {
        const provisioned = await this.provisioner.provisionRole(
          role,
          this.keyStore.get(role)?.secretKey,
          this.network
        );

        if (provisioned.funding.status === FundingStatus.FUNDING_FAILED) {
          log.error(
            { role, publicKey: provisioned.keypair.publicKey, reason: provisioned.funding.reason },
            'Account setup stopped: funding failed'
          );
          return fail<SetupSummary>({
            kind: ErrorKind.ACCOUNT_STATE,
            code: ErrorCode.FUNDING_FAILED,
            message: `Failed to fund ${role.toLowerCase()}: ${provisioned.funding.reason}`,
          });
        }

        this.keyStore.set(role, provisioned.keypair);
        funding.set(role, provisioned.funding.status);
      }

      const keys = this.keyStore.publicKeys();
      if (!keys.issuer || !keys.distributor) {
        return fail<SetupSummary>({
          kind: ErrorKind.ACCOUNT_STATE,
          code: ErrorCode.ACCOUNTS_NOT_INITIALIZED,
          message: 'Account setup did not store both accounts',
        });
      }

      log.info(
        { issuer: keys.issuer, distributor: keys.distributor, network: this.network.name },
        'Accounts ready'
      );

      return succeed({
        issuerPublicKey: keys.issuer,
        distributorPublicKey: keys.distributor,
        issuerFunding: funding.get(Role.ISSUER) ?? FundingStatus.PRE_CONFIGURED,
        distributorFunding: funding.get(Role.DISTRIBUTOR) ?? FundingStatus.PRE_CONFIGURED,
      });
    });
  }

  /**
   * Issue `amount` of the configured asset from the issuer to the distributor
   */
  async issueAsset(amount: string): Promise<OperationResult<IssuanceSummary>> {
    const issuer = this.keyStore.get(Role.ISSUER);
    const distributor = this.keyStore.get(Role.DISTRIBUTOR);

    if (!issuer || !distributor) {
      return fail({
        kind: ErrorKind.VALIDATION,
        code: ErrorCode.ACCOUNTS_NOT_INITIALIZED,
        message: 'Accounts not initialized. Call /setup-accounts first.',
      });
    }

    const asset: AssetDescriptor = {
      type: 'credit',
      code: this.assetCode,
      issuerPublicKey: issuer.publicKey,
    };

    const result = await this.workflow.issue(asset, distributor, issuer, amount);

    if (!result.success) {
      return fail({
        kind: result.kind,
        code: result.code,
        message: result.reason,
        stage: result.stage,
        trustlineTxHash: result.trustlineTxHash,
        resultCodes: result.resultCodes,
      });
    }

    return succeed({
      runId: result.runId,
      assetCode: this.assetCode,
      amount,
      message: result.message,
      trustlineTxHash: result.trustlineTxHash,
      paymentTxHash: result.paymentTxHash,
    });
  }

  /**
   * Setup, then issue. A setup failure is returned without issuing.
   */
  async ensureAccountsThenIssue(amount: string): Promise<OperationResult<BootstrapSummary>> {
    const setup = await this.setupAccounts();
    if (setup.status === 'error') {
      return setup;
    }

    const issuance = await this.issueAsset(amount);
    if (issuance.status === 'error') {
      return issuance;
    }

    return succeed({ setup: setup.data, issuance: issuance.data });
  }

  /**
   * Balance of the configured asset held by `accountId`
   */
  async checkBalance(accountId: string): Promise<OperationResult<BalanceResult>> {
    const invalid = this.checkAccountId(accountId);
    if (invalid) {
      return invalid;
    }

    const issuer = this.keyStore.get(Role.ISSUER);
    if (!issuer) {
      return fail({
        kind: ErrorKind.VALIDATION,
        code: ErrorCode.ACCOUNTS_NOT_INITIALIZED,
        message: 'Issuer account not initialized. Call /setup-accounts first.',
      });
    }

    return this.inspector.lookup(accountId, {
      type: 'credit',
      code: this.assetCode,
      issuerPublicKey: issuer.publicKey,
    });
  }

  /**
   * Native (XLM) balance of `accountId`
   */
  async checkNativeBalance(accountId: string): Promise<OperationResult<BalanceResult>> {
    const invalid = this.checkAccountId(accountId);
    if (invalid) {
      return invalid;
    }
    return this.inspector.lookup(accountId, NATIVE_ASSET);
  }

  /**
   * Public keys currently held, for the service info route
   */
  accounts(): { issuer?: string; distributor?: string } {
    return this.keyStore.publicKeys();
  }

  /**
   * Ledger reachability, measured by a base fee fetch
   */
  async probeLedger(): Promise<LedgerProbe> {
    try {
      const baseFee = await this.ledger.fetchBaseFee();
      return { reachable: true, baseFee };
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      log.warn({ error: message }, 'Ledger probe failed');
      return { reachable: false, error: message };
    }
  }

  private checkAccountId(accountId: string): OperationResult<BalanceResult> | undefined {
    if (StrKey.isValidEd25519PublicKey(accountId)) {
      return undefined;
    }
    return fail({
      kind: ErrorKind.VALIDATION,
      code: ErrorCode.INVALID_ACCOUNT_ID,
      message: `Invalid account id "${accountId}"`,
    });
  }
}

export interface FacadeOverrides {
  ledger?: LedgerClient;
  funding?: FundingClient;
}

/**
 * Build the facade from settings. Configured secrets are loaded into the key
 * store up front, so a malformed secret fails here rather than mid-request.
 */
export function createOrchestrationFacade(
  settings: StellarSettings,
  overrides: FacadeOverrides = {}
): OrchestrationFacade {
  const network = resolveNetwork(settings.network);

  const ledger =
    overrides.ledger ??
    createHorizonClient(settings.horizonUrl, network.passphrase, {
      timeoutMs: settings.ledgerTimeoutMs,
      txTimeoutSeconds: settings.txTimeoutSeconds,
    });
  const funding =
    overrides.funding ?? new FriendbotClient(settings.friendbotUrl, settings.fundingTimeoutMs);

  const keyStore = new KeyStore();
  if (settings.issuerSecret) {
    keyStore.set(Role.ISSUER, keypairFromSecret(settings.issuerSecret, Role.ISSUER));
  }
  if (settings.distributorSecret) {
    keyStore.set(Role.DISTRIBUTOR, keypairFromSecret(settings.distributorSecret, Role.DISTRIBUTOR));
  }

  log.info(
    { network: network.name, assetCode: settings.assetCode, horizonUrl: settings.horizonUrl },
    'Orchestration facade created'
  );

  return new OrchestrationFacade({
    network,
    assetCode: settings.assetCode,
    ledger,
    funding,
    keyStore,
  });
}
