/**
 * Asset Issuance Workflow
 *
 * Issues a custom asset in two ledger transactions:
 *   1. the distributor declares a trustline to the asset (signed by the distributor)
 *   2. the issuer pays the amount to the distributor (signed by the issuer)
 *
 * The two transactions have different source accounts and signers and are
 * submitted one after the other. The payment is only built once the
 * trustline has been accepted; a trustline failure ends the run. A payment
 * failure leaves the trustline on the ledger, and the result says so.
 *
 * Nothing here retries. Every failure is returned to the caller.
 */

import crypto from 'crypto';

import {
  createServiceLogger,
  createIssuanceSpan,
  issuanceDuration,
  issuancesTotal,
} from '../../observability';
import { ErrorCode, ErrorKind } from '../../types/errors';
import { AssetDescriptor, StellarKeypair } from '../../types/stellar';
import { LedgerClient, LedgerOperation, LedgerNotFoundError, LedgerTimeoutError } from '../ledger';
import { checkIssuanceInput } from './issuance.validation';
import { FailureStage, IssuanceState, stageForState, validateTransition } from './issuance.state';

const log = createServiceLogger('issuance-workflow');

export interface IssuanceSuccess {
  success: true;
  runId: string;
  state: IssuanceState.PAYMENT_SUBMITTED;
  trustlineTxHash: string;
  paymentTxHash: string;
  message: string;
  history: IssuanceState[];
}

export interface IssuanceFailure {
  success: false;
  runId: string;
  state: IssuanceState.FAILED;
  stage: FailureStage;
  kind: ErrorKind;
  code: ErrorCode;
  reason: string;
  /** Set when the trustline was accepted before the run failed */
  trustlineTxHash?: string;
  resultCodes: string[];
  history: IssuanceState[];
}

export type IssuanceResult = IssuanceSuccess | IssuanceFailure;

type StepResult =
  | { success: true; transactionHash: string }
  | { success: false; kind: ErrorKind; code: ErrorCode; reason: string; resultCodes: string[] };

interface StepPlan {
  name: 'trustline' | 'payment';
  source: StellarKeypair;
  operation: LedgerOperation;
  rejectionCode: ErrorCode;
  /** Prefix for failure reasons raised by this step */
  errorPrefix: string;
}

/**
 * Tracks one run through the state machine
 */
class IssuanceRun {
  state = IssuanceState.START;
  readonly history: IssuanceState[] = [IssuanceState.START];

  constructor(readonly runId: string) {}

  advance(next: IssuanceState): void {
    validateTransition(this.state, next, this.runId);
    this.state = next;
    this.history.push(next);
  }
}

export class AssetIssuanceWorkflow {
  constructor(private readonly ledger: LedgerClient) {}

  private generateRunId(): string {
    return `iss_${crypto.randomUUID().replace(/-/g, '')}`;
  }

  async issue(
    asset: AssetDescriptor,
    distributor: StellarKeypair,
    issuer: StellarKeypair,
    amount: string
  ): Promise<IssuanceResult> {
    const run = new IssuanceRun(this.generateRunId());
    const endTimer = issuanceDuration.startTimer();

    const result = await this.execute(run, asset, distributor, issuer, amount);

    const outcome = result.success ? 'success' : 'failed';
    endTimer({ outcome });
    issuancesTotal.inc({ outcome, stage: result.success ? 'NONE' : result.stage });

    return result;
  }

  private async execute(
    run: IssuanceRun,
    asset: AssetDescriptor,
    distributor: StellarKeypair,
    issuer: StellarKeypair,
    amount: string
  ): Promise<IssuanceResult> {
    const check = checkIssuanceInput(asset, distributor, issuer, amount);
    if (!check.valid) {
      log.warn({ runId: run.runId, reason: check.reason }, 'Issuance rejected before submission');
      return this.failed(run, {
        success: false,
        kind: ErrorKind.VALIDATION,
        code: check.code,
        reason: check.reason,
        resultCodes: [],
      });
    }

    log.info(
      {
        runId: run.runId,
        assetCode: asset.code,
        issuer: issuer.publicKey,
        distributor: distributor.publicKey,
        amount: check.normalizedAmount,
      },
      'Starting asset issuance'
    );

    // Step 1: trustline from distributor to issuer
    run.advance(IssuanceState.TRUSTLINE_BUILDING);
    const trustline = await this.runStep(run, {
      name: 'trustline',
      source: distributor,
      operation: { type: 'changeTrust', asset },
      rejectionCode: ErrorCode.TRUSTLINE_SUBMISSION_FAILED,
      errorPrefix: 'Error creating trustline',
    });
    if (!trustline.success) {
      return this.failed(run, trustline);
    }
    run.advance(IssuanceState.TRUSTLINE_SUBMITTED);

    // Step 2: payment from issuer to distributor
    run.advance(IssuanceState.PAYMENT_BUILDING);
    const payment = await this.runStep(run, {
      name: 'payment',
      source: issuer,
      operation: {
        type: 'payment',
        destination: distributor.publicKey,
        asset,
        amount: check.normalizedAmount,
      },
      rejectionCode: ErrorCode.PAYMENT_SUBMISSION_FAILED,
      errorPrefix: 'Error issuing asset',
    });
    if (!payment.success) {
      return this.failed(run, payment, trustline.transactionHash);
    }
    run.advance(IssuanceState.PAYMENT_SUBMITTED);

    log.info(
      {
        runId: run.runId,
        trustlineTxHash: trustline.transactionHash,
        paymentTxHash: payment.transactionHash,
      },
      'Asset issued'
    );

    return {
      success: true,
      runId: run.runId,
      state: IssuanceState.PAYMENT_SUBMITTED,
      trustlineTxHash: trustline.transactionHash,
      paymentTxHash: payment.transactionHash,
      message: `Asset ${asset.code} issued and ${amount} sent to ${distributor.publicKey}.`,
      history: [...run.history],
    };
  }

  /**
   * Load a fresh snapshot of the step's source account, fetch the fee,
   * and submit one operation signed by that account alone.
   */
  private async runStep(run: IssuanceRun, plan: StepPlan): Promise<StepResult> {
    return createIssuanceSpan(
      `issuance.${plan.name}`,
      { 'issuance.run_id': run.runId, 'issuance.source': plan.source.publicKey },
      async (span) => {
        try {
          const snapshot = await this.ledger.loadAccount(plan.source.publicKey);
          const fee = await this.ledger.fetchBaseFee();

          log.debug(
            { runId: run.runId, step: plan.name, sequence: snapshot.sequenceNumber, fee },
            'Submitting transaction'
          );

          const outcome = await this.ledger.submitTransaction({
            source: snapshot,
            operations: [plan.operation],
            signers: [plan.source],
            fee,
          });

          if (outcome.success) {
            span.setAttribute('ledger.transaction_hash', outcome.transactionHash);
            return { success: true, transactionHash: outcome.transactionHash };
          }

          span.setAttribute('ledger.result_codes', outcome.resultCodes.join(','));
          return {
            success: false,
            kind: ErrorKind.SUBMISSION,
            code: plan.rejectionCode,
            reason: `${plan.errorPrefix}: ${outcome.failureReason}`,
            resultCodes: outcome.resultCodes,
          };
        } catch (error) {
          return this.stepError(plan, error);
        }
      }
    );
  }

  private stepError(plan: StepPlan, error: unknown): StepResult {
    if (error instanceof LedgerNotFoundError) {
      return {
        success: false,
        kind: ErrorKind.ACCOUNT_STATE,
        code: ErrorCode.ACCOUNT_NOT_FOUND,
        reason: `${plan.errorPrefix}: ${error.message}`,
        resultCodes: [],
      };
    }
    if (error instanceof LedgerTimeoutError) {
      return {
        success: false,
        kind: ErrorKind.TIMEOUT,
        code: ErrorCode.LEDGER_TIMEOUT,
        reason: `${plan.errorPrefix}: ${error.message}`,
        resultCodes: [],
      };
    }
    return {
      success: false,
      kind: ErrorKind.SUBMISSION,
      code: plan.rejectionCode,
      reason: `${plan.errorPrefix}: ${error instanceof Error ? error.message : 'Unknown error'}`,
      resultCodes: [],
    };
  }

  private failed(
    run: IssuanceRun,
    failure: Extract<StepResult, { success: false }>,
    trustlineTxHash?: string
  ): IssuanceFailure {
    const stage = stageForState(run.state);
    run.advance(IssuanceState.FAILED);

    log.warn(
      { runId: run.runId, stage, kind: failure.kind, reason: failure.reason, trustlineTxHash },
      'Asset issuance failed'
    );

    return {
      success: false,
      runId: run.runId,
      state: IssuanceState.FAILED,
      stage,
      kind: failure.kind,
      code: failure.code,
      reason: failure.reason,
      ...(trustlineTxHash !== undefined && { trustlineTxHash }),
      resultCodes: failure.resultCodes,
      history: [...run.history],
    };
  }
}
