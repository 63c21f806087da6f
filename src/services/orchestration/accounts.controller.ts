import { Request, Response, NextFunction } from 'express';

import { ApiError } from '../../middlewares';
import { readAmount } from '../issuance/issuance.validation';
import { OrchestrationFacade, SetupSummary } from './orchestration.facade';

const toSetupBody = (setup: SetupSummary) => ({
  issuer_public_key: setup.issuerPublicKey,
  distributor_public_key: setup.distributorPublicKey,
  issuer_funding_status: setup.issuerFunding,
  distributor_funding_status: setup.distributorFunding,
});

export class AccountsController {
  constructor(private readonly facade: OrchestrationFacade) {}

  /**
   * Provision (and on testnet, fund) the issuer and distributor
   * GET /setup-accounts
   */
  async setupAccounts(_req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await this.facade.setupAccounts();

      if (result.status === 'error') {
        throw ApiError.fromFailure(result.error);
      }

      res.status(200).json({
        status: 'success',
        data: {
          message: 'Accounts configured.',
          ...toSetupBody(result.data),
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Setup followed by issuance in one call
   * POST /bootstrap
   */
  async bootstrap(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await this.facade.ensureAccountsThenIssue(readAmount(req.body));

      if (result.status === 'error') {
        throw ApiError.fromFailure(result.error);
      }

      const { setup, issuance } = result.data;
      res.status(200).json({
        status: 'success',
        data: {
          ...toSetupBody(setup),
          message: issuance.message,
          trustline_tx: issuance.trustlineTxHash,
          payment_tx: issuance.paymentTxHash,
        },
      });
    } catch (error) {
      next(error);
    }
  }
}
