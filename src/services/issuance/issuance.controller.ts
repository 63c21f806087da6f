import { Request, Response, NextFunction } from 'express';

import { ApiError } from '../../middlewares';
import { addLogContext } from '../../observability';
import { OrchestrationFacade } from '../orchestration/orchestration.facade';
import { readAmount } from './issuance.validation';

export class IssuanceController {
  constructor(private readonly facade: OrchestrationFacade) {}

  /**
   * Issue the configured asset to the distributor
   * POST /issue-asset
   */
  async issueAsset(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      addLogContext({ assetCode: this.facade.assetCode });
      const result = await this.facade.issueAsset(readAmount(req.body));

      if (result.status === 'error') {
        throw ApiError.fromFailure(result.error);
      }

      res.status(200).json({
        status: 'success',
        data: {
          message: result.data.message,
          trustline_tx: result.data.trustlineTxHash,
          payment_tx: result.data.paymentTxHash,
        },
      });
    } catch (error) {
      next(error);
    }
  }
}
