import { Request, Response, NextFunction } from 'express';

import { ApiError } from '../../middlewares';
import { addLogContext } from '../../observability';
import { OperationResult } from '../../types/results';
import { OrchestrationFacade } from '../orchestration/orchestration.facade';
import { BalanceResult } from './balance.inspector';

const toResponseBody = (result: BalanceResult) => ({
  account_id: result.accountId,
  asset_code: result.assetCode,
  balance: result.balance,
  ...(result.assetIssuer !== undefined && { issuer: result.assetIssuer }),
  ...(result.message !== undefined && { message: result.message }),
});

export class BalanceController {
  constructor(private readonly facade: OrchestrationFacade) {}

  /**
   * Balance of the configured asset
   * GET /check-balance/:accountId
   */
  async checkBalance(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      addLogContext({ accountId: req.params.accountId, assetCode: this.facade.assetCode });
      this.send(res, await this.facade.checkBalance(req.params.accountId));
    } catch (error) {
      next(error);
    }
  }

  /**
   * Native (XLM) balance
   * GET /check-xlm-balance/:accountId
   */
  async checkNativeBalance(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      addLogContext({ accountId: req.params.accountId });
      this.send(res, await this.facade.checkNativeBalance(req.params.accountId));
    } catch (error) {
      next(error);
    }
  }

  private send(res: Response, result: OperationResult<BalanceResult>): void {
    if (result.status === 'error') {
      throw ApiError.fromFailure(result.error);
    }
    res.status(200).json({ status: 'success', data: toResponseBody(result.data) });
  }
}
