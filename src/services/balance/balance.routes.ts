import { Router, Request, Response, NextFunction } from 'express';

import { validateRequest } from '../../middlewares';
import { OrchestrationFacade } from '../orchestration/orchestration.facade';
import { BalanceController } from './balance.controller';
import { accountIdValidation } from './balance.validation';

export interface BalanceRouters {
  asset: Router;
  native: Router;
}

export const createBalanceRouters = (facade: OrchestrationFacade): BalanceRouters => {
  const controller = new BalanceController(facade);
  const asset = Router();
  const native = Router();

  // GET /check-balance/:accountId - Custom asset balance
  asset.get('/:accountId', accountIdValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.checkBalance(req, res, next));

  // GET /check-xlm-balance/:accountId - Native balance
  native.get('/:accountId', accountIdValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.checkNativeBalance(req, res, next));

  return { asset, native };
};
