import { Router, Request, Response, NextFunction } from 'express';

import { issuanceLimiter, setupLimiter, validateRequest } from '../../middlewares';
import { issueAssetValidation } from '../issuance/issuance.validation';
import { AccountsController } from './accounts.controller';
import { OrchestrationFacade } from './orchestration.facade';

export interface AccountsRouters {
  setup: Router;
  bootstrap: Router;
}

export const createAccountsRouters = (facade: OrchestrationFacade): AccountsRouters => {
  const controller = new AccountsController(facade);
  const setup = Router();
  const bootstrap = Router();

  // GET /setup-accounts - Provision issuer and distributor
  setup.get('/', setupLimiter, (req: Request, res: Response, next: NextFunction) => controller.setupAccounts(req, res, next));

  // POST /bootstrap - Setup, then issue
  bootstrap.post('/', setupLimiter, issuanceLimiter, issueAssetValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.bootstrap(req, res, next));

  return { setup, bootstrap };
};
