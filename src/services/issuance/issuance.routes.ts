import { Router, Request, Response, NextFunction } from 'express';

import { issuanceLimiter, validateRequest } from '../../middlewares';
import { OrchestrationFacade } from '../orchestration/orchestration.facade';
import { IssuanceController } from './issuance.controller';
import { issueAssetValidation } from './issuance.validation';

export const createIssuanceRouter = (facade: OrchestrationFacade): Router => {
  const router = Router();
  const controller = new IssuanceController(facade);

  // POST /issue-asset - Trustline, then payment from issuer to distributor
  router.post('/', issuanceLimiter, issueAssetValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.issueAsset(req, res, next));

  return router;
};
