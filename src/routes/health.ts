import { Router, Request, Response } from 'express';

import { asyncHandler } from '../middlewares';
import { OrchestrationFacade } from '../services/orchestration/orchestration.facade';

export const createHealthRouter = (facade: OrchestrationFacade): Router => {
  const router = Router();

  router.get('/', asyncHandler(async (_req: Request, res: Response) => {
    const ledger = await facade.probeLedger();
    const accounts = facade.accounts();

    res.status(ledger.reachable ? 200 : 503).json({
      status: ledger.reachable ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      services: {
        ledger: {
          network: facade.network.name,
          reachable: ledger.reachable,
          ...(ledger.baseFee !== undefined && { baseFee: ledger.baseFee }),
          ...(ledger.error !== undefined && { error: ledger.error }),
        },
        accounts: {
          issuer: accounts.issuer !== undefined,
          distributor: accounts.distributor !== undefined,
        },
      },
    });
  }));

  router.get('/live', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'alive',
      timestamp: new Date().toISOString(),
    });
  });

  // Ready once both accounts are known
  router.get('/ready', (_req: Request, res: Response) => {
    const accounts = facade.accounts();
    const isReady = accounts.issuer !== undefined && accounts.distributor !== undefined;

    res.status(isReady ? 200 : 503).json({
      status: isReady ? 'ready' : 'not ready',
      timestamp: new Date().toISOString(),
    });
  });

  return router;
};
