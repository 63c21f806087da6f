import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { config } from './config';
import { errorHandler, globalLimiter, notFoundHandler } from './middlewares';
import { createHealthRouter } from './routes/health';
import { createBalanceRouters } from './services/balance';
import { createIssuanceRouter } from './services/issuance';
import {
  OrchestrationFacade,
  createAccountsRouters,
  createOrchestrationFacade,
} from './services/orchestration';
import {
  correlationMiddleware,
  metricsMiddleware,
  getMetrics,
  getMetricsContentType,
  logger,
} from './observability';

export const createApp = (
  facade: OrchestrationFacade = createOrchestrationFacade(config.stellar)
): Application => {
  const app = express();

  // Security middleware
  app.use(
    helmet({
      contentSecurityPolicy: config.security.contentSecurityPolicy,
      hsts: config.security.hsts,
    })
  );
  app.use(
    cors({
      origin: config.api.corsOrigins.includes('*') ? '*' : config.api.corsOrigins,
      exposedHeaders: ['X-Correlation-Id'],
    })
  );

  // Request parsing
  app.use(express.json({ limit: config.api.bodyLimit }));

  // Observability middleware (applied early to capture all requests)
  app.use(correlationMiddleware);
  app.use(metricsMiddleware);

  app.use(globalLimiter);

  // Routes
  const accounts = createAccountsRouters(facade);
  const balances = createBalanceRouters(facade);

  app.use('/health', createHealthRouter(facade));
  app.use('/setup-accounts', accounts.setup);
  app.use('/bootstrap', accounts.bootstrap);
  app.use('/issue-asset', createIssuanceRouter(facade));
  app.use('/check-balance', balances.asset);
  app.use('/check-xlm-balance', balances.native);

  // Metrics endpoint (Prometheus format)
  app.get('/metrics', async (_req, res) => {
    try {
      res.set('Content-Type', getMetricsContentType());
      res.send(await getMetrics());
    } catch (error) {
      logger.error({ error: error instanceof Error ? error.message : error }, 'Error collecting metrics');
      res.status(500).send('Error collecting metrics');
    }
  });

  // Root route
  app.get('/', (_req, res) => {
    res.json({
      name: 'Asset Issuance API',
      version: '1.0.0',
      description: 'Issues a custom asset on the Stellar ledger from an issuer to a distributor',
      network: facade.network.name,
      asset_code: facade.assetCode,
      endpoints: {
        '/setup-accounts': 'GET - Generates and funds (testnet) the issuer and distributor accounts',
        '/issue-asset': "POST - {'amount': '1000'} - Issues the custom asset from issuer to distributor",
        '/bootstrap': "POST - {'amount': '1000'} - Sets up accounts if needed, then issues",
        '/check-balance/:accountId': 'GET - Custom asset balance of an account',
        '/check-xlm-balance/:accountId': 'GET - XLM balance of an account',
        '/health': 'GET - Service and ledger health',
        '/metrics': 'GET - Prometheus metrics',
      },
      notes: 'Run /setup-accounts first unless issuer and distributor secrets are configured.',
    });
  });

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
