// Logger exports
export { logger, createServiceLogger } from './logger';

// Log context exports
export {
  getCorrelationId,
  getLogContext,
  addLogContext,
  runWithContext,
} from './log-context';
export type { LogContext } from './log-context';

// Correlation middleware
export { correlationMiddleware } from './correlation';

// Metrics exports
export {
  registry,
  httpRequestsTotal,
  httpRequestDuration,
  ledgerRequestsTotal,
  ledgerRequestDuration,
  fundingRequestsTotal,
  accountsProvisionedTotal,
  issuancesTotal,
  issuanceDuration,
  balanceLookupsTotal,
  resetMetrics,
  getMetrics,
  getMetricsContentType,
} from './metrics';

// Metrics middleware
export { metricsMiddleware } from './metrics.middleware';

// Tracing exports
export {
  initTracing,
  shutdownTracing,
  getTracer,
  createIssuanceSpan,
} from './tracing';
