import { Registry, Counter, Histogram, collectDefaultMetrics } from 'prom-client';
import { config } from '../config';

/**
 * Prometheus metrics registry
 */
export const registry = new Registry();
registry.setDefaultLabels({ service: 'asset-issuance' });

// Collect default Node.js metrics (CPU, memory, event loop, etc.)
if (!config.isTest) {
  collectDefaultMetrics({ register: registry });
}

// ============================================
// HTTP Metrics
// ============================================

/**
 * Total HTTP requests counter
 */
export const httpRequestsTotal = new Counter({
  name: 'http_requests_total',
  help: 'Total HTTP requests',
  labelNames: ['method', 'path', 'status'] as const,
  registers: [registry],
});

/**
 * HTTP request duration histogram
 */
export const httpRequestDuration = new Histogram({
  name: 'http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'path', 'status'] as const,
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
  registers: [registry],
});

// ============================================
// Ledger Metrics
// ============================================

/**
 * Ledger calls by operation (load_account, fetch_base_fee, submit) and outcome
 */
export const ledgerRequestsTotal = new Counter({
  name: 'ledger_requests_total',
  help: 'Ledger API calls by operation and outcome',
  labelNames: ['operation', 'outcome'] as const, // success, rejected, not_found, timeout, error
  registers: [registry],
});

/**
 * Ledger call duration
 */
export const ledgerRequestDuration = new Histogram({
  name: 'ledger_request_duration_seconds',
  help: 'Ledger API call duration in seconds',
  labelNames: ['operation'] as const,
  buckets: [0.1, 0.25, 0.5, 1, 2, 5, 10, 30],
  registers: [registry],
});

// ============================================
// Account Provisioning Metrics
// ============================================

/**
 * Faucet funding attempts
 */
export const fundingRequestsTotal = new Counter({
  name: 'funding_requests_total',
  help: 'Test network funding requests by outcome',
  labelNames: ['outcome'] as const, // funded, failed
  registers: [registry],
});

/**
 * Role provisioning by funding status
 */
export const accountsProvisionedTotal = new Counter({
  name: 'accounts_provisioned_total',
  help: 'Accounts provisioned by role and funding status',
  labelNames: ['role', 'funding'] as const,
  registers: [registry],
});

// ============================================
// Issuance Metrics
// ============================================

/**
 * Issuance workflow runs by outcome and failure stage
 */
export const issuancesTotal = new Counter({
  name: 'issuances_total',
  help: 'Asset issuance runs by outcome and stage',
  labelNames: ['outcome', 'stage'] as const, // success|failed, NONE|VALIDATION|TRUSTLINE|PAYMENT
  registers: [registry],
});

/**
 * Issuance workflow duration
 */
export const issuanceDuration = new Histogram({
  name: 'issuance_duration_seconds',
  help: 'Asset issuance workflow duration in seconds',
  labelNames: ['outcome'] as const,
  buckets: [0.5, 1, 2, 5, 10, 30, 60],
  registers: [registry],
});

// ============================================
// Balance Metrics
// ============================================

/**
 * Balance lookups by asset type and outcome
 */
export const balanceLookupsTotal = new Counter({
  name: 'balance_lookups_total',
  help: 'Balance lookups by asset type and outcome',
  labelNames: ['asset_type', 'outcome'] as const, // native|credit, found|zero|error
  registers: [registry],
});

// ============================================
// Utility Functions
// ============================================

/**
 * Reset all metrics (useful for testing)
 */
export const resetMetrics = (): void => {
  registry.resetMetrics();
};

/**
 * Get all metrics as Prometheus text format
 */
export const getMetrics = async (): Promise<string> => {
  return registry.metrics();
};

/**
 * Get content type for metrics response
 */
export const getMetricsContentType = (): string => {
  return registry.contentType;
};
