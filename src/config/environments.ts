/**
 * Environment Configuration
 *
 * Central place for environment detection and environment-specific values.
 * Use these flags and values throughout the app to avoid hardcoding environments.
 *
 * Usage:
 *   import { isProduction, STELLAR_CONFIG, API_CONFIG } from './environments';
 *
 *   if (isProduction) { ... }
 *   const horizon = STELLAR_CONFIG.horizonUrl;
 */

// =============================================================================
// ENVIRONMENT FLAGS
// =============================================================================

/**
 * Current environment from NODE_ENV
 * Defaults to 'development' if not set
 */
export const NODE_ENV = process.env.NODE_ENV || 'development';

/**
 * Environment detection flags
 * Use these instead of checking NODE_ENV directly
 */
export const isProduction = NODE_ENV === 'production';
export const isDevelopment = NODE_ENV === 'development';
export const isTest = NODE_ENV === 'test';

// =============================================================================
// STELLAR NETWORK CONFIGURATION
// =============================================================================

/**
 * Network selection: TESTNET or PUBLIC
 * Anything else is rejected when the orchestration layer is built
 */
export const STELLAR_NETWORK = (process.env.STELLAR_NETWORK || 'TESTNET').toUpperCase();

const HORIZON_TESTNET_URL = 'https://horizon-testnet.stellar.org';
const HORIZON_PUBLIC_URL = 'https://horizon.stellar.org';

/**
 * Ledger and faucet settings
 *
 * Secret keys are optional. When absent, GET /setup-accounts generates new
 * accounts; they live in process memory only and are gone after a restart.
 */
export const STELLAR_CONFIG = {
  network: STELLAR_NETWORK,
  horizonUrl:
    process.env.STELLAR_HORIZON_URL ||
    (STELLAR_NETWORK === 'PUBLIC' ? HORIZON_PUBLIC_URL : HORIZON_TESTNET_URL),
  friendbotUrl: process.env.STELLAR_FRIENDBOT_URL || 'https://friendbot.stellar.org',
  assetCode: process.env.ASSET_CODE || 'MYTOKEN',
  issuerSecret: process.env.ISSUER_SECRET_KEY || undefined,
  distributorSecret: process.env.DISTRIBUTOR_SECRET_KEY || undefined,
  ledgerTimeoutMs: parseInt(process.env.LEDGER_TIMEOUT_MS || '30000', 10),
  fundingTimeoutMs: parseInt(process.env.FUNDING_TIMEOUT_MS || '30000', 10),
  txTimeoutSeconds: parseInt(process.env.TX_TIMEOUT_SECONDS || '30', 10),
};

export type StellarSettings = typeof STELLAR_CONFIG;

// =============================================================================
// RATE LIMITING CONFIGURATION
// =============================================================================

/**
 * Rate limiting configuration by environment
 *
 * Account setup and issuance both have side effects on the ledger (new
 * funded accounts, submitted transactions), so they get their own, stricter
 * windows on top of the global limiter.
 */
export const RATE_LIMIT_CONFIG = {
  // Global disable flag (use with caution!)
  disabled: process.env.RATE_LIMIT_DISABLED === 'true' || false,

  // Global rate limiter (all routes)
  global: {
    windowMs: parseInt(process.env.RATE_LIMIT_WINDOW_MS || '900000', 10), // 15 minutes
    maxRequests: isProduction
      ? parseInt(process.env.RATE_LIMIT_MAX_REQUESTS || '100', 10)
      : isTest
      ? 10000 // Very lenient for tests
      : parseInt(process.env.RATE_LIMIT_MAX_REQUESTS || '1000', 10),
  },

  // Account setup (faucet calls)
  setup: {
    windowMs: parseInt(process.env.SETUP_RATE_LIMIT_WINDOW_MS || '3600000', 10), // 1 hour
    maxRequests: isProduction
      ? parseInt(process.env.SETUP_RATE_LIMIT_MAX || '5', 10)
      : isTest
      ? 10000
      : parseInt(process.env.SETUP_RATE_LIMIT_MAX || '50', 10),
  },

  // Issuance (two ledger submissions per call)
  issuance: {
    windowMs: parseInt(process.env.ISSUE_RATE_LIMIT_WINDOW_MS || '60000', 10), // 1 minute
    maxRequests: isProduction
      ? parseInt(process.env.ISSUE_RATE_LIMIT_MAX || '10', 10)
      : isTest
      ? 10000
      : parseInt(process.env.ISSUE_RATE_LIMIT_MAX || '100', 10),
  },
};

// =============================================================================
// API CONFIGURATION
// =============================================================================

/**
 * API configuration
 */
export const API_CONFIG = {
  bodyLimit: process.env.API_BODY_LIMIT || '10kb',
  port: parseInt(process.env.PORT || '5001', 10),
  corsOrigins: (process.env.CORS_ORIGINS || '*').split(','),
};

// =============================================================================
// LOGGING CONFIGURATION
// =============================================================================

/**
 * Logging configuration by environment
 */
export const LOG_CONFIG = {
  level: process.env.LOG_LEVEL || (isProduction ? 'info' : isTest ? 'silent' : 'debug'),
  prettyPrint: isDevelopment,
};

// =============================================================================
// OBSERVABILITY / TELEMETRY
// =============================================================================

/**
 * OpenTelemetry configuration
 */
export const OTEL_CONFIG = {
  enabled: isProduction || process.env.OTEL_ENABLED === 'true',
  serviceName: process.env.OTEL_SERVICE_NAME || 'asset-issuance-api',
  exporterEndpoint:
    process.env.OTEL_EXPORTER_OTLP_ENDPOINT || 'http://localhost:4318/v1/traces',
};

// =============================================================================
// SECURITY CONFIGURATION
// =============================================================================

/**
 * Security-related configuration
 */
export const SECURITY_CONFIG = {
  contentSecurityPolicy: isProduction,
  hsts: isProduction,
};

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * Validate required production environment variables
 * Call this during app startup in production
 */
export const validateProductionEnv = (): void => {
  if (!isProduction) return;

  // Production must choose its network explicitly
  const required = ['STELLAR_NETWORK', 'ASSET_CODE'];

  const missing = required.filter((key) => !process.env[key]);

  if (missing.length > 0) {
    throw new Error(
      `Missing required environment variables for production: ${missing.join(', ')}`
    );
  }
};

// =============================================================================
// DEBUG / INFO
// =============================================================================

/**
 * Get current environment info (for logging/debugging)
 */
export const getEnvironmentInfo = () => ({
  nodeEnv: NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,
  network: STELLAR_CONFIG.network,
  horizonUrl: STELLAR_CONFIG.horizonUrl,
  assetCode: STELLAR_CONFIG.assetCode,
  issuerPreconfigured: Boolean(STELLAR_CONFIG.issuerSecret),
  distributorPreconfigured: Boolean(STELLAR_CONFIG.distributorSecret),
});
