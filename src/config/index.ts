import dotenv from 'dotenv';

// Load environment variables first
dotenv.config();

// Import environment-specific configurations
import {
  NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,
  STELLAR_CONFIG,
  RATE_LIMIT_CONFIG,
  API_CONFIG,
  LOG_CONFIG,
  OTEL_CONFIG,
  SECURITY_CONFIG,
  validateProductionEnv,
  getEnvironmentInfo,
} from './environments';

// Re-export environment utilities
export { isProduction, isDevelopment, isTest, validateProductionEnv, getEnvironmentInfo };

// Re-export environment-specific configs for direct access
export * from './environments';

// Validate production environment variables on startup
if (isProduction) {
  validateProductionEnv();
}

/**
 * Main application configuration object
 *
 * This consolidates all environment-specific settings.
 * Import this for general app configuration needs.
 */
export const config = {
  // Environment
  nodeEnv: NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,

  // Server
  port: API_CONFIG.port,

  // API
  api: {
    bodyLimit: API_CONFIG.bodyLimit,
    corsOrigins: API_CONFIG.corsOrigins,
  },

  // Ledger
  stellar: STELLAR_CONFIG,

  // Rate Limiting
  rateLimit: RATE_LIMIT_CONFIG,

  // Logging
  logging: LOG_CONFIG,

  // Observability
  otel: OTEL_CONFIG,

  // Security
  security: SECURITY_CONFIG,
};
