/**
 * Rate Limiting Middleware
 *
 * In-memory rate limiting for API endpoints.
 *
 * Environment-based configuration:
 * - Production: Strict limits, especially on ledger-mutating routes
 * - Development: Relaxed limits for easier testing
 * - Test: Very lenient limits for automated tests
 *
 * Set RATE_LIMIT_DISABLED=true to disable all rate limiting.
 */

import { NextFunction, Request, RequestHandler, Response } from 'express';
import rateLimit from 'express-rate-limit';

import { RATE_LIMIT_CONFIG } from '../config/environments';
import { logger } from '../observability';
import { ErrorCode } from '../types/errors';

/**
 * No-op middleware that passes through (used when rate limiting is disabled)
 */
const noopLimiter: RequestHandler = (_req: Request, _res: Response, next: NextFunction) => next();

const createLimiter = (limiter: RequestHandler): RequestHandler => {
  if (RATE_LIMIT_CONFIG.disabled) {
    logger.warn('Rate limiting is DISABLED via RATE_LIMIT_DISABLED=true');
    return noopLimiter;
  }
  return limiter;
};

const limitMessage = (code: ErrorCode, message: string) => ({
  status: 'error',
  error: {
    code,
    message,
    timestamp: new Date().toISOString(),
  },
});

/**
 * Global rate limiter
 * Applied to all routes
 * Configurable via RATE_LIMIT_WINDOW_MS and RATE_LIMIT_MAX_REQUESTS
 */
export const globalLimiter: RequestHandler = createLimiter(
  rateLimit({
    windowMs: RATE_LIMIT_CONFIG.global.windowMs,
    max: RATE_LIMIT_CONFIG.global.maxRequests,
    standardHeaders: true,
    legacyHeaders: false,
    message: limitMessage(ErrorCode.RATE_LIMIT_EXCEEDED, 'Too many requests, please try again later'),
    skip: (req) => {
      // Skip rate limiting for health checks and metrics
      return req.path === '/health' || req.path === '/health/live' || req.path === '/metrics';
    },
  })
);

/**
 * Account setup limiter
 * Every setup on testnet may create and fund new accounts through the faucet
 * Configurable via SETUP_RATE_LIMIT_WINDOW_MS and SETUP_RATE_LIMIT_MAX
 */
export const setupLimiter: RequestHandler = createLimiter(
  rateLimit({
    windowMs: RATE_LIMIT_CONFIG.setup.windowMs,
    max: RATE_LIMIT_CONFIG.setup.maxRequests,
    standardHeaders: true,
    legacyHeaders: false,
    message: limitMessage(
      ErrorCode.TOO_MANY_SETUP_REQUESTS,
      'Too many account setup requests, please try again later'
    ),
    validate: false,
  })
);

/**
 * Issuance limiter
 * Configurable via ISSUE_RATE_LIMIT_WINDOW_MS and ISSUE_RATE_LIMIT_MAX
 */
export const issuanceLimiter: RequestHandler = createLimiter(
  rateLimit({
    windowMs: RATE_LIMIT_CONFIG.issuance.windowMs,
    max: RATE_LIMIT_CONFIG.issuance.maxRequests,
    standardHeaders: true,
    legacyHeaders: false,
    message: limitMessage(ErrorCode.TOO_MANY_ISSUANCES, 'Too many issuances, please try again later'),
    validate: false,
  })
);
