/**
 * Middleware Exports
 *
 * Central export point for all middleware modules.
 */

// Error handling
export { errorHandler, notFoundHandler, ApiError, asyncHandler } from './errorHandler';
export type { AppError } from './errorHandler';

// Request validation
export { validateRequest } from './validateRequest';

// Rate limiting
export { globalLimiter, setupLimiter, issuanceLimiter } from './rateLimiter';
