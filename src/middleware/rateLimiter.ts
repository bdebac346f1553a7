/**
 * Shared Rate Limiters
 *
 * Tiers:
 * 1. Search: moderate limit on the autocomplete endpoint (30 req/min)
 * 2. API: generous limit for everything under /api/divisions (120 req/min)
 */
import rateLimit from 'express-rate-limit';

// =============================================================================
// Search Rate Limiter
// =============================================================================

export const searchLimiter = rateLimit({
  windowMs: 60 * 1000, // 1 minute
  max: 30, // 30 searches per minute per IP
  standardHeaders: 'draft-7',
  legacyHeaders: false,
  message: { error: 'Too many search requests, please try again later', kind: 'RateLimited' },
});

// =============================================================================
// API Rate Limiter
// =============================================================================

/**
 * Division API as a whole. Serves dropdowns and tree views, so the
 * limit is high.
 */
export const apiLimiter = rateLimit({
  windowMs: 60 * 1000, // 1 minute
  max: 120, // 120 requests per minute per IP
  standardHeaders: 'draft-7',
  legacyHeaders: false,
  message: { error: 'Too many requests, please try again later', kind: 'RateLimited' },
});
