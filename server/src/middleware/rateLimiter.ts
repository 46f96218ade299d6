import rateLimit from 'express-rate-limit';

/**
 * In-memory limits per client IP. They reset on restart and are not shared
 * across instances; 'trust proxy' must be set behind a reverse proxy.
 */

// General API rate limit: 100 requests per minute per IP
export const apiLimiter = rateLimit({
  windowMs: 60 * 1000,
  max: 100,
  message: { success: false, error: 'Too many requests, please try again later' },
  standardHeaders: true,
  legacyHeaders: false,
});

// Optimization calls the routing provider, so it gets a tighter budget
export const optimizeLimiter = rateLimit({
  windowMs: 60 * 1000,
  max: 20,
  message: { success: false, error: 'Too many route requests, please try again later' },
  standardHeaders: true,
  legacyHeaders: false,
});
