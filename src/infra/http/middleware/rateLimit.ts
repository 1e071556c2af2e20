import rateLimit from 'express-rate-limit';

/**
 * 60 requests per minute per client. Each call builds its own in-memory
 * store, so separate app instances do not share counters.
 */
export function createApiRateLimiter() {
  return rateLimit({
    windowMs: 60 * 1000,
    limit: 60,
    message: { code: 'RATE_LIMITED', message: 'Too many requests, please try again later.' },
    standardHeaders: true,
    legacyHeaders: false,
  });
}

/** Stricter limit for password guessing: 10 login attempts per minute per IP. */
export function createLoginRateLimiter() {
  return rateLimit({
    windowMs: 60 * 1000,
    limit: 10,
    message: { code: 'RATE_LIMITED', message: 'Too many login attempts, please try again later.' },
    standardHeaders: true,
    legacyHeaders: false,
    keyGenerator: (req) => req.ip || req.socket.remoteAddress || 'unknown',
  });
}
