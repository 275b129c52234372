import { Request, Response, NextFunction } from 'express';
import { StatusCodes } from 'http-status-codes';
import NodeCache from 'node-cache';
import config from '../config/config';

interface ClientWindow {
  count: number;
  resetTime: number;
}

/**
 * Fixed-window rate limiting per client IP.
 * Each client's window lives in the cache with a TTL of the window length,
 * so the entry expires with the window.
 */
export const rateLimitRequests = (
  maxRequests: number = config.RATE_LIMIT_MAX,
  windowMs: number = config.RATE_LIMIT_WINDOW_MS,
  attempts: NodeCache = new NodeCache({ useClones: false })
) => {
  return (req: Request, res: Response, next: NextFunction): void => {
    const clientKey = req.ip || req.socket.remoteAddress || 'unknown';
    const now = Date.now();
    const clientAttempts = attempts.get<ClientWindow>(clientKey);

    if (!clientAttempts) {
      attempts.set<ClientWindow>(clientKey, { count: 1, resetTime: now + windowMs }, windowMs / 1000);
      next();
      return;
    }

    if (clientAttempts.count >= maxRequests) {
      res.status(StatusCodes.TOO_MANY_REQUESTS).json({
        success: false,
        error: 'Too many requests. Please try again later.',
        retryAfter: Math.ceil((clientAttempts.resetTime - now) / 1000),
      });
      return;
    }

    // Stored by reference, so the TTL of the window is left untouched
    clientAttempts.count++;
    next();
  };
};
