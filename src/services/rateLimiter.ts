import { Request, Response, NextFunction, RequestHandler } from 'express';
import { RateLimitError } from '../middleware/errorHandler';

export interface RateLimitConfig {
  maxRequests: number;
  perSeconds: number;
}

export interface RateLimitDecision {
  allowed: boolean;
  remaining: number;
  /** Epoch seconds at which the oldest counted request leaves the window. */
  resetTime: number;
  retryAfter: number;
}

const SWEEP_INTERVAL_MS = 5 * 60 * 1000;

/** Sliding-window request counter keyed by client. */
export class RateLimiter {
  private hits = new Map<string, number[]>();
  private sweepTimer: NodeJS.Timeout;

  constructor(private config: RateLimitConfig, private now: () => number = () => Date.now() / 1000) {
    this.sweepTimer = setInterval(() => this.sweep(), SWEEP_INTERVAL_MS);
    this.sweepTimer.unref();
  }

  isAllowed(clientId: string): RateLimitDecision {
    const now = this.now();
    const recent = this.withinWindow(this.hits.get(clientId) ?? [], now);
    const windowStart = recent.length > 0 ? recent[0] : now;
    const resetTime = Math.ceil(windowStart + this.config.perSeconds);

    if (recent.length >= this.config.maxRequests) {
      this.hits.set(clientId, recent);
      return { allowed: false, remaining: 0, resetTime, retryAfter: Math.max(0, Math.ceil(resetTime - now)) };
    }

    recent.push(now);
    this.hits.set(clientId, recent);
    return { allowed: true, remaining: this.config.maxRequests - recent.length, resetTime, retryAfter: 0 };
  }

  destroy(): void {
    clearInterval(this.sweepTimer);
    this.hits.clear();
  }

  private withinWindow(timestamps: number[], now: number): number[] {
    return timestamps.filter(timestamp => now - timestamp < this.config.perSeconds);
  }

  private sweep(): void {
    const now = this.now();
    for (const [clientId, timestamps] of this.hits) {
      const recent = this.withinWindow(timestamps, now);
      if (recent.length > 0) {
        this.hits.set(clientId, recent);
      } else {
        this.hits.delete(clientId);
      }
    }
  }
}

// Clients are told apart by address and user agent
const clientIdOf = (req: Request): string => {
  const address = req.ip ?? req.socket.remoteAddress ?? 'unknown';
  const agent = (req.get('User-Agent') ?? 'unknown').substring(0, 50);
  return `${address}:${agent}`;
};

export const createRateLimitMiddleware = (config: RateLimitConfig, limiter = new RateLimiter(config)): RequestHandler => {
  return (req: Request, res: Response, next: NextFunction) => {
    const decision = limiter.isAllowed(clientIdOf(req));

    res.set({
      'X-RateLimit-Limit': String(config.maxRequests),
      'X-RateLimit-Remaining': String(decision.remaining),
      'X-RateLimit-Reset': String(decision.resetTime),
    });

    if (decision.allowed) {
      next();
      return;
    }

    res.set('Retry-After', String(decision.retryAfter));
    next(new RateLimitError('Too many requests. Please try again later.', { retryAfter: decision.retryAfter }));
  };
};
