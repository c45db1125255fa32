import { RateLimiter } from '../src/services/rateLimiter';

describe('RateLimiter', () => {
  let clock: number;
  let limiter: RateLimiter;

  beforeEach(() => {
    clock = 100;
    limiter = new RateLimiter({ maxRequests: 2, perSeconds: 60 }, () => clock);
  });

  afterEach(() => {
    limiter.destroy();
  });

  test('counts requests within the window', () => {
    expect(limiter.isAllowed('client')).toEqual({ allowed: true, remaining: 1, resetTime: 160, retryAfter: 0 });
    clock = 110;
    expect(limiter.isAllowed('client')).toEqual({ allowed: true, remaining: 0, resetTime: 160, retryAfter: 0 });
    clock = 120;
    expect(limiter.isAllowed('client')).toEqual({ allowed: false, remaining: 0, resetTime: 160, retryAfter: 40 });
  });

  test('frees capacity as requests leave the window', () => {
    limiter.isAllowed('client');
    clock = 110;
    limiter.isAllowed('client');
    clock = 161;

    expect(limiter.isAllowed('client')).toEqual({ allowed: true, remaining: 0, resetTime: 170, retryAfter: 0 });
  });

  test('tracks clients separately', () => {
    limiter.isAllowed('a');
    limiter.isAllowed('a');

    expect(limiter.isAllowed('a').allowed).toBe(false);
    expect(limiter.isAllowed('b').allowed).toBe(true);
  });

  test('destroy forgets every client', () => {
    limiter.isAllowed('a');
    limiter.isAllowed('a');

    limiter.destroy();

    expect(limiter.isAllowed('a')).toEqual({ allowed: true, remaining: 1, resetTime: 160, retryAfter: 0 });
  });
});
