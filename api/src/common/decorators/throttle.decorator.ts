import { SkipThrottle, Throttle } from '@nestjs/throttler';

/**
 * Tighter limit for endpoints that create resources (30 req/min).
 * Quotas bound the total; this bounds the burst.
 */
export function CreateThrottle() {
  return Throttle({ default: { limit: 30, ttl: 60000 } });
}

/**
 * Probes hit health continuously and never count against the client.
 */
export function SkipRateLimit() {
  return SkipThrottle({ default: true });
}
