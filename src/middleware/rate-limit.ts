import { FastifyReply, FastifyRequest } from 'fastify';
import { errorResponse } from '../errors.js';
import { msg } from '../lib/error-messages.js';

interface TokenBucket {
  tokens: number;
  lastRefill: number;
}

export interface RateLimiterOptions {
  burst: number;
  sustainedPerMin: number; // tokens per minute
  now?: () => number;
}

export interface ConsumeResult {
  allowed: boolean;
  remaining: number;
  retryAfter?: number;
}

export class RateLimiter {
  private buckets = new Map<string, TokenBucket>();
  private readonly now: () => number;

  constructor(private readonly options: RateLimiterOptions) {
    this.now = options.now ?? Date.now;
  }

  get limit(): number {
    return this.options.burst;
  }

  private getBucket(key: string): TokenBucket {
    const now = this.now();
    let bucket = this.buckets.get(key);

    if (!bucket) {
      bucket = { tokens: this.options.burst, lastRefill: now };
      this.buckets.set(key, bucket);
    }

    // Refill tokens based on time passed
    const minutes = (now - bucket.lastRefill) / 60000;
    const tokensToAdd = Math.floor(minutes * this.options.sustainedPerMin);

    if (tokensToAdd > 0) {
      bucket.tokens = Math.min(this.options.burst, bucket.tokens + tokensToAdd);
      bucket.lastRefill = now;
    }

    return bucket;
  }

  tryConsume(key: string): ConsumeResult {
    const bucket = this.getBucket(key);

    if (bucket.tokens >= 1) {
      bucket.tokens -= 1;
      return { allowed: true, remaining: bucket.tokens };
    }

    // Seconds until the next token
    const retryAfter = Math.max(1, Math.ceil(60 / this.options.sustainedPerMin));
    return { allowed: false, retryAfter, remaining: 0 };
  }
}

function clientKey(request: FastifyRequest): string {
  const client = request.headers['x-client-id'];
  if (typeof client === 'string' && client.trim() !== '') {
    return `client:${client.trim()}`;
  }
  return `ip:${request.ip}`;
}

/** preHandler guarding job submission; a no-op when `enabled` is false. */
export function createRateLimitHandler(limiter: RateLimiter, enabled: boolean) {
  return async (request: FastifyRequest, reply: FastifyReply) => {
    if (!enabled) return;

    const result = limiter.tryConsume(clientKey(request));

    reply.header('X-RateLimit-Limit', String(limiter.limit));
    reply.header('X-RateLimit-Remaining', String(result.remaining));

    if (!result.allowed) {
      reply.header('Retry-After', String(result.retryAfter ?? 1));
      reply.code(429).send(errorResponse('RATE_LIMIT', 'RATE_LIMIT_EXCEEDED', msg('RATE_LIMIT_RPM'), undefined, {
        retryAfter: result.retryAfter,
      }));
      return reply;
    }
  };
}
