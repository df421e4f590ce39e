import { describe, expect, it } from 'vitest';
import { TooManyRequestsError } from '../../src/shared/errors';
import { RateLimiter } from '../../src/shared/rate-limiter';

describe('RateLimiter', () => {
  it('lets calls through while tokens remain', async () => {
    const limiter = new RateLimiter({ maxRequestsPerMinute: 3 });

    await limiter.acquire();
    await limiter.acquire();
    await limiter.acquire();
  });

  it('refuses a call that would wait longer than allowed', async () => {
    const limiter = new RateLimiter({ maxRequestsPerMinute: 1, maxWaitMs: 1000 });
    await limiter.acquire();

    const attempt = limiter.acquire();

    await expect(attempt).rejects.toBeInstanceOf(TooManyRequestsError);
    await expect(attempt).rejects.toMatchObject({ retryAfterSeconds: 60 });
  });
});
