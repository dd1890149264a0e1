import { BadRequestException, ExecutionContext, createParamDecorator } from "@nestjs/common";
import type { IKeyValueStore } from "@spin-rewards/core-redis";
import { RewardsErrorCode, rewardsErrorPayload } from "@spin-rewards/core-errors";

export interface PerformOptions<T> {
  onCached?: (cached: T) => void;
  /** Results that should not be replayed (transient failures) return false here. */
  shouldCache?: (result: T) => boolean;
}

export interface IIdempotencyStore {
  performOrGetCached<T>(key: string, ttlSeconds: number, fn: () => Promise<T>, options?: PerformOptions<T>): Promise<T>;
}

export const IDEMPOTENCY_STORE = Symbol("IDEMPOTENCY_STORE");
export const IDEMPOTENCY_HEADER = "x-idempotency-key";

const KEY_PATTERN = /^[A-Za-z0-9._:-]{1,128}$/;

export class IdempotencyInProgressError extends Error {
  constructor(readonly key: string) {
    super(`Request ${key} is still being processed`);
    this.name = "IdempotencyInProgressError";
  }
}

export const IdempotencyKey = createParamDecorator((_data: unknown, ctx: ExecutionContext): string => {
  const request = ctx.switchToHttp().getRequest<{ headers: Record<string, string | string[] | undefined> }>();
  const header = request.headers[IDEMPOTENCY_HEADER];
  const value = Array.isArray(header) ? header[0] : header;
  if (!value) {
    throw new BadRequestException(
      rewardsErrorPayload(RewardsErrorCode.IDEMPOTENCY_KEY_MISSING, `Header ${IDEMPOTENCY_HEADER} is required for this endpoint`),
    );
  }
  if (!KEY_PATTERN.test(value)) {
    throw new BadRequestException(
      rewardsErrorPayload(RewardsErrorCode.IDEMPOTENCY_KEY_MISSING, `Header ${IDEMPOTENCY_HEADER} must be 1-128 characters of [A-Za-z0-9._:-]`),
    );
  }
  return value;
});

/**
 * Collapses concurrent duplicates of one request onto a single execution and
 * replays its result until the TTL lapses. Durable replay after that is the
 * job of the attempt keys stored with each check-in and spin.
 */
export class RedisIdempotencyStore implements IIdempotencyStore {
  constructor(private readonly store: IKeyValueStore, private readonly pollIntervalMs = 50, private readonly maxWaitMs = 5000) {}

  async performOrGetCached<T>(key: string, ttlSeconds: number, fn: () => Promise<T>, options?: PerformOptions<T>): Promise<T> {
    const cacheKey = `idem:${key}`;
    const lockKey = `idem:lock:${key}`;

    const cached = await this.store.get<{ payload: T }>(cacheKey);
    if (cached) {
      options?.onCached?.(cached.payload);
      return cached.payload;
    }

    const acquired = await this.store.setNx(lockKey, "1", ttlSeconds);
    if (!acquired) {
      const timeoutAt = Date.now() + Math.min(ttlSeconds * 1000, this.maxWaitMs);
      while (Date.now() < timeoutAt) {
        await new Promise((resolve) => setTimeout(resolve, this.pollIntervalMs));
        const existing = await this.store.get<{ payload: T }>(cacheKey);
        if (existing) {
          options?.onCached?.(existing.payload);
          return existing.payload;
        }
      }
      throw new IdempotencyInProgressError(key);
    }

    try {
      const result = await fn();
      if (options?.shouldCache?.(result) ?? true) {
        await this.store.set(cacheKey, { payload: result }, ttlSeconds);
      }
      return result;
    } finally {
      await this.store.del(lockKey);
    }
  }
}
