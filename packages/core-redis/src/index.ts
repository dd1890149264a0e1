import { Global, Module } from "@nestjs/common";
import { ConfigModule, ConfigService } from "@nestjs/config";
import { Redis } from "ioredis";
import { randomUUID } from "crypto";
import { ConflictError } from "@spin-rewards/core-errors";

export interface IKeyValueStore {
  get<T>(key: string): Promise<T | null>;
  set<T>(key: string, value: T, ttlSeconds?: number): Promise<void>;
  setNx(key: string, value: string, ttlSeconds?: number): Promise<boolean>;
  del(key: string): Promise<void>;
}

export interface LockOptions {
  ttlMs: number;
  /** How long to keep retrying acquisition before reporting contention. */
  waitMs?: number;
}

export interface ILockManager {
  /** Runs `fn` while holding `key`. Throws ConflictError when the lock cannot be taken in time. */
  withLock<T>(key: string, options: LockOptions, fn: () => Promise<T>): Promise<T>;
}

/**
 * Counts distinct members seen under a key within a trailing window.
 * Recording the same member twice counts it once.
 */
export interface ISlidingWindowCounter {
  hit(key: string, member: string, windowMs: number, nowMs: number): Promise<number>;
}

export const REDIS_CLIENT = Symbol("REDIS_CLIENT");
export const KEY_VALUE_STORE = Symbol("KEY_VALUE_STORE");
export const LOCK_MANAGER = Symbol("LOCK_MANAGER");
export const SLIDING_WINDOW_COUNTER = Symbol("SLIDING_WINDOW_COUNTER");

export class RedisKeyValueStore implements IKeyValueStore {
  constructor(private readonly redis: Redis) {}

  async get<T>(key: string): Promise<T | null> {
    const result = await this.redis.get(key);
    if (result === null) return null;
    return JSON.parse(result) as T;
  }

  async set<T>(key: string, value: T, ttlSeconds?: number): Promise<void> {
    const payload = JSON.stringify(value);
    if (ttlSeconds) {
      await this.redis.set(key, payload, "EX", ttlSeconds);
    } else {
      await this.redis.set(key, payload);
    }
  }

  async setNx(key: string, value: string, ttlSeconds?: number): Promise<boolean> {
    const payload = JSON.stringify(value);
    if (ttlSeconds) {
      const response = await this.redis.set(key, payload, "EX", ttlSeconds, "NX");
      return response === "OK";
    }
    const response = await this.redis.set(key, payload, "NX");
    return response === "OK";
  }

  async del(key: string): Promise<void> {
    await this.redis.del(key);
  }
}

const RELEASE_SCRIPT = `if redis.call("get", KEYS[1]) == ARGV[1] then return redis.call("del", KEYS[1]) else return 0 end`;
const LOCK_RETRY_DELAY_MS = 25;

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class RedisLockManager implements ILockManager {
  constructor(private readonly redis: Redis) {}

  async withLock<T>(key: string, options: LockOptions, fn: () => Promise<T>): Promise<T> {
    const token = randomUUID();
    const deadline = Date.now() + (options.waitMs ?? 0);
    for (;;) {
      const acquired = await this.redis.set(key, token, "PX", options.ttlMs, "NX");
      if (acquired === "OK") break;
      if (Date.now() >= deadline) {
        throw new ConflictError(`Failed to acquire lock for ${key}`, key);
      }
      await sleep(LOCK_RETRY_DELAY_MS);
    }

    try {
      return await fn();
    } finally {
      await this.redis.eval(RELEASE_SCRIPT, 1, key, token);
    }
  }
}

export class RedisSlidingWindowCounter implements ISlidingWindowCounter {
  constructor(private readonly redis: Redis) {}

  async hit(key: string, member: string, windowMs: number, nowMs: number): Promise<number> {
    const results = await this.redis
      .multi()
      .zremrangebyscore(key, 0, nowMs - windowMs)
      .zadd(key, "NX", nowMs, member)
      .zcard(key)
      .pexpire(key, windowMs)
      .exec();
    if (!results) {
      throw new Error(`Sliding window transaction aborted for ${key}`);
    }
    const [err, count] = results[2];
    if (err) throw err;
    return Number(count);
  }
}

export interface RedisModuleOptions {
  url?: string;
  keyPrefix?: string;
}

export const redisModuleOptionsToken = Symbol("REDIS_MODULE_OPTIONS");

@Global()
@Module({
  imports: [ConfigModule.forRoot({ isGlobal: true })],
  providers: [
    {
      provide: REDIS_CLIENT,
      inject: [ConfigService, redisModuleOptionsToken],
      useFactory: (config: ConfigService, options?: RedisModuleOptions) => {
        const url = options?.url ?? config.get<string>("REDIS_URL") ?? "redis://localhost:6379";
        const client = new Redis(url, {
          keyPrefix: options?.keyPrefix ?? config.get<string>("REDIS_KEY_PREFIX") ?? "rewards:",
        });
        client.on("error", (err) => {
          console.error("Redis connection error", err);
        });
        return client;
      },
    },
    {
      provide: KEY_VALUE_STORE,
      inject: [REDIS_CLIENT],
      useFactory: (redis: Redis) => new RedisKeyValueStore(redis),
    },
    {
      provide: LOCK_MANAGER,
      inject: [REDIS_CLIENT],
      useFactory: (redis: Redis) => new RedisLockManager(redis),
    },
    {
      provide: SLIDING_WINDOW_COUNTER,
      inject: [REDIS_CLIENT],
      useFactory: (redis: Redis) => new RedisSlidingWindowCounter(redis),
    },
  ],
  exports: [REDIS_CLIENT, KEY_VALUE_STORE, LOCK_MANAGER, SLIDING_WINDOW_COUNTER],
})
export class RedisModule {
  static forRoot(options?: RedisModuleOptions) {
    return {
      module: RedisModule,
      providers: [
        {
          provide: redisModuleOptionsToken,
          useValue: options ?? {},
        },
      ],
      exports: [redisModuleOptionsToken],
    };
  }
}
