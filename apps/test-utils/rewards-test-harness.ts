import { INestApplication, ModuleMetadata, Provider, Type } from "@nestjs/common";
import { Test } from "@nestjs/testing";
import { AuthModule } from "@spin-rewards/core-auth";
import { DB_CLIENT } from "@spin-rewards/core-db";
import type { IDbClient } from "@spin-rewards/core-db";
import { KEY_VALUE_STORE, LOCK_MANAGER, SLIDING_WINDOW_COUNTER } from "@spin-rewards/core-redis";
import { LOGGER } from "@spin-rewards/core-logging";
import { METRICS } from "@spin-rewards/core-metrics";
import { CLOCK, ManualClock } from "@spin-rewards/core-clock";
import { RNG_SERVICE, SequenceRngService } from "@spin-rewards/core-rng";
import type { IRngService } from "@spin-rewards/core-rng";
import { DEFAULT_REWARDS_SETTINGS, REWARDS_SETTINGS } from "@spin-rewards/core-config";
import type { RewardsSettings } from "@spin-rewards/core-config";
import { REWARDS_ENGINE, createRewardsEngine, rewardsEngineProviders } from "@spin-rewards/rewards-core";
import type { RewardsEngine } from "@spin-rewards/rewards-core";
import {
  InMemoryLockManager,
  InMemoryLogger,
  InMemorySlidingWindowCounter,
  InMemoryStore,
  NoopMetrics,
  createDbClient,
} from "./test-helpers";

export interface TestEngineOptions {
  settings?: Partial<RewardsSettings>;
  /** Fixed draw rolls; omitted means every spin rolls 0.99. */
  rolls?: number[];
  rng?: IRngService;
  clock?: ManualClock;
}

export interface TestEngine {
  db: IDbClient;
  kv: InMemoryStore;
  lock: InMemoryLockManager;
  counter: InMemorySlidingWindowCounter;
  clock: ManualClock;
  logger: InMemoryLogger;
  metrics: NoopMetrics;
  settings: RewardsSettings;
  engine: RewardsEngine;
}

function testSettings(overrides: Partial<RewardsSettings> = {}): RewardsSettings {
  // The directory cache would hide rows tests change between calls
  return { ...DEFAULT_REWARDS_SETTINGS, directoryCacheTtlSeconds: 0, ...overrides };
}

/** The engine over pg-mem and in-process stand-ins for redis. */
export async function createTestEngine(options: TestEngineOptions = {}): Promise<TestEngine> {
  const db = await createDbClient();
  const kv = new InMemoryStore();
  const lock = new InMemoryLockManager();
  const counter = new InMemorySlidingWindowCounter();
  const clock = options.clock ?? new ManualClock();
  const logger = new InMemoryLogger();
  const metrics = new NoopMetrics();
  const settings = testSettings(options.settings);
  const rng = options.rng ?? new SequenceRngService(options.rolls ?? [0.99]);

  const engine = createRewardsEngine({ db, kv, lock, counter, clock, rng, logger, metrics }, settings);
  return { db, kv, lock, counter, clock, logger, metrics, settings, engine };
}

export interface RewardsTestHarness extends Omit<TestEngine, "engine"> {
  app: INestApplication;
  engine: RewardsEngine;
}

export interface RewardsTestHarnessOptions extends TestEngineOptions {
  controllers: Type<unknown>[];
  providers?: Provider[];
  imports?: NonNullable<ModuleMetadata["imports"]>;
}

export async function createRewardsTestHarness(options: RewardsTestHarnessOptions): Promise<RewardsTestHarness> {
  const db = await createDbClient();
  const kv = new InMemoryStore();
  const lock = new InMemoryLockManager();
  const counter = new InMemorySlidingWindowCounter();
  const clock = options.clock ?? new ManualClock();
  const logger = new InMemoryLogger();
  const metrics = new NoopMetrics();
  const settings = testSettings(options.settings);
  const rng = options.rng ?? new SequenceRngService(options.rolls ?? [0.99]);

  const moduleRef = await Test.createTestingModule({
    imports: [AuthModule, ...(options.imports ?? [])],
    controllers: options.controllers,
    providers: [
      ...rewardsEngineProviders,
      ...(options.providers ?? []),
      { provide: DB_CLIENT, useValue: db },
      { provide: KEY_VALUE_STORE, useValue: kv },
      { provide: LOCK_MANAGER, useValue: lock },
      { provide: SLIDING_WINDOW_COUNTER, useValue: counter },
      { provide: CLOCK, useValue: clock },
      { provide: RNG_SERVICE, useValue: rng },
      { provide: LOGGER, useValue: logger },
      { provide: METRICS, useValue: metrics },
      { provide: REWARDS_SETTINGS, useValue: settings },
    ],
  }).compile();

  const app = moduleRef.createNestApplication();
  await app.init();

  return { app, db, kv, lock, counter, clock, logger, metrics, settings, engine: app.get<RewardsEngine>(REWARDS_ENGINE) };
}
