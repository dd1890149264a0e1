import { DynamicModule, Module, Provider } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { APP_INTERCEPTOR } from "@nestjs/core";
import { AuthModule } from "@spin-rewards/core-auth";
import { DbModule, DB_CLIENT, DbModuleOptions } from "@spin-rewards/core-db";
import type { IDbClient } from "@spin-rewards/core-db";
import { RedisModule, KEY_VALUE_STORE, LOCK_MANAGER, SLIDING_WINDOW_COUNTER, RedisModuleOptions } from "@spin-rewards/core-redis";
import type { IKeyValueStore, ILockManager, ISlidingWindowCounter } from "@spin-rewards/core-redis";
import { LoggingModule, CorrelationIdInterceptor, LOGGER } from "@spin-rewards/core-logging";
import type { ILogger } from "@spin-rewards/core-logging";
import { MetricsModule, METRICS } from "@spin-rewards/core-metrics";
import type { IMetrics } from "@spin-rewards/core-metrics";
import { RewardsConfigModule, REWARDS_SETTINGS } from "@spin-rewards/core-config";
import type { RewardsSettings } from "@spin-rewards/core-config";
import { CLOCK, SystemClock } from "@spin-rewards/core-clock";
import type { IClock } from "@spin-rewards/core-clock";
import { CryptoRngService, RNG_SERVICE } from "@spin-rewards/core-rng";
import type { IRngService } from "@spin-rewards/core-rng";
import { LedgerEntryRepository, LEDGER_ENTRY_REPOSITORY } from "@spin-rewards/core-ledger";
import { CreditAccountService, CREDIT_ACCOUNT_SERVICE } from "@spin-rewards/core-wallet";
import { CreditLimiter, CREDIT_LIMITER } from "@spin-rewards/core-limits";
import { AntiFraudGate, ANTI_FRAUD_GATE } from "@spin-rewards/core-antifraud";
import {
  DbCampaignDirectory,
  DbLocationDirectory,
  DbStaffDirectory,
  CAMPAIGN_DIRECTORY,
  LOCATION_DIRECTORY,
  STAFF_DIRECTORY,
} from "@spin-rewards/core-directory";
import { CheckInService, CHECK_IN_SERVICE } from "@spin-rewards/core-checkin";
import { SpinOrchestrator, SPIN_ORCHESTRATOR } from "@spin-rewards/core-spin";
import { RedemptionLifecycleManager, REDEMPTION_MANAGER } from "@spin-rewards/core-redemption";
import { RedisIdempotencyStore, IDEMPOTENCY_STORE } from "@spin-rewards/core-idempotency";

export interface EngineInfrastructure {
  db: IDbClient;
  kv: IKeyValueStore;
  lock: ILockManager;
  counter: ISlidingWindowCounter;
  clock: IClock;
  rng: IRngService;
  logger: ILogger;
  metrics: IMetrics;
}

export interface RewardsEngine {
  ledger: LedgerEntryRepository;
  accounts: CreditAccountService;
  limiter: CreditLimiter;
  gate: AntiFraudGate;
  campaigns: DbCampaignDirectory;
  locations: DbLocationDirectory;
  staff: DbStaffDirectory;
  checkIns: CheckInService;
  spins: SpinOrchestrator;
  redemptions: RedemptionLifecycleManager;
}

export const REWARDS_ENGINE = Symbol("REWARDS_ENGINE");

/** Wires the engine services over one set of infrastructure ports. */
export function createRewardsEngine(infra: EngineInfrastructure, settings: RewardsSettings): RewardsEngine {
  const { db, kv, lock, counter, clock, rng, logger, metrics } = infra;
  const accounts = new CreditAccountService(db, lock, { ttlMs: settings.lockTtlMs, waitMs: settings.lockWaitMs });
  const limiter = new CreditLimiter(db, settings);
  const gate = new AntiFraudGate(db, counter, settings);
  const campaigns = new DbCampaignDirectory(db, kv, settings.directoryCacheTtlSeconds);
  const locations = new DbLocationDirectory(db, kv, settings.directoryCacheTtlSeconds);
  const staff = new DbStaffDirectory(db);

  return {
    ledger: new LedgerEntryRepository(db),
    accounts,
    limiter,
    gate,
    campaigns,
    locations,
    staff,
    checkIns: new CheckInService({
      db,
      accounts,
      gate,
      limiter,
      locations,
      clock,
      logger,
      metrics,
      policy: {
        creditsPerCheckIn: settings.creditsPerCheckIn,
        sessionBucketSeconds: settings.sessionBucketSeconds,
        maxAttempts: settings.spinMaxAttempts,
      },
    }),
    spins: new SpinOrchestrator({
      db,
      accounts,
      limiter,
      campaigns,
      rng,
      clock,
      logger,
      metrics,
      policy: {
        maxAttempts: settings.spinMaxAttempts,
        prizeExpiryDays: settings.prizeExpiryDays,
        redemptionCodeLength: settings.redemptionCodeLength,
      },
    }),
    redemptions: new RedemptionLifecycleManager({ db, staff, campaigns, clock, logger, metrics }),
  };
}

/**
 * Engine providers over the infrastructure tokens. The host module (or a
 * test harness) supplies DB_CLIENT, the redis ports, CLOCK, RNG_SERVICE,
 * LOGGER, METRICS and REWARDS_SETTINGS.
 */
export const rewardsEngineProviders: Provider[] = [
  {
    provide: REWARDS_ENGINE,
    inject: [DB_CLIENT, KEY_VALUE_STORE, LOCK_MANAGER, SLIDING_WINDOW_COUNTER, CLOCK, RNG_SERVICE, LOGGER, METRICS, REWARDS_SETTINGS],
    useFactory: (
      db: IDbClient,
      kv: IKeyValueStore,
      lock: ILockManager,
      counter: ISlidingWindowCounter,
      clock: IClock,
      rng: IRngService,
      logger: ILogger,
      metrics: IMetrics,
      settings: RewardsSettings
    ) => createRewardsEngine({ db, kv, lock, counter, clock, rng, logger, metrics }, settings),
  },
  { provide: LEDGER_ENTRY_REPOSITORY, inject: [REWARDS_ENGINE], useFactory: (engine: RewardsEngine) => engine.ledger },
  { provide: CREDIT_ACCOUNT_SERVICE, inject: [REWARDS_ENGINE], useFactory: (engine: RewardsEngine) => engine.accounts },
  { provide: CREDIT_LIMITER, inject: [REWARDS_ENGINE], useFactory: (engine: RewardsEngine) => engine.limiter },
  { provide: ANTI_FRAUD_GATE, inject: [REWARDS_ENGINE], useFactory: (engine: RewardsEngine) => engine.gate },
  { provide: CAMPAIGN_DIRECTORY, inject: [REWARDS_ENGINE], useFactory: (engine: RewardsEngine) => engine.campaigns },
  { provide: LOCATION_DIRECTORY, inject: [REWARDS_ENGINE], useFactory: (engine: RewardsEngine) => engine.locations },
  { provide: STAFF_DIRECTORY, inject: [REWARDS_ENGINE], useFactory: (engine: RewardsEngine) => engine.staff },
  { provide: CHECK_IN_SERVICE, inject: [REWARDS_ENGINE], useFactory: (engine: RewardsEngine) => engine.checkIns },
  { provide: SPIN_ORCHESTRATOR, inject: [REWARDS_ENGINE], useFactory: (engine: RewardsEngine) => engine.spins },
  { provide: REDEMPTION_MANAGER, inject: [REWARDS_ENGINE], useFactory: (engine: RewardsEngine) => engine.redemptions },
  {
    provide: IDEMPOTENCY_STORE,
    inject: [KEY_VALUE_STORE],
    useFactory: (kv: IKeyValueStore) => new RedisIdempotencyStore(kv),
  },
];

const ENGINE_EXPORTS = [
  REWARDS_ENGINE,
  LEDGER_ENTRY_REPOSITORY,
  CREDIT_ACCOUNT_SERVICE,
  CREDIT_LIMITER,
  ANTI_FRAUD_GATE,
  CAMPAIGN_DIRECTORY,
  LOCATION_DIRECTORY,
  STAFF_DIRECTORY,
  CHECK_IN_SERVICE,
  SPIN_ORCHESTRATOR,
  REDEMPTION_MANAGER,
  IDEMPOTENCY_STORE,
];

export interface RewardsCoreModuleOptions {
  db?: DbModuleOptions;
  redis?: RedisModuleOptions;
  clock?: IClock;
  rng?: IRngService;
}

@Module({})
export class RewardsCoreModule {
  static register(options: RewardsCoreModuleOptions = {}): DynamicModule {
    return {
      module: RewardsCoreModule,
      imports: [
        ConfigModule.forRoot({ isGlobal: true }),
        DbModule.forRoot(options.db),
        RedisModule.forRoot(options.redis),
        RewardsConfigModule,
        AuthModule,
        LoggingModule,
        MetricsModule,
      ],
      providers: [
        { provide: APP_INTERCEPTOR, useClass: CorrelationIdInterceptor },
        { provide: CLOCK, useValue: options.clock ?? new SystemClock() },
        { provide: RNG_SERVICE, useValue: options.rng ?? new CryptoRngService() },
        ...rewardsEngineProviders,
      ],
      exports: [...ENGINE_EXPORTS, CLOCK, RNG_SERVICE, LOGGER, METRICS, DB_CLIENT, KEY_VALUE_STORE, LOCK_MANAGER, REWARDS_SETTINGS],
    };
  }
}
