import { Global, Module } from "@nestjs/common";
import { ConfigModule, ConfigService } from "@nestjs/config";

/**
 * Engine knobs. Every value is an integer except where noted; all are
 * read once at startup and range-checked.
 */
export interface RewardsSettings {
  proximityToleranceMeters: number;
  cooldownMinutes: number;
  creditsPerCheckIn: number;
  /** Width of the time bucket folded into the check-in uniqueness hash. */
  sessionBucketSeconds: number;
  maxTravelSpeedKmh: number;
  velocityMaxRequests: number;
  velocityWindowSeconds: number;
  dailyEarnCap: number;
  weeklyEarnCap: number;
  dailySpendCap: number;
  locationDailyEarnCap: number;
  maxBalance: number;
  prizeExpiryDays: number;
  redemptionCodeLength: number;
  spinMaxAttempts: number;
  lockTtlMs: number;
  lockWaitMs: number;
  idempotencyTtlSeconds: number;
  directoryCacheTtlSeconds: number;
}

export const REWARDS_SETTINGS = Symbol("REWARDS_SETTINGS");

interface IntegerRule {
  env: string;
  fallback: number;
  min: number;
  max: number;
}

const RULES: Record<keyof RewardsSettings, IntegerRule> = {
  proximityToleranceMeters: { env: "CHECKIN_PROXIMITY_METERS", fallback: 100, min: 1, max: 100_000 },
  cooldownMinutes: { env: "CHECKIN_COOLDOWN_MINUTES", fallback: 30, min: 0, max: 7 * 24 * 60 },
  creditsPerCheckIn: { env: "CHECKIN_CREDITS", fallback: 10, min: 1, max: 1_000_000 },
  sessionBucketSeconds: { env: "CHECKIN_SESSION_BUCKET_SECONDS", fallback: 60, min: 1, max: 86_400 },
  maxTravelSpeedKmh: { env: "CHECKIN_MAX_TRAVEL_KMH", fallback: 100, min: 1, max: 10_000 },
  velocityMaxRequests: { env: "VELOCITY_MAX_REQUESTS", fallback: 10, min: 1, max: 10_000 },
  velocityWindowSeconds: { env: "VELOCITY_WINDOW_SECONDS", fallback: 60, min: 1, max: 86_400 },
  dailyEarnCap: { env: "DAILY_EARN_CAP", fallback: 100, min: 1, max: 10_000_000 },
  weeklyEarnCap: { env: "WEEKLY_EARN_CAP", fallback: 500, min: 1, max: 70_000_000 },
  dailySpendCap: { env: "DAILY_SPEND_CAP", fallback: 200, min: 1, max: 10_000_000 },
  locationDailyEarnCap: { env: "LOCATION_DAILY_EARN_CAP", fallback: 50, min: 1, max: 10_000_000 },
  maxBalance: { env: "MAX_BALANCE_CAP", fallback: 1000, min: 1, max: 1_000_000_000 },
  prizeExpiryDays: { env: "PRIZE_EXPIRY_DAYS", fallback: 30, min: 1, max: 3650 },
  redemptionCodeLength: { env: "REDEMPTION_CODE_LENGTH", fallback: 8, min: 6, max: 20 },
  spinMaxAttempts: { env: "SPIN_MAX_ATTEMPTS", fallback: 3, min: 1, max: 10 },
  lockTtlMs: { env: "LOCK_TTL_MS", fallback: 2000, min: 100, max: 60_000 },
  lockWaitMs: { env: "LOCK_WAIT_MS", fallback: 1000, min: 0, max: 60_000 },
  idempotencyTtlSeconds: { env: "IDEMPOTENCY_TTL_SECONDS", fallback: 60, min: 1, max: 86_400 },
  directoryCacheTtlSeconds: { env: "DIRECTORY_CACHE_TTL_SECONDS", fallback: 30, min: 0, max: 86_400 },
};

function parseInteger(rule: IntegerRule, raw: string | undefined): number {
  if (raw === undefined || raw.trim() === "") {
    return rule.fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < rule.min || value > rule.max) {
    throw new Error(`Rewards: ${rule.env} must be an integer between ${rule.min} and ${rule.max}`);
  }
  return value;
}

/**
 * Builds settings from a key lookup (ConfigService.get or process.env).
 * Throws on the first out-of-range or inconsistent value.
 */
export function loadRewardsSettings(get: (key: string) => string | undefined): RewardsSettings {
  const read = (key: keyof RewardsSettings) => parseInteger(RULES[key], get(RULES[key].env));
  const settings: RewardsSettings = {
    proximityToleranceMeters: read("proximityToleranceMeters"),
    cooldownMinutes: read("cooldownMinutes"),
    creditsPerCheckIn: read("creditsPerCheckIn"),
    sessionBucketSeconds: read("sessionBucketSeconds"),
    maxTravelSpeedKmh: read("maxTravelSpeedKmh"),
    velocityMaxRequests: read("velocityMaxRequests"),
    velocityWindowSeconds: read("velocityWindowSeconds"),
    dailyEarnCap: read("dailyEarnCap"),
    weeklyEarnCap: read("weeklyEarnCap"),
    dailySpendCap: read("dailySpendCap"),
    locationDailyEarnCap: read("locationDailyEarnCap"),
    maxBalance: read("maxBalance"),
    prizeExpiryDays: read("prizeExpiryDays"),
    redemptionCodeLength: read("redemptionCodeLength"),
    spinMaxAttempts: read("spinMaxAttempts"),
    lockTtlMs: read("lockTtlMs"),
    lockWaitMs: read("lockWaitMs"),
    idempotencyTtlSeconds: read("idempotencyTtlSeconds"),
    directoryCacheTtlSeconds: read("directoryCacheTtlSeconds"),
  };

  if (settings.weeklyEarnCap < settings.dailyEarnCap) {
    throw new Error("Rewards: WEEKLY_EARN_CAP must be at least DAILY_EARN_CAP");
  }
  if (settings.locationDailyEarnCap > settings.dailyEarnCap) {
    throw new Error("Rewards: LOCATION_DAILY_EARN_CAP must not exceed DAILY_EARN_CAP");
  }
  return settings;
}

export const DEFAULT_REWARDS_SETTINGS: Readonly<RewardsSettings> = Object.freeze(loadRewardsSettings(() => undefined));

@Global()
@Module({
  imports: [ConfigModule.forRoot({ isGlobal: true })],
  providers: [
    {
      provide: REWARDS_SETTINGS,
      inject: [ConfigService],
      useFactory: (config: ConfigService) => loadRewardsSettings((key) => config.get<string>(key)),
    },
  ],
  exports: [REWARDS_SETTINGS],
})
export class RewardsConfigModule {}
