import type { CreditDirection } from "@spin-rewards/core-types";
import { EARN_KINDS, SPEND_KINDS } from "@spin-rewards/core-types";
import type { IDbClient } from "@spin-rewards/core-db";
import { LedgerEntryRepository } from "@spin-rewards/core-ledger";
import { CreditAccountRepository } from "@spin-rewards/core-wallet";
import { startOfUtcDay, startOfUtcWeek } from "@spin-rewards/core-clock";
import { Result, denied, fail, ok } from "@spin-rewards/core-errors";

export interface CreditCaps {
  dailyEarnCap: number;
  weeklyEarnCap: number;
  dailySpendCap: number;
  locationDailyEarnCap: number;
  maxBalance: number;
}

export interface LimitCheck {
  identityId: string;
  amount: number;
  direction: CreditDirection;
  at: Date;
  locationId?: string;
}

export interface CreditUsage {
  balance: number;
  dailyEarned: number;
  weeklyEarned: number;
  dailySpent: number;
  /** Only present when a location was given. */
  locationDailyEarned?: number;
}

export interface ICreditLimiter {
  validate(check: LimitCheck, tx?: IDbClient): Promise<Result<CreditUsage>>;
  remainingEarnCapacity(params: { identityId: string; at: Date; locationId?: string }, tx?: IDbClient): Promise<number>;
  usage(params: { identityId: string; at: Date; locationId?: string }, tx?: IDbClient): Promise<CreditUsage>;
}

export const CREDIT_LIMITER = Symbol("CREDIT_LIMITER");

/**
 * Calendar-window caps recomputed from ledger rows on every call. Days and
 * weeks are UTC; weeks start Monday. Earn counts EARNED and BONUS entries,
 * spend counts SPENT entries. Pass the transaction that holds the identity
 * lock so the sums include every committed write for that identity.
 */
export class CreditLimiter implements ICreditLimiter {
  constructor(private readonly db: IDbClient, private readonly caps: CreditCaps) {}

  async usage(params: { identityId: string; at: Date; locationId?: string }, tx?: IDbClient): Promise<CreditUsage> {
    const client = tx ?? this.db;
    const ledger = new LedgerEntryRepository(client);
    const dayStart = startOfUtcDay(params.at);
    const weekStart = startOfUtcWeek(params.at);

    const account = await new CreditAccountRepository(client).find(params.identityId);
    const dailyEarned = await ledger.sumForWindow({ identityId: params.identityId, kinds: EARN_KINDS, from: dayStart });
    const weeklyEarned = await ledger.sumForWindow({ identityId: params.identityId, kinds: EARN_KINDS, from: weekStart });
    const dailySpent = Math.abs(await ledger.sumForWindow({ identityId: params.identityId, kinds: SPEND_KINDS, from: dayStart }));
    const usage: CreditUsage = { balance: account?.balance ?? 0, dailyEarned, weeklyEarned, dailySpent };
    if (params.locationId) {
      usage.locationDailyEarned = await ledger.sumForWindow({
        identityId: params.identityId,
        kinds: EARN_KINDS,
        from: dayStart,
        locationId: params.locationId,
      });
    }
    return usage;
  }

  async validate(check: LimitCheck, tx?: IDbClient): Promise<Result<CreditUsage>> {
    if (!Number.isInteger(check.amount) || check.amount <= 0) {
      return fail("ValidationFailure", "INVALID_AMOUNT", `Amount must be a positive integer, got ${check.amount}`);
    }
    const usage = await this.usage(check, tx);
    return check.direction === "earn" ? this.checkEarn(check, usage) : this.checkSpend(check, usage);
  }

  async remainingEarnCapacity(params: { identityId: string; at: Date; locationId?: string }, tx?: IDbClient): Promise<number> {
    const usage = await this.usage(params, tx);
    const headroom = [
      this.caps.dailyEarnCap - usage.dailyEarned,
      this.caps.weeklyEarnCap - usage.weeklyEarned,
      this.caps.maxBalance - usage.balance,
    ];
    if (usage.locationDailyEarned !== undefined) {
      headroom.push(this.caps.locationDailyEarnCap - usage.locationDailyEarned);
    }
    return Math.max(0, Math.min(...headroom));
  }

  private checkEarn(check: LimitCheck, usage: CreditUsage): Result<CreditUsage> {
    const requested = check.amount;
    if (usage.dailyEarned + requested > this.caps.dailyEarnCap) {
      return denied("DAILY_EARN_LIMIT", "Daily earning limit reached", {
        limit: this.caps.dailyEarnCap,
        used: usage.dailyEarned,
        requested,
      });
    }
    if (usage.weeklyEarned + requested > this.caps.weeklyEarnCap) {
      return denied("WEEKLY_EARN_LIMIT", "Weekly earning limit reached", {
        limit: this.caps.weeklyEarnCap,
        used: usage.weeklyEarned,
        requested,
      });
    }
    if (usage.locationDailyEarned !== undefined && usage.locationDailyEarned + requested > this.caps.locationDailyEarnCap) {
      return denied("LOCATION_EARN_LIMIT", "Daily earning limit for this location reached", {
        limit: this.caps.locationDailyEarnCap,
        used: usage.locationDailyEarned,
        requested,
      });
    }
    if (usage.balance + requested > this.caps.maxBalance) {
      return denied("MAX_BALANCE", "Balance would exceed the maximum", {
        limit: this.caps.maxBalance,
        balance: usage.balance,
        requested,
      });
    }
    return ok(usage);
  }

  private checkSpend(check: LimitCheck, usage: CreditUsage): Result<CreditUsage> {
    const requested = check.amount;
    if (usage.dailySpent + requested > this.caps.dailySpendCap) {
      return denied("DAILY_SPEND_LIMIT", "Daily spending limit reached", {
        limit: this.caps.dailySpendCap,
        used: usage.dailySpent,
        requested,
      });
    }
    if (usage.balance < requested) {
      return denied("INSUFFICIENT_CREDITS", "Not enough credits", { balance: usage.balance, requested });
    }
    return ok(usage);
  }
}
