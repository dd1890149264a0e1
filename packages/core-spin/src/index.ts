import { randomUUID } from "crypto";
import type { CampaignRecord, IssuedPrize, PrizeStock, SpinRecord, SpinResult } from "@spin-rewards/core-types";
import type { IDbClient } from "@spin-rewards/core-db";
import type { IClock } from "@spin-rewards/core-clock";
import type { ICampaignDirectory } from "@spin-rewards/core-directory";
import type { ICreditLimiter } from "@spin-rewards/core-limits";
import type { AccountSession, ICreditAccountService } from "@spin-rewards/core-wallet";
import type { IRngService } from "@spin-rewards/core-rng";
import type { ILogger } from "@spin-rewards/core-logging";
import type { IMetrics } from "@spin-rewards/core-metrics";
import { IssuedPrizeRepository, PrizeInventoryRepository, SpinRecordRepository } from "@spin-rewards/core-inventory";
import { OddsResolutionEngine } from "@spin-rewards/game-math-wheel";
import { allocateRedemptionCode } from "@spin-rewards/core-redemption";
import { isCampaignOpen } from "@spin-rewards/core-directory";
import { addDays, startOfUtcDay } from "@spin-rewards/core-clock";
import { ConflictError, Result, denied, fail, ok } from "@spin-rewards/core-errors";
import { logFields } from "@spin-rewards/core-logging";
import { RewardsMetric } from "@spin-rewards/core-metrics";

export interface SpinRequest {
  identityId: string;
  campaignId: string;
  /** Client retry key, stored on the spin record. */
  attemptKey?: string;
}

export interface SpinPolicy {
  maxAttempts: number;
  prizeExpiryDays: number;
  redemptionCodeLength: number;
}

/** Stock access used inside a spin transaction. */
export interface PrizeInventory {
  snapshot(campaignId: string): Promise<PrizeStock[]>;
  decrementOne(prizeId: string): Promise<boolean>;
}

export interface SpinOrchestratorDeps {
  db: IDbClient;
  accounts: ICreditAccountService;
  limiter: ICreditLimiter;
  campaigns: ICampaignDirectory;
  rng: IRngService;
  clock: IClock;
  logger: ILogger;
  metrics: IMetrics;
  policy: SpinPolicy;
  inventoryFor?: (tx: IDbClient) => PrizeInventory;
}

export interface RemainingSpins {
  campaignId: string;
  maxSpinsPerDay: number;
  spinsToday: number;
  remaining: number;
}

export const SPIN_ORCHESTRATOR = Symbol("SPIN_ORCHESTRATOR");

function replayOf(record: SpinRecord, issued: IssuedPrize | null): SpinResult {
  return {
    spinId: record.id,
    success: true,
    prizeId: record.prizeId,
    redemptionCode: issued?.redemptionCode ?? null,
    expiresAt: issued ? issued.expiresAt.toISOString() : null,
    creditsSpent: record.creditsSpent,
    newBalance: record.balanceAfter,
    replayed: true,
  };
}

/**
 * Debit, draw, stock decrement, voucher and spin record commit together or
 * not at all. The identity lock serializes spins of one player; the
 * conditional stock update settles races between players, and a lost race
 * rolls the whole attempt back and retries it with a fresh draw.
 */
export class SpinOrchestrator {
  private readonly odds = new OddsResolutionEngine();
  private readonly inventoryFor: (tx: IDbClient) => PrizeInventory;

  constructor(private readonly deps: SpinOrchestratorDeps) {
    this.inventoryFor = deps.inventoryFor ?? ((tx) => new PrizeInventoryRepository(tx));
  }

  async spin(request: SpinRequest): Promise<Result<SpinResult>> {
    const { logger, metrics, clock } = this.deps;
    const context = { identityId: request.identityId, campaignId: request.campaignId, attemptKey: request.attemptKey };
    const startedAt = Date.now();

    const replay = await this.findReplay(this.deps.db, request);
    if (replay) {
      if (replay.ok) {
        logger.info("spin.replayed", logFields({ ...context, spinId: replay.value.spinId }));
        metrics.increment(RewardsMetric.SPINS, { status: "replayed" });
      } else {
        logger.info("spin.rejected", logFields({ ...context, reason: replay.failure.reason }));
        metrics.increment(RewardsMetric.SPINS, { status: "rejected", reason: replay.failure.reason });
      }
      return replay;
    }

    const campaign = await this.deps.campaigns.getCampaign(request.campaignId);
    if (!campaign) {
      return fail("NotFound", "CAMPAIGN_NOT_FOUND", `Campaign ${request.campaignId} does not exist`);
    }
    const at = clock.now();
    if (!isCampaignOpen(campaign, at)) {
      return denied("CAMPAIGN_INACTIVE", "This campaign is not running");
    }

    for (let attempt = 1; attempt <= this.deps.policy.maxAttempts; attempt += 1) {
      try {
        const result = await this.deps.accounts.withAccount(request.identityId, (session) =>
          this.attempt(session, request, campaign, at)
        );
        if (result.ok) {
          logger.info(
            "spin.completed",
            logFields({ ...context, spinId: result.value.spinId, prizeId: result.value.prizeId ?? undefined, attempt })
          );
          metrics.increment(RewardsMetric.SPINS, {
            status: result.value.replayed ? "replayed" : result.value.prizeId ? "win" : "no_win",
          });
          metrics.observe(RewardsMetric.SPIN_LATENCY_MS, Date.now() - startedAt, {});
        } else {
          logger.info("spin.rejected", logFields({ ...context, reason: result.failure.reason }));
          metrics.increment(RewardsMetric.SPINS, { status: "rejected", reason: result.failure.reason });
        }
        return result;
      } catch (err) {
        if (!(err instanceof ConflictError)) {
          throw err;
        }
        metrics.increment(RewardsMetric.LEDGER_CONFLICTS, { operation: "spin" });
        logger.warn("spin.conflict", logFields({ ...context, attempt, resource: err.resource }));
      }
    }

    return fail("Conflict", "CONCURRENT_UPDATE", "Spin could not be completed because of concurrent activity; retry");
  }

  async remainingSpins(identityId: string, campaignId: string): Promise<Result<RemainingSpins>> {
    const campaign = await this.deps.campaigns.getCampaign(campaignId);
    if (!campaign) {
      return fail("NotFound", "CAMPAIGN_NOT_FOUND", `Campaign ${campaignId} does not exist`);
    }
    const spinsToday = await new SpinRecordRepository(this.deps.db).countSince(
      identityId,
      campaignId,
      startOfUtcDay(this.deps.clock.now())
    );
    return ok({
      campaignId,
      maxSpinsPerDay: campaign.maxSpinsPerDay,
      spinsToday,
      remaining: Math.max(0, campaign.maxSpinsPerDay - spinsToday),
    });
  }

  private async attempt(session: AccountSession, request: SpinRequest, campaign: CampaignRecord, at: Date): Promise<Result<SpinResult>> {
    const { limiter, policy, rng } = this.deps;
    const tx = session.tx;
    const spins = new SpinRecordRepository(tx);

    if (!session.account.active) {
      return denied("IDENTITY_INACTIVE", "This account cannot spend credits");
    }

    const replay = await this.findReplay(tx, request);
    if (replay) return replay;

    const verdict = await limiter.validate(
      { identityId: request.identityId, amount: campaign.spinCost, direction: "spend", at },
      tx
    );
    if (!verdict.ok) return verdict;

    const spinsToday = await spins.countSince(request.identityId, campaign.id, startOfUtcDay(at));
    if (spinsToday >= campaign.maxSpinsPerDay) {
      return denied("SPIN_LIMIT", "Daily spin limit for this campaign reached", {
        limit: campaign.maxSpinsPerDay,
        used: spinsToday,
      });
    }

    const inventory = this.inventoryFor(tx);
    const stock = await inventory.snapshot(campaign.id);
    const roll = rng.nextFloat();
    const outcome = this.odds.draw(stock, roll);
    const prizeId = outcome.kind === "PRIZE" ? outcome.prizeId : null;

    if (prizeId && !(await inventory.decrementOne(prizeId))) {
      throw new ConflictError(`Prize ${prizeId} ran out during the spin`, `prize:${prizeId}`);
    }

    const entry = await session.post({
      amount: -campaign.spinCost,
      kind: "SPENT",
      reason: `spin:${campaign.id}`,
      locationId: campaign.locationId,
      at,
    });

    let issued: IssuedPrize | null = null;
    if (prizeId) {
      const prizes = new IssuedPrizeRepository(tx);
      issued = {
        id: randomUUID(),
        identityId: request.identityId,
        prizeId,
        campaignId: campaign.id,
        locationId: campaign.locationId,
        redemptionCode: await allocateRedemptionCode(prizes, policy.redemptionCodeLength),
        status: "ISSUED",
        issuedAt: at,
        expiresAt: addDays(at, campaign.redemptionWindowDays ?? policy.prizeExpiryDays),
        redeemedAt: null,
        redeemedByStaffId: null,
      };
      await prizes.insert(issued);
    }

    const record: SpinRecord = {
      id: randomUUID(),
      identityId: request.identityId,
      campaignId: campaign.id,
      creditsSpent: campaign.spinCost,
      prizeId,
      issuedPrizeId: issued?.id ?? null,
      roll,
      attemptKey: request.attemptKey ?? null,
      balanceAfter: entry.balanceAfter,
      createdAt: at,
    };
    await spins.insert(record);

    return ok({
      spinId: record.id,
      success: true,
      prizeId,
      redemptionCode: issued?.redemptionCode ?? null,
      expiresAt: issued ? issued.expiresAt.toISOString() : null,
      creditsSpent: campaign.spinCost,
      newBalance: entry.balanceAfter,
      replayed: false,
    });
  }

  /** An earlier spin under the same attempt key; a key reused for another campaign is a conflict. */
  private async findReplay(db: IDbClient, request: SpinRequest): Promise<Result<SpinResult> | null> {
    if (!request.attemptKey) return null;
    const record = await new SpinRecordRepository(db).findByAttemptKey(request.identityId, request.attemptKey);
    if (!record) return null;
    if (record.campaignId !== request.campaignId) {
      return fail("Conflict", "ATTEMPT_KEY_REUSED", "This attempt key was already used for a spin on another campaign", {
        campaignId: record.campaignId,
      });
    }
    const issued = record.issuedPrizeId ? await new IssuedPrizeRepository(db).findById(record.issuedPrizeId) : null;
    return ok(replayOf(record, issued));
  }
}
