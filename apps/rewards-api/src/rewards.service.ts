import { ConflictException, Inject, Injectable } from "@nestjs/common";
import type { AuthContext } from "@spin-rewards/core-auth";
import type { CheckInResult, LedgerEntry, PaginatedResult, SpinResult } from "@spin-rewards/core-types";
import { CHECK_IN_SERVICE, CheckInService } from "@spin-rewards/core-checkin";
import { SPIN_ORCHESTRATOR, SpinOrchestrator } from "@spin-rewards/core-spin";
import type { RemainingSpins } from "@spin-rewards/core-spin";
import { REDEMPTION_MANAGER, RedemptionLifecycleManager } from "@spin-rewards/core-redemption";
import type { IssuedPrizeView, RedemptionReceipt, RedemptionVerification } from "@spin-rewards/core-redemption";
import { CREDIT_ACCOUNT_SERVICE } from "@spin-rewards/core-wallet";
import type { ICreditAccountService } from "@spin-rewards/core-wallet";
import { LEDGER_ENTRY_REPOSITORY } from "@spin-rewards/core-ledger";
import type { ILedgerEntryRepository } from "@spin-rewards/core-ledger";
import { IDEMPOTENCY_STORE, IdempotencyInProgressError } from "@spin-rewards/core-idempotency";
import type { IIdempotencyStore } from "@spin-rewards/core-idempotency";
import { REWARDS_SETTINGS } from "@spin-rewards/core-config";
import type { RewardsSettings } from "@spin-rewards/core-config";
import { LOGGER, logFields } from "@spin-rewards/core-logging";
import type { ILogger } from "@spin-rewards/core-logging";
import { Result, RewardsErrorCode, rewardsErrorPayload, unwrapOrThrow } from "@spin-rewards/core-errors";
import type { CheckInDto } from "./dto/check-in.dto";
import type { BalanceResponse, LedgerEntryResponse } from "./dto/responses";

const DEFAULT_PAGE_SIZE = 50;

@Injectable()
export class RewardsService {
  constructor(
    @Inject(CHECK_IN_SERVICE) private readonly checkIns: CheckInService,
    @Inject(SPIN_ORCHESTRATOR) private readonly spins: SpinOrchestrator,
    @Inject(REDEMPTION_MANAGER) private readonly redemptions: RedemptionLifecycleManager,
    @Inject(CREDIT_ACCOUNT_SERVICE) private readonly accounts: ICreditAccountService,
    @Inject(LEDGER_ENTRY_REPOSITORY) private readonly ledger: ILedgerEntryRepository,
    @Inject(IDEMPOTENCY_STORE) private readonly idempotencyStore: IIdempotencyStore,
    @Inject(REWARDS_SETTINGS) private readonly settings: RewardsSettings,
    @Inject(LOGGER) private readonly logger: ILogger,
  ) {}

  async checkIn(ctx: AuthContext, dto: CheckInDto, idempotencyKey: string): Promise<CheckInResult> {
    const result = await this.idempotent(`checkin:${ctx.subjectId}:${idempotencyKey}`, ctx, () =>
      this.checkIns.checkIn({
        identityId: ctx.subjectId,
        locationId: dto.locationId,
        coordinate: { lat: dto.latitude, lng: dto.longitude },
        attemptKey: idempotencyKey,
      }),
    );
    return unwrapOrThrow(result);
  }

  async spin(ctx: AuthContext, campaignId: string, idempotencyKey: string): Promise<SpinResult> {
    const result = await this.idempotent(`spin:${ctx.subjectId}:${idempotencyKey}`, ctx, () =>
      this.spins.spin({ identityId: ctx.subjectId, campaignId, attemptKey: idempotencyKey }),
    );
    return unwrapOrThrow(result);
  }

  async remainingSpins(ctx: AuthContext, campaignId: string): Promise<RemainingSpins> {
    return unwrapOrThrow(await this.spins.remainingSpins(ctx.subjectId, campaignId));
  }

  async balance(ctx: AuthContext): Promise<BalanceResponse> {
    return { identityId: ctx.subjectId, balance: await this.accounts.getBalance(ctx.subjectId) };
  }

  async transactions(ctx: AuthContext, limit = DEFAULT_PAGE_SIZE, offset = 0): Promise<PaginatedResult<LedgerEntryResponse>> {
    const page = await this.ledger.listForIdentity(ctx.subjectId, limit, offset);
    return { ...page, items: page.items.map(toLedgerResponse) };
  }

  prizes(ctx: AuthContext, includeRedeemed: boolean): Promise<IssuedPrizeView[]> {
    return this.redemptions.listForIdentity(ctx.subjectId, includeRedeemed);
  }

  verifyRedemption(code: string): Promise<RedemptionVerification> {
    return this.redemptions.verify(code);
  }

  async completeRedemption(ctx: AuthContext, code: string): Promise<RedemptionReceipt> {
    return unwrapOrThrow(await this.redemptions.complete(code, ctx.subjectId));
  }

  /**
   * Concurrent duplicates share one execution. Transient conflicts are not
   * cached so the client's retry runs again.
   */
  private async idempotent<T>(key: string, ctx: AuthContext, fn: () => Promise<Result<T>>): Promise<Result<T>> {
    try {
      return await this.idempotencyStore.performOrGetCached(key, this.settings.idempotencyTtlSeconds, fn, {
        shouldCache: (result) => result.ok || result.failure.kind !== "Conflict",
        onCached: () => this.logger.info("idempotency.cached", logFields({ identityId: ctx.subjectId, key })),
      });
    } catch (err) {
      if (err instanceof IdempotencyInProgressError) {
        this.logger.warn("idempotency.in_progress", logFields({ identityId: ctx.subjectId, key }));
        throw new ConflictException(
          rewardsErrorPayload(RewardsErrorCode.IDEMPOTENCY_IN_PROGRESS, "An identical request is still being processed"),
        );
      }
      throw err;
    }
  }
}

function toLedgerResponse(entry: LedgerEntry): LedgerEntryResponse {
  return {
    id: entry.id,
    amount: entry.amount,
    kind: entry.kind,
    reason: entry.reason,
    locationId: entry.locationId,
    balanceAfter: entry.balanceAfter,
    occurredAt: entry.occurredAt.toISOString(),
  };
}
