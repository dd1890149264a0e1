import { Inject, Injectable } from "@nestjs/common";
import type { LedgerEntry, PaginatedResult } from "@spin-rewards/core-types";
import { LEDGER_ENTRY_REPOSITORY } from "@spin-rewards/core-ledger";
import type { ILedgerEntryRepository, LedgerListFilter } from "@spin-rewards/core-ledger";
import { CREDIT_ACCOUNT_SERVICE } from "@spin-rewards/core-wallet";
import type { BalanceIntegrity, ICreditAccountService } from "@spin-rewards/core-wallet";
import { CREDIT_LIMITER } from "@spin-rewards/core-limits";
import type { ICreditLimiter } from "@spin-rewards/core-limits";
import { REDEMPTION_MANAGER, RedemptionLifecycleManager } from "@spin-rewards/core-redemption";
import { CLOCK } from "@spin-rewards/core-clock";
import type { IClock } from "@spin-rewards/core-clock";
import { LOGGER, logFields } from "@spin-rewards/core-logging";
import type { ILogger } from "@spin-rewards/core-logging";
import { Result, denied, ok } from "@spin-rewards/core-errors";
import type { AdjustmentDto } from "../dto/adjustment.dto";

export interface AdminLedgerEntry {
  id: string;
  identityId: string;
  amount: number;
  kind: string;
  reason: string;
  locationId: string | null;
  balanceAfter: number;
  occurredAt: string;
}

export interface CleanupReport {
  archived: number;
}

const MAX_PAGE_SIZE = 500;

@Injectable()
export class AdminService {
  constructor(
    @Inject(LEDGER_ENTRY_REPOSITORY) private readonly ledger: ILedgerEntryRepository,
    @Inject(CREDIT_ACCOUNT_SERVICE) private readonly accounts: ICreditAccountService,
    @Inject(CREDIT_LIMITER) private readonly limiter: ICreditLimiter,
    @Inject(REDEMPTION_MANAGER) private readonly redemptions: RedemptionLifecycleManager,
    @Inject(CLOCK) private readonly clock: IClock,
    @Inject(LOGGER) private readonly logger: ILogger,
  ) {}

  async cleanupExpiredPrizes(): Promise<CleanupReport> {
    return { archived: await this.redemptions.cleanupExpired() };
  }

  async listLedger(filter: LedgerListFilter): Promise<PaginatedResult<AdminLedgerEntry>> {
    const page = await this.ledger.list({ ...filter, limit: clampLimit(filter.limit) });
    return { ...page, items: page.items.map(toAdminEntry) };
  }

  /**
   * Posts a BONUS or REFUND under the identity lock. Both count against the
   * earning caps and the balance ceiling.
   */
  adjust(identityId: string, adjustment: AdjustmentDto): Promise<Result<AdminLedgerEntry>> {
    return this.accounts.withAccount(identityId, async (session): Promise<Result<AdminLedgerEntry>> => {
      if (!session.account.active) {
        return denied("IDENTITY_INACTIVE", "Identity is not active");
      }
      const at = this.clock.now();
      const check = await this.limiter.validate({ identityId, amount: adjustment.amount, direction: "earn", at }, session.tx);
      if (!check.ok) {
        this.logger.warn("credits.adjustment_rejected", logFields({ identityId, reason: check.failure.reason }));
        return check;
      }
      const entry = await session.post({ amount: adjustment.amount, kind: adjustment.kind, reason: `admin:${adjustment.reason}`, at });
      this.logger.info("credits.adjusted", logFields({ identityId, kind: adjustment.kind, amount: adjustment.amount }));
      return ok(toAdminEntry(entry));
    });
  }

  integrity(identityId: string): Promise<BalanceIntegrity> {
    return this.accounts.verifyIntegrity(identityId);
  }
}

function clampLimit(limit?: number): number {
  if (!limit || Number.isNaN(limit)) {
    return 100;
  }
  return Math.max(1, Math.min(limit, MAX_PAGE_SIZE));
}

function toAdminEntry(entry: LedgerEntry): AdminLedgerEntry {
  return {
    id: entry.id,
    identityId: entry.identityId,
    amount: entry.amount,
    kind: entry.kind,
    reason: entry.reason,
    locationId: entry.locationId,
    balanceAfter: entry.balanceAfter,
    occurredAt: entry.occurredAt.toISOString(),
  };
}
