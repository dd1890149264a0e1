import { randomInt } from "crypto";
import type { IssuedPrize, IssuedPrizeStatus } from "@spin-rewards/core-types";
import type { IDbClient } from "@spin-rewards/core-db";
import type { IClock } from "@spin-rewards/core-clock";
import type { ICampaignDirectory, IStaffDirectory } from "@spin-rewards/core-directory";
import type { ILogger } from "@spin-rewards/core-logging";
import type { IMetrics } from "@spin-rewards/core-metrics";
import { IssuedPrizeRepository } from "@spin-rewards/core-inventory";
import { Result, denied, fail, ok } from "@spin-rewards/core-errors";
import { logFields } from "@spin-rewards/core-logging";
import { RewardsMetric } from "@spin-rewards/core-metrics";

// No 0/O or 1/I, which staff misread at the counter
const CODE_ALPHABET = "ABCDEFGHJKLMNPQRSTUVWXYZ23456789";
const CODE_PATTERN = /^[A-Z0-9]{6,20}$/;
const CODE_ALLOCATION_ATTEMPTS = 5;

export type RedemptionRejection = "NotFound" | "AlreadyRedeemed" | "Expired";

export interface IssuedPrizeView {
  id: string;
  prizeId: string;
  prizeName: string | null;
  campaignId: string;
  locationId: string;
  redemptionCode: string;
  status: IssuedPrizeStatus;
  issuedAt: string;
  expiresAt: string;
  redeemedAt: string | null;
}

export interface RedemptionVerification {
  isValid: boolean;
  canRedeem: boolean;
  reason?: RedemptionRejection;
  prize?: IssuedPrizeView;
}

export interface RedemptionReceipt {
  issuedPrizeId: string;
  prizeId: string;
  identityId: string;
  redemptionCode: string;
  staffId: string;
  redeemedAt: string;
}

export interface RedemptionManagerDeps {
  db: IDbClient;
  staff: IStaffDirectory;
  campaigns: ICampaignDirectory;
  clock: IClock;
  logger: ILogger;
  metrics: IMetrics;
}

export const REDEMPTION_MANAGER = Symbol("REDEMPTION_MANAGER");

export function normalizeRedemptionCode(code: string): string {
  return code.trim().toUpperCase();
}

export function generateRedemptionCode(length: number): string {
  if (!Number.isInteger(length) || length < 6 || length > 20) {
    throw new RangeError(`Redemption code length must be 6-20, got ${length}`);
  }
  let code = "";
  for (let i = 0; i < length; i += 1) {
    code += CODE_ALPHABET[randomInt(CODE_ALPHABET.length)];
  }
  return code;
}

/** Draws codes until one is not already taken. Uniqueness is finally enforced by the table's unique index. */
export async function allocateRedemptionCode(prizes: IssuedPrizeRepository, length: number): Promise<string> {
  for (let attempt = 0; attempt < CODE_ALLOCATION_ATTEMPTS; attempt += 1) {
    const code = generateRedemptionCode(length);
    if (!(await prizes.codeExists(code))) {
      return code;
    }
  }
  throw new Error(`Could not allocate a unique redemption code after ${CODE_ALLOCATION_ATTEMPTS} attempts`);
}

/**
 * Issued -> Redeemed | Expired. Redeemed and Expired are terminal; nothing
 * here touches credits.
 */
export class RedemptionLifecycleManager {
  constructor(private readonly deps: RedemptionManagerDeps) {}

  async verify(rawCode: string): Promise<RedemptionVerification> {
    const code = normalizeRedemptionCode(rawCode);
    if (!CODE_PATTERN.test(code)) {
      return { isValid: false, canRedeem: false, reason: "NotFound" };
    }
    const issued = await new IssuedPrizeRepository(this.deps.db).findByCode(code);
    if (!issued) {
      return { isValid: false, canRedeem: false, reason: "NotFound" };
    }

    const prize = await this.toView(issued);
    const rejection = this.rejectionFor(issued, this.deps.clock.now());
    if (rejection) {
      return { isValid: true, canRedeem: false, reason: rejection, prize };
    }
    return { isValid: true, canRedeem: true, prize };
  }

  async complete(rawCode: string, staffId: string): Promise<Result<RedemptionReceipt>> {
    const { logger, metrics } = this.deps;
    const code = normalizeRedemptionCode(rawCode);
    if (!CODE_PATTERN.test(code)) {
      return fail("ValidationFailure", "INVALID_CODE", "Redemption codes are 6-20 letters and digits");
    }

    const staffLocation = await this.deps.staff.getStaffLocation(staffId);
    const at = this.deps.clock.now();

    const result = await this.deps.db.transaction(async (tx): Promise<Result<RedemptionReceipt>> => {
      const prizes = new IssuedPrizeRepository(tx);
      const issued = await prizes.findByCode(code, true);
      if (!issued) {
        return fail("NotFound", "CODE_NOT_FOUND", "No prize was issued with this code");
      }
      const rejection = this.rejectionFor(issued, at);
      if (rejection === "AlreadyRedeemed") {
        return fail("AlreadyRedeemed", "ALREADY_REDEEMED", "This prize has already been redeemed", {
          redeemedAt: issued.redeemedAt?.toISOString() ?? null,
        });
      }
      if (rejection === "Expired") {
        return fail("Expired", "PRIZE_EXPIRED", "This prize has expired", { expiresAt: issued.expiresAt.toISOString() });
      }
      if (staffLocation === null || staffLocation !== issued.locationId) {
        return denied("STAFF_NOT_AUTHORIZED", "Staff member is not authorized to redeem prizes for this location");
      }

      const redeemed = await prizes.markRedeemed(issued.id, staffId, at);
      if (!redeemed) {
        return fail("AlreadyRedeemed", "ALREADY_REDEEMED", "This prize has already been redeemed");
      }
      return ok({
        issuedPrizeId: redeemed.id,
        prizeId: redeemed.prizeId,
        identityId: redeemed.identityId,
        redemptionCode: redeemed.redemptionCode,
        staffId,
        redeemedAt: at.toISOString(),
      });
    });

    if (result.ok) {
      logger.info("redemption.completed", logFields({ issuedPrizeId: result.value.issuedPrizeId, staffId, identityId: result.value.identityId }));
      metrics.increment(RewardsMetric.REDEMPTIONS, { status: "success" });
    } else {
      logger.info("redemption.rejected", logFields({ staffId, reason: result.failure.reason }));
      metrics.increment(RewardsMetric.REDEMPTIONS, { status: "rejected", reason: result.failure.reason });
    }
    return result;
  }

  /** Archives prizes whose expiry has passed. Redeemed prizes are never touched. */
  async cleanupExpired(): Promise<number> {
    const expired = await new IssuedPrizeRepository(this.deps.db).expireIssuedBefore(this.deps.clock.now());
    this.deps.logger.info("prizes.expired", { count: expired.length });
    if (expired.length) {
      this.deps.metrics.increment(RewardsMetric.PRIZES_EXPIRED, {});
    }
    return expired.length;
  }

  async listForIdentity(identityId: string, includeRedeemed = false): Promise<IssuedPrizeView[]> {
    const issued = await new IssuedPrizeRepository(this.deps.db).listForIdentity(identityId, includeRedeemed);
    return Promise.all(issued.map((prize) => this.toView(prize)));
  }

  private rejectionFor(issued: IssuedPrize, at: Date): RedemptionRejection | undefined {
    if (issued.status === "REDEEMED") return "AlreadyRedeemed";
    if (issued.status === "EXPIRED" || issued.expiresAt < at) return "Expired";
    return undefined;
  }

  private async toView(issued: IssuedPrize): Promise<IssuedPrizeView> {
    const campaign = await this.deps.campaigns.getCampaign(issued.campaignId);
    const definition = campaign?.prizes.find((prize) => prize.id === issued.prizeId);
    return {
      id: issued.id,
      prizeId: issued.prizeId,
      prizeName: definition?.name ?? null,
      campaignId: issued.campaignId,
      locationId: issued.locationId,
      redemptionCode: issued.redemptionCode,
      status: issued.status,
      issuedAt: issued.issuedAt.toISOString(),
      expiresAt: issued.expiresAt.toISOString(),
      redeemedAt: issued.redeemedAt ? issued.redeemedAt.toISOString() : null,
    };
  }
}
