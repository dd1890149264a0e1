import { Controller, Get, Inject, Param, Post, UseGuards } from "@nestjs/common";
import { Auth, AuthGuard } from "@spin-rewards/core-auth";
import type { AuthContext } from "@spin-rewards/core-auth";
import { IdempotencyKey } from "@spin-rewards/core-idempotency";
import type { SpinResult } from "@spin-rewards/core-types";
import type { RemainingSpins } from "@spin-rewards/core-spin";
import { RewardsService } from "../rewards.service";

@Controller("campaigns/:campaignId/spins")
@UseGuards(AuthGuard)
export class CampaignsController {
  constructor(@Inject(RewardsService) private readonly rewards: RewardsService) {}

  @Post()
  spin(
    @Auth() ctx: AuthContext,
    @Param("campaignId") campaignId: string,
    @IdempotencyKey() idempotencyKey: string,
  ): Promise<SpinResult> {
    return this.rewards.spin(ctx, campaignId, idempotencyKey);
  }

  @Get("remaining")
  remaining(@Auth() ctx: AuthContext, @Param("campaignId") campaignId: string): Promise<RemainingSpins> {
    return this.rewards.remainingSpins(ctx, campaignId);
  }
}
