import { Module } from "@nestjs/common";
import { APP_FILTER } from "@nestjs/core";
import { RewardsCoreModule } from "@spin-rewards/rewards-core";
import { LedgerUnavailableFilter } from "@spin-rewards/core-errors";
import { RewardsService } from "./rewards.service";
import { CheckInController } from "./controllers/check-in.controller";
import { CampaignsController } from "./controllers/campaigns.controller";
import { WalletController } from "./controllers/wallet.controller";
import { RedemptionsController } from "./controllers/redemptions.controller";
import { HealthController } from "./controllers/health.controller";

export const REWARDS_CONTROLLERS = [CheckInController, CampaignsController, WalletController, RedemptionsController, HealthController];

@Module({
  imports: [RewardsCoreModule.register()],
  controllers: REWARDS_CONTROLLERS,
  providers: [RewardsService, { provide: APP_FILTER, useClass: LedgerUnavailableFilter }],
})
export class AppModule {}
