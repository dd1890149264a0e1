import { Module } from "@nestjs/common";
import { APP_FILTER } from "@nestjs/core";
import { RewardsCoreModule } from "@spin-rewards/rewards-core";
import { LedgerUnavailableFilter } from "@spin-rewards/core-errors";
import { AdminAuthGuard } from "./auth/admin-auth.guard";
import { AdminController } from "./controllers/admin.controller";
import { MetricsController } from "./controllers/metrics.controller";
import { AdminService } from "./services/admin.service";

export const ADMIN_CONTROLLERS = [AdminController, MetricsController];

@Module({
  imports: [RewardsCoreModule.register()],
  controllers: ADMIN_CONTROLLERS,
  providers: [AdminAuthGuard, AdminService, { provide: APP_FILTER, useClass: LedgerUnavailableFilter }],
})
export class AppModule {}
