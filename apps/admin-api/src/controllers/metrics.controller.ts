import { Controller, Get, Header, UseGuards } from "@nestjs/common";
import { renderMetrics } from "@spin-rewards/core-metrics";
import { AdminAuthGuard } from "../auth/admin-auth.guard";

@Controller()
@UseGuards(AdminAuthGuard)
export class MetricsController {
  @Get("metrics")
  @Header("Content-Type", "text/plain")
  metrics(): Promise<string> {
    return renderMetrics();
  }
}
