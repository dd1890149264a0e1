import { Controller, Get, Header } from "@nestjs/common";
import { renderMetrics } from "@spin-rewards/core-metrics";

@Controller()
export class HealthController {
  @Get("health")
  health() {
    return { status: "ok" };
  }

  @Get("metrics")
  @Header("Content-Type", "text/plain")
  metrics(): Promise<string> {
    return renderMetrics();
  }
}
