import { Body, Controller, Inject, Post, UseGuards, ValidationPipe } from "@nestjs/common";
import { Auth, AuthGuard } from "@spin-rewards/core-auth";
import type { AuthContext } from "@spin-rewards/core-auth";
import { IdempotencyKey } from "@spin-rewards/core-idempotency";
import type { CheckInResult } from "@spin-rewards/core-types";
import { RewardsService } from "../rewards.service";
import { CheckInDto } from "../dto/check-in.dto";

@Controller("check-ins")
@UseGuards(AuthGuard)
export class CheckInController {
  constructor(@Inject(RewardsService) private readonly rewards: RewardsService) {}

  @Post()
  checkIn(
    @Auth() ctx: AuthContext,
    @Body(new ValidationPipe({ expectedType: CheckInDto, whitelist: true, transform: true })) dto: CheckInDto,
    @IdempotencyKey() idempotencyKey: string,
  ): Promise<CheckInResult> {
    return this.rewards.checkIn(ctx, dto, idempotencyKey);
  }
}
