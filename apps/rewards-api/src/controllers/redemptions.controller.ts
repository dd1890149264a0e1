import { Body, Controller, HttpCode, Inject, Post, UseGuards, ValidationPipe } from "@nestjs/common";
import { Auth, AuthGuard, StaffGuard } from "@spin-rewards/core-auth";
import type { AuthContext } from "@spin-rewards/core-auth";
import type { RedemptionReceipt, RedemptionVerification } from "@spin-rewards/core-redemption";
import { RewardsService } from "../rewards.service";
import { RedemptionCodeDto } from "../dto/redemption.dto";

const codePipe = () => new ValidationPipe({ expectedType: RedemptionCodeDto, whitelist: true, transform: true });

@Controller("redemptions")
@UseGuards(AuthGuard, StaffGuard)
export class RedemptionsController {
  constructor(@Inject(RewardsService) private readonly rewards: RewardsService) {}

  @Post("verify")
  @HttpCode(200)
  verify(@Body(codePipe()) dto: RedemptionCodeDto): Promise<RedemptionVerification> {
    return this.rewards.verifyRedemption(dto.code);
  }

  @Post("complete")
  @HttpCode(200)
  complete(@Auth() ctx: AuthContext, @Body(codePipe()) dto: RedemptionCodeDto): Promise<RedemptionReceipt> {
    return this.rewards.completeRedemption(ctx, dto.code);
  }
}
