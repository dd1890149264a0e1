import { Controller, Get, Inject, Query, UseGuards, ValidationPipe } from "@nestjs/common";
import { Auth, AuthGuard } from "@spin-rewards/core-auth";
import type { AuthContext } from "@spin-rewards/core-auth";
import type { PaginatedResult } from "@spin-rewards/core-types";
import type { IssuedPrizeView } from "@spin-rewards/core-redemption";
import { RewardsService } from "../rewards.service";
import { PageQueryDto, PrizesQueryDto } from "../dto/list-query.dto";
import type { BalanceResponse, LedgerEntryResponse } from "../dto/responses";

@Controller()
@UseGuards(AuthGuard)
export class WalletController {
  constructor(@Inject(RewardsService) private readonly rewards: RewardsService) {}

  @Get("wallet/balance")
  balance(@Auth() ctx: AuthContext): Promise<BalanceResponse> {
    return this.rewards.balance(ctx);
  }

  @Get("wallet/transactions")
  transactions(
    @Auth() ctx: AuthContext,
    @Query(new ValidationPipe({ expectedType: PageQueryDto, transform: true })) query: PageQueryDto,
  ): Promise<PaginatedResult<LedgerEntryResponse>> {
    return this.rewards.transactions(ctx, query.limit, query.offset);
  }

  @Get("prizes")
  prizes(
    @Auth() ctx: AuthContext,
    @Query(new ValidationPipe({ expectedType: PrizesQueryDto, transform: true })) query: PrizesQueryDto,
  ): Promise<IssuedPrizeView[]> {
    return this.rewards.prizes(ctx, query.includeRedeemed === "true");
  }
}
