import { Body, Controller, Get, HttpCode, Inject, Param, Post, Query, UseGuards, ValidationPipe } from "@nestjs/common";
import type { PaginatedResult } from "@spin-rewards/core-types";
import type { BalanceIntegrity } from "@spin-rewards/core-wallet";
import { unwrapOrThrow } from "@spin-rewards/core-errors";
import { AdminAuthGuard } from "../auth/admin-auth.guard";
import { AdminService } from "../services/admin.service";
import type { AdminLedgerEntry, CleanupReport } from "../services/admin.service";
import { LedgerQueryDto } from "../dto/ledger-query.dto";
import { AdjustmentDto } from "../dto/adjustment.dto";

@Controller("admin")
@UseGuards(AdminAuthGuard)
export class AdminController {
  constructor(@Inject(AdminService) private readonly adminService: AdminService) {}

  @Post("prizes/cleanup-expired")
  @HttpCode(200)
  cleanupExpired(): Promise<CleanupReport> {
    return this.adminService.cleanupExpiredPrizes();
  }

  @Get("ledger")
  listLedger(
    @Query(new ValidationPipe({ expectedType: LedgerQueryDto, whitelist: true, transform: true })) query: LedgerQueryDto,
  ): Promise<PaginatedResult<AdminLedgerEntry>> {
    return this.adminService.listLedger({
      identityId: query.identityId,
      kind: query.kind,
      from: query.from ? new Date(query.from) : undefined,
      to: query.to ? new Date(query.to) : undefined,
      limit: query.limit,
      offset: query.offset,
    });
  }

  @Post("identities/:identityId/adjustments")
  async adjust(
    @Param("identityId") identityId: string,
    @Body(new ValidationPipe({ expectedType: AdjustmentDto, whitelist: true, transform: true })) body: AdjustmentDto,
  ): Promise<AdminLedgerEntry> {
    return unwrapOrThrow(await this.adminService.adjust(identityId, body));
  }

  @Get("identities/:identityId/integrity")
  integrity(@Param("identityId") identityId: string): Promise<BalanceIntegrity> {
    return this.adminService.integrity(identityId);
  }
}
