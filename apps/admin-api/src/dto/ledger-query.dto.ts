import { Type } from "class-transformer";
import { IsIn, IsInt, IsISO8601, IsOptional, IsString, Max, Min } from "class-validator";
import type { LedgerEntryKind } from "@spin-rewards/core-types";

export const LEDGER_KINDS: readonly LedgerEntryKind[] = ["EARNED", "SPENT", "BONUS", "REFUND"];

export class LedgerQueryDto {
  @IsOptional()
  @IsString()
  identityId?: string;

  @IsOptional()
  @IsIn(LEDGER_KINDS)
  kind?: LedgerEntryKind;

  @IsOptional()
  @IsISO8601()
  from?: string;

  @IsOptional()
  @IsISO8601()
  to?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  limit?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  @Max(1_000_000)
  offset?: number;
}
