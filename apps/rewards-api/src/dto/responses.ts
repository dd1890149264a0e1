import type { LedgerEntryKind } from "@spin-rewards/core-types";

export interface BalanceResponse {
  identityId: string;
  balance: number;
}

export interface LedgerEntryResponse {
  id: string;
  amount: number;
  kind: LedgerEntryKind;
  reason: string;
  locationId: string | null;
  balanceAfter: number;
  occurredAt: string;
}
