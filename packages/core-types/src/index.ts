export interface GeoPoint {
  lat: number;
  lng: number;
}

export type LedgerEntryKind = "EARNED" | "SPENT" | "BONUS" | "REFUND";

export type CreditDirection = "earn" | "spend";

export type IssuedPrizeStatus = "ISSUED" | "REDEEMED" | "EXPIRED";

export type PrincipalRole = "player" | "staff";

export interface IdentityAccount {
  id: string;
  balance: number;
  active: boolean;
  version: number;
}

export interface LocationRecord {
  id: string;
  name: string;
  coordinate: GeoPoint;
  active: boolean;
}

export interface PrizeDefinition {
  id: string;
  campaignId: string;
  name: string;
  totalQuantity: number;
  probability: number;
}

export interface CampaignRecord {
  id: string;
  locationId: string;
  name: string;
  spinCost: number;
  maxSpinsPerDay: number;
  active: boolean;
  startsAt: Date;
  endsAt: Date | null;
  redemptionWindowDays: number | null;
  prizes: PrizeDefinition[];
}

export interface PrizeStock {
  prizeId: string;
  probability: number;
  totalQuantity: number;
  remainingQuantity: number;
}

export interface LedgerEntry {
  id: string;
  identityId: string;
  amount: number;
  kind: LedgerEntryKind;
  reason: string;
  locationId: string | null;
  balanceAfter: number;
  occurredAt: Date;
}

export interface CheckInSession {
  id: string;
  identityId: string;
  locationId: string;
  coordinate: GeoPoint;
  creditsAwarded: number;
  sessionHash: string;
  attemptKey: string | null;
  balanceAfter: number;
  createdAt: Date;
}

export interface SpinRecord {
  id: string;
  identityId: string;
  campaignId: string;
  creditsSpent: number;
  prizeId: string | null;
  issuedPrizeId: string | null;
  roll: number;
  attemptKey: string | null;
  balanceAfter: number;
  createdAt: Date;
}

export interface IssuedPrize {
  id: string;
  identityId: string;
  prizeId: string;
  campaignId: string;
  locationId: string;
  redemptionCode: string;
  status: IssuedPrizeStatus;
  issuedAt: Date;
  expiresAt: Date;
  redeemedAt: Date | null;
  redeemedByStaffId: string | null;
}

export interface CheckInResult {
  sessionId: string;
  creditsEarned: number;
  newBalance: number;
  replayed: boolean;
}

export interface SpinResult {
  spinId: string;
  success: true;
  prizeId: string | null;
  redemptionCode: string | null;
  expiresAt: string | null;
  creditsSpent: number;
  newBalance: number;
  replayed: boolean;
}

export interface PaginatedResult<T> {
  items: T[];
  total: number;
  limit: number;
  offset: number;
}

export const EARN_KINDS: readonly LedgerEntryKind[] = ["EARNED", "BONUS"];
export const SPEND_KINDS: readonly LedgerEntryKind[] = ["SPENT"];
