import type { CampaignRecord, LocationRecord, PrizeDefinition } from "@spin-rewards/core-types";
import type { IDbClient } from "@spin-rewards/core-db";
import type { IKeyValueStore } from "@spin-rewards/core-redis";

export interface ICampaignDirectory {
  getCampaign(campaignId: string): Promise<CampaignRecord | null>;
}

export interface ILocationDirectory {
  getLocation(locationId: string): Promise<LocationRecord | null>;
}

export interface IStaffDirectory {
  /** Location the staff member works at, or null if unknown or inactive. */
  getStaffLocation(staffId: string): Promise<string | null>;
}

export const CAMPAIGN_DIRECTORY = Symbol("CAMPAIGN_DIRECTORY");
export const LOCATION_DIRECTORY = Symbol("LOCATION_DIRECTORY");
export const STAFF_DIRECTORY = Symbol("STAFF_DIRECTORY");

const CAMPAIGN_CACHE_KEY = (campaignId: string) => `directory:campaign:${campaignId}`;
const LOCATION_CACHE_KEY = (locationId: string) => `directory:location:${locationId}`;

/**
 * Campaign definitions change rarely, so they are cached briefly. Prize stock
 * is deliberately absent from the cached shape: it is always read live.
 */
export class DbCampaignDirectory implements ICampaignDirectory {
  constructor(private readonly db: IDbClient, private readonly cache: IKeyValueStore, private readonly ttlSeconds = 30) {}

  async getCampaign(campaignId: string): Promise<CampaignRecord | null> {
    const key = CAMPAIGN_CACHE_KEY(campaignId);
    if (this.ttlSeconds > 0) {
      const cached = await this.cache.get<CachedCampaign>(key);
      if (cached) return fromCache(cached);
    }

    const rows = await this.db.query<CampaignRow>(`SELECT * FROM campaigns WHERE id = $1`, [campaignId]);
    if (!rows.length) {
      return null;
    }
    const prizeRows = await this.db.query<PrizeRow>(
      `SELECT id, campaign_id, name, total_quantity, probability FROM prizes WHERE campaign_id = $1 ORDER BY id ASC`,
      [campaignId]
    );

    const row = rows[0];
    const campaign: CampaignRecord = {
      id: row.id,
      locationId: row.location_id,
      name: row.name,
      spinCost: Number(row.spin_cost),
      maxSpinsPerDay: Number(row.max_spins_per_day),
      active: row.active,
      startsAt: new Date(row.starts_at),
      endsAt: row.ends_at ? new Date(row.ends_at) : null,
      redemptionWindowDays: row.redemption_window_days === null ? null : Number(row.redemption_window_days),
      prizes: prizeRows.map(mapPrize),
    };

    if (this.ttlSeconds > 0) {
      await this.cache.set(key, toCache(campaign), this.ttlSeconds);
    }
    return campaign;
  }
}

export class DbLocationDirectory implements ILocationDirectory {
  constructor(private readonly db: IDbClient, private readonly cache: IKeyValueStore, private readonly ttlSeconds = 30) {}

  async getLocation(locationId: string): Promise<LocationRecord | null> {
    const key = LOCATION_CACHE_KEY(locationId);
    if (this.ttlSeconds > 0) {
      const cached = await this.cache.get<LocationRecord>(key);
      if (cached) return cached;
    }

    const rows = await this.db.query<LocationRow>(`SELECT id, name, latitude, longitude, active FROM locations WHERE id = $1`, [locationId]);
    if (!rows.length) {
      return null;
    }
    const location: LocationRecord = {
      id: rows[0].id,
      name: rows[0].name,
      coordinate: { lat: Number(rows[0].latitude), lng: Number(rows[0].longitude) },
      active: rows[0].active,
    };
    if (this.ttlSeconds > 0) {
      await this.cache.set(key, location, this.ttlSeconds);
    }
    return location;
  }
}

export class DbStaffDirectory implements IStaffDirectory {
  constructor(private readonly db: IDbClient) {}

  async getStaffLocation(staffId: string): Promise<string | null> {
    const rows = await this.db.query<{ location_id: string }>(`SELECT location_id FROM staff WHERE id = $1 AND active = TRUE`, [staffId]);
    return rows[0]?.location_id ?? null;
  }
}

/** Active and inside its [startsAt, endsAt] window at `at`. */
export function isCampaignOpen(campaign: CampaignRecord, at: Date): boolean {
  if (!campaign.active) return false;
  if (at < campaign.startsAt) return false;
  return campaign.endsAt === null || at <= campaign.endsAt;
}

interface CampaignRow {
  id: string;
  location_id: string;
  name: string;
  spin_cost: number | string;
  max_spins_per_day: number | string;
  active: boolean;
  starts_at: Date | string;
  ends_at: Date | string | null;
  redemption_window_days: number | string | null;
}

interface PrizeRow {
  id: string;
  campaign_id: string;
  name: string;
  total_quantity: number | string;
  probability: number | string;
}

interface LocationRow {
  id: string;
  name: string;
  latitude: number | string;
  longitude: number | string;
  active: boolean;
}

type CachedCampaign = Omit<CampaignRecord, "startsAt" | "endsAt"> & { startsAt: string; endsAt: string | null };

function mapPrize(row: PrizeRow): PrizeDefinition {
  return {
    id: row.id,
    campaignId: row.campaign_id,
    name: row.name,
    totalQuantity: Number(row.total_quantity),
    probability: Number(row.probability),
  };
}

function toCache(campaign: CampaignRecord): CachedCampaign {
  return {
    ...campaign,
    startsAt: campaign.startsAt.toISOString(),
    endsAt: campaign.endsAt ? campaign.endsAt.toISOString() : null,
  };
}

function fromCache(cached: CachedCampaign): CampaignRecord {
  return {
    ...cached,
    startsAt: new Date(cached.startsAt),
    endsAt: cached.endsAt ? new Date(cached.endsAt) : null,
  };
}
