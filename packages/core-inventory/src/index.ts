import type { CheckInSession, IssuedPrize, IssuedPrizeStatus, PrizeStock, SpinRecord } from "@spin-rewards/core-types";
import type { IDbClient } from "@spin-rewards/core-db";

export class PrizeInventoryRepository {
  constructor(private readonly db: IDbClient) {}

  /** Live stock for a campaign, ascending by prize id. */
  async snapshot(campaignId: string): Promise<PrizeStock[]> {
    const rows = await this.db.query<PrizeRow>(
      `SELECT id, probability, total_quantity, remaining_quantity FROM prizes WHERE campaign_id = $1 ORDER BY id ASC`,
      [campaignId]
    );
    return rows.map((row) => ({
      prizeId: row.id,
      probability: Number(row.probability),
      totalQuantity: Number(row.total_quantity),
      remainingQuantity: Number(row.remaining_quantity),
    }));
  }

  /** Takes one unit if any is left. Returns false when another writer took the last one. */
  async decrementOne(prizeId: string): Promise<boolean> {
    const rows = await this.db.query<{ remaining_quantity: number }>(
      `UPDATE prizes SET remaining_quantity = remaining_quantity - 1
       WHERE id = $1 AND remaining_quantity > 0
       RETURNING remaining_quantity`,
      [prizeId]
    );
    return rows.length === 1;
  }
}

interface PrizeRow {
  id: string;
  probability: number | string;
  total_quantity: number | string;
  remaining_quantity: number | string;
}

export class SpinRecordRepository {
  constructor(private readonly db: IDbClient) {}

  async insert(record: SpinRecord): Promise<void> {
    await this.db.query(
      `INSERT INTO spin_records (id, identity_id, campaign_id, credits_spent, prize_id, issued_prize_id, roll, attempt_key, balance_after, created_at)
       VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10)`,
      [
        record.id,
        record.identityId,
        record.campaignId,
        record.creditsSpent,
        record.prizeId,
        record.issuedPrizeId,
        record.roll,
        record.attemptKey,
        record.balanceAfter,
        record.createdAt.toISOString(),
      ]
    );
  }

  async findByAttemptKey(identityId: string, attemptKey: string): Promise<SpinRecord | null> {
    const rows = await this.db.query<SpinRow>(
      `SELECT * FROM spin_records WHERE identity_id = $1 AND attempt_key = $2 LIMIT 1`,
      [identityId, attemptKey]
    );
    return rows.length ? mapSpin(rows[0]) : null;
  }

  async countSince(identityId: string, campaignId: string, from: Date): Promise<number> {
    const rows = await this.db.query<{ count: number | string }>(
      `SELECT COUNT(*) AS count FROM spin_records WHERE identity_id = $1 AND campaign_id = $2 AND created_at >= $3`,
      [identityId, campaignId, from.toISOString()]
    );
    return Number(rows[0]?.count ?? 0);
  }

  async listForCampaign(campaignId: string): Promise<SpinRecord[]> {
    const rows = await this.db.query<SpinRow>(`SELECT * FROM spin_records WHERE campaign_id = $1 ORDER BY created_at ASC`, [campaignId]);
    return rows.map(mapSpin);
  }
}

interface SpinRow {
  id: string;
  identity_id: string;
  campaign_id: string;
  credits_spent: number | string;
  prize_id: string | null;
  issued_prize_id: string | null;
  roll: number | string;
  attempt_key: string | null;
  balance_after: number | string;
  created_at: Date | string;
}

function mapSpin(row: SpinRow): SpinRecord {
  return {
    id: row.id,
    identityId: row.identity_id,
    campaignId: row.campaign_id,
    creditsSpent: Number(row.credits_spent),
    prizeId: row.prize_id,
    issuedPrizeId: row.issued_prize_id,
    roll: Number(row.roll),
    attemptKey: row.attempt_key,
    balanceAfter: Number(row.balance_after),
    createdAt: new Date(row.created_at),
  };
}

export class CheckInSessionRepository {
  constructor(private readonly db: IDbClient) {}

  async insert(session: CheckInSession): Promise<void> {
    await this.db.query(
      `INSERT INTO check_in_sessions (id, identity_id, location_id, latitude, longitude, credits_awarded, session_hash, attempt_key, balance_after, created_at)
       VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10)`,
      [
        session.id,
        session.identityId,
        session.locationId,
        session.coordinate.lat,
        session.coordinate.lng,
        session.creditsAwarded,
        session.sessionHash,
        session.attemptKey,
        session.balanceAfter,
        session.createdAt.toISOString(),
      ]
    );
  }

  async findByAttemptKey(identityId: string, attemptKey: string): Promise<CheckInSession | null> {
    const rows = await this.db.query<SessionRow>(
      `SELECT * FROM check_in_sessions WHERE identity_id = $1 AND attempt_key = $2 LIMIT 1`,
      [identityId, attemptKey]
    );
    return rows.length ? mapSession(rows[0]) : null;
  }

  async findByHash(sessionHash: string): Promise<CheckInSession | null> {
    const rows = await this.db.query<SessionRow>(`SELECT * FROM check_in_sessions WHERE session_hash = $1 LIMIT 1`, [sessionHash]);
    return rows.length ? mapSession(rows[0]) : null;
  }

  /** Most recent session for the identity, at one location or anywhere. */
  async latest(identityId: string, locationId?: string): Promise<CheckInSession | null> {
    const rows = locationId
      ? await this.db.query<SessionRow>(
          `SELECT * FROM check_in_sessions WHERE identity_id = $1 AND location_id = $2 ORDER BY created_at DESC LIMIT 1`,
          [identityId, locationId]
        )
      : await this.db.query<SessionRow>(
          `SELECT * FROM check_in_sessions WHERE identity_id = $1 ORDER BY created_at DESC LIMIT 1`,
          [identityId]
        );
    return rows.length ? mapSession(rows[0]) : null;
  }
}

interface SessionRow {
  id: string;
  identity_id: string;
  location_id: string;
  latitude: number | string;
  longitude: number | string;
  credits_awarded: number | string;
  session_hash: string;
  attempt_key: string | null;
  balance_after: number | string;
  created_at: Date | string;
}

function mapSession(row: SessionRow): CheckInSession {
  return {
    id: row.id,
    identityId: row.identity_id,
    locationId: row.location_id,
    coordinate: { lat: Number(row.latitude), lng: Number(row.longitude) },
    creditsAwarded: Number(row.credits_awarded),
    sessionHash: row.session_hash,
    attemptKey: row.attempt_key,
    balanceAfter: Number(row.balance_after),
    createdAt: new Date(row.created_at),
  };
}

export class IssuedPrizeRepository {
  constructor(private readonly db: IDbClient) {}

  async insert(prize: IssuedPrize): Promise<void> {
    await this.db.query(
      `INSERT INTO issued_prizes (id, identity_id, prize_id, campaign_id, location_id, redemption_code, status, issued_at, expires_at, redeemed_at, redeemed_by_staff_id)
       VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11)`,
      [
        prize.id,
        prize.identityId,
        prize.prizeId,
        prize.campaignId,
        prize.locationId,
        prize.redemptionCode,
        prize.status,
        prize.issuedAt.toISOString(),
        prize.expiresAt.toISOString(),
        prize.redeemedAt ? prize.redeemedAt.toISOString() : null,
        prize.redeemedByStaffId,
      ]
    );
  }

  async findById(id: string): Promise<IssuedPrize | null> {
    const rows = await this.db.query<IssuedPrizeRow>(`SELECT * FROM issued_prizes WHERE id = $1`, [id]);
    return rows.length ? mapIssuedPrize(rows[0]) : null;
  }

  async findByCode(code: string, forUpdate = false): Promise<IssuedPrize | null> {
    const rows = await this.db.query<IssuedPrizeRow>(
      `SELECT * FROM issued_prizes WHERE redemption_code = $1${forUpdate ? " FOR UPDATE" : ""}`,
      [code]
    );
    return rows.length ? mapIssuedPrize(rows[0]) : null;
  }

  async codeExists(code: string): Promise<boolean> {
    const rows = await this.db.query<{ id: string }>(`SELECT id FROM issued_prizes WHERE redemption_code = $1`, [code]);
    return rows.length > 0;
  }

  /** ISSUED -> REDEEMED. Returns null if the row already left ISSUED. */
  async markRedeemed(id: string, staffId: string, at: Date): Promise<IssuedPrize | null> {
    const rows = await this.db.query<IssuedPrizeRow>(
      `UPDATE issued_prizes SET status = 'REDEEMED', redeemed_at = $2, redeemed_by_staff_id = $3
       WHERE id = $1 AND status = 'ISSUED'
       RETURNING *`,
      [id, at.toISOString(), staffId]
    );
    return rows.length ? mapIssuedPrize(rows[0]) : null;
  }

  /** ISSUED rows whose expiry has passed become EXPIRED. Returns the affected ids. */
  async expireIssuedBefore(now: Date): Promise<string[]> {
    const rows = await this.db.query<{ id: string }>(
      `UPDATE issued_prizes SET status = 'EXPIRED'
       WHERE status = 'ISSUED' AND expires_at < $1
       RETURNING id`,
      [now.toISOString()]
    );
    return rows.map((row) => row.id);
  }

  async listForIdentity(identityId: string, includeRedeemed: boolean): Promise<IssuedPrize[]> {
    const rows = includeRedeemed
      ? await this.db.query<IssuedPrizeRow>(`SELECT * FROM issued_prizes WHERE identity_id = $1 ORDER BY issued_at DESC`, [identityId])
      : await this.db.query<IssuedPrizeRow>(
          `SELECT * FROM issued_prizes WHERE identity_id = $1 AND status = 'ISSUED' ORDER BY issued_at DESC`,
          [identityId]
        );
    return rows.map(mapIssuedPrize);
  }

  async countForPrize(prizeId: string): Promise<number> {
    const rows = await this.db.query<{ count: number | string }>(`SELECT COUNT(*) AS count FROM issued_prizes WHERE prize_id = $1`, [prizeId]);
    return Number(rows[0]?.count ?? 0);
  }
}

interface IssuedPrizeRow {
  id: string;
  identity_id: string;
  prize_id: string;
  campaign_id: string;
  location_id: string;
  redemption_code: string;
  status: IssuedPrizeStatus;
  issued_at: Date | string;
  expires_at: Date | string;
  redeemed_at: Date | string | null;
  redeemed_by_staff_id: string | null;
}

function mapIssuedPrize(row: IssuedPrizeRow): IssuedPrize {
  return {
    id: row.id,
    identityId: row.identity_id,
    prizeId: row.prize_id,
    campaignId: row.campaign_id,
    locationId: row.location_id,
    redemptionCode: row.redemption_code,
    status: row.status,
    issuedAt: new Date(row.issued_at),
    expiresAt: new Date(row.expires_at),
    redeemedAt: row.redeemed_at ? new Date(row.redeemed_at) : null,
    redeemedByStaffId: row.redeemed_by_staff_id,
  };
}
