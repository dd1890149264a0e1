import { randomUUID } from "crypto";
import { newDb, DataType } from "pg-mem";
import type { IDbClient } from "@spin-rewards/core-db";
import { translateDbError } from "@spin-rewards/core-db";
import type { IKeyValueStore, ILockManager, ISlidingWindowCounter, LockOptions } from "@spin-rewards/core-redis";
import type { ILogger } from "@spin-rewards/core-logging";
import type { IMetrics } from "@spin-rewards/core-metrics";
import { ConflictError } from "@spin-rewards/core-errors";

export { TEST_JWT_SECRET } from "../../packages/core-auth/src/test-utils";

export class InMemoryStore implements IKeyValueStore {
  private store = new Map<string, string>();

  async get<T>(key: string): Promise<T | null> {
    const raw = this.store.get(key);
    return raw === undefined ? null : JSON.parse(raw);
  }

  async set<T>(key: string, value: T): Promise<void> {
    this.store.set(key, JSON.stringify(value));
  }

  async setNx(key: string, value: string, _ttlSeconds?: number): Promise<boolean> {
    if (this.store.has(key)) return false;
    this.store.set(key, JSON.stringify(value));
    return true;
  }

  async del(key: string): Promise<void> {
    this.store.delete(key);
  }

  keys(): string[] {
    return [...this.store.keys()];
  }
}

/** Serializes callers per key; gives up with ConflictError after `waitMs`. */
export class InMemoryLockManager implements ILockManager {
  private locks = new Set<string>();

  async withLock<T>(key: string, options: LockOptions, fn: () => Promise<T>): Promise<T> {
    const deadline = Date.now() + (options.waitMs ?? 0);
    while (this.locks.has(key)) {
      if (Date.now() >= deadline) {
        throw new ConflictError(`Failed to acquire lock for ${key}`, key);
      }
      await new Promise((resolve) => setTimeout(resolve, 1));
    }
    this.locks.add(key);
    try {
      return await fn();
    } finally {
      this.locks.delete(key);
    }
  }

  isHeld(key: string): boolean {
    return this.locks.has(key);
  }
}

export class InMemorySlidingWindowCounter implements ISlidingWindowCounter {
  private windows = new Map<string, Map<string, number>>();

  async hit(key: string, member: string, windowMs: number, nowMs: number): Promise<number> {
    const entries = this.windows.get(key) ?? new Map<string, number>();
    for (const [seen, at] of entries) {
      if (at <= nowMs - windowMs) entries.delete(seen);
    }
    if (!entries.has(member)) entries.set(member, nowMs);
    this.windows.set(key, entries);
    return entries.size;
  }
}

export interface LoggedLine {
  level: "debug" | "info" | "warn" | "error";
  msg: string;
  meta: Record<string, unknown>;
}

export class InMemoryLogger implements ILogger {
  readonly lines: LoggedLine[] = [];

  debug(msg: string, meta: Record<string, unknown> = {}): void {
    this.lines.push({ level: "debug", msg, meta });
  }
  info(msg: string, meta: Record<string, unknown> = {}): void {
    this.lines.push({ level: "info", msg, meta });
  }
  warn(msg: string, meta: Record<string, unknown> = {}): void {
    this.lines.push({ level: "warn", msg, meta });
  }
  error(msg: string, meta: Record<string, unknown> = {}): void {
    this.lines.push({ level: "error", msg, meta });
  }

  messages(): string[] {
    return this.lines.map((line) => line.msg);
  }
}

export class NoopMetrics implements IMetrics {
  readonly increments: Array<{ name: string; labels: Record<string, string> }> = [];

  increment(name: string, labels: Record<string, string> = {}): void {
    this.increments.push({ name, labels });
  }
  observe(): void {}
}

const SCHEMA = [
  `CREATE TABLE identities (
    id TEXT PRIMARY KEY,
    balance INTEGER NOT NULL DEFAULT 0,
    active BOOLEAN NOT NULL DEFAULT TRUE,
    version INTEGER NOT NULL DEFAULT 0,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  )`,
  `CREATE TABLE locations (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    latitude DOUBLE PRECISION NOT NULL,
    longitude DOUBLE PRECISION NOT NULL,
    active BOOLEAN NOT NULL DEFAULT TRUE
  )`,
  `CREATE TABLE campaigns (
    id TEXT PRIMARY KEY,
    location_id TEXT NOT NULL REFERENCES locations(id),
    name TEXT NOT NULL,
    spin_cost INTEGER NOT NULL,
    max_spins_per_day INTEGER NOT NULL,
    active BOOLEAN NOT NULL DEFAULT TRUE,
    starts_at TIMESTAMPTZ NOT NULL,
    ends_at TIMESTAMPTZ,
    redemption_window_days INTEGER
  )`,
  `CREATE TABLE prizes (
    id TEXT PRIMARY KEY,
    campaign_id TEXT NOT NULL REFERENCES campaigns(id),
    name TEXT NOT NULL,
    total_quantity INTEGER NOT NULL,
    remaining_quantity INTEGER NOT NULL,
    probability DOUBLE PRECISION NOT NULL
  )`,
  `CREATE TABLE staff (
    id TEXT PRIMARY KEY,
    location_id TEXT NOT NULL REFERENCES locations(id),
    active BOOLEAN NOT NULL DEFAULT TRUE
  )`,
  `CREATE TABLE ledger_entries (
    id UUID PRIMARY KEY,
    identity_id TEXT NOT NULL REFERENCES identities(id),
    amount INTEGER NOT NULL,
    kind TEXT NOT NULL,
    reason TEXT NOT NULL,
    location_id TEXT,
    balance_after INTEGER NOT NULL,
    occurred_at TIMESTAMPTZ NOT NULL
  )`,
  `CREATE TABLE check_in_sessions (
    id UUID PRIMARY KEY,
    identity_id TEXT NOT NULL REFERENCES identities(id),
    location_id TEXT NOT NULL REFERENCES locations(id),
    latitude DOUBLE PRECISION NOT NULL,
    longitude DOUBLE PRECISION NOT NULL,
    credits_awarded INTEGER NOT NULL,
    session_hash TEXT NOT NULL UNIQUE,
    attempt_key TEXT,
    balance_after INTEGER NOT NULL,
    created_at TIMESTAMPTZ NOT NULL
  )`,
  `CREATE TABLE issued_prizes (
    id UUID PRIMARY KEY,
    identity_id TEXT NOT NULL REFERENCES identities(id),
    prize_id TEXT NOT NULL REFERENCES prizes(id),
    campaign_id TEXT NOT NULL REFERENCES campaigns(id),
    location_id TEXT NOT NULL REFERENCES locations(id),
    redemption_code TEXT NOT NULL UNIQUE,
    status TEXT NOT NULL,
    issued_at TIMESTAMPTZ NOT NULL,
    expires_at TIMESTAMPTZ NOT NULL,
    redeemed_at TIMESTAMPTZ,
    redeemed_by_staff_id TEXT
  )`,
  `CREATE TABLE spin_records (
    id UUID PRIMARY KEY,
    identity_id TEXT NOT NULL REFERENCES identities(id),
    campaign_id TEXT NOT NULL REFERENCES campaigns(id),
    credits_spent INTEGER NOT NULL,
    prize_id TEXT,
    issued_prize_id UUID,
    roll DOUBLE PRECISION NOT NULL,
    attempt_key TEXT,
    balance_after INTEGER NOT NULL,
    created_at TIMESTAMPTZ NOT NULL
  )`,
];

export async function createDbClient(): Promise<IDbClient> {
  const db = newDb({ autoCreateForeignKeyIndices: true });
  db.public.registerFunction({
    name: "now",
    returns: DataType.timestamptz,
    implementation: () => new Date(),
  });
  db.public.registerFunction({
    name: "gen_random_uuid",
    returns: DataType.uuid,
    implementation: () => randomUUID(),
  });

  for (const statement of SCHEMA) {
    db.public.none(statement);
  }

  const pg = db.adapters.createPg();
  const pool = new pg.Pool();
  // pg-mem has no row locks, so transactions run one at a time
  let tail: Promise<void> = Promise.resolve();

  return {
    async query<T = unknown>(sql: string, params: unknown[] = []) {
      try {
        const result = await pool.query(sql, params);
        return result.rows;
      } catch (err) {
        throw translateDbError(err);
      }
    },
    async transaction<T>(fn: (tx: IDbClient) => Promise<T>): Promise<T> {
      const previous = tail;
      let release = () => {};
      tail = new Promise<void>((resolve) => {
        release = resolve;
      });
      await previous;
      try {
        const client = await pool.connect();
        try {
          await client.query("BEGIN");
          const txClient: IDbClient = {
            query: async (sql: string, params: unknown[] = []) => {
              const res = await client.query(sql, params);
              return res.rows;
            },
            transaction: () => Promise.reject(new Error("Nested transactions are not supported")),
          };
          const result = await fn(txClient);
          await client.query("COMMIT");
          return result;
        } catch (err) {
          await client.query("ROLLBACK");
          throw translateDbError(err);
        } finally {
          client.release();
        }
      } finally {
        release();
      }
    },
  };
}

export interface SeedLocation {
  id: string;
  name?: string;
  lat: number;
  lng: number;
  active?: boolean;
}

export async function seedLocation(db: IDbClient, location: SeedLocation): Promise<void> {
  await db.query(`INSERT INTO locations (id, name, latitude, longitude, active) VALUES ($1,$2,$3,$4,$5)`, [
    location.id,
    location.name ?? location.id,
    location.lat,
    location.lng,
    location.active ?? true,
  ]);
}

export interface SeedPrize {
  id: string;
  name?: string;
  total: number;
  remaining?: number;
  probability: number;
}

export interface SeedCampaign {
  id: string;
  locationId: string;
  spinCost?: number;
  maxSpinsPerDay?: number;
  active?: boolean;
  startsAt?: string;
  endsAt?: string | null;
  redemptionWindowDays?: number | null;
  prizes?: SeedPrize[];
}

export async function seedCampaign(db: IDbClient, campaign: SeedCampaign): Promise<void> {
  await db.query(
    `INSERT INTO campaigns (id, location_id, name, spin_cost, max_spins_per_day, active, starts_at, ends_at, redemption_window_days)
     VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9)`,
    [
      campaign.id,
      campaign.locationId,
      campaign.id,
      campaign.spinCost ?? 10,
      campaign.maxSpinsPerDay ?? 5,
      campaign.active ?? true,
      campaign.startsAt ?? "2024-01-01T00:00:00.000Z",
      campaign.endsAt ?? null,
      campaign.redemptionWindowDays ?? null,
    ]
  );
  for (const prize of campaign.prizes ?? []) {
    await db.query(
      `INSERT INTO prizes (id, campaign_id, name, total_quantity, remaining_quantity, probability) VALUES ($1,$2,$3,$4,$5,$6)`,
      [prize.id, campaign.id, prize.name ?? prize.id, prize.total, prize.remaining ?? prize.total, prize.probability]
    );
  }
}

export async function seedStaff(db: IDbClient, staff: { id: string; locationId: string; active?: boolean }): Promise<void> {
  await db.query(`INSERT INTO staff (id, location_id, active) VALUES ($1,$2,$3)`, [staff.id, staff.locationId, staff.active ?? true]);
}

/** Inserts an identity with a balance backed by one BONUS entry, so the ledger sum matches. */
export async function seedIdentity(
  db: IDbClient,
  identity: { id: string; balance?: number; active?: boolean; at?: string }
): Promise<void> {
  const balance = identity.balance ?? 0;
  const at = identity.at ?? "2024-01-01T00:00:00.000Z";
  await db.query(`INSERT INTO identities (id, balance, active, version) VALUES ($1,$2,$3,0)`, [
    identity.id,
    balance,
    identity.active ?? true,
  ]);
  if (balance > 0) {
    await db.query(
      `INSERT INTO ledger_entries (id, identity_id, amount, kind, reason, location_id, balance_after, occurred_at)
       VALUES ($1,$2,$3,'BONUS','seed',NULL,$4,$5)`,
      [randomUUID(), identity.id, balance, balance, at]
    );
  }
}
