import { randomUUID } from "crypto";
import type { LedgerEntry, LedgerEntryKind, PaginatedResult } from "@spin-rewards/core-types";
import type { IDbClient } from "@spin-rewards/core-db";

export interface NewLedgerEntry {
  identityId: string;
  amount: number;
  kind: LedgerEntryKind;
  reason: string;
  locationId?: string | null;
  balanceAfter: number;
  occurredAt: Date;
}

export interface LedgerWindowQuery {
  identityId: string;
  kinds: readonly LedgerEntryKind[];
  from: Date;
  locationId?: string;
}

export interface LedgerListFilter {
  identityId?: string;
  kind?: LedgerEntryKind;
  from?: Date;
  to?: Date;
  limit?: number;
  offset?: number;
}

export interface ILedgerEntryRepository {
  append(entry: NewLedgerEntry): Promise<LedgerEntry>;
  /** Sum of amounts for the given kinds since `from`, optionally scoped to one location. */
  sumForWindow(query: LedgerWindowQuery): Promise<number>;
  sumForIdentity(identityId: string): Promise<number>;
  listForIdentity(identityId: string, limit?: number, offset?: number): Promise<PaginatedResult<LedgerEntry>>;
  list(filter: LedgerListFilter): Promise<PaginatedResult<LedgerEntry>>;
}

export const LEDGER_ENTRY_REPOSITORY = Symbol("LEDGER_ENTRY_REPOSITORY");

export class LedgerEntryRepository implements ILedgerEntryRepository {
  constructor(private readonly db: IDbClient) {}

  async append(entry: NewLedgerEntry): Promise<LedgerEntry> {
    const id = randomUUID();
    await this.db.query(
      `INSERT INTO ledger_entries (id, identity_id, amount, kind, reason, location_id, balance_after, occurred_at)
       VALUES ($1,$2,$3,$4,$5,$6,$7,$8)`,
      [
        id,
        entry.identityId,
        entry.amount,
        entry.kind,
        entry.reason,
        entry.locationId ?? null,
        entry.balanceAfter,
        entry.occurredAt.toISOString(),
      ]
    );
    return {
      id,
      identityId: entry.identityId,
      amount: entry.amount,
      kind: entry.kind,
      reason: entry.reason,
      locationId: entry.locationId ?? null,
      balanceAfter: entry.balanceAfter,
      occurredAt: entry.occurredAt,
    };
  }

  async sumForWindow(query: LedgerWindowQuery): Promise<number> {
    if (!query.kinds.length) return 0;
    const params: unknown[] = [query.identityId, query.from.toISOString()];
    const kindPlaceholders = query.kinds.map((kind) => {
      params.push(kind);
      return `$${params.length}`;
    });
    let sql = `SELECT COALESCE(SUM(amount), 0) AS total FROM ledger_entries
       WHERE identity_id = $1 AND occurred_at >= $2 AND kind IN (${kindPlaceholders.join(",")})`;
    if (query.locationId) {
      params.push(query.locationId);
      sql += ` AND location_id = $${params.length}`;
    }
    const rows = await this.db.query<SumRow>(sql, params);
    return Number(rows[0]?.total ?? 0);
  }

  async sumForIdentity(identityId: string): Promise<number> {
    const rows = await this.db.query<SumRow>(
      `SELECT COALESCE(SUM(amount), 0) AS total FROM ledger_entries WHERE identity_id = $1`,
      [identityId]
    );
    return Number(rows[0]?.total ?? 0);
  }

  async listForIdentity(identityId: string, limit = 50, offset = 0): Promise<PaginatedResult<LedgerEntry>> {
    return this.list({ identityId, limit, offset });
  }

  async list(filter: LedgerListFilter): Promise<PaginatedResult<LedgerEntry>> {
    const limit = filter.limit ?? 50;
    const offset = filter.offset ?? 0;
    const clauses: string[] = [];
    const params: unknown[] = [];
    if (filter.identityId) {
      params.push(filter.identityId);
      clauses.push(`identity_id = $${params.length}`);
    }
    if (filter.kind) {
      params.push(filter.kind);
      clauses.push(`kind = $${params.length}`);
    }
    if (filter.from) {
      params.push(filter.from.toISOString());
      clauses.push(`occurred_at >= $${params.length}`);
    }
    if (filter.to) {
      params.push(filter.to.toISOString());
      clauses.push(`occurred_at < $${params.length}`);
    }
    const where = clauses.length ? `WHERE ${clauses.join(" AND ")}` : "";

    const countRows = await this.db.query<CountRow>(`SELECT COUNT(*) AS count FROM ledger_entries ${where}`, params);
    const rows = await this.db.query<Row>(
      `SELECT * FROM ledger_entries ${where} ORDER BY occurred_at DESC, id DESC LIMIT $${params.length + 1} OFFSET $${params.length + 2}`,
      [...params, limit, offset]
    );
    return {
      items: rows.map(mapRow),
      total: Number(countRows[0]?.count ?? 0),
      limit,
      offset,
    };
  }
}

interface SumRow {
  total: string | number | null;
}

interface CountRow {
  count: string | number;
}

interface Row {
  id: string;
  identity_id: string;
  amount: number;
  kind: LedgerEntryKind;
  reason: string;
  location_id: string | null;
  balance_after: number;
  occurred_at: Date | string;
}

function mapRow(row: Row): LedgerEntry {
  return {
    id: row.id,
    identityId: row.identity_id,
    amount: Number(row.amount),
    kind: row.kind,
    reason: row.reason,
    locationId: row.location_id,
    balanceAfter: Number(row.balance_after),
    occurredAt: new Date(row.occurred_at),
  };
}
