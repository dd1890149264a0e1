import { describe, expect, it, vi } from "vitest";
import type { Pool } from "pg";
import { ConflictError, LedgerUnavailableError } from "@spin-rewards/core-errors";
import { PgDbClient, translateDbError } from "../src";
import { InMemoryLogger } from "../../../apps/test-utils/test-helpers";

function pgError(code: string, message = `pg error ${code}`): Error & { code: string } {
  return Object.assign(new Error(message), { code });
}

function fakePool(query: (sql: string) => Promise<{ rows: unknown[] }>) {
  const client = { query: vi.fn(query), release: vi.fn() };
  const pool = { connect: vi.fn().mockResolvedValue(client), query: vi.fn() };
  return { client, pool: pool as unknown as Pool };
}

describe("translateDbError", () => {
  it("maps serialization failures, deadlocks and unique violations to conflicts", () => {
    for (const code of ["40001", "40P01", "23505"]) {
      const translated = translateDbError(pgError(code));
      expect(translated).toBeInstanceOf(ConflictError);
      expect(translated instanceof ConflictError && translated.resource).toBe(code);
    }
  });

  it("maps lost connections to an unavailable ledger", () => {
    expect(translateDbError(pgError("ECONNREFUSED"))).toBeInstanceOf(LedgerUnavailableError);
  });

  it("passes other errors through", () => {
    const err = pgError("22P02");
    expect(translateDbError(err)).toBe(err);
  });
});

describe("PgDbClient.transaction", () => {
  it("commits with a plain BEGIN and releases the client", async () => {
    const { client, pool } = fakePool(async () => ({ rows: [{ n: 1 }] }));
    const db = new PgDbClient(pool);

    const rows = await db.transaction((tx) => tx.query<{ n: number }>("SELECT 1 AS n"));

    expect(rows).toEqual([{ n: 1 }]);
    expect(client.query.mock.calls.map((call) => call[0])).toEqual(["BEGIN", "SELECT 1 AS n", "COMMIT"]);
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it("rolls back and rethrows the translated error", async () => {
    const { client, pool } = fakePool(async (sql) => {
      if (sql.startsWith("INSERT")) throw pgError("23505");
      return { rows: [] };
    });
    const db = new PgDbClient(pool);

    await expect(db.transaction((tx) => tx.query("INSERT INTO spin_records DEFAULT VALUES"))).rejects.toBeInstanceOf(ConflictError);
    expect(client.query.mock.calls.map((call) => call[0])).toEqual(["BEGIN", "INSERT INTO spin_records DEFAULT VALUES", "ROLLBACK"]);
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it("keeps the original error when the rollback also fails", async () => {
    const { client, pool } = fakePool(async (sql) => {
      if (sql.startsWith("UPDATE")) throw pgError("40001");
      if (sql === "ROLLBACK") throw new Error("connection terminated");
      return { rows: [] };
    });
    const logger = new InMemoryLogger();
    const db = new PgDbClient(pool, logger);

    await expect(db.transaction((tx) => tx.query("UPDATE prizes SET remaining_quantity = 0"))).rejects.toBeInstanceOf(ConflictError);
    expect(logger.lines).toEqual([
      {
        level: "error",
        msg: "db.rollback_failed",
        meta: { error: "connection terminated", cause: "Concurrent write detected (40001)" },
      },
    ]);
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it("reports an unavailable ledger when no connection can be opened", async () => {
    const pool = { connect: vi.fn().mockRejectedValue(pgError("ECONNREFUSED")) } as unknown as Pool;

    await expect(new PgDbClient(pool).transaction(async () => 1)).rejects.toBeInstanceOf(LedgerUnavailableError);
  });
});
