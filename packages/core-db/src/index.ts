import { Global, Module } from "@nestjs/common";
import { ConfigModule, ConfigService } from "@nestjs/config";
import { Pool, PoolClient } from "pg";
import { ConflictError, LedgerUnavailableError } from "@spin-rewards/core-errors";
import { LOGGER } from "@spin-rewards/core-logging";
import type { ILogger } from "@spin-rewards/core-logging";

export interface IDbClient {
  query<T = unknown>(sql: string, params?: unknown[]): Promise<T[]>;
  transaction<T>(fn: (tx: IDbClient) => Promise<T>): Promise<T>;
}

export const DB_CLIENT = Symbol("DB_CLIENT");

// serialization_failure, deadlock_detected, unique_violation
const CONFLICT_SQLSTATES = new Set(["40001", "40P01", "23505"]);
const UNAVAILABLE_ERRNOS = new Set(["ECONNREFUSED", "ECONNRESET", "ETIMEDOUT", "ENOTFOUND", "57P01", "57P03", "08006", "08001"]);

function errorCode(err: unknown): string | undefined {
  if (err && typeof err === "object" && "code" in err) {
    return typeof err.code === "string" ? err.code : undefined;
  }
  return undefined;
}

/**
 * Maps driver errors onto the engine's taxonomy. Conflicts are retryable by the
 * orchestrators; unavailability is surfaced to the caller as fatal.
 */
export function translateDbError(err: unknown): unknown {
  if (err instanceof ConflictError || err instanceof LedgerUnavailableError) {
    return err;
  }
  const code = errorCode(err);
  if (code && CONFLICT_SQLSTATES.has(code)) {
    return new ConflictError(`Concurrent write detected (${code})`, code);
  }
  if (code && UNAVAILABLE_ERRNOS.has(code)) {
    return new LedgerUnavailableError(`Ledger store unavailable (${code})`, err);
  }
  return err;
}

export class PgDbClient implements IDbClient {
  constructor(private readonly pool: Pool, private readonly logger?: ILogger) {}

  async query<T = unknown>(sql: string, params: unknown[] = []): Promise<T[]> {
    try {
      const result = await this.pool.query(sql, params);
      return result.rows as T[];
    } catch (err) {
      throw translateDbError(err);
    }
  }

  async transaction<T>(fn: (tx: IDbClient) => Promise<T>): Promise<T> {
    let client: PoolClient;
    try {
      client = await this.pool.connect();
    } catch (err) {
      throw new LedgerUnavailableError("Unable to open a ledger connection", err);
    }
    try {
      await client.query("BEGIN");
      const txClient: IDbClient = {
        query: async <R = unknown>(sql: string, params: unknown[] = []) => {
          const result = await client.query(sql, params);
          return result.rows as R[];
        },
        transaction: async () => {
          throw new Error("Nested transactions are not supported in PgDbClient");
        },
      };
      const result = await fn(txClient);
      await client.query("COMMIT");
      return result;
    } catch (err) {
      const translated = translateDbError(err);
      try {
        await client.query("ROLLBACK");
      } catch (rollbackErr) {
        this.logger?.error("db.rollback_failed", {
          error: rollbackErr instanceof Error ? rollbackErr.message : String(rollbackErr),
          cause: translated instanceof Error ? translated.message : String(translated),
        });
      }
      throw translated;
    } finally {
      client.release();
    }
  }
}

export interface DbModuleOptions {
  connectionString?: string;
  maxConnections?: number;
  statementTimeoutMs?: number;
}

export const dbModuleOptionsToken = Symbol("DB_MODULE_OPTIONS");

@Global()
@Module({
  imports: [ConfigModule.forRoot({ isGlobal: true })],
  providers: [
    {
      provide: DB_CLIENT,
      inject: [ConfigService, dbModuleOptionsToken, LOGGER],
      useFactory: (config: ConfigService, options: DbModuleOptions | undefined, logger: ILogger) => {
        const connectionString = options?.connectionString ?? config.get<string>("DATABASE_URL");
        if (!connectionString) {
          throw new Error("DATABASE_URL is not configured");
        }
        const pool = new Pool({
          connectionString,
          max: options?.maxConnections ?? (Number(config.get("DB_MAX_CONNECTIONS")) || 10),
          statement_timeout: options?.statementTimeoutMs ?? (Number(config.get("DB_STATEMENT_TIMEOUT_MS")) || 5000),
        });
        return new PgDbClient(pool, logger);
      },
    },
  ],
  exports: [DB_CLIENT],
})
export class DbModule {
  static forRoot(options?: DbModuleOptions) {
    return {
      module: DbModule,
      providers: [
        {
          provide: dbModuleOptionsToken,
          useValue: options ?? {},
        },
      ],
    };
  }
}
