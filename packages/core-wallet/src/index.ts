import type { IdentityAccount, LedgerEntry, LedgerEntryKind } from "@spin-rewards/core-types";
import type { IDbClient } from "@spin-rewards/core-db";
import type { ILockManager } from "@spin-rewards/core-redis";
import { LedgerEntryRepository } from "@spin-rewards/core-ledger";

export interface PostCreditParams {
  /** Signed: positive credits the identity, negative debits it. */
  amount: number;
  kind: LedgerEntryKind;
  reason: string;
  locationId?: string | null;
  at: Date;
}

export interface BalanceIntegrity {
  identityId: string;
  balance: number;
  ledgerSum: number;
  consistent: boolean;
}

export interface AccountLockOptions {
  ttlMs: number;
  waitMs: number;
}

export const CREDIT_ACCOUNT_SERVICE = Symbol("CREDIT_ACCOUNT_SERVICE");

const ACCOUNT_LOCK_KEY = (identityId: string) => `identity:lock:${identityId}`;

export class CreditAccountRepository {
  constructor(private readonly db: IDbClient) {}

  async find(identityId: string): Promise<IdentityAccount | null> {
    const rows = await this.db.query<AccountRow>(`SELECT id, balance, active, version FROM identities WHERE id = $1`, [identityId]);
    return rows.length ? mapAccount(rows[0]) : null;
  }

  async ensure(identityId: string): Promise<void> {
    await this.db.query(
      `INSERT INTO identities (id, balance, active, version) VALUES ($1, 0, TRUE, 0) ON CONFLICT (id) DO NOTHING`,
      [identityId]
    );
  }

  async findOrCreateForUpdate(identityId: string): Promise<IdentityAccount> {
    const rows = await this.db.query<AccountRow>(
      `SELECT id, balance, active, version FROM identities WHERE id = $1 FOR UPDATE`,
      [identityId]
    );
    if (rows.length) {
      return mapAccount(rows[0]);
    }
    const inserted = await this.db.query<AccountRow>(
      `INSERT INTO identities (id, balance, active, version) VALUES ($1, 0, TRUE, 0)
       RETURNING id, balance, active, version`,
      [identityId]
    );
    return mapAccount(inserted[0]);
  }

  async updateBalance(identityId: string, balance: number, version: number, at: Date): Promise<void> {
    await this.db.query(`UPDATE identities SET balance = $1, version = $2, updated_at = $3 WHERE id = $4`, [
      balance,
      version,
      at.toISOString(),
      identityId,
    ]);
  }
}

/**
 * An identity row locked for the remainder of a transaction. Every credit
 * change goes through `post`, which appends the ledger entry and moves the
 * cached balance in the same transaction.
 */
export class AccountSession {
  private current: IdentityAccount;
  private readonly accounts: CreditAccountRepository;
  private readonly ledger: LedgerEntryRepository;

  constructor(readonly tx: IDbClient, account: IdentityAccount) {
    this.current = account;
    this.accounts = new CreditAccountRepository(tx);
    this.ledger = new LedgerEntryRepository(tx);
  }

  get account(): IdentityAccount {
    return { ...this.current };
  }

  async post(params: PostCreditParams): Promise<LedgerEntry> {
    if (!Number.isInteger(params.amount) || params.amount === 0) {
      throw new Error(`Ledger amount must be a non-zero integer, got ${params.amount}`);
    }
    const next = this.current.balance + params.amount;
    if (next < 0) {
      throw new Error("INSUFFICIENT_CREDITS");
    }
    const entry = await this.ledger.append({
      identityId: this.current.id,
      amount: params.amount,
      kind: params.kind,
      reason: params.reason,
      locationId: params.locationId ?? null,
      balanceAfter: next,
      occurredAt: params.at,
    });
    const version = this.current.version + 1;
    await this.accounts.updateBalance(this.current.id, next, version, params.at);
    this.current = { ...this.current, balance: next, version };
    return entry;
  }
}

export interface ICreditAccountService {
  /** Serializes on the identity (distributed lock, then row lock) and runs `fn` in one transaction. */
  withAccount<T>(identityId: string, fn: (session: AccountSession) => Promise<T>): Promise<T>;
  getBalance(identityId: string): Promise<number>;
  getAccount(identityId: string): Promise<IdentityAccount | null>;
  verifyIntegrity(identityId: string): Promise<BalanceIntegrity>;
}

export class CreditAccountService implements ICreditAccountService {
  constructor(
    private readonly db: IDbClient,
    private readonly lock: ILockManager,
    private readonly lockOptions: AccountLockOptions = { ttlMs: 2000, waitMs: 1000 }
  ) {}

  async withAccount<T>(identityId: string, fn: (session: AccountSession) => Promise<T>): Promise<T> {
    return this.lock.withLock(ACCOUNT_LOCK_KEY(identityId), this.lockOptions, () =>
      this.db.transaction(async (tx) => {
        const account = await new CreditAccountRepository(tx).findOrCreateForUpdate(identityId);
        return fn(new AccountSession(tx, account));
      })
    );
  }

  async getBalance(identityId: string): Promise<number> {
    const repo = new CreditAccountRepository(this.db);
    const account = await repo.find(identityId);
    if (account) {
      return account.balance;
    }
    await repo.ensure(identityId);
    return 0;
  }

  async getAccount(identityId: string): Promise<IdentityAccount | null> {
    return new CreditAccountRepository(this.db).find(identityId);
  }

  async verifyIntegrity(identityId: string): Promise<BalanceIntegrity> {
    const account = await this.getAccount(identityId);
    const ledgerSum = await new LedgerEntryRepository(this.db).sumForIdentity(identityId);
    const balance = account?.balance ?? 0;
    return { identityId, balance, ledgerSum, consistent: balance === ledgerSum };
  }
}

interface AccountRow {
  id: string;
  balance: number | string;
  active: boolean;
  version: number | string;
}

function mapAccount(row: AccountRow): IdentityAccount {
  return {
    id: row.id,
    balance: Number(row.balance),
    active: row.active,
    version: Number(row.version),
  };
}
