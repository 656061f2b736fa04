import { drizzle } from "drizzle-orm/node-postgres";
import pg from "pg";
import { eq, and, or, gte, lte, asc, desc, count, sql, type SQL } from "drizzle-orm";
import { alias } from "drizzle-orm/pg-core";
import { accounts, transactions } from "../shared/schema";
import { translateDatabaseError, uniqueConflict } from "./database-errors";
import { KeyedLock, lockOrder, type Release } from "./lock";
import { decimalToMinor, formatMinor, normalizeDecimal } from "./money";
import type {
  Account,
  AccountTotals,
  AtomicOptions,
  BalanceUpdate,
  InsertAccountResult,
  LedgerStorage,
  LedgerTransaction,
  LedgerUnitOfWork,
  NewAccount,
  NewLedgerTransaction,
  ProfilePatch,
  TransactionFilter,
  TransactionRecord,
} from "./types";

const { Pool } = pg;

export interface DatabaseStorage extends LedgerStorage {
  close(): Promise<void>;
}

export function createDatabaseStorage(connectionString: string): DatabaseStorage {
  const pool = new Pool({ connectionString });
  const db = drizzle(pool);
  const fromAccount = alias(accounts, "from_account");
  const toAccount = alias(accounts, "to_account");

  return {
    async getAccountByNumber(accountNumber: string): Promise<Account | undefined> {
      const [account] = await db
        .select()
        .from(accounts)
        .where(eq(accounts.accountNumber, accountNumber));
      return account || undefined;
    },

    async getAccountByMobile(mobile: string): Promise<Account | undefined> {
      const [account] = await db.select().from(accounts).where(eq(accounts.mobile, mobile));
      return account || undefined;
    },

    async insertAccount(account: NewAccount): Promise<InsertAccountResult> {
      try {
        const [created] = await db.insert(accounts).values(account).returning();
        return { ok: true, account: created };
      } catch (error) {
        const conflict = uniqueConflict(error);
        if (conflict) return { ok: false, conflict };
        throw error;
      }
    },

    async updateAccountProfile(
      accountNumber: string,
      patch: ProfilePatch
    ): Promise<Account | undefined> {
      if (patch.address === undefined && patch.pinHash === undefined) {
        return this.getAccountByNumber(accountNumber);
      }
      const [updated] = await db
        .update(accounts)
        .set(patch)
        .where(eq(accounts.accountNumber, accountNumber))
        .returning();
      return updated || undefined;
    },

    async listAccounts(): Promise<Account[]> {
      return db.select().from(accounts).orderBy(asc(accounts.sequence));
    },

    async getAccountTotals(): Promise<AccountTotals> {
      const [totals] = await db
        .select({
          count: count(),
          totalBalance: sql<string>`coalesce(sum(${accounts.balance}), 0)`,
          totalWalletBalance: sql<string>`coalesce(sum(${accounts.walletBalance}), 0)`,
        })
        .from(accounts);
      return {
        count: totals.count,
        totalBalance: normalizeDecimal(String(totals.totalBalance)),
        totalWalletBalance: normalizeDecimal(String(totals.totalWalletBalance)),
      };
    },

    async queryTransactions(filter: TransactionFilter): Promise<TransactionRecord[]> {
      const conditions: SQL[] = [];
      if (filter.accountId) {
        const touchesAccount = or(
          eq(transactions.fromAccountId, filter.accountId),
          eq(transactions.toAccountId, filter.accountId)
        );
        if (touchesAccount) conditions.push(touchesAccount);
      }
      if (filter.from) conditions.push(gte(transactions.createdAt, filter.from));
      if (filter.to) conditions.push(lte(transactions.createdAt, filter.to));

      return db
        .select({
          id: transactions.id,
          sequence: transactions.sequence,
          type: transactions.type,
          amount: transactions.amount,
          fromAccountNumber: fromAccount.accountNumber,
          toAccountNumber: toAccount.accountNumber,
          merchant: transactions.merchant,
          createdAt: transactions.createdAt,
        })
        .from(transactions)
        .leftJoin(fromAccount, eq(transactions.fromAccountId, fromAccount.id))
        .leftJoin(toAccount, eq(transactions.toAccountId, toAccount.id))
        .where(and(...conditions))
        .orderBy(desc(transactions.createdAt), desc(transactions.sequence));
    },

    async runAtomic<T>(
      accountNumbers: readonly string[],
      options: AtomicOptions,
      work: (unit: LedgerUnitOfWork) => Promise<T>
    ): Promise<T> {
      const ordered = lockOrder(accountNumbers);
      const timeoutMs = Math.max(1, Math.trunc(options.lockTimeoutMs));

      try {
        return await db.transaction(async (tx) => {
          await tx.execute(sql.raw(`SET LOCAL lock_timeout = '${timeoutMs}ms'`));
          for (const accountNumber of ordered) {
            await tx
              .select({ id: accounts.id })
              .from(accounts)
              .where(eq(accounts.accountNumber, accountNumber))
              .for("update");
          }

          return work({
            async getAccount(accountNumber: string): Promise<Account | undefined> {
              const [account] = await tx
                .select()
                .from(accounts)
                .where(eq(accounts.accountNumber, accountNumber));
              return account || undefined;
            },
            async updateBalances(accountId: string, balances: BalanceUpdate): Promise<void> {
              await tx.update(accounts).set(balances).where(eq(accounts.id, accountId));
            },
            async appendTransaction(entry: NewLedgerTransaction): Promise<LedgerTransaction> {
              const [created] = await tx.insert(transactions).values(entry).returning();
              return created;
            },
          });
        });
      } catch (error) {
        throw translateDatabaseError(error);
      }
    },

    async close(): Promise<void> {
      await pool.end();
    },
  };
}

export interface InMemoryStorageOptions {
  /** Source of `createdAt` timestamps. */
  clock?: () => Date;
}

/**
 * Storage held in process memory. Units of work lock accounts with a
 * {@link KeyedLock} and stage their writes until the work resolves, which
 * mirrors the row locking and rollback of the database storage.
 */
export class InMemoryStorage implements LedgerStorage {
  private accounts: Map<string, Account> = new Map();
  private transactions: LedgerTransaction[] = [];
  private accountSequence = 0;
  private transactionSequence = 0;
  private locks = new KeyedLock();
  private clock: () => Date;

  constructor(options: InMemoryStorageOptions = {}) {
    this.clock = options.clock ?? (() => new Date());
  }

  private findByNumber(accountNumber: string): Account | undefined {
    for (const account of this.accounts.values()) {
      if (account.accountNumber === accountNumber) return account;
    }
    return undefined;
  }

  private findByMobile(mobile: string): Account | undefined {
    for (const account of this.accounts.values()) {
      if (account.mobile === mobile) return account;
    }
    return undefined;
  }

  private accountNumberOf(accountId: string | null): string | null {
    if (accountId === null) return null;
    return this.accounts.get(accountId)?.accountNumber ?? null;
  }

  async getAccountByNumber(accountNumber: string): Promise<Account | undefined> {
    const account = this.findByNumber(accountNumber);
    return account ? { ...account } : undefined;
  }

  async getAccountByMobile(mobile: string): Promise<Account | undefined> {
    const account = this.findByMobile(mobile);
    return account ? { ...account } : undefined;
  }

  async insertAccount(account: NewAccount): Promise<InsertAccountResult> {
    if (this.findByMobile(account.mobile)) {
      return { ok: false, conflict: "mobile" };
    }
    if (this.findByNumber(account.accountNumber)) {
      return { ok: false, conflict: "accountNumber" };
    }

    const created: Account = {
      ...account,
      sequence: ++this.accountSequence,
      createdAt: this.clock(),
    };
    this.accounts.set(created.id, created);
    return { ok: true, account: { ...created } };
  }

  async updateAccountProfile(
    accountNumber: string,
    patch: ProfilePatch
  ): Promise<Account | undefined> {
    const account = this.findByNumber(accountNumber);
    if (!account) return undefined;
    if (patch.address !== undefined) account.address = patch.address;
    if (patch.pinHash !== undefined) account.pinHash = patch.pinHash;
    return { ...account };
  }

  async listAccounts(): Promise<Account[]> {
    return [...this.accounts.values()]
      .sort((a, b) => a.sequence - b.sequence)
      .map((account) => ({ ...account }));
  }

  async getAccountTotals(): Promise<AccountTotals> {
    let totalBalance = 0n;
    let totalWalletBalance = 0n;
    for (const account of this.accounts.values()) {
      totalBalance += decimalToMinor(account.balance);
      totalWalletBalance += decimalToMinor(account.walletBalance);
    }
    return {
      count: this.accounts.size,
      totalBalance: formatMinor(totalBalance),
      totalWalletBalance: formatMinor(totalWalletBalance),
    };
  }

  async queryTransactions(filter: TransactionFilter): Promise<TransactionRecord[]> {
    const { accountId, from, to } = filter;
    return this.transactions
      .filter((t) => {
        if (accountId && t.fromAccountId !== accountId && t.toAccountId !== accountId) return false;
        if (from && t.createdAt < from) return false;
        if (to && t.createdAt > to) return false;
        return true;
      })
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.sequence - a.sequence)
      .map((t) => ({
        id: t.id,
        sequence: t.sequence,
        type: t.type,
        amount: t.amount,
        fromAccountNumber: this.accountNumberOf(t.fromAccountId),
        toAccountNumber: this.accountNumberOf(t.toAccountId),
        merchant: t.merchant,
        createdAt: t.createdAt,
      }));
  }

  async runAtomic<T>(
    accountNumbers: readonly string[],
    options: AtomicOptions,
    work: (unit: LedgerUnitOfWork) => Promise<T>
  ): Promise<T> {
    const keys = lockOrder(accountNumbers);
    const releases: Release[] = [];

    try {
      for (const key of keys) {
        releases.push(await this.locks.acquire(key, options.lockTimeoutMs));
      }

      const staged: Map<string, BalanceUpdate> = new Map();
      const appended: LedgerTransaction[] = [];

      const unit: LedgerUnitOfWork = {
        getAccount: async (accountNumber) => {
          if (!keys.includes(accountNumber)) {
            throw new Error(`Account ${accountNumber} is not locked by this unit of work`);
          }
          const account = this.findByNumber(accountNumber);
          if (!account) return undefined;
          return { ...account, ...staged.get(account.id) };
        },
        updateBalances: async (accountId, balances) => {
          const account = this.accounts.get(accountId);
          if (!account || !keys.includes(account.accountNumber)) {
            throw new Error(`Account ${accountId} is not locked by this unit of work`);
          }
          // same guarantees as the table's check constraints
          if (decimalToMinor(balances.balance) < 0n || decimalToMinor(balances.walletBalance) < 0n) {
            throw new Error(`Balance of account ${account.accountNumber} would become negative`);
          }
          staged.set(accountId, { ...balances });
        },
        appendTransaction: async (entry) => {
          if (decimalToMinor(entry.amount) <= 0n) {
            throw new Error("Transaction amount must be positive");
          }
          if (entry.fromAccountId === null && entry.toAccountId === null) {
            throw new Error("Transaction must reference at least one account");
          }
          const created: LedgerTransaction = {
            ...entry,
            sequence: ++this.transactionSequence,
            createdAt: this.clock(),
          };
          appended.push(created);
          return { ...created };
        },
      };

      const result = await work(unit);

      for (const [accountId, balances] of staged) {
        const account = this.accounts.get(accountId);
        if (account) {
          account.balance = balances.balance;
          account.walletBalance = balances.walletBalance;
        }
      }
      this.transactions.push(...appended);
      return result;
    } finally {
      for (const release of releases.reverse()) release();
    }
  }

  clear(): void {
    this.accounts.clear();
    this.transactions = [];
    this.accountSequence = 0;
    this.transactionSequence = 0;
  }
}
