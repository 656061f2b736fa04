import {
  pgTable,
  varchar,
  text,
  timestamp,
  numeric,
  serial,
  date,
  unique,
  index,
  check,
} from "drizzle-orm/pg-core";
import { sql } from "drizzle-orm";

export const TRANSACTION_TYPES = [
  "deposit",
  "withdrawal-to-wallet",
  "transfer",
  "wallet-payment",
  "admin-deposit",
] as const;

export type TransactionType = (typeof TRANSACTION_TYPES)[number];

export const accounts = pgTable("accounts", {
  id: varchar("id", { length: 64 }).primaryKey(),
  sequence: serial("sequence").notNull(),
  accountNumber: varchar("account_number", { length: 20 }).notNull(),
  name: varchar("name", { length: 100 }).notNull(),
  mobile: varchar("mobile", { length: 20 }).notNull(),
  address: varchar("address", { length: 255 }).notNull(),
  dob: date("dob").notNull(),
  nationalId: varchar("national_id", { length: 20 }).notNull(),
  pinHash: text("pin_hash").notNull(),
  balance: numeric("balance", { precision: 14, scale: 2 }).notNull().default("0"),
  walletBalance: numeric("wallet_balance", { precision: 14, scale: 2 }).notNull().default("0"),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
}, (table) => [
  unique("accounts_account_number_unique").on(table.accountNumber),
  unique("accounts_mobile_unique").on(table.mobile),
  index("idx_accounts_sequence").on(table.sequence),
  check("accounts_balance_non_negative", sql`${table.balance} >= 0`),
  check("accounts_wallet_balance_non_negative", sql`${table.walletBalance} >= 0`),
]);

export const transactions = pgTable("transactions", {
  id: varchar("id", { length: 64 }).primaryKey(),
  sequence: serial("sequence").notNull(),
  type: varchar("type", { length: 32 }).$type<TransactionType>().notNull(),
  amount: numeric("amount", { precision: 14, scale: 2 }).notNull(),
  fromAccountId: varchar("from_account_id", { length: 64 }).references(() => accounts.id),
  toAccountId: varchar("to_account_id", { length: 64 }).references(() => accounts.id),
  merchant: varchar("merchant", { length: 100 }),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
}, (table) => [
  index("idx_transactions_from_account").on(table.fromAccountId),
  index("idx_transactions_to_account").on(table.toAccountId),
  index("idx_transactions_created_at").on(table.createdAt, table.sequence),
  check("transactions_amount_positive", sql`${table.amount} > 0`),
  check(
    "transactions_account_reference",
    sql`${table.fromAccountId} IS NOT NULL OR ${table.toAccountId} IS NOT NULL`
  ),
]);

export type Account = typeof accounts.$inferSelect;
export type LedgerTransaction = typeof transactions.$inferSelect;
