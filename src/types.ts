import type { Account, LedgerTransaction, TransactionType } from "../shared/schema";
import type { AmountInput } from "./money";

export type { Account, LedgerTransaction, TransactionType };

export interface AccountProfile {
  name: string;
  mobile: string;
  address: string;
  /** Calendar date, `YYYY-MM-DD`. */
  dob: string;
  nationalId: string;
}

export interface CreateAccountParams extends AccountProfile {
  /** Defaults to "0000" when omitted. */
  pin?: string;
  /** Fixed account number; a random unused one is drawn when omitted. */
  accountNumber?: string;
}

export interface UpdateAccountParams {
  address?: string;
  pin?: string;
}

export interface DepositParams {
  accountNumber: string;
  amount: AmountInput;
  pin?: string;
}

export interface WithdrawWalletParams {
  accountNumber: string;
  amount: AmountInput;
  pin: string;
}

export interface TransferParams {
  fromAccountNumber: string;
  toAccountNumber: string;
  amount: AmountInput;
  pin: string;
}

export interface WalletPayParams {
  accountNumber: string;
  amount: AmountInput;
  merchant: string;
}

export interface AdminDepositParams {
  accountNumber: string;
  amount: AmountInput;
}

export interface TransactionQuery {
  accountNumber?: string;
  /** Inclusive calendar day, `YYYY-MM-DD`. */
  startDate?: string;
  /** Inclusive calendar day, `YYYY-MM-DD`. */
  endDate?: string;
}

/** Account as exposed to callers: no surrogate id, no PIN hash. */
export interface AccountView {
  accountNumber: string;
  name: string;
  mobile: string;
  address: string;
  dob: string;
  nationalId: string;
  balance: string;
  walletBalance: string;
}

export interface TransactionRecord {
  id: string;
  sequence: number;
  type: TransactionType;
  amount: string;
  fromAccountNumber: string | null;
  toAccountNumber: string | null;
  merchant: string | null;
  createdAt: Date;
}

export interface TransactionView {
  date: string;
  type: TransactionType;
  amount: string;
  fromAccount: string | null;
  toAccount: string | null;
}

export interface AdminStats {
  totalCustomers: number;
  totalBankBalance: string;
  totalWalletBalance: string;
}

export interface IntegrityReport {
  valid: boolean;
  accountNumber: string;
  balance: string;
  walletBalance: string;
  calculatedBalance: string;
  calculatedWalletBalance: string;
  transactionCount: number;
  errors: string[];
}

export type NewAccount = Omit<Account, "sequence" | "createdAt">;
export type NewLedgerTransaction = Omit<LedgerTransaction, "sequence" | "createdAt">;

export interface BalanceUpdate {
  balance: string;
  walletBalance: string;
}

export interface ProfilePatch {
  address?: string;
  pinHash?: string;
}

export type InsertAccountResult =
  | { ok: true; account: Account }
  | { ok: false; conflict: "mobile" | "accountNumber" };

export interface AccountTotals {
  count: number;
  totalBalance: string;
  totalWalletBalance: string;
}

export interface TransactionFilter {
  accountId?: string;
  from?: Date;
  to?: Date;
}

export interface AtomicOptions {
  lockTimeoutMs: number;
}

/**
 * Work performed while the requested account rows are locked. Nothing written
 * through it is visible to other readers until the unit commits.
 */
export interface LedgerUnitOfWork {
  getAccount(accountNumber: string): Promise<Account | undefined>;
  updateBalances(accountId: string, balances: BalanceUpdate): Promise<void>;
  appendTransaction(entry: NewLedgerTransaction): Promise<LedgerTransaction>;
}

export interface LedgerStorage {
  getAccountByNumber(accountNumber: string): Promise<Account | undefined>;
  getAccountByMobile(mobile: string): Promise<Account | undefined>;
  insertAccount(account: NewAccount): Promise<InsertAccountResult>;
  updateAccountProfile(accountNumber: string, patch: ProfilePatch): Promise<Account | undefined>;
  listAccounts(): Promise<Account[]>;
  getAccountTotals(): Promise<AccountTotals>;
  queryTransactions(filter: TransactionFilter): Promise<TransactionRecord[]>;
  /**
   * Lock the given accounts in ascending account-number order, run `work`,
   * and commit everything it wrote, or nothing if it throws.
   */
  runAtomic<T>(
    accountNumbers: readonly string[],
    options: AtomicOptions,
    work: (unit: LedgerUnitOfWork) => Promise<T>
  ): Promise<T>;
}
