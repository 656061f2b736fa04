import { randomInt } from "node:crypto";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import { isCalendarDate, startOfDay, endOfDay } from "./dates";
import { LedgerError, isLedgerError } from "./errors";
import { createLogger, type Logger } from "./logger";
import { assertWithinLimit, decimalToMinor, formatMinor, parseAmount } from "./money";
import {
  DEFAULT_PIN,
  DEFAULT_PIN_HASH_COST,
  hashPin,
  isValidHashCost,
  isValidPinFormat,
  verifyPin,
} from "./pin";
import { toAccountView } from "./views";
import type {
  Account,
  AccountProfile,
  AccountView,
  AdminDepositParams,
  AdminStats,
  CreateAccountParams,
  DepositParams,
  IntegrityReport,
  LedgerStorage,
  LedgerTransaction,
  LedgerUnitOfWork,
  TransactionQuery,
  TransactionRecord,
  TransactionType,
  TransferParams,
  UpdateAccountParams,
  WalletPayParams,
  WithdrawWalletParams,
} from "./types";

export interface LedgerConfig {
  /** Upper bound on waiting for an account lock before failing with CONFLICT. */
  lockTimeoutMs?: number;
  /** Random account-number draws before giving up with EXHAUSTED_KEYSPACE. */
  maxAccountNumberAttempts?: number;
  /** scrypt cost (N) for newly hashed PINs. */
  pinHashCost?: number;
  /** Reject deposits that carry no PIN; administrative deposits then go through adminDeposit. */
  requireDepositPin?: boolean;
  logger?: Logger;
  generateAccountNumber?: () => string;
}

export const DEFAULT_LOCK_TIMEOUT_MS = 5000;
export const DEFAULT_ACCOUNT_NUMBER_ATTEMPTS = 16;

const ACCOUNT_NUMBER_PATTERN = /^[1-9]\d{7}$/;
const MERCHANT_MAX_LENGTH = 100;

export function generateAccountNumber(): string {
  return String(randomInt(10_000_000, 100_000_000));
}

const profileSchema = z.object({
  name: z.string().trim().min(1).max(100),
  mobile: z.string().trim().min(1).max(20),
  address: z.string().trim().min(1).max(255),
  dob: z.string().refine(isCalendarDate, { message: "dob must be a YYYY-MM-DD date" }),
  nationalId: z.string().trim().min(1).max(20),
});

const addressSchema = z.string().trim().min(1).max(255);

function validationError(error: z.ZodError): LedgerError {
  const issues = error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
  const summary = issues.map((issue) => `${issue.path}: ${issue.message}`).join("; ");
  return new LedgerError(`Invalid account details: ${summary}`, "INVALID_INPUT", { issues });
}

function toRecord(
  entry: LedgerTransaction,
  fromAccountNumber: string | null,
  toAccountNumber: string | null
): TransactionRecord {
  return {
    id: entry.id,
    sequence: entry.sequence,
    type: entry.type,
    amount: entry.amount,
    fromAccountNumber,
    toAccountNumber,
    merchant: entry.merchant,
    createdAt: entry.createdAt,
  };
}

async function lockedAccount(unit: LedgerUnitOfWork, accountNumber: string): Promise<Account> {
  const account = await unit.getAccount(accountNumber);
  if (!account) {
    throw new LedgerError(`Account ${accountNumber} not found`, "NOT_FOUND", { accountNumber });
  }
  return account;
}

export class Ledger {
  private storage: LedgerStorage;
  private logger: Logger;
  private lockTimeoutMs: number;
  private maxAccountNumberAttempts: number;
  private pinHashCost: number;
  private requireDepositPin: boolean;
  private nextAccountNumber: () => string;

  constructor(config: LedgerConfig, storage: LedgerStorage) {
    const lockTimeoutMs = config.lockTimeoutMs ?? DEFAULT_LOCK_TIMEOUT_MS;
    if (!Number.isFinite(lockTimeoutMs) || lockTimeoutMs <= 0) {
      throw new LedgerError("lockTimeoutMs must be a positive number", "INVALID_CONFIG", {
        lockTimeoutMs,
      });
    }
    const attempts = config.maxAccountNumberAttempts ?? DEFAULT_ACCOUNT_NUMBER_ATTEMPTS;
    if (!Number.isInteger(attempts) || attempts < 1) {
      throw new LedgerError("maxAccountNumberAttempts must be a positive integer", "INVALID_CONFIG", {
        maxAccountNumberAttempts: attempts,
      });
    }
    const pinHashCost = config.pinHashCost ?? DEFAULT_PIN_HASH_COST;
    if (!isValidHashCost(pinHashCost)) {
      throw new LedgerError("pinHashCost must be a power of two greater than 1", "INVALID_CONFIG", {
        pinHashCost,
      });
    }

    this.storage = storage;
    this.logger = config.logger ?? createLogger();
    this.lockTimeoutMs = lockTimeoutMs;
    this.maxAccountNumberAttempts = attempts;
    this.pinHashCost = pinHashCost;
    this.requireDepositPin = config.requireDepositPin ?? false;
    this.nextAccountNumber = config.generateAccountNumber ?? generateAccountNumber;
  }

  async createAccount(params: CreateAccountParams): Promise<AccountView> {
    const parsed = profileSchema.safeParse(params);
    if (!parsed.success) {
      throw validationError(parsed.error);
    }
    const profile = parsed.data;

    const pin = params.pin ?? DEFAULT_PIN;
    if (!isValidPinFormat(pin)) {
      throw new LedgerError("PIN must be 4 digits", "INVALID_PIN");
    }
    if (params.accountNumber !== undefined && !ACCOUNT_NUMBER_PATTERN.test(params.accountNumber)) {
      throw new LedgerError("Account number must be 8 digits", "INVALID_INPUT", {
        accountNumber: params.accountNumber,
      });
    }
    if (await this.storage.getAccountByMobile(profile.mobile)) {
      throw this.duplicateMobile(profile.mobile);
    }

    const pinHash = await hashPin(pin, this.pinHashCost);

    if (params.accountNumber !== undefined) {
      const account = await this.insertAccount(params.accountNumber, profile, pinHash);
      if (!account) {
        throw new LedgerError(
          `Account ${params.accountNumber} already exists`,
          "ACCOUNT_EXISTS",
          { accountNumber: params.accountNumber }
        );
      }
      return account;
    }

    for (let attempt = 1; attempt <= this.maxAccountNumberAttempts; attempt++) {
      const candidate = this.nextAccountNumber();
      if (await this.storage.getAccountByNumber(candidate)) {
        this.logger.debug({ attempt }, "account number collision, drawing again");
        continue;
      }
      const account = await this.insertAccount(candidate, profile, pinHash);
      if (account) return account;
    }

    this.logger.error(
      { attempts: this.maxAccountNumberAttempts },
      "could not find an unused account number"
    );
    throw new LedgerError(
      `No unused account number found after ${this.maxAccountNumberAttempts} attempts`,
      "EXHAUSTED_KEYSPACE",
      { attempts: this.maxAccountNumberAttempts }
    );
  }

  /** Returns undefined when the account number is taken. */
  private async insertAccount(
    accountNumber: string,
    profile: AccountProfile,
    pinHash: string
  ): Promise<AccountView | undefined> {
    const result = await this.storage.insertAccount({
      id: uuidv4(),
      accountNumber,
      ...profile,
      pinHash,
      balance: "0.00",
      walletBalance: "0.00",
    });

    if (!result.ok) {
      if (result.conflict === "mobile") throw this.duplicateMobile(profile.mobile);
      return undefined;
    }

    this.logger.info({ accountNumber }, "account created");
    return toAccountView(result.account);
  }

  private duplicateMobile(mobile: string): LedgerError {
    return new LedgerError(
      "Account with this mobile already exists",
      "DUPLICATE_MOBILE",
      { mobile }
    );
  }

  async getAccount(accountNumber: string): Promise<AccountView> {
    return toAccountView(await this.requireAccount(accountNumber));
  }

  async getAccountByMobile(mobile: string): Promise<AccountView> {
    const account = await this.storage.getAccountByMobile(mobile);
    if (!account) {
      throw new LedgerError("No account with this mobile", "NOT_FOUND", { mobile });
    }
    return toAccountView(account);
  }

  async updateAccount(accountNumber: string, params: UpdateAccountParams): Promise<AccountView> {
    if (params.pin !== undefined && !isValidPinFormat(params.pin)) {
      throw new LedgerError("PIN must be 4 digits", "INVALID_PIN");
    }

    let address: string | undefined;
    if (params.address !== undefined) {
      const parsed = addressSchema.safeParse(params.address);
      if (!parsed.success) {
        throw new LedgerError("Address must be 1 to 255 characters", "INVALID_INPUT", {
          address: params.address,
        });
      }
      address = parsed.data;
    }

    const pinHash =
      params.pin !== undefined ? await hashPin(params.pin, this.pinHashCost) : undefined;
    const updated = await this.storage.updateAccountProfile(accountNumber, { address, pinHash });
    if (!updated) {
      throw new LedgerError(`Account ${accountNumber} not found`, "NOT_FOUND", { accountNumber });
    }

    this.logger.info(
      { accountNumber, addressChanged: address !== undefined, pinChanged: pinHash !== undefined },
      "account updated"
    );
    return toAccountView(updated);
  }

  async listAccounts(): Promise<AccountView[]> {
    const accounts = await this.storage.listAccounts();
    return accounts.map(toAccountView);
  }

  async adminStats(): Promise<AdminStats> {
    const totals = await this.storage.getAccountTotals();
    return {
      totalCustomers: totals.count,
      totalBankBalance: totals.totalBalance,
      totalWalletBalance: totals.totalWalletBalance,
    };
  }

  /**
   * Customer sign-in. An unknown mobile and a wrong PIN fail the same way.
   */
  async authenticate(mobile: string, pin: string): Promise<AccountView> {
    const account = await this.storage.getAccountByMobile(mobile);
    if (!account || !isValidPinFormat(pin) || !(await verifyPin(pin, account.pinHash))) {
      this.logger.warn({ mobile }, "sign-in rejected");
      throw new LedgerError("Invalid mobile or PIN", "INVALID_PIN");
    }
    return toAccountView(account);
  }

  async deposit(params: DepositParams): Promise<TransactionRecord> {
    const { accountNumber, pin } = params;
    return this.execute("deposit", [accountNumber], async () => {
      const amount = parseAmount(params.amount);
      if (pin === undefined && this.requireDepositPin) {
        throw new LedgerError("PIN is required for deposits", "INVALID_PIN", { accountNumber });
      }
      if (pin !== undefined) {
        await this.assertPin(accountNumber, pin);
      }

      return this.atomically([accountNumber], async (unit) => {
        const account = await lockedAccount(unit, accountNumber);
        const balance = decimalToMinor(account.balance) + amount;
        assertWithinLimit(balance, accountNumber);

        await unit.updateBalances(account.id, {
          balance: formatMinor(balance),
          walletBalance: account.walletBalance,
        });
        const entry = await unit.appendTransaction({
          id: uuidv4(),
          type: "deposit",
          amount: formatMinor(amount),
          fromAccountId: null,
          toAccountId: account.id,
          merchant: null,
        });
        return toRecord(entry, null, accountNumber);
      });
    });
  }

  async withdrawWallet(params: WithdrawWalletParams): Promise<TransactionRecord> {
    const { accountNumber, pin } = params;
    return this.execute("withdrawal-to-wallet", [accountNumber], async () => {
      const amount = parseAmount(params.amount);
      await this.assertPin(accountNumber, pin);

      return this.atomically([accountNumber], async (unit) => {
        const account = await lockedAccount(unit, accountNumber);
        const balance = decimalToMinor(account.balance);
        if (amount > balance) {
          throw this.insufficientFunds(accountNumber, "bank", balance, amount);
        }
        const walletBalance = decimalToMinor(account.walletBalance) + amount;
        assertWithinLimit(walletBalance, accountNumber);

        await unit.updateBalances(account.id, {
          balance: formatMinor(balance - amount),
          walletBalance: formatMinor(walletBalance),
        });
        const entry = await unit.appendTransaction({
          id: uuidv4(),
          type: "withdrawal-to-wallet",
          amount: formatMinor(amount),
          fromAccountId: account.id,
          toAccountId: null,
          merchant: null,
        });
        return toRecord(entry, accountNumber, null);
      });
    });
  }

  async transfer(params: TransferParams): Promise<TransactionRecord> {
    const { fromAccountNumber, toAccountNumber, pin } = params;
    return this.execute("transfer", [fromAccountNumber, toAccountNumber], async () => {
      if (fromAccountNumber === toAccountNumber) {
        throw new LedgerError("Cannot transfer to same account", "SAME_ACCOUNT", {
          accountNumber: fromAccountNumber,
        });
      }
      const amount = parseAmount(params.amount);
      await this.requireAccount(toAccountNumber);
      await this.assertPin(fromAccountNumber, pin);

      return this.atomically([fromAccountNumber, toAccountNumber], async (unit) => {
        const source = await lockedAccount(unit, fromAccountNumber);
        const destination = await lockedAccount(unit, toAccountNumber);

        const sourceBalance = decimalToMinor(source.balance);
        if (amount > sourceBalance) {
          throw this.insufficientFunds(fromAccountNumber, "bank", sourceBalance, amount);
        }
        const destinationBalance = decimalToMinor(destination.balance) + amount;
        assertWithinLimit(destinationBalance, toAccountNumber);

        await unit.updateBalances(source.id, {
          balance: formatMinor(sourceBalance - amount),
          walletBalance: source.walletBalance,
        });
        await unit.updateBalances(destination.id, {
          balance: formatMinor(destinationBalance),
          walletBalance: destination.walletBalance,
        });
        const entry = await unit.appendTransaction({
          id: uuidv4(),
          type: "transfer",
          amount: formatMinor(amount),
          fromAccountId: source.id,
          toAccountId: destination.id,
          merchant: null,
        });
        return toRecord(entry, fromAccountNumber, toAccountNumber);
      });
    });
  }

  /**
   * Pay a merchant from the wallet balance. No PIN is asked for; the wallet
   * balance caps what can be spent this way.
   */
  async walletPay(params: WalletPayParams): Promise<TransactionRecord> {
    const { accountNumber } = params;
    return this.execute("wallet-payment", [accountNumber], async () => {
      const merchant = params.merchant.trim();
      if (merchant.length === 0 || merchant.length > MERCHANT_MAX_LENGTH) {
        throw new LedgerError(
          `Merchant must be 1 to ${MERCHANT_MAX_LENGTH} characters`,
          "INVALID_INPUT",
          { merchant: params.merchant }
        );
      }
      const amount = parseAmount(params.amount);

      return this.atomically([accountNumber], async (unit) => {
        const account = await lockedAccount(unit, accountNumber);
        const walletBalance = decimalToMinor(account.walletBalance);
        if (amount > walletBalance) {
          throw this.insufficientFunds(accountNumber, "wallet", walletBalance, amount);
        }

        await unit.updateBalances(account.id, {
          balance: account.balance,
          walletBalance: formatMinor(walletBalance - amount),
        });
        const entry = await unit.appendTransaction({
          id: uuidv4(),
          type: "wallet-payment",
          amount: formatMinor(amount),
          fromAccountId: account.id,
          toAccountId: null,
          merchant,
        });
        return toRecord(entry, accountNumber, null);
      });
    });
  }

  async adminDeposit(params: AdminDepositParams): Promise<TransactionRecord> {
    const { accountNumber } = params;
    return this.execute("admin-deposit", [accountNumber], async () => {
      const amount = parseAmount(params.amount);

      return this.atomically([accountNumber], async (unit) => {
        const account = await lockedAccount(unit, accountNumber);
        const balance = decimalToMinor(account.balance) + amount;
        assertWithinLimit(balance, accountNumber);

        await unit.updateBalances(account.id, {
          balance: formatMinor(balance),
          walletBalance: account.walletBalance,
        });
        const entry = await unit.appendTransaction({
          id: uuidv4(),
          type: "admin-deposit",
          amount: formatMinor(amount),
          fromAccountId: null,
          toAccountId: account.id,
          merchant: null,
        });
        return toRecord(entry, null, accountNumber);
      });
    });
  }

  async listTransactions(query: TransactionQuery = {}): Promise<TransactionRecord[]> {
    const from = query.startDate !== undefined ? startOfDay(query.startDate) : undefined;
    const to = query.endDate !== undefined ? endOfDay(query.endDate) : undefined;

    let accountId: string | undefined;
    if (query.accountNumber !== undefined) {
      accountId = (await this.requireAccount(query.accountNumber)).id;
    }

    return this.storage.queryTransactions({ accountId, from, to });
  }

  /**
   * Replay every transaction touching the account from a zero opening balance
   * and compare the result with the stored balances.
   */
  async verifyAccountIntegrity(accountNumber: string): Promise<IntegrityReport> {
    const account = await this.requireAccount(accountNumber);
    const history = await this.storage.queryTransactions({ accountId: account.id });
    const errors: string[] = [];

    let calculatedBalance = 0n;
    let calculatedWalletBalance = 0n;
    for (const entry of [...history].reverse()) {
      const amount = decimalToMinor(entry.amount);
      if (amount <= 0n) {
        errors.push(`Transaction ${entry.id} has non-positive amount ${entry.amount}`);
      }
      const incoming = entry.toAccountNumber === accountNumber;
      const outgoing = entry.fromAccountNumber === accountNumber;

      switch (entry.type) {
        case "deposit":
        case "admin-deposit":
          calculatedBalance += amount;
          break;
        case "transfer":
          if (incoming) calculatedBalance += amount;
          if (outgoing) calculatedBalance -= amount;
          break;
        case "withdrawal-to-wallet":
          calculatedBalance -= amount;
          calculatedWalletBalance += amount;
          break;
        case "wallet-payment":
          calculatedWalletBalance -= amount;
          break;
      }

      if (calculatedBalance < 0n || calculatedWalletBalance < 0n) {
        errors.push(`Balance went negative after transaction ${entry.id}`);
      }
    }

    const balance = decimalToMinor(account.balance);
    const walletBalance = decimalToMinor(account.walletBalance);
    if (balance !== calculatedBalance) {
      errors.push(
        `Balance mismatch: stored ${formatMinor(balance)}, calculated ${formatMinor(calculatedBalance)}`
      );
    }
    if (walletBalance !== calculatedWalletBalance) {
      errors.push(
        `Wallet balance mismatch: stored ${formatMinor(walletBalance)}, calculated ${formatMinor(calculatedWalletBalance)}`
      );
    }

    return {
      valid: errors.length === 0,
      accountNumber,
      balance: formatMinor(balance),
      walletBalance: formatMinor(walletBalance),
      calculatedBalance: formatMinor(calculatedBalance),
      calculatedWalletBalance: formatMinor(calculatedWalletBalance),
      transactionCount: history.length,
      errors,
    };
  }

  private async requireAccount(accountNumber: string): Promise<Account> {
    const account = await this.storage.getAccountByNumber(accountNumber);
    if (!account) {
      throw new LedgerError(`Account ${accountNumber} not found`, "NOT_FOUND", { accountNumber });
    }
    return account;
  }

  private async assertPin(accountNumber: string, pin: string): Promise<void> {
    const account = await this.requireAccount(accountNumber);
    if (!isValidPinFormat(pin) || !(await verifyPin(pin, account.pinHash))) {
      throw new LedgerError("Invalid PIN", "INVALID_PIN", { accountNumber });
    }
  }

  private insufficientFunds(
    accountNumber: string,
    balance: "bank" | "wallet",
    available: bigint,
    requested: bigint
  ): LedgerError {
    const label = balance === "bank" ? "balance" : "wallet balance";
    return new LedgerError(`Insufficient ${label}`, "INSUFFICIENT_FUNDS", {
      accountNumber,
      balance,
      available: formatMinor(available),
      requested: formatMinor(requested),
    });
  }

  private atomically(
    accountNumbers: string[],
    work: (unit: LedgerUnitOfWork) => Promise<TransactionRecord>
  ): Promise<TransactionRecord> {
    return this.storage.runAtomic(accountNumbers, { lockTimeoutMs: this.lockTimeoutMs }, work);
  }

  private async execute(
    type: TransactionType,
    accountNumbers: string[],
    operation: () => Promise<TransactionRecord>
  ): Promise<TransactionRecord> {
    try {
      const record = await operation();
      this.logger.info(
        {
          transactionId: record.id,
          type,
          amount: record.amount,
          fromAccount: record.fromAccountNumber,
          toAccount: record.toAccountNumber,
        },
        "transaction committed"
      );
      return record;
    } catch (error) {
      if (isLedgerError(error)) {
        this.logger.warn(
          { type, accountNumbers, code: error.code, retryable: error.retryable },
          `${type} rejected: ${error.message}`
        );
      } else {
        this.logger.error({ err: error, type, accountNumbers }, `${type} failed`);
      }
      throw error;
    }
  }
}
