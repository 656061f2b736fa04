export { Ledger, generateAccountNumber, DEFAULT_LOCK_TIMEOUT_MS, DEFAULT_ACCOUNT_NUMBER_ATTEMPTS } from "./ledger";
export type { LedgerConfig } from "./ledger";
export { LedgerError, LEDGER_ERROR_CODES, isLedgerError } from "./errors";
export type { LedgerErrorCode, LedgerErrorDescriptor } from "./errors";
export { createDatabaseStorage, InMemoryStorage } from "./storage";
export type { DatabaseStorage, InMemoryStorageOptions } from "./storage";
export { loadConfig, createLedgerFromEnv } from "./config";
export type { LedgerServiceConfig } from "./config";
export { createLogger } from "./logger";
export type { Logger } from "./logger";
export { decimalToMinor, formatMinor, normalizeDecimal, parseAmount } from "./money";
export type { AmountInput } from "./money";
export { hashPin, verifyPin, isValidPinFormat } from "./pin";
export { seedDemoAccounts, loadDemoAccounts } from "./seed";
export type { SeedAccount, SeedResult } from "./seed";
export { toAccountView, toTransactionView } from "./views";
export { accounts, transactions, TRANSACTION_TYPES } from "../shared/schema";
export * from "./types";

export const VERSION = "0.1.0";
