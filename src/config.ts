import { z } from "zod";
import { LedgerError } from "./errors";
import { Ledger, DEFAULT_ACCOUNT_NUMBER_ATTEMPTS, DEFAULT_LOCK_TIMEOUT_MS } from "./ledger";
import { createLogger } from "./logger";
import { DEFAULT_PIN_HASH_COST, isValidHashCost } from "./pin";
import { createDatabaseStorage, type DatabaseStorage } from "./storage";

const envSchema = z.object({
  DATABASE_URL: z.string().min(1).optional(),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  LEDGER_LOCK_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_LOCK_TIMEOUT_MS),
  LEDGER_ACCOUNT_NUMBER_ATTEMPTS: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_ACCOUNT_NUMBER_ATTEMPTS),
  LEDGER_PIN_HASH_COST: z.coerce
    .number()
    .refine(isValidHashCost, { message: "must be a power of two greater than 1" })
    .default(DEFAULT_PIN_HASH_COST),
  LEDGER_REQUIRE_DEPOSIT_PIN: z
    .enum(["true", "false"])
    .default("false")
    .transform((value) => value === "true"),
});

export interface LedgerServiceConfig {
  databaseUrl?: string;
  logLevel: string;
  lockTimeoutMs: number;
  maxAccountNumberAttempts: number;
  pinHashCost: number;
  requireDepositPin: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): LedgerServiceConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new LedgerError(`Invalid configuration: ${issues.join("; ")}`, "INVALID_CONFIG", {
      issues,
    });
  }

  const values = parsed.data;
  return {
    databaseUrl: values.DATABASE_URL,
    logLevel: values.LOG_LEVEL,
    lockTimeoutMs: values.LEDGER_LOCK_TIMEOUT_MS,
    maxAccountNumberAttempts: values.LEDGER_ACCOUNT_NUMBER_ATTEMPTS,
    pinHashCost: values.LEDGER_PIN_HASH_COST,
    requireDepositPin: values.LEDGER_REQUIRE_DEPOSIT_PIN,
  };
}

/**
 * Wire a PostgreSQL-backed ledger from environment variables. The caller owns
 * the returned storage and closes it on shutdown.
 */
export function createLedgerFromEnv(env: NodeJS.ProcessEnv = process.env): {
  ledger: Ledger;
  storage: DatabaseStorage;
} {
  const config = loadConfig(env);
  if (!config.databaseUrl) {
    throw new LedgerError("DATABASE_URL is required", "INVALID_CONFIG");
  }

  const storage = createDatabaseStorage(config.databaseUrl);
  const ledger = new Ledger(
    {
      lockTimeoutMs: config.lockTimeoutMs,
      maxAccountNumberAttempts: config.maxAccountNumberAttempts,
      pinHashCost: config.pinHashCost,
      requireDepositPin: config.requireDepositPin,
      logger: createLogger({ level: config.logLevel }),
    },
    storage
  );
  return { ledger, storage };
}
