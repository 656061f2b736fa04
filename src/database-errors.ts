import { LedgerError } from "./errors";

/** lock_not_available, deadlock_detected, serialization_failure */
const CONFLICT_SQLSTATES = new Set(["55P03", "40P01", "40001"]);
const UNIQUE_VIOLATION = "23505";

const UNIQUE_CONSTRAINTS: Record<string, "mobile" | "accountNumber"> = {
  accounts_mobile_unique: "mobile",
  accounts_account_number_unique: "accountNumber",
};

export interface DatabaseErrorFields {
  code: string;
  constraint?: string;
}

/**
 * SQLSTATE and constraint name of a pg error, looked up through `cause` when
 * the driver error arrives wrapped.
 */
export function databaseErrorFields(error: unknown): DatabaseErrorFields | undefined {
  if (typeof error !== "object" || error === null) return undefined;
  if ("code" in error && typeof error.code === "string") {
    const constraint =
      "constraint" in error && typeof error.constraint === "string" ? error.constraint : undefined;
    return { code: error.code, constraint };
  }
  return "cause" in error ? databaseErrorFields(error.cause) : undefined;
}

/** Which account column a unique violation hit, if any. */
export function uniqueConflict(error: unknown): "mobile" | "accountNumber" | undefined {
  const fields = databaseErrorFields(error);
  if (fields?.code !== UNIQUE_VIOLATION || fields.constraint === undefined) return undefined;
  return UNIQUE_CONSTRAINTS[fields.constraint];
}

export function translateDatabaseError(error: unknown): unknown {
  const fields = databaseErrorFields(error);
  if (fields && CONFLICT_SQLSTATES.has(fields.code)) {
    return new LedgerError(
      "Concurrent update on the same account; retry the request",
      "CONFLICT",
      { sqlState: fields.code },
      { cause: error }
    );
  }
  return error;
}
