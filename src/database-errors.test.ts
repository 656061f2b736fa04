import { describe, it, expect } from "vitest";
import { databaseErrorFields, translateDatabaseError, uniqueConflict } from "./database-errors";
import { LedgerError } from "./errors";

function pgError(code: string, constraint?: string): Error & { code: string; constraint?: string } {
  return Object.assign(new Error(`pg error ${code}`), { code, constraint });
}

describe("databaseErrorFields", () => {
  it("should read the SQLSTATE and constraint", () => {
    expect(databaseErrorFields(pgError("23505", "accounts_mobile_unique"))).toEqual({
      code: "23505",
      constraint: "accounts_mobile_unique",
    });
  });

  it("should look through a wrapping cause", () => {
    const wrapped = new Error("query failed", { cause: pgError("40P01") });
    expect(databaseErrorFields(wrapped)).toEqual({ code: "40P01", constraint: undefined });
  });

  it("should return undefined for errors without a code", () => {
    expect(databaseErrorFields(new Error("boom"))).toBeUndefined();
    expect(databaseErrorFields("boom")).toBeUndefined();
    expect(databaseErrorFields(null)).toBeUndefined();
  });
});

describe("uniqueConflict", () => {
  it("should map constraint names to the conflicting field", () => {
    expect(uniqueConflict(pgError("23505", "accounts_mobile_unique"))).toBe("mobile");
    expect(uniqueConflict(pgError("23505", "accounts_account_number_unique"))).toBe("accountNumber");
    expect(
      uniqueConflict(new Error("insert failed", { cause: pgError("23505", "accounts_mobile_unique") }))
    ).toBe("mobile");
  });

  it("should ignore other constraints and other SQLSTATEs", () => {
    expect(uniqueConflict(pgError("23505", "transactions_pkey"))).toBeUndefined();
    expect(uniqueConflict(pgError("23505"))).toBeUndefined();
    expect(uniqueConflict(pgError("23514", "accounts_mobile_unique"))).toBeUndefined();
  });
});

describe("translateDatabaseError", () => {
  it.each([["55P03"], ["40P01"], ["40001"]])("should turn SQLSTATE %s into a retryable CONFLICT", (code) => {
    const original = pgError(code);
    const translated = translateDatabaseError(original);

    expect(translated).toBeInstanceOf(LedgerError);
    expect(translated).toMatchObject({
      code: "CONFLICT",
      retryable: true,
      details: { sqlState: code },
      cause: original,
    });
  });

  it("should translate a wrapped lock timeout", () => {
    const translated = translateDatabaseError(new Error("tx failed", { cause: pgError("55P03") }));
    expect(translated).toMatchObject({ code: "CONFLICT" });
  });

  it("should pass other errors through unchanged", () => {
    const checkViolation = pgError("23514", "accounts_balance_non_negative");
    expect(translateDatabaseError(checkViolation)).toBe(checkViolation);
  });
});
