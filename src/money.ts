import { LedgerError } from "./errors";

/**
 * Monetary values travel as decimal strings with two fractional digits
 * ("5100.00") and are added and compared as integer cents.
 */
export type AmountInput = string | number;

const DECIMAL_PATTERN = /^(\d+)(?:\.(\d{1,2}))?$/;

/** Largest value a numeric(14, 2) column holds, in cents. */
export const MAX_MINOR_UNITS = 10n ** 14n - 1n;

export function decimalToMinor(value: string): bigint {
  const match = DECIMAL_PATTERN.exec(value.trim());
  if (!match) {
    throw new LedgerError(`Invalid decimal amount: ${value}`, "INVALID_AMOUNT", { value });
  }
  const whole = match[1];
  const fraction = (match[2] ?? "").padEnd(2, "0");
  return BigInt(whole) * 100n + BigInt(fraction);
}

export function formatMinor(minor: bigint): string {
  const sign = minor < 0n ? "-" : "";
  const magnitude = minor < 0n ? -minor : minor;
  const cents = (magnitude % 100n).toString().padStart(2, "0");
  return `${sign}${magnitude / 100n}.${cents}`;
}

export function normalizeDecimal(value: string): string {
  return formatMinor(decimalToMinor(value));
}

/**
 * Parse a caller-supplied amount. Numbers are accepted only when their
 * shortest decimal rendering has at most two fractional digits.
 */
export function parseAmount(value: AmountInput): bigint {
  if (typeof value === "number" && !Number.isFinite(value)) {
    throw new LedgerError(`Invalid amount: ${value}`, "INVALID_AMOUNT", { amount: value });
  }

  const text = String(value);
  if (!DECIMAL_PATTERN.test(text.trim())) {
    throw new LedgerError(
      `Invalid amount: ${text}. Expected a positive decimal with at most 2 fractional digits`,
      "INVALID_AMOUNT",
      { amount: text }
    );
  }

  const minor = decimalToMinor(text);
  if (minor <= 0n) {
    throw new LedgerError("Amount must be greater than zero", "INVALID_AMOUNT", { amount: text });
  }
  if (minor > MAX_MINOR_UNITS) {
    throw new LedgerError(`Amount ${text} exceeds the supported maximum`, "INVALID_AMOUNT", {
      amount: text,
    });
  }
  return minor;
}

export function assertWithinLimit(minor: bigint, accountNumber: string): void {
  if (minor > MAX_MINOR_UNITS) {
    throw new LedgerError(
      `Balance of account ${accountNumber} would exceed the supported maximum`,
      "INVALID_AMOUNT",
      { accountNumber }
    );
  }
}
