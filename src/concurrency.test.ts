import { describe, it, expect, beforeEach } from "vitest";
import { Ledger } from "./ledger";
import { isLedgerError } from "./errors";
import { createLogger } from "./logger";
import { decimalToMinor, formatMinor } from "./money";
import { InMemoryStorage } from "./storage";
import type { TransactionRecord } from "./types";

const logger = createLogger({ level: "silent" });

const HOLDERS = [
  { accountNumber: "11111111", mobile: "5550000001", pin: "1111" },
  { accountNumber: "22222222", mobile: "5550000002", pin: "2222" },
  { accountNumber: "33333333", mobile: "5550000003", pin: "3333" },
];

function mulberry32(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

describe("concurrent ledger operations", () => {
  let storage: InMemoryStorage;
  let ledger: Ledger;

  beforeEach(async () => {
    storage = new InMemoryStorage();
    ledger = new Ledger({ logger, pinHashCost: 1024 }, storage);
    for (const holder of HOLDERS) {
      await ledger.createAccount({
        ...holder,
        name: `Holder ${holder.pin}`,
        address: "1 Test Lane",
        dob: "1990-01-01",
        nationalId: `ID-${holder.pin}`,
      });
      await ledger.adminDeposit({ accountNumber: holder.accountNumber, amount: "1000.00" });
    }
  });

  it("should settle opposing transfers without deadlock or lost updates", async () => {
    const transfers: Promise<TransactionRecord>[] = [];
    for (let i = 0; i < 20; i++) {
      transfers.push(
        ledger.transfer({
          fromAccountNumber: "11111111",
          toAccountNumber: "22222222",
          amount: "10.00",
          pin: "1111",
        }),
        ledger.transfer({
          fromAccountNumber: "22222222",
          toAccountNumber: "11111111",
          amount: "10.00",
          pin: "2222",
        })
      );
    }

    const results = await Promise.all(transfers);

    expect(results).toHaveLength(40);
    expect((await ledger.getAccount("11111111")).balance).toBe("1000.00");
    expect((await ledger.getAccount("22222222")).balance).toBe("1000.00");
    expect(await ledger.listTransactions({ accountNumber: "11111111" })).toHaveLength(41);
  });

  it("should not let concurrent withdrawals overdraw an account", async () => {
    await ledger.withdrawWallet({ accountNumber: "11111111", amount: "500.00", pin: "1111" });

    const outcomes = await Promise.allSettled(
      Array.from({ length: 10 }, () =>
        ledger.withdrawWallet({ accountNumber: "11111111", amount: "100.00", pin: "1111" })
      )
    );

    const fulfilled = outcomes.filter((o) => o.status === "fulfilled");
    const rejected = outcomes.filter(
      (o) => o.status === "rejected" && isLedgerError(o.reason, "INSUFFICIENT_FUNDS")
    );
    expect(fulfilled).toHaveLength(5);
    expect(rejected).toHaveLength(5);

    const account = await ledger.getAccount("11111111");
    expect(account.balance).toBe("0.00");
    expect(account.walletBalance).toBe("1000.00");
  });

  it("should fail with a retryable CONFLICT when a lock is not granted in time", async () => {
    const impatient = new Ledger({ logger, pinHashCost: 1024, lockTimeoutMs: 25 }, storage);

    let releaseHolder: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      releaseHolder = resolve;
    });
    const holder = storage.runAtomic(["11111111"], { lockTimeoutMs: 1000 }, async () => {
      await gate;
      return "held";
    });

    await expect(
      impatient.adminDeposit({ accountNumber: "11111111", amount: "5" })
    ).rejects.toMatchObject({ code: "CONFLICT", retryable: true });

    releaseHolder();
    expect(await holder).toBe("held");

    await impatient.adminDeposit({ accountNumber: "11111111", amount: "5" });
    expect((await ledger.getAccount("11111111")).balance).toBe("1005.00");
  });

  it("should keep balances non-negative and reconciled under random concurrent load", async () => {
    const random = mulberry32(20260318);
    const pick = (n: number) => Math.floor(random() * n);
    const randomAmount = () => formatMinor(BigInt(1 + pick(50_000)));

    let inflow = 3n * 100_000n;
    let outflow = 0n;

    const operation = (): Promise<TransactionRecord> => {
      const index = pick(HOLDERS.length);
      const { accountNumber, pin } = HOLDERS[index];
      const amount = randomAmount();
      switch (pick(5)) {
        case 0:
          return ledger.deposit({ accountNumber, amount, pin });
        case 1:
          return ledger.adminDeposit({ accountNumber, amount });
        case 2:
          return ledger.withdrawWallet({ accountNumber, amount, pin });
        case 3:
          return ledger.walletPay({ accountNumber, amount, merchant: "Test Merchant" });
        default: {
          const target = HOLDERS[(index + 1 + pick(HOLDERS.length - 1)) % HOLDERS.length];
          return ledger.transfer({
            fromAccountNumber: accountNumber,
            toAccountNumber: target.accountNumber,
            amount,
            pin,
          });
        }
      }
    };

    for (let round = 0; round < 40; round++) {
      const outcomes = await Promise.allSettled(Array.from({ length: 5 }, operation));

      for (const outcome of outcomes) {
        if (outcome.status === "rejected") {
          expect(isLedgerError(outcome.reason, "INSUFFICIENT_FUNDS")).toBe(true);
          continue;
        }
        const record = outcome.value;
        if (record.type === "deposit" || record.type === "admin-deposit") {
          inflow += decimalToMinor(record.amount);
        }
        if (record.type === "wallet-payment") {
          outflow += decimalToMinor(record.amount);
        }
      }

      for (const account of await ledger.listAccounts()) {
        expect(Number(account.balance)).toBeGreaterThanOrEqual(0);
        expect(Number(account.walletBalance)).toBeGreaterThanOrEqual(0);
      }
    }

    for (const { accountNumber } of HOLDERS) {
      const report = await ledger.verifyAccountIntegrity(accountNumber);
      expect(report.errors).toEqual([]);
      expect(report.valid).toBe(true);
    }

    const stats = await ledger.adminStats();
    const held = decimalToMinor(stats.totalBankBalance) + decimalToMinor(stats.totalWalletBalance);
    expect(held).toBe(inflow - outflow);
  });
});
