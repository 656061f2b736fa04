import { describe, it, expect, beforeEach } from "vitest";
import { Ledger } from "./ledger";
import { createLogger } from "./logger";
import { loadDemoAccounts, seedDemoAccounts } from "./seed";
import { InMemoryStorage } from "./storage";

describe("seedDemoAccounts", () => {
  let ledger: Ledger;

  beforeEach(() => {
    ledger = new Ledger({ logger: createLogger({ level: "silent" }), pinHashCost: 1024 }, new InMemoryStorage());
  });

  it("should load the bundled demo accounts", () => {
    const accounts = loadDemoAccounts();
    expect(accounts.map((a) => a.accountNumber)).toEqual(["12345678", "87654321", "45678912"]);
  });

  it("should seed an empty ledger once", async () => {
    const first = await seedDemoAccounts(ledger);
    expect(first.seeded).toBe(true);
    expect(first.accounts.map((a) => [a.accountNumber, a.balance, a.walletBalance])).toEqual([
      ["12345678", "5000.00", "500.00"],
      ["87654321", "7500.00", "750.00"],
      ["45678912", "3200.00", "320.00"],
    ]);

    const second = await seedDemoAccounts(ledger);
    expect(second.seeded).toBe(false);
    expect(second.accounts).toHaveLength(3);
    expect(await ledger.listTransactions()).toHaveLength(6);
  });

  it("should back seeded balances with transactions", async () => {
    await seedDemoAccounts(ledger);

    const report = await ledger.verifyAccountIntegrity("87654321");
    expect(report.valid).toBe(true);
    expect(report.transactionCount).toBe(2);
  });

  it("should report which accounts were seeded when a step fails", async () => {
    const [first, second] = loadDemoAccounts();

    const error = await seedDemoAccounts(ledger, [first, { ...second, pin: "12" }]).catch(
      (e: unknown) => e
    );

    expect(error).toMatchObject({
      code: "INVALID_PIN",
      message: "Demo seeding stopped at account 87654321: PIN must be 4 digits",
      details: { failedAccount: "87654321", seededAccounts: ["12345678"] },
    });
    expect((await ledger.listAccounts()).map((a) => a.accountNumber)).toEqual(["12345678"]);
  });

  it("should carry the demo PINs", async () => {
    await seedDemoAccounts(ledger);

    const account = await ledger.authenticate("9876543210", "5678");
    expect(account.name).toBe("arun");
  });

  it("should support a deposit, withdrawal and transfer on seeded accounts", async () => {
    await seedDemoAccounts(ledger);

    await ledger.deposit({ accountNumber: "12345678", amount: "100", pin: "1234" });
    expect((await ledger.getAccount("12345678")).balance).toBe("5100.00");

    await ledger.withdrawWallet({ accountNumber: "12345678", amount: "200", pin: "1234" });
    const afterWithdrawal = await ledger.getAccount("12345678");
    expect(afterWithdrawal.balance).toBe("4900.00");
    expect(afterWithdrawal.walletBalance).toBe("700.00");

    await ledger.transfer({
      fromAccountNumber: "12345678",
      toAccountNumber: "87654321",
      amount: "300",
      pin: "1234",
    });
    expect((await ledger.getAccount("12345678")).balance).toBe("4600.00");
    expect((await ledger.getAccount("87654321")).balance).toBe("7800.00");

    const [latest] = await ledger.listTransactions({ accountNumber: "12345678" });
    expect(latest).toMatchObject({
      type: "transfer",
      amount: "300.00",
      fromAccountNumber: "12345678",
      toAccountNumber: "87654321",
    });
  });
});
