import { z } from "zod";
import demoAccountsJson from "./demo-accounts.json";
import { LedgerError, isLedgerError } from "./errors";
import type { Ledger } from "./ledger";
import { decimalToMinor, formatMinor } from "./money";
import type { AccountView } from "./types";

const seedAccountSchema = z.object({
  name: z.string(),
  mobile: z.string(),
  address: z.string(),
  dob: z.string(),
  nationalId: z.string(),
  accountNumber: z.string(),
  pin: z.string(),
  balance: z.string(),
  walletBalance: z.string(),
});

export type SeedAccount = z.infer<typeof seedAccountSchema>;

export interface SeedResult {
  seeded: boolean;
  accounts: AccountView[];
}

export function loadDemoAccounts(): SeedAccount[] {
  const parsed = z.array(seedAccountSchema).safeParse(demoAccountsJson);
  if (!parsed.success) {
    throw new LedgerError("demo-accounts.json is malformed", "INVALID_CONFIG", {
      issues: parsed.error.issues.map((issue) => issue.message),
    });
  }
  return parsed.data;
}

/**
 * Populate an empty ledger with demo accounts. Does nothing when any account
 * exists. Opening balances are funded through ordinary ledger operations so
 * every seeded balance is backed by transactions.
 *
 * Each step commits on its own. When one fails, the accounts seeded before it
 * stay and a later call skips the non-empty ledger; the thrown error keeps the
 * original code and lists what was seeded in `details`.
 */
export async function seedDemoAccounts(
  ledger: Ledger,
  accounts: SeedAccount[] = loadDemoAccounts()
): Promise<SeedResult> {
  const existing = await ledger.listAccounts();
  if (existing.length > 0) {
    return { seeded: false, accounts: existing };
  }

  const created: AccountView[] = [];
  for (const account of accounts) {
    try {
      created.push(await seedAccount(ledger, account));
    } catch (error) {
      if (!isLedgerError(error)) throw error;
      throw new LedgerError(
        `Demo seeding stopped at account ${account.accountNumber}: ${error.message}`,
        error.code,
        {
          failedAccount: account.accountNumber,
          seededAccounts: created.map((view) => view.accountNumber),
        },
        { cause: error }
      );
    }
  }

  return { seeded: true, accounts: created };
}

async function seedAccount(ledger: Ledger, account: SeedAccount): Promise<AccountView> {
  const { balance, walletBalance, pin, ...profile } = account;
  await ledger.createAccount({ ...profile, pin });

  const bank = decimalToMinor(balance);
  const wallet = decimalToMinor(walletBalance);
  if (bank + wallet > 0n) {
    await ledger.adminDeposit({
      accountNumber: profile.accountNumber,
      amount: formatMinor(bank + wallet),
    });
  }
  if (wallet > 0n) {
    await ledger.withdrawWallet({
      accountNumber: profile.accountNumber,
      amount: formatMinor(wallet),
      pin,
    });
  }
  return ledger.getAccount(profile.accountNumber);
}
