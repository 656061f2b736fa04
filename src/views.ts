import type { Account, AccountView, TransactionRecord, TransactionView } from "./types";

export function toAccountView(account: Account): AccountView {
  return {
    accountNumber: account.accountNumber,
    name: account.name,
    mobile: account.mobile,
    address: account.address,
    dob: account.dob,
    nationalId: account.nationalId,
    balance: account.balance,
    walletBalance: account.walletBalance,
  };
}

/**
 * Statement line as shown to customers. Wallet payments have no destination
 * account, so the merchant label takes its place.
 */
export function toTransactionView(record: TransactionRecord): TransactionView {
  return {
    date: record.createdAt.toISOString(),
    type: record.type,
    amount: record.amount,
    fromAccount: record.fromAccountNumber,
    toAccount: record.toAccountNumber ?? record.merchant,
  };
}
