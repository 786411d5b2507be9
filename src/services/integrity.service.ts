import { IntegrityIssue, LedgerTables } from '@/models';
import { USER_ROLES } from '@/constants/records';
import { netTransactionTotal } from '@/utils/transactions';

/**
 * Check cross-table invariants of a loaded ledger
 *
 * Nothing here is fatal: the store reports the issues and keeps running.
 */
export function checkLedgerIntegrity(tables: LedgerTables): IntegrityIssue[] {
  const issues: IntegrityIssue[] = [];
  const users = Array.from(tables.users.values());

  if (users.length > 0 && !users.some((user) => user.role === USER_ROLES.ADMIN)) {
    issues.push({
      code: 'NO_ADMIN',
      message: 'Users were loaded but none has the admin role',
    });
  }

  for (const user of users) {
    if (user.role !== USER_ROLES.CUSTOMER) continue;

    for (const accountNumber of user.ownedAccounts) {
      const account = tables.accounts.get(accountNumber);
      if (!account) {
        issues.push({
          code: 'DANGLING_OWNED_ACCOUNT',
          message: `User ${user.nic} lists account ${accountNumber}, which does not exist`,
          nic: user.nic,
          accountNumber,
        });
      } else if (account.ownerNic !== user.nic) {
        issues.push({
          code: 'OWNER_MISMATCH',
          message: `User ${user.nic} lists account ${accountNumber}, owned by ${account.ownerNic}`,
          nic: user.nic,
          accountNumber,
        });
      }
    }
  }

  for (const account of tables.accounts.values()) {
    if (!tables.users.has(account.ownerNic)) {
      issues.push({
        code: 'ORPHAN_ACCOUNT',
        message: `Account ${account.accountNumber} belongs to unknown user ${account.ownerNic}`,
        nic: account.ownerNic,
        accountNumber: account.accountNumber,
      });
    }

    const expected = netTransactionTotal(account.transactions);
    if (!expected.equals(account.balance)) {
      issues.push({
        code: 'BALANCE_MISMATCH',
        message: `Account ${account.accountNumber} balance ${account.balance} differs from its history total ${expected.toFixed(2)}`,
        accountNumber: account.accountNumber,
      });
    }
  }

  return issues;
}
