import { User } from './User';
import { TransactionType } from '@/constants/records';

/**
 * Read-only views returned to the session layer
 * Money fields are canonical strings; use formatCurrency for display
 */
export interface UserSummary {
  nic: string;
  name: string;
  role: User['role'];
  ownedAccounts: string[] | null; // null for admins
}

export interface CustomerSummary {
  nic: string;
  name: string;
}

export interface AccountSummary {
  accountNumber: string;
  ownerNic: string;
  ownerName: string | null;
  balance: string;
  createdAt: string;
}

export interface BalanceView {
  accountNumber: string;
  ownerNic: string;
  balance: string;
}

export interface TransactionHistoryRow {
  timestamp: string;
  type: TransactionType;
  amount: string;
  details: string;
}
