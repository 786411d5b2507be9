/**
 * User model
 * One line of the users file
 *
 * Tagged by role: only customers own accounts. `ownedAccounts` keeps
 * creation order.
 */
interface BaseUser {
  nic: string;
  name: string;
  address: string;
  dob: string; // YYYY-MM-DD
  passwordHash: string; // SHA-256 hex digest
}

export interface AdminUser extends BaseUser {
  role: 'admin';
}

export interface CustomerUser extends BaseUser {
  role: 'customer';
  ownedAccounts: string[];
}

export type User = AdminUser | CustomerUser;

/**
 * Registration input
 * Passwords are plain text here and never leave the identity service
 */
export interface RegisterUserInput {
  role: User['role'];
  nic: string;
  name: string;
  address: string;
  dob: string;
  password: string;
  passwordConfirmation: string;
}
