import { User } from '@/models';
import {
  FIELD_DELIMITER,
  LIST_DELIMITER,
  USER_FIELD_COUNT,
  USER_ROLES,
} from '@/constants/records';
import { DecodeResult, decoded, malformed } from './decodeResult';

/**
 * Users file line:
 * nic |~| name |~| address |~| dob |~| passwordHash |~| role |~| owned;accounts
 */
export function encodeUser(user: User): string {
  const owned = user.role === USER_ROLES.CUSTOMER ? user.ownedAccounts.join(LIST_DELIMITER) : '';

  return [user.nic, user.name, user.address, user.dob, user.passwordHash, user.role, owned].join(
    FIELD_DELIMITER
  );
}

export function decodeUserLine(line: string): DecodeResult<User> {
  const parts = line.trim().split(FIELD_DELIMITER);
  if (parts.length !== USER_FIELD_COUNT) {
    return malformed(`expected ${USER_FIELD_COUNT} fields, got ${parts.length}`);
  }

  const [nic, name, address, dob, passwordHash, role, owned] = parts;
  if (!nic) {
    return malformed('empty NIC');
  }

  if (role === USER_ROLES.CUSTOMER) {
    const ownedAccounts = owned.split(LIST_DELIMITER).filter((accountNumber) => accountNumber);
    return decoded({ nic, name, address, dob, passwordHash, role, ownedAccounts });
  }

  if (role === USER_ROLES.ADMIN) {
    // Admins own no accounts; stray data in the field is dropped
    const notes = owned ? [`admin ${nic} has owned-accounts data "${owned}", ignored`] : [];
    return decoded({ nic, name, address, dob, passwordHash, role }, notes);
  }

  return malformed(`invalid role "${role}"`);
}

/**
 * Decode a users file line
 * @returns null when the line is malformed
 */
export function decodeUser(line: string): User | null {
  const result = decodeUserLine(line);
  return result.ok ? result.value : null;
}
