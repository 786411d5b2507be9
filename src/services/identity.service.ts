import { RegisterUserInput, User } from '@/models';
import { USER_ROLES } from '@/constants/records';
import { AUTH_LIMITS } from '@/config/businessRules';
import { AuthFailureError, DuplicateError, NotFoundError } from '@/errors';
import { logger } from '@/adapters/logging/LoggerFactory';
import { ILedgerStore } from '@/store/interfaces/ILedgerStore';
import { registerUserSchema } from '@/validators/user.validator';
import { parseInput } from '@/validators/parse';
import { hashPassword, verifyPassword as matchesDigest } from '@/utils/password';

/**
 * Identity Service
 * User registration and password authentication
 */
export class IdentityService {
  constructor(private store: ILedgerStore) {}

  /**
   * Register a new admin or customer and persist it
   *
   * Business Rules:
   * - NIC must be unique (DuplicateError)
   * - Input shape per registerUserSchema (ValidationError)
   * - Only the SHA-256 digest of the password is stored
   * - Customers start with no accounts
   */
  register(input: RegisterUserInput): User {
    const data = parseInput(registerUserSchema, input, 'registration');

    if (this.store.tables.users.has(data.nic)) {
      logger.warn({ nic: data.nic }, 'Registration rejected: NIC already registered');
      throw new DuplicateError(`A user with NIC '${data.nic}' already exists`);
    }

    if (!data.name) {
      logger.warn({ nic: data.nic }, 'Name has been left blank');
    }
    if (!data.address) {
      logger.warn({ nic: data.nic }, 'Address has been left blank');
    }

    const profile = {
      nic: data.nic,
      name: data.name,
      address: data.address,
      dob: data.dob,
      passwordHash: hashPassword(data.password),
    };
    const user: User =
      data.role === USER_ROLES.CUSTOMER
        ? { ...profile, role: USER_ROLES.CUSTOMER, ownedAccounts: [] }
        : { ...profile, role: USER_ROLES.ADMIN };

    this.store.transaction((tables) => {
      tables.users.set(user.nic, user);
    });

    logger.info({ nic: user.nic, role: user.role }, 'User registered');
    return user;
  }

  /**
   * Authenticate with a bounded number of password attempts
   *
   * `attempts` is consumed lazily, so a prompting caller can pass a generator
   * that asks for the next password only after a wrong one. At most
   * AUTH_LIMITS.MAX_ATTEMPTS are read; the first correct one wins.
   *
   * @throws NotFoundError when the NIC is unknown
   * @throws AuthFailureError when the attempts are exhausted or run out
   */
  authenticate(nic: string, attempts: Iterable<string>): User {
    const user = this.findUser(nic);

    let used = 0;
    for (const password of attempts) {
      used += 1;

      if (matchesDigest(user.passwordHash, password)) {
        logger.info({ nic, role: user.role, attempt: used }, 'Login successful');
        return user;
      }

      logger.warn(
        { nic, attemptsRemaining: AUTH_LIMITS.MAX_ATTEMPTS - used },
        'Incorrect password'
      );
      if (used >= AUTH_LIMITS.MAX_ATTEMPTS) {
        break;
      }
    }

    const message =
      used >= AUTH_LIMITS.MAX_ATTEMPTS
        ? `Authentication failed after ${AUTH_LIMITS.MAX_ATTEMPTS} attempts`
        : `Authentication failed: no password after ${used} attempt(s)`;
    logger.warn({ nic, attemptsUsed: used }, message);
    throw new AuthFailureError(message, used);
  }

  /**
   * Check a password against a user's stored digest
   */
  verifyPassword(user: User, password: string): boolean {
    return matchesDigest(user.passwordHash, password);
  }

  /**
   * @throws NotFoundError when no user has this NIC
   */
  findUser(nic: string): User {
    const user = this.store.tables.users.get(nic);
    if (!user) {
      throw new NotFoundError(`User with NIC '${nic}' not found`);
    }
    return user;
  }
}
