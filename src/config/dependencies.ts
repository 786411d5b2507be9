/**
 * Dependency Container
 * Builds a store and wires the services around it
 *
 * Each call to openLedger returns its own store and services.
 */

import { env } from '@/config/env';
import { DataFilePaths, resolveDataFiles } from '@/config/dataFiles';
import { LoadReport, RegisterUserInput } from '@/models';
import { USER_ROLES } from '@/constants/records';
import { createLogger } from '@/adapters/logging/LoggerFactory';
import { FileLedgerStore } from '@/store/fileLedger.store';
import { IdentityService } from '@/services/identity.service';
import { AccountService } from '@/services/account.service';
import { ReportService } from '@/services/report.service';
import { Clock } from '@/utils/time';

const log = createLogger('Bootstrap');

/**
 * Credentials for the admin created on first run
 */
export type BootstrapAdmin = Omit<RegisterUserInput, 'role' | 'passwordConfirmation'>;

export interface LedgerOptions {
  files?: DataFilePaths;
  bootstrapAdmin?: BootstrapAdmin;
  interestRate?: number;
  clock?: Clock;
}

export interface Ledger {
  store: FileLedgerStore;
  identityService: IdentityService;
  accountService: AccountService;
  reportService: ReportService;
  loadReport: LoadReport;
  /** true when this call created the first admin */
  bootstrapped: boolean;
}

export function bootstrapAdminFromEnv(): BootstrapAdmin {
  return {
    nic: env.BOOTSTRAP_ADMIN_NIC,
    name: env.BOOTSTRAP_ADMIN_NAME,
    address: env.BOOTSTRAP_ADMIN_ADDRESS,
    dob: env.BOOTSTRAP_ADMIN_DOB,
    password: env.BOOTSTRAP_ADMIN_PASSWORD,
  };
}

/**
 * Load the ledger files and return ready-to-use services
 *
 * When the users table comes back empty (first run, empty file, or every
 * line corrupt) all tables are reset and one admin is registered through
 * IdentityService.register, which persists the fresh state immediately.
 */
export function openLedger(options: LedgerOptions = {}): Ledger {
  const store = new FileLedgerStore(options.files ?? resolveDataFiles());
  const identityService = new IdentityService(store);
  const accountService = new AccountService(store, {
    clock: options.clock,
    interestRate: options.interestRate ?? env.INTEREST_RATE,
  });
  const reportService = new ReportService(store);

  const loadReport = store.load();
  let bootstrapped = false;

  if (loadReport.needsBootstrap) {
    const admin = options.bootstrapAdmin ?? bootstrapAdminFromEnv();
    log.warn({ nic: admin.nic }, 'No users found; initializing fresh ledger with an admin');

    store.reset();
    try {
      identityService.register({
        ...admin,
        role: USER_ROLES.ADMIN,
        passwordConfirmation: admin.password,
      });
    } catch (error) {
      log.fatal({ error }, 'First-run admin could not be created');
      throw error;
    }
    bootstrapped = true;
    log.info({ nic: admin.nic }, 'First-run admin created and ledger files initialized');
  }

  return { store, identityService, accountService, reportService, loadReport, bootstrapped };
}
