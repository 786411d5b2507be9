/**
 * Public API of the ledger core
 */
export * from '@/models';
export * from '@/errors';
export * from '@/codecs';
export * from '@/constants/records';
export { openLedger, bootstrapAdminFromEnv } from '@/config/dependencies';
export type { Ledger, LedgerOptions, BootstrapAdmin } from '@/config/dependencies';
export { FileLedgerStore } from '@/store/fileLedger.store';
export type { ILedgerStore } from '@/store/interfaces/ILedgerStore';
export { IdentityService } from '@/services/identity.service';
export { AccountService } from '@/services/account.service';
export { ReportService } from '@/services/report.service';
export { checkLedgerIntegrity } from '@/services/integrity.service';
export { formatCurrency, formatRate } from '@/utils/money';
export { formatTimestamp } from '@/utils/time';
export type { ILogger } from '@/interfaces/ILogger';
