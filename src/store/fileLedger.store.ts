import fs from 'fs';
import path from 'path';
import { DataFilePaths } from '@/config/dataFiles';
import { ACCOUNT_RULES } from '@/config/businessRules';
import { LEDGER_RESOURCES, LedgerResource } from '@/constants/records';
import { LoadReport, SaveFailure, SaveReport } from '@/models';
import { DecodeResult, decodeAccountLine, decodeUserLine, encodeAccount, encodeUser } from '@/codecs';
import { checkLedgerIntegrity } from '@/services/integrity.service';
import { createLogger } from '@/adapters/logging/LoggerFactory';
import { ILogger } from '@/interfaces/ILogger';
import { LedgerStore } from './ledger.store';

/**
 * File-backed ledger store
 *
 * Three independent files, each rewritten in full on every save:
 * - users: one encoded User per line
 * - accounts: one encoded Account per line
 * - next account number: a single integer
 */
export class FileLedgerStore extends LedgerStore {
  constructor(
    private readonly files: DataFilePaths,
    log: ILogger = createLogger('LedgerStore')
  ) {
    super(log);
  }

  /**
   * Replace the in-memory tables with the contents of the files
   *
   * Malformed lines are skipped and reported, never fatal. An empty Users
   * table after loading sets `needsBootstrap`.
   */
  load(): LoadReport {
    this.reset();

    const report: LoadReport = {
      usersLoaded: 0,
      accountsLoaded: 0,
      nextAccountNumber: this.tables.nextAccountNumber,
      skippedLines: [],
      missingResources: [],
      warnings: [],
      integrityIssues: [],
      needsBootstrap: false,
    };

    const usersContent = this.readResource(LEDGER_RESOURCES.USERS, this.files.users, report);
    if (usersContent !== null) {
      this.decodeLines(LEDGER_RESOURCES.USERS, usersContent, decodeUserLine, report, (user) => {
        this.tables.users.set(user.nic, user);
      });
    }
    report.usersLoaded = this.tables.users.size;

    const accountsContent = this.readResource(
      LEDGER_RESOURCES.ACCOUNTS,
      this.files.accounts,
      report
    );
    if (accountsContent !== null) {
      this.decodeLines(
        LEDGER_RESOURCES.ACCOUNTS,
        accountsContent,
        decodeAccountLine,
        report,
        (account) => {
          this.tables.accounts.set(account.accountNumber, account);
        }
      );
    }
    report.accountsLoaded = this.tables.accounts.size;

    const counterContent = this.readResource(
      LEDGER_RESOURCES.NEXT_ACCOUNT_NUMBER,
      this.files.nextAccountNumber,
      report
    );
    if (counterContent !== null) {
      const text = counterContent.trim();
      const counter = /^\d+$/.test(text) ? Number.parseInt(text, 10) : Number.NaN;
      if (Number.isSafeInteger(counter)) {
        this.tables.nextAccountNumber = counter;
      } else {
        this.warn(
          report,
          { resource: LEDGER_RESOURCES.NEXT_ACCOUNT_NUMBER, content: text },
          `Invalid next account number "${text}", using default ${ACCOUNT_RULES.FIRST_ACCOUNT_NUMBER}`
        );
      }
    }
    report.nextAccountNumber = this.tables.nextAccountNumber;

    if (this.tables.users.size === 0) {
      report.needsBootstrap = true;
      this.warn(
        report,
        { missingResources: report.missingResources },
        report.missingResources.length > 0
          ? 'Ledger files missing or unreadable: first run or data loss'
          : 'Ledger files present but contain no valid users'
      );
    } else {
      report.integrityIssues = checkLedgerIntegrity(this.tables);
      for (const issue of report.integrityIssues) {
        this.log.warn({ issue }, 'Ledger integrity issue');
      }
    }

    this.log.info(
      {
        users: report.usersLoaded,
        accounts: report.accountsLoaded,
        nextAccountNumber: report.nextAccountNumber,
        skippedLines: report.skippedLines.length,
      },
      'Ledger loaded'
    );

    return report;
  }

  /**
   * Overwrite every file with the current tables
   * Each file is attempted even if an earlier one failed
   */
  save(): SaveReport {
    const failures: SaveFailure[] = [];

    const users = Array.from(this.tables.users.values(), (user) => `${encodeUser(user)}\n`);
    const accounts = Array.from(
      this.tables.accounts.values(),
      (account) => `${encodeAccount(account)}\n`
    );

    this.writeResource(LEDGER_RESOURCES.USERS, this.files.users, users.join(''), failures);
    this.writeResource(LEDGER_RESOURCES.ACCOUNTS, this.files.accounts, accounts.join(''), failures);
    this.writeResource(
      LEDGER_RESOURCES.NEXT_ACCOUNT_NUMBER,
      this.files.nextAccountNumber,
      String(this.tables.nextAccountNumber),
      failures
    );

    if (failures.length === 0) {
      this.log.debug(
        { users: this.tables.users.size, accounts: this.tables.accounts.size },
        'Ledger saved'
      );
    }

    return { ok: failures.length === 0, failures };
  }

  /**
   * @returns file content, or null when the file is missing or unreadable
   */
  private readResource(
    resource: LedgerResource,
    filePath: string,
    report: LoadReport
  ): string | null {
    if (!fs.existsSync(filePath)) {
      report.missingResources.push(resource);
      this.warn(report, { resource, path: filePath }, `${resource} file not found`);
      return null;
    }

    let content: string;
    try {
      content = fs.readFileSync(filePath, 'utf8');
    } catch (error) {
      report.missingResources.push(resource);
      this.warn(
        report,
        { resource, path: filePath, error: errorMessage(error) },
        `Could not read ${resource} file`
      );
      return null;
    }

    if (content.trim() === '') {
      this.warn(report, { resource, path: filePath }, `${resource} file is empty`);
      return null;
    }

    return content;
  }

  private decodeLines<T>(
    resource: LedgerResource,
    content: string,
    decode: (line: string) => DecodeResult<T>,
    report: LoadReport,
    accept: (record: T) => void
  ): void {
    content.split(/\r?\n/).forEach((line, index) => {
      if (line.trim() === '') return;

      const lineNumber = index + 1;
      const result = decode(line);
      if (!result.ok) {
        report.skippedLines.push({ resource, lineNumber, reason: result.reason });
        this.warn(
          report,
          { resource, lineNumber, reason: result.reason },
          `Skipping malformed ${resource} line ${lineNumber}`
        );
        return;
      }

      for (const note of result.notes) {
        this.warn(report, { resource, lineNumber }, note);
      }
      accept(result.value);
    });
  }

  private writeResource(
    resource: LedgerResource,
    filePath: string,
    content: string,
    failures: SaveFailure[]
  ): void {
    try {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      fs.writeFileSync(filePath, content, 'utf8');
    } catch (error) {
      const failure = { resource, path: filePath, message: errorMessage(error) };
      failures.push(failure);
      this.log.error(failure, `Could not save ${resource} file; changes might be lost`);
    }
  }

  private warn(report: LoadReport, metadata: Record<string, unknown>, message: string): void {
    report.warnings.push(message);
    this.log.warn(metadata, message);
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
