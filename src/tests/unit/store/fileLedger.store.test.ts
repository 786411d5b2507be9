import fs from 'fs';
import path from 'path';
import { FileLedgerStore } from '@/store/fileLedger.store';
import { DataFilePaths, resolveDataFiles } from '@/config/dataFiles';
import { encodeAccount, encodeUser } from '@/codecs';
import { PersistenceError } from '@/errors';
import {
  deposit,
  FIXED_TIMESTAMP,
  makeAccount,
  makeAdmin,
  makeCustomer,
  makeTempDir,
  removeDir,
  seed,
} from '@/tests/utils/fixtures';

describe('FileLedgerStore', () => {
  let dir: string;
  let files: DataFilePaths;
  let store: FileLedgerStore;

  const admin = makeAdmin();
  const customer = makeCustomer({ ownedAccounts: ['1001'] });
  const account = makeAccount({
    balance: '10.00',
    transactions: [deposit('10.00', 'Initial Deposit')],
  });

  const writeFiles = (content: Partial<Record<keyof DataFilePaths, string>>): void => {
    for (const [key, text] of Object.entries(content)) {
      if (key === 'users' || key === 'accounts' || key === 'nextAccountNumber') {
        fs.writeFileSync(files[key], text);
      }
    }
  };

  beforeEach(() => {
    dir = makeTempDir();
    files = resolveDataFiles(dir);
    store = new FileLedgerStore(files);
  });

  afterEach(() => {
    removeDir(dir);
  });

  describe('load', () => {
    it('should load well-formed files', () => {
      writeFiles({
        users: `${encodeUser(admin)}\n${encodeUser(customer)}\n`,
        accounts: `${encodeAccount(account)}\n`,
        nextAccountNumber: '1002',
      });

      const report = store.load();

      expect(report).toEqual({
        usersLoaded: 2,
        accountsLoaded: 1,
        nextAccountNumber: 1002,
        skippedLines: [],
        missingResources: [],
        warnings: [],
        integrityIssues: [],
        needsBootstrap: false,
      });
      expect(store.tables.users.get('CUS-1')).toEqual(customer);
      expect(store.tables.accounts.get('1001')).toEqual(account);
    });

    it('should skip a malformed line and keep the rest', () => {
      writeFiles({
        users: `${encodeUser(admin)}\nnot a user line\n${encodeUser(customer)}\n`,
        accounts: `${encodeAccount(account)}\n`,
        nextAccountNumber: '1002',
      });

      const report = store.load();

      expect(report.usersLoaded).toBe(2);
      expect(report.skippedLines).toEqual([
        { resource: 'users', lineNumber: 2, reason: 'expected 7 fields, got 1' },
      ]);
      expect(report.warnings).toEqual(['Skipping malformed users line 2']);
      expect(report.needsBootstrap).toBe(false);
    });

    it('should accept CRLF line endings and blank lines', () => {
      writeFiles({
        users: `${encodeUser(admin)}\r\n\r\n${encodeUser(customer)}\r\n`,
        accounts: `${encodeAccount(account)}\r\n`,
        nextAccountNumber: '1002\n',
      });

      const report = store.load();

      expect(report.usersLoaded).toBe(2);
      expect(report.skippedLines).toEqual([]);
      expect(report.nextAccountNumber).toBe(1002);
    });

    it('should report missing files and request a bootstrap', () => {
      const report = store.load();

      expect(report).toEqual({
        usersLoaded: 0,
        accountsLoaded: 0,
        nextAccountNumber: 1001,
        skippedLines: [],
        missingResources: ['users', 'accounts', 'nextAccountNumber'],
        warnings: [
          'users file not found',
          'accounts file not found',
          'nextAccountNumber file not found',
          'Ledger files missing or unreadable: first run or data loss',
        ],
        integrityIssues: [],
        needsBootstrap: true,
      });
    });

    it('should treat empty files as empty tables', () => {
      writeFiles({ users: '', accounts: '  \n', nextAccountNumber: '' });

      const report = store.load();

      expect(report.missingResources).toEqual([]);
      expect(report.warnings).toEqual([
        'users file is empty',
        'accounts file is empty',
        'nextAccountNumber file is empty',
        'Ledger files present but contain no valid users',
      ]);
      expect(report.needsBootstrap).toBe(true);
    });

    it('should request a bootstrap when every user line is malformed', () => {
      writeFiles({ users: 'junk\nmore junk\n' });

      const report = store.load();

      expect(report.skippedLines).toHaveLength(2);
      expect(report.needsBootstrap).toBe(true);
    });

    it('should report an unreadable file as missing', () => {
      fs.mkdirSync(files.users);

      const report = store.load();

      expect(report.missingResources).toContain('users');
      expect(report.warnings).toContain('Could not read users file');
    });

    it('should fall back to the default counter when it is not an integer', () => {
      writeFiles({
        users: `${encodeUser(admin)}\n`,
        nextAccountNumber: 'abc',
      });

      const report = store.load();

      expect(report.nextAccountNumber).toBe(1001);
      expect(report.warnings).toContain('Invalid next account number "abc", using default 1001');
    });

    it('should fall back to the default counter when it exceeds the safe integer range', () => {
      writeFiles({
        users: `${encodeUser(admin)}\n`,
        nextAccountNumber: '9007199254740993',
      });

      const report = store.load();

      expect(report.nextAccountNumber).toBe(1001);
      expect(report.warnings).toContain(
        'Invalid next account number "9007199254740993", using default 1001'
      );
    });

    it('should surface decoder notes as warnings', () => {
      writeFiles({
        users: `${encodeUser(admin)}\n${encodeUser(customer)}\n`,
        accounts: `1001|~|CUS-1|~|lots|~|${FIXED_TIMESTAMP}|~|[]\n`,
        nextAccountNumber: '1002',
      });

      const report = store.load();

      expect(store.tables.accounts.get('1001')?.balance).toBe('0.00');
      expect(report.warnings).toEqual([
        'account 1001 has invalid balance "lots", defaulted to 0.00',
      ]);
    });

    it('should report integrity issues such as a missing admin', () => {
      writeFiles({
        users: `${encodeUser(customer)}\n`,
        accounts: `${encodeAccount(account)}\n`,
        nextAccountNumber: '1002',
      });

      const report = store.load();

      expect(report.needsBootstrap).toBe(false);
      expect(report.integrityIssues).toEqual([
        { code: 'NO_ADMIN', message: 'Users were loaded but none has the admin role' },
      ]);
    });

    it('should replace whatever was in memory', () => {
      seed(store.tables, { users: [makeAdmin({ nic: 'STALE' })] });
      writeFiles({ users: `${encodeUser(admin)}\n` });

      store.load();

      expect(Array.from(store.tables.users.keys())).toEqual(['ADM-1']);
    });
  });

  describe('save', () => {
    it('should write one line per record and the counter', () => {
      seed(store.tables, { users: [admin, customer], accounts: [account] });
      store.tables.nextAccountNumber = 1002;

      expect(store.save()).toEqual({ ok: true, failures: [] });

      expect(fs.readFileSync(files.users, 'utf8')).toBe(
        `${encodeUser(admin)}\n${encodeUser(customer)}\n`
      );
      expect(fs.readFileSync(files.accounts, 'utf8')).toBe(`${encodeAccount(account)}\n`);
      expect(fs.readFileSync(files.nextAccountNumber, 'utf8')).toBe('1002');
    });

    it('should create the data directory when it does not exist', () => {
      const nested = new FileLedgerStore(resolveDataFiles(path.join(dir, 'a', 'b')));
      seed(nested.tables, { users: [admin] });

      expect(nested.save().ok).toBe(true);
      expect(fs.existsSync(path.join(dir, 'a', 'b', 'users.txt'))).toBe(true);
    });

    it('should survive a save and load round trip', () => {
      seed(store.tables, {
        users: [admin, customer],
        accounts: [
          makeAccount({
            balance: '7.50',
            transactions: [
              deposit('10.00', 'Initial Deposit'),
              { type: 'Transfer Sent', timestamp: FIXED_TIMESTAMP, amount: '2.50', toAccount: '1002' },
            ],
          }),
        ],
      });
      store.tables.nextAccountNumber = 1002;
      store.save();

      const reloaded = new FileLedgerStore(files);
      const report = reloaded.load();

      expect(report.skippedLines).toEqual([]);
      expect(reloaded.tables).toEqual(store.tables);
    });

    it('should keep writing the other files when one fails', () => {
      fs.mkdirSync(files.users);
      seed(store.tables, { users: [admin] });

      const report = store.save();

      expect(report.ok).toBe(false);
      expect(report.failures).toHaveLength(1);
      expect(report.failures[0]).toMatchObject({ resource: 'users', path: files.users });
      expect(fs.readFileSync(files.accounts, 'utf8')).toBe('');
      expect(fs.readFileSync(files.nextAccountNumber, 'utf8')).toBe('1001');
    });
  });

  describe('transaction', () => {
    it('should save after the work succeeds', () => {
      store.transaction((tables) => {
        tables.users.set(admin.nic, admin);
      });

      expect(fs.readFileSync(files.users, 'utf8')).toBe(`${encodeUser(admin)}\n`);
    });

    it('should undo the work and skip saving when it throws', () => {
      seed(store.tables, { users: [admin] });

      expect(() =>
        store.transaction((tables) => {
          tables.users.delete(admin.nic);
          tables.nextAccountNumber = 5000;
          throw new Error('boom');
        })
      ).toThrow('boom');

      expect(store.tables.users.get(admin.nic)).toEqual(admin);
      expect(store.tables.nextAccountNumber).toBe(1001);
      expect(fs.existsSync(files.users)).toBe(false);
    });

    it('should throw PersistenceError and keep the change when the save fails', () => {
      fs.mkdirSync(files.accounts);

      expect(() =>
        store.transaction((tables) => {
          tables.accounts.set(account.accountNumber, account);
        })
      ).toThrow(new PersistenceError('Failed to save accounts', []));

      expect(store.tables.accounts.get('1001')).toEqual(account);
    });
  });
});
