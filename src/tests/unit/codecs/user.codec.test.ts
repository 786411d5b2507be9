import { decodeUser, decodeUserLine, encodeUser } from '@/codecs';
import { FIELD_DELIMITER, LIST_DELIMITER } from '@/constants/records';
import { makeAdmin, makeCustomer, TEST_PASSWORD_HASH } from '@/tests/utils/fixtures';

describe('user codec', () => {
  describe('delimiters', () => {
    it('should not share characters between field and list delimiters', () => {
      const fieldChars = new Set(FIELD_DELIMITER);
      expect([...LIST_DELIMITER].some((char) => fieldChars.has(char))).toBe(false);
    });
  });

  describe('encodeUser', () => {
    it('should encode a customer with owned accounts as 7 fields', () => {
      const line = encodeUser(makeCustomer({ ownedAccounts: ['1001', '1004'] }));

      expect(line).toBe(
        `CUS-1|~|Carl Customer|~|22 Side Road|~|1990-05-15|~|${TEST_PASSWORD_HASH}|~|customer|~|1001;1004`
      );
    });

    it('should leave the owned-accounts field empty for an admin', () => {
      const line = encodeUser(makeAdmin());

      expect(line).toBe(
        `ADM-1|~|Ada Admin|~|1 Main Street|~|1980-02-29|~|${TEST_PASSWORD_HASH}|~|admin|~|`
      );
    });
  });

  describe('decodeUser', () => {
    it('should round-trip a customer without accounts', () => {
      const user = makeCustomer();
      expect(decodeUser(encodeUser(user))).toEqual(user);
    });

    it('should round-trip a customer with several accounts', () => {
      const user = makeCustomer({ ownedAccounts: ['1001', '1002', '1009'] });
      expect(decodeUser(encodeUser(user))).toEqual(user);
    });

    it('should round-trip an admin', () => {
      const user = makeAdmin();
      expect(decodeUser(encodeUser(user))).toEqual(user);
    });

    it('should round-trip blank name and address', () => {
      const user = makeCustomer({ name: '', address: '' });
      expect(decodeUser(encodeUser(user))).toEqual(user);
    });

    it('should reject a line with the wrong field count', () => {
      expect(decodeUser('CUS-1|~|Carl|~|customer')).toBeNull();

      const result = decodeUserLine('CUS-1|~|Carl|~|customer');
      expect(result).toEqual({ ok: false, reason: 'expected 7 fields, got 3' });
    });

    it('should reject an unknown role', () => {
      const line = `X|~|Name|~|Addr|~|1990-01-01|~|${TEST_PASSWORD_HASH}|~|manager|~|`;

      expect(decodeUser(line)).toBeNull();
      expect(decodeUserLine(line)).toEqual({ ok: false, reason: 'invalid role "manager"' });
    });

    it('should reject a role with different casing', () => {
      const line = `X|~|Name|~|Addr|~|1990-01-01|~|${TEST_PASSWORD_HASH}|~|Customer|~|`;
      expect(decodeUser(line)).toBeNull();
    });

    it('should reject an empty NIC', () => {
      const line = `|~|Name|~|Addr|~|1990-01-01|~|${TEST_PASSWORD_HASH}|~|customer|~|`;
      expect(decodeUserLine(line)).toEqual({ ok: false, reason: 'empty NIC' });
    });

    it('should drop empty tokens from the owned-accounts list', () => {
      const line = `C|~|Name|~|Addr|~|1990-01-01|~|${TEST_PASSWORD_HASH}|~|customer|~|;1001;;1002;`;
      const user = decodeUser(line);

      expect(user).toEqual(
        expect.objectContaining({ role: 'customer', ownedAccounts: ['1001', '1002'] })
      );
    });

    it('should tolerate owned-accounts data on an admin line and note it', () => {
      const line = `A|~|Name|~|Addr|~|1990-01-01|~|${TEST_PASSWORD_HASH}|~|admin|~|1001`;
      const result = decodeUserLine(line);

      expect(result).toEqual({
        ok: true,
        value: {
          nic: 'A',
          name: 'Name',
          address: 'Addr',
          dob: '1990-01-01',
          passwordHash: TEST_PASSWORD_HASH,
          role: 'admin',
        },
        notes: ['admin A has owned-accounts data "1001", ignored'],
      });
    });

    it('should ignore surrounding whitespace and line endings', () => {
      const user = makeCustomer({ ownedAccounts: ['1001'] });
      expect(decodeUser(`  ${encodeUser(user)}\r\n`)).toEqual(user);
    });
  });
});
