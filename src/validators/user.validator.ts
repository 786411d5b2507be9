import { z } from 'zod';
import { FIELD_DELIMITER, LIST_DELIMITER, USER_ROLES } from '@/constants/records';
import { PASSWORD_POLICY } from '@/config/businessRules';

const LINE_BREAK = /[\r\n]/;

/**
 * True when the value, followed by the field delimiter, would not split back
 * at that delimiter: it contains '|~|' or ends in '|~', or it spans lines
 */
const breaksRecord = (value: string): boolean =>
  `${value}${FIELD_DELIMITER}`.indexOf(FIELD_DELIMITER) !== value.length ||
  LINE_BREAK.test(value);

const hasReserved = (value: string): boolean =>
  breaksRecord(value) || value.includes(LIST_DELIMITER);

/**
 * Capitalize the first letter of every word, lower-case the rest
 * ("mary-jane o'neil" → "Mary-Jane O'Neil")
 */
export function toTitleCase(value: string): string {
  return value
    .toLowerCase()
    .replace(/(^|[^\p{L}])(\p{L})/gu, (_match: string, prefix: string, letter: string) => {
      return prefix + letter.toUpperCase();
    });
}

/**
 * Registration validation schema
 *
 * Rules:
 * - NIC is required and may not contain either record delimiter
 * - Name and address may be blank but may not break the field delimiter
 * - Date of birth is YYYY-MM-DD
 * - Password has a minimum length (from businessRules.ts) and must be confirmed
 */
export const registerUserSchema = z
  .object({
    role: z.enum([USER_ROLES.ADMIN, USER_ROLES.CUSTOMER]),
    nic: z
      .string()
      .trim()
      .min(1, { message: 'NIC cannot be empty' })
      .refine((nic) => !hasReserved(nic), {
        message: `NIC cannot contain reserved characters ('${FIELD_DELIMITER}', '${LIST_DELIMITER}') or line breaks, or end in '${FIELD_DELIMITER.slice(0, -1)}'`,
      }),
    name: z
      .string()
      .trim()
      .refine((name) => !breaksRecord(name), {
        message: `Name cannot contain '${FIELD_DELIMITER}' or line breaks, or end in '${FIELD_DELIMITER.slice(0, -1)}'`,
      })
      .transform(toTitleCase),
    address: z
      .string()
      .trim()
      .refine((address) => !breaksRecord(address), {
        message: `Address cannot contain '${FIELD_DELIMITER}' or line breaks, or end in '${FIELD_DELIMITER.slice(0, -1)}'`,
      }),
    dob: z
      .string()
      .trim()
      .regex(/^\d{4}-\d{2}-\d{2}$/, {
        message: 'Date of birth must use the YYYY-MM-DD format (e.g., 1990-05-15)',
      }),
    password: z
      .string()
      .min(1, { message: 'Password cannot be empty' })
      .min(PASSWORD_POLICY.MIN_LENGTH, {
        message: `Password must be at least ${PASSWORD_POLICY.MIN_LENGTH} characters`,
      }),
    passwordConfirmation: z.string(),
  })
  .refine((data) => data.password === data.passwordConfirmation, {
    message: 'Passwords do not match',
    path: ['passwordConfirmation'],
  });

export type RegisterUserDTO = z.infer<typeof registerUserSchema>;
