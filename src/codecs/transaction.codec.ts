import { z } from 'zod';
import Decimal from 'decimal.js';
import { Transaction } from '@/models';
import { TRANSACTION_TYPES } from '@/constants/records';
import { parseDecimal, toMoney } from '@/utils/money';

/**
 * Wire format of one transaction inside the accounts file
 *
 * Keys are snake_case. Older files store amounts as JSON numbers, so both
 * numbers and strings are read; encoding always writes money strings.
 */
const wireAmountSchema = z
  .union([z.number().finite(), z.string()])
  .transform((value, ctx) => {
    const amount = typeof value === 'number' ? new Decimal(value) : parseDecimal(value);
    if (!amount) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid amount "${value}"` });
      return z.NEVER;
    }
    return toMoney(amount);
  });

const base = {
  timestamp: z.string(),
  amount: wireAmountSchema,
};

const wireTransactionSchema = z.discriminatedUnion('type', [
  z.object({ ...base, type: z.literal(TRANSACTION_TYPES.INITIAL_DEPOSIT) }),
  z.object({ ...base, type: z.literal(TRANSACTION_TYPES.DEPOSIT) }),
  z.object({ ...base, type: z.literal(TRANSACTION_TYPES.WITHDRAWAL) }),
  z.object({
    ...base,
    type: z.literal(TRANSACTION_TYPES.TRANSFER_SENT),
    to_account: z.string(),
  }),
  z.object({
    ...base,
    type: z.literal(TRANSACTION_TYPES.TRANSFER_RECEIVED),
    from_account: z.string(),
  }),
  z.object({
    ...base,
    type: z.literal(TRANSACTION_TYPES.INTEREST_APPLIED),
    rate: z.number().finite(),
  }),
]);

const wireTransactionListSchema = z.array(wireTransactionSchema);

type WireTransaction = z.input<typeof wireTransactionSchema>;
type ParsedWireTransaction = z.output<typeof wireTransactionSchema>;

function toWire(transaction: Transaction): WireTransaction {
  const { timestamp, amount } = transaction;

  switch (transaction.type) {
    case 'Transfer Sent':
      return { timestamp, type: transaction.type, amount, to_account: transaction.toAccount };
    case 'Transfer Received':
      return { timestamp, type: transaction.type, amount, from_account: transaction.fromAccount };
    case 'Interest Applied':
      return { timestamp, type: transaction.type, amount, rate: transaction.rate };
    default:
      return { timestamp, type: transaction.type, amount };
  }
}

function fromWire(wire: ParsedWireTransaction): Transaction {
  const { timestamp, amount } = wire;

  switch (wire.type) {
    case 'Transfer Sent':
      return { timestamp, type: wire.type, amount, toAccount: wire.to_account };
    case 'Transfer Received':
      return { timestamp, type: wire.type, amount, fromAccount: wire.from_account };
    case 'Interest Applied':
      return { timestamp, type: wire.type, amount, rate: wire.rate };
    default:
      return { timestamp, type: wire.type, amount };
  }
}

/**
 * Serialize a transaction list as the JSON blob stored in one field
 */
export function encodeTransactions(transactions: Transaction[]): string {
  return JSON.stringify(transactions.map(toWire));
}

/**
 * Parse the JSON blob of an account line
 * @returns null when the blob is not JSON or not a list of known transactions
 */
export function decodeTransactions(blob: string): Transaction[] | null {
  let raw: unknown;
  try {
    raw = JSON.parse(blob);
  } catch {
    return null;
  }

  const parsed = wireTransactionListSchema.safeParse(raw);
  if (!parsed.success) {
    return null;
  }
  return parsed.data.map(fromWire);
}
