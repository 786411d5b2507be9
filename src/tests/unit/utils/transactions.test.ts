import { netTransactionTotal, signedAmount } from '@/utils/transactions';
import { formatTimestamp } from '@/utils/time';
import { FIXED_TIMESTAMP, deposit, fixedClock } from '@/tests/utils/fixtures';

describe('transaction utils', () => {
  it('should count withdrawals and sent transfers as negative', () => {
    expect(
      signedAmount({ type: 'Withdrawal', timestamp: FIXED_TIMESTAMP, amount: '4.00' }).toFixed(2)
    ).toBe('-4.00');
    expect(
      signedAmount({
        type: 'Transfer Sent',
        timestamp: FIXED_TIMESTAMP,
        amount: '1.25',
        toAccount: '1002',
      }).toFixed(2)
    ).toBe('-1.25');
    expect(signedAmount(deposit('3.10')).toFixed(2)).toBe('3.10');
  });

  it('should total a history', () => {
    const total = netTransactionTotal([
      deposit('100.00', 'Initial Deposit'),
      { type: 'Withdrawal', timestamp: FIXED_TIMESTAMP, amount: '30.00' },
      { type: 'Interest Applied', timestamp: FIXED_TIMESTAMP, amount: '1.05', rate: 0.015 },
      { type: 'Transfer Received', timestamp: FIXED_TIMESTAMP, amount: '0.10', fromAccount: '1009' },
    ]);

    expect(total.toFixed(2)).toBe('71.15');
  });

  it('should total an empty history to zero', () => {
    expect(netTransactionTotal([]).toFixed(2)).toBe('0.00');
  });

  it('should format local time as YYYY-MM-DD HH:MM:SS', () => {
    expect(formatTimestamp(fixedClock())).toBe(FIXED_TIMESTAMP);
    expect(formatTimestamp(new Date(2023, 11, 3, 7, 5, 9))).toBe('2023-12-03 07:05:09');
  });
});
