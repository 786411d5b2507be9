/**
 * Source of the current time, injectable for tests
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * Local time as `YYYY-MM-DD HH:MM:SS`, the format stored in the ledger files
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}
