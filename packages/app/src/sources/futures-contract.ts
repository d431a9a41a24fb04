/**
 * Front-month naming for quarterly equity-index futures (ES, NQ, ...).
 */

import { MINUTE_MS } from '@crosslag/contracts';

/** Zero-based expiry months and their month codes */
const QUARTERLY_EXPIRIES: ReadonlyArray<readonly [month: number, code: string]> = [
  [2, 'H'],
  [5, 'M'],
  [8, 'U'],
  [11, 'Z'],
];

/** Liquidity moves to the next contract this many days before expiry. */
export const ROLL_DAYS_BEFORE_EXPIRY = 8;

const DAY_MS = 24 * 60 * MINUTE_MS;

/**
 * Midnight UTC of the third Friday of a month.
 */
export function thirdFriday(year: number, month: number): number {
  const weekday = new Date(Date.UTC(year, month, 1)).getUTCDay();
  const firstFriday = 1 + ((5 - weekday + 7) % 7);
  return Date.UTC(year, month, firstFriday + 14);
}

/**
 * Local symbol of the contract most traded at `at`: root, month code and
 * the last digit of the year.
 *
 * @example
 * ```typescript
 * frontMonthContract('ES', Date.UTC(2025, 0, 15)); // 'ESH5'
 * frontMonthContract('ES', Date.UTC(2025, 2, 14)); // 'ESM5' (rolled)
 * ```
 */
export function frontMonthContract(root: string, at: number): string {
  const startYear = new Date(at).getUTCFullYear();

  for (let year = startYear; year <= startYear + 1; year++) {
    for (const [month, code] of QUARTERLY_EXPIRIES) {
      const rollAt = thirdFriday(year, month) - ROLL_DAYS_BEFORE_EXPIRY * DAY_MS;
      if (at < rollAt) {
        return `${root}${code}${year % 10}`;
      }
    }
  }

  // Unreachable: next year's March roll always lies ahead
  return root;
}
