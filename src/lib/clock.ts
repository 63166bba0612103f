/**
 * Clock
 * Injectable source of the current instant
 */

export type Clock = () => Date;

export const MS_PER_DAY = 24 * 60 * 60 * 1000;

export const systemClock: Clock = () => new Date();

/**
 * Add whole or fractional days to an instant (no calendar rounding)
 */
export function addDays(from: Date, days: number): Date {
  return new Date(from.getTime() + days * MS_PER_DAY);
}
