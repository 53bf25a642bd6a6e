export const SECONDS_PER_HOUR = 3600;
export const SECONDS_PER_DAY = 86_400;

/**
 * Truncate a unix timestamp (seconds) to the start of its hour
 */
export function floorToHour(timestamp: number): number {
  return Math.floor(timestamp / SECONDS_PER_HOUR) * SECONDS_PER_HOUR;
}

export function isHourAligned(timestamp: number): boolean {
  return Number.isInteger(timestamp) && timestamp % SECONDS_PER_HOUR === 0;
}

/**
 * Truncate a unix timestamp (seconds) to 00:00 UTC of its day
 */
export function startOfUtcDay(timestamp: number): number {
  return Math.floor(timestamp / SECONDS_PER_DAY) * SECONDS_PER_DAY;
}

export function unixToDate(timestamp: number): Date {
  return new Date(timestamp * 1000);
}

export function isValidUnixTimestamp(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}
