/**
 * Converts a Date to ClickHouse DateTime64(3) format.
 * Format: YYYY-MM-DD HH:MM:SS.SSS (UTC)
 */
export function toClickHouseDateTime(date: Date = new Date()): string {
  return date.toISOString().replace('T', ' ').slice(0, -1);
}

export function daysBefore(days: number, from: Date = new Date()): Date {
  return new Date(from.getTime() - days * 24 * 60 * 60 * 1000);
}
