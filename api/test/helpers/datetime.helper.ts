/**
 * Parses a ClickHouse DateTime64(3) string back to a Date, so fakes can
 * compare stored timestamps.
 */
export function parseClickHouseDateTime(datetime: string): Date {
  return new Date(datetime.replace(' ', 'T') + 'Z');
}
