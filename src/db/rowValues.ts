/**
 * Column values come back differently per driver: pg returns bigint
 * columns as strings and timestamps as Date, sqlite3 returns what was stored.
 */
export type DbTimestamp = string | Date;
export type DbInteger = number | string;

export function toIsoString(value: DbTimestamp): string {
  return value instanceof Date ? value.toISOString() : value;
}

export function toNullableIsoString(value: DbTimestamp | null | undefined): string | null {
  return value === null || value === undefined ? null : toIsoString(value);
}

export function toInteger(value: DbInteger | null | undefined): number {
  if (value === null || value === undefined) {
    return 0;
  }
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed)) {
    throw new Error(`Expected an integer column value, got ${String(value)}`);
  }
  return parsed;
}

export function parseStoredEnum<T extends string>(
  value: string,
  guard: (candidate: string) => candidate is T,
  column: string
): T {
  if (!guard(value)) {
    throw new Error(`Unexpected value "${value}" in ${column}`);
  }
  return value;
}

/**
 * Collects `person_id`/`total` rows of a grouped SUM into a map.
 */
export function toTotalsMap(rows: Record<string, unknown>[]): Map<string, number> {
  const totals = new Map<string, number>();
  for (const row of rows) {
    const total = row.total;
    totals.set(
      String(row.person_id),
      typeof total === 'number' || typeof total === 'string' ? toInteger(total) : 0
    );
  }
  return totals;
}
