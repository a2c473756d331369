export interface FieldChange {
  old: unknown;
  new: unknown;
}

/**
 * Builds `{ field: { old, new } }` for every listed field the patch sets.
 */
export function diffChanges<T extends object>(
  before: T,
  patch: Partial<T>,
  fields: readonly (keyof T & string)[],
): Record<string, FieldChange> {
  const changes: Record<string, FieldChange> = {};
  for (const field of fields) {
    const next = patch[field];
    if (next !== undefined) {
      changes[field] = { old: before[field], new: next };
    }
  }
  return changes;
}
