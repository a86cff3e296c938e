/**
 * Firestore hands back `Timestamp` objects for fields written as `Date`.
 * Anything else that is not a valid date reads as null.
 */
export function readDate(value: unknown): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }

  if (
    value !== null &&
    typeof value === 'object' &&
    'toDate' in value &&
    typeof value.toDate === 'function'
  ) {
    const date: unknown = value.toDate();
    return date instanceof Date ? date : null;
  }

  return null;
}

export function toIsoString(value: Date | null): string | null {
  return value ? value.toISOString() : null;
}
