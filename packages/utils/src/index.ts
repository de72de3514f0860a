const BYTE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB'] as const;

/**
 * Formats a byte count for display. Values below 1024 print as whole bytes,
 * larger ones are divided by 1024 per unit step up to TB and keep one decimal.
 */
export function formatByteSize(bytes: number): string {
  let size = bytes;
  let unitIndex = 0;

  while (size >= 1024 && unitIndex < BYTE_UNITS.length - 1) {
    size /= 1024;
    unitIndex++;
  }

  if (unitIndex === 0) {
    return `${Math.trunc(size)} ${BYTE_UNITS[unitIndex]}`;
  }

  return `${size.toFixed(1)} ${BYTE_UNITS[unitIndex]}`;
}

export function pluralize(count: number, singular: string, plural: string): string {
  return count === 1 ? singular : plural;
}

export function stringifyJSONSafe(value: unknown): string | undefined {
  try {
    return JSON.stringify(value);
  } catch {
    return;
  }
}
