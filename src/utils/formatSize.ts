const UNITS = ["B", "KB", "MB", "GB"] as const;

/**
 * Renders a byte count with two decimals in the largest unit that keeps it
 * under 1024, capped at GB. Missing sizes render as "Unknown size".
 */
export function formatSize(bytes: number | null | undefined): string {
  if (bytes === null || bytes === undefined) {
    return "Unknown size";
  }

  let value = bytes;
  let unitIndex = 0;
  while (value >= 1024 && unitIndex < UNITS.length - 1) {
    value /= 1024;
    unitIndex++;
  }

  return `${value.toFixed(2)} ${UNITS[unitIndex]}`;
}
