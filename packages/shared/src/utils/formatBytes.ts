export type ByteUnit = 'KB' | 'MB' | 'GB' | 'TB';

const UNIT_SIZES: Record<ByteUnit, number> = {
  KB: 1024,
  MB: 1024 ** 2,
  GB: 1024 ** 3,
  TB: 1024 ** 4
};

/**
 * Convert a byte count into a human readable string.
 * Picks the largest unit below the value unless `unit` pins one (traffic reports use GB).
 */
export function formatBytes(bytes: number, decimals = 1, unit?: ByteUnit): string {
  const clampedBytes = Number.isFinite(bytes) ? Math.max(0, bytes) : 0;
  const resolvedUnit = unit ?? pickUnit(clampedBytes);
  return `${formatNumber(clampedBytes / UNIT_SIZES[resolvedUnit], decimals)} ${resolvedUnit}`;
}

function pickUnit(bytes: number): ByteUnit {
  if (bytes < UNIT_SIZES.MB) return 'KB';
  if (bytes < UNIT_SIZES.GB) return 'MB';
  if (bytes < UNIT_SIZES.TB) return 'GB';
  return 'TB';
}

function formatNumber(value: number, decimals: number): string {
  const safeDecimals = Math.max(0, Math.floor(decimals));
  return value
    .toFixed(safeDecimals)
    .replace(/(?:\.0+|(\.\d+?)0+)$/, '$1');
}
