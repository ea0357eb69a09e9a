import safeStringify from 'fast-safe-stringify';

/**
 * Approximate serialized size of a value in bytes (UTF-8 length of its JSON form).
 * Circular references are replaced rather than thrown on.
 */
export function estimateValueSize(value: unknown): number {
  if (value === null || typeof value === 'undefined') {
    return 0;
  }
  const serialized = safeStringify(value);
  return Buffer.byteLength(serialized, 'utf8');
}

/**
 * Format bytes as a human-readable string
 */
export function formatBytes(bytes: number, binary: boolean = false): string {
  if (bytes === 0) return '0 B';
  if (bytes < 0) return `${bytes} B`;

  const k = binary ? 1024 : 1000;
  const sizes = binary
    ? ['B', 'KiB', 'MiB', 'GiB', 'TiB', 'PiB']
    : ['B', 'KB', 'MB', 'GB', 'TB', 'PB'];

  const i = Math.min(sizes.length - 1, Math.floor(Math.log(bytes) / Math.log(k)));
  const size = bytes / Math.pow(k, i);

  // Show decimals only if needed
  const formatted = size % 1 === 0 ? size.toString() : size.toFixed(1);

  return `${formatted} ${sizes[i]}`;
}
