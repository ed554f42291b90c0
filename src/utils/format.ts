/**
 * Shared formatting utilities
 *
 * Consistent display formats for byte counts, bitrates, percentages,
 * frequencies and timestamps.
 */

/**
 * Formats bytes into a human-readable string with appropriate units.
 *
 * @param bytes - The number of bytes to format
 * @returns Formatted string (e.g., "3.1 GB", "256 KB", "0 B")
 */
export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 B';

  const units = ['B', 'KB', 'MB', 'GB', 'TB', 'PB'];
  const base = 1024;

  const exponent = Math.floor(Math.log(bytes) / Math.log(base));
  const unitIndex = Math.min(exponent, units.length - 1);

  const value = bytes / Math.pow(base, unitIndex);

  if (unitIndex === 0) {
    return `${Math.round(value)} ${units[unitIndex]}`;
  }

  return `${value.toFixed(1)} ${units[unitIndex]}`;
}

/**
 * Formats a bitrate in bits/second using decimal units.
 *
 * @returns Formatted string (e.g., "2.1 Mbit/s", "640 kbit/s")
 */
export function formatBitrate(bitsPerSecond: number): string {
  if (bitsPerSecond === 0) return '0 bit/s';

  const units = ['bit/s', 'kbit/s', 'Mbit/s', 'Gbit/s'];
  const base = 1000;

  const exponent = Math.floor(Math.log(bitsPerSecond) / Math.log(base));
  const unitIndex = Math.min(exponent, units.length - 1);

  const value = bitsPerSecond / Math.pow(base, unitIndex);

  if (unitIndex === 0 || value >= 100) {
    return `${Math.round(value)} ${units[unitIndex]}`;
  }

  return `${value.toFixed(1)} ${units[unitIndex]}`;
}

/**
 * Formats a percentage (0-100) as a whole-number string.
 *
 * @returns Formatted percentage string (e.g., "67%")
 */
export function formatPercent(percent: number): string {
  return `${Math.round(percent)}%`;
}

/**
 * Formats a frequency in MHz.
 */
export function formatFrequency(megahertz: number): string {
  return `${megahertz} MHz`;
}

/**
 * Formats a timestamp for event display.
 *
 * @param date - The date to format, or null when unknown
 * @returns Local time as YYYY-MM-DD HH:MM:SS, or "--" for null
 */
export function formatTimestamp(date: Date | null): string {
  if (!date) return '--';

  const pad = (value: number) => value.toString().padStart(2, '0');
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

/**
 * Truncates a string to a maximum length, adding ellipsis if needed.
 *
 * @param text - The string to truncate
 * @param maxLength - Maximum length including ellipsis
 * @returns Truncated string
 */
export function truncateText(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return text.slice(0, maxLength - 1) + '…'; // ellipsis
}
