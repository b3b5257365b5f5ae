const DATE_FORMAT: Intl.DateTimeFormatOptions = {
  timeZone: 'UTC',
  year: 'numeric',
  month: 'long',
  day: '2-digit',
};

const TIME_FORMAT: Intl.DateTimeFormatOptions = {
  timeZone: 'UTC',
  hour: '2-digit',
  minute: '2-digit',
  hourCycle: 'h23',
};

/**
 * "October 19, 2026 at 14:05 UTC"; empty string for a missing timestamp
 */
export function formatTimestamp(value: Date | null): string {
  if (!value || Number.isNaN(value.getTime())) return '';
  const date = value.toLocaleDateString('en-US', DATE_FORMAT);
  const time = value.toLocaleTimeString('en-US', TIME_FORMAT);
  return `${date} at ${time} UTC`;
}
