const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * Format a date as "YYYY-MM-DD HH:MM:SS" in local time
 */
export const formatTimestamp = (date: Date): string => {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
};

export const TIMESTAMP_PATTERN = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/;
