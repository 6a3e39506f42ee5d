import type { TimestampTimezone } from "../checker/types";

const pad = (value: number, width = 2): string => String(value).padStart(width, "0");

/**
 * Format a date as `YYYY-MM-DD HH:MM:SS`, in local time or UTC
 */
export function formatTimestamp(date: Date, timezone: TimestampTimezone = "local"): string {
  const parts =
    timezone === "utc"
      ? [
          date.getUTCFullYear(),
          date.getUTCMonth() + 1,
          date.getUTCDate(),
          date.getUTCHours(),
          date.getUTCMinutes(),
          date.getUTCSeconds(),
        ]
      : [
          date.getFullYear(),
          date.getMonth() + 1,
          date.getDate(),
          date.getHours(),
          date.getMinutes(),
          date.getSeconds(),
        ];

  const [year, month, day, hours, minutes, seconds] = parts.map((part, i) =>
    pad(part, i === 0 ? 4 : 2),
  );
  return `${year}-${month}-${day} ${hours}:${minutes}:${seconds}`;
}
