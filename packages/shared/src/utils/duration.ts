const TIMEDELTA_PATTERN = /^(?:(\d+) days?, )?(\d+):(\d{2}):(\d{2})(?:\.(\d{1,6}))?$/;

/**
 * Parse a Launchpad duration such as "0:05:00" or "2 days, 3:04:05.250000"
 * into seconds. Returns null for anything else.
 */
export function parseDuration(value: string | null | undefined): number | null {
  if (!value) return null;

  const match = TIMEDELTA_PATTERN.exec(value.trim());
  if (!match) return null;

  const [, days, hours, minutes, seconds, fraction] = match;
  const whole =
    Number(days ?? 0) * 86400 +
    Number(hours) * 3600 +
    Number(minutes) * 60 +
    Number(seconds);

  return fraction ? whole + Number(`0.${fraction}`) : whole;
}

const UNITS: Array<[name: string, seconds: number]> = [
  ["day", 86400],
  ["hour", 3600],
  ["minute", 60],
  ["second", 1],
];

export function humanizeDuration(seconds: number | null): string {
  if (seconds === null) return "unknown";
  if (seconds < 1) return "a moment";

  for (const [name, size] of UNITS) {
    if (seconds >= size) {
      const count = Math.floor(seconds / size);
      return `${count} ${name}${count === 1 ? "" : "s"}`;
    }
  }
  return "a moment";
}
