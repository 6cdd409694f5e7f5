const COMPASS_POINTS = [
  'N', 'NNE', 'NE', 'ENE', 'E', 'ESE', 'SE', 'SSE',
  'S', 'SSW', 'SW', 'WSW', 'W', 'WNW', 'NW', 'NNW',
];

export function unixToDate(unixSeconds: number): string {
  const date = new Date(unixSeconds * 1000);
  return date.toISOString().slice(0, 10);
}

export function unixTimeToTimeOfDay(unixSeconds: number | undefined, timeZone = 'UTC'): string {
  if (!unixSeconds) return '';
  const date = new Date(unixSeconds * 1000);
  const time = date.toLocaleTimeString('en-GB', {
    hour: '2-digit',
    minute: '2-digit',
    hourCycle: 'h23',
    timeZone,
  });
  return `${time} ${timeZone}`;
}

export function unixToDayName(unixSeconds: number): string {
  return new Date(unixSeconds * 1000).toLocaleDateString('en-US', {
    weekday: 'long',
    timeZone: 'UTC',
  });
}

// e.g. "November 05"
export function unixToMonthDay(unixSeconds: number): string {
  return new Date(unixSeconds * 1000).toLocaleDateString('en-US', {
    month: 'long',
    day: '2-digit',
    timeZone: 'UTC',
  });
}

/**
 * Converts a wind bearing in degrees to a 16-point compass direction.
 * Returns `N/A` when the bearing is missing or not a number.
 */
export function getWindDirection(degrees: number | undefined): string {
  if (degrees === undefined || !Number.isFinite(degrees)) return 'N/A';
  const index = Math.trunc((degrees + 11.25) / 22.5) % 16;
  return COMPASS_POINTS[(index + 16) % 16];
}

export function roundTo1(value: number): number {
  return Number(value.toFixed(1));
}

export function capitalize(text: string): string {
  if (!text) return text;
  return text.charAt(0).toUpperCase() + text.slice(1).toLowerCase();
}
