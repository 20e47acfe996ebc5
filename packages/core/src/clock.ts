/**
 * Clock abstraction and calendar helpers
 *
 * "Today" is a clinic-local notion: it is computed from an injected clock and
 * the clinic's IANA time zone, never from the host's local time.
 */

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

/**
 * Clock frozen at a given instant (tests, replay)
 */
export function fixedClock(instant: Date | string): Clock {
  const frozen = new Date(instant);
  return { now: () => new Date(frozen) };
}

const formatterCache = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatterCache.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      hourCycle: 'h23',
    });
    formatterCache.set(timeZone, formatter);
  }
  return formatter;
}

function zonedParts(instant: Date, timeZone: string): Record<string, string> {
  const parts: Record<string, string> = {};
  for (const part of formatterFor(timeZone).formatToParts(instant)) {
    parts[part.type] = part.value;
  }
  return parts;
}

/**
 * Calendar date (YYYY-MM-DD) of an instant in the given time zone
 */
export function toCalendarDate(instant: Date, timeZone = 'UTC'): string {
  const parts = zonedParts(instant, timeZone);
  return `${parts.year}-${parts.month}-${parts.day}`;
}

/**
 * Wall-clock time (HH:MM) of an instant in the given time zone
 */
export function toTimeOfDay(instant: Date, timeZone = 'UTC'): string {
  const parts = zonedParts(instant, timeZone);
  return `${parts.hour}:${parts.minute}`;
}

/**
 * Weekday of a calendar date, 0 = Monday ... 6 = Sunday
 */
export function weekdayOf(calendarDate: string): number {
  const sundayBased = new Date(`${calendarDate}T00:00:00Z`).getUTCDay();
  return (sundayBased + 6) % 7;
}

/**
 * Minutes since midnight for an HH:MM string
 */
export function minutesOfDay(timeOfDay: string): number {
  const [hours = '0', minutes = '0'] = timeOfDay.split(':');
  return Number(hours) * 60 + Number(minutes);
}
