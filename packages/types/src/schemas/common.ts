/**
 * Common schemas shared across the platform
 */
import { z } from 'zod';

/**
 * Calendar date in ISO 8601 form (no time, no zone)
 */
export const CalendarDateSchema = z
  .string()
  .regex(/^\d{4}-(0[1-9]|1[0-2])-(0[1-9]|[12]\d|3[01])$/, 'Date must be YYYY-MM-DD')
  .refine((value) => {
    const [year, month, day] = value.split('-').map(Number);
    const date = new Date(Date.UTC(year ?? 0, (month ?? 1) - 1, day ?? 1));
    return date.getUTCMonth() + 1 === month && date.getUTCDate() === day;
  }, 'Date does not exist in the calendar')
  .describe('Calendar date YYYY-MM-DD');

/**
 * Time of day, 24h clock
 */
export const TimeOfDaySchema = z
  .string()
  .regex(/^([01]\d|2[0-3]):([0-5]\d)$/, 'Time must be HH:MM (24h)')
  .describe('Time of day HH:MM');

/**
 * Opaque reference to an entity owned by another bounded context (pet, owner, vet)
 */
export const EntityRefSchema = z.string().trim().min(1).max(128).describe('Entity reference');

/**
 * ISO 8601 timestamp
 */
export const TimestampSchema = z.coerce.date().describe('ISO 8601 timestamp');

/**
 * Unit interval score
 */
export const UnitScoreSchema = z.number().min(0).max(1);

export type CalendarDate = z.infer<typeof CalendarDateSchema>;
export type TimeOfDay = z.infer<typeof TimeOfDaySchema>;
export type EntityRef = z.infer<typeof EntityRefSchema>;
