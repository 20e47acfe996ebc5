/**
 * Doctor Availability and Status Schemas
 *
 * @module @vetqueue/types/schemas/availability
 */
import { z } from 'zod';

import { CalendarDateSchema, EntityRefSchema, TimeOfDaySchema, TimestampSchema } from './common.js';

/**
 * Weekday index, Monday = 0 ... Sunday = 6
 */
export const WeekdaySchema = z.number().int().min(0).max(6);

const AvailabilityWindowSchema = z.object({
  vetRef: EntityRefSchema,
  startTime: TimeOfDaySchema,
  endTime: TimeOfDaySchema,
  isAvailable: z.boolean().default(true),
});

export const RecurringAvailabilitySchema = AvailabilityWindowSchema.extend({
  kind: z.literal('recurring'),
  weekday: WeekdaySchema,
});

export const DateAvailabilitySchema = AvailabilityWindowSchema.extend({
  kind: z.literal('date'),
  date: CalendarDateSchema,
});

export const DoctorAvailabilitySchema = z
  .discriminatedUnion('kind', [RecurringAvailabilitySchema, DateAvailabilitySchema])
  .refine((record) => record.endTime > record.startTime, {
    message: 'End time must be after start time',
    path: ['endTime'],
  });

export const DoctorStateSchema = z.enum([
  'AVAILABLE',
  'BUSY',
  'ON_LEAVE',
  'BREAK',
  'EMERGENCY',
  'OFF_DUTY',
]);

export const DoctorStatusSchema = z.object({
  vetRef: EntityRefSchema,
  state: DoctorStateSchema,
  statusMessage: z.string().default(''),
  leaveStart: CalendarDateSchema.nullable(),
  leaveEnd: CalendarDateSchema.nullable(),
  leaveReason: z.string().default(''),
  currentAppointmentRef: z.string().nullable(),
  updatedAt: TimestampSchema,
});

export type Weekday = z.infer<typeof WeekdaySchema>;
export type RecurringAvailability = z.infer<typeof RecurringAvailabilitySchema>;
export type DateAvailability = z.infer<typeof DateAvailabilitySchema>;
export type DoctorAvailability = z.infer<typeof DoctorAvailabilitySchema>;
export type DoctorState = z.infer<typeof DoctorStateSchema>;
export type DoctorStatus = z.infer<typeof DoctorStatusSchema>;
