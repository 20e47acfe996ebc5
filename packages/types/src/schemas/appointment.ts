/**
 * Appointment and Daily Queue Schemas
 *
 * @module @vetqueue/types/schemas/appointment
 */
import { z } from 'zod';

import { CalendarDateSchema, EntityRefSchema, TimeOfDaySchema, TimestampSchema } from './common.js';
import { PrioritySchema } from './triage.js';

export const AppointmentStatusSchema = z.enum([
  'SCHEDULED',
  'CONFIRMED',
  'IN_PROGRESS',
  'COMPLETED',
  'CANCELLED',
  'NO_SHOW',
]);

export const AppointmentSlotSchema = z.object({
  id: z.string().min(1),
  petRef: EntityRefSchema,
  ownerRef: EntityRefSchema,
  vetRef: EntityRefSchema.nullable(),
  date: CalendarDateSchema,
  time: TimeOfDaySchema,
  durationMinutes: z.number().int().positive(),
  status: AppointmentStatusSchema,
  /** Derived from the triage verdict at booking time */
  priority: PrioritySchema,
  priorityReason: z.string(),
  reason: z.string(),
  isEmergency: z.boolean(),
  /** Daily FIFO key, assigned at check-in */
  tokenNumber: z.number().int().positive().nullable(),
  checkInTime: TimestampSchema.nullable(),
  createdAt: TimestampSchema,
});

/**
 * Booking request as received from the booking surface
 */
export const BookingRequestSchema = z.object({
  petRef: EntityRefSchema,
  ownerRef: EntityRefSchema,
  vetRef: EntityRefSchema.optional(),
  date: CalendarDateSchema,
  time: TimeOfDaySchema,
  durationMinutes: z.number().int().min(5).max(240).default(30),
  reason: z.string().max(5000),
});

export const DailyQueueStateSchema = z.object({
  date: CalendarDateSchema,
  currentTokenCounter: z.number().int().min(0),
  lastCalledToken: z.number().int().min(0),
  /** Minutes per patient; 0 means "not measured yet" */
  avgWaitMinutes: z.number().int().min(0),
});

export type AppointmentStatus = z.infer<typeof AppointmentStatusSchema>;
export type AppointmentSlot = z.infer<typeof AppointmentSlotSchema>;
export type BookingRequest = z.input<typeof BookingRequestSchema>;
export type ParsedBookingRequest = z.infer<typeof BookingRequestSchema>;
export type DailyQueueState = z.infer<typeof DailyQueueStateSchema>;
