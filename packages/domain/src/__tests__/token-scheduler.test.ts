import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryKeyedLock, InvariantViolationError, ValidationError, fixedClock } from '@vetqueue/core';
import type { AppointmentSlot } from '@vetqueue/types';
import { DoctorStatusService } from '../availability/doctor-status-service.js';
import { InMemoryDoctorStatusRepository } from '../availability/repositories.js';
import { EmergencyQueue } from '../emergency/emergency-queue.js';
import {
  InMemoryEmergencyCaseRepository,
  InMemoryEmergencyCohortRepository,
} from '../emergency/repositories.js';
import {
  InMemoryAppointmentRepository,
  InMemoryDailyQueueStateRepository,
} from '../scheduling/repositories.js';
import {
  TokenScheduler,
  assertQueueStateTransition,
  estimateWaitMinutes,
} from '../scheduling/token-scheduler.js';

const DATE = '2026-03-10';
const NOW = new Date('2026-03-10T09:00:00Z');

function appointment(id: string, overrides: Partial<AppointmentSlot> = {}): AppointmentSlot {
  return {
    id,
    petRef: `pet-${id}`,
    ownerRef: 'owner-1',
    vetRef: null,
    date: DATE,
    time: '10:00',
    durationMinutes: 30,
    status: 'SCHEDULED',
    priority: 'NORMAL',
    priorityReason: 'Standard appointment: checkup',
    reason: 'Checkup',
    isEmergency: false,
    tokenNumber: null,
    checkInTime: null,
    createdAt: new Date('2026-03-01T12:00:00Z'),
    ...overrides,
  };
}

describe('estimateWaitMinutes', () => {
  it('should be 0 for tokens already called', () => {
    expect(estimateWaitMinutes({ lastCalledToken: 4, avgWaitMinutes: 10 }, 4)).toBe(0);
    expect(estimateWaitMinutes({ lastCalledToken: 4, avgWaitMinutes: 10 }, 1)).toBe(0);
  });

  it('should count patients strictly between the last call and the token', () => {
    expect(estimateWaitMinutes({ lastCalledToken: 2, avgWaitMinutes: 10 }, 5)).toBe(20);
    expect(estimateWaitMinutes({ lastCalledToken: 2, avgWaitMinutes: 10 }, 3)).toBe(0);
  });

  it('should use the default rate when no average is recorded', () => {
    expect(estimateWaitMinutes({ lastCalledToken: 2, avgWaitMinutes: 0 }, 5)).toBe(30);
    expect(estimateWaitMinutes({ lastCalledToken: 2, avgWaitMinutes: 0 }, 5, 20)).toBe(40);
  });
});

describe('assertQueueStateTransition', () => {
  const base = { date: DATE, currentTokenCounter: 5, lastCalledToken: 2, avgWaitMinutes: 0 };

  it('should accept forward moves', () => {
    expect(() => assertQueueStateTransition(base, { ...base, currentTokenCounter: 6, lastCalledToken: 3 })).not.toThrow();
  });

  it('should reject a decreasing counter', () => {
    expect(() => assertQueueStateTransition(base, { ...base, currentTokenCounter: 4 })).toThrow(
      InvariantViolationError
    );
  });

  it('should reject a decreasing last-called token', () => {
    expect(() => assertQueueStateTransition(base, { ...base, lastCalledToken: 1 })).toThrow(
      'Last called token for 2026-03-10 would decrease from 2 to 1'
    );
  });

  it('should reject calling a token that was never issued', () => {
    expect(() => assertQueueStateTransition(base, { ...base, lastCalledToken: 6 })).toThrow(
      'Last called token 6 exceeds issued tokens 5 for 2026-03-10'
    );
  });
});

describe('TokenScheduler', () => {
  let appointments: InMemoryAppointmentRepository;
  let queueStates: InMemoryDailyQueueStateRepository;
  let doctorStatus: DoctorStatusService;
  let emergencyCases: InMemoryEmergencyCaseRepository;
  let emergencyQueue: EmergencyQueue;
  let scheduler: TokenScheduler;

  beforeEach(() => {
    appointments = new InMemoryAppointmentRepository();
    queueStates = new InMemoryDailyQueueStateRepository();
    emergencyCases = new InMemoryEmergencyCaseRepository();
    const clock = fixedClock(NOW);
    const lock = new InMemoryKeyedLock();
    doctorStatus = new DoctorStatusService({ statuses: new InMemoryDoctorStatusRepository(), clock });
    emergencyQueue = new EmergencyQueue({
      cases: emergencyCases,
      cohorts: new InMemoryEmergencyCohortRepository(),
      lock,
      appointments,
      clock,
      idGenerator: () => 'case-1',
    });
    scheduler = new TokenScheduler({
      appointments,
      queueStates,
      lock,
      doctorStatus,
      emergencyQueue,
      clock,
    });
  });

  async function seed(...slots: AppointmentSlot[]): Promise<void> {
    for (const slot of slots) {
      await appointments.save(slot);
    }
  }

  describe('nextToken', () => {
    it('should issue gap-free tokens under concurrency', async () => {
      const tokens = await Promise.all(Array.from({ length: 20 }, () => scheduler.nextToken(DATE)));

      expect([...tokens].sort((a, b) => a - b)).toEqual(Array.from({ length: 20 }, (_, i) => i + 1));
      expect((await queueStates.get(DATE))?.currentTokenCounter).toBe(20);
    });

    it('should keep separate counters per date', async () => {
      await scheduler.nextToken(DATE);
      await scheduler.nextToken(DATE);

      expect(await scheduler.nextToken('2026-03-11')).toBe(1);
      expect(await scheduler.nextToken(DATE)).toBe(3);
    });

    it('should reject malformed dates', async () => {
      await expect(scheduler.nextToken('2026-13-01')).rejects.toThrow(ValidationError);
    });
  });

  describe('estimateWait', () => {
    it('should use the default rate before anything is recorded', async () => {
      expect(await scheduler.estimateWait(DATE, 1)).toBe(0);
      expect(await scheduler.estimateWait(DATE, 3)).toBe(30);
    });

    it('should use the recorded average', async () => {
      await queueStates.save({ date: DATE, currentTokenCounter: 5, lastCalledToken: 2, avgWaitMinutes: 10 });

      expect(await scheduler.estimateWait(DATE, 2)).toBe(0);
      expect(await scheduler.estimateWait(DATE, 5)).toBe(20);
    });
  });

  describe('checkIn', () => {
    it('should issue a token and confirm the appointment', async () => {
      await seed(appointment('a1'));

      const result = await scheduler.checkIn('a1');

      expect(result).toEqual({
        success: true,
        tokenNumber: 1,
        alreadyCheckedIn: false,
        appointment: { ...appointment('a1'), status: 'CONFIRMED', tokenNumber: 1, checkInTime: NOW },
      });
    });

    it('should return the existing token on a repeated check-in', async () => {
      await seed(appointment('a1'), appointment('a2'));
      await scheduler.checkIn('a1');
      await scheduler.checkIn('a2');

      const again = await scheduler.checkIn('a1');

      expect(again.success && again.tokenNumber).toBe(1);
      expect(again.success && again.alreadyCheckedIn).toBe(true);
      expect((await queueStates.get(DATE))?.currentTokenCounter).toBe(2);
    });

    it('should record an explicit arrival time', async () => {
      await seed(appointment('a1'));
      const arrival = new Date('2026-03-10T08:55:00Z');

      const result = await scheduler.checkIn('a1', arrival);

      expect(result.success && result.appointment.checkInTime).toEqual(arrival);
    });

    it('should refuse closed appointments', async () => {
      await seed(appointment('a1', { status: 'CANCELLED' }));

      expect(await scheduler.checkIn('a1')).toEqual({
        success: false,
        error: 'INVALID_TRANSITION',
        status: 'CANCELLED',
      });
    });

    it('should report unknown appointments', async () => {
      expect(await scheduler.checkIn('missing')).toEqual({ success: false, error: 'NOT_FOUND' });
    });

    it('should not issue tokens to emergency appointments', async () => {
      await seed(appointment('e1', { isEmergency: true, priority: 'EMERGENCY' }));

      expect(await scheduler.checkIn('e1')).toEqual({ success: false, error: 'EMERGENCY_APPOINTMENT' });
      expect(await queueStates.get(DATE)).toBeNull();
    });
  });

  describe('callNext', () => {
    it('should call checked-in appointments in token order', async () => {
      await seed(appointment('a1', { time: '11:00' }), appointment('a2', { time: '09:30' }), appointment('a3'));
      await scheduler.checkIn('a1');
      await scheduler.checkIn('a2');

      const first = await scheduler.callNext(DATE, 'vet-1');
      const second = await scheduler.callNext(DATE);
      const third = await scheduler.callNext(DATE);

      expect(first?.id).toBe('a1');
      expect(first?.status).toBe('IN_PROGRESS');
      expect(first?.vetRef).toBe('vet-1');
      expect(second?.id).toBe('a2');
      expect(second?.vetRef).toBeNull();
      expect(third).toBeNull();
      expect((await queueStates.get(DATE))?.lastCalledToken).toBe(2);
    });

    it('should mark the calling doctor busy with the appointment', async () => {
      await seed(appointment('a1'));
      await scheduler.checkIn('a1');

      await scheduler.callNext(DATE, 'vet-1');

      const status = await doctorStatus.getStatus('vet-1');
      expect(status.state).toBe('BUSY');
      expect(status.currentAppointmentRef).toBe('a1');
    });

    it('should record the calling doctor over the booked one', async () => {
      await seed(appointment('a1', { vetRef: 'vet-2' }));
      await scheduler.checkIn('a1');

      const called = await scheduler.callNext(DATE, 'vet-1');

      expect(called?.vetRef).toBe('vet-1');
      expect((await appointments.findById('a1'))?.vetRef).toBe('vet-1');
    });

    it('should keep the booked doctor when nobody is named', async () => {
      await seed(appointment('a1', { vetRef: 'vet-2' }));
      await scheduler.checkIn('a1');

      expect((await scheduler.callNext(DATE))?.vetRef).toBe('vet-2');
    });

    it('should skip emergency appointments holding a token', async () => {
      await seed(
        appointment('e1', { isEmergency: true, priority: 'EMERGENCY', status: 'CONFIRMED', tokenNumber: 1 }),
        appointment('a2')
      );
      await queueStates.save({ date: DATE, currentTokenCounter: 1, lastCalledToken: 0, avgWaitMinutes: 0 });
      await scheduler.checkIn('a2');

      expect((await scheduler.callNext(DATE))?.id).toBe('a2');
      expect(await scheduler.callNext(DATE)).toBeNull();
      expect((await appointments.findById('e1'))?.status).toBe('CONFIRMED');
    });

    it('should return null on an empty day', async () => {
      expect(await scheduler.callNext(DATE)).toBeNull();
    });
  });

  describe('queueSnapshot', () => {
    it('should list waiting tokens with position and estimate', async () => {
      await seed(appointment('a1'), appointment('a2'), appointment('a3'), appointment('a4'));
      await scheduler.checkIn('a1');
      await scheduler.checkIn('a2');
      await scheduler.checkIn('a3');
      await scheduler.callNext(DATE);

      const snapshot = await scheduler.queueSnapshot(DATE);

      expect(snapshot.state).toEqual({
        date: DATE,
        currentTokenCounter: 3,
        lastCalledToken: 1,
        avgWaitMinutes: 0,
      });
      expect(
        snapshot.waiting.map(({ appointment: slot, tokenNumber, patientsAhead, estimatedWaitMinutes }) => ({
          id: slot.id,
          tokenNumber,
          patientsAhead,
          estimatedWaitMinutes,
        }))
      ).toEqual([
        { id: 'a2', tokenNumber: 2, patientsAhead: 0, estimatedWaitMinutes: 0 },
        { id: 'a3', tokenNumber: 3, patientsAhead: 1, estimatedWaitMinutes: 15 },
      ]);
    });

    it('should leave emergency appointments out of the waiting list', async () => {
      await seed(
        appointment('e1', { isEmergency: true, priority: 'EMERGENCY', status: 'CONFIRMED', tokenNumber: 1 }),
        appointment('a2')
      );
      await queueStates.save({ date: DATE, currentTokenCounter: 1, lastCalledToken: 0, avgWaitMinutes: 0 });
      await scheduler.checkIn('a2');

      const snapshot = await scheduler.queueSnapshot(DATE);

      expect(snapshot.waiting.map((entry) => entry.appointment.id)).toEqual(['a2']);
    });
  });

  describe('status transitions', () => {
    it('should complete a called appointment and free the doctor', async () => {
      await seed(appointment('a1'));
      await scheduler.checkIn('a1');
      await scheduler.callNext(DATE, 'vet-1');

      const result = await scheduler.complete('a1');

      expect(result.success && result.appointment.status).toBe('COMPLETED');
      expect((await doctorStatus.getStatus('vet-1')).state).toBe('AVAILABLE');
    });

    it('should free the calling doctor rather than the booked one', async () => {
      await seed(appointment('a1', { vetRef: 'vet-2' }));
      await doctorStatus.markBusy('vet-2', 'other-appointment');
      await scheduler.checkIn('a1');
      await scheduler.callNext(DATE, 'vet-1');

      await scheduler.complete('a1');

      expect((await doctorStatus.getStatus('vet-1')).state).toBe('AVAILABLE');
      expect(await doctorStatus.getStatus('vet-2')).toMatchObject({
        state: 'BUSY',
        currentAppointmentRef: 'other-appointment',
      });
    });

    it('should resolve the emergency case linked to a completed appointment', async () => {
      await seed(appointment('e1', { isEmergency: true, priority: 'EMERGENCY' }));
      await emergencyQueue.enqueue({
        petRef: 'pet-e1',
        ownerRef: 'owner-1',
        appointmentRef: 'e1',
        severity: 'SEVERE',
        symptoms: 'Collapsed',
      });

      const result = await scheduler.complete('e1');

      expect(result.success && result.appointment.status).toBe('COMPLETED');
      expect(await emergencyCases.findById('case-1')).toMatchObject({ status: 'RESOLVED', resolvedAt: NOW });
    });

    it('should complete an emergency appointment without a linked case', async () => {
      await seed(appointment('e1', { isEmergency: true, priority: 'EMERGENCY' }));

      const result = await scheduler.complete('e1');

      expect(result.success && result.appointment.status).toBe('COMPLETED');
    });

    it('should not complete an appointment that was never called', async () => {
      await seed(appointment('a1'));

      expect(await scheduler.complete('a1')).toEqual({
        success: false,
        error: 'INVALID_TRANSITION',
        status: 'SCHEDULED',
      });
    });

    it('should cancel and mark no-shows on open appointments only', async () => {
      await seed(appointment('a1'), appointment('a2'));

      expect((await scheduler.cancel('a1')).success).toBe(true);
      expect((await scheduler.markNoShow('a2')).success).toBe(true);
      expect(await scheduler.cancel('a2')).toEqual({
        success: false,
        error: 'INVALID_TRANSITION',
        status: 'NO_SHOW',
      });
    });

    it('should never call a cancelled appointment', async () => {
      await seed(appointment('a1'), appointment('a2'));
      await scheduler.checkIn('a1');
      await scheduler.checkIn('a2');
      await scheduler.cancel('a1');

      expect((await scheduler.callNext(DATE))?.id).toBe('a2');
    });

    it('should report unknown appointments', async () => {
      expect(await scheduler.markNoShow('missing')).toEqual({ success: false, error: 'NOT_FOUND' });
    });
  });
});
