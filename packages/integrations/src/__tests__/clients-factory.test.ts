import { describe, it, expect, vi, beforeEach } from 'vitest';
import { fileURLToPath } from 'node:url';
import { fixedClock, validateEnv } from '@vetqueue/core';
import { InMemoryAppointmentRepository, WeeklyClinicCalendar } from '@vetqueue/domain';

const mockCreate = vi.hoisted(() => vi.fn());

vi.mock('openai', () => {
  class MockOpenAI {
    chat = {
      completions: {
        create: mockCreate,
      },
    };
  }
  return { default: MockOpenAI };
});

import { createClinicServices, createTriageClients } from '../clients-factory.js';

const SAMPLE_DATA_DIR = fileURLToPath(new URL('../../data', import.meta.url));
const NOW = new Date('2026-03-09T08:00:00Z');

describe('clients-factory', () => {
  beforeEach(() => {
    mockCreate.mockReset();
    mockCreate.mockResolvedValue({
      choices: [{ message: { content: 'Category: Urgent\nReason: Needs a vet within a day' } }],
    });
  });

  describe('createTriageClients', () => {
    it('should fall back to keywords only without optional config', async () => {
      const clients = await createTriageClients(validateEnv({ NODE_ENV: 'test' }));

      expect(clients.reasoningService).toBeNull();
      expect(clients.patternLibrary).toBeNull();
      expect(clients.isConfigured([])).toBe(true);
      expect(clients.isConfigured(['reasoning'])).toBe(false);
      expect(clients.imageEvidence).toEqual({ seriousLabels: ['MANGE', 'RINGWORM'], confidenceThreshold: 0.8 });

      const verdict = await clients.triageEngine.classify('Dog was hit by a car');
      expect(verdict.source).toBe('keyword_classifier');
      expect(mockCreate).not.toHaveBeenCalled();
    });

    it('should consult the reasoning service when a key is configured', async () => {
      const clients = await createTriageClients(
        validateEnv({ NODE_ENV: 'test', OPENAI_API_KEY: 'sk-test-key-12345', REASONING_MODEL: 'gpt-4o' })
      );

      expect(clients.isConfigured(['reasoning'])).toBe(true);

      const verdict = await clients.triageEngine.classify('My dog has been limping since yesterday');
      expect(verdict).toMatchObject({
        priority: 'HIGH',
        reason: 'Needs a vet within a day',
        source: 'reasoning_service',
      });
      expect(mockCreate).toHaveBeenCalledWith(expect.objectContaining({ model: 'gpt-4o', temperature: 0.2 }), {
        signal: expect.any(AbortSignal),
      });
    });

    it('should load the pattern library from the configured directory', async () => {
      const clients = await createTriageClients(
        validateEnv({ NODE_ENV: 'test', PATTERN_LIBRARY_DIR: SAMPLE_DATA_DIR })
      );

      expect(clients.isConfigured(['patternLibrary'])).toBe(true);

      const verdict = await clients.triageEngine.classify('Cat chewed lily leaves and is drooling');
      expect(verdict).toMatchObject({
        priority: 'EMERGENCY',
        reason: 'Acute kidney injury risk from lily toxin',
        source: 'pattern_matcher',
        matchType: 'exact',
        matchScore: 1,
      });
    });

    it('should disable the pattern tier when the directory is unreadable', async () => {
      const clients = await createTriageClients(
        validateEnv({ NODE_ENV: 'test', PATTERN_LIBRARY_DIR: '/nonexistent/pattern-library' })
      );

      expect(clients.patternLibrary).toBeNull();
      expect(clients.isConfigured(['patternLibrary'])).toBe(false);
    });

    it('should pass image evidence settings through', async () => {
      const clients = await createTriageClients(
        validateEnv({ NODE_ENV: 'test', SERIOUS_SKIN_CONDITIONS: 'mange, hot spot', IMAGE_CONFIDENCE_THRESHOLD: '0.6' })
      );

      expect(clients.imageEvidence).toEqual({ seriousLabels: ['MANGE', 'HOT SPOT'], confidenceThreshold: 0.6 });
    });
  });

  describe('createClinicServices', () => {
    it('should wire booking, emergency queue and token scheduler together', async () => {
      const services = await createClinicServices({
        env: validateEnv({ NODE_ENV: 'test', DEFAULT_AVG_WAIT_MINUTES: '20' }),
        clock: fixedClock(NOW),
        calendar: new WeeklyClinicCalendar({ offDays: [6] }),
      });

      const emergency = await services.booking.book({
        petRef: 'pet-1',
        ownerRef: 'owner-1',
        date: '2026-03-10',
        time: '09:00',
        reason: 'Dog was hit by a car, severe bleeding',
      });
      expect(emergency.success && emergency.emergencyCase?.queueNumber).toBe(1);
      expect(await services.emergencyQueue.activeOrdered()).toHaveLength(1);

      const routine = await services.booking.book({
        petRef: 'pet-2',
        ownerRef: 'owner-2',
        date: '2026-03-10',
        time: '10:00',
        reason: 'Annual vaccination checkup',
      });
      expect(routine.success).toBe(true);
      if (!routine.success) return;

      const checkIn = await services.tokenScheduler.checkIn(routine.appointment.id);
      expect(checkIn.success && checkIn.tokenNumber).toBe(1);
      expect(await services.tokenScheduler.estimateWait('2026-03-10', 3)).toBe(40);
    });

    it('should close an emergency booking once its case is resolved', async () => {
      const appointments = new InMemoryAppointmentRepository();
      const services = await createClinicServices({
        env: validateEnv({ NODE_ENV: 'test' }),
        repositories: { appointments },
        clock: fixedClock(NOW),
      });

      const emergency = await services.booking.book({
        petRef: 'pet-1',
        ownerRef: 'owner-1',
        date: '2026-03-10',
        time: '09:00',
        reason: 'Dog was hit by a car, severe bleeding',
      });
      if (!emergency.success || !emergency.emergencyCase) {
        throw new Error('expected an emergency case');
      }

      const resolved = await services.emergencyQueue.resolve(emergency.emergencyCase.id, {
        actorId: 'front-desk',
        isAdministrator: true,
      });

      expect(resolved.success).toBe(true);
      expect((await appointments.findById(emergency.appointment.id))?.status).toBe('COMPLETED');
      expect(await services.tokenScheduler.checkIn(emergency.appointment.id)).toEqual({
        success: false,
        error: 'EMERGENCY_APPOINTMENT',
      });
    });

    it('should reject bookings on days the calendar closes', async () => {
      const services = await createClinicServices({
        env: validateEnv({ NODE_ENV: 'test' }),
        clock: fixedClock(NOW),
        calendar: new WeeklyClinicCalendar({ offDays: [6] }),
      });

      const outcome = await services.booking.book({
        petRef: 'pet-1',
        ownerRef: 'owner-1',
        date: '2026-03-15',
        time: '09:00',
        reason: 'Checkup',
      });

      expect(!outcome.success && outcome.error).toBe('CLINIC_CLOSED');
    });
  });
});
