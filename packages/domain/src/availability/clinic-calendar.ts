import { weekdayOf } from '@vetqueue/core';

/**
 * Answers whether the clinic accepts appointments on a date
 */
export interface ClinicCalendar {
  isOpen(date: string): Promise<boolean>;
}

export interface WeeklyClinicCalendarOptions {
  /** Weekly closing days, 0 = Monday ... 6 = Sunday */
  offDays?: readonly number[];
  /** Closed calendar dates (YYYY-MM-DD) */
  holidays?: readonly string[];
}

/**
 * Calendar from fixed weekly off days plus a holiday list
 */
export class WeeklyClinicCalendar implements ClinicCalendar {
  private readonly offDays: ReadonlySet<number>;
  private readonly holidays: ReadonlySet<string>;

  constructor(options: WeeklyClinicCalendarOptions = {}) {
    this.offDays = new Set(options.offDays ?? []);
    this.holidays = new Set(options.holidays ?? []);
  }

  isOpen(date: string): Promise<boolean> {
    return Promise.resolve(!this.holidays.has(date) && !this.offDays.has(weekdayOf(date)));
  }
}

/**
 * Calendar with no closures
 */
export const alwaysOpenCalendar: ClinicCalendar = {
  isOpen: () => Promise.resolve(true),
};
