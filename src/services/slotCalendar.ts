import { SchedulingStore } from '../repositories/SchedulingStore';
import { AvailabilitySlot, Failure, SchedulingOptions, StaffMember, WeekdayRule, fail } from '../types/scheduling';
import {
  compareTimes,
  dateRange,
  isValidDate,
  isValidTimeZone,
  localDate,
  slotInstant,
  weekdayOf,
} from '../utils/scheduling';
import { isWeekday } from '../utils/validation';

export type CalendarResult<T> = { ok: true; value: T } | Failure<'ValidationError'>;

export type CalendarOptions = Pick<SchedulingOptions, 'slotTimes' | 'defaultWorkdays' | 'defaultTimeZone'>;

/**
 * Per-staff availability: a weekly template of enabled weekdays plus explicit per-date/per-time
 * overrides. A time unit is offerable when the staff member is active, the time belongs to the
 * daily template, its weekday is enabled, no override closes it and it is still in the future
 * in the staff member's zone.
 */
export class SlotCalendar {
  constructor(private readonly store: SchedulingStore, private readonly options: CalendarOptions) {}

  // Same calendar bound to another store, typically a transaction
  withStore(store: SchedulingStore): SlotCalendar {
    return new SlotCalendar(store, this.options);
  }

  get slotTimes(): string[] {
    return this.options.slotTimes;
  }

  timeZoneOf(staff: Pick<StaffMember, 'timeZone'> | null | undefined): string {
    const tz = staff?.timeZone;
    return tz && isValidTimeZone(tz) ? tz : this.options.defaultTimeZone;
  }

  isTemplateTime(time: string): boolean {
    return this.options.slotTimes.includes(time);
  }

  async isOfferable(staffId: number, date: string, time: string, now: Date): Promise<boolean> {
    if (!isValidDate(date) || !this.isTemplateTime(time)) return false;
    const staff = await this.store.findStaff(staffId);
    if (!staff || !staff.isStaff) return false;
    if (!slotInstantIsAfter(date, time, this.timeZoneOf(staff), now)) return false;

    const weekdays = effectiveWeekdays(await this.store.findWeekdayRules(staffId), this.options.defaultWorkdays);
    if (!weekdays[weekdayOf(date)]) return false;

    const override = await this.store.findSlot(staffId, date, time);
    return !override || override.isAvailable;
  }

  // Template times of `date` that are offerable, ascending
  async listOfferableTimes(staffId: number, date: string, now: Date): Promise<string[]> {
    if (!isValidDate(date)) return [];
    const staff = await this.store.findStaff(staffId);
    if (!staff || !staff.isStaff) return [];

    const weekdays = effectiveWeekdays(await this.store.findWeekdayRules(staffId), this.options.defaultWorkdays);
    if (!weekdays[weekdayOf(date)]) return [];

    const closed = closedTimes(await this.store.findSlotsForDate(staffId, date));
    const tz = this.timeZoneOf(staff);
    return this.options.slotTimes
      .filter(t => !closed.has(t) && slotInstantIsAfter(date, t, tz, now))
      .sort(compareTimes);
  }

  // Dates of the forward window (starting today in the staff zone) with at least one offerable time
  async listOfferableDates(staffId: number, now: Date, windowDays: number): Promise<string[]> {
    const staff = await this.store.findStaff(staffId);
    if (!staff || !staff.isStaff) return [];

    const weekdays = effectiveWeekdays(await this.store.findWeekdayRules(staffId), this.options.defaultWorkdays);
    const tz = this.timeZoneOf(staff);
    const out: string[] = [];
    for (const date of dateRange(localDate(now, tz), windowDays)) {
      if (!weekdays[weekdayOf(date)]) continue;
      const closed = closedTimes(await this.store.findSlotsForDate(staffId, date));
      if (this.options.slotTimes.some(t => !closed.has(t) && slotInstantIsAfter(date, t, tz, now))) out.push(date);
    }
    return out;
  }

  async getWeekdays(staffId: number): Promise<boolean[]> {
    return effectiveWeekdays(await this.store.findWeekdayRules(staffId), this.options.defaultWorkdays);
  }

  async setWeekdayEnabled(staffId: number, weekday: number, enabled: boolean): Promise<CalendarResult<WeekdayRule>> {
    if (!isWeekday(weekday)) return fail('ValidationError', 'Weekday must be an integer from 0 (Monday) to 6 (Sunday)');
    const rule = await this.store.upsertWeekdayRule({ staffId, weekday, enabled });
    return { ok: true, value: rule };
  }

  async setSlotAvailability(staffId: number, date: string, time: string, available: boolean): Promise<CalendarResult<AvailabilitySlot>> {
    if (!isValidDate(date)) return fail('ValidationError', 'Date must be a calendar date in YYYY-MM-DD format');
    if (!this.isTemplateTime(time)) {
      return fail('ValidationError', `Time must be one of ${this.options.slotTimes.join(', ')}`);
    }
    // Opening a time that an active appointment occupies leaves it held by that appointment;
    // any other explicit staff decision replaces the hold.
    if (available) {
      const booked = await this.store.findActiveAppointment(staffId, date, time);
      if (booked) {
        const held = await this.store.upsertSlot({ staffId, date, time, isAvailable: false, heldBy: booked.id });
        return { ok: true, value: held };
      }
    }
    const slot = await this.store.upsertSlot({ staffId, date, time, isAvailable: available, heldBy: null });
    return { ok: true, value: slot };
  }

  // Creates the rules a new staff member is missing from the configured default
  async ensureDefaultWeekdays(staffId: number): Promise<WeekdayRule[]> {
    const existing = new Set((await this.store.findWeekdayRules(staffId)).map(r => r.weekday));
    const created: WeekdayRule[] = [];
    for (let weekday = 0; weekday < 7; weekday++) {
      if (existing.has(weekday)) continue;
      created.push(await this.store.upsertWeekdayRule({
        staffId,
        weekday,
        enabled: this.options.defaultWorkdays.includes(weekday),
      }));
    }
    return created;
  }

  async hold(staffId: number, date: string, time: string, appointmentId: string): Promise<void> {
    await this.store.upsertSlot({ staffId, date, time, isAvailable: false, heldBy: appointmentId });
  }

  // Reopens the slot only if it is still closed by this appointment's booking
  async release(staffId: number, date: string, time: string, appointmentId: string): Promise<boolean> {
    const slot = await this.store.findSlot(staffId, date, time);
    if (!slot || slot.heldBy !== appointmentId) return false;
    await this.store.upsertSlot({ staffId, date, time, isAvailable: true, heldBy: null });
    return true;
  }
}

// Seven flags indexed by weekday; weekdays without a rule fall back to the default
export function effectiveWeekdays(rules: WeekdayRule[], defaultWorkdays: number[]): boolean[] {
  const flags = Array.from({ length: 7 }, (_, d) => defaultWorkdays.includes(d));
  for (const rule of rules) {
    if (isWeekday(rule.weekday)) flags[rule.weekday] = rule.enabled;
  }
  return flags;
}

const closedTimes = (slots: AvailabilitySlot[]) => new Set(slots.filter(s => !s.isAvailable).map(s => s.time));

const slotInstantIsAfter = (date: string, time: string, tz: string, now: Date) =>
  slotInstant(date, time, tz).getTime() > now.getTime();

export default SlotCalendar;
