import { SchedulingStore } from '../repositories/SchedulingStore';
import { Appointment, ReminderFlag } from '../types/scheduling';
import { slotInstant } from '../utils/scheduling';
import { AppointmentLedger } from './appointmentLedger';
import { NotificationDispatcher } from './notificationService';
import { SlotCalendar } from './slotCalendar';

const HOUR_MS = 60 * 60 * 1000;

const THRESHOLDS: { flag: ReminderFlag; hoursBefore: number }[] = [
  { flag: 'reminded24h', hoursBefore: 24 },
  { flag: 'reminded2h', hoursBefore: 2 },
];

export interface ReminderSweeperOptions {
  intervalMs: number;
  windowMinutes: number;
}

/**
 * Periodically reminds clients of confirmed appointments roughly 24h and 2h ahead.
 * A reminder flag is set only after the dispatcher reports delivery, so an undelivered
 * reminder is retried on the next cycle while the window is still open.
 */
export class ReminderSweeper {
  private timer: NodeJS.Timeout | null = null;
  private running = false;

  constructor(
    private readonly store: SchedulingStore,
    private readonly calendar: SlotCalendar,
    private readonly ledger: AppointmentLedger,
    private readonly dispatcher: NotificationDispatcher,
    private readonly options: ReminderSweeperOptions,
  ) {}

  async sweep(now: Date = new Date()): Promise<number> {
    await this.ledger.sweepPast(now);

    const confirmed = await this.store.findAppointments({ statuses: ['confirmed'] });
    const windowMs = this.options.windowMinutes * 60 * 1000;
    const zones = new Map<number, string>();
    let sent = 0;

    for (const appt of confirmed) {
      if (!zones.has(appt.staffId)) zones.set(appt.staffId, this.calendar.timeZoneOf(await this.store.findStaff(appt.staffId)));
      const tz = zones.get(appt.staffId) || this.calendar.timeZoneOf(null);
      const delta = slotInstant(appt.date, appt.time, tz).getTime() - now.getTime();

      for (const { flag, hoursBefore } of THRESHOLDS) {
        if (appt[flag]) continue;
        if (Math.abs(delta - hoursBefore * HOUR_MS) > windowMs) continue;
        if (await this.remind(appt, flag, hoursBefore)) sent++;
      }
    }
    if (sent) console.log(`Reminder sweep: ${sent} reminder(s) sent`);
    return sent;
  }

  start() {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.runCycle();
    }, this.options.intervalMs);
    console.log(`Reminder sweeper started (every ${Math.round(this.options.intervalMs / 1000)}s)`);
  }

  stop() {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  // One scheduled cycle; a cycle still in progress makes the next tick a no-op
  async runCycle(now: Date = new Date()): Promise<void> {
    if (this.running) return;
    this.running = true;
    try {
      await this.sweep(now);
    } catch (err) {
      console.error('Reminder sweep failed:', err instanceof Error ? err.message : err);
    } finally {
      this.running = false;
    }
  }

  private async remind(appt: Appointment, flag: ReminderFlag, hoursBefore: number): Promise<boolean> {
    const payload = { ...(await this.ledger.payloadFor(appt)), hoursBefore };
    const delivered = await this.dispatcher.notify(appt.clientChatId, 'reminderDue', payload);
    if (!delivered) return false;
    return this.store.markReminded(appt.id, flag);
  }
}

export default ReminderSweeper;
