import { Config } from '../config';
import { SchedulingStore } from '../repositories/SchedulingStore';
import { AppointmentLedger } from './appointmentLedger';
import { CacheSessionStore, SessionStore } from './bookingSession';
import { NotificationDispatcher } from './notificationService';
import { ReminderSweeper } from './reminderSweeper';
import { ReviewService } from './reviewService';
import { SchedulingEngine } from './schedulingEngine';
import { SettingsService } from './settingsService';
import { SlotCalendar } from './slotCalendar';
import { StaffService } from './staffService';

export interface Services {
  store: SchedulingStore;
  calendar: SlotCalendar;
  ledger: AppointmentLedger;
  engine: SchedulingEngine;
  sweeper: ReminderSweeper;
  staff: StaffService;
  settings: SettingsService;
  reviews: ReviewService;
  clock: () => Date;
}

export type ServiceConfig = Pick<
  Config,
  'SLOT_TIMES' | 'DEFAULT_WORKDAYS' | 'TIME_ZONE' | 'BOOKING_WINDOW_DAYS' | 'SESSION_TTL_SECONDS'
  | 'REMINDER_INTERVAL_MS' | 'REMINDER_WINDOW_MINUTES' | 'GROUP_URL'
>;

export interface ServiceOverrides {
  sessions?: SessionStore;
  clock?: () => Date;
}

export function buildServices(
  store: SchedulingStore,
  dispatcher: NotificationDispatcher,
  config: ServiceConfig,
  overrides: ServiceOverrides = {},
): Services {
  const calendar = new SlotCalendar(store, {
    slotTimes: config.SLOT_TIMES,
    defaultWorkdays: config.DEFAULT_WORKDAYS,
    defaultTimeZone: config.TIME_ZONE,
  });
  const clock = overrides.clock || (() => new Date());
  const ledger = new AppointmentLedger(store, calendar, dispatcher);
  const engine = new SchedulingEngine({
    store,
    calendar,
    ledger,
    sessions: overrides.sessions || new CacheSessionStore(config.SESSION_TTL_SECONDS),
    options: { bookingWindowDays: config.BOOKING_WINDOW_DAYS },
    clock,
  });
  const sweeper = new ReminderSweeper(store, calendar, ledger, dispatcher, {
    intervalMs: config.REMINDER_INTERVAL_MS,
    windowMinutes: config.REMINDER_WINDOW_MINUTES,
  });

  return {
    store,
    calendar,
    ledger,
    engine,
    sweeper,
    staff: new StaffService(store, calendar),
    settings: new SettingsService({ groupUrl: config.GROUP_URL }),
    reviews: new ReviewService(store, dispatcher),
    clock,
  };
}
