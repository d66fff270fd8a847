import {
  Appointment,
  AppointmentStatus,
  AvailabilitySlot,
  NewAppointment,
  ReminderFlag,
  StaffMember,
  WeekdayRule,
} from '../types/scheduling';

export interface AppointmentFilter {
  staffId?: number;
  clientChatId?: number;
  statuses?: AppointmentStatus[];
}

export interface StaffFilter {
  isStaff?: boolean;
  isAdmin?: boolean;
}

// Persistence boundary for the scheduling core. Every mutation of shared state in the core goes
// through one of these methods, and multi-step operations run inside `runInTransaction`.
export interface SchedulingStore {
  // Runs `work` against a store bound to one transaction. Conflicting writes either serialize or
  // fail with a duplicate-key error; nothing is visible to other callers before `work` resolves.
  runInTransaction<T>(work: (tx: SchedulingStore) => Promise<T>): Promise<T>;

  findStaff(staffId: number): Promise<StaffMember | null>;
  listStaff(filter?: StaffFilter): Promise<StaffMember[]>;
  saveStaff(staff: StaffMember): Promise<StaffMember>;

  findWeekdayRules(staffId: number): Promise<WeekdayRule[]>;
  upsertWeekdayRule(rule: WeekdayRule): Promise<WeekdayRule>;

  findSlot(staffId: number, date: string, time: string): Promise<AvailabilitySlot | null>;
  findSlotsForDate(staffId: number, date: string): Promise<AvailabilitySlot[]>;
  upsertSlot(slot: AvailabilitySlot): Promise<AvailabilitySlot>;

  // Throws a duplicate-key error when another active appointment holds the same slot
  insertAppointment(draft: NewAppointment): Promise<Appointment>;
  findAppointment(id: string): Promise<Appointment | null>;
  findActiveAppointment(staffId: number, date: string, time: string): Promise<Appointment | null>;
  // Sorted by date, then time
  findAppointments(filter: AppointmentFilter): Promise<Appointment[]>;
  // Compare-and-set: applies only while the appointment still has `expected` status
  updateAppointmentStatus(id: string, expected: AppointmentStatus, next: AppointmentStatus): Promise<Appointment | null>;
  // Compare-and-set: applies only while the flag is still false
  markReminded(id: string, flag: ReminderFlag): Promise<boolean>;
}
