// Shared domain types for the booking core. Dates are 'YYYY-MM-DD', times 'HH:mm'.

export const APPOINTMENT_STATUSES = ['pending', 'confirmed', 'cancelled', 'past'] as const;
export type AppointmentStatus = typeof APPOINTMENT_STATUSES[number];

// Statuses that occupy a slot for the purposes of mutual exclusion
export const ACTIVE_STATUSES: AppointmentStatus[] = ['pending', 'confirmed'];

export interface StaffMember {
  staffId: number;
  name: string;
  phone?: string;
  isStaff: boolean;
  isAdmin: boolean;
  timeZone?: string;
}

export interface WeekdayRule {
  staffId: number;
  weekday: number; // 0 = Monday .. 6 = Sunday
  enabled: boolean;
}

export interface AvailabilitySlot {
  staffId: number;
  date: string;
  time: string;
  isAvailable: boolean;
  heldBy?: string | null;
}

export interface Appointment {
  id: string;
  staffId: number;
  clientChatId: number;
  clientName: string;
  clientPhone: string;
  clientUsername?: string;
  date: string;
  time: string;
  status: AppointmentStatus;
  reminded24h: boolean;
  reminded2h: boolean;
  createdAt: Date;
}

export type NewAppointment = Omit<Appointment, 'id' | 'status' | 'reminded24h' | 'reminded2h' | 'createdAt'>;

export type ReminderFlag = 'reminded24h' | 'reminded2h';

export interface Actor {
  chatId: number;
}

export type ActorRole = 'admin' | 'staff' | 'client';

export type FailureKind = 'ValidationError' | 'SlotUnavailable' | 'NotFound' | 'InvalidTransition' | 'AccessDenied';

export interface Failure<E extends FailureKind = FailureKind> {
  ok: false;
  error: E;
  message: string;
}

export const fail = <E extends FailureKind>(error: E, message: string): Failure<E> => ({ ok: false, error, message });

export interface SchedulingOptions {
  slotTimes: string[];
  defaultWorkdays: number[];
  defaultTimeZone: string;
  bookingWindowDays: number;
}
