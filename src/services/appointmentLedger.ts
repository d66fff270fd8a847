import { SchedulingStore } from '../repositories/SchedulingStore';
import {
  ACTIVE_STATUSES,
  Actor,
  ActorRole,
  Appointment,
  AppointmentStatus,
  Failure,
  NewAppointment,
  StaffMember,
  fail,
} from '../types/scheduling';
import { isDuplicateKeyError, isWriteConflictError } from '../utils/handleSaveError';
import { slotInstant } from '../utils/scheduling';
import { NotificationDispatcher, NotificationPayload } from './notificationService';
import { SlotCalendar } from './slotCalendar';

export type CreateResult = { ok: true; appointment: Appointment } | Failure<'SlotUnavailable'>;

export type TransitionResult =
  | { ok: true; appointment: Appointment; actorRole: ActorRole }
  | Failure<'NotFound' | 'AccessDenied' | 'InvalidTransition'>;

export type TransitionTarget = Extract<AppointmentStatus, 'confirmed' | 'cancelled'>;

// Legal transitions and who may perform them; cancelled and past are terminal
const TRANSITIONS: Record<AppointmentStatus, Partial<Record<AppointmentStatus, ActorRole[]>>> = {
  pending: { confirmed: ['staff', 'admin'], cancelled: ['staff', 'admin', 'client'] },
  confirmed: { cancelled: ['staff', 'admin', 'client'] },
  cancelled: {},
  past: {},
};

const SLOT_TAKEN = 'This time is no longer available, please choose another one';

export class AppointmentLedger {
  constructor(
    private readonly store: SchedulingStore,
    private readonly calendar: SlotCalendar,
    private readonly dispatcher: NotificationDispatcher,
  ) {}

  async createAppointment(draft: NewAppointment, now: Date = new Date()): Promise<CreateResult> {
    let result: CreateResult;
    try {
      result = await this.store.runInTransaction(async (tx): Promise<CreateResult> => {
        const calendar = this.calendar.withStore(tx);
        if (!(await calendar.isOfferable(draft.staffId, draft.date, draft.time, now))) {
          return fail('SlotUnavailable', SLOT_TAKEN);
        }
        if (await tx.findActiveAppointment(draft.staffId, draft.date, draft.time)) {
          return fail('SlotUnavailable', SLOT_TAKEN);
        }
        const appointment = await tx.insertAppointment(draft);
        await calendar.hold(draft.staffId, draft.date, draft.time, appointment.id);
        return { ok: true, appointment };
      });
    } catch (err) {
      // A concurrent booking of the same slot won the race
      if (isDuplicateKeyError(err) || isWriteConflictError(err)) return fail('SlotUnavailable', SLOT_TAKEN);
      throw err;
    }

    if (result.ok) {
      console.log(`Appointment ${result.appointment.id} created: staff ${draft.staffId}, ${draft.date} ${draft.time}`);
      await this.announceCreated(result.appointment);
    }
    return result;
  }

  async transition(appointmentId: string, newStatus: TransitionTarget, actor: Actor): Promise<TransitionResult> {
    let result: TransitionResult;
    try {
      result = await this.store.runInTransaction(async (tx): Promise<TransitionResult> => {
        const current = await tx.findAppointment(appointmentId);
        if (!current) return fail('NotFound', 'Appointment not found');

        const roles = await resolveRoles(tx, current, actor);
        if (!roles.length) return fail('AccessDenied', 'Access denied');

        const allowed = TRANSITIONS[current.status][newStatus];
        if (!allowed) {
          return fail('InvalidTransition', `Appointment is already ${current.status}`);
        }
        const actorRole = roles.find(r => allowed.includes(r));
        if (!actorRole) return fail('AccessDenied', `Only ${allowed.join(' or ')} may do this`);

        const updated = await tx.updateAppointmentStatus(current.id, current.status, newStatus);
        // Someone else changed the status between the read and the write
        if (!updated) return fail('InvalidTransition', 'Appointment was changed concurrently');

        if (newStatus === 'cancelled') {
          await this.calendar.withStore(tx).release(updated.staffId, updated.date, updated.time, updated.id);
        }
        return { ok: true, appointment: updated, actorRole };
      });
    } catch (err) {
      // Another transition on the same appointment committed first
      if (isWriteConflictError(err)) return fail('InvalidTransition', 'Appointment was changed concurrently');
      throw err;
    }

    if (result.ok) {
      console.log(`Appointment ${appointmentId} ${newStatus} by ${result.actorRole} ${actor.chatId}`);
      await this.announceTransition(result.appointment, result.actorRole);
    }
    return result;
  }

  // Marks elapsed pending/confirmed appointments as past; their slots stay consumed
  async sweepPast(now: Date = new Date()): Promise<number> {
    const candidates = await this.store.findAppointments({ statuses: ACTIVE_STATUSES });
    const zones = new Map<number, string>();
    let count = 0;
    for (const appt of candidates) {
      if (!zones.has(appt.staffId)) zones.set(appt.staffId, this.calendar.timeZoneOf(await this.store.findStaff(appt.staffId)));
      const tz = zones.get(appt.staffId) || this.calendar.timeZoneOf(null);
      if (slotInstant(appt.date, appt.time, tz).getTime() >= now.getTime()) continue;
      if (await this.store.updateAppointmentStatus(appt.id, appt.status, 'past')) count++;
    }
    if (count) console.log(`sweepPast: ${count} appointment(s) marked past`);
    return count;
  }

  async get(appointmentId: string): Promise<Appointment | null> {
    return this.store.findAppointment(appointmentId);
  }

  async listForClient(clientChatId: number, now: Date = new Date()): Promise<Appointment[]> {
    await this.sweepPast(now);
    return this.store.findAppointments({ clientChatId, statuses: ACTIVE_STATUSES });
  }

  async listForStaff(staffId: number, now: Date = new Date()): Promise<Appointment[]> {
    await this.sweepPast(now);
    return this.store.findAppointments({ staffId, statuses: ACTIVE_STATUSES });
  }

  async listActive(now: Date = new Date()): Promise<Appointment[]> {
    await this.sweepPast(now);
    return this.store.findAppointments({ statuses: ACTIVE_STATUSES });
  }

  async payloadFor(appt: Appointment): Promise<NotificationPayload> {
    const staff = await this.store.findStaff(appt.staffId);
    return {
      appointmentId: appt.id,
      staffId: appt.staffId,
      staffName: staff?.name,
      clientName: appt.clientName,
      clientPhone: appt.clientPhone,
      date: appt.date,
      time: appt.time,
      status: appt.status,
    };
  }

  private async announceCreated(appt: Appointment) {
    const payload = await this.payloadFor(appt);
    const admins = await this.store.listStaff({ isAdmin: true });
    const recipients = new Set<number>([appt.staffId, ...admins.map(a => a.staffId)]);
    for (const recipientId of recipients) {
      await this.dispatcher.notify(recipientId, 'bookingCreated', payload);
    }
  }

  private async announceTransition(appt: Appointment, actorRole: ActorRole) {
    const payload: NotificationPayload = { ...(await this.payloadFor(appt)), actorRole };
    const kind = appt.status === 'confirmed' ? 'bookingConfirmed' : 'bookingCancelled';
    if (actorRole !== 'client') await this.dispatcher.notify(appt.clientChatId, kind, payload);
    // Keep the assigned staff member informed of changes made by someone else
    if (actorRole !== 'staff' && appt.staffId !== appt.clientChatId) {
      await this.dispatcher.notify(appt.staffId, kind, payload);
    }
  }
}

// Every role the actor holds with respect to this appointment, from the persisted flags
async function resolveRoles(store: SchedulingStore, appt: Appointment, actor: Actor): Promise<ActorRole[]> {
  const member: StaffMember | null = await store.findStaff(actor.chatId);
  const roles: ActorRole[] = [];
  if (member?.isStaff && appt.staffId === actor.chatId) roles.push('staff');
  if (member?.isAdmin) roles.push('admin');
  if (appt.clientChatId === actor.chatId) roles.push('client');
  return roles;
}

export default AppointmentLedger;
