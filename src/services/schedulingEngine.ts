import { SchedulingStore } from '../repositories/SchedulingStore';
import { ACTIVE_STATUSES, Appointment, FailureKind, SchedulingOptions } from '../types/scheduling';
import { Selection, formatSelectionToken, parseSelectionToken } from '../utils/selectionToken';
import { normalizeName, normalizePhone, validatePhoneNumber } from '../utils/validation';
import { AppointmentLedger } from './appointmentLedger';
import { BookingSession, SessionStep, SessionStore, StaffOption, ValueOption } from './bookingSession';
import { SlotCalendar } from './slotCalendar';

// Semantic replies for the chat transport to render
export type Prompt =
  | { kind: 'askName' }
  | { kind: 'askPhone' }
  | { kind: 'chooseStaff'; options: StaffOption[] }
  | { kind: 'chooseDate'; staffId: number; options: ValueOption[] }
  | { kind: 'chooseTime'; staffId: number; date: string; options: ValueOption[] }
  | { kind: 'booked'; appointment: Appointment; staffName?: string }
  | { kind: 'rejected'; error: FailureKind; message: string }
  | { kind: 'noAvailability'; scope: 'staff' | 'date' | 'time' }
  | { kind: 'aborted' }
  | { kind: 'notInBooking' };

export interface EngineReply {
  step: SessionStep;
  replies: Prompt[];
}

export interface ClientInfo {
  username?: string;
}

export interface SchedulingEngineDeps {
  store: SchedulingStore;
  calendar: SlotCalendar;
  ledger: AppointmentLedger;
  sessions: SessionStore;
  options: Pick<SchedulingOptions, 'bookingWindowDays'>;
  clock?: () => Date;
}

type ClientStep = Extract<BookingSession, { name: string; phone: string }>;
type ClientDetails = Pick<ClientStep, 'name' | 'phone'>;

const rejected = (error: FailureKind, message: string): Prompt => ({ kind: 'rejected', error, message });

const withPrefix = (prefix: Prompt[], reply: EngineReply): EngineReply => ({ step: reply.step, replies: [...prefix, ...reply.replies] });

const valueOptions = (action: 'date' | 'time', values: string[]): ValueOption[] =>
  values.map(value => ({
    value,
    token: formatSelectionToken(action === 'date' ? { action, date: value } : { action, time: value }),
  }));

/**
 * Drives the booking conversation for one chat: name, phone, staff member, date, time, commit.
 * Each step accepts one kind of input; invalid input re-prompts the same step. Nothing is
 * persisted before the final commit through the ledger.
 */
export class SchedulingEngine {
  private readonly now: () => Date;

  constructor(private readonly deps: SchedulingEngineDeps) {
    this.now = deps.clock || (() => new Date());
  }

  getStep(sessionId: number): SessionStep {
    return this.deps.sessions.get(sessionId).step;
  }

  async handleText(sessionId: number, text: string): Promise<EngineReply> {
    const session = this.deps.sessions.get(sessionId);

    switch (session.step) {
      case 'idle':
        return { step: 'idle', replies: [{ kind: 'notInBooking' }] };

      case 'collectingName': {
        const name = normalizeName(text);
        if (!name) return this.reprompt(sessionId, session, rejected('ValidationError', 'Please enter your name'));
        return this.save(sessionId, { step: 'collectingPhone', name }, [{ kind: 'askPhone' }]);
      }

      case 'collectingPhone': {
        const phone = normalizePhone(text);
        if (!validatePhoneNumber(phone)) {
          return this.reprompt(sessionId, session, rejected('ValidationError', 'Please enter the phone number in international format, e.g. +79171234567'));
        }
        return this.presentStaff(sessionId, { name: session.name, phone });
      }

      default:
        return this.reprompt(sessionId, session, rejected('ValidationError', 'Please choose one of the options'));
    }
  }

  async handleSelection(sessionId: number, token: string, client: ClientInfo = {}): Promise<EngineReply> {
    const session = this.deps.sessions.get(sessionId);
    const selection = parseSelectionToken(token);
    if (!selection) return this.reprompt(sessionId, session, rejected('ValidationError', 'Unknown selection'));

    if (selection.action === 'book') return this.save(sessionId, { step: 'collectingName' }, [{ kind: 'askName' }]);
    if (selection.action === 'abort') {
      this.deps.sessions.clear(sessionId);
      return { step: 'idle', replies: [{ kind: 'aborted' }] };
    }

    if (selection.action === 'staff' && session.step === 'selectingStaff') return this.selectStaff(sessionId, session, selection.staffId);
    if (selection.action === 'date' && session.step === 'selectingDate') return this.selectDate(sessionId, session, selection.date);
    if (selection.action === 'time' && session.step === 'selectingTime') return this.selectTime(sessionId, session, selection.time, client);

    return this.reprompt(sessionId, session, rejected('ValidationError', staleSelectionMessage(selection)));
  }

  private async selectStaff(sessionId: number, session: Extract<BookingSession, { step: 'selectingStaff' }>, staffId: number): Promise<EngineReply> {
    const client = { name: session.name, phone: session.phone };
    if (!(await this.isActiveStaff(staffId))) {
      return withPrefix(
        [rejected('NotFound', 'This specialist is no longer available, please choose again')],
        await this.presentStaff(sessionId, client),
      );
    }
    return this.presentDates(sessionId, client, staffId);
  }

  private async selectDate(sessionId: number, session: Extract<BookingSession, { step: 'selectingDate' }>, date: string): Promise<EngineReply> {
    if (!session.offeredDates.includes(date)) {
      return this.reprompt(sessionId, session, rejected('ValidationError', 'Please choose one of the offered dates'));
    }
    if (!(await this.isActiveStaff(session.staffId))) return this.staffGone(sessionId);
    return this.presentTimes(sessionId, { name: session.name, phone: session.phone }, session.staffId, date);
  }

  private async selectTime(sessionId: number, session: Extract<BookingSession, { step: 'selectingTime' }>, time: string, info: ClientInfo): Promise<EngineReply> {
    if (!session.offeredTimes.includes(time)) {
      return this.reprompt(sessionId, session, rejected('ValidationError', 'Please choose one of the offered times'));
    }
    const staff = await this.deps.store.findStaff(session.staffId);
    if (!staff || !staff.isStaff) return this.staffGone(sessionId);

    const client = { name: session.name, phone: session.phone };
    const result = await this.deps.ledger.createAppointment({
      staffId: session.staffId,
      clientChatId: sessionId,
      clientName: session.name,
      clientPhone: session.phone,
      clientUsername: info.username,
      date: session.date,
      time,
    }, this.now());

    if (!result.ok) {
      // Lost the slot between presentation and commit: back to the times of the same date
      return withPrefix([rejected(result.error, result.message)], await this.presentTimes(sessionId, client, session.staffId, session.date));
    }
    this.deps.sessions.clear(sessionId);
    return { step: 'idle', replies: [{ kind: 'booked', appointment: result.appointment, staffName: staff.name }] };
  }

  private async presentStaff(sessionId: number, client: ClientDetails): Promise<EngineReply> {
    const staff = await this.deps.store.listStaff({ isStaff: true });
    if (!staff.length) return this.giveUp(sessionId, 'staff');
    const offeredStaff: StaffOption[] = staff.map(s => ({
      staffId: s.staffId,
      name: s.name,
      phone: s.phone,
      token: formatSelectionToken({ action: 'staff', staffId: s.staffId }),
    }));
    return this.save(sessionId, { step: 'selectingStaff', ...client, offeredStaff }, [{ kind: 'chooseStaff', options: offeredStaff }]);
  }

  private async presentDates(sessionId: number, client: ClientDetails, staffId: number): Promise<EngineReply> {
    const offeredDates = await this.deps.calendar.listOfferableDates(staffId, this.now(), this.deps.options.bookingWindowDays);
    if (!offeredDates.length) return this.giveUp(sessionId, 'date');
    return this.save(
      sessionId,
      { step: 'selectingDate', ...client, staffId, offeredDates },
      [{ kind: 'chooseDate', staffId, options: valueOptions('date', offeredDates) }],
    );
  }

  private async presentTimes(sessionId: number, client: ClientDetails, staffId: number, date: string): Promise<EngineReply> {
    const offeredTimes = await this.freeTimes(staffId, date);
    if (!offeredTimes.length) {
      return withPrefix([{ kind: 'noAvailability', scope: 'time' }], await this.presentDates(sessionId, client, staffId));
    }
    return this.save(
      sessionId,
      { step: 'selectingTime', ...client, staffId, date, offeredTimes },
      [{ kind: 'chooseTime', staffId, date, options: valueOptions('time', offeredTimes) }],
    );
  }

  // Offerable times of the date that no pending/confirmed appointment occupies
  private async freeTimes(staffId: number, date: string): Promise<string[]> {
    const [offerable, booked] = await Promise.all([
      this.deps.calendar.listOfferableTimes(staffId, date, this.now()),
      this.deps.store.findAppointments({ staffId, statuses: ACTIVE_STATUSES }),
    ]);
    const taken = new Set(booked.filter(a => a.date === date).map(a => a.time));
    return offerable.filter(t => !taken.has(t));
  }

  private async isActiveStaff(staffId: number) {
    const staff = await this.deps.store.findStaff(staffId);
    return Boolean(staff && staff.isStaff);
  }

  private staffGone(sessionId: number): EngineReply {
    this.deps.sessions.clear(sessionId);
    return { step: 'idle', replies: [rejected('NotFound', 'This specialist is no longer available, please start a new booking')] };
  }

  private giveUp(sessionId: number, scope: 'staff' | 'date' | 'time'): EngineReply {
    this.deps.sessions.clear(sessionId);
    return { step: 'idle', replies: [{ kind: 'noAvailability', scope }] };
  }

  private save(sessionId: number, session: BookingSession, replies: Prompt[]): EngineReply {
    this.deps.sessions.set(sessionId, session);
    return { step: session.step, replies };
  }

  // Repeats the prompt of the current step, after the given rejection
  private reprompt(sessionId: number, session: BookingSession, reason: Prompt): EngineReply {
    const prompt = currentPrompt(session);
    if (!prompt) return { step: 'idle', replies: [{ kind: 'notInBooking' }] };
    this.deps.sessions.set(sessionId, session);
    return { step: session.step, replies: [reason, prompt] };
  }
}

function currentPrompt(session: BookingSession): Prompt | null {
  switch (session.step) {
    case 'idle': return null;
    case 'collectingName': return { kind: 'askName' };
    case 'collectingPhone': return { kind: 'askPhone' };
    case 'selectingStaff': return { kind: 'chooseStaff', options: session.offeredStaff };
    case 'selectingDate': return { kind: 'chooseDate', staffId: session.staffId, options: valueOptions('date', session.offeredDates) };
    case 'selectingTime': return { kind: 'chooseTime', staffId: session.staffId, date: session.date, options: valueOptions('time', session.offeredTimes) };
  }
}

function staleSelectionMessage(selection: Selection): string {
  switch (selection.action) {
    case 'staff': return 'A specialist cannot be chosen at this step';
    case 'date': return 'A date cannot be chosen at this step';
    case 'time': return 'A time cannot be chosen at this step';
    default: return 'Unexpected selection';
  }
}

export default SchedulingEngine;
