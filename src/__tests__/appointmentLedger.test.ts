import { AppointmentLedger } from '../services/appointmentLedger';
import { SlotCalendar } from '../services/slotCalendar';
import { NewAppointment } from '../types/scheduling';
import { MemorySchedulingStore, RecordingDispatcher, TEST_OPTIONS, staffMember } from './helpers/memoryStore';

const STAFF = 1;
const OTHER_STAFF = 2;
const ADMIN = 500;
const CLIENT = 1000;
const NOW = new Date('2024-06-03T08:00:00Z');

const writeConflict = () => Object.assign(new Error('WriteConflict error: this operation conflicted with another operation'), {
  code: 112,
  codeName: 'WriteConflict',
  errorLabels: ['TransientTransactionError'],
});

const draft = (overrides: Partial<NewAppointment> = {}): NewAppointment => ({
  staffId: STAFF,
  clientChatId: CLIENT,
  clientName: 'Maria',
  clientPhone: '+79171234567',
  date: '2024-06-04',
  time: '15:00',
  ...overrides,
});

describe('AppointmentLedger', () => {
  let store: MemorySchedulingStore;
  let calendar: SlotCalendar;
  let dispatcher: RecordingDispatcher;
  let ledger: AppointmentLedger;

  beforeEach(async () => {
    store = new MemorySchedulingStore();
    calendar = new SlotCalendar(store, TEST_OPTIONS);
    dispatcher = new RecordingDispatcher();
    ledger = new AppointmentLedger(store, calendar, dispatcher);
    await store.saveStaff(staffMember(STAFF, 'Anna'));
    await store.saveStaff(staffMember(OTHER_STAFF, 'Olga'));
    await store.saveStaff(staffMember(ADMIN, 'Boss', { isStaff: false, isAdmin: true }));
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('createAppointment', () => {
    test('books an offerable slot as pending and closes it', async () => {
      const result = await ledger.createAppointment(draft(), NOW);
      if (!result.ok) throw new Error(result.message);
      expect(result.appointment).toMatchObject({ staffId: STAFF, date: '2024-06-04', time: '15:00', status: 'pending', reminded24h: false, reminded2h: false });
      expect(await calendar.isOfferable(STAFF, '2024-06-04', '15:00', NOW)).toBe(false);
      expect(await store.findSlot(STAFF, '2024-06-04', '15:00')).toEqual({
        staffId: STAFF, date: '2024-06-04', time: '15:00', isAvailable: false, heldBy: result.appointment.id,
      });
    });

    test('announces the booking to the staff member and every admin', async () => {
      const result = await ledger.createAppointment(draft(), NOW);
      if (!result.ok) throw new Error(result.message);
      expect(dispatcher.sent.map(n => [n.recipientId, n.kind])).toEqual([[STAFF, 'bookingCreated'], [ADMIN, 'bookingCreated']]);
      expect(dispatcher.sent[0].payload).toMatchObject({
        appointmentId: result.appointment.id,
        staffName: 'Anna',
        clientName: 'Maria',
        date: '2024-06-04',
        time: '15:00',
        status: 'pending',
      });
    });

    test('a staff member who is also an admin is notified once', async () => {
      await store.saveStaff(staffMember(STAFF, 'Anna', { isAdmin: true }));
      await ledger.createAppointment(draft(), NOW);
      expect(dispatcher.sent.map(n => n.recipientId)).toEqual([STAFF, ADMIN]);
    });

    test('a second booking of the same slot is rejected', async () => {
      await ledger.createAppointment(draft(), NOW);
      const second = await ledger.createAppointment(draft({ clientChatId: 1001, clientName: 'Lena' }), NOW);
      expect(second).toEqual({
        ok: false,
        error: 'SlotUnavailable',
        message: 'This time is no longer available, please choose another one',
      });
    });

    test('concurrent bookings of one slot: exactly one succeeds', async () => {
      const attempts = await Promise.all(
        [1001, 1002, 1003, 1004, 1005].map(clientChatId => ledger.createAppointment(draft({ clientChatId }), NOW)),
      );
      expect(attempts.filter(r => r.ok)).toHaveLength(1);
      expect(attempts.filter(r => !r.ok && r.error === 'SlotUnavailable')).toHaveLength(4);
      expect(await store.findAppointments({ staffId: STAFF, statuses: ['pending', 'confirmed'] })).toHaveLength(1);
    });

    test('past, off-template and weekend slots are unavailable', async () => {
      expect(await ledger.createAppointment(draft({ date: '2024-06-03', time: '10:00' }), new Date('2024-06-03T10:30:00Z')))
        .toMatchObject({ ok: false, error: 'SlotUnavailable' });
      expect(await ledger.createAppointment(draft({ time: '14:00' }), NOW)).toMatchObject({ ok: false, error: 'SlotUnavailable' });
      expect(await ledger.createAppointment(draft({ date: '2024-06-08' }), NOW)).toMatchObject({ ok: false, error: 'SlotUnavailable' });
      expect(dispatcher.sent).toHaveLength(0);
    });

    test('removed staff cannot be booked', async () => {
      await store.saveStaff(staffMember(STAFF, 'Anna', { isStaff: false }));
      expect(await ledger.createAppointment(draft(), NOW)).toMatchObject({ ok: false, error: 'SlotUnavailable' });
    });

    test('maps a duplicate-key race to SlotUnavailable', async () => {
      jest.spyOn(MemorySchedulingStore.prototype, 'insertAppointment')
        .mockRejectedValueOnce(Object.assign(new Error('E11000 duplicate key error'), { code: 11000 }));
      expect(await ledger.createAppointment(draft(), NOW)).toMatchObject({ ok: false, error: 'SlotUnavailable' });
      expect(await store.findSlot(STAFF, '2024-06-04', '15:00')).toBeNull();
      expect(dispatcher.sent).toHaveLength(0);
    });

    test('maps a transaction write conflict to SlotUnavailable', async () => {
      jest.spyOn(MemorySchedulingStore.prototype, 'insertAppointment')
        .mockRejectedValueOnce(writeConflict());
      expect(await ledger.createAppointment(draft(), NOW)).toMatchObject({ ok: false, error: 'SlotUnavailable' });
    });

    test('a transient failure that is not a write conflict propagates', async () => {
      const stepdown = Object.assign(new Error('not primary'), { code: 10107, errorLabels: ['TransientTransactionError'] });
      jest.spyOn(MemorySchedulingStore.prototype, 'insertAppointment').mockRejectedValueOnce(stepdown);
      await expect(ledger.createAppointment(draft(), NOW)).rejects.toThrow('not primary');
    });

    test('other storage errors propagate', async () => {
      jest.spyOn(MemorySchedulingStore.prototype, 'insertAppointment').mockRejectedValueOnce(new Error('connection lost'));
      await expect(ledger.createAppointment(draft(), NOW)).rejects.toThrow('connection lost');
    });
  });

  describe('transition', () => {
    const book = async () => {
      const result = await ledger.createAppointment(draft(), NOW);
      if (!result.ok) throw new Error(result.message);
      dispatcher.sent.length = 0;
      return result.appointment;
    };

    test('the assigned staff member confirms; the client is told', async () => {
      const appt = await book();
      const result = await ledger.transition(appt.id, 'confirmed', { chatId: STAFF });
      expect(result).toMatchObject({ ok: true, actorRole: 'staff', appointment: { id: appt.id, status: 'confirmed' } });
      expect(dispatcher.sent.map(n => [n.recipientId, n.kind])).toEqual([[CLIENT, 'bookingConfirmed']]);
    });

    test('an admin confirms; client and staff member are told', async () => {
      const appt = await book();
      const result = await ledger.transition(appt.id, 'confirmed', { chatId: ADMIN });
      expect(result).toMatchObject({ ok: true, actorRole: 'admin' });
      expect(dispatcher.sent.map(n => [n.recipientId, n.kind])).toEqual([[CLIENT, 'bookingConfirmed'], [STAFF, 'bookingConfirmed']]);
      expect(dispatcher.sent[0].payload.actorRole).toBe('admin');
    });

    test('the client may cancel but not confirm', async () => {
      const appt = await book();
      expect(await ledger.transition(appt.id, 'confirmed', { chatId: CLIENT })).toEqual({
        ok: false, error: 'AccessDenied', message: 'Only staff or admin may do this',
      });
      const cancelled = await ledger.transition(appt.id, 'cancelled', { chatId: CLIENT });
      expect(cancelled).toMatchObject({ ok: true, actorRole: 'client', appointment: { status: 'cancelled' } });
      expect(dispatcher.sent.map(n => [n.recipientId, n.kind])).toEqual([[STAFF, 'bookingCancelled']]);
    });

    test('cancelling reopens the slot for new bookings', async () => {
      const appt = await book();
      await ledger.transition(appt.id, 'cancelled', { chatId: STAFF });
      expect(await calendar.isOfferable(STAFF, '2024-06-04', '15:00', NOW)).toBe(true);
      const again = await ledger.createAppointment(draft({ clientChatId: 1001 }), NOW);
      expect(again.ok).toBe(true);
    });

    test('cancelled is terminal', async () => {
      const appt = await book();
      await ledger.transition(appt.id, 'cancelled', { chatId: ADMIN });
      expect(await ledger.transition(appt.id, 'confirmed', { chatId: ADMIN })).toEqual({
        ok: false, error: 'InvalidTransition', message: 'Appointment is already cancelled',
      });
      expect(await ledger.transition(appt.id, 'cancelled', { chatId: ADMIN })).toMatchObject({ ok: false, error: 'InvalidTransition' });
    });

    test('confirmed appointments cannot be confirmed twice', async () => {
      const appt = await book();
      await ledger.transition(appt.id, 'confirmed', { chatId: STAFF });
      expect(await ledger.transition(appt.id, 'confirmed', { chatId: STAFF })).toEqual({
        ok: false, error: 'InvalidTransition', message: 'Appointment is already confirmed',
      });
    });

    test('unrelated people and other staff are denied', async () => {
      const appt = await book();
      expect(await ledger.transition(appt.id, 'cancelled', { chatId: 777 })).toEqual({ ok: false, error: 'AccessDenied', message: 'Access denied' });
      expect(await ledger.transition(appt.id, 'confirmed', { chatId: OTHER_STAFF })).toMatchObject({ ok: false, error: 'AccessDenied' });
      expect((await ledger.get(appt.id))?.status).toBe('pending');
    });

    test('losing a concurrent transition to a write conflict is InvalidTransition', async () => {
      const appt = await book();
      jest.spyOn(MemorySchedulingStore.prototype, 'updateAppointmentStatus').mockRejectedValueOnce(writeConflict());

      expect(await ledger.transition(appt.id, 'confirmed', { chatId: STAFF })).toEqual({
        ok: false, error: 'InvalidTransition', message: 'Appointment was changed concurrently',
      });
      expect((await ledger.get(appt.id))?.status).toBe('pending');
      expect(dispatcher.sent).toHaveLength(0);
    });

    test('other storage errors during a transition propagate', async () => {
      const appt = await book();
      jest.spyOn(MemorySchedulingStore.prototype, 'updateAppointmentStatus').mockRejectedValueOnce(new Error('connection lost'));
      await expect(ledger.transition(appt.id, 'cancelled', { chatId: CLIENT })).rejects.toThrow('connection lost');
    });

    test('unknown appointments are NotFound', async () => {
      expect(await ledger.transition('missing', 'cancelled', { chatId: ADMIN })).toEqual({ ok: false, error: 'NotFound', message: 'Appointment not found' });
    });
  });

  describe('sweepPast', () => {
    test('marks elapsed appointments past; the slot stays consumed', async () => {
      const result = await ledger.createAppointment(draft({ date: '2024-06-04', time: '10:00' }), NOW);
      if (!result.ok) throw new Error(result.message);

      expect(await ledger.sweepPast(new Date('2024-06-04T10:00:00Z'))).toBe(0);
      expect(await ledger.sweepPast(new Date('2024-06-04T10:00:01Z'))).toBe(1);
      expect((await ledger.get(result.appointment.id))?.status).toBe('past');
      expect((await store.findSlot(STAFF, '2024-06-04', '10:00'))?.isAvailable).toBe(false);
      expect(await ledger.sweepPast(new Date('2024-06-05T00:00:00Z'))).toBe(0);
    });

    test('listings sweep first and show only active appointments', async () => {
      await ledger.createAppointment(draft({ date: '2024-06-04', time: '10:00' }), NOW);
      await ledger.createAppointment(draft({ date: '2024-06-05', time: '11:00' }), NOW);
      const later = new Date('2024-06-04T12:00:00Z');
      expect((await ledger.listForClient(CLIENT, later)).map(a => a.date)).toEqual(['2024-06-05']);
      expect((await ledger.listForStaff(STAFF, later)).map(a => a.time)).toEqual(['11:00']);
      expect(await ledger.listActive(later)).toHaveLength(1);
      expect(await ledger.listForStaff(OTHER_STAFF, later)).toEqual([]);
    });
  });
});
