import { AppointmentLedger } from '../services/appointmentLedger';
import { ReminderSweeper } from '../services/reminderSweeper';
import { SlotCalendar } from '../services/slotCalendar';
import { Appointment } from '../types/scheduling';
import { MemorySchedulingStore, RecordingDispatcher, TEST_OPTIONS, staffMember } from './helpers/memoryStore';

const STAFF = 1;
const CLIENT = 1000;

describe('ReminderSweeper', () => {
  let store: MemorySchedulingStore;
  let dispatcher: RecordingDispatcher;
  let ledger: AppointmentLedger;
  let sweeper: ReminderSweeper;

  const book = async (date: string, time: string, confirm = true): Promise<Appointment> => {
    const result = await ledger.createAppointment({
      staffId: STAFF, clientChatId: CLIENT, clientName: 'Maria', clientPhone: '+79171234567', date, time,
    }, new Date('2024-06-03T00:00:00Z'));
    if (!result.ok) throw new Error(result.message);
    if (confirm) await ledger.transition(result.appointment.id, 'confirmed', { chatId: STAFF });
    dispatcher.sent.length = 0;
    return result.appointment;
  };

  beforeEach(async () => {
    store = new MemorySchedulingStore();
    const calendar = new SlotCalendar(store, TEST_OPTIONS);
    dispatcher = new RecordingDispatcher();
    ledger = new AppointmentLedger(store, calendar, dispatcher);
    sweeper = new ReminderSweeper(store, calendar, ledger, dispatcher, { intervalMs: 1000, windowMinutes: 5 });
    await store.saveStaff(staffMember(STAFF, 'Anna'));
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    sweeper.stop();
    jest.useRealTimers();
    jest.restoreAllMocks();
  });

  test('sends the 24h reminder once, inside its window', async () => {
    const appt = await book('2024-06-05', '15:00');

    expect(await sweeper.sweep(new Date('2024-06-04T15:02:00Z'))).toBe(1);
    expect(dispatcher.sent).toEqual([{
      recipientId: CLIENT,
      kind: 'reminderDue',
      payload: expect.objectContaining({ appointmentId: appt.id, staffName: 'Anna', date: '2024-06-05', time: '15:00', hoursBefore: 24 }),
    }]);
    expect((await store.findAppointment(appt.id))?.reminded24h).toBe(true);

    expect(await sweeper.sweep(new Date('2024-06-04T15:04:00Z'))).toBe(0);
    expect(dispatcher.sent).toHaveLength(1);
  });

  test('the window is inclusive at its edges', async () => {
    await book('2024-06-05', '15:00');
    expect(await sweeper.sweep(new Date('2024-06-04T14:54:59Z'))).toBe(0);
    expect(await sweeper.sweep(new Date('2024-06-04T14:55:00Z'))).toBe(1);
  });

  test('sends the 2h reminder independently', async () => {
    const appt = await book('2024-06-05', '15:00');
    expect(await sweeper.sweep(new Date('2024-06-05T12:50:00Z'))).toBe(0);
    expect(await sweeper.sweep(new Date('2024-06-05T13:00:00Z'))).toBe(1);
    expect(dispatcher.sent[0].payload.hoursBefore).toBe(2);
    const stored = await store.findAppointment(appt.id);
    expect(stored).toMatchObject({ reminded24h: false, reminded2h: true });
  });

  test('an undelivered reminder leaves the flag unset and is retried', async () => {
    const appt = await book('2024-06-05', '15:00');
    dispatcher.deliver = () => false;
    expect(await sweeper.sweep(new Date('2024-06-04T15:00:00Z'))).toBe(0);
    expect((await store.findAppointment(appt.id))?.reminded24h).toBe(false);

    dispatcher.deliver = () => true;
    expect(await sweeper.sweep(new Date('2024-06-04T15:03:00Z'))).toBe(1);
    expect(dispatcher.sent).toHaveLength(2);
  });

  test('pending appointments are not reminded', async () => {
    await book('2024-06-05', '15:00', false);
    expect(await sweeper.sweep(new Date('2024-06-04T15:00:00Z'))).toBe(0);
    expect(dispatcher.sent).toEqual([]);
  });

  test('elapsed appointments are marked past first', async () => {
    const appt = await book('2024-06-04', '10:00');
    expect(await sweeper.sweep(new Date('2024-06-04T11:00:00Z'))).toBe(0);
    expect((await store.findAppointment(appt.id))?.status).toBe('past');
  });

  test('a failing cycle is logged and does not throw', async () => {
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    jest.spyOn(store, 'findAppointments').mockRejectedValueOnce(new Error('db down'));
    await expect(sweeper.runCycle(new Date('2024-06-04T15:00:00Z'))).resolves.toBeUndefined();
    expect(error).toHaveBeenCalledWith('Reminder sweep failed:', 'db down');
  });

  test('overlapping cycles are skipped', async () => {
    let finish: () => void = () => undefined;
    const sweep = jest.spyOn(sweeper, 'sweep').mockImplementation(() => new Promise<number>(resolve => {
      finish = () => resolve(0);
    }));
    const first = sweeper.runCycle();
    await sweeper.runCycle();
    finish();
    await first;
    expect(sweep).toHaveBeenCalledTimes(1);
  });

  test('start runs a cycle every interval until stopped', () => {
    jest.useFakeTimers();
    const cycle = jest.spyOn(sweeper, 'runCycle').mockResolvedValue(undefined);
    sweeper.start();
    sweeper.start();
    jest.advanceTimersByTime(2500);
    expect(cycle).toHaveBeenCalledTimes(2);
    sweeper.stop();
    jest.advanceTimersByTime(5000);
    expect(cycle).toHaveBeenCalledTimes(2);
  });
});
