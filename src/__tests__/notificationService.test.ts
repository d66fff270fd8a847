import { Notification } from '../models/Notification';
import { NotificationChannel, NotificationService } from '../services/notificationService';

const payload = { appointmentId: 'a1', date: '2024-06-04', time: '15:00', staffName: 'Anna' };

describe('NotificationService', () => {
  let warn: jest.SpyInstance;

  beforeEach(() => {
    warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  const channelReturning = (delivered: boolean | Error) => {
    const deliver = jest.fn(async () => {
      if (delivered instanceof Error) throw delivered;
      return delivered;
    });
    const channel: NotificationChannel = { deliver };
    return { channel, deliver };
  };

  test('records the attempt, delivers and marks the record delivered', async () => {
    const create = jest.spyOn(Notification, 'create').mockResolvedValue({ _id: 'n1' } as any);
    const update = jest.spyOn(Notification, 'updateOne').mockResolvedValue({ modifiedCount: 1 } as any);
    const { channel, deliver } = channelReturning(true);

    const delivered = await new NotificationService(channel).notify(42, 'bookingCreated', payload);

    expect(delivered).toBe(true);
    expect(create).toHaveBeenCalledWith({ recipientId: 42, kind: 'bookingCreated', payload, delivered: false });
    expect(deliver).toHaveBeenCalledWith({ notificationId: 'n1', recipientId: 42, kind: 'bookingCreated', payload });
    expect(update).toHaveBeenCalledWith({ _id: 'n1' }, { $set: { delivered: true } });
    expect(warn).not.toHaveBeenCalled();
  });

  test('an unacknowledged event reports false and stays undelivered', async () => {
    jest.spyOn(Notification, 'create').mockResolvedValue({ _id: 'n2' } as any);
    const update = jest.spyOn(Notification, 'updateOne');
    const { channel } = channelReturning(false);

    expect(await new NotificationService(channel).notify(42, 'reminderDue', payload)).toBe(false);
    expect(update).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('Notification reminderDue to 42 was not delivered');
  });

  test('a throwing channel never escapes notify', async () => {
    jest.spyOn(Notification, 'create').mockResolvedValue({ _id: 'n3' } as any);
    const { channel } = channelReturning(new Error('socket closed'));

    await expect(new NotificationService(channel).notify(42, 'bookingCancelled', payload)).resolves.toBe(false);
    expect(warn).toHaveBeenCalledWith('Failed to dispatch bookingCancelled to 42', 'socket closed');
  });

  test('still delivers when the outbox record cannot be written', async () => {
    jest.spyOn(Notification, 'create').mockRejectedValue(new Error('db down'));
    const update = jest.spyOn(Notification, 'updateOne');
    const { channel, deliver } = channelReturning(true);

    expect(await new NotificationService(channel).notify(7, 'bookingConfirmed', payload)).toBe(true);
    expect(deliver).toHaveBeenCalledWith({ notificationId: undefined, recipientId: 7, kind: 'bookingConfirmed', payload });
    expect(update).not.toHaveBeenCalled();
  });

  test('without a transport nothing is delivered', async () => {
    jest.spyOn(Notification, 'create').mockResolvedValue({ _id: 'n4' } as any);
    expect(await new NotificationService(null).notify(7, 'reviewPosted', { text: 'Nice' })).toBe(false);
  });
});
