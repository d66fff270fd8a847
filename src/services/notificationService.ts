import { Server as SocketIOServer } from 'socket.io';
import { Notification, NotificationKind } from '../models/Notification';
import { ActorRole, AppointmentStatus } from '../types/scheduling';

export const TRANSPORT_ROOM = 'transport';

// Semantic content of a notification; the chat transport renders the text
export type NotificationPayload = {
  appointmentId?: string;
  staffId?: number;
  staffName?: string;
  clientName?: string;
  clientPhone?: string;
  date?: string;
  time?: string;
  status?: AppointmentStatus;
  actorRole?: ActorRole;
  hoursBefore?: number;
  reviewId?: string;
  text?: string;
};

export type NotificationEvent = {
  notificationId?: string;
  recipientId: number;
  kind: NotificationKind;
  payload: NotificationPayload;
};

export interface NotificationDispatcher {
  // Resolves to true once the transport confirmed delivery. Never rejects.
  notify(recipientId: number, kind: NotificationKind, payload: NotificationPayload): Promise<boolean>;
}

export interface NotificationChannel {
  deliver(event: NotificationEvent): Promise<boolean>;
}

// Emits to every transport socket in the room and counts the event delivered when at least one
// of them acknowledges it before the timeout.
export class SocketNotificationChannel implements NotificationChannel {
  constructor(private readonly io: SocketIOServer, private readonly ackTimeoutMs: number) {}

  deliver(event: NotificationEvent): Promise<boolean> {
    return new Promise<boolean>(resolve => {
      this.io.to(TRANSPORT_ROOM).timeout(this.ackTimeoutMs).emit('notify', event, (err: Error | null, responses: unknown[]) => {
        if (err) {
          console.warn(`notify ${event.kind} to ${event.recipientId}: no acknowledgement`, err.message);
          resolve(false);
          return;
        }
        resolve(Array.isArray(responses) && responses.some(r => r === true));
      });
    });
  }
}

export class NotificationService implements NotificationDispatcher {
  constructor(private readonly channel: NotificationChannel | null) {}

  async notify(recipientId: number, kind: NotificationKind, payload: NotificationPayload): Promise<boolean> {
    // Record the attempt first so undelivered notifications stay visible
    let notificationId: string | undefined;
    try {
      const record = await Notification.create({ recipientId, kind, payload, delivered: false });
      notificationId = String(record._id);
    } catch (e) {
      console.warn('Failed to create Notification document', e instanceof Error ? e.message : e);
    }

    let delivered = false;
    try {
      delivered = this.channel ? await this.channel.deliver({ notificationId, recipientId, kind, payload }) : false;
    } catch (e) {
      console.warn(`Failed to dispatch ${kind} to ${recipientId}`, e instanceof Error ? e.message : e);
    }

    if (delivered && notificationId) {
      try {
        await Notification.updateOne({ _id: notificationId }, { $set: { delivered: true } });
      } catch (e) {
        console.warn('Failed to mark Notification delivered', e instanceof Error ? e.message : e);
      }
    }
    if (!delivered) console.warn(`Notification ${kind} to ${recipientId} was not delivered`);
    return delivered;
  }
}

export default NotificationService;
