import mongoose, { Schema } from 'mongoose';

export const NOTIFICATION_KINDS = ['bookingCreated', 'bookingConfirmed', 'bookingCancelled', 'reminderDue', 'reviewPosted'] as const;
export type NotificationKind = typeof NOTIFICATION_KINDS[number];

// One record per dispatch attempt; `delivered` is set once the transport acknowledges it
export interface INotification {
  recipientId: number;
  kind: NotificationKind;
  payload: Record<string, unknown>;
  delivered: boolean;
  createdAt: Date;
}

const notificationSchema = new Schema<INotification>({
  recipientId: { type: Number, required: true },
  kind: { type: String, enum: [...NOTIFICATION_KINDS], required: true },
  payload: { type: Schema.Types.Mixed, default: {} },
  delivered: { type: Boolean, default: false },
  createdAt: { type: Date, default: Date.now },
}, {
  collection: 'Notifications'
});

notificationSchema.index({ recipientId: 1, createdAt: -1 });

// Guard against recompilation in dev
export const Notification: mongoose.Model<INotification> = (mongoose.models && mongoose.models.Notification)
  ? mongoose.models.Notification as mongoose.Model<INotification>
  : mongoose.model<INotification>('Notification', notificationSchema);

export default Notification;
