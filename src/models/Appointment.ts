import mongoose, { Schema } from 'mongoose';
import { APPOINTMENT_STATUSES, ACTIVE_STATUSES, AppointmentStatus } from '../types/scheduling';

export interface IAppointment {
  staffId: number;
  clientChatId: number;
  clientName: string;
  clientPhone: string;
  clientUsername?: string;
  date: string; // 'YYYY-MM-DD'
  time: string; // 'HH:mm'
  status: AppointmentStatus;
  reminded24h: boolean;
  reminded2h: boolean;
  createdAt: Date;
}

const appointmentSchema = new Schema<IAppointment>({
  staffId: { type: Number, required: true },
  clientChatId: { type: Number, required: true },
  clientName: { type: String, required: true, trim: true },
  clientPhone: { type: String, required: true },
  clientUsername: { type: String },
  date: { type: String, required: true },
  time: { type: String, required: true },
  status: { type: String, enum: [...APPOINTMENT_STATUSES], default: 'pending', required: true },
  reminded24h: { type: Boolean, default: false },
  reminded2h: { type: Boolean, default: false },
  createdAt: { type: Date, default: Date.now },
}, {
  collection: 'Appointments'
});

appointmentSchema.index({ clientChatId: 1, status: 1 });
appointmentSchema.index({ status: 1, date: 1, time: 1 });
// Mutual exclusion: one pending/confirmed appointment per staff member, date and time.
// This index is what makes two concurrent bookings of the same slot impossible.
appointmentSchema.index(
  { staffId: 1, date: 1, time: 1 },
  { unique: true, partialFilterExpression: { status: { $in: ACTIVE_STATUSES } }, name: 'active_slot_unique' }
);

export const Appointment: mongoose.Model<IAppointment> = (mongoose.models && mongoose.models.Appointment)
  ? mongoose.models.Appointment as mongoose.Model<IAppointment>
  : mongoose.model<IAppointment>('Appointment', appointmentSchema);

export default Appointment;
