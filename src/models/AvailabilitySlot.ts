import mongoose, { Schema } from 'mongoose';

// Explicit per-date/per-time override of a staff member's weekday template.
// `heldBy` names the appointment whose booking closed the slot, so a cancellation only
// reopens slots it closed itself.
export interface IAvailabilitySlot {
  staffId: number;
  date: string; // 'YYYY-MM-DD'
  time: string; // 'HH:mm'
  isAvailable: boolean;
  heldBy?: string | null;
}

const availabilitySlotSchema = new Schema<IAvailabilitySlot>({
  staffId: { type: Number, required: true },
  date: { type: String, required: true },
  time: { type: String, required: true },
  isAvailable: { type: Boolean, required: true },
  heldBy: { type: String, default: null },
}, {
  timestamps: true,
  collection: 'AvailabilitySlots'
});

availabilitySlotSchema.index({ staffId: 1, date: 1, time: 1 }, { unique: true });

export const AvailabilitySlot: mongoose.Model<IAvailabilitySlot> = (mongoose.models && mongoose.models.AvailabilitySlot)
  ? mongoose.models.AvailabilitySlot as mongoose.Model<IAvailabilitySlot>
  : mongoose.model<IAvailabilitySlot>('AvailabilitySlot', availabilitySlotSchema);

export default AvailabilitySlot;
