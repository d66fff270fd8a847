import mongoose, { Schema } from 'mongoose';

// Staff identity is the person's chat id. Rows are never deleted: removing someone from the
// roster clears `isStaff`, since appointments keep referencing the id.
export interface IStaffMember {
  staffId: number;
  name: string;
  phone?: string;
  isStaff: boolean;
  isAdmin: boolean;
  timeZone?: string;
  createdAt?: Date;
  updatedAt?: Date;
}

const staffMemberSchema = new Schema<IStaffMember>({
  staffId: { type: Number, required: true, unique: true },
  name: { type: String, required: true, trim: true },
  phone: { type: String, trim: true },
  isStaff: { type: Boolean, default: false },
  isAdmin: { type: Boolean, default: false },
  timeZone: { type: String },
}, {
  timestamps: true,
  collection: 'StaffMembers'
});

staffMemberSchema.index({ isStaff: 1, name: 1 });
staffMemberSchema.index({ isAdmin: 1 });

// Guard against recompilation in dev (nodemon / ts-node)
export const StaffMember: mongoose.Model<IStaffMember> = (mongoose.models && mongoose.models.StaffMember)
  ? mongoose.models.StaffMember as mongoose.Model<IStaffMember>
  : mongoose.model<IStaffMember>('StaffMember', staffMemberSchema);

export default StaffMember;
