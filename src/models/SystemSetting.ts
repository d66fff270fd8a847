import mongoose, { Schema } from 'mongoose';

// Site-wide informational text shown by the chat front end. A single document.
export interface ISystemSetting {
  welcomeText?: string;
  aboutText?: string;
  groupUrl?: string;
  createdAt?: Date;
  updatedAt?: Date;
}

const systemSettingSchema = new Schema<ISystemSetting>({
  welcomeText: { type: String },
  aboutText: { type: String },
  groupUrl: { type: String },
}, { timestamps: true });

const modelName = 'SystemSetting';
export const SystemSetting: mongoose.Model<ISystemSetting> = (mongoose.models && mongoose.models[modelName])
  ? mongoose.models[modelName] as mongoose.Model<ISystemSetting>
  : mongoose.model<ISystemSetting>(modelName, systemSettingSchema);

export default SystemSetting;
