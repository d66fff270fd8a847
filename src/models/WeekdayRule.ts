import mongoose, { Schema } from 'mongoose';

export interface IWeekdayRule {
  staffId: number;
  weekday: number; // 0 = Monday .. 6 = Sunday
  enabled: boolean;
}

const weekdayRuleSchema = new Schema<IWeekdayRule>({
  staffId: { type: Number, required: true },
  weekday: { type: Number, required: true, min: 0, max: 6 },
  enabled: { type: Boolean, required: true },
}, {
  timestamps: true,
  collection: 'WeekdayRules'
});

// At most one rule per staff member and weekday
weekdayRuleSchema.index({ staffId: 1, weekday: 1 }, { unique: true });

export const WeekdayRule: mongoose.Model<IWeekdayRule> = (mongoose.models && mongoose.models.WeekdayRule)
  ? mongoose.models.WeekdayRule as mongoose.Model<IWeekdayRule>
  : mongoose.model<IWeekdayRule>('WeekdayRule', weekdayRuleSchema);

export default WeekdayRule;
