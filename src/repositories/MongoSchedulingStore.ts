import mongoose, { ClientSession, FilterQuery } from 'mongoose';
import { Appointment as AppointmentModel, IAppointment } from '../models/Appointment';
import { AvailabilitySlot as AvailabilitySlotModel, IAvailabilitySlot } from '../models/AvailabilitySlot';
import { StaffMember as StaffMemberModel, IStaffMember } from '../models/StaffMember';
import { WeekdayRule as WeekdayRuleModel, IWeekdayRule } from '../models/WeekdayRule';
import {
  ACTIVE_STATUSES,
  Appointment,
  AppointmentStatus,
  AvailabilitySlot,
  NewAppointment,
  ReminderFlag,
  StaffMember,
  WeekdayRule,
} from '../types/scheduling';
import { AppointmentFilter, SchedulingStore, StaffFilter } from './SchedulingStore';

type WithId<T> = T & { _id: unknown };

export const toStaffMember = (doc: WithId<IStaffMember>): StaffMember => ({
  staffId: doc.staffId,
  name: doc.name,
  phone: doc.phone || undefined,
  isStaff: Boolean(doc.isStaff),
  isAdmin: Boolean(doc.isAdmin),
  timeZone: doc.timeZone || undefined,
});

const toWeekdayRule = (doc: IWeekdayRule): WeekdayRule => ({
  staffId: doc.staffId,
  weekday: doc.weekday,
  enabled: doc.enabled,
});

const toSlot = (doc: IAvailabilitySlot): AvailabilitySlot => ({
  staffId: doc.staffId,
  date: doc.date,
  time: doc.time,
  isAvailable: doc.isAvailable,
  heldBy: doc.heldBy ?? null,
});

export const toAppointment = (doc: WithId<IAppointment>): Appointment => ({
  id: String(doc._id),
  staffId: doc.staffId,
  clientChatId: doc.clientChatId,
  clientName: doc.clientName,
  clientPhone: doc.clientPhone,
  clientUsername: doc.clientUsername || undefined,
  date: doc.date,
  time: doc.time,
  status: doc.status,
  reminded24h: Boolean(doc.reminded24h),
  reminded2h: Boolean(doc.reminded2h),
  createdAt: doc.createdAt,
});

export interface MongoStoreOptions {
  // Multi-document transactions need a replica set; a standalone mongod must run without them.
  // The partial unique index on Appointments still rejects double bookings either way.
  transactions: boolean;
}

export class MongoSchedulingStore implements SchedulingStore {
  constructor(
    private readonly options: MongoStoreOptions = { transactions: true },
    private readonly session: ClientSession | null = null,
  ) {}

  private get writeOptions() {
    return this.session ? { session: this.session } : {};
  }

  async runInTransaction<T>(work: (tx: SchedulingStore) => Promise<T>): Promise<T> {
    // Already inside a transaction, or transactions disabled: run in place
    if (this.session || !this.options.transactions) return work(this);

    const session = await mongoose.startSession();
    try {
      session.startTransaction();
      const result = await work(new MongoSchedulingStore(this.options, session));
      await session.commitTransaction();
      return result;
    } catch (err) {
      if (session.inTransaction()) {
        try {
          await session.abortTransaction();
        } catch (abortErr) {
          console.warn('MongoSchedulingStore: abortTransaction failed', abortErr);
        }
      }
      throw err;
    } finally {
      await session.endSession();
    }
  }

  async findStaff(staffId: number): Promise<StaffMember | null> {
    const doc = await StaffMemberModel.findOne({ staffId }).session(this.session).lean();
    return doc ? toStaffMember(doc) : null;
  }

  async listStaff(filter: StaffFilter = {}): Promise<StaffMember[]> {
    const query: FilterQuery<IStaffMember> = {};
    if (filter.isStaff !== undefined) query.isStaff = filter.isStaff;
    if (filter.isAdmin !== undefined) query.isAdmin = filter.isAdmin;
    const docs = await StaffMemberModel.find(query).sort({ name: 1, staffId: 1 }).session(this.session).lean();
    return docs.map(toStaffMember);
  }

  async saveStaff(staff: StaffMember): Promise<StaffMember> {
    const $set: Partial<IStaffMember> = { name: staff.name, isStaff: staff.isStaff, isAdmin: staff.isAdmin };
    const $unset: Partial<Record<'phone' | 'timeZone', 1>> = {};
    if (staff.phone) $set.phone = staff.phone; else $unset.phone = 1;
    if (staff.timeZone) $set.timeZone = staff.timeZone; else $unset.timeZone = 1;

    const doc = await StaffMemberModel.findOneAndUpdate(
      { staffId: staff.staffId },
      { $set, $unset },
      { upsert: true, new: true, ...this.writeOptions },
    ).lean();
    if (!doc) throw new Error(`Failed to save staff member ${staff.staffId}`);
    return toStaffMember(doc);
  }

  async findWeekdayRules(staffId: number): Promise<WeekdayRule[]> {
    const docs = await WeekdayRuleModel.find({ staffId }).sort({ weekday: 1 }).session(this.session).lean();
    return docs.map(toWeekdayRule);
  }

  async upsertWeekdayRule(rule: WeekdayRule): Promise<WeekdayRule> {
    const doc = await WeekdayRuleModel.findOneAndUpdate(
      { staffId: rule.staffId, weekday: rule.weekday },
      { $set: { enabled: rule.enabled } },
      { upsert: true, new: true, ...this.writeOptions },
    ).lean();
    if (!doc) throw new Error(`Failed to save weekday rule ${rule.staffId}/${rule.weekday}`);
    return toWeekdayRule(doc);
  }

  async findSlot(staffId: number, date: string, time: string): Promise<AvailabilitySlot | null> {
    const doc = await AvailabilitySlotModel.findOne({ staffId, date, time }).session(this.session).lean();
    return doc ? toSlot(doc) : null;
  }

  async findSlotsForDate(staffId: number, date: string): Promise<AvailabilitySlot[]> {
    const docs = await AvailabilitySlotModel.find({ staffId, date }).sort({ time: 1 }).session(this.session).lean();
    return docs.map(toSlot);
  }

  async upsertSlot(slot: AvailabilitySlot): Promise<AvailabilitySlot> {
    const doc = await AvailabilitySlotModel.findOneAndUpdate(
      { staffId: slot.staffId, date: slot.date, time: slot.time },
      { $set: { isAvailable: slot.isAvailable, heldBy: slot.heldBy ?? null } },
      { upsert: true, new: true, ...this.writeOptions },
    ).lean();
    if (!doc) throw new Error(`Failed to save availability slot ${slot.staffId}/${slot.date}/${slot.time}`);
    return toSlot(doc);
  }

  async insertAppointment(draft: NewAppointment): Promise<Appointment> {
    // Use instance save to avoid overload ambiguities with `.create()` signatures
    const entry = new AppointmentModel({
      ...draft,
      status: 'pending',
      reminded24h: false,
      reminded2h: false,
      createdAt: new Date(),
    });
    const saved = await entry.save(this.writeOptions);
    return toAppointment(saved);
  }

  async findAppointment(id: string): Promise<Appointment | null> {
    if (!mongoose.isValidObjectId(id)) return null;
    const doc = await AppointmentModel.findById(id).session(this.session).lean();
    return doc ? toAppointment(doc) : null;
  }

  async findActiveAppointment(staffId: number, date: string, time: string): Promise<Appointment | null> {
    const doc = await AppointmentModel.findOne({ staffId, date, time, status: { $in: ACTIVE_STATUSES } })
      .session(this.session)
      .lean();
    return doc ? toAppointment(doc) : null;
  }

  async findAppointments(filter: AppointmentFilter): Promise<Appointment[]> {
    const query: FilterQuery<IAppointment> = {};
    if (filter.staffId !== undefined) query.staffId = filter.staffId;
    if (filter.clientChatId !== undefined) query.clientChatId = filter.clientChatId;
    if (filter.statuses) query.status = { $in: filter.statuses };
    const docs = await AppointmentModel.find(query).sort({ date: 1, time: 1 }).session(this.session).lean();
    return docs.map(toAppointment);
  }

  async updateAppointmentStatus(id: string, expected: AppointmentStatus, next: AppointmentStatus): Promise<Appointment | null> {
    if (!mongoose.isValidObjectId(id)) return null;
    const doc = await AppointmentModel.findOneAndUpdate(
      { _id: id, status: expected },
      { $set: { status: next } },
      { new: true, ...this.writeOptions },
    ).lean();
    return doc ? toAppointment(doc) : null;
  }

  async markReminded(id: string, flag: ReminderFlag): Promise<boolean> {
    if (!mongoose.isValidObjectId(id)) return false;
    const query: FilterQuery<IAppointment> = { _id: id };
    query[flag] = false;
    const $set: Partial<IAppointment> = {};
    $set[flag] = true;
    const res = await AppointmentModel.updateOne(query, { $set }, this.writeOptions);
    return res.modifiedCount === 1;
  }
}

export default MongoSchedulingStore;
