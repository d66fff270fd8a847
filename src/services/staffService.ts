import { SchedulingStore } from '../repositories/SchedulingStore';
import { Failure, StaffMember, fail } from '../types/scheduling';
import { isValidTimeZone } from '../utils/scheduling';
import { isChatId, normalizeName, normalizePhone, validatePhoneNumber } from '../utils/validation';
import { SlotCalendar } from './slotCalendar';

export type RosterResult = { ok: true; staff: StaffMember } | Failure<'ValidationError' | 'NotFound'>;

export interface ProfilePatch {
  name?: string;
  phone?: string | null;
  timeZone?: string | null;
}

const INVALID_PHONE = 'Phone must be in international format, e.g. +79171234567';

// Roster management. People are never deleted: removing a role only clears its flag, so
// appointments and reviews keep pointing at a known person.
export class StaffService {
  constructor(private readonly store: SchedulingStore, private readonly calendar: SlotCalendar) {}

  async listStaff(): Promise<StaffMember[]> {
    return this.store.listStaff({ isStaff: true });
  }

  async listAdmins(): Promise<StaffMember[]> {
    return this.store.listStaff({ isAdmin: true });
  }

  async grantStaff(staffId: number, name: string, phone?: string): Promise<RosterResult> {
    if (!isChatId(staffId)) return fail('ValidationError', 'Staff id must be a positive integer chat id');
    const cleanName = normalizeName(name);
    if (!cleanName) return fail('ValidationError', 'Name is required');
    let cleanPhone: string | undefined;
    if (phone !== undefined && phone !== '') {
      cleanPhone = normalizePhone(phone);
      if (!validatePhoneNumber(cleanPhone)) return fail('ValidationError', INVALID_PHONE);
    }

    const existing = await this.store.findStaff(staffId);
    const staff = await this.store.saveStaff({
      staffId,
      name: cleanName,
      phone: cleanPhone ?? existing?.phone,
      isStaff: true,
      isAdmin: existing?.isAdmin ?? false,
      timeZone: existing?.timeZone,
    });
    await this.calendar.ensureDefaultWeekdays(staffId);
    console.log(`Staff ${staffId} (${cleanName}) added to the roster`);
    return { ok: true, staff };
  }

  async revokeStaff(staffId: number): Promise<RosterResult> {
    const existing = await this.store.findStaff(staffId);
    if (!existing || !existing.isStaff) return fail('NotFound', 'Staff member not found');
    const staff = await this.store.saveStaff({ ...existing, isStaff: false });
    console.log(`Staff ${staffId} removed from the roster`);
    return { ok: true, staff };
  }

  async grantAdmin(chatId: number, name?: string): Promise<RosterResult> {
    if (!isChatId(chatId)) return fail('ValidationError', 'Chat id must be a positive integer');
    const existing = await this.store.findStaff(chatId);
    const staff = await this.store.saveStaff({
      staffId: chatId,
      name: normalizeName(name) || existing?.name || `Admin ${chatId}`,
      phone: existing?.phone,
      isStaff: existing?.isStaff ?? false,
      isAdmin: true,
      timeZone: existing?.timeZone,
    });
    if (!existing?.isAdmin) console.log(`Chat ${chatId} granted admin`);
    return { ok: true, staff };
  }

  async revokeAdmin(chatId: number): Promise<RosterResult> {
    const existing = await this.store.findStaff(chatId);
    if (!existing || !existing.isAdmin) return fail('NotFound', 'Administrator not found');
    const admins = await this.store.listStaff({ isAdmin: true });
    if (admins.length <= 1) return fail('ValidationError', 'At least one administrator must remain');
    const staff = await this.store.saveStaff({ ...existing, isAdmin: false });
    console.log(`Chat ${chatId} is no longer an admin`);
    return { ok: true, staff };
  }

  async updateProfile(staffId: number, patch: ProfilePatch): Promise<RosterResult> {
    const existing = await this.store.findStaff(staffId);
    if (!existing) return fail('NotFound', 'Staff member not found');
    const next: StaffMember = { ...existing };

    if (patch.name !== undefined) {
      const name = normalizeName(patch.name);
      if (!name) return fail('ValidationError', 'Name must not be empty');
      next.name = name;
    }
    if (patch.phone !== undefined) {
      if (patch.phone === null || patch.phone === '') {
        next.phone = undefined;
      } else {
        const phone = normalizePhone(patch.phone);
        if (!validatePhoneNumber(phone)) return fail('ValidationError', INVALID_PHONE);
        next.phone = phone;
      }
    }
    if (patch.timeZone !== undefined) {
      if (patch.timeZone === null || patch.timeZone === '') {
        next.timeZone = undefined;
      } else if (!isValidTimeZone(patch.timeZone)) {
        return fail('ValidationError', 'Unknown time zone');
      } else {
        next.timeZone = patch.timeZone;
      }
    }

    return { ok: true, staff: await this.store.saveStaff(next) };
  }
}

export default StaffService;
