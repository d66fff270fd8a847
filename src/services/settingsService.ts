import { SystemSetting } from '../models/SystemSetting';
import { Failure, fail } from '../types/scheduling';

export interface SiteSettings {
  welcomeText: string;
  aboutText: string;
  groupUrl: string;
}

export type SettingsPatch = Partial<SiteSettings>;

export type SettingsResult = { ok: true; settings: SiteSettings } | Failure<'ValidationError'>;

const DEFAULT_WELCOME = 'Welcome! Tap "Book" to make an appointment.';
const MAX_TEXT_LENGTH = 4000;

export class SettingsService {
  constructor(private readonly defaults: { groupUrl: string }) {}

  async get(): Promise<SiteSettings> {
    const doc = await SystemSetting.findOne({}).lean();
    return {
      welcomeText: doc?.welcomeText || DEFAULT_WELCOME,
      aboutText: doc?.aboutText || '',
      groupUrl: doc?.groupUrl || this.defaults.groupUrl,
    };
  }

  async update(patch: SettingsPatch): Promise<SettingsResult> {
    const $set: SettingsPatch = {};
    for (const key of ['welcomeText', 'aboutText', 'groupUrl'] as const) {
      const value = patch[key];
      if (value === undefined) continue;
      if (typeof value !== 'string') return fail('ValidationError', `${key} must be a string`);
      if (value.length > MAX_TEXT_LENGTH) return fail('ValidationError', `${key} is too long`);
      $set[key] = value.trim();
    }
    if ($set.groupUrl && !/^https?:\/\/\S+$/.test($set.groupUrl)) {
      return fail('ValidationError', 'groupUrl must be an http(s) link');
    }
    if (!Object.keys($set).length) return fail('ValidationError', 'Nothing to update');

    await SystemSetting.findOneAndUpdate({}, { $set }, { upsert: true, new: true });
    console.log(`Site settings updated: ${Object.keys($set).join(', ')}`);
    return { ok: true, settings: await this.get() };
  }
}

export default SettingsService;
