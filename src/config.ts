export interface Config {
  PORT: number;
  MONGODB_URI: string;
  MONGODB_TRANSACTIONS: boolean;
  JWT_SECRET: string;
  TIME_ZONE: string;
  SLOT_TIMES: string[];
  DEFAULT_WORKDAYS: number[];
  BOOKING_WINDOW_DAYS: number;
  REMINDER_INTERVAL_MS: number;
  REMINDER_WINDOW_MINUTES: number;
  SESSION_TTL_SECONDS: number;
  NOTIFY_ACK_TIMEOUT_MS: number;
  ADMIN_IDS: number[];
  GROUP_URL: string;
}

const DEFAULT_SLOT_TIMES = ['10:00', '11:00', '12:00', '13:00', '15:00', '16:00', '17:00'];
const DEFAULT_WORKDAYS = [0, 1, 2, 3, 4];

const toInt = (raw: string | undefined, fallback: number) => {
  const n = parseInt(raw || '', 10);
  return Number.isNaN(n) ? fallback : n;
};

const toList = (raw: string | undefined) => (raw || '').split(',').map(s => s.trim()).filter(Boolean);

const toIntList = (raw: string | undefined, fallback: number[]) => {
  const items = toList(raw);
  if (!items.length) return fallback;
  const parsed = items.map(x => parseInt(x, 10));
  return parsed.some(Number.isNaN) ? fallback : parsed;
};

const toTimeList = (raw: string | undefined, fallback: string[]) => {
  const items = toList(raw);
  if (!items.length || items.some(t => !/^([01]\d|2[0-3]):[0-5]\d$/.test(t))) return fallback;
  return Array.from(new Set(items)).sort();
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    PORT: toInt(env.PORT, 5000),
    // MONGO_URI is accepted as an alias, as some deploy targets use that name
    MONGODB_URI: env.MONGODB_URI || env.MONGO_URI || 'mongodb://localhost:27017/salon_booking',
    MONGODB_TRANSACTIONS: (env.MONGODB_TRANSACTIONS || 'true').toLowerCase() !== 'false',
    JWT_SECRET: env.JWT_SECRET || 'change-me',
    TIME_ZONE: env.TIME_ZONE || 'Europe/Moscow',
    SLOT_TIMES: toTimeList(env.SLOT_TIMES, DEFAULT_SLOT_TIMES),
    DEFAULT_WORKDAYS: toIntList(env.DEFAULT_WORKDAYS, DEFAULT_WORKDAYS).filter(d => d >= 0 && d <= 6),
    BOOKING_WINDOW_DAYS: toInt(env.BOOKING_WINDOW_DAYS, 14),
    REMINDER_INTERVAL_MS: toInt(env.REMINDER_INTERVAL_MS, 10 * 60 * 1000),
    REMINDER_WINDOW_MINUTES: toInt(env.REMINDER_WINDOW_MINUTES, 5),
    SESSION_TTL_SECONDS: toInt(env.SESSION_TTL_SECONDS, 24 * 60 * 60),
    NOTIFY_ACK_TIMEOUT_MS: toInt(env.NOTIFY_ACK_TIMEOUT_MS, 5000),
    ADMIN_IDS: toIntList(env.ADMIN_IDS, []),
    GROUP_URL: env.GROUP_URL || '',
  };
}
