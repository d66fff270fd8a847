// Client name: any non-empty text once trimmed
export const normalizeName = (raw?: string): string | null => {
  const s = String(raw ?? '').trim();
  return s ? s : null;
};

// Strip the separators people type inside phone numbers: spaces, dashes, dots and parentheses
export const normalizePhone = (raw?: string): string => String(raw ?? '').trim().replace(/[\s\-().]/g, '');

// International dialing format: leading '+', then 10-15 digits
export const validatePhoneNumber = (phoneNumber: string): boolean => {
  const phoneRegex = /^\+\d{10,15}$/;
  return phoneRegex.test(phoneNumber);
};

export const isWeekday = (value: unknown): value is number =>
  typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= 6;

export const isChatId = (value: unknown): value is number =>
  typeof value === 'number' && Number.isSafeInteger(value) && value > 0;

// Parse a route parameter or body field holding a chat id
export const parseChatId = (raw: unknown): number | null => {
  const n = typeof raw === 'number' ? raw : (typeof raw === 'string' && /^\d+$/.test(raw) ? Number(raw) : NaN);
  return isChatId(n) ? n : null;
};
