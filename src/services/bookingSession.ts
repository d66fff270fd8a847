import NodeCache from 'node-cache';

export interface StaffOption {
  staffId: number;
  name: string;
  phone?: string;
  token: string;
}

export interface ValueOption {
  value: string;
  token: string;
}

interface ClientDetails {
  name: string;
  phone: string;
}

// One state per step of the booking conversation; each carries exactly what later steps need
export type BookingSession =
  | { step: 'idle' }
  | { step: 'collectingName' }
  | { step: 'collectingPhone'; name: string }
  | ({ step: 'selectingStaff'; offeredStaff: StaffOption[] } & ClientDetails)
  | ({ step: 'selectingDate'; staffId: number; offeredDates: string[] } & ClientDetails)
  | ({ step: 'selectingTime'; staffId: number; date: string; offeredTimes: string[] } & ClientDetails);

export type SessionStep = BookingSession['step'];

export interface SessionStore {
  get(sessionId: number): BookingSession;
  set(sessionId: number, session: BookingSession): void;
  clear(sessionId: number): void;
}

// In-process session storage. Sessions are transient: an abandoned conversation simply
// expires after `ttlSeconds` of inactivity and leaves nothing behind.
export class CacheSessionStore implements SessionStore {
  private readonly cache: NodeCache;

  constructor(ttlSeconds: number) {
    this.cache = new NodeCache({ stdTTL: ttlSeconds, checkperiod: Math.min(600, Math.max(60, ttlSeconds)), useClones: false });
  }

  get(sessionId: number): BookingSession {
    return this.cache.get<BookingSession>(String(sessionId)) ?? { step: 'idle' };
  }

  set(sessionId: number, session: BookingSession) {
    if (session.step === 'idle') {
      this.clear(sessionId);
      return;
    }
    this.cache.set(String(sessionId), session);
  }

  clear(sessionId: number) {
    this.cache.del(String(sessionId));
  }

  close() {
    this.cache.close();
  }
}
