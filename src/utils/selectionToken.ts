import { isValidDate, isValidTime } from './scheduling';
import { parseChatId } from './validation';

// Already-demultiplexed selections coming from the chat transport, e.g. 'staff:42',
// 'date:2024-06-03', 'time:15:00', 'book', 'abort'.
export type Selection =
  | { action: 'book' }
  | { action: 'abort' }
  | { action: 'staff'; staffId: number }
  | { action: 'date'; date: string }
  | { action: 'time'; time: string };

export function parseSelectionToken(token: string): Selection | null {
  const raw = String(token || '').trim();
  const idx = raw.indexOf(':');
  const action = idx === -1 ? raw : raw.slice(0, idx);
  const param = idx === -1 ? '' : raw.slice(idx + 1);

  switch (action) {
    case 'book':
    case 'abort':
      return param ? null : { action };
    case 'staff': {
      const staffId = parseChatId(param);
      return staffId === null ? null : { action, staffId };
    }
    case 'date':
      return isValidDate(param) ? { action, date: param } : null;
    case 'time':
      return isValidTime(param) ? { action, time: param } : null;
    default:
      return null;
  }
}

export function formatSelectionToken(selection: Selection): string {
  switch (selection.action) {
    case 'staff': return `staff:${selection.staffId}`;
    case 'date': return `date:${selection.date}`;
    case 'time': return `time:${selection.time}`;
    default: return selection.action;
  }
}
