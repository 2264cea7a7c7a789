import { createHash } from 'crypto';

const FINGERPRINT_HEX_LENGTH = 12;

export function contentHash(payload: string): string {
  return createHash('md5').update(payload, 'utf8').digest('hex').slice(0, FINGERPRINT_HEX_LENGTH);
}

/** Chat-namespaced content key, e.g. `content:42:5d41402abc4b`. */
export function fingerprint(chatId: string, payload: string): string {
  return `content:${chatId}:${contentHash(payload)}`;
}

export function eventIdKey(chatId: string, eventId: string): string {
  return `id:${chatId}:${eventId}`;
}
