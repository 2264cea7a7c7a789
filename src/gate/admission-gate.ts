/**
 * Admission decisions for inbound chat events.
 *
 * Navigational payloads (menu switches, back buttons, help screens) only
 * re-render a screen, so they are always admitted. Stateful payloads are
 * admitted once per physical event and once per cooldown window per content;
 * a repeat inside the window is read as a loop and trips the chat breaker.
 * The gate never throws: on an internal failure it admits.
 */

import type {
  AdmissionResult,
  GateConfig,
  GateMetricsSnapshot,
  NavigationPattern,
  SuppressReason,
} from '../types/index.js';
import { NavigationTracker } from '../navigation/navigation-tracker.js';
import { ChatCircuitBreaker } from './chat-circuit-breaker.js';
import { createActionClassifier, type ActionPredicate } from './classifier.js';
import { EventKeyStore } from './event-key-store.js';
import { eventIdKey, fingerprint } from './fingerprint.js';

export interface AdmissionGateDeps {
  config: GateConfig;
  navigation: NavigationTracker;
  /** Overrides the prefix/literal classifier built from `config`. */
  isNavigational?: ActionPredicate;
  breaker?: ChatCircuitBreaker;
  keys?: EventKeyStore;
  now?: () => number;
}

/** Raw platform values are accepted and normalized. */
export interface AdmissionInput {
  chatId: unknown;
  eventId: unknown;
  payload: unknown;
}

const MAX_CHAT_ID_DIGITS = 20;

/**
 * Canonical decimal form of a platform chat id. Malformed input maps to '0'.
 */
export function normalizeChatId(raw: unknown): string {
  if (typeof raw === 'bigint') return raw.toString();
  if (typeof raw === 'number') {
    return Number.isSafeInteger(raw) ? String(raw) : '0';
  }
  if (typeof raw === 'string') {
    const trimmed = raw.trim();
    if (/^-?\d+$/.test(trimmed) && trimmed.replace('-', '').length <= MAX_CHAT_ID_DIGITS) {
      return BigInt(trimmed).toString();
    }
  }
  return '0';
}

export function normalizeEventId(raw: unknown): string {
  if (typeof raw === 'string') return raw.trim();
  if (typeof raw === 'number' && Number.isFinite(raw)) return String(raw);
  if (typeof raw === 'bigint') return raw.toString();
  return '';
}

function emptySuppressedCounts(): Record<SuppressReason, number> {
  return { breaker: 0, 'duplicate-event': 0, 'stateful-cooldown': 0 };
}

export class AdmissionGate {
  readonly navigation: NavigationTracker;
  readonly breaker: ChatCircuitBreaker;
  private readonly keys: EventKeyStore;
  private readonly isNavigational: ActionPredicate;
  private readonly now: () => number;
  private admittedCount = 0;
  private failOpenCount = 0;
  private suppressedCounts = emptySuppressedCounts();

  constructor(private readonly deps: AdmissionGateDeps) {
    const { config } = deps;
    this.now = deps.now || Date.now;
    this.navigation = deps.navigation;
    this.keys =
      deps.keys ||
      new EventKeyStore({ maxTrackedKeys: config.maxTrackedKeys, maxKeyAgeMs: config.maxKeyAgeMs, now: this.now });
    this.breaker = deps.breaker || new ChatCircuitBreaker({ defaultDurationMs: config.breakerDurationMs, now: this.now });
    this.isNavigational =
      deps.isNavigational ||
      createActionClassifier({ prefixes: config.navigationalPrefixes, actions: config.navigationalActions });
  }

  admit(input: AdmissionInput): AdmissionResult {
    const chatId = normalizeChatId(input.chatId);
    const eventId = normalizeEventId(input.eventId);
    const payload = typeof input.payload === 'string' ? input.payload : '';

    try {
      const result = this.decide(chatId, eventId, payload);
      if (result.admitted) {
        this.admittedCount += 1;
      } else {
        this.suppressedCounts[result.reason] += 1;
      }
      return result;
    } catch (error) {
      this.failOpenCount += 1;
      console.error(`[gate] admission check failed for chat ${chatId}, admitting:`, error);
      return { admitted: true, navigational: false, pattern: 'none', rapidRepeat: false };
    }
  }

  /** Boolean form of `admit`. */
  admitEvent(chatId: unknown, eventId: unknown, payload: unknown): boolean {
    return this.admit({ chatId, eventId, payload }).admitted;
  }

  /** Suppresses stateful actions for one chat, e.g. from an operator. */
  lockChat(chatId: unknown, durationMs: number = this.deps.config.breakerDurationMs): void {
    this.breaker.trip(normalizeChatId(chatId), durationMs);
  }

  resetAll(): void {
    this.keys.clear();
    this.breaker.resetAll();
    this.navigation.clear();
    this.admittedCount = 0;
    this.failOpenCount = 0;
    this.suppressedCounts = emptySuppressedCounts();
    console.log('[gate] all admission, lock and navigation state reset');
  }

  metricsSnapshot(): GateMetricsSnapshot {
    this.keys.prune();
    return {
      trackedKeys: this.keys.size,
      activeLocks: this.breaker.activeLocks(),
      navigation: this.navigation.stats(),
      admitted: this.admittedCount,
      suppressed: { ...this.suppressedCounts },
      failOpen: this.failOpenCount,
    };
  }

  dispose(): void {
    this.breaker.dispose();
  }

  private classify(payload: string): boolean {
    try {
      return this.isNavigational(payload);
    } catch (error) {
      console.error('[gate] classifier failed, treating payload as navigational:', error);
      return true;
    }
  }

  private decide(chatId: string, eventId: string, payload: string): AdmissionResult {
    const navigational = this.classify(payload);
    const idKey = eventId ? eventIdKey(chatId, eventId) : undefined;
    const contentKey = fingerprint(chatId, payload);

    if (navigational) {
      const rapidRepeat = this.navigation.isDuplicate(chatId, payload) && !this.closesOscillation(chatId, payload);
      const pattern = this.recordAdmission(chatId, idKey, contentKey, payload);
      return { admitted: true, navigational: true, pattern, rapidRepeat };
    }

    if (this.breaker.isLocked(chatId)) {
      console.warn(`[gate] suppressed "${payload.slice(0, 30)}" in chat ${chatId}: breaker tripped`);
      return { admitted: false, reason: 'breaker' };
    }

    if (idKey && this.keys.seen(idKey)) {
      console.warn(`[gate] suppressed redelivered event ${eventId} in chat ${chatId}`);
      return { admitted: false, reason: 'duplicate-event' };
    }

    const lastSeenAt = this.keys.lastSeen(contentKey);
    if (lastSeenAt !== undefined && this.now() - lastSeenAt < this.deps.config.statefulCooldownMs) {
      console.warn(`[gate] suppressed repeated "${payload.slice(0, 30)}" in chat ${chatId}: loop suspected`);
      this.breaker.trip(chatId, this.deps.config.breakerDurationMs);
      return { admitted: false, reason: 'stateful-cooldown' };
    }

    const pattern = this.recordAdmission(chatId, idKey, contentKey, payload);
    return { admitted: true, navigational: false, pattern, rapidRepeat: false };
  }

  /**
   * True when `action` would complete an A,B,A sequence, i.e. a user moving
   * between two screens on purpose.
   */
  private closesOscillation(chatId: string, action: string): boolean {
    const [latest, previous] = this.navigation.history(chatId, 2);
    return !!latest && !!previous && previous.action === action && latest.action !== action;
  }

  private recordAdmission(
    chatId: string,
    idKey: string | undefined,
    contentKey: string,
    payload: string,
  ): NavigationPattern {
    const at = this.now();
    if (idKey) this.keys.mark(idKey, at);
    this.keys.mark(contentKey, at);
    this.navigation.record(chatId, payload);
    return this.navigation.detectPattern(chatId);
  }
}
