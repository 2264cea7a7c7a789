/**
 * TypeScript type definitions
 */

export * from './interfaces.js';

export type EventKind = 'message' | 'callback';

/**
 * One inbound update as produced by an event source.
 * `eventId` is the platform's own identifier, or '' when the platform has none.
 */
export interface InboundEvent {
  chatId: string;
  eventId: string;
  kind: EventKind;
  payload: string;
  /** Epoch milliseconds at which the platform produced the event. */
  timestamp: number;
}

export type NavigationPattern = 'none' | 'back_forth' | 'circular' | 'menu_switching';

export type SuppressReason = 'breaker' | 'duplicate-event' | 'stateful-cooldown';

export type AdmissionResult =
  | {
      admitted: true;
      navigational: boolean;
      pattern: NavigationPattern;
      /**
       * The same navigational action was recorded a moment ago.
       * Callers may prefer editing the previous message over sending a new one.
       */
      rapidRepeat: boolean;
    }
  | {
      admitted: false;
      reason: SuppressReason;
    };

export type AdmittedResult = Extract<AdmissionResult, { admitted: true }>;

export interface NavigationStep {
  chatId: string;
  sessionId: string;
  action: string;
  timestamp: number;
  stepIndex: number;
  context?: string;
}

export interface InstanceLease {
  ownerId: string;
  acquiredAt: number;
  heartbeatAt: number;
  expiresAt: number;
}

export interface GateMetricsSnapshot {
  trackedKeys: number;
  activeLocks: number;
  navigation: {
    chats: number;
    steps: number;
  };
  admitted: number;
  suppressed: Record<SuppressReason, number>;
  failOpen: number;
}

export type LeaseStoreKind = 'file' | 'sqlite';

export interface GateConfig {
  statefulCooldownMs: number;
  breakerDurationMs: number;
  maxTrackedKeys: number;
  maxKeyAgeMs: number;
  /** Payload prefixes treated as navigational, e.g. `menu_`, `back_`. */
  navigationalPrefixes: string[];
  /** Exact payloads treated as navigational, e.g. `help`, `status`. */
  navigationalActions: string[];
}

export interface NavigationConfig {
  maxHistory: number;
  purgeThresholdMs: number;
  purgeEvery: number;
  duplicateWindowMs: number;
  menuRootPrefix: string;
}

export interface LeaseConfig {
  store: LeaseStoreKind;
  path: string;
  ttlMs: number;
  heartbeatIntervalMs: number;
  startupTimeoutMs: number;
  ioTimeoutMs: number;
}

export interface DiscordConfig {
  token: string;
}

export interface ChatGateConfig {
  discord: DiscordConfig;
  gate: GateConfig;
  navigation: NavigationConfig;
  lease: LeaseConfig;
  /** Loopback port for the status server. 0 disables it. */
  statusPort: number;
}
