/**
 * Configuration management
 */

import { config as loadEnv } from 'dotenv';
import { join } from 'path';
import type { ChatGateConfig, LeaseStoreKind } from '../types/index.js';
import type { IStorage, IEnvironment } from '../types/interfaces.js';
import { FileStorage } from '../infra/storage.js';
import { SystemEnvironment } from '../infra/environment.js';
import { DEFAULT_NAVIGATIONAL_ACTIONS, DEFAULT_NAVIGATIONAL_PREFIXES } from '../gate/classifier.js';

export interface StoredConfig {
  token?: string;
  statefulCooldownMs?: number;
  breakerDurationMs?: number;
  maxTrackedKeys?: number;
  maxKeyAgeMs?: number;
  navigationalPrefixes?: string[];
  navigationalActions?: string[];
  navMaxHistory?: number;
  navPurgeThresholdMs?: number;
  navDuplicateWindowMs?: number;
  menuRootPrefix?: string;
  leaseStore?: LeaseStoreKind;
  leasePath?: string;
  leaseTtlMs?: number;
  heartbeatIntervalMs?: number;
  startupTimeoutMs?: number;
  leaseIoTimeoutMs?: number;
  statusPort?: number;
}

interface NumberSetting {
  stored: keyof StoredConfig;
  env: string;
  min: number;
  max: number;
  fallback: number;
}

export const NUMBER_SETTINGS = {
  statefulCooldownMs: { stored: 'statefulCooldownMs', env: 'CHATGATE_STATEFUL_COOLDOWN_MS', min: 50, max: 60_000, fallback: 1000 },
  breakerDurationMs: { stored: 'breakerDurationMs', env: 'CHATGATE_BREAKER_DURATION_MS', min: 100, max: 10_000, fallback: 2000 },
  maxTrackedKeys: { stored: 'maxTrackedKeys', env: 'CHATGATE_MAX_TRACKED_KEYS', min: 10, max: 1_000_000, fallback: 1000 },
  maxKeyAgeMs: { stored: 'maxKeyAgeMs', env: 'CHATGATE_MAX_KEY_AGE_MS', min: 1000, max: 3_600_000, fallback: 30_000 },
  navMaxHistory: { stored: 'navMaxHistory', env: 'CHATGATE_NAV_MAX_HISTORY', min: 5, max: 1000, fallback: 20 },
  navPurgeThresholdMs: { stored: 'navPurgeThresholdMs', env: 'CHATGATE_NAV_PURGE_THRESHOLD_MS', min: 60_000, max: 86_400_000, fallback: 3_600_000 },
  navDuplicateWindowMs: { stored: 'navDuplicateWindowMs', env: 'CHATGATE_NAV_DUPLICATE_WINDOW_MS', min: 50, max: 10_000, fallback: 500 },
  leaseTtlMs: { stored: 'leaseTtlMs', env: 'CHATGATE_LEASE_TTL_MS', min: 1000, max: 600_000, fallback: 9000 },
  heartbeatIntervalMs: { stored: 'heartbeatIntervalMs', env: 'CHATGATE_HEARTBEAT_MS', min: 250, max: 300_000, fallback: 3000 },
  startupTimeoutMs: { stored: 'startupTimeoutMs', env: 'CHATGATE_STARTUP_TIMEOUT_MS', min: 0, max: 600_000, fallback: 30_000 },
  leaseIoTimeoutMs: { stored: 'leaseIoTimeoutMs', env: 'CHATGATE_LEASE_IO_TIMEOUT_MS', min: 50, max: 60_000, fallback: 1000 },
  statusPort: { stored: 'statusPort', env: 'CHATGATE_STATUS_PORT', min: 0, max: 65535, fallback: 18480 },
} satisfies Record<string, NumberSetting>;

type NumberSettingName = keyof typeof NUMBER_SETTINGS;

const NAV_PURGE_EVERY = 10;

export class ConfigManager {
  private storage: IStorage;
  private env: IEnvironment;
  private configDir: string;
  private configFile: string;
  private _config?: ChatGateConfig;
  private envLoaded = false;

  constructor(storage?: IStorage, env?: IEnvironment, configDir?: string) {
    this.storage = storage || new FileStorage();
    this.env = env || new SystemEnvironment();
    this.configDir = configDir || join(this.env.homedir(), '.chatgate');
    this.configFile = join(this.configDir, 'config.json');
  }

  get config(): ChatGateConfig {
    if (!this._config) {
      // Lazy load environment variables only once
      if (!this.envLoaded) {
        loadEnv();
        this.envLoaded = true;
      }

      const stored = this.loadStoredConfig();
      const number = (name: NumberSettingName) => this.resolveNumber(stored, NUMBER_SETTINGS[name]);
      const leaseStore = this.parseLeaseStoreCandidate(stored.leaseStore) || this.parseLeaseStoreCandidate(this.env.get('CHATGATE_LEASE_STORE')) || 'file';
      const defaultLeasePath = join(this.configDir, leaseStore === 'sqlite' ? 'lease.db' : 'lease.json');

      const heartbeatIntervalMs = number('heartbeatIntervalMs');
      const ttlCandidate = number('leaseTtlMs');

      // Merge: stored config > environment variables > defaults
      this._config = {
        discord: {
          token: (stored.token || this.env.get('DISCORD_BOT_TOKEN') || '').trim(),
        },
        gate: {
          statefulCooldownMs: number('statefulCooldownMs'),
          breakerDurationMs: number('breakerDurationMs'),
          maxTrackedKeys: number('maxTrackedKeys'),
          maxKeyAgeMs: number('maxKeyAgeMs'),
          navigationalPrefixes:
            this.parseListCandidate(stored.navigationalPrefixes) ||
            this.parseListCandidate(this.env.get('CHATGATE_NAV_PREFIXES')) ||
            [...DEFAULT_NAVIGATIONAL_PREFIXES],
          navigationalActions:
            this.parseListCandidate(stored.navigationalActions) ||
            this.parseListCandidate(this.env.get('CHATGATE_NAV_ACTIONS')) ||
            [...DEFAULT_NAVIGATIONAL_ACTIONS],
        },
        navigation: {
          maxHistory: number('navMaxHistory'),
          purgeThresholdMs: number('navPurgeThresholdMs'),
          purgeEvery: NAV_PURGE_EVERY,
          duplicateWindowMs: number('navDuplicateWindowMs'),
          menuRootPrefix: stored.menuRootPrefix?.trim() || 'menu_',
        },
        lease: {
          store: leaseStore,
          path: stored.leasePath || this.env.get('CHATGATE_LEASE_PATH') || defaultLeasePath,
          ttlMs: ttlCandidate >= heartbeatIntervalMs * 2 ? ttlCandidate : heartbeatIntervalMs * 3,
          heartbeatIntervalMs,
          startupTimeoutMs: number('startupTimeoutMs'),
          ioTimeoutMs: number('leaseIoTimeoutMs'),
        },
        statusPort: number('statusPort'),
      };
    }
    return this._config;
  }

  loadStoredConfig(): StoredConfig {
    if (!this.storage.exists(this.configFile)) {
      return {};
    }
    try {
      const data = this.storage.readFile(this.configFile, 'utf-8');
      const parsed: StoredConfig | null = JSON.parse(data);
      return parsed && typeof parsed === 'object' && !Array.isArray(parsed) ? parsed : {};
    } catch {
      return {};
    }
  }

  saveConfig(updates: Partial<StoredConfig>): void {
    if (!this.storage.exists(this.configDir)) {
      this.storage.mkdirp(this.configDir);
    }

    const normalizedUpdates: Partial<StoredConfig> = {
      ...updates,
      ...(updates.token !== undefined ? { token: updates.token.trim() } : {}),
    };

    const current = this.loadStoredConfig();
    const newConfig = { ...current, ...normalizedUpdates };
    this.storage.writeFile(this.configFile, JSON.stringify(newConfig, null, 2));
    this.storage.chmod(this.configFile, 0o600);

    // Invalidate cached config
    this._config = undefined;
  }

  getConfigValue<K extends keyof StoredConfig>(key: K): StoredConfig[K] {
    const stored = this.loadStoredConfig();
    return stored[key];
  }

  validateConfig(): void {
    this.validateRawInputs();

    if (!this.config.discord.token) {
      throw new Error(
        'Discord bot token not configured.\n' +
        'Run: chatgate config --token <your-token>\n' +
        'Or set DISCORD_BOT_TOKEN environment variable'
      );
    }
  }

  private resolveNumber(stored: StoredConfig, setting: NumberSetting): number {
    const storedCandidate = this.parseIntegerCandidate(stored[setting.stored], setting.min, setting.max);
    if (storedCandidate !== undefined) return storedCandidate;

    const envCandidate = this.parseIntegerCandidate(this.env.get(setting.env), setting.min, setting.max);
    if (envCandidate !== undefined) return envCandidate;

    return setting.fallback;
  }

  private parseIntegerCandidate(raw: unknown, min: number, max: number): number | undefined {
    if (raw === undefined || raw === null || raw === '') return undefined;

    if (typeof raw === 'number') {
      if (!Number.isInteger(raw)) return undefined;
      if (raw < min || raw > max) return undefined;
      return raw;
    }

    if (typeof raw === 'string') {
      const trimmed = raw.trim();
      if (!/^\d+$/.test(trimmed)) return undefined;
      const parsed = parseInt(trimmed, 10);
      if (parsed < min || parsed > max) return undefined;
      return parsed;
    }

    return undefined;
  }

  private parseLeaseStoreCandidate(raw: unknown): LeaseStoreKind | undefined {
    if (typeof raw !== 'string') return undefined;
    const normalized = raw.trim().toLowerCase();
    if (normalized === 'file' || normalized === 'sqlite') return normalized;
    return undefined;
  }

  /** Accepts a string array or a comma-separated string. */
  private parseListCandidate(raw: unknown): string[] | undefined {
    const items = Array.isArray(raw) ? raw : typeof raw === 'string' ? raw.split(',') : undefined;
    if (!items) return undefined;
    const list = items
      .filter((item): item is string => typeof item === 'string')
      .map((item) => item.trim())
      .filter((item) => item.length > 0);
    return list.length > 0 ? list : undefined;
  }

  private validateRawInputs(): void {
    const errors: string[] = [];
    const stored = this.loadStoredConfig();

    for (const setting of Object.values(NUMBER_SETTINGS)) {
      const rawStored = stored[setting.stored];
      if (rawStored !== undefined && this.parseIntegerCandidate(rawStored, setting.min, setting.max) === undefined) {
        errors.push(
          `Stored ${setting.stored} must be an integer between ${setting.min} and ${setting.max} (received: ${String(rawStored)})`,
        );
      }
      const rawEnv = this.env.get(setting.env);
      if (rawEnv !== undefined && this.parseIntegerCandidate(rawEnv, setting.min, setting.max) === undefined) {
        errors.push(`${setting.env} must be an integer between ${setting.min} and ${setting.max} (received: ${rawEnv})`);
      }
    }

    const rawStore = stored.leaseStore ?? this.env.get('CHATGATE_LEASE_STORE');
    if (rawStore !== undefined && this.parseLeaseStoreCandidate(rawStore) === undefined) {
      errors.push(`CHATGATE_LEASE_STORE must be "file" or "sqlite" (received: ${String(rawStore)})`);
    }

    const heartbeat = this.resolveNumber(stored, NUMBER_SETTINGS.heartbeatIntervalMs);
    const ttl = this.resolveNumber(stored, NUMBER_SETTINGS.leaseTtlMs);
    if (ttl < heartbeat * 2) {
      errors.push(`Lease TTL (${ttl}ms) must be at least twice the heartbeat interval (${heartbeat}ms)`);
    }

    if (errors.length > 0) {
      throw new Error(`Invalid configuration:\n- ${errors.join('\n- ')}`);
    }
  }

  getConfigPath(): string {
    return this.configFile;
  }

  resetConfig(): void {
    this._config = undefined;
    this.envLoaded = false;
  }
}

// Default instance shared by the CLI
export const defaultConfigManager = new ConfigManager();

export function saveConfig(updates: Partial<StoredConfig>): void {
  defaultConfigManager.saveConfig(updates);
}

export function validateConfig(): void {
  defaultConfigManager.validateConfig();
}

export function getConfigPath(): string {
  return defaultConfigManager.getConfigPath();
}

export function getConfig(): ChatGateConfig {
  return defaultConfigManager.config;
}
