/**
 * chatgate: admission control and navigation tracking for chat bots
 */

import { getConfig, validateConfig } from './config/index.js';
import { DiscordEventSource } from './discord/event-source.js';
import { BotRuntime, installSignalHandlers } from './app/bot-runtime.js';
import { createLoggingHandler, loadHandler } from './app/handler-loader.js';

export * from './types/index.js';
export { AdmissionGate, normalizeChatId, normalizeEventId } from './gate/admission-gate.js';
export type { AdmissionGateDeps, AdmissionInput } from './gate/admission-gate.js';
export { EventKeyStore } from './gate/event-key-store.js';
export { ChatCircuitBreaker } from './gate/chat-circuit-breaker.js';
export { ReleaseScheduler } from './gate/release-scheduler.js';
export { contentHash, fingerprint, eventIdKey } from './gate/fingerprint.js';
export {
  createActionClassifier,
  DEFAULT_NAVIGATIONAL_ACTIONS,
  DEFAULT_NAVIGATIONAL_PREFIXES,
  type ActionPredicate,
} from './gate/classifier.js';
export { NavigationTracker } from './navigation/navigation-tracker.js';
export * from './instance/index.js';
export { UpdatePoller } from './bridge/update-poller.js';
export { StatusServer } from './bridge/status-server.js';
export { DiscordEventSource } from './discord/event-source.js';
export { BotRuntime, createOwnerId, installSignalHandlers } from './app/bot-runtime.js';
export { loadHandler, createLoggingHandler, type HandlerContext } from './app/handler-loader.js';
export { ConfigManager } from './config/index.js';

export interface MainOptions {
  handlerPath?: string;
  ownerId?: string;
}

/**
 * Runs the bot until it is stopped. Resolves with the process exit code:
 * 0 for a clean stop or when another instance already holds the lease.
 */
export async function main(options: MainOptions = {}): Promise<number> {
  validateConfig();
  const config = getConfig();

  const source = new DiscordEventSource(config.discord.token);
  const handler = options.handlerPath
    ? await loadHandler(options.handlerPath, { getRawEvent: (eventId) => source.getRawEvent(eventId) })
    : createLoggingHandler();

  const runtime = new BotRuntime({ config, source, handler, ownerId: options.ownerId });
  const removeSignalHandlers = installSignalHandlers(runtime);
  try {
    const result = await runtime.start();
    if (result.status === 'not-leader') {
      return 0;
    }
    console.log(`[runtime] ${result.ownerId} is polling`);
    await runtime.waitUntilStopped();
    return 0;
  } finally {
    removeSignalHandlers();
  }
}
