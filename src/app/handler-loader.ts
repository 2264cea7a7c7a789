import { resolve } from 'path';
import { pathToFileURL } from 'url';
import type { AdmittedResult, InboundEvent, UpdateHandler } from '../types/index.js';
import type { DiscordRawEvent } from '../discord/event-source.js';

/** Passed to a handler module's `createHandler` export. */
export interface HandlerContext {
  getRawEvent(eventId: string): DiscordRawEvent | undefined;
}

/** Used when no handler module is given: admitted events are only logged. */
export function createLoggingHandler(): UpdateHandler {
  return async (event: InboundEvent, admission: AdmittedResult) => {
    const flags = [
      admission.navigational ? 'navigational' : 'stateful',
      admission.pattern !== 'none' ? `pattern=${admission.pattern}` : undefined,
      admission.rapidRepeat ? 'rapid-repeat' : undefined,
    ].filter((flag): flag is string => !!flag);
    console.log(`[handler] ${event.kind} "${event.payload.slice(0, 60)}" in chat ${event.chatId} (${flags.join(', ')})`);
  };
}

function isFunction(value: unknown): value is (...args: unknown[]) => unknown {
  return typeof value === 'function';
}

/**
 * Loads a handler module. It may export `createHandler(context)` returning the
 * handler, or a default export that is the handler itself.
 */
export async function loadHandler(modulePath: string, context: HandlerContext, cwd: string = process.cwd()): Promise<UpdateHandler> {
  const url = pathToFileURL(resolve(cwd, modulePath)).href;
  const mod: Record<string, unknown> = await import(url);

  const factory = mod.createHandler;
  if (isFunction(factory)) {
    const created = factory(context);
    if (!isFunction(created)) {
      throw new Error(`createHandler() in ${modulePath} did not return a function`);
    }
    return async (event, admission) => {
      await created(event, admission);
    };
  }

  const handler = mod.default;
  if (!isFunction(handler)) {
    throw new Error(`Handler module ${modulePath} must export a default function or createHandler()`);
  }
  return async (event, admission) => {
    await handler(event, admission);
  };
}
