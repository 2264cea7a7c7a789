/**
 * Tests for DiscordEventSource
 */

import type { Mock } from 'vitest';
import { DiscordEventSource } from '../../src/discord/event-source.js';

type Listener = (arg: unknown) => void;

interface MockClientShape {
  listeners: Map<string, Listener>;
  login: Mock;
  destroy: Mock;
}

const mockClientInstances: MockClientShape[] = [];

vi.mock('discord.js', () => {
  return {
    Client: class MockClient {
      listeners = new Map<string, Listener>();
      on = vi.fn((event: string, listener: Listener) => {
        this.listeners.set(event, listener);
        return this;
      });
      once = vi.fn((event: string, listener: Listener) => {
        this.listeners.set(event, listener);
        return this;
      });
      login = vi.fn().mockResolvedValue('test-token');
      destroy = vi.fn().mockResolvedValue(undefined);

      constructor() {
        mockClientInstances.push(this);
      }
    },
    Events: {
      ClientReady: 'ready',
      Error: 'error',
      MessageCreate: 'messageCreate',
      InteractionCreate: 'interactionCreate',
    },
    GatewayIntentBits: { Guilds: 1, GuildMessages: 2, MessageContent: 4 },
  };
});

function getMockClient(): MockClientShape {
  const client = mockClientInstances[mockClientInstances.length - 1];
  if (!client) throw new Error('no client created');
  return client;
}

function emit(event: string, arg: unknown): void {
  const listener = getMockClient().listeners.get(event);
  if (!listener) throw new Error(`no listener for ${event}`);
  listener(arg);
}

function fakeMessage(overrides: Record<string, unknown> = {}) {
  return {
    id: 'm1',
    channelId: '123',
    content: 'hello',
    createdTimestamp: 1000,
    author: { bot: false },
    ...overrides,
  };
}

function fakeButton(overrides: Record<string, unknown> = {}) {
  return {
    id: 'i1',
    channelId: '123',
    customId: 'menu_main',
    createdTimestamp: 2000,
    user: { bot: false },
    deferred: false,
    replied: false,
    isButton: () => true,
    deferUpdate: vi.fn().mockResolvedValue(undefined),
    ...overrides,
  };
}

describe('DiscordEventSource', () => {
  beforeEach(() => {
    mockClientInstances.length = 0;
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  describe('lifecycle', () => {
    it('logs in with the trimmed token', async () => {
      const source = new DiscordEventSource('  test-token  ');
      await source.start();

      expect(getMockClient().login).toHaveBeenCalledWith('test-token');
    });

    it('refuses to start without a token', async () => {
      const source = new DiscordEventSource('   ');

      await expect(source.start()).rejects.toThrow('Discord bot token not configured.');
      expect(getMockClient().login).not.toHaveBeenCalled();
    });

    it('stop destroys the client and wakes a pending fetch', async () => {
      const source = new DiscordEventSource('test-token');
      const pending = source.fetchBatch(60_000);

      await source.stop();

      await expect(pending).resolves.toEqual([]);
      expect(getMockClient().destroy).toHaveBeenCalledTimes(1);
    });
  });

  describe('inbound events', () => {
    it('turns user messages into message events', async () => {
      const source = new DiscordEventSource('test-token');
      emit('messageCreate', fakeMessage());

      expect(await source.fetchBatch(0)).toEqual([
        { chatId: '123', eventId: 'm1', kind: 'message', payload: 'hello', timestamp: 1000 },
      ]);
    });

    it('ignores messages from bots', async () => {
      const source = new DiscordEventSource('test-token');
      emit('messageCreate', fakeMessage({ author: { bot: true } }));

      expect(await source.fetchBatch(0)).toEqual([]);
    });

    it('turns button presses into callback events', async () => {
      const source = new DiscordEventSource('test-token');
      emit('interactionCreate', fakeButton());

      expect(await source.fetchBatch(0)).toEqual([
        { chatId: '123', eventId: 'i1', kind: 'callback', payload: 'menu_main', timestamp: 2000 },
      ]);
    });

    it('ignores other interactions and presses without a channel', async () => {
      const source = new DiscordEventSource('test-token');
      emit('interactionCreate', fakeButton({ isButton: () => false }));
      emit('interactionCreate', fakeButton({ channelId: null }));

      expect(await source.fetchBatch(0)).toEqual([]);
    });

    it('wakes a waiting fetch as soon as an event arrives', async () => {
      const source = new DiscordEventSource('test-token');
      const pending = source.fetchBatch(60_000);

      emit('messageCreate', fakeMessage());

      await expect(pending).resolves.toHaveLength(1);
    });

    it('returns an empty batch when nothing arrives in time', async () => {
      const source = new DiscordEventSource('test-token');
      expect(await source.fetchBatch(10)).toEqual([]);
    });

    it('drops the oldest events beyond the buffer limit', async () => {
      const source = new DiscordEventSource('test-token', { maxBuffered: 2 });
      emit('messageCreate', fakeMessage({ id: 'm1' }));
      emit('messageCreate', fakeMessage({ id: 'm2' }));
      emit('messageCreate', fakeMessage({ id: 'm3' }));

      const batch = await source.fetchBatch(0);
      expect(batch.map((event) => event.eventId)).toEqual(['m2', 'm3']);
      expect(source.getDroppedCount()).toBe(1);
    });
  });

  describe('raw events and acknowledgement', () => {
    it('keeps the platform object for handlers', () => {
      const source = new DiscordEventSource('test-token');
      const message = fakeMessage();
      emit('messageCreate', message);

      expect(source.getRawEvent('m1')).toEqual({ kind: 'message', message });
      expect(source.getRawEvent('unknown')).toBeUndefined();
    });

    it('forgets the oldest raw objects beyond the limit', () => {
      const source = new DiscordEventSource('test-token', { maxRawEvents: 1 });
      emit('messageCreate', fakeMessage({ id: 'm1' }));
      emit('messageCreate', fakeMessage({ id: 'm2' }));

      expect(source.getRawEvent('m1')).toBeUndefined();
      expect(source.getRawEvent('m2')).toBeDefined();
    });

    it('defers a suppressed button press', async () => {
      const source = new DiscordEventSource('test-token');
      const button = fakeButton();
      emit('interactionCreate', button);
      const [inbound] = await source.fetchBatch(0);

      await source.acknowledge(inbound, { admitted: false, reason: 'breaker' });

      expect(button.deferUpdate).toHaveBeenCalledTimes(1);
    });

    it('leaves an already answered button press alone', async () => {
      const source = new DiscordEventSource('test-token');
      const button = fakeButton({ replied: true });
      emit('interactionCreate', button);
      const [inbound] = await source.fetchBatch(0);

      await source.acknowledge(inbound, { admitted: false, reason: 'breaker' });

      expect(button.deferUpdate).not.toHaveBeenCalled();
    });

    it('does nothing for messages', async () => {
      const source = new DiscordEventSource('test-token');
      emit('messageCreate', fakeMessage());
      const [inbound] = await source.fetchBatch(0);

      await expect(source.acknowledge(inbound, { admitted: false, reason: 'duplicate-event' })).resolves.toBeUndefined();
    });
  });
});
