/**
 * Discord gateway adapter for the update poller
 */

import { Client, Events, GatewayIntentBits, type ButtonInteraction, type Message } from 'discord.js';
import type { AdmissionResult, EventSource, InboundEvent } from '../types/index.js';

export type DiscordRawEvent = { kind: 'message'; message: Message } | { kind: 'callback'; interaction: ButtonInteraction };

export interface DiscordEventSourceOptions {
  /** Events kept while the poller is busy; the oldest are dropped beyond this. */
  maxBuffered?: number;
  /** Raw platform objects kept so handlers can reply to admitted events. */
  maxRawEvents?: number;
}

/**
 * The gateway pushes events; the poller pulls them. Incoming messages and
 * button presses are buffered here and handed out in batches by `fetchBatch`.
 */
export class DiscordEventSource implements EventSource {
  private client: Client;
  private token: string;
  private buffer: InboundEvent[] = [];
  private rawByEventId: Map<string, DiscordRawEvent> = new Map();
  private waiter?: () => void;
  private readonly maxBuffered: number;
  private readonly maxRawEvents: number;
  private dropped = 0;

  constructor(token: string, options: DiscordEventSourceOptions = {}) {
    this.token = token.trim();
    this.maxBuffered = options.maxBuffered ?? 1000;
    this.maxRawEvents = options.maxRawEvents ?? 2000;
    this.client = new Client({
      intents: [GatewayIntentBits.Guilds, GatewayIntentBits.GuildMessages, GatewayIntentBits.MessageContent],
    });
    this.setupEventHandlers();
  }

  private setupEventHandlers(): void {
    this.client.once(Events.ClientReady, (readyClient) => {
      console.log(`Discord bot logged in as ${readyClient.user.tag}`);
    });

    this.client.on(Events.Error, (error) => {
      console.error('Discord client error:', error);
    });

    this.client.on(Events.MessageCreate, (message) => {
      if (message.author.bot) return;
      this.push(
        {
          chatId: message.channelId,
          eventId: message.id,
          kind: 'message',
          payload: message.content,
          timestamp: message.createdTimestamp,
        },
        { kind: 'message', message },
      );
    });

    this.client.on(Events.InteractionCreate, (interaction) => {
      if (!interaction.isButton()) return;
      if (interaction.user.bot || !interaction.channelId) return;
      this.push(
        {
          chatId: interaction.channelId,
          eventId: interaction.id,
          kind: 'callback',
          payload: interaction.customId,
          timestamp: interaction.createdTimestamp,
        },
        { kind: 'callback', interaction },
      );
    });
  }

  async start(): Promise<void> {
    if (!this.token) {
      throw new Error('Discord bot token not configured.\nRun: chatgate config --token <your-token>');
    }
    await this.client.login(this.token);
  }

  async stop(): Promise<void> {
    this.wake();
    await this.client.destroy();
  }

  async fetchBatch(maxWaitMs: number): Promise<InboundEvent[]> {
    if (this.buffer.length === 0 && maxWaitMs > 0) {
      await new Promise<void>((resolve) => {
        const timer = setTimeout(() => this.wake(), maxWaitMs);
        timer.unref?.();
        this.waiter = () => {
          clearTimeout(timer);
          resolve();
        };
      });
    }
    return this.buffer.splice(0, this.buffer.length);
  }

  /**
   * A suppressed button press still has to be acknowledged, otherwise Discord
   * shows "This interaction failed" to the user.
   */
  async acknowledge(event: InboundEvent, _result: AdmissionResult): Promise<void> {
    const raw = this.rawByEventId.get(event.eventId);
    if (!raw || raw.kind !== 'callback') return;
    const { interaction } = raw;
    if (interaction.deferred || interaction.replied) return;
    await interaction.deferUpdate();
  }

  /** The platform object behind an event, for handlers that reply. */
  getRawEvent(eventId: string): DiscordRawEvent | undefined {
    return this.rawByEventId.get(eventId);
  }

  getDroppedCount(): number {
    return this.dropped;
  }

  private push(event: InboundEvent, raw: DiscordRawEvent): void {
    this.buffer.push(event);
    if (this.buffer.length > this.maxBuffered) {
      const overflow = this.buffer.length - this.maxBuffered;
      this.buffer.splice(0, overflow);
      this.dropped += overflow;
      console.warn(`[discord] update buffer full, dropped ${overflow} oldest event(s)`);
    }
    this.rawByEventId.set(event.eventId, raw);
    this.pruneOldest(this.rawByEventId, this.maxRawEvents);
    this.wake();
  }

  private pruneOldest<K, V>(map: Map<K, V>, maxSize: number): void {
    while (map.size > maxSize) {
      const oldest = map.keys().next();
      if (oldest.done) return;
      map.delete(oldest.value);
    }
  }

  private wake(): void {
    const waiter = this.waiter;
    this.waiter = undefined;
    waiter?.();
  }
}
