/**
 * Per-chat navigation history.
 *
 * Each chat keeps at most `maxHistory` steps, newest last. Steps carry the
 * chat's current session id and a step index that restarts with every session.
 * Steps older than `purgeThresholdMs` are swept across all chats on every
 * `purgeEvery`-th insert rather than on each one.
 */

import { randomUUID } from 'crypto';
import type { NavigationConfig, NavigationPattern, NavigationStep } from '../types/index.js';

interface ChatNavigation {
  sessionId: string;
  nextStepIndex: number;
  steps: NavigationStep[];
}

export interface NavigationTrackerStats {
  chats: number;
  steps: number;
}

const PATTERN_WINDOW = 5;
const DUPLICATE_LOOKBACK = 3;

export class NavigationTracker {
  private chats: Map<string, ChatNavigation> = new Map();
  private insertCount = 0;
  private readonly now: () => number;

  constructor(
    private readonly config: NavigationConfig,
    now: () => number = Date.now,
  ) {
    this.now = now;
  }

  record(chatId: string, action: string, context?: string): NavigationStep {
    const chat = this.ensureChat(chatId);
    const step: NavigationStep = {
      chatId,
      sessionId: chat.sessionId,
      action,
      timestamp: this.now(),
      stepIndex: chat.nextStepIndex,
      ...(context ? { context } : {}),
    };
    chat.nextStepIndex += 1;
    chat.steps.push(step);
    if (chat.steps.length > this.config.maxHistory) {
      chat.steps.splice(0, chat.steps.length - this.config.maxHistory);
    }

    this.insertCount += 1;
    if (this.config.purgeEvery > 0 && this.insertCount % this.config.purgeEvery === 0) {
      this.purgeOlderThan(this.now() - this.config.purgeThresholdMs);
    }
    return step;
  }

  /** Most recent first. The returned array is a copy. */
  history(chatId: string, n: number = PATTERN_WINDOW): NavigationStep[] {
    const chat = this.chats.get(chatId);
    if (!chat || n <= 0) return [];
    return chat.steps
      .slice(-Math.trunc(n))
      .reverse()
      .map((step) => ({ ...step }));
  }

  detectPattern(chatId: string): NavigationPattern {
    const actions = this.history(chatId, PATTERN_WINDOW).map((step) => step.action);
    if (actions.length < 3) return 'none';

    const [latest, previous, third] = actions;
    if (latest === third && latest !== previous) return 'back_forth';

    if (actions.length >= 4 && latest === actions[3] && new Set(actions.slice(0, 4)).size >= 3) {
      return 'circular';
    }

    const menuSteps = actions.slice(0, 3).filter((action) => action.startsWith(this.config.menuRootPrefix)).length;
    if (menuSteps >= 2) return 'menu_switching';

    return 'none';
  }

  isDuplicate(chatId: string, action: string): boolean {
    const now = this.now();
    return this.history(chatId, DUPLICATE_LOOKBACK).some(
      (step) => step.action === action && now - step.timestamp < this.config.duplicateWindowMs,
    );
  }

  /** Starts a new session without dropping history. */
  resetSession(chatId: string): string {
    const chat = this.ensureChat(chatId);
    chat.sessionId = this.createSessionId(chatId);
    chat.nextStepIndex = 1;
    console.log(`[navigation] session reset for chat ${chatId}`);
    return chat.sessionId;
  }

  sessionId(chatId: string): string | undefined {
    return this.chats.get(chatId)?.sessionId;
  }

  stats(): NavigationTrackerStats {
    let steps = 0;
    for (const chat of this.chats.values()) {
      steps += chat.steps.length;
    }
    return { chats: this.chats.size, steps };
  }

  clear(): void {
    this.chats.clear();
    this.insertCount = 0;
  }

  private ensureChat(chatId: string): ChatNavigation {
    let chat = this.chats.get(chatId);
    if (!chat) {
      chat = { sessionId: this.createSessionId(chatId), nextStepIndex: 1, steps: [] };
      this.chats.set(chatId, chat);
    }
    return chat;
  }

  private createSessionId(chatId: string): string {
    return `session-${chatId}-${randomUUID().slice(0, 8)}`;
  }

  private purgeOlderThan(cutoff: number): void {
    let removed = 0;
    for (const [chatId, chat] of this.chats) {
      const before = chat.steps.length;
      chat.steps = chat.steps.filter((step) => step.timestamp >= cutoff);
      removed += before - chat.steps.length;
      if (chat.steps.length === 0) {
        this.chats.delete(chatId);
      }
    }
    if (removed > 0) {
      console.log(`[navigation] purged ${removed} stale step(s)`);
    }
  }
}
