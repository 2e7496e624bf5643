/**
 * ContextStack Event Bus
 *
 * In-process pub/sub. Local-first, single session.
 *
 * ctxbudget publishes: ledger.unit_registered, ledger.unit_deregistered,
 *   threshold.changed, compaction.planned, compaction.executed, compaction.insufficient
 */

import type { EventChannel, BusEvent, EventHandler } from '../types/index.js';

type WildcardChannel = EventChannel | `${string}.*` | '*';

interface Subscription {
  id: string;
  channel: WildcardChannel;
  handler: EventHandler;
  once: boolean;
}

export class EventBus {
  private subscriptions: Map<string, Subscription> = new Map();
  private channelIndex: Map<WildcardChannel, Set<string>> = new Map();
  private history: BusEvent[] = [];
  private maxHistory: number;
  private subCounter = 0;

  constructor(opts?: { maxHistory?: number }) {
    this.maxHistory = opts?.maxHistory ?? 1000;
  }

  /**
   * Subscribe to a channel. Returns unsubscribe function.
   */
  on<T = unknown>(channel: WildcardChannel, handler: EventHandler<T>): () => void {
    return this.subscribe(channel, handler, false);
  }

  /**
   * Subscribe to a channel for exactly one event.
   */
  once<T = unknown>(channel: WildcardChannel, handler: EventHandler<T>): () => void {
    return this.subscribe(channel, handler, true);
  }

  /**
   * Publish an event. Exact, prefix ('compaction.*') and wildcard ('*')
   * subscribers are notified in subscription order.
   */
  async emit<T = unknown>(event: BusEvent<T>): Promise<void> {
    this.history.push(event);
    if (this.history.length > this.maxHistory) {
      this.history.shift();
    }

    const matchingIds = new Set<string>();

    const channelSubs = this.channelIndex.get(event.channel);
    if (channelSubs) {
      for (const id of channelSubs) matchingIds.add(id);
    }

    const wildcardSubs = this.channelIndex.get('*');
    if (wildcardSubs) {
      for (const id of wildcardSubs) matchingIds.add(id);
    }

    for (const [channel, subIds] of this.channelIndex) {
      if (channel !== '*' && channel.endsWith('.*')) {
        const prefix = channel.slice(0, -1);
        if (event.channel.startsWith(prefix)) {
          for (const id of subIds) matchingIds.add(id);
        }
      }
    }

    const toRemove: string[] = [];
    for (const id of matchingIds) {
      const sub = this.subscriptions.get(id);
      if (!sub) continue;

      try {
        await sub.handler(event);
      } catch (err) {
        console.error(`[EventBus] Handler error on ${event.channel}:`, err);
      }

      if (sub.once) {
        toRemove.push(id);
      }
    }

    for (const id of toRemove) {
      this.unsubscribe(id);
    }
  }

  /**
   * Get recent event history, optionally filtered by channel.
   */
  getHistory(channel?: EventChannel, limit = 100): BusEvent[] {
    const events = channel
      ? this.history.filter(e => e.channel === channel)
      : this.history;
    return events.slice(-limit);
  }

  /**
   * Get count of active subscriptions per channel.
   */
  getStats(): Record<string, number> {
    const stats: Record<string, number> = {};
    for (const [channel, ids] of this.channelIndex) {
      stats[channel] = ids.size;
    }
    return stats;
  }

  private subscribe<T>(channel: WildcardChannel, handler: EventHandler<T>, once: boolean): () => void {
    const id = `sub_${++this.subCounter}`;
    // Payload type is the subscriber's contract with the publisher.
    const sub: Subscription = { id, channel, handler: handler as EventHandler, once };

    this.subscriptions.set(id, sub);

    let ids = this.channelIndex.get(channel);
    if (!ids) {
      ids = new Set();
      this.channelIndex.set(channel, ids);
    }
    ids.add(id);

    return () => this.unsubscribe(id);
  }

  private unsubscribe(id: string): void {
    const sub = this.subscriptions.get(id);
    if (!sub) return;

    this.subscriptions.delete(id);
    const channelSubs = this.channelIndex.get(sub.channel);
    if (channelSubs) {
      channelSubs.delete(id);
      if (channelSubs.size === 0) {
        this.channelIndex.delete(sub.channel);
      }
    }
  }
}

/**
 * Helper to create a typed event with defaults.
 */
export function createEvent<T>(
  channel: EventChannel,
  sourceProduct: BusEvent['sourceProduct'],
  payload: T,
  opts?: { sessionId?: string }
): BusEvent<T> {
  return {
    channel,
    timestamp: new Date().toISOString(),
    sourceProduct,
    sessionId: opts?.sessionId ?? null,
    payload,
  };
}
