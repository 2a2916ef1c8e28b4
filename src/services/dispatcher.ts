// src/services/dispatcher.ts
import { log, LogLevel } from '../logging';
import { KIND_ORDER } from '../resources/resourceKinds';
import type { ResourceKindName, SubscriptionKey } from '../types';
import { subscriptionId } from '../types';
import type { ActivationResult, ContextRegistry } from './contextRegistry';
import type { ResourceStore } from './store/resourceStore';
import type { WatcherPool } from './watcherPool';

export interface DispatcherOptions {
  /** How long a subscription outlives the focus leaving its tab */
  graceMs: number;
  /** Neighbouring tabs kept subscribed on each side of the focused one */
  prefetch: number;
  /** Extra cleanup after a context has been torn down */
  releaseContext?: (contextId: string) => void;
}

export interface FocusChange {
  /** Subscriptions started by this change */
  start: SubscriptionKey[];
  /** Subscriptions stopped right away */
  stop: SubscriptionKey[];
  /** Subscriptions left to expire after the grace period */
  linger: SubscriptionKey[];
}

const DEFAULT_OPTIONS: DispatcherOptions = {
  graceMs: 30_000,
  prefetch: 1
};

/**
 * Turns focus changes from the view into subscription starts and stops.
 */
export class Dispatcher {
  private desired: Map<string, SubscriptionKey> = new Map();
  private lingering: Map<string, { key: SubscriptionKey; timer: NodeJS.Timeout }> = new Map();
  private focusedContext: string | undefined;
  /** Contexts whose subscriptions are being stopped by a switch */
  private tearingDown: Set<string> = new Set();
  private readonly options: DispatcherOptions;

  constructor(
    private readonly pool: WatcherPool,
    private readonly store: ResourceStore,
    private readonly registry: ContextRegistry,
    options: Partial<DispatcherOptions> = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /**
   * Tabs that should be subscribed when `kind` has focus.
   */
  public desiredKinds(context: string, kind: ResourceKindName): ResourceKindName[] {
    const discovered = this.registry.getKinds(context);
    const tabs: readonly ResourceKindName[] = discovered.length > 0 ? discovered : KIND_ORDER;
    const index = tabs.indexOf(kind);
    if (index < 0) {
      return [kind];
    }
    const from = Math.max(0, index - this.options.prefetch);
    const to = Math.min(tabs.length - 1, index + this.options.prefetch);
    return tabs.slice(from, to + 1);
  }

  public onFocusChange(context: string, kind: ResourceKindName): FocusChange {
    const change: FocusChange = { start: [], stop: [], linger: [] };
    if (this.tearingDown.has(context)) {
      log(`Ignoring focus on ${context}/${kind}: context is being torn down`, LogLevel.DEBUG);
      return change;
    }

    if (this.focusedContext !== undefined && this.focusedContext !== context) {
      change.stop.push(...this.dropContext(this.focusedContext));
    }
    this.focusedContext = context;

    const next = new Map<string, SubscriptionKey>();
    for (const k of this.desiredKinds(context, kind)) {
      const key = { context, kind: k };
      next.set(subscriptionId(key), key);
    }

    for (const [id, key] of next) {
      const linger = this.lingering.get(id);
      if (linger) {
        clearTimeout(linger.timer);
        this.lingering.delete(id);
      }
      const live = this.pool.get(key.context, key.kind);
      if (!live || live.state === 'stopped') {
        this.pool.start(key.context, key.kind);
        change.start.push(key);
      }
    }

    for (const [id, key] of this.desired) {
      if (next.has(id)) {
        continue;
      }
      if (this.options.graceMs <= 0) {
        this.stopNow(key);
        change.stop.push(key);
        continue;
      }
      const timer = setTimeout(() => {
        this.lingering.delete(id);
        this.stopNow(key);
      }, this.options.graceMs);
      this.lingering.set(id, { key, timer });
      change.linger.push(key);
    }

    this.desired = next;
    return change;
  }

  /**
   * Activate another context. On success every subscription of the previous
   * one has been stopped and its cache cleared before this resolves.
   */
  public async switchContext(contextId: string): Promise<ActivationResult> {
    const result = await this.registry.activate(contextId, previous => this.teardown(previous));
    if (result.status !== 'success') {
      log(`Switching to context ${contextId} failed: ${result.status}`, LogLevel.WARN);
    }
    return result;
  }

  private async teardown(contextId: string): Promise<void> {
    this.tearingDown.add(contextId);
    try {
      this.dropContext(contextId);
      if (this.focusedContext === contextId) {
        this.focusedContext = undefined;
      }
      await this.pool.stopContext(contextId);
      this.store.clearContext(contextId);
      this.options.releaseContext?.(contextId);
    } finally {
      this.tearingDown.delete(contextId);
    }
    log(`Tore down context ${contextId}`, LogLevel.INFO);
  }

  /**
   * Forget and stop every desired or lingering subscription of a context.
   */
  private dropContext(contextId: string): SubscriptionKey[] {
    const stopped: SubscriptionKey[] = [];
    for (const [id, entry] of Array.from(this.lingering)) {
      if (entry.key.context === contextId) {
        clearTimeout(entry.timer);
        this.lingering.delete(id);
        this.stopNow(entry.key);
        stopped.push(entry.key);
      }
    }
    for (const [id, key] of Array.from(this.desired)) {
      if (key.context === contextId) {
        this.desired.delete(id);
        this.stopNow(key);
        stopped.push(key);
      }
    }
    return stopped;
  }

  private stopNow(key: SubscriptionKey): void {
    this.pool.stop(key.context, key.kind).catch(err => {
      log(`Failed to stop subscription ${subscriptionId(key)}: ${err}`, LogLevel.ERROR);
    });
  }

  public dispose(): void {
    for (const { timer } of this.lingering.values()) {
      clearTimeout(timer);
    }
    this.lingering.clear();
    this.desired.clear();
  }
}
