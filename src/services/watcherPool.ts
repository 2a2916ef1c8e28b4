// src/services/watcherPool.ts
import type { ResourceApi, WatchEvent, WatchStream } from '../clients/kubernetesClient';
import { AuthError, MalformedObjectError, toDashboardError } from '../errors';
import { log, logThrottled, LogLevel } from '../logging';
import { normalizeObject } from '../resources/resourceKinds';
import type { ChangeRecord, ResourceKindName, ResourceObject, SubscriptionInfo, SubscriptionKey } from '../types';
import { subscriptionId } from '../types';
import { getString, isRecord } from '../utils/attributes';
import { DEFAULT_BACKOFF, computeBackoff, delay, isAbortError } from '../utils/backoff';
import type { BackoffOptions } from '../utils/backoff';
import { Emitter } from '../utils/emitter';
import type { ResourceStore } from './store/resourceStore';

export interface WatcherPoolOptions {
  /** Re-list interval for kinds the API server will not watch */
  pollIntervalMs: number;
  backoff: BackoffOptions;
  /** Records applied before yielding to the event loop */
  batchSize: number;
  /** Restrict every subscription to one namespace */
  namespace?: string;
  onAuthFailure?: (context: string, error: AuthError) => void;
}

const DEFAULT_OPTIONS: WatcherPoolOptions = {
  pollIntervalMs: 5000,
  backoff: DEFAULT_BACKOFF,
  batchSize: 500
};

interface Worker {
  info: SubscriptionInfo;
  controller: AbortController;
  done: Promise<void>;
  stream?: WatchStream;
}

function yieldToEventLoop(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}

function toRecord(context: string, kind: ResourceKindName, type: WatchEvent['type'], obj: ResourceObject): ChangeRecord {
  if (type === 'DELETED') {
    return { type: 'Deleted', context, kind, key: obj.key, revision: obj.revision, updatedAt: obj.updatedAt };
  }
  return { type: type === 'ADDED' ? 'Added' : 'Modified', context, kind, key: obj.key, revision: obj.revision, object: obj };
}

/**
 * One worker per (context, kind) subscription. Each worker lists the kind,
 * replaces its cache contents, then applies watch events until cancelled,
 * falling back to periodic lists for kinds that cannot be watched.
 */
export class WatcherPool {
  private _onDidChangeSubscription = new Emitter<SubscriptionInfo>();
  readonly onDidChangeSubscription = this._onDidChangeSubscription.event;

  private workers: Map<string, Worker> = new Map();
  private stopping: Map<string, { context: string; done: Promise<void> }> = new Map();
  private readonly options: WatcherPoolOptions;

  constructor(
    private readonly api: ResourceApi,
    private readonly store: ResourceStore,
    options: Partial<WatcherPoolOptions> = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /**
   * Start a subscription, or return the live one for the same pair.
   */
  public start(context: string, kind: ResourceKindName): SubscriptionInfo {
    const id = subscriptionId({ context, kind });
    const existing = this.workers.get(id);
    if (existing && existing.info.state !== 'stopped') {
      return { ...existing.info };
    }

    const worker: Worker = {
      info: { context, kind, state: 'active', mode: 'watch', attempts: 0, listCount: 0 },
      controller: new AbortController(),
      done: Promise.resolve()
    };
    this.workers.set(id, worker);
    worker.done = this.run(worker).catch(err => {
      log(`Subscription ${id} failed: ${err}`, LogLevel.ERROR);
      this.update(worker, { state: 'stopped', lastError: `${err}` });
    });
    log(`Started subscription ${id}`, LogLevel.DEBUG);
    return { ...worker.info };
  }

  /**
   * Cancel a subscription and wait until its worker has acknowledged.
   * No change record for the pair is applied after this resolves.
   */
  public stop(context: string, kind: ResourceKindName): Promise<void> {
    const id = subscriptionId({ context, kind });
    const worker = this.workers.get(id);
    if (!worker) {
      return this.stopping.get(id)?.done ?? Promise.resolve();
    }
    this.workers.delete(id);
    worker.controller.abort();
    worker.stream?.cancel();
    const done = worker.done.then(() => {
      if (this.stopping.get(id)?.done === done) {
        this.stopping.delete(id);
      }
      this.update(worker, { state: 'stopped' });
      log(`Stopped subscription ${id}`, LogLevel.DEBUG);
    });
    this.stopping.set(id, { context, done });
    return done;
  }

  /**
   * Stop every subscription of a context, including ones already being stopped.
   */
  public async stopContext(context: string): Promise<void> {
    const kinds = Array.from(this.workers.values())
      .filter(worker => worker.info.context === context)
      .map(worker => worker.info.kind);
    const inProgress = Array.from(this.stopping.values())
      .filter(entry => entry.context === context)
      .map(entry => entry.done);
    await Promise.all([...kinds.map(kind => this.stop(context, kind)), ...inProgress]);
  }

  public get(context: string, kind: ResourceKindName): SubscriptionInfo | undefined {
    const worker = this.workers.get(subscriptionId({ context, kind }));
    return worker ? { ...worker.info } : undefined;
  }

  public list(): SubscriptionInfo[] {
    return Array.from(this.workers.values()).map(worker => ({ ...worker.info }));
  }

  /** Subscriptions whose worker is still running */
  public activeKeys(): SubscriptionKey[] {
    return Array.from(this.workers.values())
      .filter(worker => worker.info.state !== 'stopped')
      .map(worker => ({ context: worker.info.context, kind: worker.info.kind }));
  }

  public async dispose(): Promise<void> {
    const keys = Array.from(this.workers.values()).map(worker => worker.info);
    await Promise.all([
      ...keys.map(info => this.stop(info.context, info.kind)),
      ...Array.from(this.stopping.values()).map(entry => entry.done)
    ]);
    this._onDidChangeSubscription.dispose();
  }

  private update(worker: Worker, changes: Partial<SubscriptionInfo>): void {
    Object.assign(worker.info, changes);
    this._onDidChangeSubscription.fire({ ...worker.info });
  }

  private async run(worker: Worker): Promise<void> {
    const { signal } = worker.controller;
    const id = subscriptionId(worker.info);

    while (!signal.aborted) {
      try {
        const revision = await this.relist(worker);
        if (signal.aborted) {
          break;
        }
        if (worker.info.mode === 'poll') {
          if (!(await this.pause(this.options.pollIntervalMs, signal))) {
            break;
          }
          continue;
        }
        await this.consume(worker, revision);
        if (signal.aborted) {
          break;
        }
        this.update(worker, { state: 'retrying', attempts: worker.info.attempts + 1, lastError: 'watch stream closed' });
      } catch (err) {
        if (isAbortError(err, signal)) {
          break;
        }
        const error = toDashboardError(err);
        switch (error.kind) {
          case 'gone':
            log(`Subscription ${id}: ${error.message}; relisting`, LogLevel.INFO);
            this.update(worker, { state: 'retrying', lastError: error.message });
            continue;
          case 'auth':
            log(`Subscription ${id} stopped: ${error.message}`, LogLevel.ERROR);
            this.update(worker, { state: 'stopped', lastError: error.message });
            if (error instanceof AuthError) {
              this.options.onAuthFailure?.(worker.info.context, error);
            }
            return;
          case 'watchUnsupported':
            log(`Subscription ${id}: watch not supported, polling every ${this.options.pollIntervalMs}ms`, LogLevel.WARN);
            this.update(worker, { mode: 'poll' });
            continue;
          default:
            log(`Subscription ${id}: ${error.message}`, LogLevel.WARN);
            this.update(worker, { state: 'retrying', attempts: worker.info.attempts + 1, lastError: error.message });
        }
      }

      const wait = computeBackoff(Math.max(0, worker.info.attempts - 1), this.options.backoff);
      if (!(await this.pause(wait, signal))) {
        break;
      }
    }
  }

  /**
   * Resolves false when the subscription was cancelled while waiting.
   */
  private async pause(ms: number, signal: AbortSignal): Promise<boolean> {
    try {
      await delay(ms, signal);
      return true;
    } catch (err) {
      if (isAbortError(err, signal)) {
        return false;
      }
      throw err;
    }
  }

  /**
   * Fetch ground truth for the kind and replace the cache contents with it.
   */
  private async relist(worker: Worker): Promise<string> {
    const { context, kind } = worker.info;
    const { signal } = worker.controller;
    const result = await this.api.list(context, kind, { namespace: this.options.namespace, signal });

    const now = Date.now();
    const objects: ResourceObject[] = [];
    for (let i = 0; i < result.items.length; i++) {
      try {
        objects.push(normalizeObject(kind, result.items[i], now));
      } catch (err) {
        log(`Skipping malformed ${kind} in ${context}: ${err}`, LogLevel.WARN);
      }
      if ((i + 1) % this.options.batchSize === 0) {
        await yieldToEventLoop();
      }
    }
    if (signal.aborted) {
      return result.revision;
    }
    this.store.replaceKind(context, kind, objects, result.revision);
    this.update(worker, {
      state: 'active',
      revision: result.revision,
      attempts: 0,
      listCount: worker.info.listCount + 1,
      lastError: undefined
    });
    return result.revision;
  }

  /**
   * Apply watch events until the stream ends or the subscription is cancelled.
   */
  private async consume(worker: Worker, revision: string): Promise<void> {
    const { context, kind } = worker.info;
    const { signal } = worker.controller;
    const origin = subscriptionId(worker.info);
    const stream = this.api.watch(context, kind, revision, { namespace: this.options.namespace, signal });
    worker.stream = stream;
    let pending = 0;
    try {
      for await (const event of stream) {
        if (signal.aborted) {
          return;
        }
        if (event.type === 'BOOKMARK') {
          const bookmark = isRecord(event.object) ? getString(event.object, 'metadata', 'resourceVersion') : undefined;
          if (bookmark) {
            worker.info.revision = bookmark;
          }
          continue;
        }

        let obj: ResourceObject;
        try {
          obj = normalizeObject(kind, event.object);
        } catch (err) {
          if (err instanceof MalformedObjectError) {
            logThrottled(origin, `Skipping malformed ${event.type} event for ${origin}: ${err.message}`, LogLevel.WARN);
            continue;
          }
          throw err;
        }
        const result = this.store.apply(toRecord(context, kind, event.type, obj));
        logThrottled(origin, `${origin}: ${event.type} ${obj.key}@${obj.revision} ${result}`);
        if (obj.revision) {
          worker.info.revision = obj.revision;
        }

        pending += 1;
        if (pending >= this.options.batchSize) {
          pending = 0;
          await yieldToEventLoop();
        }
      }
    } finally {
      worker.stream = undefined;
      stream.cancel();
    }
  }
}
