// src/ui/renderLoop.ts
import { ActionError, describeError } from '../errors';
import { log, LogLevel } from '../logging';
import type { ActionExecutor } from '../services/actionExecutor';
import type { ContextRegistry } from '../services/contextRegistry';
import type { Dispatcher } from '../services/dispatcher';
import type { ResourceStore } from '../services/store/resourceStore';
import type { WatcherPool } from '../services/watcherPool';
import type { ResourceObject, StatusTone, SubscriptionInfo } from '../types';
import { Emitter } from '../utils/emitter';
import type { Disposable, Event } from '../utils/emitter';
import { resourceToYaml } from '../utils/yamlUtils';
import { renderFrame } from './frame';
import type { DetailView, Frame } from './frame';
import { handleInput } from './keymap';
import type { Effect, InputEvent } from './keymap';
import type { AppState } from './viewState';
import { activeKind, bodyHeight, clampSelection, filterRows, initialViewState, withStatus } from './viewState';

export interface FrameSink {
  draw(frame: Frame): void;
}

export interface InputSource {
  /** Events received since the last call */
  drain(): InputEvent[];
  readonly onDidReceiveInput: Event<void>;
}

export interface RenderLoopOptions {
  /** A frame is drawn at least this often */
  maxFrameIntervalMs: number;
  /** ...and never more often than this */
  minFrameIntervalMs: number;
  /** Lifetime of transient status messages */
  statusTtlMs: number;
}

export interface RenderLoopDeps {
  store: ResourceStore;
  pool: WatcherPool;
  dispatcher: Dispatcher;
  executor: ActionExecutor;
  registry: ContextRegistry;
  sink: FrameSink;
  input: InputSource;
}

const DEFAULT_OPTIONS: RenderLoopOptions = {
  maxFrameIntervalMs: 250,
  minFrameIntervalMs: 50,
  statusTtlMs: 4000
};

/**
 * Cooperative tick loop: input, view state, snapshot, frame. Never awaits
 * the network; effects that need it are fired and observed on later ticks.
 */
export class RenderLoop implements Disposable {
  private _onDidQuit = new Emitter<void>();
  readonly onDidQuit = this._onDidQuit.event;

  private app: AppState;
  private readonly options: RenderLoopOptions;
  private timer: NodeJS.Timeout | undefined;
  private dueAt = 0;
  private lastFrameAt = Number.NEGATIVE_INFINITY;
  private running = false;
  private disposables: Disposable[] = [];
  private yamlCache: { obj: ResourceObject; lines: string[] } | undefined;
  private frames = 0;
  /** Target of the context switch in flight; focus effects wait for it */
  private pendingSwitch: string | undefined;

  constructor(
    private readonly deps: RenderLoopDeps,
    initial: AppState,
    options: Partial<RenderLoopOptions> = {}
  ) {
    this.app = initial;
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  public get state(): AppState {
    return this.app;
  }

  public get frameCount(): number {
    return this.frames;
  }

  public start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.disposables.push(
      this.deps.input.onDidReceiveInput(() => this.requestFrame()),
      this.deps.store.onDidChange(() => this.requestFrame()),
      this.deps.registry.onDidChange(() => this.requestFrame())
    );
    this.requestFrame();
  }

  public stop(): void {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    this.disposables.forEach(d => d.dispose());
    this.disposables = [];
  }

  /**
   * Ask for a frame as soon as the minimum interval allows.
   */
  public requestFrame(): void {
    this.scheduleAt(Math.max(Date.now(), this.lastFrameAt + this.options.minFrameIntervalMs));
  }

  private scheduleAt(at: number): void {
    if (!this.running) {
      return;
    }
    if (this.timer && this.dueAt <= at) {
      return;
    }
    if (this.timer) {
      clearTimeout(this.timer);
    }
    this.dueAt = at;
    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.tick();
      this.scheduleAt(Date.now() + this.options.maxFrameIntervalMs);
    }, Math.max(0, at - Date.now()));
  }

  /**
   * Make `contextId` the displayed context and focus its first tab.
   */
  public showContext(contextId: string): void {
    const kinds = this.deps.registry.getKinds(contextId);
    const tab = this.app.context === contextId ? Math.min(this.app.view.tab, Math.max(0, kinds.length - 1)) : 0;
    this.app = {
      ...this.app,
      context: contextId,
      kinds,
      contexts: this.deps.registry.listContexts(),
      view: { ...initialViewState(), tab }
    };
    const kind = kinds[tab];
    if (kind) {
      this.runEffects([{ type: 'focus', context: contextId, kind }]);
    }
    this.requestFrame();
  }

  public notify(text: string, tone: StatusTone): void {
    this.app = withStatus(this.app, text, tone, Date.now(), this.options.statusTtlMs);
    this.requestFrame();
  }

  /**
   * One iteration. Returns the frame that was drawn.
   */
  public tick(now: number = Date.now()): Frame {
    this.lastFrameAt = now;
    this.frames += 1;
    this.app = { ...this.app, contexts: this.deps.registry.listContexts() };

    for (const event of this.deps.input.drain()) {
      const { app, effects } = handleInput(this.app, event, this.visibleRows());
      this.app = app;
      this.runEffects(effects);
    }

    for (const outcome of this.deps.executor.drainResults()) {
      this.app = withStatus(
        this.app,
        outcome.message,
        outcome.status === 'success' ? 'ok' : 'error',
        now,
        this.options.statusTtlMs
      );
    }

    const kind = activeKind(this.app);
    const subscription = this.app.context && kind ? this.deps.pool.get(this.app.context, kind) : undefined;
    const snapshot = this.app.context && kind ? this.deps.store.snapshot(this.app.context, kind) : [];
    const rows = filterRows(snapshot, this.app.view.filter);
    this.app = {
      ...this.app,
      banner: this.bannerFor(subscription),
      view: clampSelection(this.app.view, rows.length, bodyHeight(this.app.size))
    };

    const frame = renderFrame({
      app: this.app,
      rows,
      total: snapshot.length,
      subscription,
      detail: this.detailView(),
      now
    });
    this.deps.sink.draw(frame);
    return frame;
  }

  private visibleRows(): readonly ResourceObject[] {
    const kind = activeKind(this.app);
    if (!this.app.context || !kind) {
      return [];
    }
    return filterRows(this.deps.store.snapshot(this.app.context, kind), this.app.view.filter);
  }

  private bannerFor(subscription: SubscriptionInfo | undefined): string | undefined {
    const ctx = this.app.contexts.find(c => c.id === this.app.context);
    if (ctx?.status === 'unreachable') {
      return `Context ${ctx.id} is unreachable: check credentials and switch contexts to retry`;
    }
    if (!subscription) {
      return undefined;
    }
    if (subscription.state === 'retrying') {
      return `Connection trouble (${subscription.lastError ?? 'unknown error'}); retrying`;
    }
    if (subscription.state === 'stopped' && subscription.lastError) {
      return `Watching ${subscription.kind} stopped: ${subscription.lastError}`;
    }
    return undefined;
  }

  private detailView(): DetailView | undefined {
    const kind = activeKind(this.app);
    const key = this.app.view.detailKey;
    if (this.app.view.mode !== 'detail' || !this.app.context || !kind || !key) {
      return undefined;
    }
    const obj = this.deps.store.get(this.app.context, kind, key);
    if (!obj) {
      return undefined;
    }
    if (this.yamlCache?.obj !== obj) {
      this.yamlCache = { obj, lines: resourceToYaml(obj.raw).split('\n') };
    }
    return { title: `${kind}/${key}`, lines: this.yamlCache.lines };
  }

  private runEffects(effects: Effect[]): void {
    for (const effect of effects) {
      switch (effect.type) {
        case 'focus':
          if (this.pendingSwitch === undefined) {
            this.deps.dispatcher.onFocusChange(effect.context, effect.kind);
          }
          break;
        case 'switchContext':
          this.notify(`Switching to ${effect.context}…`, 'neutral');
          this.pendingSwitch = effect.context;
          this.deps.dispatcher
            .switchContext(effect.context)
            .finally(() => {
              if (this.pendingSwitch === effect.context) {
                this.pendingSwitch = undefined;
              }
            })
            .then(result => {
              if (result.status === 'success') {
                this.showContext(effect.context);
                this.notify(`Switched to ${effect.context}`, 'ok');
              } else if (result.status === 'notFound') {
                this.notify(`Context ${effect.context} not found`, 'error');
              } else {
                this.notify(`Cannot connect to ${effect.context}: ${result.error.message}`, 'error');
              }
            })
            .catch(err => {
              log(`Context switch to ${effect.context} failed: ${err}`, LogLevel.ERROR);
              this.notify(`Context switch failed: ${describeError(err)}`, 'error');
            });
          break;
        case 'requestAction': {
          if (!this.app.context) {
            break;
          }
          try {
            const request = this.deps.executor.request(
              effect.action,
              { context: this.app.context, kind: effect.target.kind, namespace: effect.target.namespace, name: effect.target.name },
              { replicas: effect.replicas }
            );
            this.app = { ...this.app, view: { ...this.app.view, mode: 'confirm', confirm: request } };
          } catch (err) {
            if (!(err instanceof ActionError)) {
              throw err;
            }
            this.app = withStatus(this.app, err.message, 'error', Date.now(), this.options.statusTtlMs);
          }
          break;
        }
        case 'respond': {
          const result = this.deps.executor.respond(effect.requestId, effect.confirmed);
          const text = result === 'pending' ? 'Working…' : result === 'cancelled' ? 'Cancelled' : 'Request expired';
          this.app = withStatus(this.app, text, 'neutral', Date.now(), this.options.statusTtlMs);
          break;
        }
        case 'quit':
          this.stop();
          this._onDidQuit.fire();
          break;
      }
    }
  }

  public dispose(): void {
    this.stop();
    this._onDidQuit.dispose();
  }
}
