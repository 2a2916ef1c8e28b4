// src/services/contextRegistry.ts
import type { ContextSource } from '../clients/kubeconfigSource';
import type { DiscoveryApi } from '../clients/kubernetesClient';
import { AuthError, toDashboardError } from '../errors';
import type { DashboardError } from '../errors';
import { log, LogLevel, measurePerformance } from '../logging';
import type { ClusterContext, ContextStatus, Credential, ResourceKindName } from '../types';
import { Emitter } from '../utils/emitter';

export type ActivationResult =
  | { status: 'success' }
  | { status: 'notFound' }
  | { status: 'connectionError'; error: DashboardError };

/** Releases everything the previous context holds; awaited before switching */
export type Teardown = (previousContextId: string) => Promise<void>;

/**
 * Knows the configured contexts, which one is active, and which resource
 * kinds each activated context serves.
 */
export class ContextRegistry {
  private _onDidChange = new Emitter<ClusterContext>();
  readonly onDidChange = this._onDidChange.event;

  private contexts: Map<string, ClusterContext> = new Map();
  private kinds: Map<string, ResourceKindName[]> = new Map();
  private activeId: string | undefined;
  private activating: Promise<ActivationResult> | undefined;

  constructor(
    private readonly source: ContextSource,
    private readonly discovery: DiscoveryApi
  ) {
    for (const ctx of source.listContexts()) {
      this.contexts.set(ctx.id, { ...ctx });
    }
  }

  /** Contexts in source order */
  public listContexts(): ClusterContext[] {
    return Array.from(this.contexts.values()).map(ctx => ({ ...ctx }));
  }

  public getCredential(contextId: string): Credential | undefined {
    return this.contexts.has(contextId) ? this.source.getCredential(contextId) : undefined;
  }

  public getActive(): ClusterContext | undefined {
    const ctx = this.activeId ? this.contexts.get(this.activeId) : undefined;
    return ctx ? { ...ctx } : undefined;
  }

  /** Context the source marks as current, else the first one */
  public getDefaultContextId(): string | undefined {
    const current = this.source.getCurrentContext();
    if (current && this.contexts.has(current)) {
      return current;
    }
    return this.contexts.keys().next().value;
  }

  /** Kinds discovered when the context was last activated */
  public getKinds(contextId: string): ResourceKindName[] {
    return [...(this.kinds.get(contextId) ?? [])];
  }

  public markUnreachable(contextId: string): void {
    this.setStatus(contextId, 'unreachable');
  }

  /**
   * Probe the target, then tear down the previous context, then switch.
   * A failed probe leaves the previous context active and untouched.
   * Activations are serialized.
   */
  public async activate(contextId: string, teardown?: Teardown): Promise<ActivationResult> {
    const previous = this.activating ?? Promise.resolve<ActivationResult>({ status: 'success' });
    const next = previous.then(() => this.doActivate(contextId, teardown));
    this.activating = next;
    try {
      return await next;
    } finally {
      if (this.activating === next) {
        this.activating = undefined;
      }
    }
  }

  private async doActivate(contextId: string, teardown?: Teardown): Promise<ActivationResult> {
    const target = this.contexts.get(contextId);
    if (!target) {
      log(`Context '${contextId}' not found`, LogLevel.WARN);
      return { status: 'notFound' };
    }
    if (this.activeId === contextId && target.status === 'connected') {
      return { status: 'success' };
    }

    const priorStatus = target.status;
    this.setStatus(contextId, 'connecting');
    let kinds: ResourceKindName[];
    try {
      kinds = await measurePerformance(
        () => this.discovery.discover(contextId),
        `Discovered resource kinds for context ${contextId}`,
        LogLevel.INFO
      );
    } catch (err) {
      const error = toDashboardError(err);
      this.setStatus(contextId, error instanceof AuthError ? 'unreachable' : priorStatus);
      return { status: 'connectionError', error };
    }

    const previousId = this.activeId;
    if (previousId && previousId !== contextId) {
      if (teardown) {
        await teardown(previousId);
      }
      this.setStatus(previousId, 'idle');
    }
    this.kinds.set(contextId, kinds);
    this.activeId = contextId;
    this.setStatus(contextId, 'connected');
    log(`Activated context ${contextId} (${kinds.length} kinds)`, LogLevel.INFO);
    return { status: 'success' };
  }

  private setStatus(contextId: string, status: ContextStatus): void {
    const ctx = this.contexts.get(contextId);
    if (!ctx || ctx.status === status) {
      return;
    }
    ctx.status = status;
    this._onDidChange.fire({ ...ctx });
  }

  public dispose(): void {
    this._onDidChange.dispose();
  }
}
