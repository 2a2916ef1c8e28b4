// src/services/actionExecutor.ts
import type { MutationApi } from '../clients/kubernetesClient';
import { ActionError, describeError } from '../errors';
import { log, LogLevel, measurePerformance } from '../logging';
import { RESOURCE_KINDS } from '../resources/resourceKinds';
import type { ActionKind, ResourceIdentity } from '../types';
import { identityKey } from '../types';

export interface ActionTarget extends ResourceIdentity {
  context: string;
}

export interface ActionRequest {
  id: number;
  action: ActionKind;
  target: ActionTarget;
  /** Text of the confirmation prompt */
  prompt: string;
  replicas?: number;
}

export type ActionOutcome =
  | { status: 'success'; request: ActionRequest; message: string }
  | { status: 'failure'; request: ActionRequest; message: string };

export type ResponseResult = 'pending' | 'cancelled' | 'unknown';

export const RESULT_QUEUE_CAPACITY = 32;

function describeTarget(target: ActionTarget): string {
  return `${target.kind}/${identityKey(target)}`;
}

/**
 * Confirmed, one-shot mutations. Outcomes are queued for the render loop;
 * the cache only ever changes through the watchers.
 */
export class ActionExecutor {
  private pending: Map<number, ActionRequest> = new Map();
  private results: ActionOutcome[] = [];
  private inFlight: Set<Promise<void>> = new Set();
  private nextId = 1;

  constructor(
    private readonly api: MutationApi,
    private readonly capacity: number = RESULT_QUEUE_CAPACITY
  ) {}

  /**
   * Record an action awaiting confirmation. Throws ActionError when the kind
   * does not support the action or the parameters are invalid.
   */
  public request(action: ActionKind, target: ActionTarget, params: { replicas?: number } = {}): ActionRequest {
    const kind = RESOURCE_KINDS[target.kind];
    if (!kind.actions.includes(action)) {
      throw new ActionError(`${kind.title} do not support ${action}`);
    }
    let prompt: string;
    switch (action) {
      case 'delete':
        prompt = `Delete ${describeTarget(target)}?`;
        break;
      case 'restart':
        prompt = `Restart ${describeTarget(target)}?`;
        break;
      case 'scale': {
        const replicas = params.replicas;
        if (replicas === undefined || !Number.isInteger(replicas) || replicas < 0) {
          throw new ActionError(`Invalid replica count: ${replicas ?? 'none'}`);
        }
        prompt = `Scale ${describeTarget(target)} to ${replicas} replicas?`;
        break;
      }
    }
    const request: ActionRequest = { id: this.nextId++, action, target: { ...target }, prompt, replicas: params.replicas };
    this.pending.set(request.id, request);
    return request;
  }

  /**
   * Answer a pending confirmation. A confirmed request is executed in the
   * background; its outcome shows up in `drainResults()`.
   */
  public respond(requestId: number, confirmed: boolean): ResponseResult {
    const request = this.pending.get(requestId);
    if (!request) {
      return 'unknown';
    }
    this.pending.delete(requestId);
    if (!confirmed) {
      log(`Cancelled ${request.action} of ${identityKey(request.target)}`, LogLevel.DEBUG);
      return 'cancelled';
    }
    const task = this.execute(request).finally(() => this.inFlight.delete(task));
    this.inFlight.add(task);
    return 'pending';
  }

  private async execute(request: ActionRequest): Promise<void> {
    const { target } = request;
    const what = describeTarget(target);
    try {
      await measurePerformance(
        () => this.call(request),
        `${request.action} ${what} in ${target.context}`,
        LogLevel.INFO
      );
      const message =
        request.action === 'delete'
          ? `Deleted ${what}`
          : request.action === 'scale'
            ? `Scaled ${what} to ${request.replicas}`
            : `Restarted ${what}`;
      this.push({ status: 'success', request, message });
    } catch (err) {
      this.push({ status: 'failure', request, message: `Failed to ${request.action} ${what}: ${describeError(err)}` });
    }
  }

  private call(request: ActionRequest): Promise<void> {
    const { context, ...identity } = request.target;
    switch (request.action) {
      case 'delete':
        return this.api.deleteResource(context, identity);
      case 'scale':
        return this.api.scaleResource(context, identity, request.replicas ?? 0);
      case 'restart':
        return this.api.restartResource(context, identity);
    }
  }

  private push(outcome: ActionOutcome): void {
    this.results.push(outcome);
    while (this.results.length > this.capacity) {
      const dropped = this.results.shift();
      log(`Action result queue full; dropped: ${dropped?.message}`, LogLevel.WARN);
    }
  }

  /** Outcomes since the last call, oldest first */
  public drainResults(): ActionOutcome[] {
    const drained = this.results;
    this.results = [];
    return drained;
  }

  public getPending(requestId: number): ActionRequest | undefined {
    return this.pending.get(requestId);
  }

  /** Resolves once every confirmed action has settled */
  public async idle(): Promise<void> {
    await Promise.all(Array.from(this.inFlight));
  }
}
