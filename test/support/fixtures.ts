import { normalizeObject } from '../../src/resources/resourceKinds';
import type { ChangeRecord, ResourceObject } from '../../src/types';
import type { JsonObject } from '../../src/utils/attributes';

export const CREATED_AT = '2024-05-01T10:00:00Z';

export function rawPod(name: string, revision: string, namespace = 'default', phase = 'Running'): JsonObject {
  return {
    apiVersion: 'v1',
    kind: 'Pod',
    metadata: { name, namespace, resourceVersion: revision, creationTimestamp: CREATED_AT },
    spec: { containers: [{ name: 'app', image: 'nginx:1.27' }] },
    status: {
      phase,
      containerStatuses: [{ name: 'app', ready: phase === 'Running', restartCount: 0 }]
    }
  };
}

export function rawDeployment(name: string, revision: string, replicas = 3, ready = 3): JsonObject {
  return {
    apiVersion: 'apps/v1',
    kind: 'Deployment',
    metadata: { name, namespace: 'default', resourceVersion: revision, creationTimestamp: CREATED_AT },
    spec: { replicas },
    status: { replicas, readyReplicas: ready, updatedReplicas: replicas, availableReplicas: ready }
  };
}

export function pod(name: string, revision: string, updatedAt = 0, namespace = 'default'): ResourceObject {
  return normalizeObject('pods', rawPod(name, revision, namespace), updatedAt);
}

export function added(context: string, obj: ResourceObject): ChangeRecord {
  return { type: 'Added', context, kind: obj.kind, key: obj.key, revision: obj.revision, object: obj };
}

export function modified(context: string, obj: ResourceObject): ChangeRecord {
  return { type: 'Modified', context, kind: obj.kind, key: obj.key, revision: obj.revision, object: obj };
}

export function deleted(context: string, obj: ResourceObject): ChangeRecord {
  return {
    type: 'Deleted',
    context,
    kind: obj.kind,
    key: obj.key,
    revision: obj.revision,
    updatedAt: obj.updatedAt
  };
}

/**
 * Let pending promise callbacks and immediates run until `predicate` holds.
 * Timers faked by sinon do not block this; setImmediate stays real.
 */
export async function waitFor(predicate: () => boolean, description = 'condition', rounds = 20000): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    if (predicate()) {
      return;
    }
    await new Promise<void>(resolve => setImmediate(resolve));
  }
  throw new Error(`Timed out waiting for ${description}`);
}

/** The error a promise rejects with; fails when it resolves */
export async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error('Expected the promise to reject');
}

/** The error a call throws; fails when it returns */
export function thrownBy(call: () => unknown): unknown {
  try {
    call();
  } catch (err) {
    return err;
  }
  throw new Error('Expected the call to throw');
}
