// src/types.ts
import type { JsonObject } from './utils/attributes';

export type ContextStatus = 'idle' | 'connecting' | 'connected' | 'unreachable';

/**
 * One kubeconfig context, i.e. a named connection to a cluster
 */
export interface ClusterContext {
  id: string;
  cluster: string;
  server: string;
  /** Credential reference (kubeconfig user entry) */
  user: string;
  namespace?: string;
  status: ContextStatus;
}

export interface Credential {
  server: string;
  caData?: string;
  certData?: string;
  keyData?: string;
  token?: string;
  skipTlsVerify: boolean;
}

export type ResourceKindName =
  | 'pods'
  | 'services'
  | 'nodes'
  | 'configmaps'
  | 'statefulsets'
  | 'replicasets'
  | 'deployments'
  | 'jobs'
  | 'daemonsets'
  | 'cronjobs'
  | 'secrets'
  | 'ingresses'
  | 'persistentvolumeclaims'
  | 'namespaces';

export type StatusTone = 'ok' | 'warn' | 'error' | 'neutral';

export interface StatusSummary {
  text: string;
  tone: StatusTone;
}

export interface ResourceIdentity {
  kind: ResourceKindName;
  namespace?: string;
  name: string;
}

export interface ResourceObject extends ResourceIdentity {
  /** `namespace/name`, or `name` for cluster scoped kinds */
  key: string;
  revision: string;
  status: StatusSummary;
  /** Column projection, computed once when the object is normalized */
  cells: string[];
  createdAt?: number;
  raw: JsonObject;
  updatedAt: number;
}

export type ChangeRecord =
  | {
      type: 'Added' | 'Modified';
      context: string;
      kind: ResourceKindName;
      key: string;
      revision: string;
      object: ResourceObject;
    }
  | {
      type: 'Deleted';
      context: string;
      kind: ResourceKindName;
      key: string;
      revision: string;
      updatedAt: number;
    };

export type ApplyResult = 'applied' | 'droppedStale';

export type SubscriptionState = 'active' | 'retrying' | 'stopped';

export interface SubscriptionKey {
  context: string;
  kind: ResourceKindName;
}

export interface SubscriptionInfo extends SubscriptionKey {
  state: SubscriptionState;
  mode: 'watch' | 'poll';
  /** Last revision seen from a list or watch event */
  revision?: string;
  attempts: number;
  listCount: number;
  lastError?: string;
}

export type ActionKind = 'delete' | 'scale' | 'restart';

export function identityKey(identity: { namespace?: string; name: string }): string {
  return identity.namespace ? `${identity.namespace}/${identity.name}` : identity.name;
}

export function subscriptionId(key: SubscriptionKey): string {
  return `${key.context}/${key.kind}`;
}
