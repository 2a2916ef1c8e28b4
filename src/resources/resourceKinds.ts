// src/resources/resourceKinds.ts
import { MalformedObjectError } from '../errors';
import type { ActionKind, ResourceKindName, ResourceObject, StatusSummary } from '../types';
import { identityKey } from '../types';
import {
  getArray,
  getBoolean,
  getNumber,
  getRecord,
  getRecords,
  getString,
  isRecord
} from '../utils/attributes';
import type { JsonObject } from '../utils/attributes';

export interface Column {
  header: string;
  width: number;
}

export interface ResourceKind {
  name: ResourceKindName;
  title: string;
  group: string;
  version: string;
  plural: string;
  namespaced: boolean;
  /** Static columns; every table also gets a trailing AGE column */
  columns: Column[];
  actions: readonly ActionKind[];
  project(obj: JsonObject): string[];
  summarize(obj: JsonObject): StatusSummary;
}

const NAMESPACE: Column = { header: 'NAMESPACE', width: 16 };
const NAME: Column = { header: 'NAME', width: 40 };
export const AGE_COLUMN: Column = { header: 'AGE', width: 8 };

const NEUTRAL: StatusSummary = { text: '', tone: 'neutral' };

const POD_ERROR_REASONS = new Set([
  'CrashLoopBackOff',
  'Error',
  'ErrImagePull',
  'ImagePullBackOff',
  'InvalidImageName',
  'CreateContainerConfigError',
  'OOMKilled'
]);

function name(obj: JsonObject): string {
  return getString(obj, 'metadata', 'name') ?? '';
}

function namespace(obj: JsonObject): string {
  return getString(obj, 'metadata', 'namespace') ?? '';
}

function count(value: number | undefined): string {
  return String(value ?? 0);
}

function ratio(ready: number | undefined, desired: number | undefined): string {
  return `${ready ?? 0}/${desired ?? 0}`;
}

function readyTone(ready: number | undefined, desired: number | undefined): StatusSummary {
  const r = ready ?? 0;
  const d = desired ?? 0;
  return { text: ratio(r, d), tone: r >= d ? 'ok' : 'warn' };
}

function podStatus(obj: JsonObject): StatusSummary {
  if (getString(obj, 'metadata', 'deletionTimestamp')) {
    return { text: 'Terminating', tone: 'warn' };
  }
  for (const cs of getRecords(obj, 'status', 'containerStatuses')) {
    const waiting = getString(cs, 'state', 'waiting', 'reason');
    if (waiting) {
      return { text: waiting, tone: POD_ERROR_REASONS.has(waiting) ? 'error' : 'warn' };
    }
    const terminated = getString(cs, 'state', 'terminated', 'reason');
    if (terminated && terminated !== 'Completed') {
      return { text: terminated, tone: 'error' };
    }
  }
  const phase = getString(obj, 'status', 'phase') ?? 'Unknown';
  switch (phase) {
    case 'Running':
    case 'Succeeded':
      return { text: phase, tone: 'ok' };
    case 'Pending':
      return { text: phase, tone: 'warn' };
    case 'Failed':
      return { text: phase, tone: 'error' };
    default:
      return { text: phase, tone: 'neutral' };
  }
}

function podReady(obj: JsonObject): string {
  const statuses = getRecords(obj, 'status', 'containerStatuses');
  const total = getArray(obj, 'spec', 'containers').length;
  const ready = statuses.filter(cs => getBoolean(cs, 'ready') === true).length;
  return `${ready}/${total}`;
}

function podRestarts(obj: JsonObject): string {
  return String(
    getRecords(obj, 'status', 'containerStatuses').reduce(
      (sum, cs) => sum + (getNumber(cs, 'restartCount') ?? 0),
      0
    )
  );
}

function nodeStatus(obj: JsonObject): StatusSummary {
  const ready = getRecords(obj, 'status', 'conditions').find(c => getString(c, 'type') === 'Ready');
  const unschedulable = getBoolean(obj, 'spec', 'unschedulable') === true;
  const base = ready && getString(ready, 'status') === 'True' ? 'Ready' : 'NotReady';
  const text = unschedulable ? `${base},SchedulingDisabled` : base;
  return { text, tone: base === 'Ready' ? (unschedulable ? 'warn' : 'ok') : 'error' };
}

function nodeRoles(obj: JsonObject): string {
  const labels = getRecord(obj, 'metadata', 'labels') ?? {};
  const roles = Object.keys(labels)
    .filter(label => label.startsWith('node-role.kubernetes.io/'))
    .map(label => label.slice('node-role.kubernetes.io/'.length))
    .filter(role => role.length > 0);
  return roles.length > 0 ? roles.sort().join(',') : '<none>';
}

function servicePorts(obj: JsonObject): string {
  const ports = getRecords(obj, 'spec', 'ports').map(p => {
    const port = getNumber(p, 'port');
    const nodePort = getNumber(p, 'nodePort');
    const protocol = getString(p, 'protocol') ?? 'TCP';
    return nodePort ? `${port}:${nodePort}/${protocol}` : `${port}/${protocol}`;
  });
  return ports.length > 0 ? ports.join(',') : '<none>';
}

function serviceExternalIp(obj: JsonObject): string {
  const ingress = getRecords(obj, 'status', 'loadBalancer', 'ingress')
    .map(i => getString(i, 'ip') ?? getString(i, 'hostname') ?? '')
    .filter(v => v.length > 0);
  if (ingress.length > 0) {
    return ingress.join(',');
  }
  const external = getArray(obj, 'spec', 'externalIPs').filter((v): v is string => typeof v === 'string');
  return external.length > 0 ? external.join(',') : '<none>';
}

function dataCount(obj: JsonObject): string {
  const data = getRecord(obj, 'data') ?? {};
  const binary = getRecord(obj, 'binaryData') ?? {};
  return String(Object.keys(data).length + Object.keys(binary).length);
}

function jobCompletions(obj: JsonObject): string {
  return `${getNumber(obj, 'status', 'succeeded') ?? 0}/${getNumber(obj, 'spec', 'completions') ?? 1}`;
}

function jobDuration(obj: JsonObject): string {
  const start = Date.parse(getString(obj, 'status', 'startTime') ?? '');
  if (Number.isNaN(start)) {
    return '';
  }
  const end = Date.parse(getString(obj, 'status', 'completionTime') ?? '');
  return Number.isNaN(end) ? '' : formatAge(end - start);
}

function jobStatus(obj: JsonObject): StatusSummary {
  const conditions = getRecords(obj, 'status', 'conditions');
  const has = (type: string) =>
    conditions.some(c => getString(c, 'type') === type && getString(c, 'status') === 'True');
  if (has('Failed')) {
    return { text: 'Failed', tone: 'error' };
  }
  if (has('Complete')) {
    return { text: 'Complete', tone: 'ok' };
  }
  return { text: 'Running', tone: 'warn' };
}

function ingressHosts(obj: JsonObject): string {
  const hosts = getRecords(obj, 'spec', 'rules')
    .map(r => getString(r, 'host') ?? '')
    .filter(h => h.length > 0);
  return hosts.length > 0 ? hosts.join(',') : '*';
}

function ingressAddress(obj: JsonObject): string {
  return getRecords(obj, 'status', 'loadBalancer', 'ingress')
    .map(i => getString(i, 'ip') ?? getString(i, 'hostname') ?? '')
    .filter(v => v.length > 0)
    .join(',');
}

function phaseStatus(obj: JsonObject, okPhases: string[]): StatusSummary {
  const phase = getString(obj, 'status', 'phase') ?? 'Unknown';
  return { text: phase, tone: okPhases.includes(phase) ? 'ok' : 'warn' };
}

/**
 * Short relative age in the style of kubectl: 45s, 12m, 5h, 3d.
 */
export function formatAge(ms: number): string {
  const seconds = Math.max(0, Math.floor(ms / 1000));
  if (seconds < 120) {
    return `${seconds}s`;
  }
  const minutes = Math.floor(seconds / 60);
  if (minutes < 120) {
    return `${minutes}m`;
  }
  const hours = Math.floor(minutes / 60);
  if (hours < 48) {
    return `${hours}h`;
  }
  return `${Math.floor(hours / 24)}d`;
}

const SCALABLE: readonly ActionKind[] = ['delete', 'scale', 'restart'];
const DELETE_ONLY: readonly ActionKind[] = ['delete'];

export const RESOURCE_KINDS: Readonly<Record<ResourceKindName, ResourceKind>> = {
  pods: {
    name: 'pods',
    title: 'Pods',
    group: '',
    version: 'v1',
    plural: 'pods',
    namespaced: true,
    columns: [NAMESPACE, NAME, { header: 'READY', width: 7 }, { header: 'STATUS', width: 18 }, { header: 'RESTARTS', width: 9 }],
    actions: DELETE_ONLY,
    project: obj => [namespace(obj), name(obj), podReady(obj), podStatus(obj).text, podRestarts(obj)],
    summarize: podStatus
  },
  services: {
    name: 'services',
    title: 'Services',
    group: '',
    version: 'v1',
    plural: 'services',
    namespaced: true,
    columns: [
      NAMESPACE,
      NAME,
      { header: 'TYPE', width: 13 },
      { header: 'CLUSTER-IP', width: 16 },
      { header: 'EXTERNAL-IP', width: 16 },
      { header: 'PORTS', width: 20 }
    ],
    actions: DELETE_ONLY,
    project: obj => [
      namespace(obj),
      name(obj),
      getString(obj, 'spec', 'type') ?? 'ClusterIP',
      getString(obj, 'spec', 'clusterIP') ?? '<none>',
      serviceExternalIp(obj),
      servicePorts(obj)
    ],
    summarize: () => NEUTRAL
  },
  nodes: {
    name: 'nodes',
    title: 'Nodes',
    group: '',
    version: 'v1',
    plural: 'nodes',
    namespaced: false,
    columns: [NAME, { header: 'STATUS', width: 26 }, { header: 'ROLES', width: 16 }, { header: 'VERSION', width: 12 }],
    actions: DELETE_ONLY,
    project: obj => [
      name(obj),
      nodeStatus(obj).text,
      nodeRoles(obj),
      getString(obj, 'status', 'nodeInfo', 'kubeletVersion') ?? ''
    ],
    summarize: nodeStatus
  },
  configmaps: {
    name: 'configmaps',
    title: 'ConfigMaps',
    group: '',
    version: 'v1',
    plural: 'configmaps',
    namespaced: true,
    columns: [NAMESPACE, NAME, { header: 'DATA', width: 6 }],
    actions: DELETE_ONLY,
    project: obj => [namespace(obj), name(obj), dataCount(obj)],
    summarize: () => NEUTRAL
  },
  statefulsets: {
    name: 'statefulsets',
    title: 'StatefulSets',
    group: 'apps',
    version: 'v1',
    plural: 'statefulsets',
    namespaced: true,
    columns: [NAMESPACE, NAME, { header: 'READY', width: 7 }, { header: 'SERVICE', width: 20 }],
    actions: SCALABLE,
    project: obj => [
      namespace(obj),
      name(obj),
      ratio(getNumber(obj, 'status', 'readyReplicas'), getNumber(obj, 'spec', 'replicas')),
      getString(obj, 'spec', 'serviceName') ?? ''
    ],
    summarize: obj => readyTone(getNumber(obj, 'status', 'readyReplicas'), getNumber(obj, 'spec', 'replicas'))
  },
  replicasets: {
    name: 'replicasets',
    title: 'ReplicaSets',
    group: 'apps',
    version: 'v1',
    plural: 'replicasets',
    namespaced: true,
    columns: [NAMESPACE, NAME, { header: 'DESIRED', width: 8 }, { header: 'CURRENT', width: 8 }, { header: 'READY', width: 6 }],
    actions: ['delete', 'scale'],
    project: obj => [
      namespace(obj),
      name(obj),
      count(getNumber(obj, 'spec', 'replicas')),
      count(getNumber(obj, 'status', 'replicas')),
      count(getNumber(obj, 'status', 'readyReplicas'))
    ],
    summarize: obj => readyTone(getNumber(obj, 'status', 'readyReplicas'), getNumber(obj, 'spec', 'replicas'))
  },
  deployments: {
    name: 'deployments',
    title: 'Deployments',
    group: 'apps',
    version: 'v1',
    plural: 'deployments',
    namespaced: true,
    columns: [
      NAMESPACE,
      NAME,
      { header: 'READY', width: 7 },
      { header: 'UP-TO-DATE', width: 11 },
      { header: 'AVAILABLE', width: 10 }
    ],
    actions: SCALABLE,
    project: obj => [
      namespace(obj),
      name(obj),
      ratio(getNumber(obj, 'status', 'readyReplicas'), getNumber(obj, 'spec', 'replicas')),
      count(getNumber(obj, 'status', 'updatedReplicas')),
      count(getNumber(obj, 'status', 'availableReplicas'))
    ],
    summarize: obj => readyTone(getNumber(obj, 'status', 'readyReplicas'), getNumber(obj, 'spec', 'replicas'))
  },
  jobs: {
    name: 'jobs',
    title: 'Jobs',
    group: 'batch',
    version: 'v1',
    plural: 'jobs',
    namespaced: true,
    columns: [NAMESPACE, NAME, { header: 'COMPLETIONS', width: 12 }, { header: 'DURATION', width: 9 }],
    actions: DELETE_ONLY,
    project: obj => [namespace(obj), name(obj), jobCompletions(obj), jobDuration(obj)],
    summarize: jobStatus
  },
  daemonsets: {
    name: 'daemonsets',
    title: 'DaemonSets',
    group: 'apps',
    version: 'v1',
    plural: 'daemonsets',
    namespaced: true,
    columns: [
      NAMESPACE,
      NAME,
      { header: 'DESIRED', width: 8 },
      { header: 'CURRENT', width: 8 },
      { header: 'READY', width: 6 },
      { header: 'UP-TO-DATE', width: 11 },
      { header: 'AVAILABLE', width: 10 }
    ],
    actions: ['delete', 'restart'],
    project: obj => [
      namespace(obj),
      name(obj),
      count(getNumber(obj, 'status', 'desiredNumberScheduled')),
      count(getNumber(obj, 'status', 'currentNumberScheduled')),
      count(getNumber(obj, 'status', 'numberReady')),
      count(getNumber(obj, 'status', 'updatedNumberScheduled')),
      count(getNumber(obj, 'status', 'numberAvailable'))
    ],
    summarize: obj =>
      readyTone(getNumber(obj, 'status', 'numberReady'), getNumber(obj, 'status', 'desiredNumberScheduled'))
  },
  cronjobs: {
    name: 'cronjobs',
    title: 'CronJobs',
    group: 'batch',
    version: 'v1',
    plural: 'cronjobs',
    namespaced: true,
    columns: [
      NAMESPACE,
      NAME,
      { header: 'SCHEDULE', width: 14 },
      { header: 'SUSPEND', width: 8 },
      { header: 'ACTIVE', width: 7 }
    ],
    actions: DELETE_ONLY,
    project: obj => [
      namespace(obj),
      name(obj),
      getString(obj, 'spec', 'schedule') ?? '',
      getBoolean(obj, 'spec', 'suspend') === true ? 'True' : 'False',
      String(getArray(obj, 'status', 'active').length)
    ],
    summarize: obj =>
      getBoolean(obj, 'spec', 'suspend') === true ? { text: 'Suspended', tone: 'warn' } : NEUTRAL
  },
  secrets: {
    name: 'secrets',
    title: 'Secrets',
    group: '',
    version: 'v1',
    plural: 'secrets',
    namespaced: true,
    columns: [NAMESPACE, NAME, { header: 'TYPE', width: 36 }, { header: 'DATA', width: 6 }],
    actions: DELETE_ONLY,
    project: obj => [namespace(obj), name(obj), getString(obj, 'type') ?? 'Opaque', dataCount(obj)],
    summarize: () => NEUTRAL
  },
  ingresses: {
    name: 'ingresses',
    title: 'Ingresses',
    group: 'networking.k8s.io',
    version: 'v1',
    plural: 'ingresses',
    namespaced: true,
    columns: [
      NAMESPACE,
      NAME,
      { header: 'CLASS', width: 12 },
      { header: 'HOSTS', width: 30 },
      { header: 'ADDRESS', width: 16 }
    ],
    actions: DELETE_ONLY,
    project: obj => [
      namespace(obj),
      name(obj),
      getString(obj, 'spec', 'ingressClassName') ?? '<none>',
      ingressHosts(obj),
      ingressAddress(obj)
    ],
    summarize: () => NEUTRAL
  },
  persistentvolumeclaims: {
    name: 'persistentvolumeclaims',
    title: 'PVCs',
    group: '',
    version: 'v1',
    plural: 'persistentvolumeclaims',
    namespaced: true,
    columns: [
      NAMESPACE,
      NAME,
      { header: 'STATUS', width: 9 },
      { header: 'VOLUME', width: 24 },
      { header: 'CAPACITY', width: 9 }
    ],
    actions: DELETE_ONLY,
    project: obj => [
      namespace(obj),
      name(obj),
      getString(obj, 'status', 'phase') ?? 'Unknown',
      getString(obj, 'spec', 'volumeName') ?? '',
      getString(obj, 'status', 'capacity', 'storage') ?? ''
    ],
    summarize: obj => phaseStatus(obj, ['Bound'])
  },
  namespaces: {
    name: 'namespaces',
    title: 'Namespaces',
    group: '',
    version: 'v1',
    plural: 'namespaces',
    namespaced: false,
    columns: [NAME, { header: 'STATUS', width: 12 }],
    actions: DELETE_ONLY,
    project: obj => [name(obj), getString(obj, 'status', 'phase') ?? 'Unknown'],
    summarize: obj => phaseStatus(obj, ['Active'])
  }
};

/** Tab order */
export const KIND_ORDER: readonly ResourceKindName[] = [
  'pods',
  'services',
  'nodes',
  'configmaps',
  'statefulsets',
  'replicasets',
  'deployments',
  'jobs',
  'daemonsets',
  'cronjobs',
  'secrets',
  'ingresses',
  'persistentvolumeclaims',
  'namespaces'
];

export function isResourceKindName(value: string): value is ResourceKindName {
  return KIND_ORDER.some(name => name === value);
}

/**
 * API path for a kind, optionally scoped to a namespace and/or a single object.
 */
export function resourcePath(kind: ResourceKind, options: { namespace?: string; name?: string } = {}): string {
  const base = kind.group ? `/apis/${kind.group}/${kind.version}` : `/api/${kind.version}`;
  const nsPart = kind.namespaced && options.namespace ? `/namespaces/${encodeURIComponent(options.namespace)}` : '';
  const namePart = options.name ? `/${encodeURIComponent(options.name)}` : '';
  return `${base}${nsPart}/${kind.plural}${namePart}`;
}

/**
 * Turn a raw API object into a ResourceObject.
 * Throws MalformedObjectError when the object cannot be identified.
 */
export function normalizeObject(kindName: ResourceKindName, raw: unknown, now: number = Date.now()): ResourceObject {
  if (!isRecord(raw)) {
    throw new MalformedObjectError(`${kindName}: object is not a JSON object`);
  }
  const kind = RESOURCE_KINDS[kindName];
  const objName = getString(raw, 'metadata', 'name');
  if (!objName) {
    throw new MalformedObjectError(`${kindName}: object has no metadata.name`);
  }
  const objNamespace = kind.namespaced ? getString(raw, 'metadata', 'namespace') : undefined;
  if (kind.namespaced && !objNamespace) {
    throw new MalformedObjectError(`${kindName}/${objName}: namespaced object has no metadata.namespace`);
  }
  const created = Date.parse(getString(raw, 'metadata', 'creationTimestamp') ?? '');
  const identity = { kind: kindName, namespace: objNamespace, name: objName };
  return {
    ...identity,
    key: identityKey(identity),
    revision: getString(raw, 'metadata', 'resourceVersion') ?? '',
    status: kind.summarize(raw),
    cells: kind.project(raw),
    createdAt: Number.isNaN(created) ? undefined : created,
    raw,
    updatedAt: now
  };
}
