// src/services/store/resourceStore.ts
import { log, LogLevel } from '../../logging';
import type { ApplyResult, ChangeRecord, ResourceKindName, ResourceObject } from '../../types';
import { Emitter } from '../../utils/emitter';
import { compareRevisions, maxRevision, parseRevision } from '../../utils/revision';

export interface StoreChange {
  context: string;
  kind: ResourceKindName;
  /** Number of keys written or removed; 0 for clears */
  changed: number;
}

interface Tombstone {
  revision: string;
  updatedAt: number;
}

interface MemoizedSnapshot {
  version: number;
  items: readonly ResourceObject[];
}

interface ContextCache {
  // kind -> key -> object
  kinds: Map<ResourceKindName, Map<string, ResourceObject>>;
  // kind/key -> tombstone
  tombstones: Map<string, Tombstone>;
  versions: Map<ResourceKindName, number>;
  snapshots: Map<ResourceKindName, MemoizedSnapshot>;
}

const EMPTY: readonly ResourceObject[] = Object.freeze([]);

function tombstoneKey(kind: ResourceKindName, key: string): string {
  return `${kind}|${key}`;
}

function byNameThenNamespace(a: ResourceObject, b: ResourceObject): number {
  if (a.name !== b.name) {
    return a.name < b.name ? -1 : 1;
  }
  const left = a.namespace ?? '';
  const right = b.namespace ?? '';
  return left < right ? -1 : left > right ? 1 : 0;
}

/**
 * Authoritative per-context cache of resource objects. Workers write into it,
 * the render loop reads point-in-time snapshots out of it.
 */
export class ResourceStore {
  private _onDidChange = new Emitter<StoreChange>();
  readonly onDidChange = this._onDidChange.event;

  // Structure: context -> kind -> key -> object
  private contexts: Map<string, ContextCache> = new Map();

  private cache(context: string): ContextCache {
    let entry = this.contexts.get(context);
    if (!entry) {
      entry = { kinds: new Map(), tombstones: new Map(), versions: new Map(), snapshots: new Map() };
      this.contexts.set(context, entry);
    }
    return entry;
  }

  private kindMap(context: string, kind: ResourceKindName): Map<string, ResourceObject> {
    const entry = this.cache(context);
    let map = entry.kinds.get(kind);
    if (!map) {
      map = new Map();
      entry.kinds.set(kind, map);
    }
    return map;
  }

  private bump(context: string, kind: ResourceKindName, changed: number): void {
    const entry = this.cache(context);
    entry.versions.set(kind, (entry.versions.get(kind) ?? 0) + 1);
    this._onDidChange.fire({ context, kind, changed });
  }

  /**
   * Apply one change record. Added/Modified must be strictly newer than both
   * the stored entry and any tombstone for the key; Deleted always wins.
   */
  public apply(record: ChangeRecord): ApplyResult {
    const entry = this.cache(record.context);
    const map = this.kindMap(record.context, record.kind);
    const tKey = tombstoneKey(record.kind, record.key);
    const tombstone = entry.tombstones.get(tKey);

    if (record.type === 'Deleted') {
      const revision = tombstone ? maxRevision(tombstone.revision, record.revision) : record.revision;
      entry.tombstones.set(tKey, { revision, updatedAt: record.updatedAt });
      map.delete(record.key);
      this.bump(record.context, record.kind, 1);
      return 'applied';
    }

    const incoming = record.object;
    if (tombstone && compareRevisions(incoming, tombstone) <= 0) {
      log(`Dropping ${record.type} ${record.kind}/${record.key}@${record.revision}: deleted at ${tombstone.revision}`, LogLevel.DEBUG);
      return 'droppedStale';
    }
    const existing = map.get(record.key);
    if (existing && compareRevisions(incoming, existing) <= 0) {
      return 'droppedStale';
    }
    if (tombstone) {
      entry.tombstones.delete(tKey);
    }
    map.set(record.key, incoming);
    this.bump(record.context, record.kind, 1);
    return 'applied';
  }

  /**
   * Replace every object of a kind with a fresh list result. Tombstones at or
   * below the list revision are dropped, since the list already reflects them;
   * listed objects at or below a surviving tombstone are left out.
   */
  public replaceKind(context: string, kind: ResourceKindName, objects: readonly ResourceObject[], revision: string): void {
    const entry = this.cache(context);
    const listRevision = parseRevision(revision);
    const prefix = `${kind}|`;
    for (const [tKey, tombstone] of Array.from(entry.tombstones)) {
      if (!tKey.startsWith(prefix)) {
        continue;
      }
      const tRevision = parseRevision(tombstone.revision);
      if (listRevision !== undefined && tRevision !== undefined && tRevision <= listRevision) {
        entry.tombstones.delete(tKey);
      }
    }

    const map = new Map<string, ResourceObject>();
    for (const obj of objects) {
      const tombstone = entry.tombstones.get(tombstoneKey(kind, obj.key));
      if (tombstone && compareRevisions(obj, tombstone) <= 0) {
        continue;
      }
      map.set(obj.key, obj);
    }
    entry.kinds.set(kind, map);
    this.bump(context, kind, map.size);
  }

  /**
   * Ordered, frozen, point-in-time view of one kind. Repeated calls without
   * intervening writes return the same array.
   */
  public snapshot(context: string, kind: ResourceKindName): readonly ResourceObject[] {
    const entry = this.contexts.get(context);
    const map = entry?.kinds.get(kind);
    if (!entry || !map || map.size === 0) {
      return EMPTY;
    }
    const version = entry.versions.get(kind) ?? 0;
    const memo = entry.snapshots.get(kind);
    if (memo && memo.version === version) {
      return memo.items;
    }
    const items = Object.freeze(Array.from(map.values()).sort(byNameThenNamespace));
    entry.snapshots.set(kind, { version, items });
    return items;
  }

  public get(context: string, kind: ResourceKindName, key: string): ResourceObject | undefined {
    return this.contexts.get(context)?.kinds.get(kind)?.get(key);
  }

  /**
   * Monotonic write counter for one kind; changes whenever its snapshot would.
   */
  public version(context: string, kind: ResourceKindName): number {
    return this.contexts.get(context)?.versions.get(kind) ?? 0;
  }

  /** Total number of cached objects for a context */
  public count(context: string): number {
    const entry = this.contexts.get(context);
    if (!entry) {
      return 0;
    }
    let total = 0;
    for (const map of entry.kinds.values()) {
      total += map.size;
    }
    return total;
  }

  public clearKind(context: string, kind: ResourceKindName): void {
    const entry = this.contexts.get(context);
    if (!entry) {
      return;
    }
    entry.kinds.delete(kind);
    const prefix = `${kind}|`;
    for (const tKey of Array.from(entry.tombstones.keys())) {
      if (tKey.startsWith(prefix)) {
        entry.tombstones.delete(tKey);
      }
    }
    entry.snapshots.delete(kind);
    this.bump(context, kind, 0);
  }

  /**
   * Drop every entry and tombstone of a context in one synchronous step.
   */
  public clearContext(context: string): void {
    const entry = this.contexts.get(context);
    if (!entry) {
      return;
    }
    const kinds = Array.from(entry.kinds.keys());
    this.contexts.delete(context);
    log(`Cleared cache for context ${context}`, LogLevel.DEBUG);
    for (const kind of kinds) {
      this._onDidChange.fire({ context, kind, changed: 0 });
    }
  }

  public dispose(): void {
    this.contexts.clear();
    this._onDidChange.dispose();
  }
}
