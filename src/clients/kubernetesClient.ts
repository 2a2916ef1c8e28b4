import { fetch, Agent } from 'undici';
import type { RequestInit, Response } from 'undici';
import {
  DashboardError,
  MalformedObjectError,
  NotFoundError,
  classifyHttpStatus,
  isTransient,
  toDashboardError
} from '../errors';
import { log, LogLevel } from '../logging';
import { KIND_ORDER, RESOURCE_KINDS, resourcePath } from '../resources/resourceKinds';
import type { Credential, ResourceIdentity, ResourceKindName } from '../types';
import { getNumber, getRecord, getString, isRecord } from '../utils/attributes';
import type { JsonObject } from '../utils/attributes';
import { DEFAULT_BACKOFF, computeBackoff, delay, isAbortError } from '../utils/backoff';
import type { BackoffOptions } from '../utils/backoff';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export type WatchEventType = 'ADDED' | 'MODIFIED' | 'DELETED' | 'BOOKMARK';

export interface WatchEvent {
  type: WatchEventType;
  object: unknown;
}

/**
 * Lazy, cancellable sequence of watch events. Iteration ends when the server
 * closes the stream or `cancel()` is called; transport failures are thrown
 * from the iterator.
 */
export interface WatchStream extends AsyncIterable<WatchEvent> {
  cancel(): void;
  readonly cancelled: boolean;
}

export interface ListOptions {
  namespace?: string;
  signal?: AbortSignal;
}

export interface ListResult {
  items: unknown[];
  revision: string;
}

/** What the watcher pool needs from the transport */
export interface ResourceApi {
  list(context: string, kind: ResourceKindName, options?: ListOptions): Promise<ListResult>;
  watch(context: string, kind: ResourceKindName, sinceRevision: string, options?: ListOptions): WatchStream;
}

/** What context activation needs from the transport */
export interface DiscoveryApi {
  discover(context: string): Promise<ResourceKindName[]>;
}

/** What the action executor needs from the transport */
export interface MutationApi {
  deleteResource(context: string, target: ResourceIdentity): Promise<void>;
  scaleResource(context: string, target: ResourceIdentity, replicas: number): Promise<void>;
  restartResource(context: string, target: ResourceIdentity): Promise<void>;
}

export interface KubernetesClientOptions {
  /** Attempts per call, including the first one */
  maxAttempts?: number;
  backoff?: BackoffOptions;
  /** Milliseconds to wait for response headers */
  requestTimeoutMs?: number;
  /** Page size for list calls */
  pageSize?: number;
  fetchImpl?: FetchLike;
}

interface Connection {
  credential: Credential;
  agent: Agent;
}

const WATCH_EVENT_TYPES = new Set<string>(['ADDED', 'MODIFIED', 'DELETED', 'BOOKMARK']);

function isWatchEventType(value: string): value is WatchEventType {
  return WATCH_EVENT_TYPES.has(value);
}

function statusMessage(body: string): string {
  try {
    const parsed: unknown = JSON.parse(body);
    if (isRecord(parsed)) {
      return getString(parsed, 'message') ?? body;
    }
  } catch {
    // not a Status object; use the raw body
  }
  return body.slice(0, 200);
}

/**
 * Thin, retrying transport over the Kubernetes API server.
 * Holds no resource state of its own.
 */
export class KubernetesClient implements ResourceApi, DiscoveryApi, MutationApi {
  private connections: Map<string, Connection> = new Map();
  private readonly maxAttempts: number;
  private readonly backoff: BackoffOptions;
  private readonly requestTimeoutMs: number;
  private readonly pageSize: number;
  private readonly fetchImpl: FetchLike;

  constructor(
    private readonly credentials: (contextId: string) => Credential | undefined,
    options: KubernetesClientOptions = {}
  ) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 4);
    this.backoff = options.backoff ?? DEFAULT_BACKOFF;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 30_000;
    this.pageSize = options.pageSize ?? 500;
    this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init));
  }

  private connection(contextId: string): Connection {
    const existing = this.connections.get(contextId);
    if (existing) {
      return existing;
    }
    const credential = this.credentials(contextId);
    if (!credential || !credential.server) {
      throw new NotFoundError(`No connection parameters for context '${contextId}'`);
    }
    const agent = new Agent({
      connect: {
        ca: credential.caData,
        cert: credential.certData,
        key: credential.keyData,
        rejectUnauthorized: !credential.skipTlsVerify
      },
      headersTimeout: this.requestTimeoutMs,
      // watch bodies stay open for as long as the server allows
      bodyTimeout: 0
    });
    const conn = { credential, agent };
    this.connections.set(contextId, conn);
    return conn;
  }

  private headers(credential: Credential, contentType?: string): Record<string, string> {
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (credential.token) {
      headers['Authorization'] = `Bearer ${credential.token}`;
    }
    if (contentType) {
      headers['Content-Type'] = contentType;
    }
    return headers;
  }

  /**
   * One HTTP exchange. Non-2xx statuses are turned into the error taxonomy,
   * network failures into ConnectionError.
   */
  private async send(
    contextId: string,
    method: string,
    pathname: string,
    options: { body?: unknown; contentType?: string; signal?: AbortSignal } = {}
  ): Promise<Response> {
    const { credential, agent } = this.connection(contextId);
    const url = `${credential.server.replace(/\/$/, '')}${pathname}`;
    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        method,
        headers: this.headers(credential, options.body !== undefined ? options.contentType ?? 'application/json' : undefined),
        body: options.body !== undefined ? JSON.stringify(options.body) : undefined,
        dispatcher: agent,
        signal: options.signal
      });
    } catch (err) {
      if (isAbortError(err, options.signal)) {
        throw err;
      }
      throw toDashboardError(err);
    }
    if (!res.ok) {
      const text = await res.text().catch(() => '');
      throw classifyHttpStatus(res.status, statusMessage(text));
    }
    return res;
  }

  private async requestJSON(
    contextId: string,
    method: string,
    pathname: string,
    options: { body?: unknown; contentType?: string; signal?: AbortSignal } = {}
  ): Promise<unknown> {
    const res = await this.send(contextId, method, pathname, options);
    if (res.status === 204) {
      return undefined;
    }
    try {
      return await res.json();
    } catch (err) {
      throw new MalformedObjectError(`Invalid JSON from ${pathname}: ${err}`);
    }
  }

  /**
   * Run `call`, retrying transient failures with exponential backoff.
   * Permanent failures and cancellation are rethrown immediately.
   */
  private async withRetry<T>(description: string, call: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    let attempt = 0;
    for (;;) {
      try {
        return await call();
      } catch (err) {
        if (isAbortError(err, signal) || !isTransient(err) || attempt + 1 >= this.maxAttempts) {
          throw err;
        }
        const wait = computeBackoff(attempt, this.backoff);
        log(`${description} failed (attempt ${attempt + 1}/${this.maxAttempts}): ${err}; retrying in ${wait}ms`, LogLevel.WARN);
        attempt += 1;
        await delay(wait, signal);
      }
    }
  }

  /**
   * List every object of a kind, following `continue` tokens.
   * The returned revision is the collection's resourceVersion.
   */
  public async list(contextId: string, kindName: ResourceKindName, options: ListOptions = {}): Promise<ListResult> {
    const kind = RESOURCE_KINDS[kindName];
    const base = resourcePath(kind, { namespace: options.namespace });
    const items: unknown[] = [];
    let revision = '';
    let token: string | undefined;
    do {
      const params = new URLSearchParams({ limit: String(this.pageSize) });
      if (token) {
        params.set('continue', token);
      }
      const page = await this.withRetry(
        `List ${kindName} in ${contextId}`,
        () => this.requestJSON(contextId, 'GET', `${base}?${params.toString()}`, { signal: options.signal }),
        options.signal
      );
      if (!isRecord(page) || !Array.isArray(page['items'])) {
        throw new MalformedObjectError(`List ${kindName} in ${contextId}: response has no items`);
      }
      items.push(...page['items']);
      revision = getString(page, 'metadata', 'resourceVersion') ?? revision;
      token = getString(page, 'metadata', 'continue') || undefined;
    } while (token);

    log(`Listed ${items.length} ${kindName} in ${contextId} at revision ${revision}`, LogLevel.DEBUG);
    return { items, revision };
  }

  public watch(
    contextId: string,
    kindName: ResourceKindName,
    sinceRevision: string,
    options: ListOptions = {}
  ): WatchStream {
    const kind = RESOURCE_KINDS[kindName];
    const params = new URLSearchParams({ watch: '1', allowWatchBookmarks: 'true' });
    if (sinceRevision) {
      params.set('resourceVersion', sinceRevision);
    }
    const pathname = `${resourcePath(kind, { namespace: options.namespace })}?${params.toString()}`;
    return new HttpWatchStream(
      `${kindName}@${contextId}`,
      signal =>
        this.withRetry(
          `Watch ${kindName} in ${contextId}`,
          () => this.send(contextId, 'GET', pathname, { signal }),
          signal
        ),
      options.signal
    );
  }

  /**
   * Which catalog kinds the cluster serves. Doubles as the connectivity
   * probe for context activation.
   */
  public async discover(contextId: string): Promise<ResourceKindName[]> {
    this.connection(contextId);
    const groupVersions = new Map<string, ResourceKindName[]>();
    for (const name of KIND_ORDER) {
      const kind = RESOURCE_KINDS[name];
      const gv = kind.group ? `/apis/${kind.group}/${kind.version}` : `/api/${kind.version}`;
      groupVersions.set(gv, [...(groupVersions.get(gv) ?? []), name]);
    }

    const available = new Set<ResourceKindName>();
    for (const [gv, kinds] of groupVersions) {
      let body: unknown;
      try {
        body = await this.withRetry(`Discover ${gv} in ${contextId}`, () => this.requestJSON(contextId, 'GET', gv));
      } catch (err) {
        if (err instanceof NotFoundError) {
          log(`API group ${gv} is not served by ${contextId}`, LogLevel.INFO);
          continue;
        }
        throw err;
      }
      const served = new Set<string>();
      const resources = isRecord(body) && Array.isArray(body['resources']) ? body['resources'] : [];
      for (const resource of resources) {
        if (isRecord(resource)) {
          const plural = getString(resource, 'name');
          const verbs = Array.isArray(resource['verbs']) ? resource['verbs'] : [];
          if (plural && verbs.includes('list')) {
            served.add(plural);
          }
        }
      }
      for (const name of kinds) {
        if (served.has(RESOURCE_KINDS[name].plural)) {
          available.add(name);
        }
      }
    }
    return KIND_ORDER.filter(name => available.has(name));
  }

  public async deleteResource(contextId: string, target: ResourceIdentity): Promise<void> {
    const kind = RESOURCE_KINDS[target.kind];
    await this.requestJSON(contextId, 'DELETE', resourcePath(kind, target), {
      body: { kind: 'DeleteOptions', apiVersion: 'v1', propagationPolicy: 'Background' }
    });
  }

  public async scaleResource(contextId: string, target: ResourceIdentity, replicas: number): Promise<void> {
    const kind = RESOURCE_KINDS[target.kind];
    const result = await this.requestJSON(contextId, 'PATCH', `${resourcePath(kind, target)}/scale`, {
      body: { spec: { replicas } },
      contentType: 'application/merge-patch+json'
    });
    if (isRecord(result)) {
      log(`Scaled ${target.kind}/${target.name} to ${getNumber(result, 'spec', 'replicas') ?? replicas}`, LogLevel.INFO);
    }
  }

  public async restartResource(contextId: string, target: ResourceIdentity): Promise<void> {
    const kind = RESOURCE_KINDS[target.kind];
    await this.requestJSON(contextId, 'PATCH', resourcePath(kind, target), {
      body: {
        spec: {
          template: {
            metadata: { annotations: { 'kubectl.kubernetes.io/restartedAt': new Date().toISOString() } }
          }
        }
      },
      contentType: 'application/merge-patch+json'
    });
  }

  /**
   * Drop pooled connections for a context, e.g. after switching away from it.
   */
  public forgetContext(contextId: string): void {
    const conn = this.connections.get(contextId);
    if (!conn) {
      return;
    }
    this.connections.delete(contextId);
    conn.agent.close().catch(err => log(`Error closing connection pool for ${contextId}: ${err}`, LogLevel.DEBUG));
  }

  public dispose(): void {
    for (const contextId of Array.from(this.connections.keys())) {
      this.forgetContext(contextId);
    }
  }
}

/**
 * Reads newline-delimited watch events from a streaming response.
 */
class HttpWatchStream implements WatchStream {
  private readonly controller = new AbortController();
  private cancelReader: (() => Promise<void>) | undefined;
  /** Drops the listener on the caller's signal, which outlives this stream */
  private readonly detach: () => void;

  constructor(
    private readonly origin: string,
    private readonly open: (signal: AbortSignal) => Promise<Response>,
    parentSignal?: AbortSignal
  ) {
    const onParentAbort = () => this.cancel();
    this.detach = () => parentSignal?.removeEventListener('abort', onParentAbort);
    if (parentSignal?.aborted) {
      this.controller.abort();
    } else {
      parentSignal?.addEventListener('abort', onParentAbort, { once: true });
    }
  }

  public get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  public cancel(): void {
    this.detach();
    if (this.cancelled) {
      return;
    }
    this.controller.abort();
    const cancelReader = this.cancelReader;
    this.cancelReader = undefined;
    cancelReader?.().catch(err => log(`Error cancelling watch ${this.origin}: ${err}`, LogLevel.DEBUG));
  }

  public async *[Symbol.asyncIterator](): AsyncGenerator<WatchEvent> {
    try {
      yield* this.readEvents();
    } finally {
      this.detach();
    }
  }

  private async *readEvents(): AsyncGenerator<WatchEvent> {
    const signal = this.controller.signal;
    let res: Response;
    try {
      res = await this.open(signal);
    } catch (err) {
      if (this.cancelled) {
        return;
      }
      throw err;
    }
    if (!res.body) {
      throw classifyHttpStatus(res.status, 'watch response has no body');
    }

    const reader = res.body.getReader();
    this.cancelReader = () => reader.cancel();
    const decoder = new TextDecoder();
    let buffer = '';
    try {
      while (!this.cancelled) {
        let chunk: { done: boolean; value?: Uint8Array };
        try {
          chunk = await reader.read();
        } catch (err) {
          if (this.cancelled) {
            return;
          }
          throw toDashboardError(err);
        }
        if (chunk.done) {
          log(`Watch stream ${this.origin} ended`, LogLevel.INFO);
          return;
        }
        buffer += decoder.decode(chunk.value, { stream: true });
        const lines = buffer.split('\n');
        buffer = lines.pop() ?? '';
        for (const line of lines) {
          if (this.cancelled) {
            return;
          }
          const event = this.parseLine(line);
          if (event) {
            yield event;
          }
        }
      }
    } finally {
      this.cancelReader = undefined;
      reader.releaseLock();
    }
  }

  private parseLine(line: string): WatchEvent | undefined {
    if (!line.trim()) {
      return undefined;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch (err) {
      log(`Skipping unparseable watch line from ${this.origin}: ${err}`, LogLevel.WARN);
      return undefined;
    }
    if (!isRecord(parsed)) {
      log(`Skipping non-object watch line from ${this.origin}`, LogLevel.WARN);
      return undefined;
    }
    const type = getString(parsed, 'type') ?? '';
    if (type === 'ERROR') {
      throw this.watchError(getRecord(parsed, 'object'));
    }
    if (!isWatchEventType(type)) {
      log(`Skipping watch event of unknown type '${type}' from ${this.origin}`, LogLevel.WARN);
      return undefined;
    }
    return { type, object: parsed['object'] };
  }

  private watchError(status: JsonObject | undefined): DashboardError {
    const code = status ? getNumber(status, 'code') : undefined;
    const message = (status && getString(status, 'message')) ?? 'watch error';
    return classifyHttpStatus(code ?? 500, message);
  }
}
