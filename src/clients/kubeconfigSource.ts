import * as fs from 'fs';
import { KubeConfig } from '@kubernetes/client-node';
import { ConfigError } from '../errors';
import { log, LogLevel } from '../logging';
import type { ClusterContext, Credential } from '../types';

/**
 * Supplies the contexts the dashboard can connect to and the
 * connection parameters behind each of them.
 */
export interface ContextSource {
  listContexts(): ClusterContext[];
  getCredential(contextId: string): Credential | undefined;
  /** Context marked as current by the source, if any */
  getCurrentContext(): string | undefined;
}

function decodeBase64(value: string | undefined): string | undefined {
  return value ? Buffer.from(value, 'base64').toString('utf8') : undefined;
}

function readOptionalFile(filePath: string | undefined): string | undefined {
  if (!filePath) {
    return undefined;
  }
  try {
    return fs.readFileSync(filePath, 'utf8');
  } catch (err) {
    log(`Failed to read kubeconfig reference ${filePath}: ${err}`, LogLevel.WARN);
    return undefined;
  }
}

export class KubeconfigContextSource implements ContextSource {
  constructor(private readonly kc: KubeConfig) {}

  /**
   * Load from an explicit path, or from KUBECONFIG / ~/.kube/config.
   */
  public static load(configPath?: string): KubeconfigContextSource {
    const kc = new KubeConfig();
    try {
      if (configPath) {
        kc.loadFromFile(configPath);
      } else {
        kc.loadFromDefault();
      }
    } catch (error) {
      throw new ConfigError(`Failed to load Kubernetes configuration: ${error}`);
    }
    return new KubeconfigContextSource(kc);
  }

  public static fromString(content: string): KubeconfigContextSource {
    const kc = new KubeConfig();
    kc.loadFromString(content);
    return new KubeconfigContextSource(kc);
  }

  public listContexts(): ClusterContext[] {
    return this.kc.getContexts().map(ctx => ({
      id: ctx.name,
      cluster: ctx.cluster,
      server: this.kc.getCluster(ctx.cluster)?.server ?? '',
      user: ctx.user,
      namespace: ctx.namespace,
      status: 'idle'
    }));
  }

  public getCurrentContext(): string | undefined {
    const current = this.kc.getCurrentContext();
    return current ? current : undefined;
  }

  public getCredential(contextId: string): Credential | undefined {
    const ctx = this.kc.getContextObject(contextId);
    if (!ctx) {
      return undefined;
    }
    const cluster = this.kc.getCluster(ctx.cluster);
    if (!cluster) {
      return undefined;
    }
    const user = this.kc.getUser(ctx.user);
    if (user?.exec || user?.authProvider) {
      log(`Context '${contextId}' uses an auth plugin; only static credentials are sent`, LogLevel.WARN);
    }
    return {
      server: cluster.server,
      caData: decodeBase64(cluster.caData) ?? readOptionalFile(cluster.caFile),
      certData: decodeBase64(user?.certData) ?? readOptionalFile(user?.certFile),
      keyData: decodeBase64(user?.keyData) ?? readOptionalFile(user?.keyFile),
      token: user?.token,
      skipTlsVerify: cluster.skipTLSVerify === true
    };
  }
}
