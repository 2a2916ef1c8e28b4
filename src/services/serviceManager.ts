// src/services/serviceManager.ts
import { log, LogLevel } from '../logging';

export interface ManagedService {
  dispose(): void | Promise<void>;
}

/**
 * Registry and lifecycle manager for the dashboard's services.
 * Services are disposed in reverse registration order, so consumers go
 * before the things they consume.
 */
export class ServiceManager {
  private services: Map<string, ManagedService> = new Map();

  /**
   * Register a service
   * @param name Service name
   * @param service Service instance
   */
  public registerService<T extends ManagedService>(name: string, service: T): T {
    if (this.services.has(name)) {
      throw new Error(`Service ${name} is already registered`);
    }
    this.services.set(name, service);
    return service;
  }

  /**
   * Get all registered service names
   */
  public getServiceNames(): string[] {
    return Array.from(this.services.keys());
  }

  /**
   * Dispose all services
   */
  public async dispose(): Promise<void> {
    log('Disposing service manager...', LogLevel.INFO);

    for (const [name, service] of Array.from(this.services.entries()).reverse()) {
      try {
        await service.dispose();
        log(`Service ${name} disposed`, LogLevel.DEBUG);
      } catch (error) {
        log(`Error disposing service ${name}: ${error}`, LogLevel.ERROR);
      }
    }

    this.services.clear();
    log('Service manager disposed', LogLevel.INFO);
  }
}
