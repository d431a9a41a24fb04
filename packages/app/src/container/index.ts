/**
 * Service registry: ordered initialization and reverse-order shutdown
 */

import { CrosslagError } from '@crosslag/contracts';
import { createSilentLogger, type Logger } from '@crosslag/logger';
import type { Service, HealthStatus } from './types.js';

/**
 * Holds the application's long-lived services.
 *
 * Services are initialized so that every dependency comes before its
 * dependents, and shut down in the reverse of the order they were
 * initialized in.
 *
 * @example
 * ```typescript
 * const registry = new ServiceRegistry(logger);
 * registry.register(liveService);
 * registry.register(httpServer); // depends on LiveCorrelationService
 * await registry.initializeAll();
 * // ...
 * await registry.shutdownAll();
 * ```
 */
export class ServiceRegistry {
  private readonly services = new Map<string, Service>();
  private initialized: Service[] = [];
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? createSilentLogger();
  }

  /**
   * Register a service
   *
   * @throws CrosslagError if a service with the same name is registered
   */
  register(service: Service): void {
    if (this.services.has(service.name)) {
      throw new CrosslagError('SERVICE_REGISTERED', `Service already registered: ${service.name}`, {
        service: service.name,
      });
    }
    this.services.set(service.name, service);
  }

  get(name: string): Service | undefined {
    return this.services.get(name);
  }

  has(name: string): boolean {
    return this.services.has(name);
  }

  /**
   * Services in initialization order.
   *
   * @throws CrosslagError on an unknown dependency or a dependency cycle
   */
  initializationOrder(): Service[] {
    const ordered: Service[] = [];
    const done = new Set<string>();
    const visiting = new Set<string>();

    const visit = (service: Service, path: readonly string[]): void => {
      if (done.has(service.name)) {
        return;
      }
      if (visiting.has(service.name)) {
        throw new CrosslagError('SERVICE_DEPENDENCY', `Dependency cycle: ${[...path, service.name].join(' -> ')}`, {
          service: service.name,
        });
      }

      visiting.add(service.name);
      for (const depName of service.dependencies) {
        const dep = this.services.get(depName);
        if (!dep) {
          throw new CrosslagError('SERVICE_DEPENDENCY', `${service.name} depends on unregistered service ${depName}`, {
            service: service.name,
            dependency: depName,
          });
        }
        visit(dep, [...path, service.name]);
      }
      visiting.delete(service.name);

      done.add(service.name);
      ordered.push(service);
    };

    for (const service of this.services.values()) {
      visit(service, []);
    }

    return ordered;
  }

  /**
   * Initialize all services in dependency order. A failure stops the
   * sequence and propagates; services initialized so far are still shut
   * down by {@link shutdownAll}.
   */
  async initializeAll(): Promise<void> {
    for (const service of this.initializationOrder()) {
      this.logger.debug('Initializing service', { service: service.name });
      await service.initialize();
      this.initialized.push(service);
    }

    this.logger.info('Services initialized', {
      services: this.initialized.map((service) => service.name),
    });
  }

  /**
   * Shutdown initialized services in reverse order. Errors are logged and
   * the remaining services are still shut down.
   */
  async shutdownAll(): Promise<void> {
    const services = [...this.initialized].reverse();
    this.initialized = [];

    for (const service of services) {
      try {
        await service.shutdown();
        this.logger.debug('Service shut down', { service: service.name });
      } catch (error) {
        this.logger.error('Service shutdown failed', {
          service: service.name,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }

  /**
   * Health of every registered service. A throwing health check counts as
   * unhealthy.
   */
  healthCheckAll(): Map<string, HealthStatus> {
    const results = new Map<string, HealthStatus>();

    for (const [name, service] of this.services) {
      try {
        results.set(name, { ...service.healthCheck(), lastCheck: new Date() });
      } catch (error) {
        results.set(name, {
          healthy: false,
          message: error instanceof Error ? error.message : String(error),
          lastCheck: new Date(),
        });
      }
    }

    return results;
  }
}

export type { Service, HealthStatus } from './types.js';
