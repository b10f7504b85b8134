/**
 * Manual dependency injection container implementation
 */

import type {
  IContainer,
  Service,
  ServiceFactory,
  ServiceRegistration,
  RegistrationMetadata,
  DependencyNode,
  HealthStatus,
} from './types.js';
import type { ServiceToken } from './tokens.js';

export interface ContainerOptions {
  /** Receives errors thrown by a service's shutdown */
  onShutdownError?: (serviceName: string, error: unknown) => void;
}

/**
 * Simple dependency injection container
 */
export class Container implements IContainer {
  private registrations = new Map<symbol, ServiceRegistration>();
  private initialized = new Set<symbol>();
  private readonly onShutdownError: (serviceName: string, error: unknown) => void;

  constructor(options: ContainerOptions = {}) {
    this.onShutdownError =
      options.onShutdownError ??
      ((name, error) => {
        console.error(`Error shutting down service ${name}:`, error);
      });
  }

  /**
   * Register a service factory
   */
  register<T>(token: ServiceToken<T>, factory: ServiceFactory<T>, metadata?: RegistrationMetadata): void {
    token.bind(this, factory);
    this.registrations.set(token.id, {
      token,
      name: metadata?.name ?? token.name,
      singleton: metadata?.singleton !== false,
      dependencies: metadata?.dependencies ?? [],
    });
  }

  /**
   * Resolve a service instance
   */
  resolve<T>(token: ServiceToken<T>): T {
    const cached = token.cached(this);
    if (cached.hit) {
      return cached.value;
    }

    const instance = token.create(this);

    if (this.registrations.get(token.id)?.singleton) {
      token.cache(this, instance);
    }

    return instance;
  }

  /**
   * Check if service is registered
   */
  has(token: ServiceToken<unknown>): boolean {
    return token.isBound(this);
  }

  /**
   * Get dependency graph for visualization
   */
  getDependencyGraph(): DependencyNode[] {
    const visited = new Set<symbol>();
    const nodes: DependencyNode[] = [];

    const buildNode = (token: ServiceToken<unknown>): DependencyNode => {
      if (visited.has(token.id)) {
        return {
          name: token.name,
          token: token.id,
          dependencies: [],
          metadata: { circular: true },
        };
      }

      visited.add(token.id);
      const registration = this.registrations.get(token.id);

      return {
        name: registration?.name ?? token.name,
        token: token.id,
        dependencies: (registration?.dependencies ?? []).map((dep) => buildNode(dep)),
        metadata: {
          singleton: registration?.singleton,
          initialized: this.initialized.has(token.id),
        },
      };
    };

    for (const registration of this.registrations.values()) {
      if (!visited.has(registration.token.id)) {
        nodes.push(buildNode(registration.token));
      }
    }

    return nodes;
  }

  /**
   * Initialize all registered services, dependencies first
   */
  async initializeAll(): Promise<void> {
    const services = this.collectServices();
    const done = new Set<string>();

    const initialize = async (id: symbol, service: Service): Promise<void> => {
      if (done.has(service.name)) {
        return;
      }
      done.add(service.name);

      for (const depName of service.dependencies) {
        const dep = services.find(([, s]) => s.name === depName);
        if (dep) {
          await initialize(dep[0], dep[1]);
        }
      }

      await service.initialize();
      this.initialized.add(id);
    };

    for (const [id, service] of services) {
      await initialize(id, service);
    }
  }

  /**
   * Shutdown initialized services, dependents first
   */
  async shutdownAll(): Promise<void> {
    const services = this.collectServices().filter(([id]) => this.initialized.has(id));
    const done = new Set<string>();

    const shutdownService = async (service: Service): Promise<void> => {
      if (done.has(service.name)) {
        return;
      }
      done.add(service.name);

      for (const [, dependent] of services) {
        if (dependent.dependencies.includes(service.name)) {
          await shutdownService(dependent);
        }
      }

      // Keep going so the remaining services still shut down
      try {
        await service.shutdown();
      } catch (error) {
        this.onShutdownError(service.name, error);
      }
    };

    for (const [, service] of services) {
      await shutdownService(service);
    }

    this.initialized.clear();
  }

  /**
   * Health check all initialized services
   */
  async healthCheckAll(): Promise<Map<string, HealthStatus>> {
    const results = new Map<string, HealthStatus>();

    for (const [id, service] of this.collectServices()) {
      if (!this.initialized.has(id)) continue;
      try {
        const status = await service.healthCheck();
        results.set(service.name, { ...status, lastCheck: new Date() });
      } catch (error) {
        results.set(service.name, {
          healthy: false,
          message: `Health check failed: ${error instanceof Error ? error.message : String(error)}`,
          lastCheck: new Date(),
        });
      }
    }

    return results;
  }

  /**
   * Get wiring graph as ASCII art
   */
  getWiringGraph(): string {
    const nodes = this.getDependencyGraph();
    const lines: string[] = ['[App Container]'];

    const renderNode = (node: DependencyNode, prefix: string, isLast: boolean) => {
      const connector = isLast ? '└─> ' : '├─> ';
      const status = node.metadata?.['initialized'] ? '✓' : '○';
      lines.push(`${prefix}${connector}[${node.name}] ${status}`);

      const childPrefix = prefix + (isLast ? '      ' : '│     ');
      node.dependencies.forEach((dep, i) => {
        renderNode(dep, childPrefix, i === node.dependencies.length - 1);
      });
    };

    nodes.forEach((node, i) => {
      renderNode(node, '  ', i === nodes.length - 1);
    });

    return lines.join('\n');
  }

  private collectServices(): Array<[symbol, Service]> {
    const services: Array<[symbol, Service]> = [];
    for (const registration of this.registrations.values()) {
      const instance: unknown = this.resolve(registration.token);
      if (isService(instance)) {
        services.push([registration.token.id, instance]);
      }
    }
    return services;
  }
}

/**
 * Type guard for Service interface
 */
export function isService(obj: unknown): obj is Service {
  if (typeof obj !== 'object' || obj === null) {
    return false;
  }
  return (
    'name' in obj &&
    typeof obj.name === 'string' &&
    'dependencies' in obj &&
    Array.isArray(obj.dependencies) &&
    'initialize' in obj &&
    typeof obj.initialize === 'function' &&
    'shutdown' in obj &&
    typeof obj.shutdown === 'function' &&
    'healthCheck' in obj &&
    typeof obj.healthCheck === 'function'
  );
}

// Re-export types
export * from './types.js';
export * from './tokens.js';
