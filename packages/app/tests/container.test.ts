/**
 * Tests for DI Container
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { Container, ServiceToken, isService } from '../src/container/index.js';
import type { Service, HealthStatus } from '../src/container/types.js';

class MockService implements Service {
  readonly name: string = 'MockService';
  readonly dependencies: string[] = [];

  initialized = false;
  shutdownCalled = false;

  constructor(private readonly events: string[] = []) {}

  async initialize(): Promise<void> {
    this.events.push('init:MockService');
    this.initialized = true;
  }

  async shutdown(): Promise<void> {
    this.events.push('shutdown:MockService');
    this.shutdownCalled = true;
  }

  healthCheck(): HealthStatus {
    return { healthy: true, message: 'Mock service is healthy' };
  }
}

class DependentService implements Service {
  readonly name = 'DependentService';
  readonly dependencies = ['MockService'];

  initialized = false;

  constructor(
    private mockService: MockService,
    private readonly events: string[] = []
  ) {}

  async initialize(): Promise<void> {
    if (!this.mockService.initialized) {
      throw new Error('Dependency not initialized');
    }
    this.events.push('init:DependentService');
    this.initialized = true;
  }

  async shutdown(): Promise<void> {
    this.events.push('shutdown:DependentService');
  }

  async healthCheck(): Promise<HealthStatus> {
    return { healthy: false, message: 'Degraded', details: { reason: 'test' } };
  }
}

class FailingShutdownService extends MockService {
  override readonly name = 'FailingShutdown';

  override async shutdown(): Promise<void> {
    throw new Error('close failed');
  }

  override healthCheck(): HealthStatus {
    throw new Error('health check exploded');
  }
}

const NUMBER = new ServiceToken<number>('Number');
const LABEL = new ServiceToken<string>('Label');
const MOCK = new ServiceToken<MockService>('Mock');
const DEPENDENT = new ServiceToken<DependentService>('Dependent');

describe('Container', () => {
  let container: Container;
  let shutdownErrors: string[];

  beforeEach(() => {
    shutdownErrors = [];
    container = new Container({
      onShutdownError: (name, error) => {
        shutdownErrors.push(`${name}: ${error instanceof Error ? error.message : String(error)}`);
      },
    });
  });

  describe('Service Registration', () => {
    it('should register a service', () => {
      container.register(LABEL, () => 'logger');
      expect(container.has(LABEL)).toBe(true);
    });

    it('should not have unregistered service', () => {
      expect(container.has(LABEL)).toBe(false);
    });

    it('keeps registrations of separate containers apart', () => {
      const other = new Container();
      container.register(LABEL, () => 'first');
      other.register(LABEL, () => 'second');

      expect(container.resolve(LABEL)).toBe('first');
      expect(other.resolve(LABEL)).toBe('second');
    });
  });

  describe('Service Resolution', () => {
    it('should resolve a registered service', () => {
      container.register(LABEL, () => 'logger');
      expect(container.resolve(LABEL)).toBe('logger');
    });

    it('should throw error for unregistered service', () => {
      expect(() => container.resolve(LABEL)).toThrow('Service not registered: Label');
    });

    it('should return singleton instance', () => {
      let counter = 0;
      container.register(NUMBER, () => ++counter);

      expect(container.resolve(NUMBER)).toBe(1);
      expect(container.resolve(NUMBER)).toBe(1);
      expect(counter).toBe(1);
    });

    it('creates a new instance per resolve for transient registrations', () => {
      let counter = 0;
      container.register(NUMBER, () => ++counter, { singleton: false });

      expect(container.resolve(NUMBER)).toBe(1);
      expect(container.resolve(NUMBER)).toBe(2);
    });

    it('passes the container to factories', () => {
      container.register(NUMBER, () => 41);
      container.register(LABEL, (c) => `answer=${c.resolve(NUMBER) + 1}`);

      expect(container.resolve(LABEL)).toBe('answer=42');
    });
  });

  describe('Dependency Graph', () => {
    it('should include dependency relationships', () => {
      container.register(NUMBER, () => 1, { name: 'Number' });
      container.register(LABEL, () => 'x', { name: 'Label', dependencies: [NUMBER] });

      const graph = container.getDependencyGraph();

      expect(graph.map((n) => n.name)).toEqual(['Number', 'Label']);
      expect(graph[1]?.dependencies.map((d) => d.name)).toEqual(['Number']);
      expect(graph[1]?.dependencies[0]?.metadata).toEqual({ circular: true });
    });

    it('should render wiring graph as ASCII', () => {
      container.register(NUMBER, () => 1);

      expect(container.getWiringGraph()).toBe('[App Container]\n  └─> [Number] ○');
    });
  });

  describe('Service Lifecycle', () => {
    it('should initialize services in dependency order', async () => {
      const events: string[] = [];
      const mockService = new MockService(events);

      // registered dependent-first to prove ordering comes from dependencies
      container.register(DEPENDENT, () => new DependentService(mockService, events));
      container.register(MOCK, () => mockService);

      await container.initializeAll();

      expect(events).toEqual(['init:MockService', 'init:DependentService']);
    });

    it('should ignore values that are not services', async () => {
      container.register(LABEL, () => 'simple-logger');
      await expect(container.initializeAll()).resolves.toBeUndefined();
    });

    it('should shut down dependents first', async () => {
      const events: string[] = [];
      const mockService = new MockService(events);
      container.register(MOCK, () => mockService);
      container.register(DEPENDENT, () => new DependentService(mockService, events));

      await container.initializeAll();
      events.length = 0;
      await container.shutdownAll();

      expect(events).toEqual(['shutdown:DependentService', 'shutdown:MockService']);
    });

    it('reports shutdown errors and keeps going', async () => {
      const failing = new FailingShutdownService();
      const mock = new MockService();
      container.register(new ServiceToken<FailingShutdownService>('Failing'), () => failing);
      container.register(MOCK, () => mock);

      await container.initializeAll();
      await container.shutdownAll();

      expect(shutdownErrors).toEqual(['FailingShutdown: close failed']);
      expect(mock.shutdownCalled).toBe(true);
    });
  });

  describe('Health Checks', () => {
    it('collects sync and async health of initialized services', async () => {
      const mockService = new MockService();
      container.register(MOCK, () => mockService);
      container.register(DEPENDENT, () => new DependentService(mockService));

      await container.initializeAll();
      const health = await container.healthCheckAll();

      expect(health.get('MockService')?.healthy).toBe(true);
      expect(health.get('DependentService')).toMatchObject({
        healthy: false,
        message: 'Degraded',
        details: { reason: 'test' },
      });
      expect(health.get('DependentService')?.lastCheck).toBeInstanceOf(Date);
    });

    it('turns a throwing health check into an unhealthy status', async () => {
      container.register(new ServiceToken<FailingShutdownService>('Failing'), () => new FailingShutdownService());
      await container.initializeAll();

      const health = await container.healthCheckAll();

      expect(health.get('FailingShutdown')).toMatchObject({
        healthy: false,
        message: 'Health check failed: health check exploded',
      });
    });

    it('skips services that were never initialized', async () => {
      container.register(MOCK, () => new MockService());
      expect((await container.healthCheckAll()).size).toBe(0);
    });
  });

  describe('isService', () => {
    it('recognizes the lifecycle shape', () => {
      expect(isService(new MockService())).toBe(true);
      expect(isService({ name: 'x' })).toBe(false);
      expect(isService(null)).toBe(false);
    });
  });
});
