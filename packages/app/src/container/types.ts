/**
 * Core types for dependency injection container
 */

import type { Logger } from '@market-hours/logger';
import type { ServiceToken } from './tokens.js';

/**
 * Base service interface that lifecycle-managed services implement
 */
export interface Service {
  readonly name: string;
  readonly dependencies: string[];
  initialize(): Promise<void>;
  shutdown(): Promise<void>;
  healthCheck(): HealthStatus | Promise<HealthStatus>;
}

/**
 * Health status for service health checks
 */
export interface HealthStatus {
  healthy: boolean;
  message?: string;
  details?: Record<string, unknown>;
  lastCheck?: Date;
}

/**
 * Service configuration with logger
 */
export interface ServiceConfig {
  logger: Logger;
}

/**
 * Dependency node for visualization
 */
export interface DependencyNode {
  name: string;
  token: symbol;
  dependencies: DependencyNode[];
  metadata?: Record<string, unknown>;
}

/**
 * Container interface for service registration and resolution
 */
export interface IContainer {
  register<T>(token: ServiceToken<T>, factory: ServiceFactory<T>, metadata?: RegistrationMetadata): void;
  resolve<T>(token: ServiceToken<T>): T;
  has(token: ServiceToken<unknown>): boolean;
  getDependencyGraph(): DependencyNode[];
  getWiringGraph(): string;
  initializeAll(): Promise<void>;
  shutdownAll(): Promise<void>;
  healthCheckAll(): Promise<Map<string, HealthStatus>>;
}

/**
 * Service factory function type
 */
export type ServiceFactory<T> = (container: IContainer) => T;

/**
 * Service registration metadata
 */
export interface ServiceRegistration {
  token: ServiceToken<unknown>;
  name: string;
  singleton: boolean;
  dependencies: ServiceToken<unknown>[];
}

/**
 * Optional registration settings
 */
export interface RegistrationMetadata {
  name?: string;
  /** Default true */
  singleton?: boolean;
  dependencies?: ServiceToken<unknown>[];
}
