/**
 * SQLite connection as a lifecycle-managed service
 */

import { connect, type DbConnection } from '@market-hours/db-simple';
import type { Logger } from '@market-hours/logger';
import type { HealthStatus, Service } from '../../container/types.js';

export interface DatabaseServiceConfig {
  /** SQLite file path, or ':memory:' */
  path: string;
  logger: Logger;
}

export class DatabaseService implements Service {
  readonly name = 'DatabaseService';
  readonly dependencies: string[] = [];

  private readonly path: string;
  private readonly logger: Logger;
  private db: DbConnection | null = null;

  constructor(config: DatabaseServiceConfig) {
    this.path = config.path;
    this.logger = config.logger;
  }

  /**
   * Open connection
   *
   * @throws Error if the service has not been initialized
   */
  get connection(): DbConnection {
    if (!this.db) {
      throw new Error('DatabaseService not initialized');
    }
    return this.db;
  }

  async initialize(): Promise<void> {
    if (this.db) return;
    this.db = await connect(`sqlite:${this.path}`, { logger: this.logger });
    this.logger.info('Database ready', { path: this.path });
  }

  async shutdown(): Promise<void> {
    if (!this.db) return;
    const db = this.db;
    this.db = null;
    await db.close();
    this.logger.info('Database closed', { path: this.path });
  }

  async healthCheck(): Promise<HealthStatus> {
    if (!this.db) {
      return { healthy: false, message: 'Not connected', details: { path: this.path } };
    }
    try {
      await this.db.query('SELECT 1 AS ok');
      return { healthy: true, message: 'Connected', details: { path: this.path } };
    } catch (error) {
      return {
        healthy: false,
        message: `Query failed: ${error instanceof Error ? error.message : String(error)}`,
        details: { path: this.path },
      };
    }
  }
}
