/**
 * Health check command implementation
 */

import { startTimer, type Logger } from '@market-hours/logger';
import type { Command, CommandOptions, CommandResult } from './types.js';
import type { IContainer } from '../container/types.js';

export interface HealthCommandConfig {
  container: IContainer;
  logger: Logger;
}

export interface ServiceHealth {
  name: string;
  healthy: boolean;
  message?: string;
  details?: Record<string, unknown>;
  lastCheck?: string;
}

export interface HealthReport {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  services: ServiceHealth[];
  summary: { total: number; healthy: number; unhealthy: number };
  wiringGraph?: string;
}

/**
 * health command - checks health of all services
 */
export class HealthCommand implements Command {
  name = 'health';
  description = 'Check health status of all services';
  aliases = ['check'];

  private container: IContainer;
  private logger: Logger;

  constructor(config: HealthCommandConfig) {
    this.container = config.container;
    this.logger = config.logger;
  }

  async execute(args: string[], options: CommandOptions): Promise<CommandResult> {
    const timer = startTimer();

    try {
      this.logger.debug('Executing health command', { args, options });

      const healthChecks = await this.container.healthCheckAll();
      const services: ServiceHealth[] = [];

      for (const [name, status] of healthChecks) {
        services.push({
          name,
          healthy: status.healthy,
          message: status.message,
          details: status.details,
          lastCheck: status.lastCheck?.toISOString(),
        });
      }

      const healthy = services.filter((s) => s.healthy).length;
      const report: HealthReport = {
        status: healthy === services.length ? 'healthy' : 'unhealthy',
        timestamp: new Date().toISOString(),
        services,
        summary: { total: services.length, healthy, unhealthy: services.length - healthy },
        wiringGraph: options.verbose ? this.container.getWiringGraph() : undefined,
      };

      return {
        success: report.status === 'healthy',
        output: options.format === 'json' ? JSON.stringify(report, null, 2) : this.formatAsText(report),
        duration: timer.stop(),
        metadata: { servicesChecked: services.length },
      };
    } catch (error) {
      this.logger.error('Health command failed', { error });
      const err = error instanceof Error ? error : new Error(String(error));

      return {
        success: false,
        output: `Error: ${err.message}`,
        error: err,
        duration: timer.stop(),
      };
    }
  }

  private formatAsText(report: HealthReport): string {
    const lines: string[] = [];

    lines.push(`Health Status: ${report.status.toUpperCase()}`);
    lines.push(`Timestamp: ${report.timestamp}`);
    lines.push('');
    lines.push('Services:');

    for (const service of report.services) {
      const icon = service.healthy ? '✓' : '✗';
      lines.push(`  ${icon} ${service.name}: ${service.message ?? 'OK'}`);

      for (const [key, value] of Object.entries(service.details ?? {})) {
        lines.push(`      ${key}: ${JSON.stringify(value)}`);
      }
    }

    lines.push('');
    lines.push('Summary:');
    lines.push(`  Total Services: ${report.summary.total}`);
    lines.push(`  Healthy: ${report.summary.healthy}`);
    lines.push(`  Unhealthy: ${report.summary.unhealthy}`);

    if (report.wiringGraph) {
      lines.push('');
      lines.push('Service Wiring:');
      lines.push(report.wiringGraph);
    }

    return lines.join('\n');
  }
}
