import { loadavg } from 'node:os';
import type { ChangeNotifier } from '../services/change-notifier.js';
import type { SessionManager } from '../socket/session-manager.js';
import type { StoreGateway } from '../store/store-gateway.js';
import type { NotifierStats, SessionStats } from '../types/index.js';

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

export interface HealthMetrics {
  status: HealthStatus;
  timestamp: string;
  uptime: number;
  memory: {
    used: number;
    total: number;
    percentage: number;
  };
  cpu: {
    usage: number;
    loadAverage: number[];
  };
  store: {
    name: string;
    reachable: boolean;
    writes: number;
    reads: number;
    retries: number;
    failures: number;
  };
  feeds?: {
    names: string[];
    healthy: boolean;
  };
  notifier?: NotifierStats;
  sessions?: SessionStats;
  errors: string[];
}

export interface HealthMonitorOptions {
  gateway: StoreGateway;
  notifier?: ChangeNotifier;
  sessions?: SessionManager;
  memoryThreshold?: number;
}

/**
 * Aggregates store reachability, change feed health and session counts into one status.
 *
 * An unreachable store is degraded, not unhealthy: writes answer 503 and delivery goes
 * stale, but the process keeps serving and recovers on its own.
 */
export class HealthMonitor {
  private readonly gateway: StoreGateway;
  private readonly notifier?: ChangeNotifier;
  private readonly sessions?: SessionManager;
  private readonly startTime: number;
  private readonly memoryThreshold: number;

  constructor(options: HealthMonitorOptions) {
    this.gateway = options.gateway;
    this.notifier = options.notifier;
    this.sessions = options.sessions;
    this.memoryThreshold = options.memoryThreshold ?? 0.9; // 90% of heap
    this.startTime = Date.now();
  }

  /**
   * Get comprehensive health metrics
   */
  async getHealthMetrics(): Promise<HealthMetrics> {
    const memoryUsage = process.memoryUsage();
    const reachable = await this.gateway.ping();
    const gatewayStats = this.gateway.getStats();
    const feedsHealthy = this.notifier ? this.notifier.feedsHealthy() : true;

    const errors: string[] = [];
    const memoryPercentage = memoryUsage.heapUsed / memoryUsage.heapTotal;
    if (memoryPercentage > this.memoryThreshold) {
      errors.push(`High memory usage: ${(memoryPercentage * 100).toFixed(1)}%`);
    }
    if (!reachable) {
      errors.push(`Store ${this.gateway.storeName} unreachable`);
    }
    if (!feedsHealthy) {
      errors.push('Change feed is not delivering');
    }

    return {
      status: this.determineHealthStatus(errors),
      timestamp: new Date().toISOString(),
      uptime: Date.now() - this.startTime,
      memory: {
        used: memoryUsage.heapUsed,
        total: memoryUsage.heapTotal,
        percentage: memoryPercentage,
      },
      cpu: {
        usage: process.cpuUsage().user / 1000000, // Convert to seconds
        loadAverage: loadavg(),
      },
      store: {
        name: this.gateway.storeName,
        reachable,
        writes: gatewayStats.writes,
        reads: gatewayStats.reads,
        retries: gatewayStats.retries,
        failures: gatewayStats.failures,
      },
      ...(this.notifier && {
        feeds: { names: this.notifier.getFeedNames(), healthy: feedsHealthy },
        notifier: this.notifier.getStats(),
      }),
      ...(this.sessions && { sessions: this.sessions.getStats() }),
      errors,
    };
  }

  private determineHealthStatus(errors: string[]): HealthStatus {
    if (errors.length === 0) {
      return 'healthy';
    } else if (errors.length <= 2) {
      return 'degraded';
    } else {
      return 'unhealthy';
    }
  }

  /**
   * Ready means the store answers: writes would not fail with 503.
   */
  async isReady(): Promise<boolean> {
    return this.gateway.ping();
  }

  /**
   * Get memory usage in MB
   */
  getMemoryUsageMB(): { used: number; total: number; percentage: number } {
    const memoryUsage = process.memoryUsage();
    return {
      used: Math.round(memoryUsage.heapUsed / 1024 / 1024),
      total: Math.round(memoryUsage.heapTotal / 1024 / 1024),
      percentage: memoryUsage.heapUsed / memoryUsage.heapTotal,
    };
  }
}
