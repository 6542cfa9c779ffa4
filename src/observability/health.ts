/**
 * Health check endpoints
 *
 * - GET /health: liveness, 200 whenever the process is up
 * - GET /ready: readiness, 503 when any registered check fails
 */

import express, { Router, Request, Response } from 'express';
import type { ShutdownManager } from '../server.js';

// =============================================================================
// Types
// =============================================================================

export interface CheckResult {
  status: 'pass' | 'fail' | 'warn';
  message?: string;
  timestamp?: string;
}

export interface HealthCheckResponse {
  status: 'healthy' | 'unhealthy' | 'degraded';
  checks: Record<string, CheckResult>;
  version?: string;
  uptime?: number; // seconds
}

export type HealthCheckFn = () => Promise<CheckResult> | CheckResult;

// =============================================================================
// HealthChecker Class
// =============================================================================

/**
 * Registry of named readiness checks.
 *
 * A failing check makes the service unhealthy, a warning makes it
 * degraded. A check that throws counts as failing.
 */
export class HealthChecker {
  private readonly checks: Map<string, HealthCheckFn> = new Map();
  private readonly startTime: number = Date.now();
  private readonly version: string;

  constructor(options?: { version?: string }) {
    this.version = options?.version ?? '0.0.0';
  }

  registerCheck(name: string, check: HealthCheckFn): void {
    this.checks.set(name, check);
  }

  /**
   * Run all registered health checks
   */
  async runChecks(): Promise<HealthCheckResponse> {
    const checks: HealthCheckResponse['checks'] = {};
    let overallStatus: HealthCheckResponse['status'] = 'healthy';

    for (const [name, checkFn] of this.checks) {
      try {
        const result = await checkFn();
        checks[name] = {
          ...result,
          timestamp: result.timestamp ?? new Date().toISOString(),
        };

        if (result.status === 'fail') {
          overallStatus = 'unhealthy';
        } else if (result.status === 'warn' && overallStatus === 'healthy') {
          overallStatus = 'degraded';
        }
      } catch (error) {
        checks[name] = {
          status: 'fail',
          message: error instanceof Error ? error.message : 'Unknown error',
          timestamp: new Date().toISOString(),
        };
        overallStatus = 'unhealthy';
      }
    }

    return {
      status: overallStatus,
      checks,
      version: this.version,
      uptime: this.getUptime(),
    };
  }

  /**
   * Liveness: true whenever the process is running
   */
  getUptime(): number {
    return Math.floor((Date.now() - this.startTime) / 1000);
  }

  getVersion(): string {
    return this.version;
  }
}

// =============================================================================
// Built-in Checks
// =============================================================================

/**
 * Warn when the event loop takes longer than `threshold` ms to come round
 */
export function createEventLoopCheck(threshold: number = 100): HealthCheckFn {
  return async () => {
    const start = Date.now();
    await new Promise<void>((resolve) => {
      setImmediate(resolve);
    });
    const lag = Date.now() - start;

    return {
      status: lag > threshold ? 'warn' : 'pass',
      message: lag > threshold ? `Event loop lag high: ${lag}ms` : `Event loop lag: ${lag}ms`,
    };
  };
}

/**
 * Fail once shutdown has started so load balancers stop routing chats here
 */
export function createShutdownCheck(shutdownManager: ShutdownManager): HealthCheckFn {
  return () =>
    shutdownManager.isShuttingDown()
      ? { status: 'fail', message: 'Server is shutting down' }
      : { status: 'pass', message: 'Server is running' };
}

/**
 * Report the classroom backend the tools will call.
 * The backend is not contacted; readiness does not depend on it.
 */
export function createBackendConfigCheck(backendUrl: string): HealthCheckFn {
  return () => {
    try {
      const url = new URL(backendUrl);
      return { status: 'pass', message: `Classroom API: ${url.origin}` };
    } catch {
      return { status: 'fail', message: `Invalid classroom API URL: ${backendUrl}` };
    }
  };
}

// =============================================================================
// Express Middleware
// =============================================================================

/**
 * Router serving GET /health and GET /ready
 */
export function healthMiddleware(healthChecker: HealthChecker): Router {
  const router = express.Router();

  router.get('/health', (_req: Request, res: Response) => {
    const response: HealthCheckResponse = {
      status: 'healthy',
      checks: {},
      version: healthChecker.getVersion(),
      uptime: healthChecker.getUptime(),
    };
    res.status(200).json(response);
  });

  router.get('/ready', async (_req: Request, res: Response) => {
    const response = await healthChecker.runChecks();
    res.status(response.status === 'unhealthy' ? 503 : 200).json(response);
  });

  return router;
}
