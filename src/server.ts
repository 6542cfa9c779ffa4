/**
 * Classroom agent server with graceful shutdown
 *
 * Implements:
 * - Component wiring (backend client, chat API, health, HTTP)
 * - Signal handling (SIGTERM/SIGINT)
 * - In-flight chat request tracking
 * - Graceful shutdown with timeout
 */

import type { LanguageModelV1 } from 'ai';
import type { Config } from './config.js';
import { HttpTransport } from './transport/http.js';
import { createApiRouter } from './api/router.js';
import { ClassroomApiClient } from './tools/classroom-client.js';
import {
  HealthChecker,
  createBackendConfigCheck,
  createEventLoopCheck,
  createShutdownCheck,
  healthMiddleware,
} from './observability/health.js';
import { StructuredLogger, serializeError } from './observability/logger.js';

export const SERVICE_VERSION = '1.0.0';

// =============================================================================
// Types
// =============================================================================

export interface ShutdownManagerOptions {
  /**
   * Timeout for waiting on in-flight requests, in milliseconds
   */
  timeoutMs: number;

  /**
   * Optional callback to run during shutdown
   */
  onShutdown?: () => Promise<void>;

  /**
   * Whether to call process.exit() after shutdown completes.
   * Default: true (for CLI usage). Set to false for testing.
   */
  exitProcess?: boolean;

  logger?: StructuredLogger;
}

export interface ClassroomAgentServerOptions {
  config: Config;
  model: LanguageModelV1;
  /** fetch used for backend calls (default: global fetch) */
  fetch?: typeof fetch;
  logger?: StructuredLogger;
  /**
   * Whether to call process.exit() after shutdown completes.
   * Default: true. Set to false for testing.
   */
  exitProcess?: boolean;
}

// =============================================================================
// ShutdownManager Class
// =============================================================================

/**
 * Manages graceful shutdown of the agent server
 *
 * @example
 * ```typescript
 * const shutdownManager = new ShutdownManager({ timeoutMs: 30000 });
 * shutdownManager.register('http', async () => httpTransport.close());
 *
 * shutdownManager.trackRequest('req-123');
 * // ... run the agent ...
 * shutdownManager.completeRequest('req-123');
 *
 * shutdownManager.installSignalHandlers();
 * ```
 */
export class ShutdownManager {
  private readonly timeoutMs: number;
  private readonly onShutdown: (() => Promise<void>) | undefined;
  private readonly exitProcess: boolean;
  private readonly logger: StructuredLogger;
  private readonly cleanupHandlers: Map<string, () => Promise<void>> = new Map();
  private readonly inFlightRequests: Set<string> = new Set();

  private shuttingDown: boolean = false;
  private shutdownPromise: Promise<void> | null = null;
  private signalHandlersInstalled: boolean = false;

  private readonly boundSigtermHandler: () => void;
  private readonly boundSigintHandler: () => void;

  constructor(options: ShutdownManagerOptions) {
    this.timeoutMs = options.timeoutMs;
    this.onShutdown = options.onShutdown;
    this.exitProcess = options.exitProcess ?? true;
    this.logger = options.logger ?? new StructuredLogger({ name: 'classroom-agent.shutdown' });

    this.boundSigtermHandler = () => {
      void this.initiateShutdown('SIGTERM');
    };
    this.boundSigintHandler = () => {
      void this.initiateShutdown('SIGINT');
    };
  }

  // ===========================================================================
  // Public API
  // ===========================================================================

  /**
   * Register a component for cleanup during shutdown.
   * Components are cleaned up in the order they were registered.
   */
  register(name: string, cleanup: () => Promise<void>): void {
    if (this.shuttingDown) {
      throw new Error('Cannot register cleanup handlers during shutdown');
    }
    this.cleanupHandlers.set(name, cleanup);
  }

  /**
   * Track an in-flight request. Ignored once shutdown has started.
   */
  trackRequest(requestId: string): void {
    if (!this.shuttingDown) {
      this.inFlightRequests.add(requestId);
    }
  }

  completeRequest(requestId: string): void {
    this.inFlightRequests.delete(requestId);
  }

  isShuttingDown(): boolean {
    return this.shuttingDown;
  }

  installSignalHandlers(): void {
    if (this.signalHandlersInstalled) {
      return;
    }

    process.on('SIGTERM', this.boundSigtermHandler);
    process.on('SIGINT', this.boundSigintHandler);
    this.signalHandlersInstalled = true;
  }

  removeSignalHandlers(): void {
    if (!this.signalHandlersInstalled) {
      return;
    }

    process.removeListener('SIGTERM', this.boundSigtermHandler);
    process.removeListener('SIGINT', this.boundSigintHandler);
    this.signalHandlersInstalled = false;
  }

  /**
   * Initiate graceful shutdown.
   *
   * 1. Mark as shutting down (new chats get 503)
   * 2. Wait for in-flight requests (with timeout)
   * 3. Run cleanup handlers in order
   * 4. Run onShutdown
   *
   * Idempotent: later calls return the first call's promise.
   */
  async initiateShutdown(signal: string = 'manual'): Promise<void> {
    if (this.shutdownPromise) {
      return this.shutdownPromise;
    }

    this.shuttingDown = true;
    this.shutdownPromise = this.performShutdown(signal);

    try {
      await this.shutdownPromise;
    } finally {
      this.removeSignalHandlers();
    }
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private async performShutdown(signal: string): Promise<void> {
    this.logger.notice('Shutdown initiated', { signal });

    await this.waitForInFlightRequests();
    await this.runCleanupHandlers();

    if (this.onShutdown) {
      try {
        await this.onShutdown();
      } catch (error) {
        this.logger.error('onShutdown callback failed', { error: serializeError(error) });
      }
    }

    this.logger.notice('Shutdown complete');

    // Keep-alive sockets can hold the event loop open
    if (this.exitProcess) {
      process.exit(0);
    }
  }

  private async waitForInFlightRequests(): Promise<void> {
    if (this.inFlightRequests.size === 0) {
      return;
    }

    this.logger.info('Waiting for in-flight requests', { count: this.inFlightRequests.size });

    const startTime = Date.now();

    return new Promise<void>((resolve) => {
      const checkInterval = setInterval(() => {
        if (this.inFlightRequests.size === 0) {
          clearInterval(checkInterval);
          resolve();
          return;
        }

        if (Date.now() - startTime >= this.timeoutMs) {
          clearInterval(checkInterval);
          this.logger.warning('Timed out waiting for in-flight requests', {
            pending: this.inFlightRequests.size,
          });
          resolve();
        }
      }, 100);
    });
  }

  /**
   * A failing handler is logged and the rest still run
   */
  private async runCleanupHandlers(): Promise<void> {
    for (const [name, cleanup] of this.cleanupHandlers) {
      try {
        this.logger.debug('Cleaning up', { component: name });
        await cleanup();
      } catch (error) {
        this.logger.error('Cleanup failed', { component: name, error: serializeError(error) });
      }
    }
  }
}

// =============================================================================
// ClassroomAgentServer Class
// =============================================================================

/**
 * Wires the chat API, health endpoints and HTTP transport from config
 *
 * @example
 * ```typescript
 * const model = await createLLMProviderAsync(config.llm);
 * const server = new ClassroomAgentServer({ config, model });
 * await server.start();
 * ```
 */
export class ClassroomAgentServer {
  private readonly config: Config;
  private readonly logger: StructuredLogger;
  private readonly shutdownManager: ShutdownManager;
  private readonly healthChecker: HealthChecker;
  private readonly httpTransport: HttpTransport;
  private readonly classroomClient: ClassroomApiClient;
  private started: boolean = false;

  constructor(options: ClassroomAgentServerOptions) {
    this.config = options.config;
    this.logger =
      options.logger ?? new StructuredLogger({ name: 'classroom-agent', minLevel: options.config.logLevel });

    this.shutdownManager = new ShutdownManager({
      timeoutMs: this.config.shutdownTimeoutMs,
      exitProcess: options.exitProcess ?? true,
      logger: this.logger.child('shutdown'),
    });

    this.classroomClient = new ClassroomApiClient({
      baseUrl: this.config.backendUrl,
      logger: this.logger.child('classroom-api'),
      ...(options.fetch ? { fetch: options.fetch } : {}),
    });

    this.healthChecker = new HealthChecker({ version: SERVICE_VERSION });
    this.healthChecker.registerCheck('event_loop', createEventLoopCheck());
    this.healthChecker.registerCheck('shutdown', createShutdownCheck(this.shutdownManager));
    this.healthChecker.registerCheck('classroom_api', createBackendConfigCheck(this.config.backendUrl));

    const apiRouter = createApiRouter({
      model: options.model,
      classroomClient: this.classroomClient,
      requireAuthorization: this.config.requireAuthorization,
      maxSteps: this.config.maxSteps,
      tracker: this.shutdownManager,
      logger: this.logger.child('chat'),
    });

    this.httpTransport = new HttpTransport({
      port: this.config.port,
      host: this.config.host,
      allowedOrigins: this.config.allowedOrigins,
      routers: [healthMiddleware(this.healthChecker), apiRouter],
      logger: this.logger.child('http'),
    });
  }

  /**
   * Start listening and install signal handlers.
   *
   * A server is started once: after stop() it cannot listen again, and a
   * start() that fails to bind leaves nothing registered for shutdown.
   */
  async start(): Promise<void> {
    if (this.shutdownManager.isShuttingDown()) {
      throw new Error('Server has been stopped and cannot be restarted');
    }
    if (this.started) {
      return;
    }

    await this.httpTransport.start();
    this.shutdownManager.register('http', async () => {
      await this.httpTransport.close();
    });
    this.shutdownManager.installSignalHandlers();
    this.started = true;

    this.logger.info('Classroom agent started', {
      port: this.httpTransport.getPort(),
      backendUrl: this.config.backendUrl,
      provider: this.config.llm.provider,
    });
  }

  async stop(): Promise<void> {
    await this.shutdownManager.initiateShutdown('stop');
  }

  getPort(): number {
    return this.httpTransport.getPort();
  }

  getShutdownManager(): ShutdownManager {
    return this.shutdownManager;
  }

  getHttpTransport(): HttpTransport {
    return this.httpTransport;
  }
}
