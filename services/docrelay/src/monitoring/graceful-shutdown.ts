export interface CleanupTask {
  name: string;
  run: () => Promise<void>;
}

export interface ShutdownOptions {
  timeout: number; // milliseconds
  forceExit: boolean;
  /** Install SIGTERM/SIGINT and crash handlers on construction. */
  installSignalHandlers: boolean;
  exit: (code: number) => void;
}

/**
 * Runs cleanup tasks in registration order when the process is asked to stop.
 * A failing task is logged and the rest still run; the whole sequence is bounded by timeout.
 */
export class GracefulShutdown {
  private isShuttingDown: boolean = false;
  private shutdownTimeout: NodeJS.Timeout | null = null;
  private readonly options: ShutdownOptions;
  private readonly cleanupTasks: CleanupTask[] = [];
  private completion: Promise<void> | null = null;

  constructor(options: Partial<ShutdownOptions> = {}) {
    this.options = {
      timeout: 30000, // 30 seconds default
      forceExit: true,
      installSignalHandlers: true,
      exit: (code: number) => process.exit(code),
      ...options,
    };

    if (this.options.installSignalHandlers) {
      this.setupSignalHandlers();
    }
  }

  /**
   * Setup signal handlers for graceful shutdown
   */
  private setupSignalHandlers(): void {
    // Handle SIGTERM (Docker, Kubernetes)
    process.on('SIGTERM', () => {
      console.log('📡 Received SIGTERM signal');
      this.trigger('SIGTERM');
    });

    // Handle SIGINT (Ctrl+C)
    process.on('SIGINT', () => {
      console.log('📡 Received SIGINT signal');
      this.trigger('SIGINT');
    });

    process.on('uncaughtException', (error) => {
      console.error('❌ Uncaught Exception:', error);
      this.trigger('uncaughtException', error);
    });

    process.on('unhandledRejection', (reason) => {
      console.error('❌ Unhandled Rejection:', reason);
      this.trigger('unhandledRejection', reason);
    });
  }

  private trigger(signal: string, error?: unknown): void {
    this.shutdown(signal, error).catch((shutdownError) => {
      console.error('❌ Shutdown failed:', shutdownError);
    });
  }

  /**
   * Add a cleanup task to be executed during shutdown
   */
  addCleanupTask(name: string, run: () => Promise<void>): void {
    this.cleanupTasks.push({ name, run });
  }

  /**
   * Initiate graceful shutdown. Later calls return the shutdown already in progress.
   */
  shutdown(signal: string, error?: unknown): Promise<void> {
    if (this.completion) {
      console.log('Shutdown already in progress, ignoring signal:', signal);
      return this.completion;
    }
    this.isShuttingDown = true;
    this.completion = this.run(signal, error);
    return this.completion;
  }

  private async run(signal: string, error?: unknown): Promise<void> {
    console.log(`🛑 Initiating graceful shutdown due to: ${signal}`);

    // Set timeout for forced shutdown
    this.shutdownTimeout = setTimeout(() => {
      console.error('❌ Shutdown timeout reached, forcing exit');
      if (this.options.forceExit) {
        this.options.exit(1);
      }
    }, this.options.timeout);
    this.shutdownTimeout.unref();

    let failed = false;
    for (let i = 0; i < this.cleanupTasks.length; i++) {
      const task = this.cleanupTasks[i];
      if (!task) continue;
      try {
        console.log(`🧹 Cleanup ${i + 1}/${this.cleanupTasks.length}: ${task.name}`);
        await task.run();
      } catch (taskError) {
        failed = true;
        console.error(`❌ Cleanup task ${task.name} failed:`, taskError);
      }
    }

    if (this.shutdownTimeout) {
      clearTimeout(this.shutdownTimeout);
      this.shutdownTimeout = null;
    }

    console.log('✅ Graceful shutdown completed');
    if (this.options.forceExit) {
      this.options.exit(error !== undefined || failed ? 1 : 0);
    }
  }

  /**
   * Check if shutdown is in progress
   */
  isShuttingDownInProgress(): boolean {
    return this.isShuttingDown;
  }

  getShutdownStatus(): { isShuttingDown: boolean; timeout: number; tasks: string[] } {
    return {
      isShuttingDown: this.isShuttingDown,
      timeout: this.options.timeout,
      tasks: this.cleanupTasks.map((task) => task.name),
    };
  }
}
