/**
 * Shutdown Coordinator
 *
 * Runs the registered close handlers (HTTP server, database pool) once,
 * in parallel, each bounded by its own timeout.
 */

import type { Logger } from 'pino';
import baseLogger from './logger.js';

// ============================================
// TYPE DEFINITIONS
// ============================================

interface ShutdownHandler {
    name: string;
    handler: () => Promise<void> | void;
    timeout: number;
}

export interface ShutdownResult {
    name: string;
    success: boolean;
    error?: string;
    duration: number;
}

// ============================================
// SHUTDOWN COORDINATOR CLASS
// ============================================

export class ShutdownCoordinator {
    private readonly handlers = new Map<string, ShutdownHandler>();
    private isShuttingDown = false;

    constructor(private readonly logger: Logger = baseLogger.child({ module: 'shutdown' })) {}

    /**
     * Register a shutdown handler
     * @param timeout - Max time to wait for the handler (ms), default 10s
     */
    register(name: string, handler: () => Promise<void> | void, timeout = 10000): void {
        if (this.handlers.has(name)) {
            this.logger.warn({ name }, 'Shutdown handler already registered, replacing');
        }
        this.handlers.set(name, { name, handler, timeout });
    }

    isInProgress(): boolean {
        return this.isShuttingDown;
    }

    /**
     * Execute all shutdown handlers. A second call is a no-op.
     */
    async shutdown(): Promise<ShutdownResult[]> {
        if (this.isShuttingDown) {
            this.logger.warn('Shutdown already in progress');
            return [];
        }

        this.isShuttingDown = true;
        this.logger.info({ handlerCount: this.handlers.size }, 'Starting graceful shutdown');

        const results = await Promise.all(
            Array.from(this.handlers.values()).map((entry) => this.runHandler(entry))
        );

        const successful = results.filter(r => r.success).length;
        this.logger.info({ successful, failed: results.length - successful, total: results.length }, 'Shutdown complete');
        return results;
    }

    private async runHandler({ name, handler, timeout }: ShutdownHandler): Promise<ShutdownResult> {
        const start = Date.now();
        let timer: NodeJS.Timeout | undefined;

        try {
            const timedOut = await Promise.race([
                (async () => {
                    await handler();
                    return false;
                })(),
                new Promise<boolean>((resolve) => {
                    timer = setTimeout(() => resolve(true), timeout);
                }),
            ]);

            const duration = Date.now() - start;
            if (timedOut) {
                this.logger.warn({ name, timeout, duration }, 'Shutdown handler timed out');
                return { name, success: false, error: 'Timeout', duration };
            }
            this.logger.debug({ name, duration }, 'Shutdown handler completed');
            return { name, success: true, duration };
        } catch (error: unknown) {
            const duration = Date.now() - start;
            const errorMsg = error instanceof Error ? error.message : 'Unknown error';
            this.logger.error({ name, error: errorMsg, duration }, 'Shutdown handler failed');
            return { name, success: false, error: errorMsg, duration };
        } finally {
            clearTimeout(timer);
        }
    }
}
