import type { RegistryEngine } from '../engine/registry_engine.js'

/**
 * Anything with an async `stop()`; a RegistryEngine qualifies.
 */
export type Stoppable = Pick<RegistryEngine, 'stop'>

export interface ShutdownOptions {
    /** Timeout before forcing exit (default: 30000ms) */
    timeout?: number
    /** Signals to handle (default: ['SIGTERM', 'SIGINT']) */
    signals?: NodeJS.Signals[]
    /** Custom cleanup function to run before stopping the engine */
    onShutdown?: () => Promise<void>
    /** Custom logger function (default: console.log) */
    logger?: (msg: string) => void
    /** Process exit hook (default: process.exit) */
    exit?: (code: number) => void
}

/**
 * Setup graceful shutdown handlers for a RegistryEngine
 *
 * Handles SIGTERM (from Kubernetes/Docker) and SIGINT (Ctrl+C) by default.
 *
 * @returns Cleanup function to remove signal handlers
 *
 * @example
 * ```typescript
 * const cleanup = setupGracefulShutdown(engine, { timeout: 10000 })
 * await engine.start()
 * ```
 */
export function setupGracefulShutdown(engine: Stoppable, options: ShutdownOptions = {}): () => void {
    const {
        timeout = 30000,
        signals = ['SIGTERM', 'SIGINT'],
        onShutdown,
        logger = console.log,
        exit = (code: number) => process.exit(code)
    } = options

    let isShuttingDown = false

    const shutdown = async (signal: string): Promise<void> => {
        if (isShuttingDown) {
            logger(`[Shutdown] Already shutting down, ignoring ${signal}`)
            return
        }

        isShuttingDown = true
        logger(`[Shutdown] Received ${signal}, initiating graceful shutdown...`)

        const forceExitTimer = setTimeout(() => {
            logger('[Shutdown] Timeout exceeded, forcing exit')
            exit(1)
        }, timeout)
        forceExitTimer.unref()

        try {
            if (onShutdown) {
                await onShutdown()
            }

            await engine.stop()

            clearTimeout(forceExitTimer)
            logger('[Shutdown] Graceful shutdown completed')
            exit(0)
        } catch (error) {
            clearTimeout(forceExitTimer)
            logger(`[Shutdown] Error during shutdown: ${error instanceof Error ? error.message : String(error)}`)
            exit(1)
        }
    }

    const handlers = new Map<NodeJS.Signals, () => void>()

    signals.forEach(signal => {
        const handler = () => void shutdown(signal)
        handlers.set(signal, handler)
        process.on(signal, handler)
    })

    return () => {
        handlers.forEach((handler, signal) => {
            process.removeListener(signal, handler)
        })
        handlers.clear()
    }
}
