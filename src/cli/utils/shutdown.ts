import type { Logger } from 'pino';

const SHUTDOWN_SIGNALS = ['SIGINT', 'SIGTERM'] as const;

type ShutdownSignal = (typeof SHUTDOWN_SIGNALS)[number];

const SIGNAL_EXIT_CODES: Record<ShutdownSignal, number> = { SIGINT: 130, SIGTERM: 143 };

export interface ShutdownHandle {
  /** Exit code for the signal received, or null when none arrived */
  readonly exitCode: number | null;
  dispose(): void;
}

/**
 * Cancel in-flight work on SIGINT/SIGTERM. The caller keeps awaiting its run,
 * which tears sandboxes down before resolving, then exits with exitCode.
 */
export function handleShutdown(cancel: () => void, logger: Logger): ShutdownHandle {
  let received: ShutdownSignal | null = null;

  const handlers = SHUTDOWN_SIGNALS.map((signal) => {
    const handler = () => {
      received = signal;
      logger.info(`Received ${signal}, cleaning up...`);
      cancel();
    };
    process.once(signal, handler);
    return [signal, handler] as const;
  });

  return {
    get exitCode() {
      return received ? SIGNAL_EXIT_CODES[received] : null;
    },
    dispose() {
      for (const [signal, handler] of handlers) {
        process.removeListener(signal, handler);
      }
    },
  };
}
