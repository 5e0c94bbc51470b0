import { logger } from '../../shared/logging/logger';

type ShutdownSignal = NodeJS.Signals | 'UNHANDLED_REJECTION' | 'UNCAUGHT_EXCEPTION';

/** Something to release on the way out; closed in registration order. */
export interface ShutdownResource {
  name: string;
  close: () => Promise<void> | void;
}

interface RegisterShutdownHooksParams {
  resources: ShutdownResource[];
}

let shutdownInFlight: Promise<void> | null = null;

async function runShutdown(signal: ShutdownSignal, resources: ShutdownResource[]): Promise<void> {
  if (shutdownInFlight) {
    return shutdownInFlight;
  }

  shutdownInFlight = (async () => {
    logger.info({ signal }, 'Shutdown initiated');

    for (const resource of resources) {
      try {
        await resource.close();
      } catch (error) {
        logger.warn({ error, resource: resource.name }, 'Resource close failed during shutdown');
      }
    }

    logger.info({ signal }, 'Shutdown complete');
  })();

  return shutdownInFlight;
}

export function registerShutdownHooks({ resources }: RegisterShutdownHooksParams): void {
  const handleSignal = (signal: NodeJS.Signals) => {
    void runShutdown(signal, resources)
      .catch((error) => {
        logger.error({ error, signal }, 'Fatal shutdown failure');
      })
      .finally(() => {
        process.exit(0);
      });
  };

  process.once('SIGINT', () => handleSignal('SIGINT'));
  process.once('SIGTERM', () => handleSignal('SIGTERM'));

  process.on('unhandledRejection', (reason) => {
    logger.error({ error: reason }, 'Unhandled promise rejection');
    void runShutdown('UNHANDLED_REJECTION', resources)
      .catch((error) => {
        logger.error({ error }, 'Fatal shutdown failure after unhandled rejection');
      })
      .finally(() => {
        process.exit(1);
      });
  });

  process.on('uncaughtException', (error) => {
    logger.error({ error }, 'Uncaught exception');
    void runShutdown('UNCAUGHT_EXCEPTION', resources)
      .catch((shutdownError) => {
        logger.error({ error: shutdownError }, 'Fatal shutdown failure after uncaught exception');
      })
      .finally(() => {
        process.exit(1);
      });
  });
}
