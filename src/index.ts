import { bootstrapApp } from './app/bootstrap';
import { logger } from './shared/logging/logger';

/**
 * Start the HTTP service. Configuration is validated on import; invalid settings exit before this runs.
 */
bootstrapApp().catch((err: unknown) => {
  logger.fatal({ err }, 'Startup failed');
  process.exit(1);
});
