import process from 'node:process';
import { pathToFileURL } from 'node:url';

import { createApplication } from './application';

export { createApplication } from './application';

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  bootstrap().catch((error) => {
    console.error('Failed to start photo web front-end', error);
    process.exitCode = 1;
  });
}

async function bootstrap(): Promise<void> {
  const app = await createApplication();

  await app.start();
  app.logger.info({ port: app.config.port }, 'Photo web front-end started');

  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    app.logger.info({ signal }, 'Shutting down photo web front-end');
    try {
      await app.stop();
      app.logger.info('Shutdown complete');
    } catch (error) {
      app.logger.error({ error }, 'Error during shutdown');
    } finally {
      process.exit(0);
    }
  };

  process.on('SIGINT', (signal) => void shutdown(signal));
  process.on('SIGTERM', (signal) => void shutdown(signal));
}
