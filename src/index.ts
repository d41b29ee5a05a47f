import 'dotenv/config';
import http from 'http';

import { createApp } from './app';
import { loadServerConfig } from './config/settings';

async function bootstrap(): Promise<void> {
  try {
    const config = loadServerConfig();
    const context = await createApp({ config });
    const server = http.createServer(context.app);

    server.listen(config.port, () => {
      // eslint-disable-next-line no-console
      console.log(`Model conversion service listening on port ${config.port}`);
      // eslint-disable-next-line no-console
      console.log(`Open http://${config.host}:${config.port}/`);
      if (config.publicBaseUrl) {
        // eslint-disable-next-line no-console
        console.log(`Public base URL: ${config.publicBaseUrl}`);
      }
    });

    let stopping = false;
    const stop = (signal: NodeJS.Signals) => {
      if (stopping) {
        return;
      }
      stopping = true;
      // eslint-disable-next-line no-console
      console.log(`Received ${signal}, shutting down`);

      server.close();
      context
        .shutdown({ cancelRunning: true })
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          // eslint-disable-next-line no-console
          console.error('Shutdown failed:', error);
          process.exit(1);
        });
    };

    process.on('SIGINT', stop);
    process.on('SIGTERM', stop);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown startup error';
    // eslint-disable-next-line no-console
    console.error('Failed to start server:', message);
    process.exit(1);
  }
}

void bootstrap();
