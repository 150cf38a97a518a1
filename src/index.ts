import { startServer } from './server/app.js';
import { loadConfig } from './config/index.js';

const config = loadConfig();
console.log('Starting with config:', {
  port: config.server.port,
  auth: config.auth.enabled ? 'enabled' : 'disabled',
  adb: config.tools.adbPath,
  scrcpy: config.tools.scrcpyPath,
  discoveryInterval: config.discovery.enabled ? config.discovery.pollInterval : 'disabled',
});

startServer(config.server.port)
  .then((server) => {
    const shutdown = (signal: NodeJS.Signals) => {
      console.log(`Received ${signal}, shutting down`);
      server.close().then(
        () => process.exit(0),
        (err) => {
          console.error('Failed to shut down cleanly:', err);
          process.exit(1);
        }
      );
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  })
  .catch((err) => {
    console.error('Failed to start server:', err);
    process.exit(1);
  });
