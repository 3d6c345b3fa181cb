import { startServer } from './server';

startServer()
  .then((server) => {
    const shutdown = (signal: NodeJS.Signals) => {
      console.info({ scope: 'bootstrap', message: 'Shutting down.', signal });
      server.close(() => process.exit(0));
    };

    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  })
  .catch((error: unknown) => {
    console.error({
      scope: 'bootstrap',
      message: 'Startup failed.',
      error: error instanceof Error ? error.message : 'Unknown startup error'
    });
    process.exit(1);
  });
