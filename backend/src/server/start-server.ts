import { Express } from 'express';
import { Server } from 'node:http';

const FORCED_EXIT_MS = 10000;

interface StartServerOptions {
  app: Express;
  port: string | number;
  onListening?: () => void;
  // Runs before the listener closes; returns how many pieces of work it interrupted.
  onShutdown?: (signal: string) => number;
}

export const startServer = ({ app, port, onListening, onShutdown }: StartServerOptions): Server => {
  const server = app.listen(port, () => {
    console.log(`[Server] Listening on ${port}`);
    onListening?.();
  });

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    const interrupted = onShutdown?.(signal) ?? 0;
    console.log(`[Server] ${signal}: closing listener${interrupted ? `, aborted ${interrupted} precipitation sweep(s)` : ''}.`);

    server.close((err) => {
      if (err) {
        console.error('[Server] Graceful shutdown failed:', err);
        process.exit(1);
      }
      process.exit(0);
    });
    setTimeout(() => {
      console.error(`[Server] Still open after ${FORCED_EXIT_MS}ms, forcing exit.`);
      process.exit(1);
    }, FORCED_EXIT_MS).unref();
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => shutdown(signal));
  }
  process.on('unhandledRejection', (reason) => {
    console.error('[Server] Unhandled rejection:', reason);
  });
  process.on('uncaughtException', (error) => {
    console.error('[Server] Uncaught exception:', error);
    shutdown('uncaughtException');
  });

  return server;
};
