import 'dotenv/config';
import { config } from './config.js';
import { startServer } from './api/server.js';

function main(): void {
  console.log(`[Boot] oi-levels starting (${config.NODE_ENV})`);

  const server = startServer(config.PORT, { maxUploadMb: config.MAX_UPLOAD_MB });

  // ── Graceful shutdown ───────────────────────────────────────────────────
  const shutdown = (signal: string): void => {
    console.log(`[Boot] ${signal} received, shutting down`);
    server.close(err => {
      if (err) console.error('[Boot] Error closing server:', err);
      process.exit(err ? 1 : 0);
    });
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

try {
  main();
} catch (err) {
  console.error('[Boot] Fatal error:', err);
  process.exit(1);
}
