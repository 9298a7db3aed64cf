/**
 * Server entrypoint
 *
 * Run: npm start (after npm run build)
 */

import 'dotenv/config';
import { buildApp } from './app.js';
import { env } from './config/env.js';

async function main(): Promise<void> {
  const app = buildApp();

  const shutdown = (signal: string) => {
    app.log.info(`[BOOT] ${signal} received, closing server`);
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        app.log.error(err);
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  await app.listen({ port: env.PORT, host: env.HOST });
  app.log.info(`[BOOT] Asset graph API listening on ${env.HOST}:${env.PORT}`);
}

main().catch((err) => {
  console.error('[BOOT] Failed to start server:', err);
  process.exit(1);
});
