/**
 * Prognosis API — Entrypoint
 *
 * Loads the models before opening the port: a process with a partial model
 * set never serves traffic.
 *
 * Run: node dist/server.js
 */

import 'dotenv/config';
import { buildApp } from './app.js';
import { createLogger } from './common/logger.js';
import { loadEnv } from './config/env.js';
import { createAppContext } from './context.js';

async function main() {
  console.log('═══════════════════════════════════════════════════════════════');
  console.log('  PROGNOSIS API');
  console.log('═══════════════════════════════════════════════════════════════');

  const env = loadEnv(process.env);
  const logger = createLogger(env.LOG_LEVEL);

  const context = createAppContext(env, logger);
  const app = buildApp(context);

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    console.log(`[Boot] Received ${signal}, shutting down...`);
    await app.close();
    console.log('[Boot] Shutdown complete');
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err) => {
      console.error('[Boot] Shutdown failed:', err);
      process.exit(1);
    });
  };

  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));

  console.log(`[Boot] Loading models from ${env.MODELS_DIR}...`);
  await context.models.load();

  await app.listen({ port: env.PORT, host: env.HOST });
  console.log('═══════════════════════════════════════════════════════════════');
  console.log(`  ✅ Prognosis API started on ${env.HOST}:${env.PORT}`);
  console.log('═══════════════════════════════════════════════════════════════');
  console.log('');
  console.log('📦 Available Endpoints:');
  console.log('  GET  /');
  console.log('  GET  /health');
  console.log('  POST /predict/survival');
  console.log('  POST /predict/drug-response');
  console.log('  GET  /cancer-types');
  console.log('  GET  /stages');
  console.log('  GET  /treatments');
  console.log('  GET  /grades');
  console.log('  GET  /performance-statuses');
  console.log('');
}

main().catch((err) => {
  console.error('[Boot] Fatal error:', err);
  process.exit(1);
});
