/**
 * Application Entry Point
 *
 * @module index
 */

import { main } from './server.js';

main().catch((error: unknown) => {
  console.error('[INIT] FATAL: Application startup failed:', {
    message: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
    timestamp: new Date().toISOString(),
  });
  process.exit(1);
});
