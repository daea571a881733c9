/**
 * HTTP Server Module
 *
 * Starts the HTTP server with configuration checks, graceful shutdown and
 * process-level error handling.
 *
 * @module server
 */

import { type Server } from 'http';
import { type Socket } from 'net';

import { createApp } from './app.js';
import { getAssistantConfig } from './config/assistant.js';
import { getAuthConfig } from './config/auth.js';
import { getStoreConfig } from './config/store.js';

/**
 * Environment Configuration
 */
const ENV = {
  PORT: parseInt(process.env.PORT || '3000', 10),
  HOST: process.env.HOST || '0.0.0.0',
  /**
   * Graceful shutdown timeout in milliseconds
   */
  SHUTDOWN_TIMEOUT: parseInt(process.env.SHUTDOWN_TIMEOUT || '30000', 10),
} as const;

let serverInstance: Server | null = null;
let isShuttingDown = false;

function displayHost(): string {
  return ENV.HOST === '0.0.0.0' ? 'localhost' : ENV.HOST;
}

/**
 * Load every configuration section once so a missing secret stops startup
 * instead of failing the first request
 *
 * @returns Whether all required settings are present
 */
export function initializeConfiguration(): boolean {
  try {
    const store = getStoreConfig();
    getAuthConfig();
    const assistant = getAssistantConfig();

    console.log('[SERVER] Configuration loaded:', {
      repository: `${store.owner}/${store.repo}`,
      environment: store.environment,
      assistantEnabled: assistant.enabled,
      timestamp: new Date().toISOString(),
    });

    return true;
  } catch (error) {
    console.error('[SERVER] FATAL: Invalid configuration:', {
      error: error instanceof Error ? error.message : String(error),
      timestamp: new Date().toISOString(),
    });
    return false;
  }
}

/**
 * Start HTTP Server
 *
 * @throws {Error} If the port cannot be bound
 */
export async function startServer(): Promise<Server> {
  const app = createApp();

  return new Promise((resolve, reject) => {
    const server = app.listen(ENV.PORT, ENV.HOST, () => {
      console.log('[SERVER] HTTP server started:', {
        host: ENV.HOST,
        port: ENV.PORT,
        processId: process.pid,
        nodeVersion: process.version,
        timestamp: new Date().toISOString(),
      });

      resolve(server);
    });

    server.on('error', (error: NodeJS.ErrnoException) => {
      if (error.code === 'EADDRINUSE') {
        reject(new Error(`Port ${ENV.PORT} is already in use`));
      } else if (error.code === 'EACCES') {
        reject(new Error(`Permission denied to bind to port ${ENV.PORT}`));
      } else {
        reject(error);
      }
    });

    server.on('clientError', (error: Error, socket: Socket) => {
      console.error('[SERVER] Client connection error:', {
        error: error.message,
        remoteAddress: socket.remoteAddress,
        timestamp: new Date().toISOString(),
      });

      if (!socket.destroyed) {
        socket.end('HTTP/1.1 400 Bad Request\r\n\r\n');
      }
    });
  });
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => {
      if (error) {
        reject(error);
      } else {
        resolve();
      }
    });
  });
}

/**
 * Stop accepting connections and exit once in-flight requests finish, or
 * when the shutdown timeout fires
 */
export async function gracefulShutdown(signal: string): Promise<void> {
  if (isShuttingDown) {
    console.warn('[SERVER] Shutdown already in progress, ignoring signal:', signal);
    return;
  }

  isShuttingDown = true;

  console.log('[SERVER] Received shutdown signal:', {
    signal,
    timestamp: new Date().toISOString(),
  });

  const shutdownTimeout = setTimeout(() => {
    console.error('[SERVER] FATAL: Shutdown timeout exceeded, forcing exit');
    process.exit(1);
  }, ENV.SHUTDOWN_TIMEOUT);

  try {
    if (serverInstance) {
      await closeServer(serverInstance);
      console.log('[SERVER] HTTP server closed');
    }

    clearTimeout(shutdownTimeout);
    process.exit(0);
  } catch (error) {
    console.error('[SERVER] FATAL: Error during graceful shutdown:', {
      error: error instanceof Error ? error.message : String(error),
      timestamp: new Date().toISOString(),
    });

    clearTimeout(shutdownTimeout);
    process.exit(1);
  }
}

function setupSignalHandlers(): void {
  process.on('SIGTERM', () => {
    void gracefulShutdown('SIGTERM');
  });

  process.on('SIGINT', () => {
    void gracefulShutdown('SIGINT');
  });

  process.on('uncaughtException', (error: Error) => {
    console.error('[SERVER] FATAL: Uncaught exception:', {
      error: error.message,
      stack: error.stack,
      timestamp: new Date().toISOString(),
    });

    void gracefulShutdown('uncaughtException');
  });

  process.on('unhandledRejection', (reason: unknown) => {
    console.error('[SERVER] FATAL: Unhandled promise rejection:', {
      reason: reason instanceof Error ? reason.message : String(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
      timestamp: new Date().toISOString(),
    });

    void gracefulShutdown('unhandledRejection');
  });
}

/**
 * Startup sequence: signal handlers, configuration, then the HTTP server
 */
export async function main(): Promise<void> {
  console.log('[SERVER] Starting Vacation Desk server:', {
    nodeEnv: process.env.NODE_ENV ?? 'development',
    nodeVersion: process.version,
    timestamp: new Date().toISOString(),
  });

  setupSignalHandlers();

  if (!initializeConfiguration()) {
    process.exit(1);
  }

  try {
    serverInstance = await startServer();

    console.log('[SERVER] Server is ready:', {
      url: `http://${displayHost()}:${ENV.PORT}`,
      health: `http://${displayHost()}:${ENV.PORT}/health`,
    });
  } catch (error) {
    console.error('[SERVER] FATAL: Server initialization failed:', {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
      timestamp: new Date().toISOString(),
    });

    process.exit(1);
  }
}
