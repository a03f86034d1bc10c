import 'dotenv/config';
import { loadConfig } from './config/index.js';
import { OscQueryServer } from './core/OscQueryServer.js';
import { logger } from './utils/logger.js';

let server: OscQueryServer | undefined;
let shuttingDown = false;

// Initialize and start the server
async function startServer(): Promise<void> {
  try {
    const config = loadConfig();
    server = new OscQueryServer(config);

    if (config.namespaceFile) {
      await server.loadNamespaceFile(config.namespaceFile);
    }

    await server.start();

    // Handle graceful shutdown
    process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
    process.on('SIGINT', () => void gracefulShutdown('SIGINT'));
  } catch (error) {
    logger.error('Failed to start OSCQuery server', { error: error instanceof Error ? error.message : String(error) });
    process.exit(1);
  }
}

// Graceful shutdown handler
async function gracefulShutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info('Received shutdown signal', { signal });

  // Force close after timeout
  setTimeout(() => {
    logger.warn('Forcing server shutdown');
    process.exit(1);
  }, 5000).unref();

  try {
    await server?.shutdown();
    process.exit(0);
  } catch (error) {
    logger.error('Error during shutdown', { error: error instanceof Error ? error.message : String(error) });
    process.exit(1);
  }
}

// Start the server
void startServer();
