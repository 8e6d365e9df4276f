import { loadConfig } from './config';
import { createBridge } from './server';
import { logger } from './utils/logger';

const config = loadConfig();
const bridge = createBridge(config);

bridge.server.listen(config.port, config.host, () => {
  logger.info({ host: config.host, port: config.port }, 'Transcription bridge started');
  logger.info({ stream: `ws://localhost:${config.port}${config.gateway.path}` }, 'WebSocket endpoint ready');
  logger.info(
    { mode: config.backend.mode, target: config.backend.target, degradedMode: config.backend.degradedMode },
    'Recognizer backend configured'
  );
});

// Graceful shutdown handler
const gracefulShutdown = async (signal: string) => {
  logger.info({ signal }, 'Received shutdown signal, starting graceful shutdown...');

  // Force exit after timeout
  const forceExit = setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    process.exit(1);
  }, 30000);
  forceExit.unref();

  try {
    await bridge.close();
    logger.info('HTTP server closed');
    process.exit(0);
  } catch (error) {
    logger.error({ error }, 'Error during shutdown');
    process.exit(1);
  }
};

process.on('SIGTERM', () => {
  void gracefulShutdown('SIGTERM');
});
process.on('SIGINT', () => {
  void gracefulShutdown('SIGINT');
});
