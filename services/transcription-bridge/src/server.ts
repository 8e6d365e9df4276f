import express from 'express';
import type { Express } from 'express';
import { createServer } from 'http';
import type { Server as HTTPServer } from 'http';
import { WebSocketServer } from 'ws';
import type { BridgeConfig } from './config';
import { BackendPool } from './connection/BackendPool';
import type { BackendFactory } from './connection/BackendPool';
import { ConnectionGateway } from './connection/ConnectionGateway';
import { TranscriptionSession } from './processing/TranscriptionSession';
import { RecognitionSessionClient } from './recognition/RecognitionSessionClient';
import { createGrpcBackendFactory } from './providers/GrpcRecognitionBackend';
import { SyntheticRecognitionBackend } from './providers/SyntheticRecognitionBackend';
import { httpLogger, logger } from './utils/logger';
import { httpRequestDuration, register as metricsRegister } from './utils/metrics';

export interface BridgeOverrides {
  /** Replaces the configured backend, e.g. with a scripted one */
  backendFactory?: BackendFactory;
  fallbackFactory?: BackendFactory;
}

export interface Bridge {
  app: Express;
  server: HTTPServer;
  wss: WebSocketServer;
  gateway: ConnectionGateway;
  pool: BackendPool;
  close(): Promise<void>;
}

function backendFactoryFor(config: BridgeConfig): BackendFactory {
  if (config.backend.mode === 'synthetic') {
    return () => new SyntheticRecognitionBackend();
  }

  return createGrpcBackendFactory({
    target: config.backend.target,
    useTls: config.backend.useTls,
    protoPath: config.backend.protoPath,
    connectTimeoutMs: config.backend.connectTimeoutMs,
  });
}

/**
 * Wire the HTTP endpoints, the WebSocket gateway and the backend pool
 */
export function createBridge(config: BridgeConfig, overrides: BridgeOverrides = {}): Bridge {
  const backend = config.backend;
  let isDraining = false;

  const pool = new BackendPool(overrides.backendFactory ?? backendFactoryFor(config), {
    maxPoolSize: backend.maxPoolSize,
    acquireTimeout: backend.poolAcquireTimeoutMs,
    idleTimeout: backend.poolIdleTimeoutMs,
  });

  pool.on('backend:removed', ({ id, reason }) => {
    logger.warn({ id, reason }, 'Recognizer backend removed from pool');
  });

  const fallbackFactory = overrides.fallbackFactory ?? (() => new SyntheticRecognitionBackend());

  const gateway = new ConnectionGateway({
    settings: config.gateway,
    createSession: ({ connectionId, send, logger: connectionLogger }) =>
      new TranscriptionSession({
        connectionId,
        vad: config.vad,
        drainTimeoutMs: config.session.drainTimeoutMs,
        partialPolicy: config.session.partialPolicy,
        send,
        logger: connectionLogger,
        createClient: () =>
          new RecognitionSessionClient(
            pool,
            {
              languageCode: backend.languageCode,
              enablePunctuation: backend.enablePunctuation,
              enableWordOffsets: backend.enableWordOffsets,
              maxRetries: backend.maxRetries,
              retryBaseDelayMs: backend.retryBaseDelayMs,
              retryMaxDelayMs: backend.retryMaxDelayMs,
              segmentTimeoutMs: backend.segmentTimeoutMs,
              chunkSizeBytes: backend.chunkSizeBytes,
              maxQueuedSegments: backend.maxQueuedSegments,
              degradedMode: backend.degradedMode,
              fallbackFactory,
              backendName: backend.mode === 'grpc' ? backend.target : backend.mode,
            },
            connectionLogger.child({ component: 'recognition-client' })
          ),
      }),
  });

  const app = express();
  app.use(httpLogger);

  // Metrics middleware
  app.use((req, res, next) => {
    const start = Date.now();
    res.on('finish', () => {
      httpRequestDuration.observe(
        {
          method: req.method,
          route: req.route?.path ?? req.path,
          status_code: res.statusCode.toString(),
        },
        (Date.now() - start) / 1000
      );
    });
    next();
  });

  // Health check endpoint
  app.get('/healthz', (req, res) => {
    if (isDraining) {
      res.status(503).json({
        status: 'draining',
        service: 'transcription-bridge',
        timestamp: new Date().toISOString(),
      });
      return;
    }

    res.json({
      status: 'healthy',
      service: 'transcription-bridge',
      backend: backend.mode,
      connections: gateway.getStatus().activeConnections,
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  app.get('/stats', (req, res) => {
    res.json({
      gateway: gateway.getStatus(),
      backendPool: pool.getStats(),
      configuration: {
        maxConnections: config.gateway.maxConnections,
        heartbeatIntervalMs: config.gateway.heartbeatIntervalMs,
        backendMode: backend.mode,
        backendTarget: backend.target,
        degradedMode: backend.degradedMode,
        partialPolicy: config.session.partialPolicy,
        vad: config.vad,
      },
      timestamp: new Date().toISOString(),
    });
  });

  // Prometheus metrics endpoint
  app.get('/metrics', async (req, res) => {
    try {
      res.set('Content-Type', metricsRegister.contentType);
      res.end(await metricsRegister.metrics());
    } catch (error) {
      logger.error({ error }, 'Failed to generate metrics');
      res.status(500).end();
    }
  });

  app.get('/', (req, res) => {
    res.json({
      service: 'Transcription Bridge',
      version: '1.0.0',
      description: 'Relays live PCM audio to a streaming recognizer and streams transcripts back',
      protocolVersion: config.gateway.protocolVersion,
      endpoints: {
        health: '/healthz',
        stats: '/stats',
        metrics: '/metrics',
        stream: config.gateway.path,
      },
    });
  });

  const server = createServer(app);
  const wss = new WebSocketServer({
    server,
    path: config.gateway.path,
    maxPayload: config.gateway.maxMessageBytes,
  });
  gateway.attach(wss);

  const close = async (): Promise<void> => {
    isDraining = true;

    await gateway.shutdown();
    logger.info('Client connections closed');

    await new Promise<void>((resolve) => wss.close(() => resolve()));
    await pool.cleanup();
    logger.info('Backend pool cleaned up');

    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  };

  return { app, server, wss, gateway, pool, close };
}
