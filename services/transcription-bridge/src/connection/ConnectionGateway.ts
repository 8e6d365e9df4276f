/**
 * Connection Gateway
 * Accepts client connections, demultiplexes control messages from audio and
 * enforces connection limits, idle and session timeouts and the heartbeat.
 */

import { EventEmitter } from 'node:events';
import type { IncomingMessage } from 'node:http';
import { WebSocket } from 'ws';
import type { RawData, WebSocketServer } from 'ws';
import { v4 as uuidv4 } from 'uuid';
import type { GatewaySettings } from '../config';
import type { TranscriptionSession } from '../processing/TranscriptionSession';
import { BridgeError, LimitExceededError, clientMessage, isBridgeError, toError } from '../errors';
import { connectionMessage, encode, errorMessage, parseControlMessage } from '../protocol/messages';
import type { OutboundMessage } from '../protocol/messages';
import { connectionsActive, connectionsTotal, errorsTotal } from '../utils/metrics';
import { componentLogger } from '../utils/logger';
import type { Logger } from '../utils/logger';

/** What the gateway needs from a client connection */
export interface ClientTransport {
  send(data: string): void;
  close(code: number, reason: string): void;
  terminate(): void;
  ping(): void;
  isOpen(): boolean;
}

export interface SessionContext {
  connectionId: string;
  send: (message: OutboundMessage) => void;
  logger: Logger;
}

export interface GatewayOptions {
  settings: GatewaySettings;
  createSession: (context: SessionContext) => TranscriptionSession;
}

// WebSocket close codes
const CLOSE_GOING_AWAY = 1001;
const CLOSE_UNSUPPORTED_DATA = 1003;
const CLOSE_POLICY = 1008;
const CLOSE_TRY_AGAIN = 1013;

interface ManagedConnection {
  id: string;
  clientId: string;
  transport: ClientTransport;
  session: TranscriptionSession;
  createdAt: number;
  lastActivity: number;
  missedPongs: number;
  inbound: Promise<void>;
  closing: boolean;
  idleTimer?: NodeJS.Timeout;
  sessionTimer?: NodeJS.Timeout;
  heartbeat?: NodeJS.Timeout;
  log: Logger;
}

export interface ConnectionStatus {
  id: string;
  clientId: string;
  uptimeMs: number;
  idleMs: number;
  sessionState: string;
}

export class ConnectionGateway extends EventEmitter {
  private connections: Map<string, ManagedConnection> = new Map();
  private settings: GatewaySettings;
  private createSession: GatewayOptions['createSession'];
  private log = componentLogger('gateway');

  constructor(options: GatewayOptions) {
    super();

    this.settings = options.settings;
    this.createSession = options.createSession;
  }

  /**
   * Register a connection, send the handshake and create its session.
   * Returns the connection id, or null when the connection was refused.
   */
  accept(transport: ClientTransport, clientId?: string): string | null {
    if (this.connections.size >= this.settings.maxConnections) {
      const error = new LimitExceededError(`Maximum connections (${this.settings.maxConnections}) reached`);
      connectionsTotal.inc({ status: 'rejected' });
      errorsTotal.inc({ code: error.code });
      this.log.warn({ active: this.connections.size }, 'Connection refused, at capacity');
      this.safeSend(transport, errorMessage(error.message), this.log);
      transport.close(CLOSE_TRY_AGAIN, 'Server at capacity');
      return null;
    }

    const id = uuidv4();
    const log = componentLogger('connection', { connectionId: id });
    const now = Date.now();

    const connection: ManagedConnection = {
      id,
      clientId: clientId && clientId.length > 0 ? clientId : id,
      transport,
      session: this.createSession({
        connectionId: id,
        send: (message) => this.safeSend(transport, message, log),
        logger: log,
      }),
      createdAt: now,
      lastActivity: now,
      missedPongs: 0,
      inbound: Promise.resolve(),
      closing: false,
      log,
    };

    this.connections.set(id, connection);
    connectionsTotal.inc({ status: 'accepted' });
    connectionsActive.inc();

    this.safeSend(transport, connectionMessage(connection.clientId, this.settings.protocolVersion), log);
    this.armTimers(connection);

    log.info({ clientId: connection.clientId, active: this.connections.size }, 'Client connected');
    this.emit('connection:registered', { connectionId: id, clientId: connection.clientId });

    return id;
  }

  /**
   * Queue an inbound frame; frames of one connection run strictly in order
   */
  handleMessage(connectionId: string, data: Buffer, isBinary: boolean): Promise<void> {
    const connection = this.connections.get(connectionId);
    if (!connection || connection.closing) {
      return Promise.resolve();
    }

    connection.lastActivity = Date.now();
    this.armIdleTimer(connection);

    connection.inbound = connection.inbound.then(() => this.processMessage(connection, data, isBinary));
    return connection.inbound;
  }

  handlePong(connectionId: string): void {
    const connection = this.connections.get(connectionId);
    if (connection) {
      connection.missedPongs = 0;
    }
  }

  /**
   * The peer went away; tear the connection down
   */
  handleClose(connectionId: string, code?: number): Promise<void> {
    const connection = this.connections.get(connectionId);
    if (!connection) {
      return Promise.resolve();
    }
    connection.log.info({ code }, 'Client disconnected');
    return this.teardown(connection);
  }

  /**
   * Close a connection from our side with a terminal error envelope
   */
  closeWithError(connectionId: string, error: BridgeError): Promise<void> {
    const connection = this.connections.get(connectionId);
    if (!connection) {
      return Promise.resolve();
    }
    return this.closeConnection(connection, error);
  }

  getStatus() {
    const now = Date.now();
    const connections: ConnectionStatus[] = [...this.connections.values()].map((connection) => ({
      id: connection.id,
      clientId: connection.clientId,
      uptimeMs: now - connection.createdAt,
      idleMs: now - connection.lastActivity,
      sessionState: connection.session.getState(),
    }));

    return {
      activeConnections: this.connections.size,
      maxConnections: this.settings.maxConnections,
      connections,
    };
  }

  /**
   * Wire the gateway to a ws server
   */
  attach(wss: WebSocketServer): void {
    wss.on('connection', (ws: WebSocket, req: IncomingMessage) => {
      const transport = webSocketTransport(ws);
      const connectionId = this.accept(transport, clientIdFrom(req));
      if (!connectionId) {
        return;
      }

      ws.on('message', (data: RawData, isBinary: boolean) => {
        this.handleMessage(connectionId, toBuffer(data), isBinary).catch((error: unknown) => {
          this.log.error({ err: toError(error), connectionId }, 'Inbound message handling failed');
        });
      });

      ws.on('pong', () => this.handlePong(connectionId));

      ws.on('error', (error: Error) => {
        this.log.warn({ err: error, connectionId }, 'WebSocket error');
      });

      ws.on('close', (code: number) => {
        this.handleClose(connectionId, code).catch((error: unknown) => {
          this.log.error({ err: toError(error), connectionId }, 'Connection teardown failed');
        });
      });
    });
  }

  /**
   * Close every connection (server shutdown)
   */
  async shutdown(): Promise<void> {
    const closing = [...this.connections.values()].map((connection) => {
      this.clearTimers(connection);
      connection.transport.close(CLOSE_GOING_AWAY, 'Server shutting down');
      return this.teardown(connection);
    });
    await Promise.all(closing);
  }

  private async processMessage(connection: ManagedConnection, data: Buffer, isBinary: boolean): Promise<void> {
    if (connection.closing) {
      return;
    }

    try {
      if (isBinary) {
        connection.session.ingestAudio(data);
        return;
      }

      const message = parseControlMessage(data.toString('utf8'));
      connection.log.debug({ type: message.type }, 'Control message');

      switch (message.type) {
        case 'start_recording':
          await connection.session.start(message);
          break;
        case 'stop_recording':
          await connection.session.stop();
          break;
        case 'configure':
          connection.session.configure(message);
          break;
        case 'ping':
          this.safeSend(connection.transport, { type: 'pong' }, connection.log);
          break;
        case 'get_metrics':
          this.safeSend(connection.transport, this.metricsMessage(connection), connection.log);
          break;
      }
    } catch (error) {
      await this.handleError(connection, error);
    }
  }

  private async handleError(connection: ManagedConnection, error: unknown): Promise<void> {
    if (isBridgeError(error)) {
      errorsTotal.inc({ code: error.code });
      if (error.fatal) {
        await this.closeConnection(connection, error);
        return;
      }
      connection.log.warn({ code: error.code, err: error }, 'Request failed');
    } else {
      errorsTotal.inc({ code: 'INTERNAL' });
      connection.log.error({ err: toError(error) }, 'Unexpected error handling message');
    }

    this.safeSend(connection.transport, errorMessage(clientMessage(error)), connection.log);
  }

  private async closeConnection(connection: ManagedConnection, error: BridgeError): Promise<void> {
    if (connection.closing) {
      return;
    }

    connection.log.warn({ code: error.code, err: error }, 'Closing connection');
    this.safeSend(connection.transport, errorMessage(error.message), connection.log);
    connection.transport.close(
      error.code === 'FORMAT_ERROR' ? CLOSE_UNSUPPORTED_DATA : CLOSE_POLICY,
      error.code === 'FORMAT_ERROR' ? 'Unsupported audio format' : error.code
    );

    await this.teardown(connection);
  }

  /**
   * Private: cooperative session shutdown bounded by the close grace period
   */
  private async teardown(connection: ManagedConnection): Promise<void> {
    if (connection.closing) {
      return;
    }
    connection.closing = true;
    this.clearTimers(connection);
    this.connections.delete(connection.id);
    connectionsActive.dec();

    let graceTimer: NodeJS.Timeout | undefined;
    const graceExpired = new Promise<boolean>((resolve) => {
      graceTimer = setTimeout(() => resolve(false), this.settings.closeGraceMs);
    });

    const finished = await Promise.race([
      connection.session.close().then(
        () => true,
        (error: unknown) => {
          connection.log.error({ err: toError(error) }, 'Session close failed');
          return true;
        }
      ),
      graceExpired,
    ]);
    clearTimeout(graceTimer);

    if (!finished) {
      connection.log.error({ graceMs: this.settings.closeGraceMs }, 'Session did not stop within grace period, terminating');
      connection.transport.terminate();
    }

    connection.log.info({ uptimeMs: Date.now() - connection.createdAt }, 'Connection closed');
    this.emit('connection:unregistered', { connectionId: connection.id });
  }

  private metricsMessage(connection: ManagedConnection): OutboundMessage {
    const snapshot = connection.session.getSnapshot();
    return {
      type: 'metrics',
      connection: {
        id: connection.id,
        client_id: connection.clientId,
        created_at: new Date(connection.createdAt).toISOString(),
        uptime_ms: Date.now() - connection.createdAt,
        session_state: snapshot.state,
        total_audio_chunks: snapshot.audioChunks,
        total_transcriptions: snapshot.transcriptions,
      },
      session: snapshot,
    };
  }

  private safeSend(transport: ClientTransport, message: OutboundMessage, log: Logger): void {
    if (!transport.isOpen()) {
      log.debug({ type: message.type }, 'Dropping outbound message, transport closed');
      return;
    }
    try {
      transport.send(encode(message));
    } catch (error) {
      log.warn({ err: toError(error), type: message.type }, 'Failed to send message');
    }
  }

  private armTimers(connection: ManagedConnection): void {
    this.armIdleTimer(connection);

    if (this.settings.maxSessionMs > 0) {
      connection.sessionTimer = setTimeout(() => {
        this.expire(
          connection,
          new LimitExceededError(`Maximum session duration (${this.settings.maxSessionMs / 1000}s) exceeded`)
        );
      }, this.settings.maxSessionMs);
    }

    if (this.settings.heartbeatIntervalMs > 0) {
      connection.heartbeat = setInterval(() => {
        if (connection.missedPongs >= 2) {
          connection.log.warn({ missedPongs: connection.missedPongs }, 'Heartbeat lost, terminating connection');
          connection.transport.terminate();
          this.teardown(connection).catch((error: unknown) => {
            connection.log.error({ err: toError(error) }, 'Connection teardown failed');
          });
          return;
        }
        connection.missedPongs++;
        try {
          connection.transport.ping();
        } catch (error) {
          connection.log.debug({ err: toError(error) }, 'Ping failed');
        }
      }, this.settings.heartbeatIntervalMs);
    }
  }

  private armIdleTimer(connection: ManagedConnection): void {
    if (this.settings.idleTimeoutMs <= 0) {
      return;
    }
    if (connection.idleTimer) {
      clearTimeout(connection.idleTimer);
    }
    connection.idleTimer = setTimeout(() => {
      this.expire(connection, new LimitExceededError(`Connection idle for more than ${this.settings.idleTimeoutMs / 1000}s`));
    }, this.settings.idleTimeoutMs);
  }

  private expire(connection: ManagedConnection, error: LimitExceededError): void {
    errorsTotal.inc({ code: error.code });
    this.closeConnection(connection, error).catch((closeError: unknown) => {
      connection.log.error({ err: toError(closeError) }, 'Connection teardown failed');
    });
  }

  private clearTimers(connection: ManagedConnection): void {
    if (connection.idleTimer) {
      clearTimeout(connection.idleTimer);
    }
    if (connection.sessionTimer) {
      clearTimeout(connection.sessionTimer);
    }
    if (connection.heartbeat) {
      clearInterval(connection.heartbeat);
    }
    connection.idleTimer = undefined;
    connection.sessionTimer = undefined;
    connection.heartbeat = undefined;
  }
}

/**
 * Adapt a ws socket to the gateway's transport
 */
export function webSocketTransport(ws: WebSocket): ClientTransport {
  return {
    send: (data) => ws.send(data),
    close: (code, reason) => {
      if (ws.readyState === WebSocket.OPEN || ws.readyState === WebSocket.CONNECTING) {
        ws.close(code, reason);
      }
    },
    terminate: () => ws.terminate(),
    ping: () => ws.ping(),
    isOpen: () => ws.readyState === WebSocket.OPEN,
  };
}

function clientIdFrom(req: IncomingMessage): string | undefined {
  const url = new URL(req.url ?? '/', 'http://localhost');
  return url.searchParams.get('client_id') ?? undefined;
}

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) {
    return data;
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data);
  }
  return Buffer.from(data);
}
