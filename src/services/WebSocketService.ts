import type { IncomingMessage, Server as HttpServer } from 'node:http';
import { v4 as uuidv4 } from 'uuid';
import { WebSocket, WebSocketServer, type RawData } from 'ws';
import { z } from 'zod';
import type { MutationCoordinator } from '../core/MutationCoordinator.js';
import type { JsonObject } from '../models/types.js';
import { BadRequestError, NotFoundError, type OscQueryError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { metrics } from '../utils/metrics.js';
import type { ChangeNotifier, DropReason } from './ChangeNotifier.js';
import type { QueryResolver } from './QueryResolver.js';
import { decodeOscPacket } from './oscPackets.js';

const pathCommand = <C extends string>(command: C) =>
  z.object({ COMMAND: z.literal(command), DATA: z.string().startsWith('/') });

const clientCommandSchema = z.discriminatedUnion('COMMAND', [
  pathCommand('LISTEN'),
  pathCommand('UNLISTEN'),
  pathCommand('IGNORE'),
  pathCommand('QUERY'),
  z.object({
    COMMAND: z.literal('SET'),
    DATA: z.object({
      PATH: z.string().startsWith('/'),
      VALUE: z.union([z.array(z.unknown()), z.unknown().transform((value) => [value])]),
    }),
  }),
]);

export type ClientCommand = z.infer<typeof clientCommandSchema>;

interface ClientConnection {
  id: string;
  ws: WebSocket;
  isAlive: boolean;
  connectedAt: Date;
  ipAddress: string;
  userAgent: string;
}

export interface WebSocketServiceOptions {
  heartbeatMs: number;
}

function rawToBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  return Array.isArray(data) ? Buffer.concat(data) : Buffer.from(data);
}

/** Drop the query string before treating a QUERY target as a path. */
function splitQueryTarget(target: string): { path: string; query: string | undefined } {
  const index = target.indexOf('?');
  return index === -1
    ? { path: target, query: undefined }
    : { path: target.slice(0, index), query: target.slice(index + 1) };
}

/**
 * OSCQuery WebSocket channel. Shares the HTTP server; every connection becomes a
 * ChangeNotifier subscriber and may LISTEN, UNLISTEN, SET and QUERY with JSON commands,
 * or write values with binary OSC frames.
 */
export class WebSocketService {
  private wss: WebSocketServer | null = null;
  private readonly connections: Map<string, ClientConnection> = new Map();
  private heartbeatInterval: NodeJS.Timeout | null = null;

  constructor(
    private readonly coordinator: MutationCoordinator,
    private readonly notifier: ChangeNotifier,
    private readonly resolver: QueryResolver,
    private readonly options: WebSocketServiceOptions
  ) {}

  get connectionCount(): number {
    return this.connections.size;
  }

  initialize(server: HttpServer): void {
    if (this.wss) {
      logger.warn('WebSocket server already initialized');
      return;
    }

    this.wss = new WebSocketServer({ server });
    this.wss.on('connection', (ws: WebSocket, req: IncomingMessage) => {
      this.handleConnection(ws, req);
    });
    this.wss.on('error', (error: Error) => {
      logger.error('WebSocket server error', { error: error.message });
    });
    this.startHeartbeat();

    logger.info('WebSocket service initialized', { heartbeatMs: this.options.heartbeatMs });
  }

  private handleConnection(ws: WebSocket, req: IncomingMessage): void {
    const connection: ClientConnection = {
      id: uuidv4(),
      ws,
      isAlive: true,
      connectedAt: new Date(),
      ipAddress: req.socket.remoteAddress ?? 'unknown',
      userAgent: req.headers['user-agent'] ?? 'unknown',
    };
    this.connections.set(connection.id, connection);
    metrics.setWebSocketConnections(this.connections.size);

    this.notifier.attach({
      id: connection.id,
      deliver: (message) => this.deliver(connection, message),
      onDropped: (reason) => this.handleDropped(connection, reason),
    });

    logger.info('WebSocket client connected', {
      clientId: connection.id,
      ipAddress: connection.ipAddress,
      userAgent: connection.userAgent,
    });

    ws.on('pong', () => {
      connection.isAlive = true;
    });
    ws.on('message', (data: RawData, isBinary: boolean) => {
      this.handleMessage(connection, data, isBinary);
    });
    ws.on('close', () => {
      this.handleClose(connection.id);
    });
    ws.on('error', (error: Error) => {
      logger.error('WebSocket client error', { clientId: connection.id, error: error.message });
      this.handleClose(connection.id);
    });
  }

  private handleClose(connectionId: string): void {
    const connection = this.connections.get(connectionId);
    if (!connection) return;

    this.connections.delete(connectionId);
    this.notifier.detach(connectionId);
    metrics.setWebSocketConnections(this.connections.size);

    logger.info('WebSocket client disconnected', {
      clientId: connectionId,
      duration: Date.now() - connection.connectedAt.getTime(),
    });
  }

  private handleDropped(connection: ClientConnection, reason: DropReason): void {
    logger.warn('Closing WebSocket client that fell behind', { clientId: connection.id, reason });
    connection.ws.terminate();
    this.handleClose(connection.id);
  }

  private handleMessage(connection: ClientConnection, data: RawData, isBinary: boolean): void {
    if (isBinary) {
      this.handleOscPacket(connection, data).catch((error: unknown) => {
        logger.error('WebSocket OSC packet failed', { clientId: connection.id, error });
      });
      return;
    }

    let payload: unknown;
    try {
      payload = JSON.parse(data.toString());
    } catch {
      this.sendError(connection, new BadRequestError('Command is not valid JSON'));
      return;
    }

    const parsed = clientCommandSchema.safeParse(payload);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      this.sendError(connection, new BadRequestError(`Malformed command: ${issue.path.join('.') || 'COMMAND'} ${issue.message}`));
      return;
    }

    this.handleCommand(connection, parsed.data).catch((error: unknown) => {
      logger.error('WebSocket command failed', { clientId: connection.id, error });
    });
  }

  private async handleCommand(connection: ClientConnection, command: ClientCommand): Promise<void> {
    switch (command.COMMAND) {
      case 'LISTEN': {
        const exists = this.coordinator.read((namespace) => namespace.resolve(command.DATA) !== undefined);
        if (!exists) {
          this.sendError(connection, new NotFoundError(command.DATA));
          return;
        }
        this.notifier.listen(connection.id, command.DATA);
        logger.debug('Client listening', { clientId: connection.id, path: command.DATA });
        return;
      }
      case 'UNLISTEN':
      case 'IGNORE':
        this.notifier.unlisten(connection.id, command.DATA);
        logger.debug('Client stopped listening', { clientId: connection.id, path: command.DATA });
        return;
      case 'QUERY': {
        const { path, query } = splitQueryTarget(command.DATA);
        const result = this.resolver.queryRaw(path, query);
        this.send(connection, {
          COMMAND: 'QUERY_RESULT',
          DATA: result.ok
            ? { PATH: command.DATA, STATUS: 200, RESULT: result.value }
            : { PATH: command.DATA, STATUS: result.error.httpStatus, ERROR: result.error.toJSON() },
        });
        return;
      }
      case 'SET': {
        const result = await this.coordinator.submit({
          kind: 'set',
          path: command.DATA.PATH,
          values: command.DATA.VALUE,
          origin: 'websocket',
        });
        if (!result.ok) this.sendError(connection, result.error);
        return;
      }
    }
  }

  /** Binary frames carry OSC messages or bundles; each message becomes a `set` edit. */
  private async handleOscPacket(connection: ClientConnection, data: RawData): Promise<void> {
    const decoded = decodeOscPacket(rawToBuffer(data), 'websocket');
    if (!decoded.ok) {
      this.sendError(connection, decoded.error);
      return;
    }
    if (decoded.value.length === 0) return;
    const results = await this.coordinator.submitAll(decoded.value);
    for (const result of results) {
      if (!result.ok) this.sendError(connection, result.error);
    }
  }

  private deliver(connection: ClientConnection, message: string): Promise<void> {
    return new Promise((resolve, reject) => {
      if (connection.ws.readyState !== WebSocket.OPEN) {
        reject(new Error(`Connection ${connection.id} is not open`));
        return;
      }
      connection.ws.send(message, (error) => (error ? reject(error) : resolve()));
    });
  }

  private send(connection: ClientConnection, message: JsonObject): void {
    if (connection.ws.readyState !== WebSocket.OPEN) {
      logger.warn('Cannot send message to disconnected client', { clientId: connection.id });
      return;
    }
    connection.ws.send(JSON.stringify(message), (error) => {
      if (error) logger.error('Error sending message', { clientId: connection.id, error: error.message });
    });
  }

  private sendError(connection: ClientConnection, error: OscQueryError): void {
    this.send(connection, { COMMAND: 'ERROR', DATA: error.toJSON() });
  }

  private startHeartbeat(): void {
    this.heartbeatInterval = setInterval(() => {
      this.connections.forEach((connection) => {
        if (!connection.isAlive) {
          logger.warn('WebSocket heartbeat timeout', { clientId: connection.id });
          connection.ws.terminate();
          this.handleClose(connection.id);
          return;
        }
        connection.isAlive = false;
        connection.ws.ping();
      });
    }, this.options.heartbeatMs);
    this.heartbeatInterval.unref();
  }

  async shutdown(): Promise<void> {
    if (this.heartbeatInterval) {
      clearInterval(this.heartbeatInterval);
      this.heartbeatInterval = null;
    }

    this.connections.forEach((connection) => {
      if (connection.ws.readyState === WebSocket.OPEN) {
        connection.ws.close(1001, 'Server shutdown');
      }
      this.notifier.detach(connection.id);
    });
    this.connections.clear();
    metrics.setWebSocketConnections(0);

    const wss = this.wss;
    this.wss = null;
    if (wss) {
      await new Promise<void>((resolve) => {
        wss.close(() => resolve());
      });
    }
  }
}
