import http from 'node:http';
import type { AddressInfo } from 'node:net';
import { createApp } from '../app.js';
import type { ServerConfig } from '../config/index.js';
import { readNamespaceFile, type NodeDeclaration } from '../config/namespace.js';
import { renderAttributes } from '../models/nodeView.js';
import type { JsonObject, NodeAttributes } from '../models/types.js';
import { ChangeNotifier } from '../services/ChangeNotifier.js';
import { OscService, type OscSocketFactory } from '../services/OscService.js';
import { QueryResolver, type HostInfo, type HostInfoProvider, type QueryParam } from '../services/QueryResolver.js';
import { WebSocketService } from '../services/WebSocketService.js';
import { ConfigError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { Result } from '../utils/result.js';
import { MutationCoordinator, type Edit, type EditOutcome } from './MutationCoordinator.js';

export type OscQueryServerConfig = Pick<
  ServerConfig,
  'serviceName' | 'http' | 'osc' | 'websocket' | 'notifier' | 'rateLimit' | 'allowedOrigins'
>;

export interface OscQueryServerOptions {
  /** Replaces the UDP sockets, mainly for tests. */
  oscSockets?: OscSocketFactory;
  /** Skip binding the OSC/UDP port entirely. */
  disableOsc?: boolean;
}

/**
 * One OSCQuery server instance: the namespace, its coordinator and every transport
 * bound to it. Host code edits the namespace through this object only.
 */
export class OscQueryServer implements HostInfoProvider {
  readonly coordinator: MutationCoordinator;
  readonly notifier: ChangeNotifier;
  readonly resolver: QueryResolver;
  readonly webSocket: WebSocketService;
  readonly osc: OscService;
  readonly app: ReturnType<typeof createApp>;
  private readonly httpServer: http.Server;
  private started = false;

  constructor(
    private readonly config: OscQueryServerConfig,
    private readonly options: OscQueryServerOptions = {}
  ) {
    this.notifier = new ChangeNotifier({ queueLimit: config.notifier.queueLimit });
    this.coordinator = new MutationCoordinator(this.notifier);
    this.resolver = new QueryResolver(this.coordinator, this);
    this.webSocket = new WebSocketService(this.coordinator, this.notifier, this.resolver, config.websocket);
    this.osc = new OscService(this.coordinator, {
      ...config.osc,
      ...(options.oscSockets ? { sockets: options.oscSockets } : {}),
    });
    this.app = createApp({
      resolver: this.resolver,
      allowedOrigins: config.allowedOrigins,
      rateLimit: config.rateLimit,
      status: () => ({
        nodes: this.coordinator.read((namespace) => namespace.size),
        websocketClients: this.webSocket.connectionCount,
      }),
    });
    this.httpServer = http.createServer(this.app);
  }

  hostInfo(): HostInfo {
    return {
      name: this.config.serviceName,
      oscIp: this.config.osc.host,
      oscPort: this.config.osc.port,
      oscTransport: 'UDP',
    };
  }

  /** Bound HTTP/WebSocket address, once started. */
  address(): AddressInfo | undefined {
    const address = this.httpServer.address();
    return address !== null && typeof address === 'object' ? address : undefined;
  }

  async start(): Promise<void> {
    if (this.started) {
      logger.warn('OSCQuery server already started');
      return;
    }

    this.webSocket.initialize(this.httpServer);
    if (!this.options.disableOsc) this.osc.start();

    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error) => reject(error);
      this.httpServer.once('error', onError);
      this.httpServer.listen(this.config.http.port, this.config.http.host, () => {
        this.httpServer.off('error', onError);
        resolve();
      });
    });
    this.started = true;

    logger.info('OSCQuery server listening', {
      name: this.config.serviceName,
      http: this.address(),
      osc: this.options.disableOsc ? 'disabled' : `${this.config.osc.host}:${this.config.osc.port}`,
    });
  }

  async shutdown(): Promise<void> {
    logger.info('Shutting down OSCQuery server...');
    await this.coordinator.close();
    await Promise.all([this.webSocket.shutdown(), this.osc.isRunning ? this.osc.stop() : Promise.resolve()]);

    if (this.started) {
      this.started = false;
      await new Promise<void>((resolve, reject) => {
        this.httpServer.close((error) => (error ? reject(error) : resolve()));
        this.httpServer.closeAllConnections();
      });
    }
    logger.info('OSCQuery server closed');
  }

  addNode(path: string, attributes: NodeAttributes): Promise<Result<EditOutcome>> {
    return this.coordinator.submit({ kind: 'insert', path, attributes });
  }

  removeNode(path: string): Promise<Result<EditOutcome>> {
    return this.coordinator.submit({ kind: 'remove', path });
  }

  /** Host writes may update READ_ONLY nodes, which network peers cannot. */
  setValue(path: string, values: readonly unknown[]): Promise<Result<EditOutcome>> {
    return this.coordinator.submit({ kind: 'set', path, values, origin: 'host' });
  }

  query(path: string, param?: QueryParam): Result<JsonObject> {
    return this.resolver.query(path, param);
  }

  /**
   * Push the current value of a node to every OSC target and to the WebSocket clients
   * listening on it. Resolves with the number of OSC targets reached.
   */
  async trigger(path: string): Promise<Result<number>> {
    const view = this.coordinator.read((namespace) => {
      const node = namespace.resolve(path);
      return node?.isReadable ? { path: node.fullPath, attributes: renderAttributes(node, false) } : undefined;
    });
    const sent = await this.osc.trigger(path);
    if (sent.ok && view) this.notifier.notify({ kind: 'PATH_CHANGED', ...view });
    return sent;
  }

  /** Insert every declared node in order. Throws a ConfigError naming each rejected node. */
  async applyNamespace(declarations: readonly NodeDeclaration[]): Promise<number> {
    const results = await this.coordinator.submitAll(
      declarations.map(({ path, attributes }): Edit => ({ kind: 'insert', path, attributes }))
    );
    const failures = results.flatMap((result, index) =>
      result.ok ? [] : [`${declarations[index].path}: ${result.error.message}`]
    );
    if (failures.length > 0) throw new ConfigError('Namespace declaration rejected', failures);
    return declarations.length;
  }

  async loadNamespaceFile(filePath: string): Promise<number> {
    const count = await this.applyNamespace(await readNamespaceFile(filePath));
    logger.info('Namespace loaded', { file: filePath, nodes: count });
    return count;
  }
}
