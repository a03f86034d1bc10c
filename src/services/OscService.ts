import type { EventEmitter } from 'node:events';
import { Client, Message, Server } from 'node-osc';
import type { OscTarget } from '../config/index.js';
import type { Edit, MutationCoordinator } from '../core/MutationCoordinator.js';
import { AccessError, NotFoundError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { err, ok, type Result } from '../utils/result.js';
import { packetToEdits, toOscArgument } from './oscPackets.js';

/** Inbound UDP socket: emits `message` with `[address, ...args]` and `bundle` with an OSC bundle. */
export interface OscReceiverSocket extends EventEmitter {
  close(callback?: () => void): void;
}

export interface OscSenderSocket {
  send(message: Message, callback?: (error: Error | null) => void): void;
  close(callback?: () => void): void;
}

export interface OscSocketFactory {
  createReceiver(port: number, host: string): OscReceiverSocket;
  createSender(target: OscTarget): OscSenderSocket;
}

export const nodeOscSockets: OscSocketFactory = {
  createReceiver: (port, host) => new Server(port, host),
  createSender: (target) => new Client(target.host, target.port),
};

export interface OscServiceOptions {
  host: string;
  port: number;
  targets: OscTarget[];
  sockets?: OscSocketFactory;
}

/**
 * OSC over UDP. Incoming messages become `set` edits with origin `osc`; the receive
 * callback only submits, it never waits for the edit to be applied.
 */
export class OscService {
  private receiver: OscReceiverSocket | null = null;
  private senders: OscSenderSocket[] = [];
  private readonly sockets: OscSocketFactory;

  constructor(
    private readonly coordinator: MutationCoordinator,
    private readonly options: OscServiceOptions
  ) {
    this.sockets = options.sockets ?? nodeOscSockets;
  }

  get isRunning(): boolean {
    return this.receiver !== null;
  }

  start(): void {
    if (this.receiver) {
      logger.warn('OSC service already started');
      return;
    }
    const receiver = this.sockets.createReceiver(this.options.port, this.options.host);
    receiver.on('message', (message: unknown) => this.handlePacket(message));
    receiver.on('bundle', (bundle: unknown) => this.handlePacket(bundle));
    receiver.on('error', (error: unknown) => {
      logger.error('OSC socket error', { error });
    });
    this.receiver = receiver;
    this.senders = this.options.targets.map((target) => this.sockets.createSender(target));

    logger.info('OSC service listening', {
      host: this.options.host,
      port: this.options.port,
      targets: this.options.targets.map((target) => `${target.host}:${target.port}`),
    });
  }

  /** Send the current value of a readable node to every configured target. */
  async trigger(path: string): Promise<Result<number>> {
    const snapshot = this.coordinator.read((namespace) => {
      const node = namespace.resolve(path);
      if (!node) return err(new NotFoundError(path));
      if (!node.isReadable) return err(new AccessError(`${node.fullPath} has no readable value`, node.fullPath));
      return ok(new Message(node.fullPath, ...node.slots.map((slot) => toOscArgument(slot.type, slot.value))));
    });
    if (!snapshot.ok) return snapshot;
    const message = snapshot.value;

    await Promise.all(
      this.senders.map(
        (sender) =>
          new Promise<void>((resolve, reject) => {
            sender.send(message, (error) => (error ? reject(error) : resolve()));
          })
      )
    );
    logger.debug('OSC message sent', { path: message.address, targets: this.senders.length });
    return ok(this.senders.length);
  }

  async stop(): Promise<void> {
    const receiver = this.receiver;
    this.receiver = null;
    const senders = this.senders;
    this.senders = [];

    await Promise.all([
      ...(receiver ? [new Promise<void>((resolve) => receiver.close(() => resolve()))] : []),
      ...senders.map((sender) => new Promise<void>((resolve) => sender.close(() => resolve()))),
    ]);
    logger.info('OSC service stopped');
  }

  private handlePacket(packet: unknown): void {
    const edits = packetToEdits(packet, 'osc');
    if (edits.length > 0) this.dispatch(edits);
  }

  private dispatch(edits: Edit[]): void {
    void this.coordinator.submitAll(edits).then(
      (results) => {
        results.forEach((result, index) => {
          if (!result.ok) {
            logger.debug('OSC edit rejected', { path: edits[index].path, code: result.error.code });
          }
        });
      },
      (error: unknown) => {
        logger.error('OSC edit failed', { error });
      }
    );
  }
}
