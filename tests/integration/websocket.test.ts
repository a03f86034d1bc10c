import { once } from 'node:events';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { toBuffer } from 'osc-min';
import { WebSocket } from 'ws';
import { loadConfig } from '../../src/config/index.js';
import { OscQueryServer } from '../../src/core/OscQueryServer.js';
import { Access } from '../../src/models/types.js';

interface ServerMessage {
  COMMAND: string;
  DATA: unknown;
}

function isServerMessage(value: unknown): value is ServerMessage {
  return typeof value === 'object' && value !== null && 'COMMAND' in value && typeof value.COMMAND === 'string';
}

function isServerError(value: unknown): value is { CODE: string } {
  return typeof value === 'object' && value !== null && 'CODE' in value && typeof value.CODE === 'string';
}

class TestClient {
  readonly messages: ServerMessage[] = [];

  private constructor(private readonly ws: WebSocket) {
    ws.on('message', (data) => {
      const parsed: unknown = JSON.parse(data.toString());
      if (isServerMessage(parsed)) this.messages.push(parsed);
    });
  }

  static async connect(port: number): Promise<TestClient> {
    const ws = new WebSocket(`ws://127.0.0.1:${port}`);
    await once(ws, 'open');
    return new TestClient(ws);
  }

  send(command: unknown): void {
    this.ws.send(JSON.stringify(command));
  }

  sendRaw(data: string | Buffer): void {
    this.ws.send(data);
  }

  commands(command: string): ServerMessage[] {
    return this.messages.filter((message) => message.COMMAND === command);
  }

  /** Send a QUERY and wait for its answer; everything sent before it has been handled once this resolves. */
  async sync(): Promise<void> {
    const before = this.commands('QUERY_RESULT').length;
    this.send({ COMMAND: 'QUERY', DATA: '/?ACCESS' });
    await vi.waitFor(() => expect(this.commands('QUERY_RESULT')).toHaveLength(before + 1));
  }

  async close(): Promise<void> {
    if (this.ws.readyState === WebSocket.CLOSED) return;
    const closed = once(this.ws, 'close');
    this.ws.close();
    await closed;
  }
}

describe('WebSocket channel', () => {
  let server: OscQueryServer;
  let port: number;
  const clients: TestClient[] = [];

  const connect = async () => {
    const client = await TestClient.connect(port);
    clients.push(client);
    return client;
  };

  beforeEach(async () => {
    server = new OscQueryServer(loadConfig({ HOST: '127.0.0.1', PORT: '0' }), { disableOsc: true });
    await server.applyNamespace([
      {
        path: '/synth/freq',
        attributes: {
          access: Access.READ_WRITE,
          slots: [{ type: 'f', value: 440, range: { min: 20, max: 20000 }, clipMode: 'both' }],
        },
      },
      { path: '/synth/name', attributes: { access: Access.READ_ONLY, slots: [{ type: 's', value: 'lead' }] } },
    ]);
    await server.start();
    port = server.address()?.port ?? 0;
  });

  afterEach(async () => {
    await Promise.all(clients.splice(0).map((client) => client.close()));
    await server.shutdown();
  });

  it('delivers exactly one PATH_CHANGED to a listener when another client sets the value', async () => {
    const listener = await connect();
    const writer = await connect();

    listener.send({ COMMAND: 'LISTEN', DATA: '/synth/freq' });
    await listener.sync();

    writer.send({ COMMAND: 'SET', DATA: { PATH: '/synth/freq', VALUE: [880] } });
    await vi.waitFor(() => expect(listener.commands('PATH_CHANGED')).toHaveLength(1));
    await listener.sync();
    await writer.sync();

    expect(listener.commands('PATH_CHANGED')).toEqual([
      {
        COMMAND: 'PATH_CHANGED',
        DATA: {
          FULL_PATH: '/synth/freq',
          ACCESS: 3,
          TYPE: 'f',
          VALUE: [880],
          RANGE: [{ MIN: 20, MAX: 20000, CLIPMODE: 'both' }],
          CLIPMODE: ['both'],
        },
      },
    ]);
    expect(writer.commands('PATH_CHANGED')).toEqual([]);
    expect(writer.commands('ERROR')).toEqual([]);
  });

  it('stops notifying after IGNORE', async () => {
    const client = await connect();
    client.send({ COMMAND: 'LISTEN', DATA: '/synth' });
    client.send({ COMMAND: 'IGNORE', DATA: '/synth' });
    await client.sync();

    await server.setValue('/synth/freq', [100]);
    await client.sync();

    expect(client.commands('PATH_CHANGED')).toEqual([]);
  });

  it('answers QUERY commands with the resolver result', async () => {
    const client = await connect();
    client.send({ COMMAND: 'QUERY', DATA: '/synth/freq?VALUE' });
    client.send({ COMMAND: 'QUERY', DATA: '/nonexistent' });

    await vi.waitFor(() => expect(client.commands('QUERY_RESULT')).toHaveLength(2));
    expect(client.commands('QUERY_RESULT')).toEqual([
      { COMMAND: 'QUERY_RESULT', DATA: { PATH: '/synth/freq?VALUE', STATUS: 200, RESULT: { VALUE: [440] } } },
      {
        COMMAND: 'QUERY_RESULT',
        DATA: {
          PATH: '/nonexistent',
          STATUS: 404,
          ERROR: { CODE: 'NOT_FOUND', MESSAGE: 'No node at /nonexistent', PATH: '/nonexistent' },
        },
      },
    ]);
  });

  it('reports rejected writes and malformed commands', async () => {
    const client = await connect();
    client.send({ COMMAND: 'SET', DATA: { PATH: '/synth/name', VALUE: ['pad'] } });
    client.sendRaw('not json');
    client.send({ COMMAND: 'LISTEN', DATA: '/missing' });

    await vi.waitFor(() => expect(client.commands('ERROR')).toHaveLength(3));
    const errors = client.commands('ERROR').map((message) => message.DATA);
    expect(errors).toContainEqual({ CODE: 'ACCESS', MESSAGE: '/synth/name is read-only', PATH: '/synth/name' });
    expect(errors).toContainEqual({ CODE: 'BAD_REQUEST', MESSAGE: 'Command is not valid JSON' });
    expect(errors).toContainEqual({ CODE: 'NOT_FOUND', MESSAGE: 'No node at /missing', PATH: '/missing' });
  });

  it('broadcasts structural changes to every client', async () => {
    const first = await connect();
    const second = await connect();

    await server.addNode('/synth/lfo', { access: Access.READ_WRITE, slots: [{ type: 'f' }] });
    await server.removeNode('/synth/name');

    for (const client of [first, second]) {
      await vi.waitFor(() => expect(client.commands('PATH_REMOVED')).toHaveLength(1));
      expect(client.commands('PATH_ADDED')).toEqual([{ COMMAND: 'PATH_ADDED', DATA: '/synth/lfo' }]);
      expect(client.commands('PATH_REMOVED')).toEqual([{ COMMAND: 'PATH_REMOVED', DATA: '/synth/name' }]);
    }
  });

  it('applies OSC messages and bundles sent as binary frames', async () => {
    const client = await connect();
    client.sendRaw(toBuffer({ address: '/synth/freq', args: [{ type: 'float', value: 880 }] }));

    await vi.waitFor(() => expect(server.query('/synth/freq', 'VALUE')).toEqual({ ok: true, value: { VALUE: [880] } }));

    client.sendRaw(
      toBuffer({
        oscType: 'bundle',
        timetag: 0,
        elements: [
          { address: '/synth/freq', args: [{ type: 'float', value: 100 }] },
          { address: '/synth/freq', args: [{ type: 'float', value: 30000 }] },
        ],
      })
    );

    await vi.waitFor(() => expect(server.query('/synth/freq', 'VALUE')).toEqual({ ok: true, value: { VALUE: [20000] } }));
    await client.sync();
    expect(client.commands('ERROR')).toEqual([]);
  });

  it('reports binary frames that are not OSC or that write read-only nodes', async () => {
    const client = await connect();
    client.sendRaw(toBuffer({ address: '/synth/name', args: [{ type: 'string', value: 'pad' }] }));
    client.sendRaw(Buffer.from('/a'));

    await vi.waitFor(() => expect(client.commands('ERROR')).toHaveLength(2));
    const errors = client.commands('ERROR').map((message) => message.DATA);
    expect(errors).toContainEqual({ CODE: 'ACCESS', MESSAGE: '/synth/name is read-only', PATH: '/synth/name' });
    expect(errors.filter((error) => isServerError(error) && error.CODE === 'BAD_REQUEST')).toHaveLength(1);
    expect(server.query('/synth/name', 'VALUE')).toEqual({ ok: true, value: { VALUE: ['lead'] } });
  });

  it('relays a triggered value to listeners of that path only', async () => {
    const listener = await connect();
    const bystander = await connect();
    listener.send({ COMMAND: 'LISTEN', DATA: '/synth/freq' });
    bystander.send({ COMMAND: 'LISTEN', DATA: '/synth/name' });
    await listener.sync();
    await bystander.sync();

    const result = await server.trigger('/synth/freq');

    expect(result).toEqual({ ok: true, value: 0 });
    await vi.waitFor(() => expect(listener.commands('PATH_CHANGED')).toHaveLength(1));
    expect(listener.commands('PATH_CHANGED')[0].DATA).toMatchObject({ FULL_PATH: '/synth/freq', VALUE: [440] });
    await bystander.sync();
    expect(bystander.commands('PATH_CHANGED')).toEqual([]);
  });

  it('detaches a client from the notifier when it disconnects', async () => {
    const client = await connect();
    client.send({ COMMAND: 'LISTEN', DATA: '/synth/freq' });
    await client.sync();
    expect(server.notifier.listenerCount('/synth/freq')).toBe(1);

    await client.close();

    await vi.waitFor(() => expect(server.webSocket.connectionCount).toBe(0));
    expect(server.notifier.subscriberCount).toBe(0);
    expect(server.notifier.listenerCount('/synth/freq')).toBe(0);
  });
});
