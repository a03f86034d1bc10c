import { fileURLToPath } from 'node:url';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import request from 'supertest';
import { loadConfig } from '../../src/config/index.js';
import { OscQueryServer } from '../../src/core/OscQueryServer.js';
import { Access } from '../../src/models/types.js';
import { ConfigError } from '../../src/utils/errors.js';

const namespaceFile = fileURLToPath(new URL('../fixtures/synth.namespace.json', import.meta.url));

describe('HTTP namespace queries', () => {
  let server: OscQueryServer;

  beforeEach(async () => {
    server = new OscQueryServer(loadConfig({ SERVICE_NAME: 'test-synth', OSC_HOST: '127.0.0.1', OSC_PORT: '9000' }), {
      disableOsc: true,
    });
    await server.loadNamespaceFile(namespaceFile);
  });

  afterEach(async () => {
    await server.shutdown();
  });

  it('returns the full attribute object of a node', async () => {
    const res = await request(server.app).get('/synth/freq');

    expect(res.status).toBe(200);
    expect(res.headers['content-type']).toMatch(/application\/json/);
    expect(res.body).toEqual({
      FULL_PATH: '/synth/freq',
      ACCESS: 3,
      DESCRIPTION: 'Oscillator frequency',
      TYPE: 'f',
      VALUE: [440],
      RANGE: [{ MIN: 20, MAX: 20000, CLIPMODE: 'both' }],
      CLIPMODE: ['both'],
      UNIT: ['Hz'],
    });
  });

  it('lists the namespace from the root', async () => {
    const res = await request(server.app).get('/');

    expect(res.status).toBe(200);
    expect(res.body.DESCRIPTION).toBe('root node');
    expect(Object.keys(res.body.CONTENTS)).toEqual(['synth']);
    expect(res.body.CONTENTS.synth.CONTENTS).toBeUndefined();
  });

  it('serves the clipped value after a host write', async () => {
    await server.setValue('/synth/freq', [30000]);
    const res = await request(server.app).get('/synth/freq?VALUE');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ VALUE: [20000] });
  });

  it('answers 400 for more than one attribute', async () => {
    const res = await request(server.app).get('/synth/freq?VALUE&TYPE');

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ CODE: 'BAD_REQUEST', MESSAGE: 'Only one query attribute is allowed, got VALUE, TYPE' });
  });

  it('answers 404 for unknown paths', async () => {
    const res = await request(server.app).get('/nonexistent');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ CODE: 'NOT_FOUND', MESSAGE: 'No node at /nonexistent', PATH: '/nonexistent' });
  });

  it('answers 204 for an attribute the node lacks', async () => {
    const res = await request(server.app).get('/synth?VALUE');

    expect(res.status).toBe(204);
    expect(res.text).toBe('');
  });

  it('answers 403 for the value of a write-only node', async () => {
    const res = await request(server.app).get('/synth/gate?VALUE');

    expect(res.status).toBe(403);
    expect(res.body.CODE).toBe('ACCESS');
  });

  it('serves HOST_INFO on any path', async () => {
    const res = await request(server.app).get('/synth/freq?HOST_INFO');

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ NAME: 'test-synth', OSC_TRANSPORT: 'UDP', OSC_IP: '127.0.0.1', OSC_PORT: 9000 });
    expect(res.body.EXTENSIONS.LISTEN).toBe(true);
  });

  it('decodes percent-encoded paths', async () => {
    await server.addNode('/café', { access: Access.NO_VALUE, description: 'encoded' });
    const res = await request(server.app).get('/caf%C3%A9?DESCRIPTION');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ DESCRIPTION: 'encoded' });
  });

  it('does not route other methods into the namespace', async () => {
    const res = await request(server.app).post('/synth/freq').send({ VALUE: [1] });

    expect(res.status).toBe(404);
    expect(res.body.CODE).toBe('NOT_FOUND');
  });

  it('reports health and metrics', async () => {
    const health = await request(server.app).get('/health');
    const metrics = await request(server.app).get('/metrics');

    expect(health.status).toBe(200);
    expect(health.body).toMatchObject({ status: 'ok', nodes: 6, websocketClients: 0 });
    expect(metrics.status).toBe(200);
    expect(metrics.text).toContain('oscquery_edits_total');
  });

  it('rejects a namespace declaration that conflicts with the tree', async () => {
    await expect(
      server.applyNamespace([{ path: '/synth/freq', attributes: { access: Access.READ_ONLY, slots: [{ type: 's' }] } }])
    ).rejects.toThrow(ConfigError);
  });
});
