import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import http from 'node:http';
import os from 'node:os';
import path from 'node:path';
import { createApp } from '../../api/app';
import { ConnectionFailedError, SerialBackendUnavailableError, UnsupportedOperationError } from '../../core/errors';
import { DiscoverOptions, NetworkDiscoverer } from '../../core/NetworkDiscoverer';
import { MeshRegistry } from '../../services/MeshRegistry';
import { ConnectionConfigStore } from '../../storage/ConnectionConfigStore';
import { ConnectionSpec, DeviceRecord, DiscoveredTcpCandidate, UsbPortInfo } from '../../types/mesh';

interface Harness {
  baseUrl: string;
  registry: MeshRegistry;
  discoverCalls: DiscoverOptions[];
  sent: string[];
  state: { portsError?: Error };
  close: () => Promise<void>;
}

async function startServer(): Promise<Harness> {
  const dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'mesh-api-'));
  const state: { portsError?: Error } = {};
  const discoverCalls: DiscoverOptions[] = [];
  const sent: string[] = [];

  const reader = {
    async read(spec: ConnectionSpec): Promise<DeviceRecord> {
      if (spec.kind !== 'tcp') throw new Error('tcp only');
      if (spec.tcpHost === '10.0.0.66') throw new ConnectionFailedError('unreachable');
      return {
        connection: spec,
        target: { kind: 'tcp', tcpHost: spec.tcpHost, tcpPort: 4403 },
        telemetry: { nodeName: 'Node', canonicalNodeId: '!0000abcd', batteryLevel: 77 },
      };
    },
  };
  const executor = {
    async sendMessage(_spec: ConnectionSpec, message: string) {
      sent.push(message);
    },
    async reboot(): Promise<void> {
      throw new UnsupportedOperationError('reboot');
    },
    async setChannel() {
      return undefined;
    },
  };
  const registry = new MeshRegistry({ reader, executor, setupRetryMs: 60_000 });
  const ports = {
    async listPorts(): Promise<UsbPortInfo[]> {
      if (state.portsError) throw state.portsError;
      return [{ device: '/dev/ttyUSB0', vid: 0x10c4, pid: 0xea60 }];
    },
  };
  const subnets = new NetworkDiscoverer({ reader, localAddress: async () => '10.0.0.1' });
  const discoverer = {
    async discover(opts: DiscoverOptions = {}): Promise<DiscoveredTcpCandidate[]> {
      discoverCalls.push(opts);
      await subnets.discoveryHosts(opts.subnet);
      return [{ host: '10.0.0.5', port: 4403, telemetry: { nodeName: 'Hill' }, title: 'Hill (10.0.0.5:4403)' }];
    },
  };

  const app = createApp({ ports, discoverer, registry, store: new ConnectionConfigStore(dataDir) });
  const server = http.createServer(app);
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  assert.ok(address !== null && typeof address === 'object');

  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    registry,
    discoverCalls,
    sent,
    state,
    close: async () => {
      registry.shutdown();
      await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    },
  };
}

async function call(h: Harness, method: string, url: string, body?: unknown) {
  const res = await fetch(`${h.baseUrl}${url}`, {
    method,
    headers: body === undefined ? undefined : { 'content-type': 'application/json' },
    body: body === undefined ? undefined : JSON.stringify(body),
  });
  const json: unknown = await res.json();
  return { status: res.status, json };
}

test('GET /ports lists radio ports', async () => {
  const h = await startServer();
  try {
    assert.deepEqual(await call(h, 'GET', '/ports'), {
      status: 200,
      json: { code: 0, msg: 'success', data: [{ device: '/dev/ttyUSB0', vid: '0x10c4', pid: '0xea60' }] },
    });

    h.state.portsError = new SerialBackendUnavailableError();
    assert.deepEqual(await call(h, 'GET', '/ports'), {
      status: 200,
      json: { code: 0, msg: 'success', data: [] },
    });
  } finally {
    await h.close();
  }
});

test('GET /discover passes query options through', async () => {
  const h = await startServer();
  try {
    const res = await call(h, 'GET', '/discover?subnet=10.0.0.0/30&concurrency=4');
    assert.deepEqual(res, {
      status: 200,
      json: {
        code: 0,
        msg: 'success',
        data: [{ host: '10.0.0.5', port: 4403, title: 'Hill (10.0.0.5:4403)', node: { nodeName: 'Hill' } }],
      },
    });
    assert.deepEqual(h.discoverCalls, [{ subnet: '10.0.0.0/30', port: 4403, timeoutMs: 500, concurrency: 4 }]);

    const bad = await call(h, 'GET', '/discover?port=abc');
    assert.equal(bad.status, 400);
    assert.equal(h.discoverCalls.length, 1);

    assert.deepEqual(await call(h, 'GET', '/discover?subnet=10.0.0.0/8'), {
      status: 400,
      json: { code: 400, msg: 'Subnet 10.0.0.0/8 is wider than /16; narrow it to scan', error: 'InvalidArgument' },
    });
  } finally {
    await h.close();
  }
});

test('connections, devices and commands', async () => {
  const h = await startServer();
  try {
    const created = await call(h, 'POST', '/connections', { id: 'a', connection: { kind: 'tcp', tcpHost: '10.0.0.2' } });
    assert.deepEqual(created, {
      status: 200,
      json: {
        code: 0,
        msg: 'success',
        data: {
          id: 'a',
          title: 'Mesh radio (10.0.0.2)',
          scanIntervalSec: 30,
          connection: { kind: 'tcp', tcpHost: '10.0.0.2' },
          ready: true,
        },
      },
    });

    const devices = await call(h, 'GET', '/devices');
    assert.equal(devices.status, 200);
    const snapshot = h.registry.getSnapshots()[0].snapshot;
    assert.ok(snapshot);
    assert.deepEqual(devices.json, {
      code: 0,
      msg: 'success',
      data: [
        {
          entryId: 'a',
          title: 'Mesh radio (10.0.0.2)',
          identifier: '!0000abcd',
          displayName: 'Node (!0000abcd)',
          connectionKind: 'tcp',
          tcpHost: '10.0.0.2',
          tcpPort: 4403,
          updatedAt: snapshot.updatedAt,
          node: { nodeName: 'Node', canonicalNodeId: '!0000abcd', batteryLevel: 77 },
        },
      ],
    });

    const sent = await call(h, 'POST', '/commands/send_message', { message: 'hi' });
    assert.deepEqual(sent, { status: 200, json: { code: 0, msg: 'success', data: { entryIds: ['a'] } } });
    assert.deepEqual(h.sent, ['hi']);

    const reboot = await call(h, 'POST', '/commands/reboot', {});
    assert.deepEqual(reboot, {
      status: 501,
      json: { code: 501, msg: 'reboot is not supported by this device', error: 'UnsupportedOperation' },
    });

    const missing = await call(h, 'POST', '/commands/refresh', { entry_id: 'nope' });
    assert.equal(missing.status, 404);

    const empty = await call(h, 'POST', '/commands/send_message', { message: ' ' });
    assert.equal(empty.status, 400);

    assert.equal((await call(h, 'DELETE', '/connections/a')).status, 200);
    assert.equal((await call(h, 'DELETE', '/connections/a')).status, 404);
    assert.deepEqual((await call(h, 'GET', '/devices')).json, { code: 0, msg: 'success', data: [] });
  } finally {
    await h.close();
  }
});

test('invalid entries are rejected and unreachable ones keep retrying', async () => {
  const h = await startServer();
  try {
    const bad = await call(h, 'POST', '/connections', { connection: { kind: 'ble' } });
    assert.deepEqual(bad, {
      status: 400,
      json: { code: 400, msg: 'Invalid connection kind: ble', error: 'InvalidConnectionKind' },
    });
    assert.equal((await call(h, 'POST', '/connections', { connection: { kind: 'tcp' } })).status, 400);

    const down = await call(h, 'POST', '/connections', { id: 'd', connection: { kind: 'tcp', tcpHost: '10.0.0.66' } });
    assert.equal(down.status, 200);
    const listed = await call(h, 'GET', '/connections');
    assert.deepEqual(listed.json, {
      code: 0,
      msg: 'success',
      data: [
        {
          id: 'd',
          title: 'Mesh radio (10.0.0.66)',
          scanIntervalSec: 30,
          connection: { kind: 'tcp', tcpHost: '10.0.0.66' },
          status: 'retrying',
        },
      ],
    });
  } finally {
    await h.close();
  }
});
