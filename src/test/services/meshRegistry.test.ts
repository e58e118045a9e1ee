import test from 'node:test';
import assert from 'node:assert/strict';
import { ConnectionFailedError, MeshErrorCode, isMeshError } from '../../core/errors';
import { MeshRegistry } from '../../services/MeshRegistry';
import { ConnectionEntry, ConnectionSpec, DeviceRecord, DeviceSnapshot } from '../../types/mesh';

const sleep = (ms: number) => new Promise((r) => setTimeout(r, ms));

function entry(id: string, tcpHost: string): ConnectionEntry {
  return { id, title: `Radio ${id}`, connection: { kind: 'tcp', tcpHost }, scanIntervalSec: 30 };
}

function hasCode(code: MeshErrorCode, message?: string) {
  return (e: unknown) => isMeshError(e) && e.code === code && (message === undefined || e.message === message);
}

function setup(opts: { downHosts?: Set<string>; setupRetryMs?: number; readDelayMs?: number } = {}) {
  const down = opts.downHosts ?? new Set<string>();
  let reads = 0;
  const reader = {
    async read(spec: ConnectionSpec): Promise<DeviceRecord> {
      reads += 1;
      if (opts.readDelayMs) await sleep(opts.readDelayMs);
      if (spec.kind !== 'tcp') throw new Error('tcp only');
      if (down.has(spec.tcpHost)) throw new ConnectionFailedError(`connect ECONNREFUSED ${spec.tcpHost}:4403`);
      return {
        connection: spec,
        target: { kind: 'tcp', tcpHost: spec.tcpHost, tcpPort: 4403 },
        telemetry: { nodeName: spec.tcpHost },
      };
    },
  };
  const calls: unknown[][] = [];
  const executor = {
    async sendMessage(spec: ConnectionSpec, message: string, target?: string) {
      calls.push(['send_message', spec, message, target]);
    },
    async reboot(spec: ConnectionSpec) {
      calls.push(['reboot', spec]);
    },
    async setChannel(spec: ConnectionSpec, name: string) {
      calls.push(['set_channel', spec, name]);
    },
  };
  const registry = new MeshRegistry({ reader, executor, setupRetryMs: opts.setupRetryMs });
  return { registry, calls, down, reads: () => reads };
}

test('setupEntry registers the scheduler and the command table', async () => {
  const { registry } = setup();
  const events: string[] = [];
  registry.on('snapshot', (id: string, snap: DeviceSnapshot) => events.push(`${id}:${snap.telemetry?.nodeName}`));

  assert.equal(registry.hasCommands(), false);
  const snap = await registry.setupEntry(entry('a', '10.0.0.2'));
  assert.deepEqual(snap.telemetry, { nodeName: '10.0.0.2' });
  assert.deepEqual(registry.entryIds, ['a']);
  assert.equal(registry.hasCommands(), true);
  assert.deepEqual(events, ['a:10.0.0.2']);
  assert.deepEqual(
    registry.getSnapshots().map((s) => [s.entryId, s.title]),
    [['a', 'Radio a']]
  );
  registry.shutdown();
});

test('an unreachable entry is NotReady and registers nothing', async () => {
  const { registry } = setup({ downHosts: new Set(['10.0.0.66']) });
  await assert.rejects(registry.setupEntry(entry('a', '10.0.0.66')), hasCode('NotReady'));
  assert.deepEqual(registry.entryIds, []);
  assert.equal(registry.hasCommands(), false);
  await assert.rejects(registry.invoke('refresh', {}), hasCode('NoEntries'));
});

test('resolveSchedulers picks by id or the only entry', async () => {
  const { registry } = setup();
  assert.throws(() => registry.resolveSchedulers(), hasCode('NoEntries'));

  await registry.setupEntry(entry('a', '10.0.0.2'));
  assert.deepEqual(registry.resolveSchedulers().map((s) => s.id), ['a']);

  await registry.setupEntry(entry('b', '10.0.0.3'));
  assert.throws(() => registry.resolveSchedulers(), hasCode('AmbiguousEntry', '2 mesh radio connections configured; provide entry_id'));
  assert.deepEqual(registry.resolveSchedulers('b').map((s) => s.id), ['b']);
  assert.throws(() => registry.resolveSchedulers('zzz'), hasCode('EntryNotFound', 'Unknown connection entry: zzz'));
  registry.shutdown();
});

test('commands reach the executor with the entry connection', async () => {
  const { registry, calls } = setup();
  await registry.setupEntry(entry('a', '10.0.0.2'));
  await registry.setupEntry(entry('b', '10.0.0.3'));

  const sent = await registry.invoke('send_message', { entry_id: 'a', message: 'hi', target: '!00000002' });
  assert.deepEqual(sent, { entryIds: ['a'] });
  await registry.invoke('set_channel', { entry_id: 'b', channel_name: 'Ops' });
  await registry.invoke('reboot', { entry_id: 'b' });
  assert.deepEqual(calls, [
    ['send_message', { kind: 'tcp', tcpHost: '10.0.0.2' }, 'hi', '!00000002'],
    ['set_channel', { kind: 'tcp', tcpHost: '10.0.0.3' }, 'Ops'],
    ['reboot', { kind: 'tcp', tcpHost: '10.0.0.3' }],
  ]);
  await assert.rejects(registry.invoke('reboot', {}), hasCode('AmbiguousEntry'));
  registry.shutdown();
});

test('payload validation', async () => {
  const { registry, calls } = setup();
  await registry.setupEntry(entry('a', '10.0.0.2'));
  await assert.rejects(registry.invoke('send_message', { message: '  ' }), hasCode('InvalidArgument', 'Message cannot be empty'));
  await assert.rejects(registry.invoke('send_message', { message: 5 }), hasCode('InvalidArgument', 'message is required'));
  await assert.rejects(registry.invoke('set_channel', {}), hasCode('InvalidArgument', 'channel_name is required'));
  await assert.rejects(registry.invoke('reboot', { entry_id: 3 }), hasCode('InvalidArgument', 'entry_id must be a string'));
  await assert.rejects(registry.invoke('explode', {}), hasCode('InvalidArgument', 'Unknown command: explode'));
  await assert.rejects(registry.invoke('reboot', 'now'), hasCode('InvalidArgument', 'Command payload must be an object'));
  assert.deepEqual(calls, []);
  registry.shutdown();
});

test('refresh polls immediately and returns the snapshots', async () => {
  const { registry, reads } = setup();
  await registry.setupEntry(entry('a', '10.0.0.2'));
  const before = reads();
  const result = await registry.invoke('refresh', undefined);
  assert.deepEqual(result.entryIds, ['a']);
  assert.equal(result.snapshots?.length, 1);
  assert.equal(reads(), before + 1);
  registry.shutdown();
});

test('loadEntries retries entries that were not ready', async () => {
  const { registry, down } = setup({ downHosts: new Set(['10.0.0.2']), setupRetryMs: 20 });
  await registry.loadEntries([entry('a', '10.0.0.2')]);
  assert.deepEqual(registry.entryIds, []);
  assert.deepEqual(registry.pendingIds, ['a']);

  down.clear();
  await sleep(80);
  assert.deepEqual(registry.entryIds, ['a']);
  assert.deepEqual(registry.pendingIds, []);
  registry.shutdown();
});

test('unload and shutdown tear entries down; the command table stays registered', async () => {
  const { registry } = setup({ setupRetryMs: 10_000 });
  await registry.setupEntry(entry('a', '10.0.0.2'));
  assert.equal(registry.unloadEntry('a'), true);
  assert.equal(registry.unloadEntry('a'), false);
  assert.equal(registry.hasCommands(), true);
  await assert.rejects(registry.invoke('refresh', {}), hasCode('NoEntries'));

  await registry.setupEntry(entry('b', '10.0.0.3'));
  registry.shutdown();
  assert.deepEqual(registry.entryIds, []);
});

test('unloading an entry while its first poll is running discards the setup', async () => {
  const { registry } = setup({ readDelayMs: 50 });
  const events: string[] = [];
  registry.on('snapshot', (id: string) => events.push(id));

  const settingUp = registry.setupEntry(entry('a', '10.0.0.2'));
  await sleep(10);
  assert.deepEqual(registry.waitingIds, ['a']);
  assert.equal(registry.unloadEntry('a'), true);

  await assert.rejects(settingUp, hasCode('NotReady', 'Connection a is not ready: entry was unloaded during setup'));
  assert.deepEqual(registry.entryIds, []);
  assert.deepEqual(registry.waitingIds, []);
  assert.deepEqual(events, []);
});

test('a reload cancelled by unload schedules no retry', async () => {
  const { registry } = setup({ readDelayMs: 50, setupRetryMs: 10 });
  const reloading = registry.reloadEntry(entry('a', '10.0.0.2'));
  await sleep(10);
  registry.unloadEntry('a');
  await reloading;
  assert.deepEqual(registry.entryIds, []);
  assert.deepEqual(registry.pendingIds, []);
});

test('concurrent reloads keep only the latest scheduler', async () => {
  const { registry } = setup({ readDelayMs: 50 });
  const events: string[] = [];
  registry.on('snapshot', (id: string, snap: DeviceSnapshot) => events.push(`${id}:${snap.telemetry?.nodeName}`));

  const first = registry.reloadEntry(entry('a', '10.0.0.2'));
  await sleep(10);
  const second = registry.reloadEntry(entry('a', '10.0.0.3'));
  await Promise.all([first, second]);

  assert.deepEqual(registry.entryIds, ['a']);
  assert.deepEqual(registry.resolveSchedulers('a')[0].connection, { kind: 'tcp', tcpHost: '10.0.0.3' });
  assert.deepEqual(registry.pendingIds, []);
  assert.deepEqual(events, ['a:10.0.0.3']);
  registry.shutdown();
});

test('commands are available after loadEntries and report retrying entries as NotReady', async () => {
  const { registry } = setup({ downHosts: new Set(['10.0.0.2']), setupRetryMs: 10_000 });
  await registry.loadEntries([entry('a', '10.0.0.2')]);
  assert.equal(registry.hasCommands(), true);

  await assert.rejects(registry.invoke('refresh', {}), hasCode('NotReady', 'Connection a is not ready: setup has not completed yet'));
  await assert.rejects(registry.invoke('reboot', { entry_id: 'a' }), hasCode('NotReady'));
  await assert.rejects(registry.invoke('reboot', { entry_id: 'b' }), hasCode('EntryNotFound'));

  registry.unloadEntry('a');
  await assert.rejects(registry.invoke('refresh', {}), hasCode('NoEntries'));
});
