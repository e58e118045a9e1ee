import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { ConnectionConfigStore, normalizeConnectionEntries } from '../../storage/ConnectionConfigStore';

async function tmpDir() {
  return fs.mkdtemp(path.join(os.tmpdir(), 'mesh-connections-'));
}

test('a missing file lists no entries', async () => {
  const store = new ConnectionConfigStore(await tmpDir());
  assert.deepEqual(await store.list(), []);
});

test('upsert normalizes, persists and overwrites by id', async () => {
  const dir = await tmpDir();
  const store = new ConnectionConfigStore(dir, () => 1234);

  const a = await store.upsert({ id: 'a', connection: { kind: 'tcp', tcpHost: '10.0.0.2', tcpPort: 4403 }, scanIntervalSec: 5 });
  assert.deepEqual(a, {
    id: 'a',
    title: 'Mesh radio (10.0.0.2:4403)',
    connection: { kind: 'tcp', tcpHost: '10.0.0.2', tcpPort: 4403 },
    scanIntervalSec: 10,
  });

  await store.upsert({ id: 'a', title: ' Roof ', connection: { kind: 'serial', serialPort: '' } });
  const entries = await store.list();
  assert.deepEqual(entries, [
    { id: 'a', title: 'Roof', connection: { kind: 'serial', serialPort: 'auto' }, scanIntervalSec: 30 },
  ]);

  const doc: unknown = JSON.parse(await fs.readFile(path.join(dir, 'connections.json'), 'utf8'));
  assert.deepEqual(doc, { schemaVersion: 1, updatedAt: 1234, entries });
  // 第二次写入前的内容留在 .bak
  await fs.access(path.join(dir, 'connections.json.bak'));
});

test('upsert without an id generates one', async () => {
  const store = new ConnectionConfigStore(await tmpDir());
  const entry = await store.upsert({ connection: { kind: 'tcp', tcpHost: 'radio.lan' } });
  assert.match(entry.id, /^[0-9a-f-]{36}$/);
  assert.equal(entry.title, 'Mesh radio (radio.lan)');
});

test('remove', async () => {
  const store = new ConnectionConfigStore(await tmpDir());
  await store.upsert({ id: 'a', connection: { kind: 'serial', serialPort: 'auto' } });
  assert.equal(await store.remove('a'), true);
  assert.equal(await store.remove('a'), false);
  assert.deepEqual(await store.list(), []);
});

test('invalid and duplicate entries are dropped on read', () => {
  const doc = normalizeConnectionEntries({
    updatedAt: 99,
    entries: [
      { id: 'a', connection: { kind: 'serial' } },
      { id: '', connection: { kind: 'tcp', tcpHost: 'h' } },
      { id: 'c', connection: { kind: 'ble' } },
      { id: 'a', connection: { kind: 'tcp', tcpHost: 'x' } },
      'junk',
    ],
  });
  assert.deepEqual(doc, {
    schemaVersion: 1,
    updatedAt: 99,
    entries: [{ id: 'a', title: 'Mesh radio (auto)', connection: { kind: 'serial', serialPort: 'auto' }, scanIntervalSec: 30 }],
  });
  assert.deepEqual(normalizeConnectionEntries('nope'), { schemaVersion: 1, updatedAt: 0, entries: [] });
});

test('a corrupt file reads as empty', async () => {
  const dir = await tmpDir();
  await fs.writeFile(path.join(dir, 'connections.json'), '{ not json', 'utf8');
  const store = new ConnectionConfigStore(dir);
  assert.deepEqual(await store.list(), []);
});
