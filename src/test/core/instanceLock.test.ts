import test from 'node:test';
import assert from 'node:assert/strict';
import os from 'node:os';
import path from 'node:path';
import fs from 'node:fs';
import { acquireInstanceLock, isPidAlive } from '../../core/instanceLock';
import { EInstanceLocked } from '../../core/errors';

function tmpFilePath(prefix: string) {
  const id = `${Date.now()}-${Math.random().toString(16).slice(2)}`;
  return path.join(os.tmpdir(), `${prefix}-${id}.json`);
}

test('acquireInstanceLock is exclusive and releasable', () => {
  const lockPath = tmpFilePath('server-lock');
  const a = acquireInstanceLock(lockPath);
  assert.ok(fs.existsSync(lockPath));

  assert.throws(
    () => acquireInstanceLock(lockPath),
    (e: unknown) => e instanceof EInstanceLocked && e.code === 'ELOCKED' && e.lockedPid === process.pid
  );

  a.release();
  assert.ok(!fs.existsSync(lockPath));

  const b = acquireInstanceLock(lockPath);
  b.release();
});

test('acquireInstanceLock replaces a lock left by a dead process', () => {
  const lockPath = tmpFilePath('server-lock-stale');
  fs.writeFileSync(lockPath, JSON.stringify({ pid: 0, createdAt: 'then' }), 'utf8');

  const lock = acquireInstanceLock(lockPath);
  const content: unknown = JSON.parse(fs.readFileSync(lockPath, 'utf8'));
  assert.deepEqual(
    typeof content === 'object' && content !== null && 'pid' in content ? content.pid : undefined,
    process.pid
  );
  lock.release();
});

test('acquireInstanceLock treats an unreadable lock file as stale', () => {
  const lockPath = tmpFilePath('server-lock-garbage');
  fs.writeFileSync(lockPath, 'not json', 'utf8');
  const lock = acquireInstanceLock(lockPath);
  assert.ok(fs.existsSync(lockPath));
  lock.release();
  assert.ok(!fs.existsSync(lockPath));
});

test('isPidAlive rejects non-positive and non-integer pids', () => {
  assert.equal(isPidAlive(process.pid), true);
  assert.equal(isPidAlive(0), false);
  assert.equal(isPidAlive(-5), false);
  assert.equal(isPidAlive('abc'), false);
  assert.equal(isPidAlive(1.5), false);
});
