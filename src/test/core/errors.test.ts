import test from 'node:test';
import assert from 'node:assert/strict';
import {
  AmbiguousEntryError,
  ConnectionFailedError,
  InvalidConnectionKindError,
  MeshError,
  NotReadyError,
  SerialPortNotFoundError,
  UnsupportedOperationError,
  errnoCode,
  errorMessage,
  isMeshError,
} from '../../core/errors';

test('mesh errors carry a literal code and a readable message', () => {
  const auto = new SerialPortNotFoundError('auto');
  assert.equal(auto.code, 'SerialPortNotFound');
  assert.equal(auto.message, 'No mesh radio serial port found');
  assert.equal(new SerialPortNotFoundError('/dev/ttyUSB3').message, 'Serial port /dev/ttyUSB3 not found');

  const kind = new InvalidConnectionKindError('ble');
  assert.equal(kind.code, 'InvalidConnectionKind');
  assert.equal(kind.kind, 'ble');

  assert.equal(new UnsupportedOperationError('reboot').message, 'reboot is not supported by this device');
  assert.equal(new AmbiguousEntryError(2).message, '2 mesh radio connections configured; provide entry_id');
});

test('NotReady keeps the underlying failure as cause', () => {
  const cause = new ConnectionFailedError('connect ECONNREFUSED 10.0.0.2:4403');
  const err = new NotReadyError('kitchen', cause);
  assert.equal(err.message, 'Connection kitchen is not ready: connect ECONNREFUSED 10.0.0.2:4403');
  assert.equal(err.entryId, 'kitchen');
  assert.equal(err.cause, cause);
  assert.ok(err instanceof MeshError);
});

test('isMeshError separates typed failures from plain errors', () => {
  assert.equal(isMeshError(new ConnectionFailedError('x')), true);
  assert.equal(isMeshError(new Error('x')), false);
  assert.equal(isMeshError({ code: 'ConnectionFailed' }), false);
});

test('errorMessage and errnoCode read unknown values', () => {
  assert.equal(errorMessage(new Error('boom')), 'boom');
  assert.equal(errorMessage('plain'), 'plain');
  assert.equal(errnoCode({ code: 'ENOENT' }), 'ENOENT');
  assert.equal(errnoCode(new Error('no code')), undefined);
  assert.equal(errnoCode(null), undefined);
});
