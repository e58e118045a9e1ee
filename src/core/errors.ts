export type MeshErrorCode =
  | 'SerialPortNotFound'
  | 'TcpHostMissing'
  | 'DeviceLibraryUnavailable'
  | 'SerialBackendUnavailable'
  | 'ConnectionFailed'
  | 'InvalidConnectionKind'
  | 'UnsupportedOperation'
  | 'InvalidArgument'
  | 'NotReady'
  | 'EntryNotFound'
  | 'NoEntries'
  | 'AmbiguousEntry';

/**
 * 所有链路/命令错误的基类。调用方按 code 区分，不做字符串匹配。
 */
export class MeshError extends Error {
  readonly code: MeshErrorCode;

  constructor(code: MeshErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = code;
    this.code = code;
  }
}

export class SerialPortNotFoundError extends MeshError {
  readonly serialPort: string;

  constructor(serialPort: string) {
    super('SerialPortNotFound', serialPort === 'auto' ? 'No mesh radio serial port found' : `Serial port ${serialPort} not found`);
    this.serialPort = serialPort;
  }
}

export class TcpHostMissingError extends MeshError {
  constructor() {
    super('TcpHostMissing', 'TCP host is missing');
  }
}

export class DeviceLibraryUnavailableError extends MeshError {
  constructor(detail: string, cause?: unknown) {
    super('DeviceLibraryUnavailable', `Radio client library unavailable: ${detail}`, { cause });
  }
}

export class SerialBackendUnavailableError extends MeshError {
  constructor(cause?: unknown) {
    super('SerialBackendUnavailable', 'Serial port backend is not available', { cause });
  }
}

export class ConnectionFailedError extends MeshError {
  readonly detail: string;

  constructor(detail: string, cause?: unknown) {
    super('ConnectionFailed', detail, { cause });
    this.detail = detail;
  }
}

export class InvalidConnectionKindError extends MeshError {
  readonly kind: string;

  constructor(kind: string) {
    super('InvalidConnectionKind', `Invalid connection kind: ${kind}`);
    this.kind = kind;
  }
}

export class UnsupportedOperationError extends MeshError {
  readonly operation: string;

  constructor(operation: string) {
    super('UnsupportedOperation', `${operation} is not supported by this device`);
    this.operation = operation;
  }
}

export class InvalidArgumentError extends MeshError {
  readonly reason: string;

  constructor(reason: string) {
    super('InvalidArgument', reason);
    this.reason = reason;
  }
}

export class NotReadyError extends MeshError {
  readonly entryId: string;

  constructor(entryId: string, cause: unknown) {
    super('NotReady', `Connection ${entryId} is not ready: ${errorMessage(cause)}`, { cause });
    this.entryId = entryId;
  }
}

export class EntryNotFoundError extends MeshError {
  constructor(entryId: string) {
    super('EntryNotFound', `Unknown connection entry: ${entryId}`);
  }
}

export class NoEntriesError extends MeshError {
  constructor() {
    super('NoEntries', 'No mesh radio connections configured');
  }
}

export class AmbiguousEntryError extends MeshError {
  constructor(count: number) {
    super('AmbiguousEntry', `${count} mesh radio connections configured; provide entry_id`);
  }
}

export class ESerialBusy extends Error {
  code = 'ESerialBusy' as const;
  lockedPid?: number;
  lockFilePath?: string;

  constructor(message: string, options?: { lockedPid?: number; lockFilePath?: string }) {
    super(message);
    this.name = 'ESerialBusy';
    this.lockedPid = options?.lockedPid;
    this.lockFilePath = options?.lockFilePath;
  }
}

export class EInstanceLocked extends Error {
  code = 'ELOCKED' as const;
  lockedPid: number;
  lockFilePath: string;

  constructor(lockedPid: number, lockFilePath: string) {
    super(`LOCKED_BY_PID:${lockedPid}`);
    this.name = 'EInstanceLocked';
    this.lockedPid = lockedPid;
    this.lockFilePath = lockFilePath;
  }
}

export function isMeshError(e: unknown): e is MeshError {
  return e instanceof MeshError;
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message || e.name;
  return String(e);
}

export function errnoCode(e: unknown): string | undefined {
  if (e && typeof e === 'object' && 'code' in e && typeof e.code === 'string') return e.code;
  return undefined;
}
