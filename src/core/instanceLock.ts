import fs from 'fs';
import path from 'path';
import { EInstanceLocked, errnoCode } from './errors';
import { isRecord } from './optionalTree';

export interface InstanceLock {
  release: () => void;
}

interface LockFileContent {
  pid?: unknown;
  createdAt?: unknown;
}

export function isPidAlive(pid: unknown): boolean {
  const n = Number(pid);
  if (!Number.isInteger(n) || n <= 0) return false;
  try {
    process.kill(n, 0);
    return true;
  } catch (e) {
    // EPERM 表示进程存在但属于其他用户
    return errnoCode(e) === 'EPERM';
  }
}

function readLockFile(lockFilePath: string): LockFileContent | null {
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(lockFilePath, 'utf8'));
    return isRecord(parsed) ? parsed : null;
  } catch (e) {
    console.warn(`[InstanceLock] Unreadable lock file ${lockFilePath}: ${String(e)}`);
    return null;
  }
}

/**
 * 以 O_EXCL 创建锁文件；锁持有者已退出时清理后重试。
 */
export function acquireInstanceLock(lockFilePath: string): InstanceLock {
  fs.mkdirSync(path.dirname(lockFilePath), { recursive: true });

  try {
    const fd = fs.openSync(lockFilePath, 'wx');
    try {
      fs.writeFileSync(fd, JSON.stringify({ pid: process.pid, createdAt: new Date().toISOString() }, null, 2), 'utf8');
    } finally {
      fs.closeSync(fd);
    }
  } catch (e) {
    if (errnoCode(e) !== 'EEXIST') throw e;
    const lockedPid = Number(readLockFile(lockFilePath)?.pid);
    if (isPidAlive(lockedPid)) {
      throw new EInstanceLocked(lockedPid, lockFilePath);
    }
    removeStale(lockFilePath);
    return acquireInstanceLock(lockFilePath);
  }

  let released = false;
  const release = () => {
    if (released) return;
    released = true;
    process.removeListener('exit', release);
    removeStale(lockFilePath);
  };

  process.once('exit', release);

  return { release };
}

function removeStale(lockFilePath: string) {
  try {
    fs.unlinkSync(lockFilePath);
  } catch (e) {
    if (errnoCode(e) !== 'ENOENT') throw e;
  }
}
