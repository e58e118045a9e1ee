import crypto from 'crypto';
import path from 'path';
import { parseConnectionSpec } from '../core/ConnectionResolver';
import { errorMessage } from '../core/errors';
import { isRecord } from '../core/optionalTree';
import { clampScanInterval } from '../services/PollScheduler';
import { ConnectionEntriesV1, ConnectionEntry, ConnectionSpec } from '../types/mesh';
import { JsonFileStore } from './JsonFileStore';

export const CONNECTIONS_FILE = 'connections.json';

export interface NewConnectionEntry {
  id?: string;
  title?: string;
  connection: ConnectionSpec;
  scanIntervalSec?: number;
}

export function defaultEntryTitle(connection: ConnectionSpec): string {
  if (connection.kind === 'serial') return `Mesh radio (${connection.serialPort})`;
  return connection.tcpPort ? `Mesh radio (${connection.tcpHost}:${connection.tcpPort})` : `Mesh radio (${connection.tcpHost})`;
}

/**
 * 校验单个条目；不合法时抛错，由调用方决定丢弃还是拒绝。
 */
export function normalizeConnectionEntry(raw: unknown): ConnectionEntry {
  if (!isRecord(raw)) throw new Error('entry must be an object');
  const id = typeof raw.id === 'string' ? raw.id.trim() : '';
  if (!id) throw new Error('entry id is missing');
  const connection = parseConnectionSpec(raw.connection);
  const title = typeof raw.title === 'string' && raw.title.trim() ? raw.title.trim() : defaultEntryTitle(connection);
  return { id, title, connection, scanIntervalSec: clampScanInterval(raw.scanIntervalSec) };
}

export function normalizeConnectionEntries(raw: unknown): ConnectionEntriesV1 {
  const obj = isRecord(raw) ? raw : {};
  const list = Array.isArray(obj.entries) ? obj.entries : [];
  const entries: ConnectionEntry[] = [];
  const seen = new Set<string>();
  for (const item of list) {
    try {
      const entry = normalizeConnectionEntry(item);
      if (seen.has(entry.id)) {
        console.warn(`[ConnectionConfigStore] Dropping duplicate entry ${entry.id}`);
        continue;
      }
      seen.add(entry.id);
      entries.push(entry);
    } catch (e) {
      console.warn(`[ConnectionConfigStore] Dropping invalid entry: ${errorMessage(e)}`);
    }
  }
  const updatedAt = typeof obj.updatedAt === 'number' && Number.isFinite(obj.updatedAt) ? obj.updatedAt : 0;
  return { schemaVersion: 1, updatedAt, entries };
}

export class ConnectionConfigStore {
  private store: JsonFileStore<ConnectionEntriesV1>;
  private now: () => number;

  constructor(dataDir: string, now: () => number = Date.now) {
    this.store = new JsonFileStore(path.join(dataDir, CONNECTIONS_FILE), normalizeConnectionEntries);
    this.now = now;
  }

  public getFilePath(): string {
    return this.store.getFilePath();
  }

  public async list(): Promise<ConnectionEntry[]> {
    const doc = await this.store.read({ schemaVersion: 1, updatedAt: 0, entries: [] });
    return doc.entries;
  }

  /**
   * 新增或按 id 覆盖。返回规范化后的条目。
   */
  public async upsert(input: NewConnectionEntry): Promise<ConnectionEntry> {
    const entry = normalizeConnectionEntry({
      ...input,
      id: input.id?.trim() || crypto.randomUUID(),
    });
    const entries = await this.list();
    const idx = entries.findIndex((e) => e.id === entry.id);
    if (idx >= 0) entries[idx] = entry;
    else entries.push(entry);
    await this.save(entries);
    return entry;
  }

  public async remove(id: string): Promise<boolean> {
    const entries = await this.list();
    const next = entries.filter((e) => e.id !== id);
    if (next.length === entries.length) return false;
    await this.save(next);
    return true;
  }

  private async save(entries: ConnectionEntry[]): Promise<void> {
    await this.store.write({ schemaVersion: 1, updatedAt: this.now(), entries });
  }
}
