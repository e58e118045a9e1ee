import express, { Request, Response } from 'express';
import cors from 'cors';
import { DEFAULT_DISCOVERY_TIMEOUT_MS, DEFAULT_TCP_PORT } from '../core/constants';
import { JsonObject, JsonValue, candidateToJSON, connectionToJSON, snapshotToJSON, usbPortToJSON } from '../core/device';
import { InvalidArgumentError, MeshError, MeshErrorCode, errorMessage, isMeshError } from '../core/errors';
import { NetworkDiscoverer } from '../core/NetworkDiscoverer';
import { PortEnumerator } from '../core/PortEnumerator';
import { MeshRegistry } from '../services/MeshRegistry';
import { ConnectionConfigStore, NewConnectionEntry } from '../storage/ConnectionConfigStore';
import { parseConnectionSpec } from '../core/ConnectionResolver';
import { isRecord } from '../core/optionalTree';
import { DeviceSnapshot } from '../types/mesh';

export interface AppDeps {
  ports: Pick<PortEnumerator, 'listPorts'>;
  discoverer: Pick<NetworkDiscoverer, 'discover'>;
  registry: Pick<MeshRegistry, 'getSnapshots' | 'invoke' | 'reloadEntry' | 'unloadEntry' | 'entryIds' | 'pendingIds'>;
  store: Pick<ConnectionConfigStore, 'list' | 'upsert' | 'remove'>;
  defaultScanIntervalSec?: number;
}

const STATUS_BY_CODE: Record<MeshErrorCode, number> = {
  InvalidArgument: 400,
  InvalidConnectionKind: 400,
  TcpHostMissing: 400,
  NoEntries: 400,
  AmbiguousEntry: 400,
  EntryNotFound: 404,
  UnsupportedOperation: 501,
  NotReady: 503,
  DeviceLibraryUnavailable: 503,
  SerialBackendUnavailable: 503,
  SerialPortNotFound: 502,
  ConnectionFailed: 502,
};

export function httpStatusFor(e: unknown): number {
  return isMeshError(e) ? STATUS_BY_CODE[e.code] : 500;
}

function sendError(res: Response, e: unknown) {
  const status = httpStatusFor(e);
  if (status >= 500) console.error(`[API] ${errorMessage(e)}`);
  const body: JsonObject = { code: status, msg: errorMessage(e) };
  if (e instanceof MeshError) body.error = e.code;
  res.status(status).json(body);
}

function ok(res: Response, data?: JsonValue) {
  res.json(data === undefined ? { code: 0, msg: 'success' } : { code: 0, msg: 'success', data });
}

function handle(fn: (req: Request, res: Response) => Promise<void>) {
  return (req: Request, res: Response) => {
    fn(req, res).catch((e: unknown) => sendError(res, e));
  };
}

function queryString(req: Request, key: string): string | undefined {
  const v = req.query[key];
  return typeof v === 'string' && v.trim() ? v.trim() : undefined;
}

function queryInt(req: Request, key: string, fallback: number, min: number, max: number): number {
  const raw = queryString(req, key);
  if (raw === undefined) return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min || n > max) throw new InvalidArgumentError(`${key} must be an integer in [${min}, ${max}]`);
  return n;
}

function entryView(entryId: string, title: string, snapshot: DeviceSnapshot | null): JsonObject {
  return { entryId, title, ...(snapshot ? snapshotToJSON(snapshot) : {}) };
}

function optionalField<T>(body: Record<string, unknown>, key: string, guard: (v: unknown) => v is T, type: string): T | undefined {
  const v = body[key];
  if (v === undefined || v === null) return undefined;
  if (!guard(v)) throw new InvalidArgumentError(`${key} must be a ${type}`);
  return v;
}

const isString = (v: unknown): v is string => typeof v === 'string';
const isNumber = (v: unknown): v is number => typeof v === 'number';

// 请求体 -> 新条目；字段类型不对直接 400
function parseEntryBody(body: unknown, defaultScanIntervalSec: number): NewConnectionEntry {
  if (!isRecord(body)) throw new InvalidArgumentError('Request body must be an object');
  const id = optionalField(body, 'id', isString, 'string');
  const title = optionalField(body, 'title', isString, 'string');
  const scanIntervalSec = optionalField(body, 'scanIntervalSec', isNumber, 'number');
  if (!isRecord(body.connection)) throw new InvalidArgumentError('connection is required');
  const connection = parseConnectionSpec(body.connection);
  if (connection.kind === 'tcp' && !connection.tcpHost) throw new InvalidArgumentError('tcpHost is required');
  return { id, title, connection, scanIntervalSec: scanIntervalSec ?? defaultScanIntervalSec };
}

export function createApp(deps: AppDeps) {
  const { ports, discoverer, registry, store } = deps;
  const defaultScanIntervalSec = deps.defaultScanIntervalSec ?? 30;
  const app = express();

  app.use(cors());
  app.use(express.json());

  // 1. 识别到的电台串口
  app.get(
    '/ports',
    handle(async (_req, res) => {
      // 枚举失败视为没有候选串口
      const list = await ports.listPorts().catch((e: unknown) => {
        console.warn(`[API] Serial port enumeration failed: ${errorMessage(e)}`);
        return [];
      });
      ok(res, list.map(usbPortToJSON));
    })
  );

  // 2. 局域网 TCP 发现
  app.get(
    '/discover',
    handle(async (req, res) => {
      const candidates = await discoverer.discover({
        subnet: queryString(req, 'subnet'),
        port: queryInt(req, 'port', DEFAULT_TCP_PORT, 1, 65535),
        timeoutMs: queryInt(req, 'timeout', DEFAULT_DISCOVERY_TIMEOUT_MS, 1, 60_000),
        concurrency: queryInt(req, 'concurrency', 1, 1, 256),
      });
      ok(res, candidates.map(candidateToJSON));
    })
  );

  // 3. 连接条目
  app.get(
    '/connections',
    handle(async (_req, res) => {
      const entries = await store.list();
      const ready = new Set(registry.entryIds);
      const pending = new Set(registry.pendingIds);
      ok(
        res,
        entries.map((e) => ({
          id: e.id,
          title: e.title,
          scanIntervalSec: e.scanIntervalSec,
          connection: connectionToJSON(e.connection),
          status: ready.has(e.id) ? 'ready' : pending.has(e.id) ? 'retrying' : 'stopped',
        }))
      );
    })
  );

  app.post(
    '/connections',
    handle(async (req, res) => {
      const input = parseEntryBody(req.body, defaultScanIntervalSec);
      const entry = await store.upsert(input);
      await registry.reloadEntry(entry);
      ok(res, {
        id: entry.id,
        title: entry.title,
        scanIntervalSec: entry.scanIntervalSec,
        connection: connectionToJSON(entry.connection),
        ready: registry.entryIds.includes(entry.id),
      });
    })
  );

  app.delete(
    '/connections/:id',
    handle(async (req, res) => {
      const id = req.params.id;
      const removed = await store.remove(id);
      const unloaded = registry.unloadEntry(id);
      if (!removed && !unloaded) {
        res.status(404).json({ code: 404, msg: `Unknown connection entry: ${id}` });
        return;
      }
      ok(res, { id });
    })
  );

  // 4. 最新快照
  app.get(
    '/devices',
    handle(async (_req, res) => {
      ok(
        res,
        registry.getSnapshots().map((s) => entryView(s.entryId, s.title, s.snapshot))
      );
    })
  );

  // 5. 命令：send_message / reboot / set_channel / refresh
  app.post(
    '/commands/:name',
    handle(async (req, res) => {
      const result = await registry.invoke(req.params.name, req.body);
      const data: JsonObject = { entryIds: result.entryIds };
      if (result.snapshots) data.snapshots = result.snapshots.map(snapshotToJSON);
      ok(res, data);
    })
  );

  return app;
}
