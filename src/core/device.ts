import { DEFAULT_TCP_PORT } from './constants';
import { ConnectionSpec, DeviceSnapshot, DiscoveredTcpCandidate, NodeTelemetry, ResolvedTarget, UsbPortInfo } from '../types/mesh';

export type JsonValue = string | number | boolean | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

function hex16(n: number): string {
  return `0x${n.toString(16).padStart(4, '0')}`;
}

// 缺省值（undefined / null / '' / []）一律不输出
function compact(input: Record<string, unknown>): JsonObject {
  const out: JsonObject = {};
  for (const [key, value] of Object.entries(input)) {
    if (value === undefined || value === null || value === '') continue;
    if (typeof value === 'string' || typeof value === 'boolean') out[key] = value;
    else if (typeof value === 'number') {
      if (Number.isFinite(value)) out[key] = value;
    } else if (Array.isArray(value)) {
      const items = value.filter((v): v is string | number => typeof v === 'string' || typeof v === 'number');
      if (items.length > 0) out[key] = items;
    }
  }
  return out;
}

export function usbPortToJSON(usb: UsbPortInfo): JsonObject {
  return compact({
    ...usb,
    vid: usb.vid === undefined ? undefined : hex16(usb.vid),
    pid: usb.pid === undefined ? undefined : hex16(usb.pid),
  });
}

export function connectionToJSON(spec: ConnectionSpec): JsonObject {
  return spec.kind === 'serial'
    ? compact({ kind: spec.kind, serialPort: spec.serialPort })
    : compact({ kind: spec.kind, tcpHost: spec.tcpHost, tcpPort: spec.tcpPort });
}

export function telemetryToJSON(t: NodeTelemetry): JsonObject {
  return compact({ ...t });
}

function targetFields(connection: ConnectionSpec, target?: ResolvedTarget): Record<string, unknown> {
  if (target?.kind === 'serial') return { serialPort: target.serialPort };
  if (target?.kind === 'tcp') return { tcpHost: target.tcpHost, tcpPort: target.tcpPort };
  if (connection.kind === 'serial') return { serialPort: connection.serialPort };
  return { tcpHost: connection.tcpHost, tcpPort: connection.tcpPort };
}

/**
 * 设备注册用的稳定标识：优先节点 ID（小写），否则退回传输地址。
 */
export function deviceIdentifier(snapshot: Pick<DeviceSnapshot, 'connection' | 'target' | 'telemetry'>): string {
  const nodeId = snapshot.telemetry?.canonicalNodeId;
  if (nodeId) return nodeId.toLowerCase();
  const f = targetFields(snapshot.connection, snapshot.target);
  if (snapshot.connection.kind === 'serial' && typeof f.serialPort === 'string' && f.serialPort) return `serial:${f.serialPort}`;
  if (snapshot.connection.kind === 'tcp' && typeof f.tcpHost === 'string' && f.tcpHost) {
    return `tcp:${f.tcpHost}:${typeof f.tcpPort === 'number' ? f.tcpPort : DEFAULT_TCP_PORT}`;
  }
  return 'unknown';
}

export function deviceDisplayName(snapshot: Pick<DeviceSnapshot, 'connection' | 'target' | 'telemetry'>): string {
  const name = snapshot.telemetry?.nodeName;
  const nodeId = snapshot.telemetry?.canonicalNodeId;
  if (name && nodeId) return `${name} (${nodeId})`;
  if (name) return name;
  if (nodeId) return nodeId;
  const f = targetFields(snapshot.connection, snapshot.target);
  if (snapshot.connection.kind === 'serial' && typeof f.serialPort === 'string' && f.serialPort) return `Serial ${f.serialPort}`;
  if (snapshot.connection.kind === 'tcp' && typeof f.tcpHost === 'string' && f.tcpHost) {
    return `TCP ${f.tcpHost}:${typeof f.tcpPort === 'number' ? f.tcpPort : DEFAULT_TCP_PORT}`;
  }
  return 'Mesh radio';
}

export function snapshotToJSON(snapshot: DeviceSnapshot): JsonObject {
  const out: JsonObject = {
    identifier: deviceIdentifier(snapshot),
    displayName: deviceDisplayName(snapshot),
    connectionKind: snapshot.connection.kind,
    ...compact(targetFields(snapshot.connection, snapshot.target)),
    updatedAt: snapshot.updatedAt,
  };
  if (snapshot.usb) out.usb = usbPortToJSON(snapshot.usb);
  if (snapshot.telemetry) out.node = telemetryToJSON(snapshot.telemetry);
  if (snapshot.error) out.error = snapshot.error;
  return out;
}

export function candidateTitle(host: string, port: number, telemetry?: NodeTelemetry): string {
  const name = telemetry?.nodeName || telemetry?.canonicalNodeId;
  return name ? `${name} (${host}:${port})` : `${host}:${port}`;
}

export function candidateToJSON(c: DiscoveredTcpCandidate): JsonObject {
  const out: JsonObject = { host: c.host, port: c.port, title: c.title };
  if (c.telemetry) out.node = telemetryToJSON(c.telemetry);
  return out;
}
