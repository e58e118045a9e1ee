// 网状电台连接、遥测与快照的类型定义

export type ConnectionKind = 'serial' | 'tcp';

export interface SerialConnectionSpec {
  readonly kind: 'serial';
  /** 设备路径，或 'auto' 表示取第一个识别到的电台串口 */
  readonly serialPort: string;
}

export interface TcpConnectionSpec {
  readonly kind: 'tcp';
  readonly tcpHost: string;
  readonly tcpPort?: number;
}

export type ConnectionSpec = SerialConnectionSpec | TcpConnectionSpec;

// 实际使用的传输地址
export type ResolvedTarget =
  | { kind: 'serial'; serialPort: string }
  | { kind: 'tcp'; tcpHost: string; tcpPort: number };

export interface UsbPortInfo {
  device: string;
  description?: string;
  hwid?: string;
  manufacturer?: string;
  product?: string;
  serialNumber?: string;
  location?: string;
  vid?: number;
  pid?: number;
}

export interface NodeTelemetry {
  firmware?: string;
  nodeNum?: number;
  hwModel?: string;
  canonicalNodeId?: string;
  nodeName?: string;
  region?: string;
  role?: string;
  routeTableSize?: number;
  channel?: string;
  channels?: string[];
  bleMac?: string;
  bleName?: string;
  rssi?: number;
  snr?: number;
  airtimeUtilization?: number;
  lastMessage?: string;
  lastSender?: string;
  lastGateway?: string;
  lastMessageType?: string;
  lastMessageTime?: number;
  batteryLevel?: number;
  batteryVoltage?: number;
  temperature?: number;
  uptime?: number;
}

export interface DeviceRecord {
  connection: ConnectionSpec;
  target: ResolvedTarget;
  usb?: UsbPortInfo;
  telemetry: NodeTelemetry;
}

export interface DeviceSnapshot {
  connection: ConnectionSpec;
  target?: ResolvedTarget;
  usb?: UsbPortInfo;
  telemetry?: NodeTelemetry;
  error?: string;
  updatedAt: number;
}

export interface DiscoveredTcpCandidate {
  host: string;
  port: number;
  telemetry?: NodeTelemetry;
  title: string;
}

export type SchedulerState = 'idle' | 'polling' | 'stopped';

export interface ConnectionEntry {
  id: string;
  title: string;
  connection: ConnectionSpec;
  scanIntervalSec: number;
}

export interface ConnectionEntriesV1 {
  schemaVersion: 1;
  updatedAt: number;
  entries: ConnectionEntry[];
}
