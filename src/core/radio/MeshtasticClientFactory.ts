import { DeviceLibraryUnavailableError, errorMessage } from '../errors';
import { formatNodeId, parseNodeTarget } from '../nodeId';
import { isRecord, OptionalTree } from '../optionalTree';
import { REBOOT_DELAY_SEC } from '../constants';
import { RadioClient, RadioClientFactory, RadioOpenOptions } from './RadioClient';

export const CORE_MODULE = '@meshtastic/core';
export const TCP_TRANSPORT_MODULE = '@meshtastic/transport-node';
export const SERIAL_TRANSPORT_MODULE = '@meshtastic/transport-node-serial';
export const PROTOBUF_RUNTIME_MODULE = '@bufbuild/protobuf';

// DeviceStatusEnum.DeviceConfigured
const DEVICE_CONFIGURED = 7;
const CHANNEL_ROLE_PRIMARY = 1;

export type ModuleLoader = (name: string) => Promise<unknown>;

interface Dispatcher {
  subscribe(fn: (value: unknown) => void): unknown;
}

interface MeshDeviceLike {
  events: Record<string, unknown>;
  configure(): Promise<unknown>;
  sendText?(text: string, destination?: number | 'broadcast', wantAck?: boolean, channel?: number): Promise<unknown>;
  reboot?(time: number): Promise<unknown>;
  setChannel?(channel: unknown): Promise<unknown>;
  disconnect?(): Promise<unknown>;
}

type MeshDeviceCtor = new (transport: unknown) => MeshDeviceLike;

interface TransportFactoryLike {
  create(...args: unknown[]): Promise<unknown>;
}

type CreateMessage = (schema: unknown, init: unknown) => unknown;

function isConstructor(v: unknown): v is MeshDeviceCtor {
  return typeof v === 'function';
}

function isTransportFactory(v: unknown): v is TransportFactoryLike {
  return (typeof v === 'function' || isRecord(v)) && 'create' in v && typeof v.create === 'function';
}

function isDispatcher(v: unknown): v is Dispatcher {
  return isRecord(v) && typeof v.subscribe === 'function';
}

function isCreateMessage(v: unknown): v is CreateMessage {
  return typeof v === 'function';
}

// tsc 在 CommonJS 下会把 import() 改写成 require()，而这些包只提供 ESM
const nativeImport = new Function('specifier', 'return import(specifier);');

export const nativeModuleLoader: ModuleLoader = async (name) => {
  const mod: unknown = await nativeImport(name);
  return mod;
};

/**
 * Radio client backed by the Meshtastic JS client packages. The packages are
 * loaded on first use through a native `import()`; a package that cannot be
 * loaded surfaces as DeviceLibraryUnavailable.
 */
export class MeshtasticClientFactory implements RadioClientFactory {
  private loader: ModuleLoader;

  constructor(opts?: { loader?: ModuleLoader }) {
    this.loader = opts?.loader ?? nativeModuleLoader;
  }

  async openSerial(devicePath: string, opts: RadioOpenOptions): Promise<RadioClient> {
    const TransportNodeSerial = await this.loadExport(SERIAL_TRANSPORT_MODULE, 'TransportNodeSerial');
    if (!isTransportFactory(TransportNodeSerial)) throw new DeviceLibraryUnavailableError(`${SERIAL_TRANSPORT_MODULE} has no TransportNodeSerial.create`);
    return this.connect(() => TransportNodeSerial.create(devicePath, 115200), opts);
  }

  async openTcp(host: string, port: number, opts: RadioOpenOptions): Promise<RadioClient> {
    const TransportNode = await this.loadExport(TCP_TRANSPORT_MODULE, 'TransportNode');
    if (!isTransportFactory(TransportNode)) throw new DeviceLibraryUnavailableError(`${TCP_TRANSPORT_MODULE} has no TransportNode.create`);
    return this.connect(() => TransportNode.create(host, port), opts);
  }

  private async connect(createTransport: () => Promise<unknown>, opts: RadioOpenOptions): Promise<RadioClient> {
    const core = await this.loadModule(CORE_MODULE);
    const MeshDevice = OptionalTree.of(core).get('MeshDevice').raw;
    if (!isConstructor(MeshDevice)) throw new DeviceLibraryUnavailableError(`${CORE_MODULE} has no MeshDevice`);
    const createMessage = await this.loadCreateMessage();

    const transport = await createTransport();
    const device = new MeshDevice(transport);
    const client = new MeshtasticRadioClient(device, OptionalTree.of(core).get('Protobuf'), createMessage);
    try {
      await client.configure(opts.timeoutMs);
    } catch (e) {
      await client.close().catch((closeErr: unknown) => {
        console.warn(`[MeshtasticClient] Failed to close after configure error: ${errorMessage(closeErr)}`);
      });
      throw e;
    }
    return client;
  }

  private async loadCreateMessage(): Promise<CreateMessage | undefined> {
    try {
      const create = OptionalTree.of(await this.loader(PROTOBUF_RUNTIME_MODULE)).get('create').raw;
      return isCreateMessage(create) ? create : undefined;
    } catch (e) {
      // 缺少 protobuf 运行时只影响改信道
      console.debug(`[MeshtasticClient] ${PROTOBUF_RUNTIME_MODULE} unavailable: ${errorMessage(e)}`);
      return undefined;
    }
  }

  private async loadModule(name: string): Promise<unknown> {
    try {
      return await this.loader(name);
    } catch (e) {
      throw new DeviceLibraryUnavailableError(`${name} could not be loaded`, e);
    }
  }

  private async loadExport(name: string, exportName: string): Promise<unknown> {
    return OptionalTree.of(await this.loadModule(name)).get(exportName).raw;
  }
}

interface CollectedState {
  myInfo: Record<string, unknown>;
  radioConfig: { preferences: Record<string, unknown> };
  nodes: Map<number, unknown>;
  channels: Map<number, Record<string, unknown>>;
  rawChannels: Map<number, unknown>;
  lastReceived?: Record<string, unknown>;
}

export class MeshtasticRadioClient implements RadioClient {
  private device: MeshDeviceLike;
  private protobuf: OptionalTree;
  private collected: CollectedState = {
    myInfo: {},
    radioConfig: { preferences: {} },
    nodes: new Map(),
    channels: new Map(),
    rawChannels: new Map(),
  };
  private unsubscribers: Array<() => void> = [];
  private configured = false;
  private onConfigured?: () => void;

  sendText?: (text: string, destinationId?: string) => Promise<void>;
  reboot?: () => Promise<void>;
  setPrimaryChannel?: (name: string) => Promise<void>;

  constructor(device: MeshDeviceLike, protobuf: OptionalTree, createMessage?: CreateMessage) {
    this.device = device;
    this.protobuf = protobuf;
    this.bindEvents();

    if (typeof device.sendText === 'function') {
      this.sendText = async (text, destinationId) => {
        const destination = destinationId === undefined ? 'broadcast' : parseNodeTarget(destinationId);
        await device.sendText?.(text, destination, true, 0);
      };
    }
    if (typeof device.reboot === 'function') {
      this.reboot = async () => {
        await device.reboot?.(REBOOT_DELAY_SEC);
      };
    }
    const channelSchema = protobuf.path('Channel', 'ChannelSchema').raw;
    if (typeof device.setChannel === 'function' && createMessage && channelSchema !== undefined) {
      const create = createMessage;
      this.setPrimaryChannel = async (name) => {
        const current = this.collected.rawChannels.get(0);
        const base: Record<string, unknown> = isRecord(current) ? current : {};
        const settings = isRecord(base.settings) ? base.settings : {};
        const next = create(channelSchema, { ...base, index: 0, role: CHANNEL_ROLE_PRIMARY, settings: { ...settings, name } });
        await device.setChannel?.(next);
      };
    }
  }

  get myInfo(): unknown {
    return this.collected.myInfo;
  }

  get radioConfig(): unknown {
    return this.collected.radioConfig;
  }

  get nodes(): unknown {
    return this.collected.nodes;
  }

  get channels(): unknown {
    return [...this.collected.channels.entries()].sort((a, b) => a[0] - b[0]).map(([, ch]) => ch);
  }

  get lastReceived(): unknown {
    return this.collected.lastReceived;
  }

  async configure(timeoutMs: number): Promise<void> {
    const ready = new Promise<void>((resolve) => {
      if (this.configured) resolve();
      this.onConfigured = resolve;
    });
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new Error(`Timed out after ${timeoutMs}ms waiting for node configuration`)), timeoutMs);
    });
    try {
      await Promise.race([Promise.resolve(this.device.configure()).then(() => ready), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  async close(): Promise<void> {
    for (const unsub of this.unsubscribers.splice(0)) unsub();
    if (typeof this.device.disconnect === 'function') await this.device.disconnect();
  }

  private subscribe(eventName: string, handler: (value: OptionalTree) => void) {
    const dispatcher = this.device.events[eventName];
    if (!isDispatcher(dispatcher)) return;
    const unsub = dispatcher.subscribe((value) => handler(OptionalTree.of(value)));
    if (typeof unsub === 'function') this.unsubscribers.push(() => unsub());
  }

  private enumName(path: string[], value: OptionalTree): string | undefined {
    const n = value.number();
    if (n === undefined) return value.string();
    return this.protobuf.path(...path, n).string() ?? String(n);
  }

  private bindEvents() {
    const { myInfo, radioConfig, nodes, channels, rawChannels } = this.collected;

    this.subscribe('onMyNodeInfo', (info) => {
      const num = info.get('myNodeNum').number();
      if (num === undefined) return;
      myInfo.my_node_num = num;
      myInfo.my_node_id = formatNodeId(num);
    });

    this.subscribe('onDeviceMetadataPacket', (packet) => {
      const meta = packet.get('data').or(packet);
      const firmware = meta.get('firmwareVersion').string();
      if (firmware) myInfo.firmware_version = firmware;
      const hw = this.enumName(['Mesh', 'HardwareModel'], meta.get('hwModel'));
      if (hw) myInfo.hw_model = hw;
    });

    this.subscribe('onNodeInfoPacket', (node) => {
      const num = node.get('num').number();
      if (num === undefined) return;
      const metrics = node.get('deviceMetrics');
      const user = node.get('user');
      nodes.set(num, {
        num,
        user: toSnakeTree(user.raw),
        rx_snr: node.get('snr').number(),
        device_metrics: toSnakeTree(metrics.raw),
      });
      if (num !== myInfo.my_node_num) return;
      myInfo.node_info = {
        user: { long_name: user.get('longName').string(), short_name: user.get('shortName').string() },
        role: this.enumName(['Config', 'Config_DeviceConfig_Role'], user.get('role')),
      };
      if (myInfo.hw_model === undefined) myInfo.hw_model = this.enumName(['Mesh', 'HardwareModel'], user.get('hwModel'));
      myInfo.node_metrics = { snr: node.get('snr').number(), air_util_tx: metrics.get('airUtilTx').number() };
      myInfo.device_metrics = {
        battery_level: metrics.get('batteryLevel').number(),
        voltage: metrics.get('voltage').number(),
        uptime_seconds: metrics.get('uptimeSeconds').number(),
      };
    });

    this.subscribe('onChannelPacket', (channel) => {
      const index = channel.get('index').number() ?? channels.size;
      // role 0 = DISABLED
      if (channel.get('role').number() === 0) {
        channels.delete(index);
        return;
      }
      rawChannels.set(index, channel.raw);
      channels.set(index, { index, settings: { name: channel.path('settings', 'name').string() } });
    });

    this.subscribe('onConfigPacket', (config) => {
      const variant = config.get('payloadVariant');
      const value = variant.get('value');
      if (variant.get('case').string() === 'lora') {
        radioConfig.preferences.region = this.enumName(['Config', 'Config_LoRaConfig_RegionCode'], value.get('region'));
      } else if (variant.get('case').string() === 'device') {
        radioConfig.preferences.role = this.enumName(['Config', 'Config_DeviceConfig_Role'], value.get('role'));
      }
    });

    this.subscribe('onMessagePacket', (packet) => {
      const from = packet.get('from').number();
      const rxTime = packet.get('rxTime').raw;
      this.collected.lastReceived = {
        from: from === undefined ? undefined : formatNodeId(from),
        decoded: {
          text: packet.get('data').string(),
          portnum: 'TEXT_MESSAGE_APP',
          rx_time: rxTime instanceof Date ? Math.floor(rxTime.getTime() / 1000) : OptionalTree.of(rxTime).number(),
        },
      };
    });

    this.subscribe('onDeviceStatus', (status) => {
      if (status.number() !== DEVICE_CONFIGURED) return;
      this.configured = true;
      this.onConfigured?.();
    });
  }
}

/**
 * camelCase 协议对象 -> snake_case 普通对象；丢弃 `$typeName` 等元字段。
 */
export function toSnakeTree(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(toSnakeTree);
  if (typeof value === 'bigint') return Number(value);
  if (value instanceof Date) return Math.floor(value.getTime() / 1000);
  if (!isRecord(value)) return value;
  const out: Record<string, unknown> = {};
  for (const [key, v] of Object.entries(value)) {
    if (key.startsWith('$')) continue;
    out[key.replace(/[A-Z]/g, (c) => `_${c.toLowerCase()}`)] = toSnakeTree(v);
  }
  return out;
}
